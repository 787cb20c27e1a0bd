import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { parseArguments, run } from '../src/cli/index';
import { ConsoleLogger } from '../src/lib/utils/logger';
import { buildTar, buildZip } from './helpers/archives';
import { RangeServer } from './helpers/range-server';

describe('parseArguments', () => {
    it('applies defaults', () => {
        const { urls, options } = parseArguments(['https://example.com/a.tar']);

        expect(urls).toEqual(['https://example.com/a.tar']);
        expect(options).toEqual({ help: false, version: false, logLevel: 'info', minFetchSize: 1048576 });
    });

    it('maps debug and quiet to log levels', () => {
        expect(parseArguments(['-d', 'u']).options.logLevel).toBe('debug');
        expect(parseArguments(['--quiet', 'u']).options.logLevel).toBe('silent');
        expect(parseArguments(['-d', '-q', 'u']).options.logLevel).toBe('silent');
    });

    it('parses the minimum fetch size', () => {
        expect(parseArguments(['-m', '4096', 'u']).options.minFetchSize).toBe(4096);
        expect(() => parseArguments(['--min-fetch', 'lots', 'u'])).toThrow('Invalid min-fetch value: lots. Must be a positive integer.');
        expect(() => parseArguments(['-m', '0', 'u'])).toThrow('Invalid min-fetch value: 0');
    });

    it('rejects unknown options', () => {
        expect(() => parseArguments(['--recursive', 'u'])).toThrow();
    });
});

describe('run', () => {
    let logger: ConsoleLogger;
    let output: string[];

    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        logger = new ConsoleLogger();
        output = [];
        vi.spyOn(logger, 'output').mockImplementation((text: string) => {
            output.push(text);
        });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('prints tar entry names', async () => {
        const client = new RangeServer(buildTar([
            { name: 'a.txt', data: 'a' },
            { name: 'b/c.txt', data: 'c' }
        ]));

        expect(await run(['https://example.com/files/archive.tar'], { client, logger })).toBe(0);
        expect(output).toEqual(['a.txt', 'b/c.txt']);
    });

    it('prints zip entry names', async () => {
        const client = new RangeServer(buildZip([
            { name: 'x.txt', data: 'x' },
            { name: 'y.txt', data: 'y' }
        ]));

        expect(await run(['https://example.com/files/archive.zip'], { client, logger })).toBe(0);
        expect(output).toEqual(['x.txt', 'y.txt']);
        expect(client.requests.map(r => r.method)).toEqual(['HEAD', 'GET']);
    });

    it('uses the requested fetch size', async () => {
        const client = new RangeServer(buildTar([{ name: 'a.txt', data: 'a' }]));

        expect(await run(['-m', '2048', 'https://example.com/archive.tar'], { client, logger })).toBe(0);
        expect(client.ranges[0]).toBe('bytes=0-2047');
    });

    it('sets the log level from the flags', async () => {
        const client = new RangeServer(buildTar([]));

        await run(['--debug', 'https://example.com/archive.tar'], { client, logger });

        expect(logger.getLevel()).toBe('debug');
    });

    it('prints the version', async () => {
        expect(await run(['--version'], { logger })).toBe(0);
        expect(output).toEqual(['remote-archive-ls v0.1.0']);
    });

    it('fails without a URL', async () => {
        const error = vi.spyOn(logger, 'error');

        expect(await run([], { logger })).toBe(1);
        expect(error).toHaveBeenCalledWith('Expected a URL as the first argument.');
    });

    it('fails on an unsupported extension without any request', async () => {
        const client = new RangeServer(buildTar([]));

        expect(await run(['https://example.com/archive.rar'], { client, logger })).toBe(1);
        expect(client.requests).toHaveLength(0);
        expect(output).toEqual([]);
    });

    it('fails on a transport error', async () => {
        const error = vi.spyOn(logger, 'error');
        const failure = new Error('getaddrinfo ENOTFOUND example.invalid');

        const code = await run(['https://example.invalid/archive.tar'], {
            client: { send: () => Promise.reject(failure) },
            logger
        });

        expect(code).toBe(1);
        expect(error).toHaveBeenCalledWith(failure);
    });

    it('fails on a decode error', async () => {
        const client = new RangeServer(new TextEncoder().encode('not an archive'));

        expect(await run(['https://example.com/archive.zip'], { client, logger })).toBe(1);
        expect(output).toEqual([]);
    });

    it('fails on an invalid option value', async () => {
        expect(await run(['-m', 'many', 'https://example.com/archive.tar'], { logger })).toBe(1);
    });
});
