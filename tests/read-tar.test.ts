import { describe, expect, it } from 'vitest';

import { RemoteRangeReader } from '../src/lib/io/read/url-range-reader';
import { readTar } from '../src/lib/readers/read-tar';
import { buildTar, collect } from './helpers/archives';
import { RangeServer } from './helpers/range-server';

const open = (data: Uint8Array, minFetchSize?: number) => {
    const server = new RangeServer(data);
    const reader = new RemoteRangeReader('https://example.com/archive.tar', { client: server, minFetchSize });
    return { server, reader };
};

describe('readTar', () => {
    it('lists entries in archive order', async () => {
        const { reader } = open(buildTar([
            { name: 'hello.txt', data: 'hello, world' },
            { name: 'docs/', type: '5' },
            { name: 'empty.txt' },
            { name: 'big.bin', data: new Uint8Array(1500).fill(7) }
        ]));

        expect(await collect(readTar(reader))).toEqual([
            { name: 'hello.txt', size: 12, type: '0' },
            { name: 'docs/', size: 0, type: '5' },
            { name: 'empty.txt', size: 0, type: '0' },
            { name: 'big.bin', size: 1500, type: '0' }
        ]);
    });

    it('lists a small archive with a single request', async () => {
        const { server, reader } = open(buildTar([
            { name: 'a.txt', data: 'a' },
            { name: 'b.txt', data: 'bb' },
            { name: 'c.txt', data: 'ccc' }
        ]));

        const names = (await collect(readTar(reader))).map(e => e.name);

        expect(names).toEqual(['a.txt', 'b.txt', 'c.txt']);
        expect(server.requests).toHaveLength(1);
    });

    it('skips entry data with seeks instead of reads', async () => {
        const data = buildTar([
            { name: 'first.bin', data: new Uint8Array(4096) },
            { name: 'second.txt', data: 'x' }
        ]);
        const { server, reader } = open(data, 512);

        const names = (await collect(readTar(reader))).map(e => e.name);

        expect(names).toEqual(['first.bin', 'second.txt']);
        // each entry costs its header and the last byte of its padded data
        expect(server.ranges).toEqual([
            'bytes=0-511',
            'bytes=4607-5118',
            'bytes=4608-5119',
            'bytes=5631-6142',
            'bytes=5632-6143',
            'bytes=6144-6655'
        ]);
        expect(reader.position).toBe(data.length);
    });

    it('joins the ustar prefix to the name', async () => {
        const { reader } = open(buildTar([
            { name: 'file.txt', prefix: 'some/deep/directory', data: 'abc' }
        ]));

        const [entry] = await collect(readTar(reader));

        expect(entry.name).toBe('some/deep/directory/file.txt');
    });

    it('applies GNU long names to the following entry', async () => {
        const longName = `${'nested/'.repeat(20)}file.txt`;
        const { reader } = open(buildTar([
            { name: '././@LongLink', type: 'L', data: `${longName}\0` },
            { name: longName.slice(0, 100), data: 'content' },
            { name: 'short.txt', data: 'x' }
        ]));

        const names = (await collect(readTar(reader))).map(e => e.name);

        expect(names).toEqual([longName, 'short.txt']);
    });

    it('applies the pax path record to the following entry', async () => {
        const path = 'päx/name.txt';
        const record = ` path=${path}\n`;
        const length = new TextEncoder().encode(record).length;
        // the length prefix counts its own digits
        const body = `${length + `${length}`.length}${record}`;

        const { reader } = open(buildTar([
            { name: 'PaxHeaders/name.txt', type: 'x', data: body },
            { name: 'truncated-name.txt', data: 'content' }
        ]));

        const entries = await collect(readTar(reader));

        expect(entries).toEqual([{ name: path, size: 7, type: '0' }]);
    });

    it('skips pax global headers', async () => {
        const { reader } = open(buildTar([
            { name: 'pax_global_header', type: 'g', data: '22 comment=something\n' },
            { name: 'only.txt', data: 'x' }
        ]));

        const names = (await collect(readTar(reader))).map(e => e.name);

        expect(names).toEqual(['only.txt']);
    });

    it('decodes base-256 sizes', async () => {
        const { reader } = open(buildTar([
            { name: 'binary-size.bin', data: new Uint8Array(700), base256Size: true },
            { name: 'after.txt', data: 'x' }
        ]));

        const entries = await collect(readTar(reader));

        expect(entries.map(e => [e.name, e.size])).toEqual([['binary-size.bin', 700], ['after.txt', 1]]);
    });

    it('ends at a single trailing zero block', async () => {
        const full = buildTar([{ name: 'a.txt', data: 'a' }]);
        const { reader } = open(full.subarray(0, full.length - 512));

        const names = (await collect(readTar(reader))).map(e => e.name);

        expect(names).toEqual(['a.txt']);
    });

    it('ends without a terminator at a header boundary', async () => {
        const full = buildTar([{ name: 'a.txt', data: 'a' }]);
        const { reader } = open(full.subarray(0, 1024));

        const names = (await collect(readTar(reader))).map(e => e.name);

        expect(names).toEqual(['a.txt']);
    });

    it('ends at a header boundary when the server refuses ranges past the end', async () => {
        const full = buildTar([{ name: 'a.txt', data: 'a' }]);
        const server = new RangeServer(full.subarray(0, 1024), { pastEndStatus: 416 });
        const reader = new RemoteRangeReader('https://example.com/archive.tar', { client: server });

        const names = (await collect(readTar(reader))).map(e => e.name);

        expect(names).toEqual(['a.txt']);
        expect(server.ranges).toEqual(['bytes=0-1048575', 'bytes=1024-1049599']);
    });

    it('lists nothing from an empty archive', async () => {
        const { reader } = open(buildTar([]));

        expect(await collect(readTar(reader))).toEqual([]);
    });

    it('rejects a corrupted header', async () => {
        const data = buildTar([{ name: 'a.txt', data: 'a' }]);
        data[0] = 'b'.charCodeAt(0);
        const { reader } = open(data);

        await expect(collect(readTar(reader))).rejects.toThrow('invalid tar header: checksum mismatch');
    });

    it('rejects an archive truncated inside entry data', async () => {
        const full = buildTar([{ name: 'a.bin', data: new Uint8Array(600) }]);
        const { reader } = open(full.subarray(0, 512 + 700));

        await expect(collect(readTar(reader))).rejects.toThrow('unexpected end of tar archive');
    });

    it('rejects an archive truncated inside a header', async () => {
        const full = buildTar([{ name: 'a.txt', data: 'a' }]);
        const { reader } = open(full.subarray(0, 1024 + 100));

        await expect(collect(readTar(reader))).rejects.toThrow('unexpected end of tar archive');
    });
});
