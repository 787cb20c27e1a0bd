import { argv, exit } from 'node:process';
import { parseArgs } from 'node:util';

import { version } from '../../package.json';
import { type HttpClient } from '../lib/io/read/http-client';
import { DEFAULT_MIN_FETCH_SIZE, RemoteRangeReader } from '../lib/io/read/url-range-reader';
import { getArchiveFormat, listArchive } from '../lib/list';
import { ConsoleLogger, type LogLevel } from '../lib/utils/logger';

type Options = {
    help: boolean;
    version: boolean;
    logLevel: LogLevel;
    minFetchSize: number;
};

/**
 * Collaborators that tests can replace.
 */
type RunContext = {
    client?: HttpClient;
    logger?: ConsoleLogger;
};

const parseArguments = (args: string[]) => {
    const { values: v, positionals } = parseArgs({
        args,
        strict: true,
        allowPositionals: true,
        options: {
            help: { type: 'boolean', short: 'h', default: false },
            version: { type: 'boolean', short: 'v', default: false },
            debug: { type: 'boolean', short: 'd', default: false },
            quiet: { type: 'boolean', short: 'q', default: false },
            'min-fetch': { type: 'string', short: 'm', default: `${DEFAULT_MIN_FETCH_SIZE}` }
        }
    });

    const parseInteger = (value: string): number => {
        const result = Number(value);
        if (!Number.isInteger(result) || result < 1) {
            throw new Error(`Invalid min-fetch value: ${value}. Must be a positive integer.`);
        }
        return result;
    };

    let logLevel: LogLevel = 'info';
    if (v.quiet) {
        logLevel = 'silent';
    } else if (v.debug) {
        logLevel = 'debug';
    }

    const options: Options = {
        help: v.help ?? false,
        version: v.version ?? false,
        logLevel,
        minFetchSize: parseInteger(v['min-fetch'] ?? `${DEFAULT_MIN_FETCH_SIZE}`)
    };

    return { urls: positionals, options };
};

const usage = `
List the entries of a remote archive without downloading it
============================================================

USAGE
  remote-archive-ls [OPTIONS] <url>

  • The archive type is chosen by the URL's extension.
  • Entry names are printed to stdout, one per line; diagnostics go to stderr.

SUPPORTED ARCHIVES
    .tar   .zip

OPTIONS
    -h, --help                    Show this help and exit
    -v, --version                 Show version and exit
    -d, --debug                   Log every read, seek and cache decision
    -q, --quiet                   Suppress diagnostics
    -m, --min-fetch    <bytes>    Minimum bytes fetched per request. Default: ${DEFAULT_MIN_FETCH_SIZE}

EXAMPLES
    # List a tarball
    remote-archive-ls https://example.com/releases/source.tar

    # List a zip, tracing range requests
    remote-archive-ls -d https://example.com/data/bundle.zip
`;

/**
 * Run the lister against command-line arguments.
 * @param args - Arguments without the node and script paths
 * @param context - Optional transport and logger
 * @returns Process exit code
 */
const run = async (args: string[], context: RunContext = {}): Promise<number> => {
    const logger = context.logger ?? new ConsoleLogger();

    let urls: string[];
    let options: Options;
    try {
        ({ urls, options } = parseArguments(args));
    } catch (err) {
        logger.error(err instanceof Error ? err.message : err);
        logger.error(usage);
        return 1;
    }

    logger.setLevel(options.logLevel);

    if (options.version) {
        logger.output(`remote-archive-ls v${version}`);
        return 0;
    }

    if (options.help) {
        logger.error(usage);
        return 0;
    }

    if (urls.length !== 1) {
        logger.error('Expected a URL as the first argument.');
        logger.error(usage);
        return 1;
    }

    const url = urls[0];

    try {
        const format = getArchiveFormat(url);

        const reader = new RemoteRangeReader(url, {
            client: context.client,
            logger,
            minFetchSize: options.minFetchSize
        });

        for await (const name of listArchive(reader, format, logger)) {
            logger.output(name);
        }

        logger.debug('%d requests, %d bytes fetched, %d cache hits', reader.requestCount, reader.bytesFetched, reader.cacheHits);
    } catch (err) {
        logger.error(err);
        return 1;
    }

    return 0;
};

const main = async () => {
    exit(await run(argv.slice(2)));
};

export { main, run, parseArguments };
