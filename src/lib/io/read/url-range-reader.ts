import { type Logger } from '../../utils/logger';
import { ContentLengthError, EndOfDataError, InvalidArgumentError, NotImplementedError } from './errors';
import { FetchHttpClient, type HttpClient } from './http-client';
import { type SeekableReader, SeekMode } from './reader';

/** Smallest span fetched per request. Small reads are widened to this. */
const DEFAULT_MIN_FETCH_SIZE = 1024 * 1024;

/**
 * Options for {@link RemoteRangeReader}.
 */
type RemoteRangeReaderOptions = {
    /** Transport for HTTP exchanges. Defaults to fetch on first request. */
    client?: HttpClient;
    /** Optional diagnostics. Never affects read results. */
    logger?: Logger;
    /** Minimum bytes requested per range fetch. Default: 1 MiB */
    minFetchSize?: number;
};

/**
 * Format an inclusive HTTP byte range covering `length` bytes from `from`.
 * @param from - First byte offset
 * @param length - Number of bytes
 * @returns Range header value
 */
const formatRange = (from: number, length: number): string => {
    const to = length === 0 ? from : from + length - 1;
    return `bytes=${from}-${to}`;
};

/**
 * Presents a remote HTTP(S) resource as a seekable file. Every read is served
 * either from the most recent fetch or by exactly one ranged GET, which then
 * replaces the cached span wholesale.
 *
 * Not safe for overlapping calls: the cursor and cache are unsynchronized, so
 * concurrent consumers need one reader each.
 */
class RemoteRangeReader implements SeekableReader {
    readonly target: string;

    private url: URL | null = null;
    private client: HttpClient | null;
    private logger: Logger | undefined;
    private minFetchSize: number;
    private cursor: number = 0;

    // most recent fetch
    private cache: Uint8Array | null = null;
    private cacheStart: number = 0;

    private requests: number = 0;
    private fetched: number = 0;
    private hits: number = 0;

    /**
     * @param target - Absolute URL of the resource
     * @param options - Transport, logger and fetch size
     */
    constructor(target: string, options: RemoteRangeReaderOptions = {}) {
        const minFetchSize = options.minFetchSize ?? DEFAULT_MIN_FETCH_SIZE;
        if (!Number.isSafeInteger(minFetchSize) || minFetchSize < 1) {
            throw new InvalidArgumentError(`Invalid minimum fetch size: ${minFetchSize}`);
        }

        this.target = target;
        this.client = options.client ?? null;
        this.logger = options.logger;
        this.minFetchSize = minFetchSize;
    }

    /** HTTP requests issued so far, GET and HEAD. */
    get requestCount(): number {
        return this.requests;
    }

    /** Response body bytes loaded into the cache so far. */
    get bytesFetched(): number {
        return this.fetched;
    }

    /** Reads served without a request. */
    get cacheHits(): number {
        return this.hits;
    }

    /** Current cursor position used by {@link read}. */
    get position(): number {
        return this.cursor;
    }

    /**
     * Replace the transport. Takes effect on the next request.
     * @param client - The HTTP client to use
     */
    setClient(client: HttpClient) {
        this.client = client;
    }

    /**
     * Replace the diagnostic sink.
     * @param logger - The logger to use, or undefined for none
     */
    setLogger(logger: Logger | undefined) {
        this.logger = logger;
    }

    async readAt(target: Uint8Array, offset: number): Promise<number> {
        this.logger?.debug('readAt length %d offset %d', target.length, offset);

        if (!Number.isSafeInteger(offset)) {
            throw new InvalidArgumentError(`Invalid read offset: ${offset}`);
        }

        if (offset < 0) {
            throw new EndOfDataError(`Negative read offset ${offset}`);
        }

        const cache = this.cache;
        if (cache) {
            const cacheEnd = this.cacheStart + cache.length;
            const end = offset + target.length;
            if (offset >= this.cacheStart && end <= cacheEnd) {
                this.logger?.debug('cache hit: range (%d-%d) is within cache (%d-%d)', offset, end, this.cacheStart, cacheEnd);
                const start = offset - this.cacheStart;
                target.set(cache.subarray(start, start + target.length));
                this.hits++;
                return target.length;
            }
            this.logger?.debug('cache miss: range (%d-%d) is not within cache (%d-%d)', offset, end, this.cacheStart, cacheEnd);
        } else {
            this.logger?.debug('cache miss: cache empty');
        }

        const wanted = Math.max(target.length, this.minFetchSize);
        const range = formatRange(offset, wanted);
        const request = new Request(this.getUrl(), {
            method: 'GET',
            headers: { Range: range }
        });

        // the old span is gone whatever the outcome
        this.cache = null;

        this.logger?.info('Start HTTP GET with Range: %s', range);
        const response = await this.send(request);
        this.logger?.info('Response status: %d', response.status);

        if (response.status !== 200 && response.status !== 206) {
            await response.body?.cancel();
            throw new EndOfDataError(`HTTP ${response.status} for range ${range}`);
        }

        const data = new Uint8Array(await response.arrayBuffer());
        this.logger?.debug('loaded %d bytes into cache', data.length);

        this.cache = data;
        this.cacheStart = offset;
        this.fetched += data.length;

        // a body shorter than the target means the resource ends here
        const n = Math.min(data.length, target.length);
        target.set(data.subarray(0, n));
        return n;
    }

    async read(target: Uint8Array): Promise<number> {
        this.logger?.debug('read length %d', target.length);

        const n = await this.readAt(target, this.cursor);
        this.cursor += n;
        return n;
    }

    seek(offset: number, whence: number): number {
        this.logger?.debug('seek %d %d', offset, whence);

        if (!Number.isSafeInteger(offset)) {
            throw new InvalidArgumentError(`Invalid seek offset: ${offset}`);
        }

        switch (whence) {
            case SeekMode.Start:
                this.cursor = offset;
                break;
            case SeekMode.Current: {
                const position = this.cursor + offset;
                if (!Number.isSafeInteger(position)) {
                    throw new InvalidArgumentError(`Seek to ${this.cursor} + ${offset} is out of range`);
                }
                this.cursor = position;
                break;
            }
            case SeekMode.End:
                throw new NotImplementedError('Seek relative to end is not implemented; use size() and seek from start');
            default:
                throw new InvalidArgumentError(`Invalid seek mode: ${whence}`);
        }

        return this.cursor;
    }

    /**
     * Find the total size of the resource with a HEAD request.
     * @returns The Content-Length reported by the server
     */
    async size(): Promise<number> {
        const request = new Request(this.getUrl(), { method: 'HEAD' });

        const response = await this.send(request);
        await response.body?.cancel();

        const header = response.headers.get('Content-Length');
        const length = header !== null && /^\s*\d+\s*$/.test(header) ? Number(header) : -1;
        if (length < 0 || !Number.isSafeInteger(length)) {
            throw new ContentLengthError(`No content length for ${request.url}`);
        }

        this.logger?.debug('url: %s, size %d', request.url, length);
        return length;
    }

    private getUrl(): URL {
        if (!this.url) {
            this.url = new URL(this.target);
        }
        return this.url;
    }

    private send(request: Request): Promise<Response> {
        if (!this.client) {
            this.client = new FetchHttpClient();
        }
        this.requests++;
        return this.client.send(request);
    }
}

export { RemoteRangeReader, DEFAULT_MIN_FETCH_SIZE, formatRange };
export type { RemoteRangeReaderOptions };
