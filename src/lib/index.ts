// Remote seekable reader
export { RemoteRangeReader, DEFAULT_MIN_FETCH_SIZE, formatRange } from './io/read/url-range-reader';
export type { RemoteRangeReaderOptions } from './io/read/url-range-reader';
export { FetchHttpClient } from './io/read/http-client';
export type { HttpClient } from './io/read/http-client';

// Capability interfaces and errors
export { SeekMode, readFull, readExactAt } from './io/read/reader';
export type { Reader, ReaderAt, Seeker, Sized, SeekableReader } from './io/read/reader';
export { EndOfDataError, NotImplementedError, InvalidArgumentError, ContentLengthError } from './io/read/errors';

// Archive listing
export { getArchiveFormat, listArchive } from './list';
export type { ArchiveFormat } from './list';
export { readTar } from './readers/read-tar';
export type { TarEntry } from './readers/read-tar';
export { readZip } from './readers/read-zip';
export type { ZipEntry } from './readers/read-zip';

// Logger
export { ConsoleLogger } from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';
