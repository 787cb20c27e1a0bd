import { extname } from 'pathe';

import { type SeekableReader } from './io/read/reader';
import { readTar } from './readers/read-tar';
import { readZip } from './readers/read-zip';
import { type Logger } from './utils/logger';

/**
 * Archive formats that can be listed remotely.
 *
 * - `tar` - decoded sequentially through read/seek
 * - `zip` - decoded from the central directory through size/readAt
 */
type ArchiveFormat = 'tar' | 'zip';

/**
 * Determines the archive format from the extension of a URL's path.
 *
 * @param url - The URL to analyze. Query and fragment are ignored.
 * @returns The detected archive format.
 * @throws Error if the extension is not recognized.
 *
 * @example
 * ```ts
 * const format = getArchiveFormat('https://example.com/files/data.zip?sig=abc');  // returns 'zip'
 * ```
 */
const getArchiveFormat = (url: string): ArchiveFormat => {
    let path: string;
    try {
        path = new URL(url).pathname;
    } catch {
        path = url;
    }

    const extension = extname(path).toLowerCase();
    if (extension === '.tar') {
        return 'tar';
    } else if (extension === '.zip') {
        return 'zip';
    }

    throw new Error(`Unsupported archive type: ${url}. URL does not end in .tar or .zip`);
};

/**
 * Lists the entry names of a remote archive. Tar names are yielded as each
 * header is decoded; zip names once the central directory has loaded.
 *
 * @param source - Seekable view of the archive.
 * @param format - The archive format.
 * @param logger - Optional diagnostics, passed through to the decoder.
 * @yields Entry names in archive order.
 */
async function* listArchive(source: SeekableReader, format: ArchiveFormat, logger?: Logger): AsyncGenerator<string> {
    if (format === 'tar') {
        for await (const entry of readTar(source, logger)) {
            yield entry.name;
        }
        return;
    }

    const entries = await readZip(source, logger);
    for (const entry of entries) {
        yield entry.name;
    }
}

export { getArchiveFormat, listArchive };
export type { ArchiveFormat };
