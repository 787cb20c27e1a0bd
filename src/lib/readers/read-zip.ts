import { type ReaderAt, type Sized, readExactAt } from '../io/read/reader';
import { type Logger } from '../utils/logger';

/**
 * Metadata for a zip file entry.
 */
type ZipEntry = {
    name: string;
    compressedSize: number;
    uncompressedSize: number;
    offset: number;        // Local header offset
    method: number;        // 0=store, 8=deflate
};

const EOCD_SIGNATURE = 0x06054b50;
const EOCD_SIZE = 22;
const MAX_COMMENT_SIZE = 65535;
const ZIP64_LOCATOR_SIGNATURE = 0x07064b50;
const ZIP64_LOCATOR_SIZE = 20;
const ZIP64_EOCD_SIGNATURE = 0x06064b50;
const ZIP64_EOCD_SIZE = 56;
const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const CENTRAL_HEADER_SIZE = 46;
const ZIP64_EXTRA_ID = 0x0001;

/**
 * Location of the central directory.
 */
type Directory = {
    entryCount: number;
    size: number;
    offset: number;
};

const getUint64 = (view: DataView, offset: number): number => {
    const value = view.getBigUint64(offset, true);
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new Error('Zip64 value out of range');
    }
    return Number(value);
};

/**
 * Scan backwards for the End of Central Directory signature.
 * @param data - Tail of the archive
 * @returns Offset of the record within data, or -1
 */
const findEocd = (data: Uint8Array): number => {
    for (let i = data.length - EOCD_SIZE; i >= 0; i--) {
        if (data[i] === 0x50 &&
            data[i + 1] === 0x4b &&
            data[i + 2] === 0x05 &&
            data[i + 3] === 0x06) {
            return i;
        }
    }
    return -1;
};

/**
 * Read the ZIP64 end of central directory through its locator.
 * @param source - The archive
 * @param locatorOffset - Absolute offset where a ZIP64 locator would sit
 * @returns The directory location, or null when no locator is present
 */
const readZip64Directory = async (source: ReaderAt, locatorOffset: number): Promise<Directory | null> => {
    const locator = await readExactAt(source, locatorOffset, ZIP64_LOCATOR_SIZE);
    const locatorView = new DataView(locator.buffer, locator.byteOffset, locator.byteLength);
    if (locatorView.getUint32(0, true) !== ZIP64_LOCATOR_SIGNATURE) {
        return null;
    }

    const eocdOffset = getUint64(locatorView, 8);
    const eocd = await readExactAt(source, eocdOffset, ZIP64_EOCD_SIZE);
    const view = new DataView(eocd.buffer, eocd.byteOffset, eocd.byteLength);
    if (view.getUint32(0, true) !== ZIP64_EOCD_SIGNATURE) {
        throw new Error('Invalid zip64 end of central directory record');
    }

    return {
        entryCount: getUint64(view, 32),
        size: getUint64(view, 40),
        offset: getUint64(view, 48)
    };
};

/**
 * Locate the central directory from the archive trailer.
 * @param source - The archive
 * @param size - Archive size in bytes
 * @returns The directory location
 */
const readDirectory = async (source: ReaderAt, size: number): Promise<Directory> => {
    // Read the tail to find the End of Central Directory record
    const searchSize = Math.min(MAX_COMMENT_SIZE + EOCD_SIZE, size);
    const tailOffset = size - searchSize;
    const tail = new Uint8Array(searchSize);
    const n = await source.readAt(tail, tailOffset);

    const eocdOffset = findEocd(tail.subarray(0, n));
    if (eocdOffset < 0) {
        throw new Error('End of central directory not found - invalid zip file');
    }

    const eocdView = new DataView(tail.buffer, tail.byteOffset + eocdOffset, EOCD_SIZE);
    const directory = {
        entryCount: eocdView.getUint16(10, true),
        size: eocdView.getUint32(12, true),
        offset: eocdView.getUint32(16, true)
    };

    const saturated = directory.entryCount === 0xffff ||
        directory.size === 0xffffffff ||
        directory.offset === 0xffffffff;
    const locatorOffset = tailOffset + eocdOffset - ZIP64_LOCATOR_SIZE;
    if (saturated && locatorOffset >= 0) {
        // saturated values are legal 32-bit values unless a ZIP64 locator is present
        const zip64 = await readZip64Directory(source, locatorOffset);
        if (zip64) {
            return zip64;
        }
    }

    return directory;
};

/**
 * Apply the ZIP64 extended information extra field to saturated values.
 * @param extra - The entry's extra field block
 * @param entry - Entry with 32-bit values, updated in place
 */
const applyZip64Extra = (extra: Uint8Array, entry: ZipEntry) => {
    const view = new DataView(extra.buffer, extra.byteOffset, extra.byteLength);
    let offset = 0;

    while (offset + 4 <= extra.length) {
        const id = view.getUint16(offset, true);
        const length = view.getUint16(offset + 2, true);
        const end = offset + 4 + length;
        if (end > extra.length) break;

        if (id === ZIP64_EXTRA_ID) {
            // values appear only for the fields that are saturated, in this order
            let field = offset + 4;
            const next = () => {
                if (field + 8 > end) {
                    throw new Error('Truncated zip64 extra field');
                }
                const value = getUint64(view, field);
                field += 8;
                return value;
            };

            if (entry.uncompressedSize === 0xffffffff) entry.uncompressedSize = next();
            if (entry.compressedSize === 0xffffffff) entry.compressedSize = next();
            if (entry.offset === 0xffffffff) entry.offset = next();
            return;
        }

        offset = end;
    }
};

/**
 * Read the entry list of a zip archive from its central directory. Only the
 * trailer and the directory are fetched; entry data is never touched.
 * @param source - Random-access view of the archive
 * @param logger - Optional diagnostics
 * @returns Entries in directory order
 */
const readZip = async (source: ReaderAt & Sized, logger?: Logger): Promise<ZipEntry[]> => {
    const size = await source.size();
    const directory = await readDirectory(source, size);

    logger?.debug('zip directory: %d entries, %d bytes at offset %d', directory.entryCount, directory.size, directory.offset);

    const cdData = await readExactAt(source, directory.offset, directory.size);

    const entries: ZipEntry[] = [];
    let offset = 0;

    for (let i = 0; i < directory.entryCount; i++) {
        if (offset + CENTRAL_HEADER_SIZE > cdData.length) {
            throw new Error('Truncated central directory');
        }

        const cdView = new DataView(cdData.buffer, cdData.byteOffset + offset);
        const sig = cdView.getUint32(0, true);

        if (sig !== CENTRAL_HEADER_SIGNATURE) {
            throw new Error('Invalid central directory entry signature');
        }

        const gpFlags = cdView.getUint16(8, true);
        const method = cdView.getUint16(10, true);
        const compressedSize = cdView.getUint32(20, true);
        const uncompressedSize = cdView.getUint32(24, true);
        const nameLen = cdView.getUint16(28, true);
        const extraLen = cdView.getUint16(30, true);
        const commentLen = cdView.getUint16(32, true);
        const localHeaderOffset = cdView.getUint32(42, true);

        const nameStart = offset + CENTRAL_HEADER_SIZE;
        const extraStart = nameStart + nameLen;
        const recordEnd = extraStart + extraLen + commentLen;
        if (recordEnd > cdData.length) {
            throw new Error('Truncated central directory');
        }

        const nameBytes = cdData.subarray(nameStart, extraStart);
        const utf8 = (gpFlags & 0x800) !== 0;
        const name = new TextDecoder(utf8 ? 'utf-8' : 'ascii').decode(nameBytes);

        const entry: ZipEntry = {
            name,
            compressedSize,
            uncompressedSize,
            offset: localHeaderOffset,
            method
        };
        applyZip64Extra(cdData.subarray(extraStart, extraStart + extraLen), entry);
        entries.push(entry);

        offset = recordEnd;
    }

    return entries;
};

export { readZip };
export type { ZipEntry };
