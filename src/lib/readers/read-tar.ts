import { type Reader, type Seeker, SeekMode, readFull } from '../io/read/reader';
import { type Logger } from '../utils/logger';

const BLOCK_SIZE = 512;

// pax and GNU long-name bodies are read into memory, so cap them
const MAX_METADATA_SIZE = 1024 * 1024;

// links, devices, directories and fifos carry no data whatever the size field says
const HEADER_ONLY_TYPES = new Set(['1', '2', '3', '4', '5', '6']);

/**
 * An entry decoded from a tar header.
 */
type TarEntry = {
    name: string;
    size: number;
    /** Typeflag character, e.g. '0' regular file, '5' directory, '2' symlink. */
    type: string;
};

const decoder = new TextDecoder('utf-8');

/**
 * Decode a NUL-terminated string field.
 * @param field - Raw header bytes
 * @returns The text before the first NUL
 */
const readString = (field: Uint8Array): string => {
    const end = field.indexOf(0);
    return decoder.decode(end < 0 ? field : field.subarray(0, end));
};

/**
 * Decode a numeric header field, octal or (GNU/star) base-256.
 * @param field - Raw header bytes
 * @returns The decoded value
 */
const readNumber = (field: Uint8Array): number => {
    if (field[0] & 0x80) {
        if (field[0] & 0x40) {
            throw new Error('invalid tar header: negative numeric field');
        }
        let value = field[0] & 0x3f;
        for (let i = 1; i < field.length; i++) {
            value = value * 256 + field[i];
        }
        if (!Number.isSafeInteger(value)) {
            throw new Error('invalid tar header: numeric field out of range');
        }
        return value;
    }

    const text = readString(field).trim();
    if (text === '') {
        return 0;
    }
    if (!/^[0-7]+$/.test(text)) {
        throw new Error(`invalid tar header: bad octal field '${text}'`);
    }
    return parseInt(text, 8);
};

/**
 * Check the header checksum. Both the unsigned sum and the historical signed
 * sum are accepted.
 * @param header - A full 512-byte header block
 * @returns True when the stored checksum matches
 */
const verifyChecksum = (header: Uint8Array): boolean => {
    const stored = readNumber(header.subarray(148, 156));

    let unsigned = 0;
    let signed = 0;
    for (let i = 0; i < BLOCK_SIZE; i++) {
        const b = (i >= 148 && i < 156) ? 0x20 : header[i];
        unsigned += b;
        signed += b > 127 ? b - 256 : b;
    }

    return stored === unsigned || stored === signed;
};

const isZeroBlock = (block: Uint8Array) => block.every(b => b === 0);

/**
 * Extract the `path` record from a pax extended header body. Records have the
 * form "<length> <key>=<value>\n" where length counts the whole record in bytes.
 * @param data - The pax header body
 * @returns The path, or undefined if none is recorded
 */
const parsePaxPath = (data: Uint8Array): string | undefined => {
    let path: string | undefined;
    let offset = 0;

    while (offset < data.length) {
        if (data[offset] === 0) break;

        const space = data.indexOf(0x20, offset);
        if (space < 0) {
            throw new Error('invalid tar header: malformed pax record');
        }
        const length = parseInt(decoder.decode(data.subarray(offset, space)), 10);
        if (!Number.isInteger(length) || length <= space - offset || offset + length > data.length) {
            throw new Error('invalid tar header: malformed pax record');
        }

        const record = data.subarray(space + 1, offset + length);
        const equals = record.indexOf(0x3d);
        if (equals < 0 || record[record.length - 1] !== 0x0a) {
            throw new Error('invalid tar header: malformed pax record');
        }

        const key = decoder.decode(record.subarray(0, equals));
        if (key === 'path') {
            path = decoder.decode(record.subarray(equals + 1, record.length - 1));
        }

        offset += length;
    }

    return path;
};

const paddedSize = (size: number) => Math.ceil(size / BLOCK_SIZE) * BLOCK_SIZE;

/**
 * Skip `size` bytes of entry data plus its block padding. The last skipped byte
 * is read so that a truncated archive fails here rather than at the next header.
 * @param source - The stream positioned at the start of the data
 * @param size - Unpadded data size
 */
const skipData = async (source: Reader & Seeker, size: number) => {
    const padded = paddedSize(size);
    if (padded === 0) {
        return;
    }

    source.seek(padded - 1, SeekMode.Current);
    const n = await readFull(source, new Uint8Array(1));
    if (n !== 1) {
        throw new Error('unexpected end of tar archive');
    }
};

/**
 * Read a metadata body (pax or GNU long name) and skip its padding.
 * @param source - The stream positioned at the start of the body
 * @param size - Body size from the header
 * @returns The body bytes
 */
const readMetadata = async (source: Reader & Seeker, size: number): Promise<Uint8Array> => {
    if (size > MAX_METADATA_SIZE) {
        throw new Error(`tar metadata header too large: ${size} bytes`);
    }

    const data = new Uint8Array(size);
    if (await readFull(source, data) !== size) {
        throw new Error('unexpected end of tar archive');
    }

    const padding = paddedSize(size) - size;
    if (padding > 0) {
        source.seek(padding, SeekMode.Current);
    }

    return data;
};

/**
 * Read the next header block.
 * @param source - The stream positioned at a block boundary
 * @returns The block, or null at a clean end of input
 */
const readBlock = async (source: Reader): Promise<Uint8Array | null> => {
    const block = new Uint8Array(BLOCK_SIZE);
    const n = await readFull(source, block);
    if (n === 0) {
        return null;
    }
    if (n !== BLOCK_SIZE) {
        throw new Error('unexpected end of tar archive');
    }
    return block;
};

/**
 * Decode tar entries from a sequential stream. Entry data is never read; it is
 * skipped with relative seeks. Pax and GNU long-name records are folded into
 * the entry they describe.
 * @param source - Stream positioned at the start of the archive
 * @param logger - Optional diagnostics
 * @yields Each entry as its header is decoded
 */
async function* readTar(source: Reader & Seeker, logger?: Logger): AsyncGenerator<TarEntry> {
    let longName: string | undefined;

    while (true) {
        const header = await readBlock(source);
        if (!header) {
            return;
        }

        if (isZeroBlock(header)) {
            // end-of-archive marker is two zero blocks, tolerate a missing second
            const next = await readBlock(source);
            if (!next || isZeroBlock(next)) {
                return;
            }
            throw new Error('invalid tar header: data after zero block');
        }

        if (!verifyChecksum(header)) {
            throw new Error('invalid tar header: checksum mismatch');
        }

        const size = readNumber(header.subarray(124, 136));
        const type = header[156] === 0 ? '0' : String.fromCharCode(header[156]);

        switch (type) {
            case 'L':
                longName = readString(await readMetadata(source, size));
                continue;
            case 'x':
                longName = parsePaxPath(await readMetadata(source, size)) ?? longName;
                continue;
            case 'g':
            case 'K':
                await readMetadata(source, size);
                continue;
        }

        let name = readString(header.subarray(0, 100));
        const magic = readString(header.subarray(257, 263));
        if (magic === 'ustar') {
            const prefix = readString(header.subarray(345, 500));
            if (prefix) {
                name = `${prefix}/${name}`;
            }
        }
        if (longName !== undefined) {
            name = longName;
            longName = undefined;
        }

        logger?.debug('tar entry %s type %s size %d', name, type, size);

        yield { name, size, type };

        if (!HEADER_ONLY_TYPES.has(type)) {
            await skipData(source, size);
        }
    }
}

export { readTar };
export type { TarEntry };
