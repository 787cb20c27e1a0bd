import { EndOfDataError } from './errors';

/**
 * Origins accepted by {@link Seeker.seek}.
 */
const SeekMode = {
    /** Offset is absolute. */
    Start: 0,
    /** Offset is relative to the current cursor. */
    Current: 1,
    /** Offset is relative to the end of the resource. */
    End: 2
} as const;

/**
 * Cursor-relative reads. Resolves to the number of bytes copied into the
 * target; 0 means nothing is left.
 */
interface Reader {
    read(target: Uint8Array): Promise<number>;
}

/**
 * Positioned reads that leave any cursor untouched.
 */
interface ReaderAt {
    /**
     * Copy bytes starting at `offset` into `target`.
     * @param target - Buffer to fill
     * @param offset - Absolute byte offset in the resource
     * @returns Number of bytes copied, fewer than `target.length` only when the
     * resource has no more
     */
    readAt(target: Uint8Array, offset: number): Promise<number>;
}

interface Seeker {
    /**
     * Move the cursor used by {@link Reader.read}.
     * @param offset - Distance to move
     * @param whence - One of the {@link SeekMode} values
     * @returns The new cursor position
     */
    seek(offset: number, whence: number): number;
}

interface Sized {
    /**
     * Total size of the resource in bytes.
     */
    size(): Promise<number>;
}

/**
 * Everything an archive decoder may ask of a remote resource.
 */
type SeekableReader = Reader & ReaderAt & Seeker & Sized;

/**
 * Read from the cursor until the target is full or the reader runs dry.
 * An end-of-data signal from the reader ends the loop like a zero-length read.
 * @param reader - The reader to pull from
 * @param target - Buffer to fill
 * @returns Bytes read, less than `target.length` only at the end of the resource
 */
const readFull = async (reader: Reader, target: Uint8Array): Promise<number> => {
    let length = 0;

    while (length < target.length) {
        let n: number;
        try {
            n = await reader.read(target.subarray(length));
        } catch (err) {
            if (err instanceof EndOfDataError) {
                break;
            }
            throw err;
        }
        if (n === 0) break;
        length += n;
    }

    return length;
};

/**
 * Read exactly `length` bytes at `offset`, failing on a short read.
 * @param reader - The reader to read from
 * @param offset - Absolute byte offset
 * @param length - Number of bytes required
 * @returns The bytes read
 */
const readExactAt = async (reader: ReaderAt, offset: number, length: number): Promise<Uint8Array> => {
    const data = new Uint8Array(length);
    const n = await reader.readAt(data, offset);
    if (n !== length) {
        throw new Error(`Read only ${n} bytes at offset ${offset}, expected ${length}`);
    }
    return data;
};

export { SeekMode, readFull, readExactAt };
export type { Reader, ReaderAt, Seeker, Sized, SeekableReader };
