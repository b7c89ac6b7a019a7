/**
 * Abstract base class for streaming data from a source.
 * Uses a pull-based model where the consumer provides the buffer.
 * @ignore
 */
abstract class ReadStream {
    /**
     * Size hint for buffer pre-allocation in readAll().
     * May be undefined if size is unknown.
     */
    readonly expectedSize: number | undefined;

    /**
     * Total bytes read from this stream so far.
     */
    bytesRead: number = 0;

    /**
     * @param expectedSize - Optional size hint for buffer pre-allocation
     */
    constructor(expectedSize?: number) {
        this.expectedSize = expectedSize;
    }

    /**
     * Pull data into the provided buffer.
     * @param target - Buffer to fill with data
     * @returns Number of bytes read, or 0 for EOF
     */
    abstract pull(target: Uint8Array): Promise<number>;

    /**
     * Read entire stream into a single buffer.
     * Uses expectedSize hint if available, grows dynamically if needed.
     * @returns Complete data as Uint8Array
     */
    async readAll(): Promise<Uint8Array> {
        // one spare byte so a stream of exactly expectedSize bytes hits EOF without growing
        let buffer = new Uint8Array(this.expectedSize !== undefined ? this.expectedSize + 1 : 65536);
        let length = 0;

        while (true) {
            if (length >= buffer.length) {
                const newBuffer = new Uint8Array(buffer.length * 2);
                newBuffer.set(buffer);
                buffer = newBuffer;
            }

            const n = await this.pull(buffer.subarray(length));
            if (n === 0) break;
            length += n;
        }

        return buffer.subarray(0, length);
    }

    /**
     * Release resources and abort any pending operations.
     */
    close(): void {
        // Base implementation does nothing - subclasses can override
    }
}

/**
 * A fetched file. Provides size information and creates streams for reading.
 * @ignore
 */
interface ReadSource {
    /**
     * The size of the file in bytes, or undefined if unknown.
     * When defined, a full read yields exactly this many bytes.
     */
    readonly size: number | undefined;

    /**
     * Whether range reads are supported.
     * If false, read() must be called with no arguments or start=0.
     */
    readonly seekable: boolean;

    /**
     * Create a stream for reading data, optionally with a byte range.
     * @param start - Starting byte offset (inclusive), defaults to 0
     * @param end - Ending byte offset (exclusive), defaults to size/EOF
     * @returns A ReadStream for pulling data
     * @throws Error if range requested on non-seekable source
     */
    read(start?: number, end?: number): ReadStream;

    /**
     * Release any resources held by this source.
     */
    close(): void;
}

/**
 * A read-only file system addressed by logical path.
 * Implementations exist for local folders, tar archives, memory and URLs.
 *
 * Both methods expect an already resolved logical path and throw
 * DataSourceError for failures.
 */
interface ReadFileSystem {
    /**
     * Create a readable source for the given path.
     * @param filename - Logical path of the file
     * @returns Promise resolving to a ReadSource
     */
    createSource(filename: string): Promise<ReadSource>;

    /**
     * Check whether a file exists, without reading its contents where the backend allows.
     * @param filename - Logical path of the file
     */
    exists(filename: string): Promise<boolean>;
}

/**
 * Expose a ReadStream as a web ReadableStream. The ReadStream is closed on EOF,
 * on error and when the consumer cancels, after which onClose runs once.
 * @param stream - Stream to pull from
 * @param chunkSize - Bytes requested per pull
 * @param onClose - Called once the stream has been closed
 * @returns A byte ReadableStream
 */
const toReadableStream = (stream: ReadStream, chunkSize: number = 65536, onClose?: () => void): ReadableStream<Uint8Array> => {
    let closed = false;
    const close = () => {
        if (closed) return;
        closed = true;
        stream.close();
        onClose?.();
    };

    return new ReadableStream<Uint8Array>({
        async pull(controller) {
            const chunk = new Uint8Array(chunkSize);
            let n: number;
            try {
                n = await stream.pull(chunk);
            } catch (err) {
                close();
                throw err;
            }

            if (n === 0) {
                close();
                controller.close();
            } else {
                controller.enqueue(chunk.subarray(0, n));
            }
        },

        cancel() {
            close();
        }
    });
};

export { ReadStream, type ReadSource, type ReadFileSystem, toReadableStream };
