import { DataSourceError } from '../../errors';
import { type ReadFileSystem, type ReadSource, ReadStream } from './file-system';

/**
 * ReadStream implementation for reading from memory buffers.
 */
class MemoryReadStream extends ReadStream {
    private data: Uint8Array;
    private offset: number;
    private end: number;

    constructor(data: Uint8Array, start: number, end: number) {
        super(end - start);
        this.data = data;
        this.offset = start;
        this.end = end;
    }

    pull(target: Uint8Array): Promise<number> {
        const remaining = this.end - this.offset;
        if (remaining <= 0) {
            return Promise.resolve(0);
        }

        const bytesToCopy = Math.min(target.length, remaining);
        target.set(this.data.subarray(this.offset, this.offset + bytesToCopy));
        this.offset += bytesToCopy;
        this.bytesRead += bytesToCopy;
        return Promise.resolve(bytesToCopy);
    }
}

/**
 * ReadSource implementation wrapping a Uint8Array or ArrayBuffer.
 * Size is always exact. Always seekable.
 */
class MemoryReadSource implements ReadSource {
    readonly size: number;
    readonly seekable: boolean = true;

    private data: Uint8Array;
    private closed: boolean = false;

    constructor(data: Uint8Array | ArrayBuffer) {
        this.data = data instanceof ArrayBuffer ? new Uint8Array(data) : data;
        this.size = this.data.length;
    }

    read(start: number = 0, end: number = this.size): ReadStream {
        if (this.closed) {
            throw new Error('Source has been closed');
        }

        // Clamp range to valid bounds
        const clampedStart = Math.max(0, Math.min(start, this.size));
        const clampedEnd = Math.max(clampedStart, Math.min(end, this.size));

        return new MemoryReadStream(this.data, clampedStart, clampedEnd);
    }

    close(): void {
        this.closed = true;
    }
}

type MemoryEntries = Map<string, Uint8Array | string> | Record<string, Uint8Array | string>;

const encoder = new TextEncoder();

/**
 * ReadFileSystem over a table of logical paths to buffers.
 * Lookup is by exact key; there is no prefix or directory matching.
 * The table is copied at construction and never changes afterwards.
 */
class MemoryReadFileSystem implements ReadFileSystem {
    readonly kind = 'memory';

    private buffers: ReadonlyMap<string, Uint8Array>;

    /**
     * @param entries - Logical paths and their contents; strings are stored as UTF-8
     */
    constructor(entries: MemoryEntries = {}) {
        const pairs = entries instanceof Map ? Array.from(entries) : Object.entries(entries);
        this.buffers = new Map(pairs.map(([name, data]) => {
            return [name, typeof data === 'string' ? encoder.encode(data) : data.slice()];
        }));
    }

    /**
     * Get a copy of a stored buffer by name.
     * @param name - Logical path of the buffer
     * @returns The stored data or undefined
     */
    get(name: string): Uint8Array | undefined {
        return this.buffers.get(name)?.slice();
    }

    /**
     * @returns Logical paths of all stored buffers
     */
    keys(): string[] {
        return Array.from(this.buffers.keys());
    }

    exists(filename: string): Promise<boolean> {
        return Promise.resolve(this.buffers.has(filename));
    }

    createSource(filename: string): Promise<ReadSource> {
        const data = this.buffers.get(filename);
        if (!data) {
            return Promise.reject(new DataSourceError('not-found', filename, `Entry not found: ${filename}`));
        }

        return Promise.resolve(new MemoryReadSource(data));
    }
}

export { MemoryReadFileSystem, MemoryReadSource, type MemoryEntries };
