import { createGzipDecoder, createTarDecoder } from 'modern-tar';

import { DataSourceError, toDataSourceError } from '../../errors';
import { logger } from '../../utils/logger';
import { entryPath } from '../../utils/path';
import { type ReadFileSystem, type ReadSource, ReadStream, toReadableStream } from './file-system';
import { WebReadStream } from './web-read-stream';

/**
 * Metadata for a tar file entry.
 */
type TarEntry = {
    /** Logical path derived from the stored name. */
    name: string;
    size: number;
    /** Position of the entry in the container. */
    index: number;
};

type TarReadFileSystemOptions = {
    /** Container is gzip-compressed (.tar.gz / .tgz). */
    compressed?: boolean;

    /**
     * Build an index of the container on first use. Lookups for absent names
     * and exists() then skip the scan. When false every lookup scans.
     * Default: true
     */
    indexed?: boolean;
};

type DecodedEntry = {
    header: { name: string; size: number; type?: string };
    body: ReadableStream<Uint8Array>;
};

/**
 * ReadSource for a single tar entry found by a scan.
 * The entry body can only be consumed once and only from the start, since the
 * container is read sequentially.
 */
class TarEntrySource implements ReadSource {
    readonly size: number;
    readonly seekable: boolean = false;

    private body: ReadableStream<Uint8Array> | null;
    private release: () => void;

    constructor(body: ReadableStream<Uint8Array>, size: number, release: () => void) {
        this.body = body;
        this.size = size;
        this.release = release;
    }

    read(start?: number, end?: number): ReadStream {
        if ((start !== undefined && start !== 0) || (end !== undefined && end !== this.size)) {
            throw new Error('Range reads not supported on tar entries');
        }
        if (!this.body) {
            throw new Error('Tar entry has already been read');
        }

        const stream = new WebReadStream(this.body, this.size);
        this.body = null;
        return stream;
    }

    close(): void {
        this.body = null;
        this.release();
    }
}

/**
 * Virtual filesystem for reading files from a tar archive.
 * Wraps any ReadSource; each lookup opens an independent stream over the
 * container, so concurrent reads do not interfere.
 */
class TarReadFileSystem implements ReadFileSystem {
    readonly kind = 'archive';

    readonly compressed: boolean;
    readonly indexed: boolean;

    private source: ReadSource;
    private parsePromise: Promise<Map<string, TarEntry>> | null = null;
    private closed: boolean = false;

    /**
     * @param source - The container
     * @param options - Compression and indexing options
     */
    constructor(source: ReadSource, options: TarReadFileSystemOptions = {}) {
        this.source = source;
        this.compressed = options.compressed ?? false;
        this.indexed = options.indexed ?? true;
    }

    /**
     * Open a decoding pass over the whole container.
     * @returns The entry reader and a function that stops the pass
     */
    private open(): { reader: ReadableStreamDefaultReader<DecodedEntry>; release: () => void } {
        if (this.closed) {
            throw new Error('Source has been closed');
        }

        const container = this.source.read();
        const abort = new AbortController();

        // stop only the bytes feeding the first decoder; Node 20 transform
        // streams throw when cancelled mid-stream
        const bytes = toReadableStream(container);
        const options = { signal: abort.signal, preventAbort: true };
        const entries = this.compressed ?
            bytes.pipeThrough(createGzipDecoder(), options).pipeThrough(createTarDecoder()) :
            bytes.pipeThrough(createTarDecoder(), options);

        return {
            reader: entries.getReader(),
            release: () => {
                try {
                    abort.abort();
                    container.close();
                } catch (err) {
                    logger.warn('failed to release tar scan:', err);
                }
            }
        };
    }

    /**
     * Read the container front to back, calling visit for every file entry.
     * Entry bodies are discarded until visit returns true, which stops the scan
     * with the decoder positioned on that entry.
     * @param filename - Logical path being looked up, for error reporting
     * @param visit - Called with each file entry, its logical path and position
     * @returns The matching entry and a function releasing the scan, or undefined if the container was exhausted
     */
    private async scan(filename: string, visit: (entry: DecodedEntry, name: string, index: number) => boolean): Promise<{ entry: DecodedEntry; release: () => void } | undefined> {
        const { reader, release } = this.open();
        let index = 0;

        try {
            while (true) {
                const { done, value } = await reader.read();
                if (done) {
                    return undefined;
                }

                const name = entryPath(value.header.name);
                const isFile = value.header.type !== 'directory' && !value.header.name.endsWith('/');

                if (isFile && name !== undefined && visit(value, name, index++)) {
                    return { entry: value, release };
                }

                await value.body.cancel();
            }
        } catch (err) {
            release();
            throw toDataSourceError(err, filename, 'decode');
        }
    }

    /**
     * Scan the container and record every file entry.
     * @returns Map of logical paths to entry metadata
     */
    private async parseDirectory(): Promise<Map<string, TarEntry>> {
        const entries = new Map<string, TarEntry>();

        await this.scan('', (entry, name, index) => {
            // later entries replace earlier ones, matching tar extraction
            entries.set(name, { name, size: entry.header.size, index });
            return false;
        });

        logger.debug(`indexed ${entries.size} tar entries`);
        return entries;
    }

    /**
     * The index, built at most once. Concurrent callers share the pending build.
     * A failed build is forgotten so a later call can retry.
     * @returns Map of logical paths to entry metadata
     */
    private index(): Promise<Map<string, TarEntry>> {
        if (!this.parsePromise) {
            this.parsePromise = this.parseDirectory();
            this.parsePromise.catch(() => {
                this.parsePromise = null;
            });
        }
        return this.parsePromise;
    }

    async exists(filename: string): Promise<boolean> {
        if (this.indexed) {
            return (await this.index()).has(filename);
        }

        const match = await this.scan(filename, (_entry, name) => name === filename);
        match?.release();
        return match !== undefined;
    }

    async createSource(filename: string): Promise<ReadSource> {
        let target: TarEntry | undefined;
        if (this.indexed) {
            target = (await this.index()).get(filename);
            if (!target) {
                throw new DataSourceError('not-found', filename, `Entry not found: ${filename}`);
            }
        }

        // with duplicate names the index points at the last copy
        const match = await this.scan(filename, (_entry, name, index) => {
            return target ? index === target.index : name === filename;
        });

        if (!match) {
            throw new DataSourceError('not-found', filename, `Entry not found: ${filename}`);
        }

        const { entry, release } = match;

        return new TarEntrySource(entry.body, entry.header.size, release);
    }

    /**
     * List all file entries in the container, in storage order.
     * @returns Array of logical paths
     */
    async list(): Promise<string[]> {
        if (this.indexed) {
            const entries = await this.index();
            return Array.from(entries.values()).sort((a, b) => a.index - b.index).map(entry => entry.name);
        }

        const names: string[] = [];
        await this.scan('', (_entry, name) => {
            names.push(name);
            return false;
        });
        return names;
    }

    /**
     * Close the archive filesystem and underlying source.
     */
    close(): void {
        this.closed = true;
        this.source.close();
    }
}

export { TarReadFileSystem, type TarEntry, type TarReadFileSystemOptions };
