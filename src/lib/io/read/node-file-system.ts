import { type FileHandle, open, stat } from 'node:fs/promises';
import { resolve } from 'node:path';

import { DataSourceError } from '../../errors';
import { logger } from '../../utils/logger';
import { type ReadFileSystem, type ReadSource, ReadStream } from './file-system';

/**
 * ReadStream implementation for reading from Node.js file handles.
 */
class NodeReadStream extends ReadStream {
    private fileHandle: FileHandle;
    private position: number;
    private end: number;
    private closed: boolean = false;

    constructor(fileHandle: FileHandle, start: number, end: number) {
        super(end - start);
        this.fileHandle = fileHandle;
        this.position = start;
        this.end = end;
    }

    async pull(target: Uint8Array): Promise<number> {
        if (this.closed) {
            return 0;
        }

        const remaining = this.end - this.position;
        if (remaining <= 0) {
            return 0;
        }

        const bytesToRead = Math.min(target.length, remaining);
        const { bytesRead } = await this.fileHandle.read(target, 0, bytesToRead, this.position);

        this.position += bytesRead;
        this.bytesRead += bytesRead;
        return bytesRead;
    }

    override close(): void {
        this.closed = true;
    }
}

/**
 * ReadSource implementation for Node.js file handles.
 * Size is exact from stat(). Always seekable via positioned reads.
 * The handle stays open until close(); streams created from it share it.
 */
class NodeReadSource implements ReadSource {
    readonly size: number;
    readonly seekable: boolean = true;

    /** Absolute path of the opened file. */
    readonly filename: string;

    private fileHandle: FileHandle;
    private closed: boolean = false;

    constructor(fileHandle: FileHandle, size: number, filename: string) {
        this.fileHandle = fileHandle;
        this.size = size;
        this.filename = filename;
    }

    read(start: number = 0, end: number = this.size): ReadStream {
        if (this.closed) {
            throw new Error('Source has been closed');
        }

        // Clamp range to valid bounds
        const clampedStart = Math.max(0, Math.min(start, this.size));
        const clampedEnd = Math.max(clampedStart, Math.min(end, this.size));

        return new NodeReadStream(this.fileHandle, clampedStart, clampedEnd);
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.fileHandle.close().catch((err: unknown) => {
            logger.warn(`failed to close '${this.filename}':`, err);
        });
    }
}

const isMissing = (err: unknown) => {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    return code === 'ENOENT' || code === 'ENOTDIR';
};

/**
 * Open a single file by absolute or working-directory relative path.
 * Used for archives given on the command line.
 * @param filename - Path of the file
 * @returns A seekable source over the file
 */
const openFileSource = async (filename: string): Promise<NodeReadSource> => {
    const pathname = resolve(filename);
    try {
        const fileStats = await stat(pathname);
        const fileHandle = await open(pathname, 'r');
        return new NodeReadSource(fileHandle, fileStats.size, pathname);
    } catch (err) {
        const kind = isMissing(err) ? 'not-found' : 'io';
        throw new DataSourceError(kind, filename, `Cannot open '${filename}'`, { cause: err });
    }
};

/**
 * ReadFileSystem over an ordered list of local directories.
 * Each lookup tries the directories in order; the first one holding a regular
 * file at the logical path wins.
 */
class NodeReadFileSystem implements ReadFileSystem {
    readonly kind = 'file-system';

    /** Absolute search roots, in lookup order. */
    readonly searchPaths: readonly string[];

    /**
     * @param searchPaths - Directories to search, relative ones resolved against the working directory
     * @param options - Set includeWorkingDir to append the working directory as a last root
     */
    constructor(searchPaths: string[], options: { includeWorkingDir?: boolean } = {}) {
        const roots = searchPaths.map(path => resolve(path));
        if (options.includeWorkingDir) {
            roots.push(process.cwd());
        }
        this.searchPaths = Object.freeze(roots);
    }

    /**
     * Find the first root holding the file.
     * @param filename - Logical path of the file
     * @returns Absolute path and size of the match, or undefined
     */
    async locate(filename: string): Promise<{ pathname: string; size: number } | undefined> {
        for (const root of this.searchPaths) {
            const pathname = resolve(root, filename);
            try {
                const fileStats = await stat(pathname);
                if (fileStats.isFile()) {
                    return { pathname, size: fileStats.size };
                }
            } catch (err) {
                if (!isMissing(err)) {
                    throw new DataSourceError('io', filename, `Cannot stat '${pathname}'`, { cause: err });
                }
            }
        }
        return undefined;
    }

    async exists(filename: string): Promise<boolean> {
        return (await this.locate(filename)) !== undefined;
    }

    async createSource(filename: string): Promise<ReadSource> {
        const found = await this.locate(filename);
        if (!found) {
            throw new DataSourceError('not-found', filename, `File not found in search paths: ${filename}`);
        }

        let fileHandle: FileHandle;
        try {
            fileHandle = await open(found.pathname, 'r');
        } catch (err) {
            // removed between stat and open
            const kind = isMissing(err) ? 'not-found' : 'io';
            throw new DataSourceError(kind, filename, `Cannot open '${found.pathname}'`, { cause: err });
        }

        return new NodeReadSource(fileHandle, found.size, found.pathname);
    }
}

export { NodeReadFileSystem, NodeReadSource, openFileSource };
