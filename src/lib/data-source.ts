import { toDataSourceError } from './errors';
import { type ReadSource } from './io/read/file-system';
import { type MemoryEntries, MemoryReadFileSystem, MemoryReadSource } from './io/read/memory-file-system';
import { NodeReadFileSystem, openFileSource } from './io/read/node-file-system';
import { TarReadFileSystem } from './io/read/tar-file-system';
import { type FetchFunction, UrlReadFileSystem } from './io/read/url-file-system';
import { resolvePath } from './utils/path';

/**
 * One of the four backends. Narrow on `kind` for backend-specific methods.
 */
type DataSource = NodeReadFileSystem | TarReadFileSystem | MemoryReadFileSystem | UrlReadFileSystem;

type DataSourceKind = DataSource['kind'];

/**
 * Declarative description of a data source, as accepted by createDataSource().
 */
type DataSourceConfig =
    | { type: 'folders'; paths: string[]; includeWorkingDir?: boolean }
    | { type: 'tar'; path: string; compressed?: boolean; indexed?: boolean }
    | { type: 'tar'; data: Uint8Array; compressed?: boolean; indexed?: boolean }
    | { type: 'memory'; entries: MemoryEntries }
    | { type: 'remote'; baseUrl: string; headers?: Record<string, string>; fetch?: FetchFunction };

/**
 * Build a data source from its configuration.
 * Archives given by path are opened here and stay open for the lifetime of the source.
 * @param config - The backend description
 * @returns The data source
 */
const createDataSource = async (config: DataSourceConfig): Promise<DataSource> => {
    switch (config.type) {
        case 'folders':
            return new NodeReadFileSystem(config.paths, { includeWorkingDir: config.includeWorkingDir });
        case 'tar': {
            const container = 'data' in config ? new MemoryReadSource(config.data) : await openFileSource(config.path);
            return new TarReadFileSystem(container, { compressed: config.compressed, indexed: config.indexed });
        }
        case 'memory':
            return new MemoryReadFileSystem(config.entries);
        case 'remote':
            return new UrlReadFileSystem(config.baseUrl, { headers: config.headers, fetch: config.fetch });
    }
};

/**
 * Check whether a path exists in the source.
 * @param source - The data source
 * @param path - Raw request path
 * @param indexFile - File name used for directory requests
 * @returns True if a file exists at the resolved path
 * @throws DataSourceError - invalid-path for unsafe paths, io/decode/upstream for backend failures
 */
const fileExists = async (source: DataSource, path: string, indexFile?: string): Promise<boolean> => {
    const logicalPath = resolvePath(path, indexFile);
    try {
        return await source.exists(logicalPath);
    } catch (err) {
        throw toDataSourceError(err, logicalPath);
    }
};

/**
 * Fetch a file from the source. The caller owns the returned source and must close it.
 * @param source - The data source
 * @param path - Raw request path
 * @param indexFile - File name used for directory requests
 * @returns A readable source for the file
 * @throws DataSourceError
 */
const fetchFile = async (source: DataSource, path: string, indexFile?: string): Promise<ReadSource> => {
    const logicalPath = resolvePath(path, indexFile);
    try {
        return await source.createSource(logicalPath);
    } catch (err) {
        throw toDataSourceError(err, logicalPath);
    }
};

/**
 * Read an entire file into memory.
 * @param source - The data source
 * @param path - Raw request path
 * @returns File contents
 */
const readFile = async (source: DataSource, path: string): Promise<Uint8Array> => {
    const readSource = await fetchFile(source, path);
    try {
        return await readSource.read().readAll();
    } catch (err) {
        throw toDataSourceError(err, resolvePath(path));
    } finally {
        readSource.close();
    }
};

/**
 * Read an entire file as UTF-8 text. Invalid sequences become U+FFFD.
 * @param source - The data source
 * @param path - Raw request path
 * @returns File contents as a string
 */
const readText = async (source: DataSource, path: string): Promise<string> => {
    return new TextDecoder().decode(await readFile(source, path));
};

export { createDataSource, fetchFile, fileExists, readFile, readText };
export type { DataSource, DataSourceConfig, DataSourceKind };
