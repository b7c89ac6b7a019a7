// Data source
export { createDataSource, fetchFile, fileExists, readFile, readText } from './data-source';
export type { DataSource, DataSourceConfig, DataSourceKind } from './data-source';

// Errors
export { DataSourceError, httpStatusOf, isDataSourceError } from './errors';
export type { DataSourceErrorKind } from './errors';

// File system abstractions
export { ReadStream, toReadableStream } from './io/read/file-system';
export type { ReadSource, ReadFileSystem } from './io/read/file-system';
export { MemoryReadFileSystem, MemoryReadSource } from './io/read/memory-file-system';
export type { MemoryEntries } from './io/read/memory-file-system';
export { NodeReadFileSystem, NodeReadSource, openFileSource } from './io/read/node-file-system';
export { TarReadFileSystem } from './io/read/tar-file-system';
export type { TarEntry, TarReadFileSystemOptions } from './io/read/tar-file-system';
export { UrlReadFileSystem } from './io/read/url-file-system';
export type { FetchFunction, UrlReadFileSystemOptions } from './io/read/url-file-system';

// File server
export { contentTypeFor, mimeTypeFor, parseRange, serveFile } from './server/file-server';
export { createFileServerApp, registerDataSourceRoute } from './server/routes';
export type { FileRequest, FileServerOptions } from './types';

// Paths
export { resolvePath } from './utils/path';

// Logger
export { logger } from './utils/logger';
export type { Logger } from './utils/logger';
