/**
 * Options for the file server adapter.
 */
type FileServerOptions = {
    /** URL prefix the data source is mounted under. Default: '/files' */
    mountPath?: string;

    /** File served for the mount root and for paths ending in '/'. Default: 'index.html' */
    indexFile?: string;

    /** Bytes pulled from the backend per response chunk. Default: 65536 */
    chunkSize?: number;
};

/**
 * A request as seen by the adapter.
 */
type FileRequest = {
    /** The path captured below the mount point. */
    path: string;

    /** HTTP method. Default: 'GET' */
    method?: string;

    /** Value of the Range header, if any. */
    range?: string | null;
};

export type { FileRequest, FileServerOptions };
