/**
 * Failure categories shared by every backend.
 */
type DataSourceErrorKind = 'invalid-path' | 'not-found' | 'io' | 'decode' | 'upstream';

const STATUS: Record<DataSourceErrorKind, number> = {
    'invalid-path': 400,
    'not-found': 404,
    'io': 500,
    'decode': 500,
    'upstream': 502
};

/**
 * Error raised by path resolution and the read file systems.
 * Backends translate their own failures into one of the kinds above so callers
 * never need to inspect fs, fetch or tar errors.
 */
class DataSourceError extends Error {
    override name = 'DataSourceError';

    readonly kind: DataSourceErrorKind;

    /** Logical path (or raw request path for invalid-path) the error refers to. */
    readonly path: string;

    /** HTTP status returned by a remote backend, if any. */
    readonly status: number | undefined;

    constructor(kind: DataSourceErrorKind, path: string, message: string, options: { cause?: unknown; status?: number } = {}) {
        super(message, { cause: options.cause });
        this.kind = kind;
        this.path = path;
        this.status = options.status;
    }
}

const isDataSourceError = (err: unknown): err is DataSourceError => err instanceof DataSourceError;

/**
 * Wrap an arbitrary thrown value. DataSourceErrors pass through unchanged.
 * @param err - The caught value
 * @param path - Logical path being read
 * @param kind - Kind to use for foreign errors
 * @returns A DataSourceError
 */
const toDataSourceError = (err: unknown, path: string, kind: DataSourceErrorKind = 'io'): DataSourceError => {
    if (isDataSourceError(err)) {
        return err;
    }
    const message = err instanceof Error ? err.message : String(err);
    return new DataSourceError(kind, path, message, { cause: err });
};

const httpStatusOf = (kind: DataSourceErrorKind): number => STATUS[kind];

export { DataSourceError, isDataSourceError, toDataSourceError, httpStatusOf };
export type { DataSourceErrorKind };
