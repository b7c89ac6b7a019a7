import { DataSourceError } from '../../errors';
import { logger } from '../../utils/logger';
import { type ReadFileSystem, type ReadSource, ReadStream } from './file-system';
import { WebReadStream } from './web-read-stream';

type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Options for the remote backend.
 */
type UrlReadFileSystemOptions = {
    /** Client used for every request. Defaults to the global fetch. */
    fetch?: FetchFunction;

    /** Headers sent with every request. */
    headers?: Record<string, string>;
};

/**
 * Issue a request, mapping transport failures and status codes to DataSourceError.
 * @param client - The fetch function
 * @param url - Absolute URL
 * @param filename - Logical path, for error reporting
 * @param init - Request options
 * @returns The successful response
 */
const request = async (client: FetchFunction, url: string, filename: string, init: RequestInit): Promise<Response> => {
    let response: Response;
    try {
        response = await client(url, init);
    } catch (err) {
        throw new DataSourceError('io', filename, `Request to ${url} failed`, { cause: err });
    }

    if (!response.ok) {
        // release the connection
        await response.body?.cancel();

        if (response.status === 404) {
            throw new DataSourceError('not-found', filename, `Not found upstream: ${url}`, { status: 404 });
        }
        throw new DataSourceError('upstream', filename, `HTTP error ${response.status}: ${response.statusText}`, {
            status: response.status
        });
    }

    return response;
};

/**
 * Content-Length describes the encoded body, which fetch decodes transparently.
 * It only gives the byte count we will read for identity-encoded responses.
 * @param response - The response
 * @returns Decoded body size, or undefined if unknown
 */
const bodySize = (response: Response): number | undefined => {
    const encoding = response.headers.get('Content-Encoding');
    if (encoding && encoding !== 'identity') {
        return undefined;
    }
    const contentLength = response.headers.get('Content-Length');
    if (!contentLength) {
        return undefined;
    }
    const size = parseInt(contentLength, 10);
    return Number.isNaN(size) ? undefined : size;
};

/**
 * A ReadStream that lazily issues a ranged GET on first pull.
 */
class LazyUrlReadStream extends ReadStream {
    private client: FetchFunction;
    private url: string;
    private filename: string;
    private headers: Record<string, string>;
    private innerStream: WebReadStream | null = null;
    private fetchPromise: Promise<WebReadStream> | null = null;
    private closed: boolean = false;

    constructor(client: FetchFunction, url: string, filename: string, headers: Record<string, string>, expectedSize?: number) {
        super(expectedSize);
        this.client = client;
        this.url = url;
        this.filename = filename;
        this.headers = headers;
    }

    private async ensureStream(): Promise<WebReadStream | null> {
        if (this.closed) {
            return null;
        }

        if (this.innerStream) {
            return this.innerStream;
        }

        if (!this.fetchPromise) {
            this.fetchPromise = (async () => {
                const response = await request(this.client, this.url, this.filename, { headers: this.headers });
                if (this.headers.Range !== undefined && response.status !== 206) {
                    // a 200 here would be the whole file, not the requested range
                    await response.body?.cancel();
                    throw new DataSourceError('upstream', this.filename, `Range request answered with ${response.status}`, {
                        status: response.status
                    });
                }
                return new WebReadStream(response.body, this.expectedSize);
            })();
        }

        this.innerStream = await this.fetchPromise;
        return this.innerStream;
    }

    async pull(target: Uint8Array): Promise<number> {
        const stream = await this.ensureStream();
        if (!stream) {
            return 0;
        }

        const result = await stream.pull(target);
        this.bytesRead = stream.bytesRead;
        return result;
    }

    override close(): void {
        this.closed = true;
        if (this.innerStream) {
            this.innerStream.close();
            this.innerStream = null;
        }
    }
}

/**
 * ReadSource over a GET response.
 * The first full read consumes the body already received; range reads issue
 * new requests with a Range header and are only offered when the server
 * advertised `Accept-Ranges: bytes` and a size.
 */
class UrlReadSource implements ReadSource {
    readonly size: number | undefined;
    readonly seekable: boolean;

    private client: FetchFunction;
    private url: string;
    private filename: string;
    private headers: Record<string, string>;
    private response: Response | null;
    private closed: boolean = false;

    constructor(client: FetchFunction, url: string, filename: string, response: Response, headers: Record<string, string>) {
        this.client = client;
        this.url = url;
        this.filename = filename;
        this.headers = headers;
        this.response = response;
        this.size = bodySize(response);
        this.seekable = this.size !== undefined && response.headers.get('Accept-Ranges') === 'bytes';
    }

    read(start?: number, end?: number): ReadStream {
        if (this.closed) {
            throw new Error('Source has been closed');
        }

        const full = (start === undefined || start === 0) && (end === undefined || end === this.size);

        if (full && this.response) {
            const response = this.response;
            this.response = null;
            return new WebReadStream(response.body, this.size);
        }

        if (full) {
            return new LazyUrlReadStream(this.client, this.url, this.filename, { ...this.headers }, this.size);
        }

        if (!this.seekable) {
            throw new Error('Range reads not supported by this server');
        }

        const rangeStart = start ?? 0;
        const rangeEnd = end ?? this.size;
        const headers = { ...this.headers };
        // HTTP Range is inclusive
        headers.Range = `bytes=${rangeStart}-${rangeEnd !== undefined ? rangeEnd - 1 : ''}`;
        const expectedSize = rangeEnd !== undefined ? rangeEnd - rangeStart : undefined;

        return new LazyUrlReadStream(this.client, this.url, this.filename, headers, expectedSize);
    }

    close(): void {
        this.closed = true;
        if (this.response) {
            const body = this.response.body;
            this.response = null;
            body?.cancel().catch((err: unknown) => logger.debug('response cancel failed:', err));
        }
    }
}

/**
 * ReadFileSystem for a remote HTTP endpoint.
 * Every lookup is a network round trip: logical paths are resolved against
 * the base URL and fetched with GET.
 */
class UrlReadFileSystem implements ReadFileSystem {
    readonly kind = 'remote';

    readonly baseUrl: string;

    private client: FetchFunction;
    private headers: Record<string, string>;

    /**
     * @param baseUrl - Base URL; a trailing slash is added so paths resolve beneath it
     * @param options - Client and default headers
     */
    constructor(baseUrl: string, options: UrlReadFileSystemOptions = {}) {
        this.baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
        // validate eagerly so a bad base URL fails at construction
        new URL(this.baseUrl);
        this.client = options.fetch ?? ((input, init) => fetch(input, init));
        this.headers = options.headers ?? {};
    }

    /**
     * @param filename - Logical path
     * @returns Absolute URL for the path
     */
    urlFor(filename: string): string {
        const encoded = filename.split('/').map(encodeURIComponent).join('/');
        return new URL(encoded, this.baseUrl).href;
    }

    async exists(filename: string): Promise<boolean> {
        const url = this.urlFor(filename);
        let response: Response;
        try {
            response = await this.client(url, { method: 'HEAD', headers: this.headers });
        } catch (err) {
            throw new DataSourceError('io', filename, `Request to ${url} failed`, { cause: err });
        }

        if (response.status === 405 || response.status === 501) {
            // HEAD not supported - any successful GET counts as existing
            try {
                const fallback = await request(this.client, url, filename, { headers: this.headers });
                await fallback.body?.cancel();
                return true;
            } catch (err) {
                if (err instanceof DataSourceError && err.kind === 'not-found') {
                    return false;
                }
                throw err;
            }
        }

        if (response.ok) {
            return true;
        }
        if (response.status === 404) {
            return false;
        }
        throw new DataSourceError('upstream', filename, `HTTP error ${response.status}: ${response.statusText}`, {
            status: response.status
        });
    }

    async createSource(filename: string): Promise<ReadSource> {
        const url = this.urlFor(filename);
        const response = await request(this.client, url, filename, { headers: this.headers });
        return new UrlReadSource(this.client, url, filename, response, this.headers);
    }
}

export { UrlReadFileSystem, type FetchFunction, type UrlReadFileSystemOptions };
