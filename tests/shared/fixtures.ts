import { packTar } from 'modern-tar';

import { type FetchFunction, type ReadSource, type ReadStream } from '../../src/lib';

const encoder = new TextEncoder();

/**
 * Files every backend is seeded with by the shared suite.
 */
const FILES: Record<string, string> = {
    'a/b.txt': 'hello',
    'index.html': '<h1>home</h1>',
    'docs/index.html': 'docs home',
    'style.css': 'body { margin: 0; }'
};

/**
 * Pack text files into an uncompressed tar archive.
 * @param files - Entry names and contents, in archive order
 * @param directories - Directory entries to add before the files
 */
const makeTar = (files: Array<[string, string]>, directories: string[] = []): Promise<Uint8Array> => {
    return packTar([
        ...directories.map(name => ({ header: { name, type: 'directory' as const, size: 0 } })),
        ...files.map(([name, body]) => ({ header: { name, size: encoder.encode(body).length }, body }))
    ]);
};

type StubCall = { url: string; method: string; range: string | null; headers: Headers };

type StubOptions = {
    /** Status to answer HEAD requests with instead of serving them. */
    headStatus?: number;
    /** Status to answer every request with. */
    status?: number;
    /** Extra response headers. */
    headers?: Record<string, string>;
};

/**
 * In-process stand-in for a static file server, reached through a fetch function.
 * Serves `files` below `base`, honours single Range requests and records every call.
 */
const createStubFetch = (files: Record<string, string>, base: string, options: StubOptions = {}) => {
    const calls: StubCall[] = [];

    const fetch: FetchFunction = (input, init = {}) => {
        const method = init.method ?? 'GET';
        const headers = new Headers(init.headers);
        const range = headers.get('Range');
        calls.push({ url: input, method, range, headers });

        if (options.status !== undefined) {
            return Promise.resolve(new Response('stub failure', { status: options.status }));
        }
        if (method === 'HEAD' && options.headStatus !== undefined) {
            return Promise.resolve(new Response(null, { status: options.headStatus }));
        }

        const key = input.startsWith(base) ? decodeURIComponent(input.slice(base.length)) : undefined;
        const body = key !== undefined ? files[key] : undefined;
        if (body === undefined) {
            return Promise.resolve(new Response(method === 'HEAD' ? null : 'missing', { status: 404, statusText: 'Not Found' }));
        }

        const match = range ? /^bytes=(\d+)-(\d+)$/.exec(range) : null;
        if (match) {
            const part = body.slice(parseInt(match[1], 10), parseInt(match[2], 10) + 1);
            return Promise.resolve(new Response(method === 'HEAD' ? null : part, {
                status: 206,
                headers: { 'Content-Length': String(part.length), 'Content-Range': `bytes ${match[1]}-${match[2]}/${body.length}` }
            }));
        }

        return Promise.resolve(new Response(method === 'HEAD' ? null : body, {
            status: 200,
            headers: { 'Content-Length': String(encoder.encode(body).length), 'Accept-Ranges': 'bytes', ...options.headers }
        }));
    };

    return { fetch, calls };
};

/**
 * ReadSource wrapper counting how often the container is opened.
 */
class CountingSource implements ReadSource {
    reads = 0;

    constructor(private inner: ReadSource) {}

    get size() {
        return this.inner.size;
    }

    get seekable() {
        return this.inner.seekable;
    }

    read(start?: number, end?: number): ReadStream {
        this.reads++;
        return this.inner.read(start, end);
    }

    close(): void {
        this.inner.close();
    }
}

const text = (data: Uint8Array) => new TextDecoder().decode(data);

export { CountingSource, FILES, createStubFetch, makeTar, text };
export type { StubCall, StubOptions };
