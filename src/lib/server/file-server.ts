import { contentType, lookup } from 'mime-types';

import { type DataSource, fetchFile } from '../data-source';
import { httpStatusOf, toDataSourceError } from '../errors';
import { type ReadSource, toReadableStream } from '../io/read/file-system';
import { type FileRequest, type FileServerOptions } from '../types';
import { logger } from '../utils/logger';
import { DEFAULT_INDEX_FILE, extname, resolvePath } from '../utils/path';

const DEFAULT_MIME_TYPE = 'application/octet-stream';

const REASONS: Record<number, string> = {
    400: 'Bad Request',
    404: 'Not Found',
    405: 'Method Not Allowed',
    416: 'Range Not Satisfiable',
    500: 'Internal Server Error',
    502: 'Bad Gateway'
};

/**
 * Byte range to serve, end exclusive.
 */
type ByteRange = { start: number; end: number };

/**
 * Media type for a path, from its extension.
 * @param path - Logical path
 * @returns The bare media type, or application/octet-stream for unknown or missing extensions
 */
const mimeTypeFor = (path: string): string => {
    const ext = extname(path);
    return (ext && lookup(ext)) || DEFAULT_MIME_TYPE;
};

/**
 * Content-Type header value for a path. Text types carry a UTF-8 charset.
 * @param path - Logical path
 * @returns The header value
 */
const contentTypeFor = (path: string): string => {
    const mimeType = mimeTypeFor(path);
    return contentType(mimeType) || mimeType;
};

/**
 * Parse a Range header against a file size.
 * Only a single `bytes=` range is honoured; anything else is ignored as the
 * header is optional for the server.
 * @param header - Range header value
 * @param size - File size in bytes
 * @returns The range, 'unsatisfiable', or undefined to serve the whole file
 */
const parseRange = (header: string, size: number): ByteRange | 'unsatisfiable' | undefined => {
    const match = /^bytes=\s*(\d*)\s*-\s*(\d*)\s*$/.exec(header.trim());
    if (!match) {
        return undefined;
    }

    const [, first, last] = match;
    if (first === '' && last === '') {
        return undefined;
    }

    if (first === '') {
        // suffix range: the final N bytes
        const length = parseInt(last, 10);
        if (length === 0 || size === 0) {
            return 'unsatisfiable';
        }
        return { start: Math.max(0, size - length), end: size };
    }

    const start = parseInt(first, 10);
    if (last !== '' && parseInt(last, 10) < start) {
        return undefined;
    }
    if (start >= size) {
        return 'unsatisfiable';
    }

    const end = last === '' ? size : Math.min(parseInt(last, 10) + 1, size);
    return { start, end };
};

const errorResponse = (status: number, path: string, message: string, head: boolean, headers: Record<string, string> = {}): Response => {
    const body = `${status} ${REASONS[status] ?? ''}\n\n${path}\n\n${message}`;
    return new Response(head ? null : body, {
        status,
        headers: { 'Content-Type': 'text/plain; charset=utf-8', ...headers }
    });
};

/**
 * Serve a request path from a data source.
 * The response body streams from the backend; the fetched source is closed
 * when the body ends, errors or is cancelled.
 * @param source - The data source
 * @param request - Captured path, method and Range header
 * @param options - Index file and chunk size
 * @returns The HTTP response
 */
const serveFile = async (source: DataSource, request: FileRequest, options: FileServerOptions = {}): Promise<Response> => {
    const method = (request.method ?? 'GET').toUpperCase();
    const head = method === 'HEAD';
    const indexFile = options.indexFile ?? DEFAULT_INDEX_FILE;

    if (method !== 'GET' && !head) {
        logger.debug(`${method} ${request.path} -> 405`);
        return errorResponse(405, request.path, 'Method not allowed', false, { 'Allow': 'GET, HEAD' });
    }

    let path = request.path;
    let readSource: ReadSource;
    try {
        path = resolvePath(request.path, indexFile);
        readSource = await fetchFile(source, path, indexFile);
    } catch (err) {
        const error = toDataSourceError(err, path);
        const status = httpStatusOf(error.kind);
        if (status >= 500) {
            logger.error(`${method} ${path} -> ${status}:`, error);
        } else {
            logger.debug(`${method} ${path} -> ${status}`);
        }
        return errorResponse(status, path, error.message, head);
    }

    const headers: Record<string, string> = {
        'Content-Type': contentTypeFor(path)
    };

    const size = readSource.size;
    const rangeable = readSource.seekable && size !== undefined;
    if (rangeable) {
        headers['Accept-Ranges'] = 'bytes';
    }

    let status = 200;
    let range: ByteRange | undefined;
    if (rangeable && request.range) {
        const parsed = parseRange(request.range, size);
        if (parsed === 'unsatisfiable') {
            readSource.close();
            logger.debug(`${method} ${path} -> 416`);
            return errorResponse(416, path, `Range '${request.range}' not satisfiable`, head, {
                'Content-Range': `bytes */${size}`
            });
        }
        if (parsed) {
            status = 206;
            range = parsed;
            headers['Content-Range'] = `bytes ${parsed.start}-${parsed.end - 1}/${size}`;
        }
    }

    const length = range ? range.end - range.start : size;
    if (length !== undefined) {
        headers['Content-Length'] = String(length);
    }

    logger.debug(`${method} ${path} -> ${status}`);

    if (head) {
        readSource.close();
        return new Response(null, { status, headers });
    }

    const stream = range ? readSource.read(range.start, range.end) : readSource.read();
    const body = toReadableStream(stream, options.chunkSize, () => readSource.close());
    return new Response(body, { status, headers });
};

export { contentTypeFor, mimeTypeFor, parseRange, serveFile };
export type { ByteRange };
