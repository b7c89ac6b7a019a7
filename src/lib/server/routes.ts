import { type Env, Hono, type Schema } from 'hono';

import { type DataSource } from '../data-source';
import { type FileServerOptions } from '../types';
import { serveFile } from './file-server';

const DEFAULT_MOUNT_PATH = '/files';

/**
 * Normalize a mount path to a leading slash and no trailing slash.
 * The root mount is the empty string.
 * @param mountPath - Mount path as configured
 * @returns The normalized prefix
 */
const normalizeMountPath = (mountPath: string): string => {
    const trimmed = mountPath.replace(/^\/+|\/+$/g, '');
    return trimmed ? `/${trimmed}` : '';
};

/**
 * Register the data source on an app under a mount point.
 * Every path below the mount point is handed to the adapter; the remainder
 * after the mount prefix is the request path. Methods other than GET and HEAD
 * are answered with 405 by the adapter. The mount path is matched against the
 * full request path, so register on an app without a base path.
 * @param app - The Hono app
 * @param source - The data source to serve
 * @param options - Mount path, index file and chunk size
 * @returns The same app, for chaining
 *
 * @example
 * const app = new Hono();
 * registerDataSourceRoute(app, new MemoryReadFileSystem({ 'a.txt': 'hello' }), { mountPath: '/static' });
 * // GET /static/a.txt -> 'hello'
 */
const registerDataSourceRoute = <E extends Env, S extends Schema>(app: Hono<E, S>, source: DataSource, options: FileServerOptions = {}): Hono<E, S> => {
    const prefix = normalizeMountPath(options.mountPath ?? DEFAULT_MOUNT_PATH);

    // `/*` also matches the bare prefix, which serves the index file
    app.all(`${prefix}/*`, (c) => {
        return serveFile(source, {
            path: c.req.path.slice(prefix.length),
            method: c.req.method,
            range: c.req.header('Range')
        }, options);
    });

    return app;
};

/**
 * Create an app serving only the data source.
 * @param source - The data source to serve
 * @param options - Mount path, index file and chunk size
 * @returns The Hono app
 */
const createFileServerApp = (source: DataSource, options: FileServerOptions = {}): Hono => {
    return registerDataSourceRoute(new Hono(), source, options);
};

export { DEFAULT_MOUNT_PATH, createFileServerApp, normalizeMountPath, registerDataSourceRoute };
