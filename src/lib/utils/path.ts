/**
 * Platform-agnostic path utilities for logical paths.
 * Logical paths use forward slashes and never start with one.
 */

import { DataSourceError } from '../errors';

const DEFAULT_INDEX_FILE = 'index.html';

/**
 * Get the extension of the last path segment, including the dot.
 * Names without a dot, and dotfiles such as `.env`, have no extension.
 * @param path - The path to inspect
 * @returns The lower-cased extension, or empty string
 */
const extname = (path: string): string => {
    const base = path.slice(path.lastIndexOf('/') + 1);
    const dot = base.lastIndexOf('.');
    if (dot <= 0) return '';
    return base.slice(dot).toLowerCase();
};

/**
 * Turn a raw request path into a logical path.
 *
 * - a single leading slash is stripped
 * - an empty path maps to the index file, a trailing slash to the index file of that directory
 * - `.`, `..`, empty interior segments and segments containing a backslash or NUL are rejected
 *
 * @param raw - The request path, as captured from the URL
 * @param indexFile - File served for directory requests
 * @returns The logical path
 * @throws DataSourceError with kind `invalid-path`
 */
const resolvePath = (raw: string, indexFile: string = DEFAULT_INDEX_FILE): string => {
    let path = raw.startsWith('/') ? raw.slice(1) : raw;

    if (path === '' || path.endsWith('/')) {
        path += indexFile;
    }

    const segments = path.split('/');
    for (const segment of segments) {
        if (segment === '' || segment === '.' || segment === '..') {
            throw new DataSourceError('invalid-path', raw, `Invalid path segment '${segment}' in '${raw}'`);
        }
        if (segment.includes('\\') || segment.includes('\0')) {
            throw new DataSourceError('invalid-path', raw, `Invalid character in path '${raw}'`);
        }
    }

    return segments.join('/');
};

/**
 * Normalize an archive entry name to its logical path.
 * Entries are often stored as `./dir/file`; directories end in a slash.
 * @param name - Entry name as stored in the container
 * @returns The logical path, or undefined when the name cannot be addressed
 */
const entryPath = (name: string): string | undefined => {
    const parts = name.split('/').filter(part => part !== '' && part !== '.');
    if (parts.length === 0 || parts.some(part => part === '..' || part.includes('\\') || part.includes('\0'))) {
        return undefined;
    }
    return parts.join('/');
};

export { DEFAULT_INDEX_FILE, entryPath, extname, resolvePath };
