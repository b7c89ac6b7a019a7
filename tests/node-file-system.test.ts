import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createDataSource, NodeReadFileSystem, openFileSource, readText } from '../src/lib';
import { createDataSourceSuite } from './shared/data-source-suite';
import { text } from './shared/fixtures';

const writeFiles = async (root: string, files: Record<string, string>) => {
    for (const [name, body] of Object.entries(files)) {
        const target = path.join(root, name);
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, body);
    }
};

let suiteDir = '';

createDataSourceSuite('file-system', async (files) => {
    suiteDir = await fs.mkdtemp(path.join(os.tmpdir(), 'data-source-suite-'));
    // split the files over two roots so lookups have to fall through
    const [first, ...rest] = Object.entries(files);
    await writeFiles(path.join(suiteDir, 'one'), Object.fromEntries([first]));
    await writeFiles(path.join(suiteDir, 'two'), Object.fromEntries(rest));
    return createDataSource({ type: 'folders', paths: [path.join(suiteDir, 'one'), path.join(suiteDir, 'two')] });
}, async () => {
    await fs.rm(suiteDir, { recursive: true, force: true });
});

describe('NodeReadFileSystem', () => {
    let testDir: string;
    let first: string;
    let second: string;

    beforeEach(async () => {
        testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'node-fs-test-'));
        first = path.join(testDir, 'first');
        second = path.join(testDir, 'second');
        await writeFiles(first, { 'x.txt': 'one', 'y.txt/inner.txt': 'nested' });
        await writeFiles(second, { 'x.txt': 'two', 'y.txt': 'file', 'only.txt': 'second only' });
    });

    afterEach(async () => {
        await fs.rm(testDir, { recursive: true, force: true });
    });

    it('returns the first root holding the file', async () => {
        const source = new NodeReadFileSystem([first, second]);

        expect(await readText(source, 'x.txt')).toBe('one');
        expect(await source.locate('x.txt')).toEqual({ pathname: path.join(first, 'x.txt'), size: 3 });
    });

    it('honours the order of the search paths', async () => {
        const source = new NodeReadFileSystem([second, first]);

        expect(await readText(source, 'x.txt')).toBe('two');
    });

    it('falls through to later roots', async () => {
        const source = new NodeReadFileSystem([first, second]);

        expect(await readText(source, 'only.txt')).toBe('second only');
    });

    it('skips a directory shadowing a file in a later root', async () => {
        const source = new NodeReadFileSystem([first, second]);

        expect(await readText(source, 'y.txt')).toBe('file');
        expect(await readText(source, 'y.txt/inner.txt')).toBe('nested');
    });

    it('resolves roots and appends the working directory when asked', () => {
        const source = new NodeReadFileSystem(['relative'], { includeWorkingDir: true });

        expect(source.searchPaths).toEqual([path.resolve('relative'), process.cwd()]);
    });

    it('finds nothing with no roots', async () => {
        const source = new NodeReadFileSystem([]);

        expect(await source.exists('x.txt')).toBe(false);
        await expect(source.createSource('x.txt')).rejects.toMatchObject({ kind: 'not-found' });
    });

    it('serves byte ranges from an opened file', async () => {
        const source = await new NodeReadFileSystem([second]).createSource('only.txt');
        try {
            expect(source.seekable).toBe(true);
            expect(text(await source.read(7, 11).readAll())).toBe('only');
            expect(text(await source.read(7).readAll())).toBe('only');
        } finally {
            source.close();
        }
    });

    it('opens single files for archives', async () => {
        const source = await openFileSource(path.join(second, 'y.txt'));
        try {
            expect(source.size).toBe(4);
            expect(text(await source.read().readAll())).toBe('file');
        } finally {
            source.close();
        }

        await expect(openFileSource(path.join(testDir, 'missing.tar'))).rejects.toMatchObject({ kind: 'not-found' });
    });
});
