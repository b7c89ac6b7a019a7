import { describe, expect, it } from 'vitest';

import { createDataSource, MemoryReadFileSystem, MemoryReadSource, readText } from '../src/lib';
import { createDataSourceSuite } from './shared/data-source-suite';
import { text } from './shared/fixtures';

createDataSourceSuite('memory', files => createDataSource({ type: 'memory', entries: files }));

describe('MemoryReadFileSystem', () => {
    it('accepts a Map of buffers and strings', async () => {
        const fs = new MemoryReadFileSystem(new Map<string, Uint8Array | string>([
            ['raw.bin', new Uint8Array([1, 2, 3])],
            ['note.txt', 'héllo']
        ]));

        expect(fs.keys()).toEqual(['raw.bin', 'note.txt']);
        expect(fs.get('raw.bin')).toEqual(new Uint8Array([1, 2, 3]));
        expect(fs.get('note.txt')?.length).toBe(6);
        expect(await readText(fs, 'note.txt')).toBe('héllo');
    });

    it('looks up exact keys only', async () => {
        const fs = new MemoryReadFileSystem({ 'A/B.txt': 'upper' });

        expect(await fs.exists('A/B.txt')).toBe(true);
        expect(await fs.exists('a/b.txt')).toBe(false);
        await expect(fs.createSource('a/b.txt')).rejects.toMatchObject({
            kind: 'not-found',
            message: 'Entry not found: a/b.txt'
        });
    });

    it('copies buffers so later writes by the caller are not seen', async () => {
        const buffer = new TextEncoder().encode('hello');
        const fs = new MemoryReadFileSystem({ 'a/b.txt': buffer });

        buffer[0] = 0x4a;
        expect(await readText(fs, 'a/b.txt')).toBe('hello');

        const view = fs.get('a/b.txt');
        if (view) {
            view[0] = 0x4a;
        }
        expect(view).toEqual(new TextEncoder().encode('Jello'));
        expect(await readText(fs, 'a/b.txt')).toBe('hello');
    });

    it('copies the entry table at construction', async () => {
        const entries: Record<string, string> = { 'a.txt': 'one' };
        const fs = new MemoryReadFileSystem(entries);
        entries['b.txt'] = 'two';

        expect(await fs.exists('b.txt')).toBe(false);
    });
});

describe('MemoryReadSource', () => {
    const data = new TextEncoder().encode('hello world');

    it('reads clamped ranges', async () => {
        const source = new MemoryReadSource(data);

        expect(source.size).toBe(11);
        expect(source.seekable).toBe(true);
        expect(text(await source.read(6).readAll())).toBe('world');
        expect(text(await source.read(0, 5).readAll())).toBe('hello');
        expect(text(await source.read(6, 100).readAll())).toBe('world');
        expect(await source.read(20, 30).readAll()).toEqual(new Uint8Array(0));
    });

    it('refuses reads after close', () => {
        const source = new MemoryReadSource(data);
        source.close();

        expect(() => source.read()).toThrow('Source has been closed');
    });
});
