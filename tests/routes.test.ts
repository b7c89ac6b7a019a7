import { Hono } from 'hono';
import { describe, expect, it } from 'vitest';

import { createFileServerApp, MemoryReadFileSystem, registerDataSourceRoute } from '../src/lib';
import { normalizeMountPath } from '../src/lib/server/routes';
import { FILES } from './shared/fixtures';

const source = new MemoryReadFileSystem(FILES);

describe('normalizeMountPath', () => {
    it('keeps one leading slash and drops trailing ones', () => {
        expect(normalizeMountPath('files')).toBe('/files');
        expect(normalizeMountPath('/static/')).toBe('/static');
        expect(normalizeMountPath('//a/b//')).toBe('/a/b');
        expect(normalizeMountPath('/')).toBe('');
        expect(normalizeMountPath('')).toBe('');
    });
});

describe('createFileServerApp', () => {
    const app = createFileServerApp(source);

    it('serves files below /files', async () => {
        const res = await app.request('/files/a/b.txt');

        expect(res.status).toBe(200);
        expect(res.headers.get('Content-Type')).toBe('text/plain; charset=utf-8');
        expect(await res.text()).toBe('hello');
    });

    it('serves the index file at the mount root', async () => {
        const res = await app.request('/files/');

        expect(await res.text()).toBe('<h1>home</h1>');
    });

    it('answers missing files with 404', async () => {
        const res = await app.request('/files/a/c.txt');

        expect(res.status).toBe(404);
        expect(await res.text()).toBe('404 Not Found\n\na/c.txt\n\nEntry not found: a/c.txt');
    });

    it('passes the Range header through', async () => {
        const res = await app.request('/files/a/b.txt', { headers: { Range: 'bytes=0-1' } });

        expect(res.status).toBe(206);
        expect(await res.text()).toBe('he');
    });

    it('answers HEAD without a body', async () => {
        const res = await app.request('/files/a/b.txt', { method: 'HEAD' });

        expect(res.status).toBe(200);
        expect(res.headers.get('Content-Length')).toBe('5');
        expect(await res.text()).toBe('');
    });

    it('rejects other methods with 405', async () => {
        const res = await app.request('/files/a/b.txt', { method: 'POST', body: 'x' });

        expect(res.status).toBe(405);
        expect(res.headers.get('Allow')).toBe('GET, HEAD');
    });

    it('leaves paths outside the mount point alone', async () => {
        const res = await app.request('/a/b.txt');

        expect(res.status).toBe(404);
        expect(await res.text()).toBe('404 Not Found');
    });
});

describe('registerDataSourceRoute', () => {
    it('mounts under a custom prefix next to existing routes', async () => {
        const app = new Hono();
        app.get('/health', c => c.text('ok'));

        expect(registerDataSourceRoute(app, source, { mountPath: '/static/' })).toBe(app);

        expect(await (await app.request('/health')).text()).toBe('ok');
        expect(await (await app.request('/static/docs/')).text()).toBe('docs home');
        expect((await app.request('/files/a/b.txt')).status).toBe(404);
    });

    it('mounts at the root', async () => {
        const app = registerDataSourceRoute(new Hono(), source, { mountPath: '/' });

        expect(await (await app.request('/style.css')).text()).toBe(FILES['style.css']);
        expect(await (await app.request('/')).text()).toBe('<h1>home</h1>');
    });
});
