import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Hono } from 'hono';
import { CleanupSession } from '../cleaner/session.js';
import { getDefaultConfig } from '../utils/config.js';
import type { TrashOutcome } from '../utils/trash.js';
import { createApp } from './index.js';

describe('HTTP API', () => {
    let home: string;
    let caches: string;
    let moved: string[];
    let session: CleanupSession;
    let app: Hono;

    function post(path: string, body?: unknown) {
        return app.request(path, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: typeof body === 'string' ? body : JSON.stringify(body ?? {}),
        });
    }

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});

        home = await mkdtemp(join(tmpdir(), 'diskwarden-server-'));
        caches = join(home, 'Library', 'Caches');
        await mkdir(join(caches, 'com.example.app'), { recursive: true });
        await writeFile(join(caches, 'com.example.app', 'blob'), Buffer.alloc(120));

        moved = [];
        session = new CleanupSession({
            homeDir: home,
            config: getDefaultConfig(),
            historyFile: join(home, 'history.json'),
            knownAppsFile: join(home, 'known.json'),
            leftoverRoots: [],
            trash: {
                async moveToTrash(path): Promise<TrashOutcome> {
                    moved.push(path);
                    return { ok: true, destination: path };
                },
            },
        });
        app = createApp(session, { diskInfo: async () => ({ size: 1000, free: 400 }) });
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(home, { recursive: true, force: true });
    });

    it('should list every category', async () => {
        const res = await app.request('/api/categories');
        const body = await res.json();

        expect(res.status).toBe(200);
        expect(body).toHaveLength(10);
        expect(body).toContainEqual({ id: 'system-caches', name: 'System Caches', group: 'System Junk', safetyLevel: 'moderate' });
    });

    it('should report disk usage', async () => {
        const res = await app.request('/api/disk-info');

        expect(await res.json()).toEqual({ total: 1000, free: 400, used: 600 });
    });

    it('should validate paths against the session policy', async () => {
        const res = await post('/api/validate', { paths: ['/System', join(caches, 'com.example.app')] });

        expect(await res.json()).toEqual([
            { path: '/System', result: { kind: 'protectedPath', path: '/System' }, reason: 'Protected system path: /System' },
            { path: join(caches, 'com.example.app'), result: { kind: 'safe' }, reason: 'Path is safe to delete' },
        ]);
    });

    it('should reject malformed bodies', async () => {
        const malformed = await post('/api/validate', '{"paths": [');
        const wrongShape = await post('/api/validate', { paths: 'nope' });
        const unknownCategory = await post('/api/scan', { categories: ['nope'] });

        expect(malformed.status).toBe(400);
        expect(await malformed.json()).toMatchObject({ kind: 'InvalidInput' });
        expect(wrongShape.status).toBe(400);
        expect(await unknownCategory.json()).toEqual({ error: 'Unknown categories: nope', kind: 'InvalidInput' });
    });

    it('should scan, toggle and clean the selected items', async () => {
        const scan = await post('/api/scan', { categories: ['user-caches'] });
        expect(await scan.json()).toMatchObject({ totalSize: 120, totalItems: 1, cancelled: false });

        const [group] = session.groups();
        const itemId = group.items[0].id;

        const off = await post(`/api/groups/user-caches/toggle`, { itemId });
        expect(await off.json()).toMatchObject([{ selectedCount: 0, selectedSize: 0 }]);
        const on = await post(`/api/groups/user-caches/toggle`, { selected: true });
        expect(await on.json()).toMatchObject([{ selectedCount: 1, selectedSize: 120 }]);

        const clean = await post('/api/clean');
        expect(await clean.json()).toEqual({ successCount: 1, failedCount: 0, errors: [], freedBytes: 120 });
        expect(moved).toEqual([join(caches, 'com.example.app')]);

        const history = await app.request('/api/history');
        expect(await history.json()).toMatchObject([{ source: 'api', totalFreed: 120, categories: ['user-caches'] }]);
    });

    it('should answer 404 and 400 for bad toggles', async () => {
        await post('/api/scan', { categories: ['user-caches'] });

        expect((await post('/api/groups/nope/toggle', { selected: true })).status).toBe(404);
        expect((await post('/api/groups/user-caches/toggle', { itemId: 'missing' })).status).toBe(404);
        expect((await post('/api/groups/user-caches/toggle', {})).status).toBe(400);
    });

    it('should clean explicit items and refuse policy violations per item', async () => {
        const res = await post('/api/clean', {
            items: [
                { path: join(caches, 'com.example.app'), size: 120 },
                { path: '/System', size: 1 },
            ],
        });

        expect(await res.json()).toEqual({
            successCount: 1,
            failedCount: 1,
            freedBytes: 120,
            errors: [{ path: '/System', kind: 'PolicyViolation', reason: 'Protected system path: /System' }],
        });
        expect((await post('/api/clean', { items: [{ path: 1 }] })).status).toBe(400);
    });

    it('should refuse to clean after a cancel until reset', async () => {
        await post('/api/cancel');

        const refused = await post('/api/clean', { items: [{ path: join(caches, 'com.example.app'), size: 120 }] });
        expect(refused.status).toBe(409);
        expect(await refused.json()).toEqual({ error: 'Session was cancelled' });
        expect(moved).toEqual([]);

        await post('/api/reset');
        const accepted = await post('/api/clean', { items: [{ path: join(caches, 'com.example.app'), size: 120 }] });
        expect(accepted.status).toBe(200);
    });
});
