import { Hono, type Context } from 'hono';
import { serve } from '@hono/node-server';
import { streamSSE, type SSEStreamingApi } from 'hono/streaming';
import checkDiskSpace from 'check-disk-space';
import type { CleanerErrorKind, DeletionCandidate, ProbePhase } from '../types.js';
import { isCategoryId } from '../catalog/categories.js';
import { CleanupSession } from '../cleaner/session.js';
import { getAvailableScanners } from '../scanners/index.js';
import { CleanerError, errorMessage } from '../utils/errors.js';
import { describeValidation, validateBatch } from '../utils/path-validator.js';
import { summarizeCategory } from '../utils/permissions.js';

type ErrorStatus = 400 | 403 | 404 | 409 | 500;

function statusFor(kind: CleanerErrorKind): ErrorStatus {
    switch (kind) {
        case 'InvalidInput':
            return 400;
        case 'NotFound':
            return 404;
        case 'PolicyViolation':
        case 'PermissionDenied':
            return 403;
        case 'EnumerationFailure':
            return 500;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isCandidate(value: unknown): value is DeletionCandidate {
    return isRecord(value) && typeof value.path === 'string' && typeof value.size === 'number';
}

async function readBody(c: Context): Promise<Record<string, unknown>> {
    const text = await c.req.text();
    if (text.trim().length === 0) return {};
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new CleanerError('InvalidInput', `Malformed JSON body: ${errorMessage(error)}`);
    }
    if (!isRecord(parsed)) throw new CleanerError('InvalidInput', 'Body must be a JSON object');
    return parsed;
}

export interface ServerOptions {
    /** Free-space lookup for /api/disk-info; defaults to check-disk-space on `/`. */
    diskInfo?: () => Promise<{ size: number; free: number }>;
}

/** Builds the HTTP API over one session. Surfaces only ever talk to the session. */
export function createApp(session: CleanupSession = new CleanupSession(), options: ServerOptions = {}): Hono {
    const app = new Hono();
    const diskInfo = options.diskInfo ?? (() => checkDiskSpace('/'));

    // SSE clients
    const clients = new Set<SSEStreamingApi>();

    function broadcast(data: Record<string, unknown>): void {
        const msg = JSON.stringify(data);
        for (const client of clients) {
            void client.writeSSE({ data: msg }).catch((error: unknown) => {
                console.warn(`[Server] Dropping SSE client: ${errorMessage(error)}`);
                clients.delete(client);
            });
        }
    }

    app.onError((error, c) => {
        if (error instanceof CleanerError) {
            return c.json({ error: error.message, kind: error.kind }, statusFor(error.kind));
        }
        console.error('[Server] Request failed:', error);
        return c.json({ error: errorMessage(error) }, 500);
    });

    app.get('/api/categories', (c) => c.json(getAvailableScanners()));

    app.get('/api/disk-info', async (c) => {
        const space = await diskInfo();
        return c.json({ total: space.size, free: space.free, used: space.size - space.free });
    });

    app.get('/api/scan/events', (c) => {
        return streamSSE(c, async (stream) => {
            clients.add(stream);
            stream.onAbort(() => {
                clients.delete(stream);
            });

            await stream.writeSSE({ data: JSON.stringify({ type: 'connected' }) });

            // Keep connection alive
            while (!stream.aborted) {
                await stream.sleep(15000);
                await stream.writeSSE({ event: 'ping', data: '' });
            }
        });
    });

    app.post('/api/scan', async (c) => {
        const body = await readBody(c);
        const requested = body.categories ?? [];
        if (!isStringArray(requested)) {
            throw new CleanerError('InvalidInput', 'categories must be an array of category ids');
        }
        const unknown = requested.filter((id) => !isCategoryId(id));
        if (unknown.length > 0) {
            throw new CleanerError('InvalidInput', `Unknown categories: ${unknown.join(', ')}`);
        }

        const summary = await session.scanCleanable(requested.filter(isCategoryId), {
            onProgress: (completed, total, scanner, result) => {
                broadcast({
                    type: 'progress',
                    id: scanner.category.id,
                    completed,
                    total,
                    totalSize: result.totalSize,
                    itemsCount: result.items.length,
                });
            },
        });
        broadcast({ type: 'complete', totalSize: summary.totalSize, totalItems: summary.totalItems });

        return c.json(summary);
    });

    app.get('/api/groups', (c) => c.json(session.groups()));

    app.post('/api/groups/:category/toggle', async (c) => {
        const category = c.req.param('category');
        if (!isCategoryId(category)) {
            throw new CleanerError('NotFound', `Unknown category: ${category}`);
        }
        const body = await readBody(c);

        const { itemId, selected } = body;

        if (typeof itemId === 'string') {
            const group = session.groups().find((g) => g.category.id === category);
            if (!group || !group.items.some((item) => item.id === itemId)) {
                throw new CleanerError('NotFound', `No item ${itemId} in ${category}`);
            }
            return c.json(session.toggleItem(itemId));
        }
        if (typeof selected === 'boolean') {
            return c.json(session.setCategorySelection(category, selected));
        }
        throw new CleanerError('InvalidInput', 'Expected itemId or selected');
    });

    app.post('/api/orphans/scan', async (c) => {
        const result = await session.scanOrphans((root, files) => {
            broadcast({ type: 'orphans', root: root.path, category: root.category, count: files.length });
        });
        return c.json(result);
    });

    app.get('/api/orphans', (c) => {
        return c.json({
            files: session.orphans(),
            groups: Object.fromEntries(session.orphanGroups()),
        });
    });

    app.get('/api/permissions', (c) => {
        return c.json({
            checking: session.permissions.isChecking,
            lastChecked: session.permissions.lastChecked,
            categories: session.permissions.snapshot().map((category) => ({
                ...category,
                summary: summarizeCategory(category),
            })),
        });
    });

    app.post('/api/permissions/check', async (c) => {
        const body = await readBody(c);
        const phase: ProbePhase = body.phase === 'full' ? 'full' : 'startup';
        const categories = await session.checkPermissions(phase);
        return c.json({ phase, categories: categories.map((category) => ({ ...category, summary: summarizeCategory(category) })) });
    });

    app.post('/api/validate', async (c) => {
        const body = await readBody(c);
        if (!isStringArray(body.paths)) {
            throw new CleanerError('InvalidInput', 'paths must be an array of strings');
        }
        return c.json(
            validateBatch(body.paths, session.policy).map(({ path, result }) => ({
                path,
                result,
                reason: describeValidation(result),
            }))
        );
    });

    app.post('/api/clean', async (c) => {
        const body = await readBody(c);
        const items: unknown = body.items;
        let candidates: DeletionCandidate[];
        if (items === undefined) {
            candidates = session.selectedCandidates();
        } else if (Array.isArray(items) && items.every(isCandidate)) {
            candidates = items.map((item: DeletionCandidate) => ({ path: item.path, size: item.size }));
        } else {
            throw new CleanerError('InvalidInput', 'items must be an array of { path, size }');
        }

        const result = await session.clean(candidates, 'api');
        if (!result) {
            return c.json({ error: session.cancelled ? 'Session was cancelled' : 'A deletion batch is already running' }, 409);
        }
        return c.json(result);
    });

    app.get('/api/history', async (c) => c.json(await session.history()));

    app.post('/api/cancel', (c) => {
        session.cancel();
        return c.json({ cancelled: true });
    });

    app.post('/api/reset', (c) => {
        session.reset();
        return c.json({ cancelled: false });
    });

    return app;
}

export function startServer(port = 3000, session?: CleanupSession): string {
    const app = createApp(session);
    console.log(`[Server] Listening on http://localhost:${port}`);
    serve({
        fetch: app.fetch,
        port,
    });
    return `http://localhost:${port}`;
}
