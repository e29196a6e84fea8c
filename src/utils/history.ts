import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import { errnoCode } from './errors.js';

const HISTORY_FILE = join(homedir(), '.diskwarden_history.json');
const KNOWN_APPS_FILE = join(homedir(), '.diskwarden_known_apps.json');
const DEFAULT_LIMIT = 50;

export interface CleanupLog {
    id: string;
    timestamp: string;
    totalFreed: number;
    itemsCount: number;
    failedCount: number;
    source: 'cleaner' | 'orphans' | 'api';
    categories?: string[];
}

async function readJsonArray<T>(file: string): Promise<T[]> {
    let content: string;
    try {
        content = await readFile(file, 'utf-8');
    } catch (error) {
        if (errnoCode(error) === 'ENOENT') return [];
        throw error;
    }
    const parsed: unknown = JSON.parse(content);
    return Array.isArray(parsed) ? parsed : [];
}

export async function getHistory(file = HISTORY_FILE): Promise<CleanupLog[]> {
    return readJsonArray<CleanupLog>(file);
}

export async function saveHistory(log: CleanupLog, options: { file?: string; limit?: number } = {}): Promise<void> {
    const file = options.file ?? HISTORY_FILE;
    const history = await getHistory(file);
    // Newest first, bounded
    history.unshift(log);
    history.splice(options.limit ?? DEFAULT_LIMIT);
    await writeFile(file, JSON.stringify(history, null, 2));
}

export async function clearHistory(file = HISTORY_FILE): Promise<void> {
    await writeFile(file, '[]');
}

/**
 * Bundle identifiers of every app ever seen installed. Orphan detection uses
 * their developer segments once the app itself is gone.
 */
export async function getKnownIdentifiers(file = KNOWN_APPS_FILE): Promise<string[]> {
    const ids = await readJsonArray<unknown>(file);
    return ids.filter((id): id is string => typeof id === 'string');
}

export async function rememberIdentifiers(ids: readonly string[], file = KNOWN_APPS_FILE): Promise<string[]> {
    const known = new Set(await getKnownIdentifiers(file));
    const before = known.size;
    for (const id of ids) known.add(id);
    const all = [...known].sort();
    if (all.length !== before) {
        await writeFile(file, JSON.stringify(all, null, 2));
    }
    return all;
}
