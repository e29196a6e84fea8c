import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, writeFile, rm, readFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { addIgnoredPaths, getDefaultConfig, initConfig, loadConfig, removeIgnoredPaths, saveConfig } from './config.js';

describe('config', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'diskwarden-config-'));
    file = join(dir, 'config.json');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults when no file exists', async () => {
    expect(await loadConfig(file)).toEqual(getDefaultConfig());
  });

  it('should merge file values over defaults', async () => {
    await writeFile(file, JSON.stringify({ concurrency: 2, ignoredCategories: ['pip'] }));

    const config = await loadConfig(file);

    expect(config.concurrency).toBe(2);
    expect(config.ignoredCategories).toEqual(['pip']);
    expect(config.parallelScans).toBe(true);
    expect(config.includeUnsafeDefinitions).toBe(false);
  });

  it('should warn about and ignore a malformed file', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await writeFile(file, '{ not json');

    expect(await loadConfig(file)).toEqual(getDefaultConfig());
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should write defaults on init, creating parent folders', async () => {
    const nested = join(dir, 'nested', 'config.json');

    expect(await initConfig(nested)).toBe(nested);
    expect(JSON.parse(await readFile(nested, 'utf-8'))).toEqual(getDefaultConfig());
  });

  it('should add and remove ignored paths without duplicates', async () => {
    await saveConfig({ ...getDefaultConfig(), ignoredPaths: ['/a'] }, file);

    await addIgnoredPaths(['/a', '/b'], file);
    expect((await loadConfig(file)).ignoredPaths).toEqual(['/a', '/b']);

    await removeIgnoredPaths(['/a'], file);
    expect((await loadConfig(file)).ignoredPaths).toEqual(['/b']);
  });
});
