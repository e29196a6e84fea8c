import { readFile, writeFile, access, mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import { homedir } from 'os';
import type { CleanupCategoryId } from '../types.js';

const CONFIG_PATHS = [
  join(homedir(), '.diskwardenrc'),
  join(homedir(), '.config', 'diskwarden', 'config.json'),
];

export interface Config {
  defaultCategories?: CleanupCategoryId[];
  parallelScans?: boolean;
  concurrency?: number;
  ignoredPaths?: string[];        // Ignored files
  ignoredFolders?: string[];      // Ignored folders (entire directory trees)
  ignoredCategories?: string[];   // Ignored category IDs (skip entire category)
  includeUnsafeDefinitions?: boolean;
  includeRootDefinitions?: boolean;
  expandNonTerminalPatterns?: boolean;
  historyLimit?: number;
}

const DEFAULT_CONFIG: Config = {
  parallelScans: true,
  concurrency: 4,
  ignoredPaths: [],
  ignoredFolders: [],
  ignoredCategories: [],
  includeUnsafeDefinitions: false,
  includeRootDefinitions: false,
  expandNonTerminalPatterns: false,
  historyLimit: 50,
};

let cachedConfig: Config | null = null;

export function clearConfigCache(): void {
  cachedConfig = null;
}

export function getDefaultConfig(): Config {
  return { ...DEFAULT_CONFIG };
}

export async function loadConfig(configPath?: string): Promise<Config> {
  if (cachedConfig && !configPath) {
    return cachedConfig;
  }

  const paths = configPath ? [configPath] : CONFIG_PATHS;

  for (const path of paths) {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch {
      continue;
    }

    try {
      const parsed: Partial<Config> = JSON.parse(content);
      const config = { ...DEFAULT_CONFIG, ...parsed };
      if (!configPath) cachedConfig = config;
      return config;
    } catch (error) {
      console.warn(`[Config] Ignoring malformed config at ${path}:`, error instanceof Error ? error.message : error);
    }
  }

  const fallback = getDefaultConfig();
  if (!configPath) cachedConfig = fallback;
  return fallback;
}

export async function saveConfig(config: Config, configPath?: string): Promise<void> {
  const path = configPath ?? CONFIG_PATHS[0];
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(config, null, 2));
  if (!configPath) cachedConfig = config;
}

export async function configExists(): Promise<boolean> {
  for (const path of CONFIG_PATHS) {
    try {
      await access(path);
      return true;
    } catch {
      continue;
    }
  }
  return false;
}

export async function initConfig(configPath = CONFIG_PATHS[0]): Promise<string> {
  await saveConfig(getDefaultConfig(), configPath);
  return configPath;
}

export async function addIgnoredPaths(paths: string[], configPath?: string): Promise<Config> {
  const config = await loadConfig(configPath);
  const ignored = new Set(config.ignoredPaths ?? []);
  for (const p of paths) ignored.add(p);

  const updated = { ...config, ignoredPaths: [...ignored] };
  await saveConfig(updated, configPath);
  return updated;
}

export async function removeIgnoredPaths(paths: string[], configPath?: string): Promise<Config> {
  const config = await loadConfig(configPath);
  const updated = { ...config, ignoredPaths: (config.ignoredPaths ?? []).filter((p) => !paths.includes(p)) };
  await saveConfig(updated, configPath);
  return updated;
}

export function getConfigPaths(): readonly string[] {
  return CONFIG_PATHS;
}
