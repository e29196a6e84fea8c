import { readdir } from 'fs/promises';
import type { Dirent } from 'fs';
import { randomUUID } from 'crypto';
import { join } from 'path';
import type {
  InstalledApp,
  LeftoverCategory,
  LeftoverConfidence,
  LeftoverFile,
  LeftoverSearchRoot,
  ScanIssue,
} from '../types.js';
import { allLeftoverRoots } from '../catalog/leftover-paths.js';
import { runWithConcurrency } from '../utils/concurrency.js';
import { errorMessage, kindFromError } from '../utils/errors.js';
import { getItemInfo } from '../utils/fs.js';

export const LEFTOVER_CONFIDENCE_ORDER: readonly LeftoverConfidence[] = ['low', 'medium', 'high'];

export function compareConfidence(a: LeftoverConfidence, b: LeftoverConfidence): number {
  return LEFTOVER_CONFIDENCE_ORDER.indexOf(a) - LEFTOVER_CONFIDENCE_ORDER.indexOf(b);
}

const REVERSE_DNS_PREFIXES = new Set(['com', 'org', 'net', 'io', 'co', 'app', 'me', 'dev']);
const STRIPPED_SUFFIXES = ['.plist', '.savedState', '.binarycookies'];
const GROUP_PREFIX = 'group.';

// Names shorter than this match far too much as substrings.
const MIN_FUZZY_LENGTH = 3;
const MIN_DEVELOPER_LENGTH = 4;

// Apple and OS-owned residue is never an orphan.
const SYSTEM_PATTERNS = [
  'com.apple', 'apple', 'macos', 'finder', 'safari', 'mail.app', 'calendar', 'contacts',
  'photos', 'itunes', 'appstore', 'icloud', 'cloudkit', 'siri', 'spotlight', 'launchservices',
  'loginitems', 'backgrounditems', 'cloudd', 'xcode', 'instruments', 'simulator', 'keychain',
  'bluetooth', 'systempreferences', 'systemsettings', 'textedit', 'quicktime', 'terminal',
];

export function extractToken(name: string): string {
  let token = name;
  for (const suffix of STRIPPED_SUFFIXES) {
    if (token.endsWith(suffix)) {
      token = token.slice(0, -suffix.length);
      break;
    }
  }
  return token.startsWith(GROUP_PREFIX) ? token.slice(GROUP_PREFIX.length) : token;
}

export function isReverseDns(token: string): boolean {
  const parts = token.split('.');
  return parts.length >= 2 && parts.every((p) => p.length > 0) && REVERSE_DNS_PREFIXES.has(parts[0].toLowerCase());
}

/** `com.microsoft.Word` -> `microsoft` */
export function developerSegment(identifier: string): string | undefined {
  const parts = identifier.split('.');
  if (parts.length < 2 || parts[1].length === 0) return undefined;
  return parts[1].toLowerCase();
}

function normalizeName(value: string): string {
  return value.toLowerCase().replace(/[\s_-]+/g, '');
}

function isSystemItem(name: string): boolean {
  const lower = name.toLowerCase();
  return SYSTEM_PATTERNS.some((pattern) => lower.includes(pattern));
}

/** Lookup tables derived once per sweep from the installed-app snapshot. */
export interface AppIndex {
  readonly identifiers: ReadonlySet<string>;
  readonly names: readonly string[];
  readonly developers: ReadonlySet<string>;
}

export function buildAppIndex(
  installed: readonly Pick<InstalledApp, 'name' | 'bundleIdentifier'>[],
  knownIdentifiers: readonly string[] = []
): AppIndex {
  const identifiers = new Set(installed.map((app) => app.bundleIdentifier.toLowerCase()));
  const names = installed.map((app) => normalizeName(app.name)).filter((n) => n.length >= MIN_FUZZY_LENGTH);
  const developers = new Set<string>();
  for (const id of [...installed.map((app) => app.bundleIdentifier), ...knownIdentifiers]) {
    const developer = isReverseDns(id) ? developerSegment(id) : undefined;
    if (developer && developer.length >= MIN_DEVELOPER_LENGTH && developer !== 'apple') {
      developers.add(developer);
    }
  }
  return { identifiers, names, developers };
}

export type Classification =
  | { kind: 'owned'; confidence: 'high'; bundleId: string }
  | { kind: 'live' }
  | { kind: 'system' }
  | { kind: 'orphan'; confidence: 'medium' | 'low'; relatedBundleId?: string }
  | { kind: 'unknown' };

/**
 * Classifies one library entry by name. Rules, first match wins:
 * exact identifier (high, owned), sub-identifier or app name (live),
 * Apple/system residue, same developer as a known identifier (medium),
 * developer name somewhere in the file name (low). Anything else carries no
 * owner signal and is left alone.
 */
export function classifyEntry(name: string, index: AppIndex): Classification {
  const token = extractToken(name);
  const lowerToken = token.toLowerCase();

  if (index.identifiers.has(lowerToken)) {
    return { kind: 'owned', confidence: 'high', bundleId: token };
  }

  for (const id of index.identifiers) {
    if (lowerToken.startsWith(`${id}.`) || id.startsWith(`${lowerToken}.`)) {
      return { kind: 'live' };
    }
  }

  if (isSystemItem(name)) {
    return { kind: 'system' };
  }

  const normalized = normalizeName(name);
  if (index.names.some((appName) => normalized.includes(appName))) {
    return { kind: 'live' };
  }

  const reverseDns = isReverseDns(token);
  const developer = reverseDns ? developerSegment(token) : undefined;
  if (developer && index.developers.has(developer)) {
    return { kind: 'orphan', confidence: 'medium', relatedBundleId: token };
  }

  for (const known of index.developers) {
    if (normalized.includes(known)) {
      return { kind: 'orphan', confidence: 'low', relatedBundleId: reverseDns ? token : undefined };
    }
  }

  return { kind: 'unknown' };
}

export interface OrphanScanInput {
  installedApps: readonly Pick<InstalledApp, 'name' | 'bundleIdentifier'>[];
  /** Identifiers of apps seen installed in the past. */
  knownIdentifiers?: readonly string[];
  roots?: readonly LeftoverSearchRoot[];
}

export interface OrphanScanOptions {
  signal?: AbortSignal;
  concurrency?: number;
  /** Called once per finished root with that root's complete, frozen results. */
  onCategory?: (root: LeftoverSearchRoot, files: readonly LeftoverFile[]) => void;
  now?: Date;
}

export interface OrphanScanResult {
  files: readonly LeftoverFile[];
  errors: ScanIssue[];
  cancelled: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;

async function scanRoot(
  root: LeftoverSearchRoot,
  index: AppIndex,
  now: Date
): Promise<{ files: LeftoverFile[]; errors: ScanIssue[] }> {
  const files: LeftoverFile[] = [];
  const errors: ScanIssue[] = [];

  let entries: Dirent[];
  try {
    entries = await readdir(root.path, { withFileTypes: true });
  } catch (error) {
    // Missing roots are normal (no Cookies folder, no system access).
    if (kindFromError(error) !== 'NotFound') {
      errors.push({ path: root.path, kind: 'EnumerationFailure', reason: errorMessage(error) });
    }
    return { files, errors };
  }

  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;

    const classification = classifyEntry(entry.name, index);
    if (classification.kind !== 'orphan') continue;

    const path = join(root.path, entry.name);
    let size = 0;
    let modifiedAt: Date | undefined;
    try {
      const info = await getItemInfo(path);
      size = info.size;
      modifiedAt = info.modifiedAt;
    } catch (error) {
      errors.push({ path, kind: kindFromError(error), reason: errorMessage(error) });
    }

    files.push(
      Object.freeze({
        id: randomUUID(),
        path,
        name: entry.name,
        size,
        category: root.category,
        confidence: classification.confidence,
        relatedBundleId: classification.relatedBundleId,
        modifiedAt,
        daysSinceModified: modifiedAt ? Math.floor((now.getTime() - modifiedAt.getTime()) / DAY_MS) : undefined,
      })
    );
  }

  return { files, errors };
}

/**
 * Sweeps the leftover roots for residue of apps that are no longer
 * installed. Roots are disjoint and read-only, so they are scanned
 * concurrently; cancellation is honoured between roots. No age or size
 * filtering happens here.
 */
export async function scanOrphans(input: OrphanScanInput, options: OrphanScanOptions = {}): Promise<OrphanScanResult> {
  const roots = input.roots ?? allLeftoverRoots();
  const index = buildAppIndex(input.installedApps, input.knownIdentifiers);
  const now = options.now ?? new Date();
  let cancelled = false;

  console.log(`[Orphans] Scanning ${roots.length} locations against ${index.identifiers.size} installed apps`);

  const tasks = roots.map((root) => async () => {
    if (options.signal?.aborted) {
      cancelled = true;
      return null;
    }
    const result = await scanRoot(root, index, now);
    options.onCategory?.(root, Object.freeze([...result.files]));
    return result;
  });

  const results = await runWithConcurrency(tasks, options.concurrency ?? 4);

  const files: LeftoverFile[] = [];
  const errors: ScanIssue[] = [];
  for (const result of results) {
    if (!result) continue;
    files.push(...result.files);
    errors.push(...result.errors);
  }
  files.sort((a, b) => b.size - a.size);

  console.log(`[Orphans] Found ${files.length} orphaned items${cancelled ? ' (cancelled)' : ''}`);

  return { files: Object.freeze(files), errors, cancelled };
}

export function groupByCategory(files: readonly LeftoverFile[]): Map<LeftoverCategory, LeftoverFile[]> {
  const groups = new Map<LeftoverCategory, LeftoverFile[]>();
  for (const file of files) {
    const group = groups.get(file.category);
    if (group) {
      group.push(file);
    } else {
      groups.set(file.category, [file]);
    }
  }
  return groups;
}
