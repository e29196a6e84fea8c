import { readlinkSync, realpathSync } from 'fs';
import { homedir } from 'os';
import { basename, dirname, isAbsolute, join, posix, resolve } from 'path';
import type { ValidationResult } from '../types.js';
import { expandHome } from '../scanners/pattern-expander.js';

/**
 * Deny-by-default deletion policy.
 *
 * Only strict descendants of an allow-listed directory may be deleted. Listing
 * the safe zones is tractable; listing every dangerous path is not. The policy
 * is a plain value so tests (and other users) can build one around any home
 * directory without touching process state.
 */
export interface SafetyPolicy {
  readonly homeDir: string;
  readonly protectedPaths: ReadonlySet<string>;
  readonly protectedHomePaths: ReadonlySet<string>;
  readonly allowedBasePaths: readonly AllowedBase[];
  /** Returns the raw link target, or undefined when `path` is not a symlink. */
  readonly readLink: (path: string) => string | undefined;
  /** Resolves every link in a directory path, or undefined when it does not exist. */
  readonly realPath: (path: string) => string | undefined;
}

export interface AllowedBase {
  readonly path: string;
  /** The directory itself may be deleted, not only its contents. */
  readonly allowSelf: boolean;
}

export interface PolicyOptions {
  homeDir?: string;
  readLink?: (path: string) => string | undefined;
  realPath?: (path: string) => string | undefined;
}

const SYSTEM_PROTECTED_PATHS = [
  '/',
  '/System',
  '/Library',
  '/Users',
  '/Applications',
  '/bin',
  '/sbin',
  '/usr',
  '/var',
  '/private',
  '/private/var',
  '/private/etc',
  '/private/tmp',
  '/etc',
  '/tmp',
  '/cores',
  '/dev',
  '/opt',
  '/Volumes',
];

const PROTECTED_HOME_SUBDIRS = ['Desktop', 'Documents', 'Downloads', 'Movies', 'Music', 'Pictures', 'Public'];

const USER_ALLOWED_SUBPATHS = [
  'Library/Caches',
  'Library/Logs',
  'Library/Application Support',
  'Library/Containers',
  'Library/Saved Application State',
  'Library/Cookies',
  'Library/HTTPStorages',
  'Library/WebKit',
  'Library/Preferences',
  'Library/Group Containers',
  'Library/Application Scripts',
  '.Trash',

  // Developer tools
  'Library/Developer/Xcode/DerivedData',
  'Library/Developer/Xcode/Archives',
  'Library/Developer/Xcode/iOS DeviceSupport',
  'Library/Developer/CoreSimulator',

  // Package managers
  '.npm',
  '.cache',
  '.local/share/Trash',
];

// Root-owned; deleting here also needs administrator rights.
const SYSTEM_ALLOWED_PATHS = [
  '/Library/Caches',
  '/Library/Logs',
  '/Library/LaunchAgents',
  '/Library/LaunchDaemons',
  '/Library/Application Support',
  '/private/var/folders',
];

const LEAF_DIRECTORY_NAMES = new Set(['DerivedData', '.Trash', 'Trash']);
const CACHE_OR_TRASH_SEGMENTS = new Set(['Caches', '.cache', '.Trash', '.Trashes', 'Trash']);

function defaultReadLink(path: string): string | undefined {
  try {
    return readlinkSync(path);
  } catch {
    // EINVAL: not a link. ENOENT: nothing there yet.
    return undefined;
  }
}

function defaultRealPath(path: string): string | undefined {
  try {
    return realpathSync(path);
  } catch {
    // ENOENT: the directory is not there, so nothing below it can be moved.
    return undefined;
  }
}

export function createSafetyPolicy(options: PolicyOptions = {}): SafetyPolicy {
  const home = normalizePath(options.homeDir ?? homedir());

  const allowed = [...USER_ALLOWED_SUBPATHS.map((sub) => join(home, sub)), ...SYSTEM_ALLOWED_PATHS].map(
    (path): AllowedBase => ({ path, allowSelf: LEAF_DIRECTORY_NAMES.has(basename(path)) })
  );

  return Object.freeze({
    homeDir: home,
    protectedPaths: new Set([...SYSTEM_PROTECTED_PATHS, home]),
    protectedHomePaths: new Set(PROTECTED_HOME_SUBDIRS.map((sub) => join(home, sub))),
    allowedBasePaths: Object.freeze(allowed),
    readLink: options.readLink ?? defaultReadLink,
    realPath: options.realPath ?? defaultRealPath,
  });
}

let cachedPolicy: SafetyPolicy | null = null;

/** Policy for the current user, built once per process. */
export function defaultSafetyPolicy(): SafetyPolicy {
  if (!cachedPolicy || cachedPolicy.homeDir !== normalizePath(homedir())) {
    cachedPolicy = createSafetyPolicy();
  }
  return cachedPolicy;
}

/** Collapses `.`, duplicate and trailing separators. Does not resolve links. */
export function normalizePath(path: string): string {
  const normalized = posix.normalize(path);
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

function hasTraversal(path: string): boolean {
  return path.split('/').includes('..');
}

function isUnder(path: string, base: string): boolean {
  if (base === '/') return path.startsWith('/');
  return path === base || path.startsWith(`${base}/`);
}

function isInCacheOrTrash(path: string): boolean {
  return path.split('/').some((segment) => CACHE_OR_TRASH_SEGMENTS.has(segment));
}

function isWithinBases(path: string, bases: readonly AllowedBase[]): boolean {
  return bases.some((base) => path.startsWith(`${base.path}/`) || (base.allowSelf && path === base.path));
}

function isWithinAllowed(path: string, policy: SafetyPolicy): boolean {
  return isWithinBases(path, policy.allowedBasePaths);
}

/**
 * Where the entry really lives once links in its parent folders are followed.
 * Undefined when the parent does not exist.
 */
function realLocation(path: string, policy: SafetyPolicy): string | undefined {
  const parent = policy.realPath(dirname(path));
  return parent === undefined ? undefined : normalizePath(join(parent, basename(path)));
}

function isWithinRealAllowed(path: string, policy: SafetyPolicy): boolean {
  const bases = policy.allowedBasePaths.map((base) => ({ ...base, path: policy.realPath(base.path) ?? base.path }));
  return isWithinBases(path, bases);
}

/**
 * Decides whether `path` may be deleted. Rules run in order and the first
 * match wins; `safe` is only returned when every rule passes. A leading `~`
 * is expanded against the policy's home directory.
 *
 * Since `/` is protected, a symlink is refused whenever its target lies
 * outside a cache or trash subtree. Links in parent folders are followed: the
 * real location must still sit inside an allowed tree, because moving the
 * entry moves whatever those links point at.
 */
export function validate(path: string, policy: SafetyPolicy = defaultSafetyPolicy()): ValidationResult {
  const trimmed = path.trim();
  if (trimmed.length === 0 || trimmed.includes('\0')) {
    return { kind: 'invalidPath' };
  }

  const expanded = expandHome(trimmed, policy.homeDir);
  const normalized = normalizePath(expanded);

  // Checked on the raw string: normalizing would fold `..` away.
  if (hasTraversal(trimmed)) {
    return { kind: 'pathTraversal' };
  }

  if (!isAbsolute(expanded)) {
    return { kind: 'invalidPath' };
  }

  if (policy.protectedPaths.has(normalized) || policy.protectedHomePaths.has(normalized)) {
    return { kind: 'protectedPath', path: normalized };
  }

  if (!isWithinAllowed(normalized, policy)) {
    return { kind: 'outsideAllowedPaths' };
  }

  const real = realLocation(normalized, policy);
  if (real !== undefined && real !== normalized) {
    const protectedReal = policy.protectedPaths.has(real) || policy.protectedHomePaths.has(real);
    if (protectedReal || !isWithinRealAllowed(real, policy)) {
      return { kind: 'symlinkToProtected', target: real };
    }
  }

  const target = policy.readLink(normalized);
  if (target !== undefined) {
    const resolved = normalizePath(resolve(dirname(normalized), target));
    const protectedTarget = [...policy.protectedPaths].some((p) => isUnder(resolved, p));
    if (protectedTarget && !isInCacheOrTrash(resolved)) {
      return { kind: 'symlinkToProtected', target: resolved };
    }
  }

  return { kind: 'safe' };
}

export function isSafe(result: ValidationResult): result is { kind: 'safe' } {
  return result.kind === 'safe';
}

export function validateBatch(
  paths: readonly string[],
  policy: SafetyPolicy = defaultSafetyPolicy()
): { path: string; result: ValidationResult }[] {
  return paths.map((path) => ({ path, result: validate(path, policy) }));
}

export function filterSafePaths(paths: readonly string[], policy: SafetyPolicy = defaultSafetyPolicy()): string[] {
  return paths.filter((path) => isSafe(validate(path, policy)));
}

export function describeValidation(result: ValidationResult): string {
  switch (result.kind) {
    case 'safe':
      return 'Path is safe to delete';
    case 'protectedPath':
      return `Protected system path: ${result.path}`;
    case 'outsideAllowedPaths':
      return 'Path is outside allowed deletion directories';
    case 'symlinkToProtected':
      return `Symlink points to a protected location: ${result.target}`;
    case 'pathTraversal':
      return 'Path contains traversal sequences (..)';
    case 'doesNotExist':
      return 'Path does not exist';
    case 'invalidPath':
      return 'Invalid or malformed path';
  }
}
