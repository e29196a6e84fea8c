import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm, readdir, symlink } from 'fs/promises';
import { realpathSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { CleanerErrorKind, DeletionCandidate } from '../types.js';
import { createSafetyPolicy, type SafetyPolicy } from '../utils/path-validator.js';
import { createDirectoryTrash, type TrashOutcome, type TrashService } from '../utils/trash.js';
import { exists } from '../utils/fs.js';
import { deletedPaths, executeDeletion } from './deletion-executor.js';

function recordingTrash(failures: Record<string, { kind: CleanerErrorKind; reason: string }> = {}) {
  const moved: string[] = [];
  const trash: TrashService = {
    async moveToTrash(path): Promise<TrashOutcome> {
      const failure = failures[path];
      if (failure) return { ok: false, ...failure };
      moved.push(path);
      return { ok: true, destination: `/trash/${path}` };
    },
  };
  return { trash, moved };
}

describe('executeDeletion', () => {
  let home: string;
  let caches: string;
  let policy: SafetyPolicy;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    home = await mkdtemp(join(tmpdir(), 'diskwarden-exec-'));
    caches = join(home, 'Library', 'Caches');
    await mkdir(join(caches, 'a'), { recursive: true });
    await mkdir(join(caches, 'b'));
    await mkdir(join(home, 'Library', 'Logs'));
    await writeFile(join(home, 'Library', 'Logs', 'c.log'), 'log');
    policy = createSafetyPolicy({ homeDir: home });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(home, { recursive: true, force: true });
  });

  it('should count successes, failures and freed bytes across a mixed batch', async () => {
    const { trash, moved } = recordingTrash();
    const candidates: DeletionCandidate[] = [
      { path: join(caches, 'a'), size: 100 },
      { path: '/System', size: 999 },
      { path: join(caches, 'b'), size: 200 },
      { path: '~/Library/Caches/../../Documents', size: 5 },
      { path: '~/Library/Logs/c.log', size: 300 },
    ];

    const result = await executeDeletion(candidates, { trash, policy });

    expect(result.successCount).toBe(3);
    expect(result.failedCount).toBe(2);
    expect(result.freedBytes).toBe(600);
    expect(result.errors).toEqual([
      { path: '/System', kind: 'PolicyViolation', reason: 'Protected system path: /System' },
      {
        path: '~/Library/Caches/../../Documents',
        kind: 'PolicyViolation',
        reason: 'Path contains traversal sequences (..)',
      },
    ]);
    expect(moved).toEqual([join(caches, 'a'), join(caches, 'b'), join(home, 'Library', 'Logs', 'c.log')]);
  });

  it('should hand only safe entries to the trash', async () => {
    await mkdir(join(caches, 'AppX'));
    await mkdir(join(caches, 'AppY'));
    const { trash, moved } = recordingTrash();

    const result = await executeDeletion(
      [
        { path: '~/Library/Caches/AppX', size: 10 },
        { path: '/System', size: 10 },
        { path: '~/Library/Caches/../../etc/passwd', size: 10 },
        { path: '~/Library/Caches/AppY', size: 10 },
      ],
      { trash, policy }
    );

    expect(moved).toEqual([join(caches, 'AppX'), join(caches, 'AppY')]);
    expect(result.successCount).toBe(2);
    expect(result.errors.map((e) => e.path)).toEqual(['/System', '~/Library/Caches/../../etc/passwd']);
  });

  it('should report malformed input and vanished paths without touching them', async () => {
    const { trash, moved } = recordingTrash();

    const result = await executeDeletion(
      [
        { path: '   ', size: 1 },
        { path: join(caches, 'gone'), size: 1 },
      ],
      { trash, policy }
    );

    expect(moved).toEqual([]);
    expect(result.errors).toEqual([
      { path: '   ', kind: 'InvalidInput', reason: 'Invalid or malformed path' },
      { path: join(caches, 'gone'), kind: 'NotFound', reason: 'Path does not exist' },
    ]);
  });

  it('should keep going after the trash refuses an item', async () => {
    const { trash, moved } = recordingTrash({
      [join(caches, 'a')]: { kind: 'PermissionDenied', reason: 'EACCES: permission denied' },
    });

    const result = await executeDeletion(
      [
        { path: join(caches, 'a'), size: 100 },
        { path: join(caches, 'b'), size: 200 },
      ],
      { trash, policy }
    );

    expect(result).toEqual({
      successCount: 1,
      failedCount: 1,
      freedBytes: 200,
      errors: [{ path: join(caches, 'a'), kind: 'PermissionDenied', reason: 'EACCES: permission denied' }],
    });
    expect(moved).toEqual([join(caches, 'b')]);
  });

  it('should record a trash service that throws', async () => {
    const trash: TrashService = {
      async moveToTrash() {
        throw Object.assign(new Error('EPERM: operation not permitted'), { code: 'EPERM' });
      },
    };

    const result = await executeDeletion([{ path: join(caches, 'a'), size: 100 }], { trash, policy });

    expect(result.errors).toEqual([
      { path: join(caches, 'a'), kind: 'PermissionDenied', reason: 'EPERM: operation not permitted' },
    ]);
    expect(result.freedBytes).toBe(0);
  });

  it('should report progress once per candidate', async () => {
    const { trash } = recordingTrash();
    const onProgress = vi.fn();

    await executeDeletion(
      [
        { path: join(caches, 'a'), size: 1 },
        { path: '/System', size: 1 },
      ],
      { trash, policy, onProgress }
    );

    expect(onProgress.mock.calls.map(([completed, total]) => [completed, total])).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });

  it('should leave files reached through a linked cache folder alone', async () => {
    const outside = await mkdtemp(join(tmpdir(), 'diskwarden-outside-'));
    await writeFile(join(outside, 'precious.txt'), 'keep');
    await symlink(outside, join(caches, 'link'));
    const { trash, moved } = recordingTrash();

    try {
      const result = await executeDeletion([{ path: join(caches, 'link', 'precious.txt'), size: 4 }], { trash, policy });

      expect(moved).toEqual([]);
      expect(result.errors).toEqual([
        {
          path: join(caches, 'link', 'precious.txt'),
          kind: 'PolicyViolation',
          reason: `Symlink points to a protected location: ${join(realpathSync(outside), 'precious.txt')}`,
        },
      ]);
      expect(await exists(join(outside, 'precious.txt'))).toBe(true);
    } finally {
      await rm(outside, { recursive: true, force: true });
    }
  });

  it('should move files into a trash directory', async () => {
    const trashDir = join(home, '.Trash');
    const result = await executeDeletion([{ path: join(home, 'Library', 'Logs', 'c.log'), size: 3 }], {
      trash: createDirectoryTrash(trashDir),
      policy,
    });

    expect(result.successCount).toBe(1);
    expect(await exists(join(home, 'Library', 'Logs', 'c.log'))).toBe(false);
    expect(await readdir(trashDir)).toEqual(['c.log']);
  });
});

describe('deletedPaths', () => {
  it('should return candidates without an error entry', () => {
    const candidates = [
      { path: '/a', size: 1 },
      { path: '/b', size: 1 },
    ];
    const paths = deletedPaths(candidates, {
      successCount: 1,
      failedCount: 1,
      freedBytes: 1,
      errors: [{ path: '/b', kind: 'PolicyViolation', reason: 'x' }],
    });

    expect([...paths]).toEqual(['/a']);
  });
});
