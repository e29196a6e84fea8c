import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm, symlink } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { exists, getDirectorySize, getItemInfo, getSize } from './fs.js';
import { CleanerError } from './errors.js';

describe('fs utils', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'diskwarden-fs-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  describe('getSize', () => {
    it('should sum every file two levels deep', async () => {
      await mkdir(join(root, 'a', 'b'), { recursive: true });
      await writeFile(join(root, 'top.bin'), Buffer.alloc(100));
      await writeFile(join(root, 'a', 'mid.bin'), Buffer.alloc(250));
      await writeFile(join(root, 'a', 'b', 'deep.bin'), Buffer.alloc(4096));

      expect(await getSize(root)).toBe(4446);
    });

    it('should return the size of a single file', async () => {
      const file = join(root, 'one.bin');
      await writeFile(file, Buffer.alloc(321));

      expect(await getSize(file)).toBe(321);
    });

    it('should neither follow nor count symbolic links', async () => {
      const outside = await mkdtemp(join(tmpdir(), 'diskwarden-outside-'));
      try {
        await writeFile(join(outside, 'big.bin'), Buffer.alloc(10_000));
        await writeFile(join(root, 'own.bin'), Buffer.alloc(10));
        await symlink(outside, join(root, 'dir-link'));
        await symlink(join(outside, 'big.bin'), join(root, 'file-link'));

        expect(await getSize(root)).toBe(10);
        expect(await getSize(join(root, 'file-link'))).toBe(0);
      } finally {
        await rm(outside, { recursive: true, force: true });
      }
    });

    it('should throw NotFound for a missing path', async () => {
      await expect(getSize(join(root, 'missing'))).rejects.toMatchObject({ kind: 'NotFound' });
    });
  });

  describe('getDirectorySize', () => {
    it('should throw EnumerationFailure when the directory cannot be listed', async () => {
      const error = await getDirectorySize(join(root, 'missing')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CleanerError);
      expect(error).toMatchObject({ kind: 'EnumerationFailure', path: join(root, 'missing') });
    });

    it('should return zero for an empty directory', async () => {
      expect(await getDirectorySize(root)).toBe(0);
    });
  });

  describe('getItemInfo', () => {
    it('should describe a directory', async () => {
      const dir = join(root, 'com.example.app');
      await mkdir(dir);
      await writeFile(join(dir, 'cache.db'), Buffer.alloc(64));

      const info = await getItemInfo(dir);

      expect(info.name).toBe('com.example.app');
      expect(info.size).toBe(64);
      expect(info.isDirectory).toBe(true);
      expect(info.modifiedAt).toBeInstanceOf(Date);
    });
  });

  describe('exists', () => {
    it('should report dangling links as existing', async () => {
      await symlink(join(root, 'nowhere'), join(root, 'dangling'));

      expect(await exists(join(root, 'dangling'))).toBe(true);
      expect(await exists(join(root, 'nowhere'))).toBe(false);
    });
  });
});
