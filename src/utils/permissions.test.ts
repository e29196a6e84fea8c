import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FolderAccessInfo, FolderAccessStatus, ProbeOutcome } from '../types.js';
import { buildPermissionCatalog, createFolder } from '../catalog/permission-folders.js';
import {
  PermissionCatalog,
  SETTINGS_PANES,
  hasFullDiskAccess,
  rollupStatus,
  settingsPaneFor,
  summarizeCategory,
  type AccessProbe,
} from './permissions.js';

const HOME = '/Users/test';

function folderWith(status: FolderAccessStatus, name = 'Folder'): FolderAccessInfo {
  return { ...createFolder({ path: `~/${name}`, displayName: name }, HOME), status };
}

function fakeProbe(outcomes: Record<string, ProbeOutcome> = {}, fallback: ProbeOutcome = 'accessible') {
  const probed: string[] = [];
  const probe: AccessProbe = {
    async probe(path) {
      probed.push(path);
      return outcomes[path] ?? fallback;
    },
  };
  return { probe, probed };
}

describe('rollupStatus', () => {
  it('should be accessible only when every folder is', () => {
    expect(rollupStatus([])).toBe('accessible');
    expect(rollupStatus([folderWith('accessible'), folderWith('accessible')])).toBe('accessible');
    expect(rollupStatus([folderWith('accessible'), folderWith('notExists')])).toBe('denied');
    expect(rollupStatus([folderWith('accessible'), folderWith('unchecked')])).toBe('denied');
  });

  it('should report checking while any folder is mid-probe', () => {
    expect(rollupStatus([folderWith('denied'), folderWith('checking'), folderWith('accessible')])).toBe('checking');
  });
});

describe('summarizeCategory', () => {
  it('should count readable and existing folders', () => {
    const summary = summarizeCategory({
      type: 'applicationData',
      name: 'Application Data',
      folders: [folderWith('accessible'), folderWith('notExists'), folderWith('denied'), folderWith('unchecked')],
    });

    expect(summary).toEqual({ status: 'denied', accessible: 1, existing: 2, total: 4 });
  });
});

describe('PermissionCatalog', () => {
  let catalog: PermissionCatalog;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    catalog = new PermissionCatalog(buildPermissionCatalog(HOME));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should start with every folder unchecked', () => {
    expect(catalog.folders().every((f) => f.status === 'unchecked')).toBe(true);
    expect(catalog.lastChecked).toBeNull();
  });

  it('should leave consent-triggering folders unchecked on a startup pass', async () => {
    const { probe, probed } = fakeProbe();

    await catalog.runPass('startup', probe);

    const consent = catalog.folders().filter((f) => f.canTriggerConsentDialog);
    expect(consent.map((f) => f.displayName)).toEqual(['Downloads', 'Documents', 'Desktop']);
    expect(consent.every((f) => f.status === 'unchecked')).toBe(true);
    expect(probed).not.toContain(`${HOME}/Downloads`);
    expect(probed).toHaveLength(catalog.folders().length - 3);
    expect(
      catalog
        .folders()
        .filter((f) => !f.canTriggerConsentDialog)
        .every((f) => f.status === 'accessible')
    ).toBe(true);
  });

  it('should probe every folder on a full pass', async () => {
    const { probe, probed } = fakeProbe({ [`${HOME}/Documents`]: 'denied' });

    await catalog.runPass('full', probe);

    expect(probed).toHaveLength(catalog.folders().length);
    const userFolders = catalog.snapshot().find((c) => c.type === 'userFolders');
    expect(userFolders?.folders.map((f) => f.status)).toEqual(['accessible', 'denied', 'accessible']);
    expect(catalog.lastChecked).toBeInstanceOf(Date);
  });

  it('should mark a folder checking before probing it', async () => {
    const seen: FolderAccessStatus[] = [];
    const probe: AccessProbe = {
      async probe(path) {
        seen.push(catalog.folders().find((f) => f.path === path)?.status ?? 'unchecked');
        return 'notExists';
      },
    };

    await catalog.runPass('startup', probe);

    expect(seen.length).toBeGreaterThan(0);
    expect(seen.every((s) => s === 'checking')).toBe(true);
  });

  it('should publish a frozen snapshot on every transition', async () => {
    const desktop = catalog.folders().find((f) => f.displayName === 'Desktop');
    const transitions: FolderAccessStatus[] = [];
    const unsubscribe = catalog.subscribe((snapshot) => {
      expect(Object.isFrozen(snapshot)).toBe(true);
      const folder = snapshot.flatMap((c) => c.folders).find((f) => f.id === desktop?.id);
      if (folder && transitions[transitions.length - 1] !== folder.status) transitions.push(folder.status);
    });

    await catalog.runPass('full', fakeProbe().probe);
    unsubscribe();

    expect(transitions).toEqual(['unchecked', 'checking', 'accessible']);
  });

  it('should count a probe that throws as denied', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const probe: AccessProbe = {
      async probe() {
        throw new Error('boom');
      },
    };

    await catalog.runPass('startup', probe);

    const probedFolders = catalog.folders().filter((f) => !f.canTriggerConsentDialog);
    expect(probedFolders.every((f) => f.status === 'denied')).toBe(true);
  });

  it('should keep reporting checking until overlapping passes all finish', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const slow: AccessProbe = {
      async probe() {
        await gate;
        return 'accessible';
      },
    };

    const fullPass = catalog.runPass('full', slow);
    await catalog.runPass('startup', fakeProbe().probe);

    expect(catalog.isChecking).toBe(true);
    release();
    await fullPass;
    expect(catalog.isChecking).toBe(false);
  });

  it('should not replace a snapshot callers already hold', async () => {
    const before = catalog.snapshot();

    await catalog.runPass('startup', fakeProbe().probe);

    expect(before.flatMap((c) => c.folders).every((f) => f.status === 'unchecked')).toBe(true);
    expect(catalog.snapshot()).not.toBe(before);
  });
});

describe('hasFullDiskAccess', () => {
  it('should read the Mail library', async () => {
    const { probe } = fakeProbe({ [`${HOME}/Library/Mail`]: 'denied' });

    expect(await hasFullDiskAccess(probe, HOME)).toBe(false);
  });

  it('should fall back to Safari history when Mail is missing', async () => {
    const { probe, probed } = fakeProbe({ [`${HOME}/Library/Mail`]: 'notExists' });

    expect(await hasFullDiskAccess(probe, HOME)).toBe(true);
    expect(probed).toEqual([`${HOME}/Library/Mail`, `${HOME}/Library/Safari/History.db`]);
  });
});

describe('settingsPaneFor', () => {
  it('should point at the pane that grants access', () => {
    const folders = buildPermissionCatalog(HOME).flatMap((c) => c.folders);
    const mail = folders.find((f) => f.displayName === 'Mail Library');
    const downloads = folders.find((f) => f.displayName === 'Downloads');

    expect(mail && settingsPaneFor(mail)).toBe(SETTINGS_PANES.fullDiskAccess);
    expect(downloads && settingsPaneFor(downloads)).toBe(SETTINGS_PANES.filesAndFolders);
  });
});
