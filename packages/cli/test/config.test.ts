import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { defaultConfig, ensureDataDir, loadConfig, mergeConfig } from '../src/config';

describe('mergeConfig', () => {
  it('uses defaults for a missing or malformed file', () => {
    expect(mergeConfig('/repo', null)).toEqual({
      tickRateMs: 250,
      logLevel: 'info',
      databasePath: '/repo/.local-review/reviews.db',
      checkBranchStatusOnStart: true,
    });
    expect(mergeConfig('/repo', 'not an object')).toEqual(defaultConfig('/repo'));
  });

  it('takes valid values and resolves the database path against the repository', () => {
    expect(
      mergeConfig('/repo', { tickRateMs: 100, logLevel: 'debug', databasePath: 'data/reviews.db', checkBranchStatusOnStart: false }),
    ).toEqual({
      tickRateMs: 100,
      logLevel: 'debug',
      databasePath: '/repo/data/reviews.db',
      checkBranchStatusOnStart: false,
    });
  });

  it('clamps or drops invalid values', () => {
    expect(mergeConfig('/repo', { tickRateMs: 1 }).tickRateMs).toBe(16);
    expect(mergeConfig('/repo', { tickRateMs: 100000 }).tickRateMs).toBe(5000);
    expect(mergeConfig('/repo', { tickRateMs: 'fast' }).tickRateMs).toBe(250);
    expect(mergeConfig('/repo', { logLevel: 'verbose' }).logLevel).toBe('info');
    expect(mergeConfig('/repo', { checkBranchStatusOnStart: 'yes' }).checkBranchStatusOnStart).toBe(true);
  });
});

describe('config files', () => {
  let repoRoot: string;

  beforeEach(async () => {
    repoRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'local-review-config-'));
  });

  afterEach(async () => {
    await fs.rm(repoRoot, { recursive: true, force: true });
  });

  it('falls back to defaults without a config file', async () => {
    expect(await loadConfig(repoRoot)).toEqual(defaultConfig(repoRoot));
  });

  it('reads the config file', async () => {
    await ensureDataDir(repoRoot);
    await fs.writeFile(path.join(repoRoot, '.local-review', 'config.json'), JSON.stringify({ tickRateMs: 500 }));

    expect((await loadConfig(repoRoot)).tickRateMs).toBe(500);
  });

  it('rejects a config file that is not JSON', async () => {
    await ensureDataDir(repoRoot);
    await fs.writeFile(path.join(repoRoot, '.local-review', 'config.json'), '{ tickRateMs: ');

    await expect(loadConfig(repoRoot)).rejects.toThrow(/^Invalid config file /);
  });

  it('creates the data directory and ignores it in git once', async () => {
    await ensureDataDir(repoRoot);
    await ensureDataDir(repoRoot);

    expect((await fs.stat(path.join(repoRoot, '.local-review'))).isDirectory()).toBe(true);
    expect(await fs.readFile(path.join(repoRoot, '.gitignore'), 'utf-8')).toBe('# local-review state\n.local-review/\n');
  });

  it('appends to an existing .gitignore', async () => {
    await fs.writeFile(path.join(repoRoot, '.gitignore'), 'node_modules\n');

    await ensureDataDir(repoRoot);

    expect(await fs.readFile(path.join(repoRoot, '.gitignore'), 'utf-8')).toBe(
      'node_modules\n\n# local-review state\n.local-review/\n',
    );
  });
});
