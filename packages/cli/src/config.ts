import fs from 'fs/promises';
import path from 'path';
import type { LocalReviewConfig } from '@local-review/shared';
import { isLogLevel } from './logging';
import { getConfigPath, getDatabasePath, getDataDir } from './utils/paths';

const MIN_TICK_RATE_MS = 16;
const MAX_TICK_RATE_MS = 5000;

export function defaultConfig(repoRoot: string): LocalReviewConfig {
  return {
    tickRateMs: 250,
    logLevel: 'info',
    databasePath: getDatabasePath(repoRoot),
    checkBranchStatusOnStart: true,
  };
}

function clampInt(value: unknown, min: number, max: number, fallback: number): number {
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(n)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merges a parsed config file over the defaults. Unknown keys are dropped and
 * values of the wrong type fall back to the default.
 */
export function mergeConfig(repoRoot: string, raw: unknown): LocalReviewConfig {
  const defaults = defaultConfig(repoRoot);
  if (!isRecord(raw)) return defaults;

  return {
    tickRateMs:
      raw.tickRateMs === undefined
        ? defaults.tickRateMs
        : clampInt(raw.tickRateMs, MIN_TICK_RATE_MS, MAX_TICK_RATE_MS, defaults.tickRateMs),
    logLevel: isLogLevel(raw.logLevel) ? raw.logLevel : defaults.logLevel,
    databasePath:
      typeof raw.databasePath === 'string' && raw.databasePath.length > 0
        ? path.resolve(repoRoot, raw.databasePath)
        : defaults.databasePath,
    checkBranchStatusOnStart:
      typeof raw.checkBranchStatusOnStart === 'boolean'
        ? raw.checkBranchStatusOnStart
        : defaults.checkBranchStatusOnStart,
  };
}

export async function loadConfig(repoRoot: string): Promise<LocalReviewConfig> {
  try {
    const content = await fs.readFile(getConfigPath(repoRoot), 'utf-8');
    return mergeConfig(repoRoot, JSON.parse(content));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return defaultConfig(repoRoot);
    }
    throw new Error(`Invalid config file ${getConfigPath(repoRoot)}: ${error instanceof Error ? error.message : error}`);
  }
}

/**
 * Creates .local-review/ and makes sure git ignores it.
 */
export async function ensureDataDir(repoRoot: string): Promise<void> {
  await fs.mkdir(getDataDir(repoRoot), { recursive: true });

  const gitignorePath = path.join(repoRoot, '.gitignore');

  try {
    const content = await fs.readFile(gitignorePath, 'utf-8');
    if (content.includes('.local-review')) {
      return;
    }

    await fs.appendFile(gitignorePath, '\n# local-review state\n.local-review/\n');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      await fs.writeFile(gitignorePath, '# local-review state\n.local-review/\n');
      return;
    }
    throw error;
  }
}
