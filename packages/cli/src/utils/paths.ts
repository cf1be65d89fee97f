import path from 'path';

export function resolvePath(inputPath: string): string {
  return path.resolve(process.cwd(), inputPath);
}

export function getDataDir(repoRoot: string): string {
  return path.join(repoRoot, '.local-review');
}

export function getDatabasePath(repoRoot: string): string {
  return path.join(getDataDir(repoRoot), 'reviews.db');
}

export function getLogPath(repoRoot: string): string {
  return path.join(getDataDir(repoRoot), 'app.log');
}

export function getConfigPath(repoRoot: string): string {
  return path.join(getDataDir(repoRoot), 'config.json');
}
