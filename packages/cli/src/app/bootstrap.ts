import type { LocalReviewConfig } from '@local-review/shared';
import { ensureDataDir, loadConfig } from '../config';
import { ExternalCollaboratorError } from '../errors';
import { detectRepo, type RepoContext } from '../git/detect';
import { SimpleGitGateway, type GitGateway } from '../git/gateway';
import { createFileLogger, type Logger } from '../logging';
import { createServices } from '../services';
import { createRepositories, openDatabase, type Database, type Repositories } from '../storage';
import { ReviewSyncEngine } from '../sync/reviewSyncEngine';
import { systemClock } from '../utils/clock';
import { getLogPath, resolvePath } from '../utils/paths';
import { App } from './app';
import { navigationHandler } from './navigation';

export interface StartOptions {
  repoPath: string;
  /** overrides the configured database path */
  database?: string;
}

/**
 * Everything the app runs against, opened once per process.
 */
export interface Runtime {
  repo: RepoContext;
  config: LocalReviewConfig;
  logger: Logger;
  database: Database;
  repositories: Repositories;
  git: GitGateway;
  sync: ReviewSyncEngine;
}

export async function openRuntime(options: StartOptions): Promise<Runtime> {
  const repo = await detectRepo(options.repoPath);
  const config = await loadConfig(repo.root);
  await ensureDataDir(repo.root);

  const logger = createFileLogger(getLogPath(repo.root), config.logLevel);
  const databasePath = options.database ? resolvePath(options.database) : config.databasePath;

  let database: Database;
  try {
    database = await openDatabase(databasePath);
  } catch (error) {
    logger.error(`Failed to open database ${databasePath}`);
    throw new ExternalCollaboratorError(`open database ${databasePath}`, error);
  }

  logger.info(`Opened ${databasePath} for ${repo.root} (branch ${repo.branch ?? 'detached'})`);

  const repositories = createRepositories(database);
  const git = new SimpleGitGateway(repo.root);
  const sync = new ReviewSyncEngine({ ...repositories, git, clock: systemClock, logger });

  return { repo, config, logger, database, repositories, git, sync };
}

export function createApp(runtime: Runtime): App {
  return new App({
    services: createServices(runtime.config),
    serviceContext: {
      repositories: runtime.repositories,
      git: runtime.git,
      sync: runtime.sync,
      clock: systemClock,
      logger: runtime.logger,
    },
    globalHandlers: [navigationHandler],
    logger: runtime.logger,
  });
}
