import type { Database } from './database';
import { CommentRepository } from './commentRepository';
import { FileViewRepository } from './fileViewRepository';
import { ReviewRepository } from './reviewRepository';

export interface Repositories {
  reviews: ReviewRepository;
  comments: CommentRepository;
  fileViews: FileViewRepository;
}

/**
 * Repositories over one database; every write is saved to its file.
 */
export function createRepositories(database: Database): Repositories {
  const persist = (): void => database.save();
  return {
    reviews: new ReviewRepository(database.db, persist),
    comments: new CommentRepository(database.db, persist),
    fileViews: new FileViewRepository(database.db, persist),
  };
}

export { loadSqlJs, openDatabase, runMigrations } from './database';
export type { Database, Db } from './database';
export { ReviewRepository, CommentRepository, FileViewRepository };
export type { AcceptedRefresh } from './reviewRepository';
