import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';

export const reviews = sqliteTable('reviews', {
  id: text('id').primaryKey(),
  baseBranch: text('base_branch').notNull(),
  targetBranch: text('target_branch').notNull(),
  baseSha: text('base_sha').notNull(),
  targetSha: text('target_sha').notNull(),
  baseShaChanged: text('base_sha_changed'),
  targetShaChanged: text('target_sha_changed'),
  baseBranchExists: integer('base_branch_exists', { mode: 'boolean' }),
  targetBranchExists: integer('target_branch_exists', { mode: 'boolean' }),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});

export const comments = sqliteTable(
  'comments',
  {
    id: text('id').primaryKey(),
    reviewId: text('review_id')
      .notNull()
      .references(() => reviews.id, { onDelete: 'cascade' }),
    filePath: text('file_path').notNull(),
    lineNumber: integer('line_number'), // NULL for file-level comments
    content: text('content').notNull(),
    resolved: integer('resolved', { mode: 'boolean' }).notNull().default(false),
    createdAt: text('created_at').notNull(),
  },
  (table) => ({
    reviewIdx: index('idx_comments_review_id').on(table.reviewId),
    fileIdx: index('idx_comments_file_path').on(table.reviewId, table.filePath),
    lineIdx: index('idx_comments_line').on(table.reviewId, table.filePath, table.lineNumber),
  }),
);

export const fileViews = sqliteTable(
  'file_views',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    reviewId: text('review_id')
      .notNull()
      .references(() => reviews.id, { onDelete: 'cascade' }),
    filePath: text('file_path').notNull(),
    createdAt: text('created_at').notNull(),
  },
  (table) => ({
    reviewFileIdx: uniqueIndex('idx_file_views_review_file').on(table.reviewId, table.filePath),
  }),
);

export const schema = { reviews, comments, fileViews };
