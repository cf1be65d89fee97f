export interface Migration {
  version: number;
  name: string;
  sql: string;
}

/**
 * Ordered schema migrations. Applied versions are recorded in schema_migrations.
 */
export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'create_reviews',
    sql: `
      CREATE TABLE reviews (
        id TEXT PRIMARY KEY,
        base_branch TEXT NOT NULL,
        target_branch TEXT NOT NULL,
        base_sha TEXT NOT NULL,
        target_sha TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `,
  },
  {
    version: 2,
    name: 'create_file_views',
    sql: `
      CREATE TABLE file_views (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        review_id TEXT NOT NULL,
        file_path TEXT NOT NULL,
        created_at TEXT NOT NULL,
        FOREIGN KEY (review_id) REFERENCES reviews(id) ON DELETE CASCADE
      );
      CREATE UNIQUE INDEX idx_file_views_review_file ON file_views(review_id, file_path);
    `,
  },
  {
    version: 3,
    name: 'create_comments',
    sql: `
      CREATE TABLE comments (
        id TEXT PRIMARY KEY,
        review_id TEXT NOT NULL,
        file_path TEXT NOT NULL,
        line_number INTEGER,
        content TEXT NOT NULL,
        created_at TEXT NOT NULL,
        FOREIGN KEY (review_id) REFERENCES reviews(id) ON DELETE CASCADE
      );
      CREATE INDEX idx_comments_review_id ON comments(review_id);
      CREATE INDEX idx_comments_file_path ON comments(review_id, file_path);
      CREATE INDEX idx_comments_line ON comments(review_id, file_path, line_number);
      CREATE INDEX idx_comments_created_at ON comments(created_at DESC);
    `,
  },
  {
    version: 4,
    name: 'add_resolved_to_comments',
    sql: `
      ALTER TABLE comments ADD COLUMN resolved BOOLEAN NOT NULL DEFAULT FALSE;
      CREATE INDEX idx_comments_review_resolved ON comments(review_id, resolved);
    `,
  },
  {
    version: 5,
    name: 'add_changed_sha_and_branch_exists_to_reviews',
    sql: `
      ALTER TABLE reviews ADD COLUMN base_sha_changed TEXT;
      ALTER TABLE reviews ADD COLUMN target_sha_changed TEXT;
      ALTER TABLE reviews ADD COLUMN base_branch_exists BOOLEAN;
      ALTER TABLE reviews ADD COLUMN target_branch_exists BOOLEAN;
    `,
  },
];
