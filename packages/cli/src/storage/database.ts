import fs from 'fs';
import path from 'path';
import initSqlJs, { type Database as SqlJsDatabase, type SqlJsStatic } from 'sql.js';
import { drizzle, type SQLJsDatabase } from 'drizzle-orm/sql-js';
import { schema } from './schema';
import { MIGRATIONS, type Migration } from './migrations';

export type Db = SQLJsDatabase<typeof schema>;

export interface Database {
  db: Db;
  /** Writes the database back to its file. No-op for ':memory:'. */
  save(): void;
  close(): void;
}

let sqlJs: Promise<SqlJsStatic> | null = null;

export function loadSqlJs(): Promise<SqlJsStatic> {
  sqlJs ??= initSqlJs();
  return sqlJs;
}

function appliedVersions(sqlite: SqlJsDatabase): Set<number> {
  const versions = new Set<number>();
  for (const result of sqlite.exec('SELECT version FROM schema_migrations')) {
    for (const [version] of result.values) {
      if (typeof version === 'number') versions.add(version);
    }
  }
  return versions;
}

/**
 * Applies every migration not yet recorded, each in its own transaction.
 * Returns the versions that were applied.
 */
export function runMigrations(sqlite: SqlJsDatabase, migrations: readonly Migration[] = MIGRATIONS): number[] {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );
  `);

  const applied = appliedVersions(sqlite);
  const newlyApplied: number[] = [];

  for (const migration of [...migrations].sort((a, b) => a.version - b.version)) {
    if (applied.has(migration.version)) continue;

    sqlite.exec('BEGIN');
    try {
      sqlite.exec(migration.sql);
      sqlite.run('INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)', [
        migration.version,
        migration.name,
        new Date().toISOString(),
      ]);
      sqlite.exec('COMMIT');
    } catch (error) {
      sqlite.exec('ROLLBACK');
      throw error;
    }
    newlyApplied.push(migration.version);
  }

  return newlyApplied;
}

/**
 * Opens (creating if missing) the SQLite database and brings its schema up to date.
 * The database lives in memory and `save` writes it back to `filename`.
 * Pass ':memory:' for a throwaway database.
 */
export async function openDatabase(filename: string): Promise<Database> {
  const SQL = await loadSqlJs();
  const inMemory = filename === ':memory:';

  let sqlite: SqlJsDatabase;
  if (!inMemory && fs.existsSync(filename)) {
    sqlite = new SQL.Database(fs.readFileSync(filename));
  } else {
    sqlite = new SQL.Database();
  }

  sqlite.exec('PRAGMA foreign_keys = ON');
  const applied = runMigrations(sqlite);

  const save = (): void => {
    if (inMemory) return;
    fs.mkdirSync(path.dirname(filename), { recursive: true });
    fs.writeFileSync(filename, sqlite.export());
    // export() reopens the connection, which resets pragmas
    sqlite.exec('PRAGMA foreign_keys = ON');
  };

  if (applied.length > 0) save();

  return {
    db: drizzle(sqlite, { schema }),
    save,
    close: () => sqlite.close(),
  };
}
