import type Database from 'better-sqlite3';

type SqliteDatabase = InstanceType<typeof Database>;

type SuggestionMigration = {
  version: number;
  name: string;
  statements: string[];
};

/**
 * Schema history of the SQLite suggestion store. The applied version lives in PRAGMA user_version.
 */
export const SUGGESTION_MIGRATIONS: readonly SuggestionMigration[] = [
  {
    version: 1,
    name: 'create_suggestions',
    statements: [
      `CREATE TABLE IF NOT EXISTS suggestions (
        signature TEXT PRIMARY KEY,
        resolved_path TEXT NOT NULL,
        source_file_path TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        context_snapshot TEXT NOT NULL
      )`,
    ],
  },
  {
    version: 2,
    name: 'index_resolved_path',
    statements: [`CREATE INDEX IF NOT EXISTS idx_suggestions_resolved_path ON suggestions(resolved_path)`],
  },
];

export function schemaVersion(db: SqliteDatabase): number {
  const value = db.pragma('user_version', { simple: true });
  return typeof value === 'number' ? value : 0;
}

/**
 * Bring the store up to the latest schema. Each migration commits together with its version bump.
 */
export function runMigrations(db: SqliteDatabase): number {
  let current = schemaVersion(db);
  for (const migration of SUGGESTION_MIGRATIONS) {
    if (migration.version <= current) continue;
    console.log(`[SuggestionStore] Applying migration ${migration.version}: ${migration.name}`);
    db.transaction(() => {
      for (const sql of migration.statements) {
        db.prepare(sql).run();
      }
      db.pragma(`user_version = ${migration.version}`);
    })();
    current = migration.version;
  }
  return current;
}
