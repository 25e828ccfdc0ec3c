import Database from 'better-sqlite3';
import { join } from 'node:path';
import { ensureDataDir, type MailwardenConfig } from '../config.js';

let db: Database.Database | null = null;

export function getDatabase(config: MailwardenConfig): Database.Database {
  if (db) return db;

  ensureDataDir(config);
  const dbPath = join(config.dataDir, 'mailwarden.db');
  db = new Database(dbPath);

  // Enable WAL mode for better concurrent access
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  runMigrations(db);
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

// Inline migration SQL so there's no filesystem dependency when bundled
const MIGRATIONS: Record<string, string> = {
  '001_trust_list.sql': `
CREATE TABLE IF NOT EXISTS trust_list (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  tokens TEXT NOT NULL DEFAULT '',
  version INTEGER NOT NULL DEFAULT 0,
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);
`,
  '002_contact_groups.sql': `
CREATE TABLE IF NOT EXISTS contacts (
  id TEXT PRIMARY KEY,
  email TEXT NOT NULL UNIQUE,
  name TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS contact_groups (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL UNIQUE COLLATE NOCASE,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS contact_group_members (
  group_id TEXT NOT NULL,
  contact_id TEXT NOT NULL,
  added_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (group_id, contact_id),
  FOREIGN KEY (group_id) REFERENCES contact_groups(id) ON DELETE CASCADE,
  FOREIGN KEY (contact_id) REFERENCES contacts(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_group_members_contact ON contact_group_members(contact_id);
`,
  '003_rules.sql': `
CREATE TABLE IF NOT EXISTS email_rules (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  selector TEXT NOT NULL DEFAULT '{}',
  action TEXT NOT NULL DEFAULT '{}',
  last_retroactive TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);
CREATE INDEX IF NOT EXISTS idx_email_rules_created ON email_rules(created_at);
`,
};

function runMigrations(database: Database.Database): void {
  // Ensure migrations tracking table exists
  database.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const rows = database.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
  const applied = new Set(rows.map(r => r.name));

  const insertStmt = database.prepare('INSERT INTO _migrations (name) VALUES (?)');

  // Sort migrations by name to ensure consistent ordering
  const sortedMigrations = Object.entries(MIGRATIONS).sort(([a], [b]) => a.localeCompare(b));

  // Run each migration in a transaction for atomicity
  const runMigration = database.transaction((name: string, sql: string) => {
    database.exec(sql);
    insertStmt.run(name);
  });

  for (const [name, sql] of sortedMigrations) {
    if (applied.has(name)) continue;
    runMigration(name, sql);
  }
}

export function createTestDatabase(): Database.Database {
  const testDb = new Database(':memory:');
  testDb.pragma('foreign_keys = ON');
  runMigrations(testDb);
  return testDb;
}
