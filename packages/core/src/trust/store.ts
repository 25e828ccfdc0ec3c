import type Database from 'better-sqlite3';
import { ConflictError } from '../errors.js';
import { formatTrustListValue, parseTrustListValue } from './tokens.js';
import type { TrustListSnapshot, TrustListStore } from './types.js';

function versionConflict(expected: number, actual: number): ConflictError {
  return new ConflictError(`Trust list changed concurrently (expected version ${expected}, found ${actual}). Retry the update.`);
}

export class MemoryTrustListStore implements TrustListStore {
  private tokens: string[];
  private version = 0;

  constructor(initial: readonly string[] = []) {
    this.tokens = [...initial];
  }

  async load(): Promise<TrustListSnapshot> {
    return { tokens: [...this.tokens], version: this.version };
  }

  async save(tokens: string[], expectedVersion: number): Promise<TrustListSnapshot> {
    if (expectedVersion !== this.version) throw versionConflict(expectedVersion, this.version);
    this.tokens = [...tokens];
    this.version += 1;
    return { tokens: [...this.tokens], version: this.version };
  }
}

interface TrustListRow {
  tokens: string;
  version: number;
}

/**
 * Single-row table holding the comma-joined token list and a version counter.
 * Writes are compare-and-swap on the version.
 */
export class SqliteTrustListStore implements TrustListStore {
  constructor(private db: Database.Database, seed: readonly string[] = []) {
    // Seed only when the row has never been written
    this.db.prepare('INSERT OR IGNORE INTO trust_list (id, tokens, version) VALUES (1, ?, 0)')
      .run(formatTrustListValue(seed));
  }

  async load(): Promise<TrustListSnapshot> {
    const row = this.db.prepare('SELECT tokens, version FROM trust_list WHERE id = 1').get() as TrustListRow | undefined;
    if (!row) return { tokens: [], version: 0 };
    return { tokens: parseTrustListValue(row.tokens), version: row.version };
  }

  async save(tokens: string[], expectedVersion: number): Promise<TrustListSnapshot> {
    const result = this.db.prepare(
      "UPDATE trust_list SET tokens = ?, version = version + 1, updated_at = datetime('now') WHERE id = 1 AND version = ?",
    ).run(formatTrustListValue(tokens), expectedVersion);
    if (result.changes === 0) {
      const current = await this.load();
      throw versionConflict(expectedVersion, current.version);
    }
    return { tokens: [...tokens], version: expectedVersion + 1 };
  }
}
