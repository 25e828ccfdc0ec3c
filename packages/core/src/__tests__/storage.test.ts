import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import { ConflictError, NotFoundError } from '../errors.js';
import { SqliteGroupDirectory } from '../groups/directory.js';
import { createTestDatabase } from '../storage/db.js';
import { SqliteTrustListStore } from '../trust/store.js';

describe('SQLite Database', () => {
  it('creates tables from migrations', () => {
    const db = createTestDatabase();
    const tables = db.prepare("SELECT name FROM sqlite_master WHERE type='table'").all() as { name: string }[];
    const tableNames = tables.map((t) => t.name);

    expect(tableNames).toContain('trust_list');
    expect(tableNames).toContain('contacts');
    expect(tableNames).toContain('contact_groups');
    expect(tableNames).toContain('contact_group_members');
    expect(tableNames).toContain('email_rules');
    expect(tableNames).toContain('_migrations');
    db.close();
  });
});

describe('SqliteTrustListStore', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDatabase();
  });

  it('seeds once and loads the persisted tokens', async () => {
    const store = new SqliteTrustListStore(db, ['a@example.com', 'group:VIP']);
    expect(await store.load()).toEqual({ tokens: ['a@example.com', 'group:VIP'], version: 0 });

    // A second open with a different seed keeps what is stored
    const reopened = new SqliteTrustListStore(db, ['other@example.com']);
    expect((await reopened.load()).tokens).toEqual(['a@example.com', 'group:VIP']);
  });

  it('bumps the version on save and rejects stale writes', async () => {
    const store = new SqliteTrustListStore(db);
    const saved = await store.save(['b@example.com'], 0);
    expect(saved).toEqual({ tokens: ['b@example.com'], version: 1 });

    await expect(store.save(['c@example.com'], 0)).rejects.toBeInstanceOf(ConflictError);
    expect(await store.load()).toEqual({ tokens: ['b@example.com'], version: 1 });
  });
});

describe('SqliteGroupDirectory', () => {
  let directory: SqliteGroupDirectory;

  beforeEach(() => {
    directory = new SqliteGroupDirectory(createTestDatabase());
  });

  it('creates a group once and finds it by name in any case', async () => {
    const id = await directory.ensureGroup('VIP');
    expect(await directory.ensureGroup('vip')).toBe(id);
    expect(await directory.expand({ kind: 'name', value: 'vip' })).toEqual([]);
  });

  it('adds members, reporting created and existing', async () => {
    const id = await directory.ensureGroup('Team');
    expect(await directory.addMembers(id, ['A@example.com', 'b@example.com'])).toEqual({
      created: ['a@example.com', 'b@example.com'],
      existing: [],
    });
    expect(await directory.addMembers(id, ['a@example.com', 'c@example.com'])).toEqual({
      created: ['c@example.com'],
      existing: ['a@example.com'],
    });
    expect(await directory.expand({ kind: 'name', value: 'team' })).toEqual(['a@example.com', 'b@example.com', 'c@example.com']);
    expect(await directory.expand({ kind: 'id', value: id })).toHaveLength(3);
  });

  it('finds and removes members', async () => {
    const id = await directory.ensureGroup('Team');
    await directory.addMembers(id, ['a@example.com', 'b@example.com']);
    expect(await directory.findMembersByEmail(id, 'A@Example.com')).toHaveLength(1);
    expect(await directory.removeMembers(id, ['a@example.com', 'z@example.com'])).toBe(1);
    expect(await directory.expand({ kind: 'id', value: id })).toEqual(['b@example.com']);
  });

  it('shares contacts between groups', async () => {
    const team = await directory.ensureGroup('Team');
    const vip = await directory.ensureGroup('VIP');
    await directory.addMembers(team, ['a@example.com']);
    await directory.addMembers(vip, ['a@example.com']);
    await directory.removeMembers(team, ['a@example.com']);
    expect(await directory.expand({ kind: 'name', value: 'VIP' })).toEqual(['a@example.com']);
  });

  it('raises NotFoundError for unknown groups', async () => {
    await expect(directory.expand({ kind: 'name', value: 'Nobody' })).rejects.toThrow('Group not found: name:Nobody');
    await expect(directory.addMembers('missing-id', ['a@example.com'])).rejects.toBeInstanceOf(NotFoundError);
  });
});
