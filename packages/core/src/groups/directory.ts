import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { NotFoundError, ValidationError } from '../errors.js';
import { normalizeAddresses } from '../mail/recipients.js';
import type { AddMembersResult, GroupDirectory, GroupRef } from '../trust/types.js';

interface GroupRow {
  id: string;
  name: string;
}

/**
 * Contact groups kept in the local database. Group names are unique and
 * compared case-insensitively; contacts are unique by lowercased email.
 */
export class SqliteGroupDirectory implements GroupDirectory {
  constructor(private db: Database.Database) {}

  private findGroup(ref: GroupRef): GroupRow | undefined {
    const sql = ref.kind === 'id'
      ? 'SELECT id, name FROM contact_groups WHERE id = ?'
      : 'SELECT id, name FROM contact_groups WHERE name = ? COLLATE NOCASE';
    return this.db.prepare(sql).get(ref.value) as GroupRow | undefined;
  }

  private requireGroupId(groupId: string): void {
    if (!this.findGroup({ kind: 'id', value: groupId })) throw new NotFoundError('Group', groupId);
  }

  async expand(ref: GroupRef): Promise<string[]> {
    const group = this.findGroup(ref);
    if (!group) throw new NotFoundError('Group', `${ref.kind}:${ref.value}`);
    const rows = this.db.prepare(`
      SELECT c.email FROM contact_group_members m
      JOIN contacts c ON c.id = m.contact_id
      WHERE m.group_id = ?
      ORDER BY c.email
    `).all(group.id) as Array<{ email: string }>;
    return rows.map(r => r.email);
  }

  async ensureGroup(name: string): Promise<string> {
    const trimmed = name.trim();
    if (!trimmed) throw new ValidationError('Group name is required');
    const existing = this.findGroup({ kind: 'name', value: trimmed });
    if (existing) return existing.id;
    const id = uuidv4();
    this.db.prepare('INSERT INTO contact_groups (id, name) VALUES (?, ?)').run(id, trimmed);
    return id;
  }

  async addMembers(groupId: string, emails: string[]): Promise<AddMembersResult> {
    this.requireGroupId(groupId);
    const created: string[] = [];
    const existing: string[] = [];

    const findContact = this.db.prepare('SELECT id FROM contacts WHERE email = ?');
    const insertContact = this.db.prepare('INSERT INTO contacts (id, email) VALUES (?, ?)');
    const insertMember = this.db.prepare(
      'INSERT OR IGNORE INTO contact_group_members (group_id, contact_id) VALUES (?, ?)',
    );

    const run = this.db.transaction((addresses: string[]) => {
      for (const email of addresses) {
        const contact = findContact.get(email) as { id: string } | undefined;
        let contactId = contact?.id;
        if (!contactId) {
          contactId = uuidv4();
          insertContact.run(contactId, email);
        }
        const result = insertMember.run(groupId, contactId);
        if (result.changes > 0) created.push(email);
        else existing.push(email);
      }
    });
    run(normalizeAddresses(emails));

    return { created, existing };
  }

  async removeMembers(groupId: string, emails: string[]): Promise<number> {
    this.requireGroupId(groupId);
    const remove = this.db.prepare(`
      DELETE FROM contact_group_members
      WHERE group_id = ? AND contact_id IN (SELECT id FROM contacts WHERE email = ?)
    `);
    let removed = 0;
    const run = this.db.transaction((addresses: string[]) => {
      for (const email of addresses) removed += remove.run(groupId, email).changes;
    });
    run(normalizeAddresses(emails));
    return removed;
  }

  /** Contact ids in the group whose address matches `email` */
  async findMembersByEmail(groupId: string, email: string): Promise<string[]> {
    this.requireGroupId(groupId);
    const rows = this.db.prepare(`
      SELECT c.id FROM contact_group_members m
      JOIN contacts c ON c.id = m.contact_id
      WHERE m.group_id = ? AND c.email = ?
    `).all(groupId, email.trim().toLowerCase()) as Array<{ id: string }>;
    return rows.map(r => r.id);
  }
}
