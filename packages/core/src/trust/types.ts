export type GroupRefKind = 'name' | 'id';

export interface GroupRef {
  readonly kind: GroupRefKind;
  readonly value: string;
}

export type TrustEntry =
  | { readonly kind: 'address'; readonly raw: string; readonly email: string }
  | { readonly kind: 'group'; readonly raw: string; readonly ref: GroupRef };

export interface GroupResolution {
  token: string;
  ref: GroupRef | null;
  members: string[];
  /** Set when the directory lookup failed; the group then contributes no members */
  error?: string;
}

export interface ResolvedTrustSet {
  /** Lowercased, trimmed addresses */
  addresses: ReadonlySet<string>;
  /** address → where it came from (`explicit`, or the group token) */
  provenance: ReadonlyMap<string, readonly string[]>;
  groups: GroupResolution[];
  /** True when the persisted list holds any token, even if none resolved */
  configured: boolean;
}

export interface TrustDecision {
  /** Normalized union of to/cc/bcc, in first-seen order */
  recipients: string[];
  trustedRecipients: string[];
  untrustedRecipients: string[];
}

export interface AddMembersResult {
  created: string[];
  existing: string[];
}

export interface GroupDirectory {
  expand(ref: GroupRef): Promise<string[]>;
  ensureGroup(name: string): Promise<string>;
  addMembers(groupId: string, emails: string[]): Promise<AddMembersResult>;
  /** Returns how many memberships were removed */
  removeMembers(groupId: string, emails: string[]): Promise<number>;
  findMembersByEmail(groupId: string, email: string): Promise<string[]>;
}

export interface TrustListSnapshot {
  tokens: string[];
  /** Bumped on every successful save; used for compare-and-swap */
  version: number;
}

export interface TrustListStore {
  load(): Promise<TrustListSnapshot>;
  /** Throws ConflictError when the stored version is no longer `expectedVersion` */
  save(tokens: string[], expectedVersion: number): Promise<TrustListSnapshot>;
}
