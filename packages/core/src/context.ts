import type Database from 'better-sqlite3';
import type { MailwardenConfig } from './config.js';
import { ElicitationController } from './elicitation/controller.js';
import { SqliteGroupDirectory } from './groups/directory.js';
import { ImapMessageStore } from './mail/imap-store.js';
import { OutboundGateway } from './mail/outbound.js';
import type { MessageStore } from './mail/types.js';
import { RetroactiveRuleApplier, type Sleep } from './rules/applier.js';
import { RuleManager } from './rules/manager.js';
import { getDatabase } from './storage/db.js';
import { TrustGate } from './trust/gate.js';
import { TrustListManager } from './trust/manager.js';
import { TrustListResolver } from './trust/resolver.js';
import { SqliteTrustListStore } from './trust/store.js';
import type { GroupDirectory, TrustListStore } from './trust/types.js';

export interface MailwardenContext {
  config: MailwardenConfig;
  db: Database.Database;
  store: MessageStore;
  directory: GroupDirectory;
  trustStore: TrustListStore;
  resolver: TrustListResolver;
  gate: TrustGate;
  elicitation: ElicitationController;
  outbound: OutboundGateway;
  trustList: TrustListManager;
  applier: RetroactiveRuleApplier;
  rules: RuleManager;
}

/** Collaborators to substitute, mainly for tests */
export interface ContextOverrides {
  db?: Database.Database;
  store?: MessageStore;
  directory?: GroupDirectory;
  trustStore?: TrustListStore;
  sleep?: Sleep;
}

export function createMailwardenContext(config: MailwardenConfig, overrides: ContextOverrides = {}): MailwardenContext {
  const db = overrides.db ?? getDatabase(config);
  const store = overrides.store ?? new ImapMessageStore({
    imap: config.imap,
    smtp: config.smtp,
    defaultPageSize: config.retroactive.pageSize,
  });
  const directory = overrides.directory ?? new SqliteGroupDirectory(db);
  const trustStore = overrides.trustStore ?? new SqliteTrustListStore(db, config.trust.seedAllowList);

  const resolver = new TrustListResolver(directory);
  const gate = new TrustGate(trustStore, resolver);
  // Settings are read through the config object so runtime changes apply to the next send
  const elicitation = new ElicitationController(() => ({
    enabled: config.trust.elicitationEnabled,
    fallbackPolicy: config.trust.fallbackPolicy,
    timeoutMs: config.trust.elicitationTimeoutMs,
  }));
  const applier = new RetroactiveRuleApplier(store, overrides.sleep);

  return {
    config,
    db,
    store,
    directory,
    trustStore,
    resolver,
    gate,
    elicitation,
    outbound: new OutboundGateway(gate, elicitation, store),
    trustList: new TrustListManager(trustStore, directory),
    applier,
    rules: new RuleManager(db, applier, () => ({ ...config.retroactive })),
  };
}
