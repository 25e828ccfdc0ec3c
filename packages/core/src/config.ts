import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { ValidationError } from './errors.js';
import { FALLBACK_POLICIES, type FallbackPolicy } from './elicitation/types.js';

function isPlainObject(value: unknown): value is object {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Deep merge source into target, preserving nested objects */
function deepMerge(target: object, source: object): void {
  for (const [key, value] of Object.entries(source)) {
    // Prevent prototype pollution
    if (key === '__proto__' || key === 'constructor' || key === 'prototype') continue;
    const current: unknown = Reflect.get(target, key);
    if (isPlainObject(value) && isPlainObject(current)) {
      deepMerge(current, value);
    } else {
      Reflect.set(target, key, value);
    }
  }
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? (T[K] extends unknown[] ? T[K] : DeepPartial<T[K]>) : T[K];
};

export interface MailwardenConfig {
  imap: {
    host: string;
    port: number;
    secure: boolean;
    user: string;
    password: string;
    mailbox: string;
    draftsMailbox: string;
  };
  smtp: {
    host: string;
    port: number;
    secure: boolean;
    user: string;
    password: string;
    from: string;
  };
  api: {
    port: number;
    host: string;
  };
  trust: {
    /** Tokens written to the trust list the first time the store is opened */
    seedAllowList: string[];
    elicitationEnabled: boolean;
    fallbackPolicy: FallbackPolicy;
    elicitationTimeoutMs: number;
  };
  retroactive: {
    batchSize: number;
    /** null means no cap */
    maxItems: number | null;
    rateLimitDelayMs: number;
    pageSize: number;
  };
  masterKey: string;
  dataDir: string;
}

const DEFAULT_CONFIG: MailwardenConfig = {
  imap: {
    host: 'localhost',
    port: 143,
    secure: false,
    user: '',
    password: '',
    mailbox: 'INBOX',
    draftsMailbox: 'Drafts',
  },
  smtp: {
    host: 'localhost',
    port: 587,
    secure: false,
    user: '',
    password: '',
    from: '',
  },
  api: {
    port: 3200,
    host: '127.0.0.1',
  },
  trust: {
    seedAllowList: [],
    elicitationEnabled: true,
    fallbackPolicy: 'block',
    elicitationTimeoutMs: 300_000,
  },
  retroactive: {
    batchSize: 100,
    maxItems: 10_000,
    rateLimitDelayMs: 50,
    pageSize: 500,
  },
  masterKey: '',
  dataDir: join(homedir(), '.mailwarden'),
};

function intEnv(raw: string | undefined, fallback: number): number {
  const n = parseInt(raw ?? '', 10);
  return isNaN(n) ? fallback : n;
}

function boolEnv(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return !['false', '0', 'off', 'no'].includes(raw.trim().toLowerCase());
}

function maxItemsEnv(raw: string | undefined, fallback: number | null): number | null {
  if (raw === undefined || raw.trim() === '') return fallback;
  if (raw.trim().toLowerCase() === 'none') return null;
  const n = parseInt(raw, 10);
  if (isNaN(n)) return fallback;
  return n <= 0 ? null : n;
}

export function parseFallbackPolicy(raw: unknown): FallbackPolicy {
  const value = typeof raw === 'string' ? raw.trim().toLowerCase() : raw;
  const match = FALLBACK_POLICIES.find(p => p === value);
  if (!match) {
    throw new ValidationError(`Invalid elicitation fallback policy: ${String(raw)} (expected ${FALLBACK_POLICIES.join(', ')})`);
  }
  return match;
}

export function resolveConfig(overrides?: DeepPartial<MailwardenConfig>): MailwardenConfig {
  const env = process.env;
  const config: MailwardenConfig = {
    imap: {
      host: env.IMAP_HOST ?? DEFAULT_CONFIG.imap.host,
      port: intEnv(env.IMAP_PORT, DEFAULT_CONFIG.imap.port),
      secure: boolEnv(env.IMAP_SECURE, DEFAULT_CONFIG.imap.secure),
      user: env.IMAP_USER ?? DEFAULT_CONFIG.imap.user,
      password: env.IMAP_PASSWORD ?? DEFAULT_CONFIG.imap.password,
      mailbox: env.IMAP_MAILBOX ?? DEFAULT_CONFIG.imap.mailbox,
      draftsMailbox: env.IMAP_DRAFTS_MAILBOX ?? DEFAULT_CONFIG.imap.draftsMailbox,
    },
    smtp: {
      host: env.SMTP_HOST ?? DEFAULT_CONFIG.smtp.host,
      port: intEnv(env.SMTP_PORT, DEFAULT_CONFIG.smtp.port),
      secure: boolEnv(env.SMTP_SECURE, DEFAULT_CONFIG.smtp.secure),
      user: env.SMTP_USER ?? DEFAULT_CONFIG.smtp.user,
      password: env.SMTP_PASSWORD ?? DEFAULT_CONFIG.smtp.password,
      from: env.SMTP_FROM ?? DEFAULT_CONFIG.smtp.from,
    },
    api: {
      port: intEnv(env.MAILWARDEN_API_PORT, DEFAULT_CONFIG.api.port),
      host: env.MAILWARDEN_API_HOST ?? DEFAULT_CONFIG.api.host,
    },
    trust: {
      seedAllowList: (env.MAILWARDEN_ALLOW_LIST ?? '').split(',').map(t => t.trim()).filter(Boolean),
      elicitationEnabled: boolEnv(env.MAILWARDEN_ELICITATION, DEFAULT_CONFIG.trust.elicitationEnabled),
      fallbackPolicy: env.MAILWARDEN_ELICITATION_FALLBACK
        ? parseFallbackPolicy(env.MAILWARDEN_ELICITATION_FALLBACK)
        : DEFAULT_CONFIG.trust.fallbackPolicy,
      elicitationTimeoutMs: intEnv(env.MAILWARDEN_ELICITATION_TIMEOUT_MS, DEFAULT_CONFIG.trust.elicitationTimeoutMs),
    },
    retroactive: {
      batchSize: intEnv(env.MAILWARDEN_RETRO_BATCH_SIZE, DEFAULT_CONFIG.retroactive.batchSize),
      maxItems: maxItemsEnv(env.MAILWARDEN_RETRO_MAX_ITEMS, DEFAULT_CONFIG.retroactive.maxItems),
      rateLimitDelayMs: intEnv(env.MAILWARDEN_RETRO_DELAY_MS, DEFAULT_CONFIG.retroactive.rateLimitDelayMs),
      pageSize: intEnv(env.MAILWARDEN_RETRO_PAGE_SIZE, DEFAULT_CONFIG.retroactive.pageSize),
    },
    masterKey: env.MAILWARDEN_MASTER_KEY ?? DEFAULT_CONFIG.masterKey,
    dataDir: env.MAILWARDEN_DATA_DIR?.replace(/^~(?=\/|$)/, homedir()) ?? DEFAULT_CONFIG.dataDir,
  };

  // Merge file-based config if it exists (deep merge to preserve nested objects)
  const configPath = join(config.dataDir, 'config.json');
  if (existsSync(configPath)) {
    try {
      const fileConfig: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
      if (isPlainObject(fileConfig)) deepMerge(config, fileConfig);
    } catch {
      console.warn('[mailwarden] Ignoring malformed config file:', configPath);
    }
  }

  // Apply explicit overrides last (deep merge)
  if (overrides) {
    deepMerge(config, overrides);
  }

  // File and override values are untyped JSON; re-check the enum
  config.trust.fallbackPolicy = parseFallbackPolicy(config.trust.fallbackPolicy);
  return config;
}

export function ensureDataDir(config: MailwardenConfig): void {
  if (!existsSync(config.dataDir)) {
    mkdirSync(config.dataDir, { recursive: true });
  }
}

export function saveConfig(config: MailwardenConfig): void {
  ensureDataDir(config);
  const configPath = join(config.dataDir, 'config.json');
  writeFileSync(configPath, JSON.stringify(config, null, 2), { encoding: 'utf-8', mode: 0o600 });
}
