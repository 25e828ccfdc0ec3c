// @mailwarden/core public API

// Config
export {
  resolveConfig,
  ensureDataDir,
  saveConfig,
  parseFallbackPolicy,
  type MailwardenConfig,
  type DeepPartial,
} from './config.js';

// Errors & logging
export {
  MailwardenError,
  ValidationError,
  AuthError,
  NotFoundError,
  ConflictError,
  TransientApiError,
  UnsupportedCapabilityError,
  errorMessage,
  type ErrorCode,
} from './errors.js';
export { debug, debugWarn } from './debug.js';

// Storage
export { getDatabase, closeDatabase, createTestDatabase } from './storage/db.js';

// Trust list
export type {
  GroupRef,
  GroupRefKind,
  TrustEntry,
  GroupResolution,
  ResolvedTrustSet,
  TrustDecision,
  AddMembersResult,
  GroupDirectory,
  TrustListSnapshot,
  TrustListStore,
} from './trust/types.js';
export {
  EMAIL_PATTERN,
  isGroupToken,
  splitTokens,
  parseGroupRef,
  parseTrustEntry,
  formatGroupRef,
  parseTrustListValue,
  formatTrustListValue,
  maskAddress,
  type SplitTokens,
} from './trust/tokens.js';
export { TrustListResolver } from './trust/resolver.js';
export { TrustGate, type RecipientFields, type ExpandedRecipients, type GateCheck } from './trust/gate.js';
export { MemoryTrustListStore, SqliteTrustListStore } from './trust/store.js';
export {
  TrustListManager,
  type TrustListAddResult,
  type TrustListRemoveResult,
  type TrustListView,
  type LabelAddResult,
  type LabelRemoveResult,
} from './trust/manager.js';
export { SqliteGroupDirectory } from './groups/directory.js';

// Elicitation
export {
  FALLBACK_POLICIES,
  EMAIL_ACTIONS,
  EMAIL_ACTION_SCHEMA,
  isEmailAction,
  type FallbackPolicy,
  type EmailAction,
  type ResponseSchema,
  type ElicitationResponse,
  type TransportOutcome,
  type PromptOptions,
  type ElicitationTransport,
  type SessionState,
  type ElicitationDecision,
  type ElicitationOutcome,
  type ElicitationSettings,
  type ElicitationContext,
} from './elicitation/types.js';
export { ElicitationController, ElicitationSession, DEFAULT_ELICITATION_TIMEOUT_MS } from './elicitation/controller.js';
export { classifyTransportError } from './elicitation/classify.js';
export { buildConfirmationMessage, bodyPreview } from './elicitation/message.js';

// Mail
export type {
  SendIntent,
  MailContent,
  SendRequest,
  ListPage,
  ListOptions,
  DraftResult,
  SentResult,
  MessageStore,
} from './mail/types.js';
export {
  toMultiValue,
  flattenMultiValue,
  splitAddressList,
  normalizeAddresses,
  parseLabelIds,
  type MultiValue,
} from './mail/recipients.js';
export { OutboundGateway, type OutboundResult } from './mail/outbound.js';
export { readSendRequest, readEntries, isRecord } from './mail/request.js';
export {
  ImapMessageStore,
  labelKeyword,
  toImapSearch,
  parsePageToken,
  toStoreError,
  type ImapMessageStoreOptions,
} from './mail/imap-store.js';

// Rules
export type {
  SizeComparison,
  RuleSelector,
  RuleAction,
  RuleDefinitionAction,
  QueryTerm,
  CompiledQuery,
  RetroactiveRunState,
  RetroactiveConfig,
  RetroactiveProgressEvent,
  RetroactiveRunOptions,
  StoredRule,
} from './rules/types.js';
export {
  compileSelector,
  validateSelector,
  hasSelectorCriteria,
  hasLabelMutation,
  hasAnyAction,
  labelActionOf,
  describeSelector,
  describeAction,
} from './rules/selector.js';
export { readSelector, readAction, readCreateRuleInput, readRunState } from './rules/input.js';
export {
  RetroactiveRuleApplier,
  emptyRunState,
  foldItemResults,
  type Sleep,
  type ItemResult,
} from './rules/applier.js';
export {
  RuleManager,
  type CreateRuleInput,
  type CreateRuleResult,
  type RetroactiveReport,
  type ApplyRuleResult,
} from './rules/manager.js';

// Service graph
export { createMailwardenContext, type MailwardenContext, type ContextOverrides } from './context.js';
