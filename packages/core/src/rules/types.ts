export type SizeComparison = 'larger' | 'smaller';

/** Criteria a rule matches messages by. All present criteria must hold. */
export interface RuleSelector {
  from?: string;
  to?: string;
  subject?: string;
  /** Free-text search, passed to the store as-is */
  query?: string;
  hasAttachment?: boolean;
  /** Size threshold in bytes; only used together with sizeComparison */
  size?: number;
  sizeComparison?: SizeComparison;
}

/** The label mutation applied to each matching message. */
export interface RuleAction {
  addLabelIds?: string[];
  removeLabelIds?: string[];
}

/** Everything a rule can do. Only the label part is applied retroactively. */
export interface RuleDefinitionAction extends RuleAction {
  forward?: string;
  markAsSpam?: boolean;
  markAsImportant?: boolean;
  neverMarkAsSpam?: boolean;
  neverMarkAsImportant?: boolean;
}

export type QueryTerm =
  | { field: 'from' | 'to' | 'subject' | 'text'; value: string }
  | { field: 'hasAttachment'; value: boolean }
  | { field: 'size'; comparison: SizeComparison; bytes: number };

/** A selector compiled into one query the MessageStore understands. */
export interface CompiledQuery {
  /** Single-string form, e.g. `from:a@example.com subject:(report) larger:1000` */
  expression: string;
  terms: QueryTerm[];
}

export interface RetroactiveRunState {
  totalFound: number;
  processedCount: number;
  errorCount: number;
  errors: string[];
  /** Candidate list was cut at maxItems */
  truncated: boolean;
  /** Run stopped early because its signal was aborted */
  cancelled: boolean;
}

export interface RetroactiveConfig {
  batchSize: number;
  maxItems?: number | null;
  rateLimitDelayMs: number;
  /** Page size requested from the store; the store may return fewer */
  pageSize?: number;
}

export type RetroactiveProgressEvent =
  | { type: 'page'; page: number; pageSize: number; found: number }
  | { type: 'batch'; batch: number; totalBatches: number; size: number; mode: 'bulk' | 'single' | 'fallback'; failed: number }
  | { type: 'done'; state: RetroactiveRunState };

export interface RetroactiveRunOptions {
  onProgress?: (event: RetroactiveProgressEvent) => void;
  /** Aborting stops the run after the current page or chunk */
  signal?: AbortSignal;
}

export interface StoredRule {
  id: string;
  name: string;
  selector: RuleSelector;
  action: RuleDefinitionAction;
  createdAt: string;
  lastRetroactive: RetroactiveRunState | null;
}
