import { setTimeout as delay } from 'node:timers/promises';
import { debug, debugWarn } from '../debug.js';
import { AuthError, ValidationError, errorMessage } from '../errors.js';
import type { ListPage, MessageStore } from '../mail/types.js';
import { compileSelector, hasLabelMutation } from './selector.js';
import type {
  RetroactiveConfig,
  RetroactiveProgressEvent,
  RetroactiveRunOptions,
  RetroactiveRunState,
  RuleAction,
  RuleSelector,
} from './types.js';

export type Sleep = (ms: number) => Promise<void>;

export type ItemResult =
  | { id: string; ok: true }
  | { id: string; ok: false; error: string };

const defaultSleep: Sleep = async ms => {
  if (ms > 0) await delay(ms);
};

export function emptyRunState(): RetroactiveRunState {
  return { totalFound: 0, processedCount: 0, errorCount: 0, errors: [], truncated: false, cancelled: false };
}

/** Folds per-item results into the run state */
export function foldItemResults(state: RetroactiveRunState, results: readonly ItemResult[]): void {
  for (const result of results) {
    if (result.ok) {
      state.processedCount += 1;
    } else {
      state.errorCount += 1;
      state.errors.push(`Message ${result.id}: ${result.error}`);
    }
  }
}

interface NormalizedConfig {
  batchSize: number;
  maxItems: number | null;
  rateLimitDelayMs: number;
  pageSize: number | undefined;
}

function normalizeConfig(config: RetroactiveConfig): NormalizedConfig {
  if (!Number.isInteger(config.batchSize) || config.batchSize < 1) {
    throw new ValidationError('batchSize must be a positive whole number');
  }
  const maxItems = config.maxItems ?? null;
  if (maxItems !== null && (!Number.isInteger(maxItems) || maxItems < 1)) {
    throw new ValidationError('maxItems must be a positive whole number or null');
  }
  return {
    batchSize: config.batchSize,
    maxItems,
    rateLimitDelayMs: Math.max(0, config.rateLimitDelayMs),
    pageSize: config.pageSize,
  };
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) chunks.push(items.slice(i, i + size));
  return chunks;
}

/**
 * Applies a label mutation to every existing message matching a selector.
 * Pages and chunks run strictly in order, one remote call at a time, with a
 * cooperative delay between calls. Per-item failures are accumulated; only
 * validation and auth failures while listing escape.
 */
export class RetroactiveRuleApplier {
  constructor(
    private store: MessageStore,
    private sleep: Sleep = defaultSleep,
  ) {}

  async apply(
    selector: RuleSelector,
    action: RuleAction,
    config: RetroactiveConfig,
    options: RetroactiveRunOptions = {},
  ): Promise<RetroactiveRunState> {
    const state = emptyRunState();
    const emit = (event: RetroactiveProgressEvent) => {
      if (!options.onProgress) return;
      try {
        options.onProgress(event);
      } catch (err) {
        debugWarn('retro', `Progress observer threw: ${errorMessage(err)}`);
      }
    };

    if (!hasLabelMutation(action)) {
      debug('retro', 'No label changes in action; nothing to apply');
      emit({ type: 'done', state });
      return state;
    }

    const settings = normalizeConfig(config);
    const query = compileSelector(selector);
    const ids = await this.collect(query, settings, state, emit, options.signal);
    state.totalFound = ids.length;

    if (!state.cancelled) {
      await this.mutateAll(ids, action, settings, state, emit, options.signal);
    }

    debug('retro', `Done: ${state.processedCount}/${state.totalFound} processed, ${state.errorCount} error(s)`);
    emit({ type: 'done', state });
    return state;
  }

  private async collect(
    query: ReturnType<typeof compileSelector>,
    settings: NormalizedConfig,
    state: RetroactiveRunState,
    emit: (event: RetroactiveProgressEvent) => void,
    signal: AbortSignal | undefined,
  ): Promise<string[]> {
    const ids: string[] = [];
    const seen = new Set<string>();
    let pageToken: string | null = null;
    let page = 0;

    for (;;) {
      if (signal?.aborted) {
        state.cancelled = true;
        break;
      }
      if (page > 0) await this.sleep(settings.rateLimitDelayMs);

      let result: ListPage;
      try {
        result = await this.store.list(query, { pageToken, pageSize: settings.pageSize });
      } catch (err) {
        if (err instanceof AuthError || err instanceof ValidationError) throw err;
        const message = errorMessage(err);
        console.warn(`[retro] Listing page ${page + 1} failed, continuing with ${ids.length} id(s): ${message}`);
        state.errorCount += 1;
        state.errors.push(`List page ${page + 1}: ${message}`);
        break;
      }
      page += 1;

      for (const id of result.ids) {
        if (seen.has(id)) continue;
        seen.add(id);
        ids.push(id);
      }
      debug('retro', `Page ${page}: ${result.ids.length} id(s), ${ids.length} total`);
      emit({ type: 'page', page, pageSize: result.ids.length, found: ids.length });

      if (settings.maxItems !== null && ids.length >= settings.maxItems) {
        state.truncated = true;
        console.warn(`[retro] Candidate list capped at ${settings.maxItems} message(s)`);
        ids.length = settings.maxItems;
        break;
      }
      if (!result.nextPageToken) break;
      pageToken = result.nextPageToken;
    }
    return ids;
  }

  private async mutateAll(
    ids: readonly string[],
    action: RuleAction,
    settings: NormalizedConfig,
    state: RetroactiveRunState,
    emit: (event: RetroactiveProgressEvent) => void,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const chunks = chunk(ids, settings.batchSize);
    for (let i = 0; i < chunks.length; i++) {
      if (signal?.aborted) {
        state.cancelled = true;
        return;
      }
      if (i > 0) await this.sleep(settings.rateLimitDelayMs);

      const batch = chunks[i];
      const before = state.errorCount;
      let mode: 'bulk' | 'single' | 'fallback';
      if (batch.length === 1) {
        mode = 'single';
        foldItemResults(state, await this.mutateEach(batch, action, settings.rateLimitDelayMs));
      } else {
        try {
          await this.store.batchMutate(batch, action);
          mode = 'bulk';
          state.processedCount += batch.length;
        } catch (err) {
          mode = 'fallback';
          console.warn(`[retro] Bulk update of ${batch.length} message(s) failed, retrying one by one: ${errorMessage(err)}`);
          foldItemResults(state, await this.mutateEach(batch, action, settings.rateLimitDelayMs));
        }
      }
      debug('retro', `Chunk ${i + 1}/${chunks.length} (${batch.length}, ${mode})`);
      emit({
        type: 'batch',
        batch: i + 1,
        totalBatches: chunks.length,
        size: batch.length,
        mode,
        failed: state.errorCount - before,
      });
    }
  }

  /** One `mutate` per id, in order, with the rate-limit delay between calls */
  async mutateEach(ids: readonly string[], action: RuleAction, delayMs: number): Promise<ItemResult[]> {
    const results: ItemResult[] = [];
    for (let i = 0; i < ids.length; i++) {
      if (i > 0) await this.sleep(delayMs);
      const id = ids[i];
      try {
        await this.store.mutate(id, action);
        results.push({ id, ok: true });
      } catch (err) {
        results.push({ id, ok: false, error: errorMessage(err) });
      }
    }
    return results;
  }
}
