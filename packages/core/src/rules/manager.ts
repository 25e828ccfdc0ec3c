import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage, NotFoundError, ValidationError } from '../errors.js';
import type { RetroactiveRuleApplier } from './applier.js';
import { parseStoredJson, readAction, readRunState, readSelector } from './input.js';
import {
  compileSelector,
  describeAction,
  describeSelector,
  hasAnyAction,
  hasLabelMutation,
  hasSelectorCriteria,
  labelActionOf,
} from './selector.js';
import type {
  RetroactiveConfig,
  RetroactiveRunOptions,
  RetroactiveRunState,
  RuleDefinitionAction,
  RuleSelector,
  StoredRule,
} from './types.js';

interface RuleRow {
  id: string;
  name: string;
  selector: string;
  action: string;
  last_retroactive: string | null;
  created_at: string;
}

export interface CreateRuleInput {
  name?: string;
  selector: RuleSelector;
  action: RuleDefinitionAction;
  /** Defaults to true */
  retroactive?: boolean;
}

export interface RetroactiveReport {
  /** Whether the run was attempted at all */
  attempted: boolean;
  state: RetroactiveRunState | null;
  /** Set when the run failed outright; the rule itself is still saved */
  error?: string;
}

export interface CreateRuleResult {
  success: boolean;
  summary: string;
  rule: StoredRule;
  criteria: string[];
  actions: string[];
  query: string;
  retroactive: RetroactiveReport;
}

export interface ApplyRuleResult {
  success: boolean;
  summary: string;
  ruleId: string;
  state: RetroactiveRunState;
}

function rowToRule(row: RuleRow): StoredRule {
  return {
    id: row.id,
    name: row.name,
    selector: parseStoredJson(row.selector, readSelector, {}),
    action: parseStoredJson(row.action, readAction, {}),
    createdAt: row.created_at,
    lastRetroactive: row.last_retroactive ? parseStoredJson(row.last_retroactive, readRunState, null) : null,
  };
}

function runSummary(state: RetroactiveRunState): string {
  let text = `${state.processedCount}/${state.totalFound} existing message(s) updated`;
  if (state.errorCount > 0) text += `, ${state.errorCount} error(s)`;
  if (state.truncated) text += ' (capped)';
  if (state.cancelled) text += ' (cancelled)';
  return text;
}

/**
 * Filter rules stored locally: create/get/delete/list, plus retroactive
 * application of a rule's label changes to mail that already exists.
 */
export class RuleManager {
  constructor(
    private db: Database.Database,
    private applier: RetroactiveRuleApplier,
    private retroactiveConfig: () => RetroactiveConfig,
  ) {}

  async create(input: CreateRuleInput, options: RetroactiveRunOptions = {}): Promise<CreateRuleResult> {
    if (!hasSelectorCriteria(input.selector)) {
      throw new ValidationError('At least one criterion is required (from, to, subject, query, hasAttachment or size)');
    }
    if (!hasAnyAction(input.action)) {
      throw new ValidationError('At least one action is required (add/remove labels, forward, or a spam/importance flag)');
    }
    const query = compileSelector(input.selector);
    const criteria = describeSelector(input.selector);
    const actions = describeAction(input.action);

    const id = uuidv4();
    const name = input.name?.trim() || criteria.join(', ');
    this.db.prepare('INSERT INTO email_rules (id, name, selector, action) VALUES (?, ?, ?, ?)')
      .run(id, name, JSON.stringify(input.selector), JSON.stringify(input.action));

    const retroactive = await this.runRetroactive(id, input, options);
    const rule = this.get(id);

    let summary = `Rule "${name}" created`;
    if (retroactive.state) summary += `; ${runSummary(retroactive.state)}`;
    else if (retroactive.error) summary += `; retroactive application failed: ${retroactive.error}`;

    return {
      success: true,
      summary,
      rule,
      criteria,
      actions,
      query: query.expression,
      retroactive,
    };
  }

  private async runRetroactive(
    id: string,
    input: CreateRuleInput,
    options: RetroactiveRunOptions,
  ): Promise<RetroactiveReport> {
    if (input.retroactive === false || !hasLabelMutation(input.action)) {
      return { attempted: false, state: null };
    }
    try {
      const state = await this.applier.apply(input.selector, labelActionOf(input.action), this.retroactiveConfig(), options);
      this.saveLastRun(id, state);
      return { attempted: true, state };
    } catch (err) {
      const message = errorMessage(err);
      console.warn(`[rules] Retroactive application for rule ${id} failed: ${message}`);
      return { attempted: true, state: null, error: message };
    }
  }

  private saveLastRun(id: string, state: RetroactiveRunState): void {
    this.db.prepare('UPDATE email_rules SET last_retroactive = ? WHERE id = ?').run(JSON.stringify(state), id);
  }

  get(id: string): StoredRule {
    const row = this.db.prepare('SELECT * FROM email_rules WHERE id = ?').get(id) as RuleRow | undefined;
    if (!row) throw new NotFoundError('Rule', id);
    return rowToRule(row);
  }

  list(): StoredRule[] {
    const rows = this.db.prepare('SELECT * FROM email_rules ORDER BY created_at, rowid').all() as RuleRow[];
    return rows.map(rowToRule);
  }

  delete(id: string): StoredRule {
    const rule = this.get(id);
    this.db.prepare('DELETE FROM email_rules WHERE id = ?').run(id);
    return rule;
  }

  /** Re-run retroactive application of a stored rule's label changes */
  async apply(id: string, options: RetroactiveRunOptions = {}): Promise<ApplyRuleResult> {
    const rule = this.get(id);
    if (!hasLabelMutation(rule.action)) {
      throw new ValidationError(`Rule ${id} has no label changes to apply`);
    }
    const state = await this.applier.apply(rule.selector, labelActionOf(rule.action), this.retroactiveConfig(), options);
    this.saveLastRun(id, state);
    return {
      success: state.errorCount === 0 && !state.cancelled,
      summary: `Rule "${rule.name}": ${runSummary(state)}`,
      ruleId: id,
      state,
    };
  }
}
