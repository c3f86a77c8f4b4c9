import { nanoid } from "nanoid";
import type { ZodError } from "zod";
import type { AlertRule } from "@shared/types/alerts";
import { alertRuleInputSchema, alertRulePatchSchema } from "@shared/schemas";

export class RuleValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RuleValidationError";
  }
}

export class RuleNotFoundError extends Error {
  constructor(readonly ruleId: string) {
    super(`Alert rule ${ruleId} not found`);
    this.name = "RuleNotFoundError";
  }
}

function describeZodError(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "rule"}: ${i.message}`).join("; ");
}

/**
 * Alert rules keyed by id. Commands replace whole rule objects, so a flush
 * reading `enabledFor` sees either the old or the new version of a rule.
 * `recordTrigger` is the only in-place change and is called by the evaluator.
 */
export class RuleRegistry {
  private rules = new Map<string, AlertRule>();

  constructor(
    private readonly isTrackedSymbol: (symbol: string) => boolean,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Inputs arrive from outside the process, so they are validated rather than
   * trusted to match `AlertRuleInput`.
   */
  create(input: unknown): AlertRule {
    const parsed = alertRuleInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new RuleValidationError(describeZodError(parsed.error));
    }
    this.assertTracked(parsed.data.symbol);

    const rule: AlertRule = {
      ruleId: nanoid(),
      ...parsed.data,
      triggeredCount: 0,
      createdAt: this.now(),
    };
    this.rules.set(rule.ruleId, rule);
    return { ...rule };
  }

  update(ruleId: string, patch: unknown): AlertRule {
    const existing = this.require(ruleId);

    const parsed = alertRulePatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new RuleValidationError(describeZodError(parsed.error));
    }
    const { symbol, metric, comparator, threshold, enabled } = parsed.data;
    if (symbol !== undefined) {
      this.assertTracked(symbol);
    }

    const updated: AlertRule = {
      ...existing,
      ...(symbol !== undefined && { symbol }),
      ...(metric !== undefined && { metric }),
      ...(comparator !== undefined && { comparator }),
      ...(threshold !== undefined && { threshold }),
      ...(enabled !== undefined && { enabled }),
      updatedAt: this.now(),
    };
    this.rules.set(ruleId, updated);
    return { ...updated };
  }

  setEnabled(ruleId: string, enabled: boolean): AlertRule {
    return this.update(ruleId, { enabled });
  }

  delete(ruleId: string): void {
    this.require(ruleId);
    this.rules.delete(ruleId);
  }

  get(ruleId: string): AlertRule | null {
    const rule = this.rules.get(ruleId);
    return rule ? { ...rule } : null;
  }

  list(): AlertRule[] {
    return Array.from(this.rules.values(), (rule) => ({ ...rule }));
  }

  /**
   * Enabled rules for one symbol. Returns the live objects for the evaluator.
   */
  enabledFor(symbol: string): AlertRule[] {
    const matches: AlertRule[] = [];
    for (const rule of this.rules.values()) {
      if (rule.enabled && rule.symbol === symbol) matches.push(rule);
    }
    return matches;
  }

  recordTrigger(ruleId: string): void {
    const rule = this.rules.get(ruleId);
    if (rule) rule.triggeredCount++;
  }

  /**
   * Replace the rule set with previously saved rules, e.g. from a sink on
   * startup. Rules are taken as stored; unknown metric names are kept and later
   * skipped by the evaluator.
   */
  restore(rules: readonly AlertRule[]): void {
    this.rules.clear();
    for (const rule of rules) {
      this.rules.set(rule.ruleId, { ...rule });
    }
  }

  get size(): number {
    return this.rules.size;
  }

  private require(ruleId: string): AlertRule {
    const rule = this.rules.get(ruleId);
    if (!rule) throw new RuleNotFoundError(ruleId);
    return rule;
  }

  private assertTracked(symbol: string): void {
    if (!this.isTrackedSymbol(symbol)) {
      throw new RuleValidationError(`symbol: ${symbol} is not a tracked instrument`);
    }
  }
}
