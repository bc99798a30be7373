import type { Invoice, RuleCategory, Severity, ValidationResult, Violation } from '../../domain/types.js';

export type RuleEvaluator = (invoice: Readonly<Invoice>) => Violation[];

/** A per-invoice check. Pure: same invoice in, same violations out. */
export interface Rule {
  readonly id: string;
  readonly category: RuleCategory;
  readonly evaluate: RuleEvaluator;
}

/**
 * A check that needs the whole batch at once. Entries are index-aligned with
 * the input; `null` marks a record that could not be parsed.
 */
export interface BatchRule {
  readonly id: string;
  readonly category: RuleCategory;
  evaluate(batch: ReadonlyArray<Readonly<Invoice> | null>): Map<number, Violation[]>;
}

export interface RuleRegistryOptions {
  knownCurrencies?: readonly string[];
}

export interface EngineOptions extends RuleRegistryOptions {
  /** Replaces the default registry. `knownCurrencies` is ignored when set. */
  rules?: readonly Rule[];
  batchRules?: readonly BatchRule[];
}

export interface EngineRun {
  results: ValidationResult[];
  /** rule_id → number of invoices with at least one violation of that rule. */
  errorFrequency: Map<string, number>;
}

/** Builds a violation attributed to the rule being defined. */
export type Flag = (field: string | null, message: string, severity?: Severity) => Violation;

export function defineRule(
  id: string,
  category: RuleCategory,
  check: (invoice: Readonly<Invoice>, flag: Flag) => Violation[],
): Rule {
  const flag: Flag = (field, message, severity = 'error') => ({ rule_id: id, category, field, message, severity });
  return { id, category, evaluate: (invoice) => check(invoice, flag) };
}
