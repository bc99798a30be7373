import { DEFAULT_KNOWN_CURRENCIES, type RuleCategory } from '../../domain/types.js';
import { completenessRules } from './rules/completeness.js';
import { amountsNonNegative, amountsNumeric, createCurrencyInKnownSetRule, dateFormatValid } from './rules/format.js';
import { businessRules } from './rules/business.js';
import { anomalyRules } from './rules/anomaly.js';
import { duplicateInvoiceDetector } from './duplicate-detector.js';
import type { BatchRule, Rule, RuleRegistryOptions } from './types.js';

/**
 * All per-invoice rules in evaluation order. Violations are reported in this
 * order, so it is part of the output contract.
 */
export function createRuleRegistry(options: RuleRegistryOptions = {}): readonly Rule[] {
  const knownCurrencies = options.knownCurrencies ?? DEFAULT_KNOWN_CURRENCIES;

  return Object.freeze([
    ...completenessRules,
    dateFormatValid,
    createCurrencyInKnownSetRule(knownCurrencies),
    amountsNumeric,
    amountsNonNegative,
    ...businessRules,
    ...anomalyRules,
  ]);
}

export const defaultBatchRules: readonly BatchRule[] = Object.freeze([duplicateInvoiceDetector]);

export type RuleDescriptor = Pick<Rule, 'id' | 'category'> & { scope: 'invoice' | 'batch' };

export function groupRulesByCategory(
  rules: readonly Rule[],
  batchRules: readonly BatchRule[] = defaultBatchRules,
): Record<RuleCategory, RuleDescriptor[]> {
  const groups: Record<RuleCategory, RuleDescriptor[]> = {
    completeness: [],
    format: [],
    business: [],
    anomaly: [],
  };

  for (const rule of rules) {
    groups[rule.category].push({ id: rule.id, category: rule.category, scope: 'invoice' });
  }
  for (const rule of batchRules) {
    groups[rule.category].push({ id: rule.id, category: rule.category, scope: 'batch' });
  }

  return groups;
}
