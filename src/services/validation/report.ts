import type { ValidationReport } from '../../domain/types.js';
import type { EngineRun } from './types.js';

function byCountThenId([idA, countA]: [string, number], [idB, countB]: [string, number]): number {
  if (countA !== countB) return countB - countA;
  return idA < idB ? -1 : idA > idB ? 1 : 0;
}

export function buildReport(run: EngineRun): ValidationReport {
  const valid = run.results.filter((r) => r.is_valid).length;

  return {
    results: run.results,
    summary: {
      total: run.results.length,
      valid,
      invalid: run.results.length - valid,
      error_frequency: Object.fromEntries([...run.errorFrequency].sort(byCountThenId)),
    },
  };
}

/** Most frequent rule ids, ordered as in `summary.error_frequency`. */
export function topErrors(report: ValidationReport, limit = 10): Array<[string, number]> {
  return Object.entries(report.summary.error_frequency).sort(byCountThenId).slice(0, limit);
}
