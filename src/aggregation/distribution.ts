import type { ScoreRecord, ScoredTable } from '@/types/temperature';
import { compareKeys } from './engine';

export type DistributionField =
  | 'sector'
  | 'region'
  | 'scope'
  | 'timeFrame'
  | 'scoreBasis'
  | 'targetStatus';

function fieldValue(row: ScoreRecord, field: DistributionField): string {
  const value = field === 'sector' || field === 'region' ? row.company?.[field] : row[field];
  return value ? String(value) : 'unknown';
}

/**
 * Percentage of rows per value (or combination of values, joined with "-")
 * of the given fields, rounded to two decimals.
 */
export function percentageDistribution(
  scoredTable: ScoredTable,
  fields: readonly DistributionField[]
): Record<string, number> {
  if (fields.length === 0 || scoredTable.length === 0) return {};

  const counts = new Map<string, number>();
  for (const row of scoredTable) {
    const key = fields.map((field) => fieldValue(row, field)).join('-');
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  const distribution: Record<string, number> = {};
  for (const key of [...counts.keys()].sort(compareKeys)) {
    const count = counts.get(key) ?? 0;
    distribution[key] = Math.round((count / scoredTable.length) * 10000) / 100;
  }
  return distribution;
}
