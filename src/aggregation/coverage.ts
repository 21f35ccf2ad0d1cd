import { createChildLogger } from '@/utils/logger';
import { WarningCollector } from '@/data/quality/warnings';
import type { DataQualityWarning } from '@/data/quality/types';
import type { ScoreRecord, ScoredTable, Scope, TimeFrame } from '@/types/temperature';
import { assertNormalized, resolveMethod, weighRows, withConfiguredDefaults } from './engine';
import { getWeightingStrategy, unusableFields } from './weighting';

const logger = createChildLogger('coverage');

export interface CoverageOptions {
  timeFrame?: TimeFrame;
  scope?: Scope;
}

export interface CoverageResult {
  coverage: number | null;
  coveredWeight: number;
  totalWeight: number;
  coveredCompanies: string[];
  excluded: string[];
  warnings: DataQualityWarning[];
}

function isValidatedTargetRow(row: ScoreRecord, options: CoverageOptions): boolean {
  if (options.timeFrame && row.timeFrame !== options.timeFrame) return false;
  if (options.scope && row.scope !== options.scope) return false;
  return row.scoreBasis === 'target' && row.targetStatus === 'validated';
}

/**
 * Share of portfolio weight held in companies scored on a validated target,
 * in percent. Each company is weighed once, whatever the number of rows it
 * has in the table. An omitted method comes from the run configuration.
 */
export function calculateCoverage(
  scoredTable: ScoredTable,
  method?: string,
  options: CoverageOptions = {}
): CoverageResult {
  const resolvedMethod = resolveMethod(withConfiguredDefaults(method, []).method);
  const strategy = getWeightingStrategy(resolvedMethod);
  const warnings = new WarningCollector(logger);

  const firstRows = new Map<string, ScoreRecord>();
  const covered = new Set<string>();
  for (const row of scoredTable) {
    if (!firstRows.has(row.companyId)) firstRows.set(row.companyId, row);
    if (isValidatedTargetRow(row, options)) covered.add(row.companyId);
  }

  const { weighted, excluded, totalWeight } = weighRows([...firstRows.values()], strategy);
  for (const row of excluded) {
    warnings.add({
      code: 'missing_weight',
      companyId: row.companyId,
      message: 'Company has no usable weight basis for the coverage method, excluded',
      context: { method: resolvedMethod, missingFields: unusableFields(strategy, row.company) },
    });
  }

  const excludedIds = excluded.map((row) => row.companyId);
  if (weighted.length === 0) {
    warnings.add({
      code: 'empty_partition',
      message: 'No eligible companies for coverage, result undefined',
      context: { method: resolvedMethod },
    });
    return {
      coverage: null,
      coveredWeight: 0,
      totalWeight: 0,
      coveredCompanies: [],
      excluded: excludedIds,
      warnings: warnings.toArray(),
    };
  }

  assertNormalized(weighted);

  let coveredWeight = 0;
  const coveredCompanies: string[] = [];
  for (const { row, basis } of weighted) {
    if (!covered.has(row.companyId)) continue;
    coveredWeight += basis;
    coveredCompanies.push(row.companyId);
  }

  const coverage = Math.min(100, Math.max(0, (coveredWeight * 100) / totalWeight));
  logger.debug({ method: resolvedMethod, coverage, companies: weighted.length }, 'Coverage calculated');

  return {
    coverage,
    coveredWeight,
    totalWeight,
    coveredCompanies,
    excluded: excludedIds,
    warnings: warnings.toArray(),
  };
}
