/**
 * Aggregation Engine
 * Rolls company scores up into portfolio and group temperatures per
 * (time frame, scope) using one weighting method.
 */

import { createChildLogger } from '@/utils/logger';
import { resolveRunConfig } from '@/core/config';
import { ComputationError, ConfigurationError } from '@/lib/errors';
import { WarningCollector } from '@/data/quality/warnings';
import type { DataQualityWarning } from '@/data/quality/types';
import {
  GROUPING_KEYS,
  SCOPES,
  TIME_FRAMES,
  isAggregationMethod,
  type AggregationMethod,
  type GroupingKey,
  type Scope,
  type ScoreRecord,
  type ScoredTable,
  type TimeFrame,
} from '@/types/temperature';
import {
  getWeightingStrategy,
  unusableFields,
  usableWeight,
  type WeightingStrategy,
} from './weighting';

const logger = createChildLogger('aggregation');

export const WEIGHT_TOLERANCE = 1e-9;

export interface WeightedRow {
  row: ScoreRecord;
  basis: number;
  weight: number;
}

export interface Contribution {
  companyId: string;
  companyName: string;
  temperatureScore: number;
  weight: number;
  contribution: number;
  contributionRelative: number;
}

export type PartitionResult =
  | {
      status: 'ok';
      score: number;
      companyCount: number;
      totalWeight: number;
      fallbackInfluence: number;
      contributions: Contribution[];
      excluded: string[];
    }
  | { status: 'undefined'; reason: 'empty_partition'; excluded: string[] }
  | { status: 'error'; reason: 'weights_not_normalized'; message: string; excluded: string[] };

export interface ScopeAggregation {
  portfolio: PartitionResult;
  groups: Partial<Record<GroupingKey, Record<string, PartitionResult>>>;
  /** With several grouping keys: one result per value combination, joined with "-". */
  combined?: Record<string, PartitionResult>;
}

export type AggregationScores = Partial<
  Record<TimeFrame, Partial<Record<Scope, ScopeAggregation>>>
>;

export interface AggregationResult {
  method: AggregationMethod;
  scores: AggregationScores;
  warnings: DataQualityWarning[];
}

export interface AggregationOptions {
  timeFrames?: readonly TimeFrame[];
  scopes?: readonly Scope[];
}

/**
 * Fills an omitted method or grouping from the run configuration.
 */
export function withConfiguredDefaults(
  method: string | undefined,
  grouping?: readonly string[]
): { method: string; grouping: readonly string[] } {
  if (method !== undefined && grouping !== undefined) return { method, grouping };
  const config = resolveRunConfig();
  return {
    method: method ?? config.aggregationMethod,
    grouping: grouping ?? config.grouping,
  };
}

export function resolveMethod(method: string): AggregationMethod {
  if (!isAggregationMethod(method)) {
    throw new ConfigurationError('aggregation_method', method);
  }
  return method;
}

export function resolveGrouping(grouping: readonly string[]): GroupingKey[] {
  return grouping.map((key, i) => {
    const match = GROUPING_KEYS.find((candidate) => candidate === key);
    if (!match) throw new ConfigurationError(`grouping.${i}`, key);
    return match;
  });
}

export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Splits rows into weighted and excluded sets, sorted by company id. Weights
 * are normalized over the included rows only.
 */
export function weighRows(
  rows: readonly ScoreRecord[],
  strategy: WeightingStrategy
): { weighted: WeightedRow[]; excluded: ScoreRecord[]; totalWeight: number } {
  const sorted = [...rows].sort((a, b) => compareKeys(a.companyId, b.companyId));
  const included: Array<{ row: ScoreRecord; basis: number }> = [];
  const excluded: ScoreRecord[] = [];

  for (const row of sorted) {
    const basis = strategy.weight({ company: row.company, investmentValue: row.investmentValue });
    if (usableWeight(basis)) {
      included.push({ row, basis });
    } else {
      excluded.push(row);
    }
  }

  let totalWeight = 0;
  for (const entry of included) totalWeight += entry.basis;

  const weighted = included.map((entry) => ({
    ...entry,
    weight: entry.basis / totalWeight,
  }));
  return { weighted, excluded, totalWeight };
}

export function assertNormalized(weighted: readonly WeightedRow[]): void {
  let sum = 0;
  for (const entry of weighted) sum += entry.weight;
  if (!(Math.abs(sum - 1) <= WEIGHT_TOLERANCE)) {
    throw new ComputationError(`weights sum to ${sum}`, { companies: weighted.length });
  }
}

export function aggregatePartition(
  rows: readonly ScoreRecord[],
  strategy: WeightingStrategy
): PartitionResult {
  const { weighted, excluded, totalWeight } = weighRows(rows, strategy);
  const excludedIds = excluded.map((row) => row.companyId);

  if (weighted.length === 0) {
    return { status: 'undefined', reason: 'empty_partition', excluded: excludedIds };
  }

  try {
    assertNormalized(weighted);
  } catch (error) {
    if (!(error instanceof ComputationError)) throw error;
    return {
      status: 'error',
      reason: 'weights_not_normalized',
      message: error.message,
      excluded: excludedIds,
    };
  }

  // Anchored on the first score so a partition of equal scores returns that
  // score exactly.
  const anchor = weighted[0].row.temperatureScore;
  let score = anchor;
  let fallbackWeight = 0;
  for (const { row, weight } of weighted) {
    score += weight * (row.temperatureScore - anchor);
    if (row.scoreBasis === 'fallback') fallbackWeight += weight;
  }

  const contributions = weighted
    .map(({ row, weight }) => {
      const contribution = weight * row.temperatureScore;
      return {
        companyId: row.companyId,
        companyName: row.companyName,
        temperatureScore: row.temperatureScore,
        weight,
        contribution,
        contributionRelative: score > 0 ? (contribution / score) * 100 : 0,
      };
    })
    .sort(
      (a, b) => b.contribution - a.contribution || compareKeys(a.companyId, b.companyId)
    );

  return {
    status: 'ok',
    score,
    companyCount: weighted.length,
    totalWeight,
    fallbackInfluence: fallbackWeight * 100,
    contributions,
    excluded: excludedIds,
  };
}

export function groupValue(row: ScoreRecord, key: GroupingKey): string {
  const value = row.company?.[key];
  return value && value.trim() ? value.trim() : 'unknown';
}

function presentInOrder<T extends string>(canonical: readonly T[], values: Iterable<T>): T[] {
  const present = new Set(values);
  return canonical.filter((value) => present.has(value));
}

function partitionBy(
  rows: readonly ScoreRecord[],
  keyOf: (row: ScoreRecord) => string
): Array<[string, ScoreRecord[]]> {
  const buckets = new Map<string, ScoreRecord[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const bucket = buckets.get(key) ?? [];
    bucket.push(row);
    buckets.set(key, bucket);
  }
  return [...buckets.entries()].sort(([a], [b]) => compareKeys(a, b));
}

interface ReportContext {
  method: AggregationMethod;
  strategy: WeightingStrategy;
  warnings: WarningCollector;
  reported: Set<string>;
}

function reportPartition(
  result: PartitionResult,
  rows: readonly ScoreRecord[],
  label: Record<string, unknown>,
  ctx: ReportContext
): void {
  const { method, strategy, warnings, reported } = ctx;
  for (const companyId of result.excluded) {
    if (reported.has(companyId)) continue;
    reported.add(companyId);
    const company = rows.find((row) => row.companyId === companyId)?.company ?? null;
    warnings.add({
      code: 'missing_weight',
      companyId,
      message: 'Company has no usable weight basis for the aggregation method, excluded',
      context: { ...label, method, missingFields: unusableFields(strategy, company) },
    });
  }
  if (result.status === 'undefined') {
    warnings.add({
      code: 'empty_partition',
      message: 'No eligible companies in partition, result undefined',
      context: { ...label },
    });
  } else if (result.status === 'error') {
    warnings.add({
      code: 'weights_not_normalized',
      message: result.message,
      context: { ...label },
    });
  }
}

/**
 * Portfolio and group temperatures for every (time frame, scope) partition.
 * An omitted method or grouping comes from the run configuration. Throws
 * ConfigurationError for an unknown method or grouping key; empty and failed
 * partitions are returned explicitly and the others still computed.
 */
export function aggregateScores(
  scoredTable: ScoredTable,
  method?: string,
  grouping?: readonly string[],
  options: AggregationOptions = {}
): AggregationResult {
  const requested = withConfiguredDefaults(method, grouping);
  const resolvedMethod = resolveMethod(requested.method);
  const groupingKeys = resolveGrouping(requested.grouping);
  const strategy = getWeightingStrategy(resolvedMethod);
  const warnings = new WarningCollector(logger);
  const ctx: ReportContext = {
    method: resolvedMethod,
    strategy,
    warnings,
    reported: new Set<string>(),
  };

  const timeFrames = options.timeFrames
    ? [...options.timeFrames]
    : presentInOrder(TIME_FRAMES, scoredTable.map((row) => row.timeFrame));
  const scopes = options.scopes
    ? [...options.scopes]
    : presentInOrder(SCOPES, scoredTable.map((row) => row.scope));

  const scores: AggregationScores = {};
  for (const timeFrame of timeFrames) {
    const byScope: Partial<Record<Scope, ScopeAggregation>> = {};
    for (const scope of scopes) {
      const rows = scoredTable.filter((row) => row.timeFrame === timeFrame && row.scope === scope);
      const portfolio = aggregatePartition(rows, strategy);
      reportPartition(portfolio, rows, { timeFrame, scope, group: 'portfolio' }, ctx);

      const groups: ScopeAggregation['groups'] = {};
      for (const key of groupingKeys) {
        const results: Record<string, PartitionResult> = {};
        for (const [value, bucket] of partitionBy(rows, (row) => groupValue(row, key))) {
          const result = aggregatePartition(bucket, strategy);
          reportPartition(result, bucket, { timeFrame, scope, group: `${key}:${value}` }, ctx);
          results[value] = result;
        }
        groups[key] = results;
      }

      const aggregation: ScopeAggregation = { portfolio, groups };
      if (groupingKeys.length > 1) {
        const combined: Record<string, PartitionResult> = {};
        const joinedKey = (row: ScoreRecord) =>
          groupingKeys.map((key) => groupValue(row, key)).join('-');
        for (const [value, bucket] of partitionBy(rows, joinedKey)) {
          const result = aggregatePartition(bucket, strategy);
          reportPartition(result, bucket, { timeFrame, scope, group: `combined:${value}` }, ctx);
          combined[value] = result;
        }
        aggregation.combined = combined;
      }

      byScope[scope] = aggregation;
    }
    scores[timeFrame] = byScope;
  }

  logger.info(
    { method: resolvedMethod, grouping: groupingKeys, warnings: warnings.size },
    'Portfolio scores aggregated'
  );

  return { method: resolvedMethod, scores, warnings: warnings.toArray() };
}
