/**
 * Temperature Score Engine
 * Scores every (company, scope, time frame) of a portfolio from its most
 * relevant target, or the configured fallback.
 */

import { createChildLogger } from '@/utils/logger';
import { contentHash } from '@/utils/hash';
import { resolveRunConfig, type RunConfigOverrides } from '@/core/config';
import { joinPortfolio, type JoinedCompany } from '@/data/join';
import { WarningCollector } from '@/data/quality/warnings';
import type { DataQualityWarning } from '@/data/quality/types';
import { getBenchmarkModel } from '@/benchmark/loader';
import type { BenchmarkModel } from '@/benchmark/model';
import type {
  PortfolioHolding,
  ProviderData,
  RunConfig,
  Scope,
  ScoreRecord,
  ScoredTable,
  Target,
  TimeFrame,
} from '@/types/temperature';
import { annualReductionRate, selectTarget, targetDefect } from './target_selection';

const logger = createChildLogger('temperature_score');

export interface TemperatureScoreOptions {
  benchmark?: BenchmarkModel;
}

export interface TemperatureScoreResult {
  rows: ScoredTable;
  warnings: DataQualityWarning[];
  config: RunConfig;
  fingerprint: string;
}

interface ScoreContext {
  config: RunConfig;
  benchmark: BenchmarkModel;
  warnings: WarningCollector;
}

function usableTargets(entry: JoinedCompany, warnings: WarningCollector): Target[] {
  const usable: Target[] = [];
  for (const target of entry.targets) {
    const defect = targetDefect(target);
    if (defect) {
      warnings.add({
        code: 'invalid_target',
        companyId: entry.companyId,
        message: `Target skipped: ${defect}`,
        context: { targetId: target.targetId ?? null },
      });
      continue;
    }
    usable.push(target);
  }
  return usable;
}

function fallbackRow(
  entry: JoinedCompany,
  scope: Scope,
  timeFrame: TimeFrame,
  config: RunConfig
): ScoreRecord {
  return {
    companyId: entry.companyId,
    companyName: entry.company?.companyName ?? entry.companyId,
    scope,
    timeFrame,
    temperatureScore: config.fallbackScore,
    scoreBasis: 'fallback',
    targetStatus: null,
    targetId: null,
    annualReductionRate: null,
    clipped: false,
    scenarioCapped: false,
    company: entry.company,
    investmentValue: entry.investmentValue,
  };
}

function scoreOne(
  entry: JoinedCompany,
  targets: readonly Target[],
  scope: Scope,
  timeFrame: TimeFrame,
  ctx: ScoreContext
): ScoreRecord {
  const { config, benchmark, warnings } = ctx;
  const target = selectTarget(targets, scope, timeFrame, config.timeFrameWindows);
  if (!target) return fallbackRow(entry, scope, timeFrame, config);

  const sector = entry.company?.sector?.trim() ?? '';
  const rate = annualReductionRate(target);
  const raw = sector
    ? benchmark.impliedTemperature(config.model, sector, scope, target.targetYear, rate)
    : null;

  if (raw === null) {
    warnings.add({
      code: 'missing_benchmark',
      companyId: entry.companyId,
      scope,
      timeFrame,
      message: 'No benchmark trajectory for sector, fallback score used',
      context: { sector: sector || null, model: config.model },
    });
    return fallbackRow(entry, scope, timeFrame, config);
  }

  const { min, max } = config.scoreBounds;
  const temperatureScore = Math.min(max, Math.max(min, raw));
  const clipped = temperatureScore !== raw;
  if (clipped) {
    warnings.add({
      code: 'score_clipped',
      companyId: entry.companyId,
      scope,
      timeFrame,
      message: 'Implied temperature outside plausible range, clipped',
      context: { raw, clippedTo: temperatureScore },
    });
  }

  return {
    ...fallbackRow(entry, scope, timeFrame, config),
    temperatureScore,
    scoreBasis: 'target',
    targetStatus: target.status,
    targetId: target.targetId ?? null,
    annualReductionRate: rate,
    clipped,
  };
}

/**
 * Produces one row per portfolio company x configured scope x configured time
 * frame. Configuration problems throw ConfigurationError before any row is
 * computed; data problems become warnings.
 */
export function calculateTemperatureScores(
  providerData: ProviderData,
  portfolio: readonly PortfolioHolding[],
  overrides: RunConfigOverrides = {},
  options: TemperatureScoreOptions = {}
): TemperatureScoreResult {
  const config = resolveRunConfig(overrides);
  const benchmark = options.benchmark ?? getBenchmarkModel();
  const warnings = new WarningCollector(logger);
  const ctx: ScoreContext = { config, benchmark, warnings };

  const joined = joinPortfolio(providerData, portfolio, warnings);
  const rows: ScoreRecord[] = [];

  for (const entry of joined) {
    const targets = usableTargets(entry, warnings);
    for (const scope of config.scopes) {
      for (const timeFrame of config.timeFrames) {
        rows.push(Object.freeze(scoreOne(entry, targets, scope, timeFrame, ctx)));
      }
    }
  }

  const fallbackCount = rows.filter((row) => row.scoreBasis === 'fallback').length;
  logger.info(
    {
      companies: joined.length,
      rows: rows.length,
      fallbackRows: fallbackCount,
      warnings: warnings.size,
      model: config.model,
    },
    'Temperature scores calculated'
  );

  return {
    rows: Object.freeze(rows),
    warnings: warnings.toArray(),
    config,
    fingerprint: contentHash(rows),
  };
}
