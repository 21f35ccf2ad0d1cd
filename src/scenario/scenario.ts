/**
 * What-if scenarios: how the portfolio temperature would move if companies
 * set (validated) targets.
 */

import { ConfigurationError } from '@/lib/errors';
import type { ScoreRecord, ScoredTable } from '@/types/temperature';
import { aggregatePartition, resolveMethod, withConfiguredDefaults } from '@/aggregation/engine';
import { getWeightingStrategy } from '@/aggregation/weighting';

export type ScenarioType =
  | 'all_targets'
  | 'all_validated_targets'
  | 'top_contributors'
  | 'engaged_companies';

export type EngagementType = 'set_targets' | 'set_validated_targets';

export interface Scenario {
  type: ScenarioType;
  engagement?: EngagementType;
}

export const SCENARIO_TYPES: ScenarioType[] = [
  'all_targets',
  'all_validated_targets',
  'top_contributors',
  'engaged_companies',
];

export const SCENARIO_FALLBACK_SCORE = 2.0;
export const TOP_CONTRIBUTOR_COUNT = 10;

const ENGAGEMENT_CAPS: Record<EngagementType, number> = {
  set_targets: 2.0,
  set_validated_targets: 1.75,
};

/**
 * The engagement type decides the cap when given; without one, validated
 * targets cap at 1.75 and every other scenario at 2.0.
 */
export function scenarioCap(scenario: Scenario): number {
  if (scenario.engagement) return ENGAGEMENT_CAPS[scenario.engagement];
  return scenario.type === 'all_validated_targets'
    ? ENGAGEMENT_CAPS.set_validated_targets
    : ENGAGEMENT_CAPS.set_targets;
}

/**
 * Maps the numbered scenarios of the reporting templates (1-4) onto a
 * Scenario; unknown engagement labels mean "set targets".
 */
export function scenarioFromNumber(value: number, engagement?: string | null): Scenario {
  const type = SCENARIO_TYPES[value - 1];
  if (!Number.isInteger(value) || type === undefined) {
    throw new ConfigurationError('scenario.number', value);
  }
  const normalized = (engagement ?? '').trim().toLowerCase();
  return {
    type,
    engagement: normalized === 'set_validated_targets' ? 'set_validated_targets' : 'set_targets',
  };
}

function capRow(row: ScoreRecord, cap: number): ScoreRecord {
  if (row.temperatureScore <= cap) return row;
  return Object.freeze({ ...row, temperatureScore: cap, scenarioCapped: true });
}

function partitionKey(row: ScoreRecord): string {
  return `${row.timeFrame}|${row.scope}`;
}

function topContributors(
  scoredTable: ScoredTable,
  method: string | undefined
): Set<string> {
  const strategy = getWeightingStrategy(resolveMethod(withConfiguredDefaults(method, []).method));
  const partitions = new Map<string, ScoreRecord[]>();
  for (const row of scoredTable) {
    const key = partitionKey(row);
    const rows = partitions.get(key) ?? [];
    rows.push(row);
    partitions.set(key, rows);
  }

  const selected = new Set<string>();
  for (const [key, rows] of partitions) {
    const result = aggregatePartition(rows, strategy);
    if (result.status !== 'ok') continue;
    for (const contribution of result.contributions.slice(0, TOP_CONTRIBUTOR_COUNT)) {
      selected.add(`${key}|${contribution.companyId}`);
    }
  }
  return selected;
}

/**
 * Returns a new table with the scenario applied; the input is not modified.
 * `method` is only consulted by the top_contributors scenario and defaults to
 * the configured aggregation method.
 */
export function applyScenario(
  scoredTable: ScoredTable,
  scenario: Scenario,
  method?: string
): ScoredTable {
  const cap = scenarioCap(scenario);

  switch (scenario.type) {
    case 'all_targets':
      return Object.freeze(
        scoredTable.map((row) =>
          row.scoreBasis === 'fallback'
            ? Object.freeze({ ...row, temperatureScore: SCENARIO_FALLBACK_SCORE, scenarioCapped: true })
            : row
        )
      );
    case 'all_validated_targets':
      return Object.freeze(
        scoredTable.map((row) => (row.scoreBasis === 'target' ? capRow(row, cap) : row))
      );
    case 'top_contributors': {
      const selected = topContributors(scoredTable, method);
      return Object.freeze(
        scoredTable.map((row) =>
          selected.has(`${partitionKey(row)}|${row.companyId}`) ? capRow(row, cap) : row
        )
      );
    }
    case 'engaged_companies':
      return Object.freeze(
        scoredTable.map((row) => (row.company?.engagementTarget ? capRow(row, cap) : row))
      );
  }
}
