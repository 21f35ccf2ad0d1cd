import { describe, it, expect } from 'vitest';
import { calculateTemperatureScores } from '@/scoring/engine';
import { aggregateScores } from '@/aggregation/engine';
import { calculateCoverage } from '@/aggregation/coverage';
import type { ProviderData } from '@/types/temperature';
import { holding, makeCompany, makeTarget, testBenchmark } from '../fixtures/temperature';

const benchmark = testBenchmark();

const providerData: ProviderData = {
  fundamentalData: [
    makeCompany('AAA', { marketCap: 250, sector: 'Power', region: 'Europe' }),
    makeCompany('BBB', { marketCap: 40, sector: 'Steel', region: 'Asia' }),
    makeCompany('CCC', { marketCap: 900, sector: 'Power', region: 'North America' }),
    makeCompany('DDD', { marketCap: null, sector: 'Power', region: null }),
    makeCompany('EEE', { marketCap: 15, sector: 'Power', region: 'Europe' }),
  ],
  targetData: [
    makeTarget('AAA', { targetId: 'a-mid' }),
    makeTarget('AAA', { targetId: 'a-long', scopes: ['S1', 'S2', 'S3'], baseYear: 2020, targetYear: 2045, reductionPct: 90 }),
    makeTarget('BBB', { targetId: 'b-mid', status: 'pending' }),
    makeTarget('CCC', { targetId: 'c-short', baseYear: 2022, targetYear: 2026, reductionPct: 20 }),
    makeTarget('EEE', { targetId: 'e-s3', scopes: ['S3'], reductionPct: 30 }),
  ],
};

const portfolio = ['AAA', 'BBB', 'CCC', 'DDD', 'EEE', 'FFF'].map((id) => holding(id));

function run(data: ProviderData, holdings = portfolio) {
  const scored = calculateTemperatureScores(data, holdings, {}, { benchmark });
  return {
    scored,
    aggregated: aggregateScores(scored.rows, 'WATS', ['sector', 'region']),
    coverage: calculateCoverage(scored.rows, 'WATS'),
  };
}

describe('determinism', () => {
  it('produces identical results for identical inputs', () => {
    const first = run(providerData);
    const second = run(providerData);
    expect(second.scored.fingerprint).toBe(first.scored.fingerprint);
    expect(second.scored.rows).toEqual(first.scored.rows);
    expect(second.aggregated).toEqual(first.aggregated);
    expect(second.coverage).toEqual(first.coverage);
  });

  it('does not depend on the order of portfolio or provider records', () => {
    const shuffled: ProviderData = {
      fundamentalData: [...providerData.fundamentalData].reverse(),
      targetData: providerData.targetData,
    };
    const forward = run(providerData);
    const backward = run(shuffled, [...portfolio].reverse());
    expect(backward.aggregated.scores).toEqual(forward.aggregated.scores);
    expect(backward.coverage.coverage).toBe(forward.coverage.coverage);
  });

  it('scores the fixture portfolio as expected', () => {
    const { scored, coverage } = run(providerData);
    expect(scored.rows).toHaveLength(54);
    const targetRows = scored.rows
      .filter((row) => row.scoreBasis === 'target')
      .map((row) => `${row.companyId}:${row.scope}:${row.timeFrame}:${row.targetId}`);
    expect(targetRows).toEqual([
      'AAA:S1S2:MID:a-mid',
      'AAA:S1S2:LONG:a-long',
      'AAA:S3:LONG:a-long',
      'AAA:S1S2S3:LONG:a-long',
      'CCC:S1S2:SHORT:c-short',
      'EEE:S3:MID:e-s3',
    ]);
    expect(coverage.excluded).toEqual(['DDD', 'FFF']);
    expect(coverage.coveredCompanies).toEqual(['AAA', 'CCC', 'EEE']);
    expect(coverage.coverage).toBeCloseTo((1165 * 100) / 1205, 10);
  });
});
