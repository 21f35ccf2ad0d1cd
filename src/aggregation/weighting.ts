/**
 * Weight bases per aggregation method. Each strategy returns the raw,
 * un-normalized weight of one company, or null when the fundamentals it needs
 * are missing.
 */

import type { AggregationMethod, Company } from '@/types/temperature';

export interface WeightInput {
  company: Company | null;
  investmentValue: number;
}

export type WeightField =
  | 'marketCap'
  | 'enterpriseValue'
  | 'ownershipPct'
  | 'revenue'
  | 'cashEquivalents'
  | 'ghgS1S2'
  | 'ghgS3';

export interface WeightingStrategy {
  description: string;
  requiredFields: readonly WeightField[];
  weight(input: WeightInput): number | null;
}

const finite = (value: number | null | undefined): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

/**
 * Share of the company held by the portfolio, as a fraction. `ownershipPct` is
 * a percentage (0-100); without it the holding is divided by market cap.
 */
export function ownershipShare(input: WeightInput): number | null {
  const reported = finite(input.company?.ownershipPct);
  if (reported !== null) return reported / 100;

  const marketCap = finite(input.company?.marketCap);
  if (marketCap === null || marketCap <= 0) return null;
  const investment = finite(input.investmentValue);
  return investment === null ? null : investment / marketCap;
}

function scaledByOwnership(base: number | null, input: WeightInput): number | null {
  if (base === null) return null;
  const ownership = ownershipShare(input);
  return ownership === null ? null : base * ownership;
}

function totalEmissions(company: Company | null): number | null {
  const s1s2 = finite(company?.ghgS1S2);
  const s3 = finite(company?.ghgS3);
  if (s1s2 === null && s3 === null) return null;
  return (s1s2 ?? 0) + (s3 ?? 0);
}

export const WEIGHTING_STRATEGIES: Record<AggregationMethod, WeightingStrategy> = {
  WATS: {
    description: 'market capitalization',
    requiredFields: ['marketCap'],
    weight: ({ company }) => finite(company?.marketCap),
  },
  TETS: {
    description: 'total absolute emissions',
    requiredFields: ['ghgS1S2', 'ghgS3'],
    weight: ({ company }) => totalEmissions(company),
  },
  MOTS: {
    description: 'market capitalization x ownership',
    requiredFields: ['marketCap', 'ownershipPct'],
    weight: (input) => scaledByOwnership(finite(input.company?.marketCap), input),
  },
  EOTS: {
    description: 'enterprise value x ownership',
    requiredFields: ['enterpriseValue', 'ownershipPct'],
    weight: (input) => scaledByOwnership(finite(input.company?.enterpriseValue), input),
  },
  ECOTS: {
    description: '(enterprise value + cash) x ownership',
    requiredFields: ['enterpriseValue', 'cashEquivalents', 'ownershipPct'],
    weight: (input) => {
      const ev = finite(input.company?.enterpriseValue);
      const cash = finite(input.company?.cashEquivalents);
      return scaledByOwnership(ev === null || cash === null ? null : ev + cash, input);
    },
  },
  AOTS: {
    description: 'uniform',
    requiredFields: [],
    weight: () => 1,
  },
  ROTS: {
    description: 'revenue',
    requiredFields: ['revenue'],
    weight: ({ company }) => finite(company?.revenue),
  },
};

export function getWeightingStrategy(method: AggregationMethod): WeightingStrategy {
  return WEIGHTING_STRATEGIES[method];
}

/**
 * Required fields of the strategy that are missing, non-finite or not
 * positive for this company. Reported with `missing_weight` warnings.
 */
export function unusableFields(strategy: WeightingStrategy, company: Company | null): WeightField[] {
  return strategy.requiredFields.filter((field) => {
    const value = finite(company?.[field]);
    return value === null || value <= 0;
  });
}

/**
 * A weight basis is usable only when it is finite and strictly positive.
 */
export function usableWeight(value: number | null): value is number {
  return value !== null && Number.isFinite(value) && value > 0;
}
