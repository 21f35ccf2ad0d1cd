export type TimeFrame = 'SHORT' | 'MID' | 'LONG';
export type Scope = 'S1' | 'S1S2' | 'S3' | 'S1S2S3';
export type EmissionCategory = 'S1' | 'S2' | 'S3';
export type TargetStatus = 'validated' | 'not_validated' | 'pending';
export type ScoreBasis = 'target' | 'fallback';
export type FallbackScore = 3.2 | 3.9 | 4.5;
export type ModelVariant = 1 | 2 | 3 | 4;
export type AggregationMethod = 'WATS' | 'TETS' | 'MOTS' | 'EOTS' | 'ECOTS' | 'AOTS' | 'ROTS';
export type GroupingKey = 'sector' | 'region';

export const TIME_FRAMES: TimeFrame[] = ['SHORT', 'MID', 'LONG'];
export const SCOPES: Scope[] = ['S1', 'S1S2', 'S3', 'S1S2S3'];
export const FALLBACK_SCORES: FallbackScore[] = [3.2, 3.9, 4.5];
export const MODEL_VARIANTS: ModelVariant[] = [1, 2, 3, 4];
export const AGGREGATION_METHODS: AggregationMethod[] = [
  'WATS',
  'TETS',
  'MOTS',
  'EOTS',
  'ECOTS',
  'AOTS',
  'ROTS',
];
export const GROUPING_KEYS: GroupingKey[] = ['sector', 'region'];

export const SCOPE_CATEGORIES: Record<Scope, EmissionCategory[]> = {
  S1: ['S1'],
  S1S2: ['S1', 'S2'],
  S3: ['S3'],
  S1S2S3: ['S1', 'S2', 'S3'],
};

export interface Company {
  companyId: string;
  companyName: string;
  sector: string | null;
  region: string | null;
  marketCap: number | null;
  enterpriseValue: number | null;
  ownershipPct: number | null;
  revenue: number | null;
  cashEquivalents: number | null;
  ghgS1S2?: number | null;
  ghgS3?: number | null;
  engagementTarget?: boolean;
}

export interface Target {
  companyId: string;
  targetId?: string;
  scopes: readonly EmissionCategory[];
  baseYear: number;
  startYear?: number;
  targetYear: number;
  reductionPct: number;
  status: TargetStatus;
  ambition?: string | null;
}

export interface PortfolioHolding {
  companyId: string;
  investmentValue: number;
}

export interface ProviderData {
  fundamentalData: Company[];
  targetData: Target[];
}

export interface TimeFrameWindow {
  minExclusive: number;
  maxInclusive: number;
}

export interface ScoreBounds {
  min: number;
  max: number;
}

export interface RunConfig {
  timeFrames: TimeFrame[];
  scopes: Scope[];
  fallbackScore: FallbackScore;
  model: ModelVariant;
  aggregationMethod: AggregationMethod;
  grouping: GroupingKey[];
  timeFrameWindows: Record<TimeFrame, TimeFrameWindow>;
  scoreBounds: ScoreBounds;
}

export interface ScoreRecord {
  companyId: string;
  companyName: string;
  scope: Scope;
  timeFrame: TimeFrame;
  temperatureScore: number;
  scoreBasis: ScoreBasis;
  targetStatus: TargetStatus | null;
  targetId: string | null;
  annualReductionRate: number | null;
  clipped: boolean;
  scenarioCapped: boolean;
  company: Company | null;
  investmentValue: number;
}

export type ScoredTable = readonly ScoreRecord[];

export function isTimeFrame(value: unknown): value is TimeFrame {
  return TIME_FRAMES.some((timeFrame) => timeFrame === value);
}

export function isScope(value: unknown): value is Scope {
  return SCOPES.some((scope) => scope === value);
}

export function isAggregationMethod(value: unknown): value is AggregationMethod {
  return AGGREGATION_METHODS.some((method) => method === value);
}
