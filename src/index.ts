export * from '@/types/temperature';
export { ConfigurationError, ComputationError } from '@/lib/errors';
export type { DataQualityWarning, WarningCode } from '@/data/quality/types';
export { countWarningsByCode } from '@/data/quality/warnings';
export {
  getTemperatureConfig,
  resetTemperatureConfig,
  resolveRunConfig,
  type RunConfigOverrides,
} from '@/core/config';
export { BenchmarkModel, interpolate, type BenchmarkTrajectory } from '@/benchmark/model';
export { getBenchmarkModel, loadBenchmarkTable, parseBenchmarkTable } from '@/benchmark/loader';
export {
  calculateTemperatureScores,
  type TemperatureScoreOptions,
  type TemperatureScoreResult,
} from '@/scoring/engine';
export {
  aggregateScores,
  type AggregationResult,
  type PartitionResult,
  type Contribution,
} from '@/aggregation/engine';
export { WEIGHTING_STRATEGIES } from '@/aggregation/weighting';
export { calculateCoverage, type CoverageResult } from '@/aggregation/coverage';
export { percentageDistribution, type DistributionField } from '@/aggregation/distribution';
export {
  applyScenario,
  scenarioFromNumber,
  type Scenario,
  type ScenarioType,
  type EngagementType,
} from '@/scenario/scenario';
export type { CompanyDataProvider } from '@/providers/types';
export { InMemoryProvider } from '@/providers/in_memory_provider';
export { loadProviderData } from '@/providers/registry';
