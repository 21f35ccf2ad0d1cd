import type { Scope, TimeFrame } from '@/types/temperature';

export type WarningCode =
  | 'missing_company'
  | 'duplicate_company'
  | 'duplicate_holding'
  | 'invalid_target'
  | 'missing_benchmark'
  | 'score_clipped'
  | 'missing_weight'
  | 'empty_partition'
  | 'weights_not_normalized';

export interface DataQualityWarning {
  code: WarningCode;
  message: string;
  companyId?: string;
  scope?: Scope;
  timeFrame?: TimeFrame;
  context?: Record<string, unknown>;
}
