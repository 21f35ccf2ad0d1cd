/**
 * Ajv validation instance with schema validators
 */

import Ajv2020, { type ErrorObject, type ValidateFunction } from 'ajv/dist/2020';
import { getBenchmarkTableSchema, getRunConfigSchema } from './schema_loader';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

export interface RawTimeFrameWindow {
  min_exclusive: number;
  max_inclusive: number;
}

export interface RawRunConfig {
  time_frames: string[];
  scopes: string[];
  fallback_score: number;
  model: number;
  aggregation_method: string;
  grouping: string[];
  time_frame_windows: Record<'SHORT' | 'MID' | 'LONG', RawTimeFrameWindow>;
  score_bounds: { min: number; max: number };
}

export interface RawBenchmarkPoint {
  year: number;
  param: number;
  intercept: number;
}

export interface RawBenchmarkTable {
  version: string;
  unit?: string;
  trajectories: Array<{
    model: number;
    sector: string;
    scope: string;
    points: RawBenchmarkPoint[];
  }>;
}

// Lazy-loaded validators
let runConfigValidator: ValidateFunction<RawRunConfig> | null = null;
let benchmarkTableValidator: ValidateFunction<RawBenchmarkTable> | null = null;

export function getRunConfigValidator(): ValidateFunction<RawRunConfig> {
  if (!runConfigValidator) {
    runConfigValidator = ajv.compile<RawRunConfig>(getRunConfigSchema());
  }
  return runConfigValidator;
}

export function getBenchmarkTableValidator(): ValidateFunction<RawBenchmarkTable> {
  if (!benchmarkTableValidator) {
    benchmarkTableValidator = ajv.compile<RawBenchmarkTable>(getBenchmarkTableSchema());
  }
  return benchmarkTableValidator;
}

export interface ValidationIssue {
  field: string;
  value: unknown;
  message: string;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: ValidationIssue[] };

function instanceValue(data: unknown, instancePath: string): unknown {
  let current: unknown = data;
  for (const segment of instancePath.split('/').slice(1)) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

function toIssue(data: unknown, error: ErrorObject): ValidationIssue {
  const missing =
    error.keyword === 'required' && typeof error.params.missingProperty === 'string'
      ? `/${error.params.missingProperty}`
      : '';
  const path = `${error.instancePath}${missing}`;
  return {
    field: path ? path.slice(1).replace(/\//g, '.') : 'root',
    value: instanceValue(data, path),
    message: error.message ?? 'invalid value',
  };
}

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map((e) => toIssue(data, e)) ?? [
    { field: 'root', value: data, message: 'Unknown validation error' },
  ];

  return { valid: false, data: null, errors };
}

export function validateRunConfig(data: unknown): ValidationResult<RawRunConfig> {
  return runValidator(getRunConfigValidator(), data);
}

export function validateBenchmarkTable(data: unknown): ValidationResult<RawBenchmarkTable> {
  return runValidator(getBenchmarkTableValidator(), data);
}
