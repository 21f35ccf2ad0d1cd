/**
 * Run configuration loaded from config/temperature_score.json, with per-run
 * overrides validated against schemas/run_config.v1.schema.json.
 */

import { readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { getEnvConfig } from '@/core/env';
import { ConfigurationError } from '@/lib/errors';
import { validateRunConfig, type RawRunConfig } from '@/validation/ajv_instance';
import {
  AGGREGATION_METHODS,
  FALLBACK_SCORES,
  GROUPING_KEYS,
  MODEL_VARIANTS,
  SCOPES,
  TIME_FRAMES,
  type RunConfig,
  type ScoreBounds,
  type TimeFrame,
  type TimeFrameWindow,
} from '@/types/temperature';

/**
 * Loosely typed so callers can hand through values read from a spreadsheet
 * or a request; everything is checked before use.
 */
export interface RunConfigOverrides {
  timeFrames?: readonly string[];
  scopes?: readonly string[];
  fallbackScore?: number;
  model?: number;
  aggregationMethod?: string;
  grouping?: readonly string[];
  timeFrameWindows?: Partial<Record<TimeFrame, TimeFrameWindow>>;
  scoreBounds?: Partial<ScoreBounds>;
}

let cachedDefaults: RawRunConfig | null = null;

function resolveConfigPath(): string {
  const projectRoot = process.cwd();
  const envPath = getEnvConfig().temperatureConfigPath;
  if (envPath) {
    return isAbsolute(envPath) ? envPath : join(projectRoot, envPath);
  }
  return join(projectRoot, 'config', 'temperature_score.json');
}

function firstIssue(raw: unknown): ConfigurationError | null {
  const result = validateRunConfig(raw);
  if (result.valid) return null;
  const [issue] = result.errors;
  return new ConfigurationError(issue.field, issue.value, issue.message);
}

export function loadTemperatureConfig(): RawRunConfig {
  const path = resolveConfigPath();
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'unreadable';
    throw new ConfigurationError('config_file', path, reason);
  }

  const result = validateRunConfig(parsed);
  if (!result.valid) {
    const [issue] = result.errors;
    throw new ConfigurationError(issue.field, issue.value, `${issue.message} in ${path}`);
  }
  return result.data;
}

export function getTemperatureConfig(): RawRunConfig {
  if (!cachedDefaults) {
    cachedDefaults = loadTemperatureConfig();
  }
  return cachedDefaults;
}

export function resetTemperatureConfig(): void {
  cachedDefaults = null;
}

function toRawWindow(window: TimeFrameWindow) {
  return { min_exclusive: window.minExclusive, max_inclusive: window.maxInclusive };
}

function mergeOverrides(defaults: RawRunConfig, overrides: RunConfigOverrides): RawRunConfig {
  const windows = { ...defaults.time_frame_windows };
  for (const timeFrame of TIME_FRAMES) {
    const window = overrides.timeFrameWindows?.[timeFrame];
    if (window) windows[timeFrame] = toRawWindow(window);
  }

  return {
    time_frames: overrides.timeFrames ? [...overrides.timeFrames] : defaults.time_frames,
    scopes: overrides.scopes ? [...overrides.scopes] : defaults.scopes,
    fallback_score: overrides.fallbackScore ?? defaults.fallback_score,
    model: overrides.model ?? defaults.model,
    aggregation_method: overrides.aggregationMethod ?? defaults.aggregation_method,
    grouping: overrides.grouping ? [...overrides.grouping] : defaults.grouping,
    time_frame_windows: windows,
    score_bounds: { ...defaults.score_bounds, ...overrides.scoreBounds },
  };
}

function pick<T extends string | number>(allowed: readonly T[], value: unknown, field: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigurationError(field, value);
  }
  return match;
}

/**
 * Merges overrides onto the configured defaults and validates the result.
 * Throws ConfigurationError naming the first offending field.
 */
export function resolveRunConfig(overrides: RunConfigOverrides = {}): RunConfig {
  const raw = mergeOverrides(getTemperatureConfig(), overrides);
  const schemaError = firstIssue(raw);
  if (schemaError) throw schemaError;

  if (raw.score_bounds.min > raw.score_bounds.max) {
    throw new ConfigurationError('score_bounds', raw.score_bounds, 'min must not exceed max');
  }

  const toWindow = (timeFrame: TimeFrame): TimeFrameWindow => {
    const window = raw.time_frame_windows[timeFrame];
    if (window.min_exclusive >= window.max_inclusive) {
      throw new ConfigurationError(`time_frame_windows.${timeFrame}`, window, 'empty window');
    }
    return { minExclusive: window.min_exclusive, maxInclusive: window.max_inclusive };
  };
  const timeFrameWindows: Record<TimeFrame, TimeFrameWindow> = {
    SHORT: toWindow('SHORT'),
    MID: toWindow('MID'),
    LONG: toWindow('LONG'),
  };

  return {
    timeFrames: raw.time_frames.map((value, i) => pick(TIME_FRAMES, value, `time_frames.${i}`)),
    scopes: raw.scopes.map((value, i) => pick(SCOPES, value, `scopes.${i}`)),
    fallbackScore: pick(FALLBACK_SCORES, raw.fallback_score, 'fallback_score'),
    model: pick(MODEL_VARIANTS, raw.model, 'model'),
    aggregationMethod: pick(AGGREGATION_METHODS, raw.aggregation_method, 'aggregation_method'),
    grouping: raw.grouping.map((value, i) => pick(GROUPING_KEYS, value, `grouping.${i}`)),
    timeFrameWindows,
    scoreBounds: { min: raw.score_bounds.min, max: raw.score_bounds.max },
  };
}
