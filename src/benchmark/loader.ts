import { readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { getEnvConfig } from '@/core/env';
import { createChildLogger } from '@/utils/logger';
import { validateBenchmarkTable, type RawBenchmarkTable } from '@/validation/ajv_instance';
import { MODEL_VARIANTS, isScope } from '@/types/temperature';
import { BenchmarkModel, type BenchmarkTrajectory } from './model';

const logger = createChildLogger('benchmark');

let cachedModel: BenchmarkModel | null = null;

function resolveTablePath(): string {
  const projectRoot = process.cwd();
  const envPath = getEnvConfig().benchmarkTablePath;
  if (envPath) {
    return isAbsolute(envPath) ? envPath : join(projectRoot, envPath);
  }
  return join(projectRoot, 'data', 'benchmark_trajectories.json');
}

export function toTrajectories(raw: RawBenchmarkTable): BenchmarkTrajectory[] {
  const trajectories: BenchmarkTrajectory[] = [];
  for (const entry of raw.trajectories) {
    const model = MODEL_VARIANTS.find((variant) => variant === entry.model);
    const scope = entry.scope;
    if (model === undefined || !isScope(scope)) {
      throw new Error(`benchmark_invalid: unsupported model/scope ${entry.model}/${entry.scope}`);
    }
    trajectories.push({ model, sector: entry.sector, scope, points: entry.points });
  }
  return trajectories;
}

export function parseBenchmarkTable(data: unknown, source: string = 'inline'): BenchmarkModel {
  const result = validateBenchmarkTable(data);
  if (!result.valid) {
    const details = result.errors.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    throw new Error(`benchmark_invalid_schema: ${source}: ${details}`);
  }
  return BenchmarkModel.fromTrajectories(toTrajectories(result.data));
}

export function loadBenchmarkTable(path: string = resolveTablePath()): BenchmarkModel {
  const json = readFileSync(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new Error(`benchmark_invalid_json: ${path}`);
  }
  const model = parseBenchmarkTable(parsed, path);
  logger.debug({ path, trajectories: model.size }, 'Loaded benchmark table');
  return model;
}

export function getBenchmarkModel(): BenchmarkModel {
  if (!cachedModel) {
    cachedModel = loadBenchmarkTable();
  }
  return cachedModel;
}

export function resetBenchmarkModel(): void {
  cachedModel = null;
}
