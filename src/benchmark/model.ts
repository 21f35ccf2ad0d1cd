/**
 * Sector/scope benchmark trajectories per regression model variant.
 *
 * Each trajectory is a year-indexed series of regression coefficients. The
 * implied temperature of a target is `param * annualReductionRate + intercept`
 * with the coefficients interpolated at the target year.
 */

import type { ModelVariant, Scope } from '@/types/temperature';

export interface BenchmarkPoint {
  year: number;
  param: number;
  intercept: number;
}

export interface BenchmarkTrajectory {
  model: ModelVariant;
  sector: string;
  scope: Scope;
  points: readonly BenchmarkPoint[];
}

export interface RegressionCoefficients {
  param: number;
  intercept: number;
}

function trajectoryKey(model: ModelVariant, sector: string, scope: Scope): string {
  return `${model}|${sector.trim().toLowerCase()}|${scope}`;
}

function lerp(from: number, to: number, fraction: number): number {
  return from + (to - from) * fraction;
}

export function interpolate(
  trajectory: BenchmarkTrajectory,
  year: number
): RegressionCoefficients {
  const { points } = trajectory;
  const first = points[0];
  const last = points[points.length - 1];
  if (year <= first.year) return { param: first.param, intercept: first.intercept };
  if (year >= last.year) return { param: last.param, intercept: last.intercept };

  for (let i = 1; i < points.length; i++) {
    const upper = points[i];
    if (year > upper.year) continue;
    const lower = points[i - 1];
    const fraction = (year - lower.year) / (upper.year - lower.year);
    return {
      param: lerp(lower.param, upper.param, fraction),
      intercept: lerp(lower.intercept, upper.intercept, fraction),
    };
  }

  return { param: last.param, intercept: last.intercept };
}

export class BenchmarkModel {
  private readonly index: ReadonlyMap<string, BenchmarkTrajectory>;

  private constructor(index: Map<string, BenchmarkTrajectory>) {
    this.index = index;
  }

  /**
   * Builds the lookup index. Points are sorted by year; duplicate years and
   * duplicate (model, sector, scope) keys are rejected.
   */
  static fromTrajectories(trajectories: readonly BenchmarkTrajectory[]): BenchmarkModel {
    const index = new Map<string, BenchmarkTrajectory>();
    for (const trajectory of trajectories) {
      if (trajectory.points.length === 0) {
        throw new Error(
          `benchmark_invalid: empty trajectory for ${trajectory.sector}/${trajectory.scope} model ${trajectory.model}`
        );
      }
      const key = trajectoryKey(trajectory.model, trajectory.sector, trajectory.scope);
      if (index.has(key)) {
        throw new Error(`benchmark_invalid: duplicate trajectory ${key}`);
      }
      const points = [...trajectory.points].sort((a, b) => a.year - b.year);
      for (let i = 1; i < points.length; i++) {
        if (points[i].year === points[i - 1].year) {
          throw new Error(`benchmark_invalid: duplicate year ${points[i].year} in ${key}`);
        }
      }
      index.set(key, Object.freeze({ ...trajectory, points: Object.freeze(points) }));
    }
    return new BenchmarkModel(index);
  }

  get size(): number {
    return this.index.size;
  }

  lookup(model: ModelVariant, sector: string, scope: Scope): BenchmarkTrajectory | null {
    return this.index.get(trajectoryKey(model, sector, scope)) ?? null;
  }

  /**
   * Returns null when no trajectory exists for the sector/scope under this
   * model variant.
   */
  impliedTemperature(
    model: ModelVariant,
    sector: string,
    scope: Scope,
    targetYear: number,
    annualReductionRate: number
  ): number | null {
    const trajectory = this.lookup(model, sector, scope);
    if (!trajectory) return null;
    const { param, intercept } = interpolate(trajectory, targetYear);
    return param * annualReductionRate + intercept;
  }
}
