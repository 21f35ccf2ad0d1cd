import {
  SCOPE_CATEGORIES,
  type Scope,
  type Target,
  type TimeFrame,
  type TimeFrameWindow,
} from '@/types/temperature';

export function effectiveStartYear(target: Target): number {
  return target.startYear ?? target.baseYear;
}

/**
 * Returns the reason a target can never produce a score, or null when it is
 * usable.
 */
export function targetDefect(target: Target): string | null {
  if (target.scopes.length === 0) return 'no scope coverage';
  if (!Number.isFinite(target.reductionPct) || target.reductionPct < 0) {
    return `reduction ${target.reductionPct} is not a non-negative number`;
  }
  if (!Number.isInteger(target.baseYear) || !Number.isInteger(target.targetYear)) {
    return 'base and target year must be integers';
  }
  if (target.targetYear <= effectiveStartYear(target)) {
    return `target year ${target.targetYear} is not after start year ${effectiveStartYear(target)}`;
  }
  return null;
}

export function coversScope(target: Target, scope: Scope): boolean {
  return SCOPE_CATEGORIES[scope].every((category) => target.scopes.includes(category));
}

function matchesScopeExactly(target: Target, scope: Scope): boolean {
  const categories = SCOPE_CATEGORIES[scope];
  return coversScope(target, scope) && new Set(target.scopes).size === categories.length;
}

export function horizonYears(target: Target): number {
  return target.targetYear - target.baseYear;
}

export function inTimeFrame(target: Target, window: TimeFrameWindow): boolean {
  const horizon = horizonYears(target);
  return horizon > window.minExclusive && horizon <= window.maxInclusive;
}

export function annualReductionRate(target: Target): number {
  return target.reductionPct / (target.targetYear - effectiveStartYear(target));
}

/**
 * Picks the target used for one (scope, time frame) evaluation. Order:
 * validated first, larger reduction, later target year, exact scope match,
 * input order.
 */
export function selectTarget(
  targets: readonly Target[],
  scope: Scope,
  timeFrame: TimeFrame,
  windows: Record<TimeFrame, TimeFrameWindow>
): Target | null {
  const window = windows[timeFrame];
  let best: Target | null = null;
  for (const target of targets) {
    if (!coversScope(target, scope) || !inTimeFrame(target, window)) continue;
    if (best === null || compareCandidates(target, best, scope) < 0) {
      best = target;
    }
  }
  return best;
}

function compareCandidates(a: Target, b: Target, scope: Scope): number {
  const aValidated = a.status === 'validated' ? 1 : 0;
  const bValidated = b.status === 'validated' ? 1 : 0;
  if (aValidated !== bValidated) return bValidated - aValidated;
  if (a.reductionPct !== b.reductionPct) return b.reductionPct - a.reductionPct;
  if (a.targetYear !== b.targetYear) return b.targetYear - a.targetYear;
  const aExact = matchesScopeExactly(a, scope) ? 1 : 0;
  const bExact = matchesScopeExactly(b, scope) ? 1 : 0;
  return bExact - aExact;
}
