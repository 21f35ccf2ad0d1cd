import type { Logger } from 'pino';
import type { DataQualityWarning } from './types';

/**
 * Accumulates data-quality warnings for one stage of a run and mirrors each
 * one to the stage logger.
 */
export class WarningCollector {
  private readonly items: DataQualityWarning[] = [];

  constructor(private readonly log: Logger) {}

  add(warning: DataQualityWarning): void {
    this.items.push(warning);
    this.log.warn(
      {
        code: warning.code,
        companyId: warning.companyId,
        scope: warning.scope,
        timeFrame: warning.timeFrame,
        ...warning.context,
      },
      warning.message
    );
  }

  get size(): number {
    return this.items.length;
  }

  toArray(): DataQualityWarning[] {
    return this.items.slice();
  }
}

export function countWarningsByCode(warnings: DataQualityWarning[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const warning of warnings) {
    counts[warning.code] = (counts[warning.code] ?? 0) + 1;
  }
  return counts;
}
