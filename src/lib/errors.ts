/**
 * Fatal error types. Row- and partition-level problems are reported as
 * DataQualityWarning objects instead (see data/quality/warnings).
 */

export class ConfigurationError extends Error {
  readonly code = 'configuration_invalid';

  constructor(
    readonly field: string,
    readonly value: unknown,
    detail?: string
  ) {
    super(`configuration_invalid: ${field}=${JSON.stringify(value)}${detail ? ` (${detail})` : ''}`);
    this.name = 'ConfigurationError';
  }
}

export class ComputationError extends Error {
  readonly code = 'computation_failed';

  constructor(message: string, readonly context: Record<string, unknown> = {}) {
    super(`computation_failed: ${message}`);
    this.name = 'ComputationError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
