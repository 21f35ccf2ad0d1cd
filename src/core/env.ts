/**
 * Environment variable handling with validation
 */

export type LogLevel = 'silent' | 'debug' | 'info' | 'warn' | 'error';

export interface EnvConfig {
  logLevel: LogLevel;
  nodeEnv: 'development' | 'production' | 'test';
  temperatureConfigPath: string | null;
  benchmarkTablePath: string | null;
}

const LOG_LEVELS: LogLevel[] = ['silent', 'debug', 'info', 'warn', 'error'];
const NODE_ENVS: EnvConfig['nodeEnv'][] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value && value.trim() ? value.trim() : undefined;
}

export function loadEnvConfig(): EnvConfig {
  const logLevelRaw = getEnvVar('LOG_LEVEL') || 'info';
  const logLevel = LOG_LEVELS.find((level) => level === logLevelRaw) ?? 'info';

  const nodeEnvRaw = getEnvVar('NODE_ENV') || 'development';
  const nodeEnv = NODE_ENVS.find((candidate) => candidate === nodeEnvRaw) ?? 'development';

  return {
    logLevel,
    nodeEnv,
    temperatureConfigPath: getEnvVar('TEMPERATURE_CONFIG') ?? null,
    benchmarkTablePath: getEnvVar('BENCHMARK_TABLE') ?? null,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
