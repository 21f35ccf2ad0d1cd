/**
 * JSON schemas for the run configuration and the benchmark table, read from
 * schemas/ under the working directory.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { ConfigurationError, describeError } from '@/lib/errors';

export type SchemaName = 'run_config.v1' | 'benchmark_table.v1';

export interface Schema {
  $schema: string;
  $id: string;
  title?: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
}

const schemaCache = new Map<SchemaName, Schema>();

export function schemaPath(name: SchemaName): string {
  return join(process.cwd(), 'schemas', `${name}.schema.json`);
}

export function loadSchema(name: SchemaName): Schema {
  const cached = schemaCache.get(name);
  if (cached) {
    return cached;
  }

  const path = schemaPath(name);
  let schema: Schema;
  try {
    schema = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError('schema', path, describeError(error));
  }

  schemaCache.set(name, schema);
  return schema;
}

export function getRunConfigSchema(): Schema {
  return loadSchema('run_config.v1');
}

export function getBenchmarkTableSchema(): Schema {
  return loadSchema('benchmark_table.v1');
}
