import { z } from 'zod';
import { ConfigurationError, ConnectionError } from './errors.js';
import type { ConnectionParams } from './types.js';

const required = (name: string) =>
  z
    .string({ required_error: 'is required' })
    .trim()
    .min(1, 'is required')
    .describe(name);

const optional = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined);

const EnvSchema = z.object({
  DATABRICKS_SERVER_HOSTNAME: required('Workspace hostname')
    // The driver wants a bare host name
    .transform((value) => value.replace(/^https?:\/\//i, '').replace(/\/+$/, '')),
  DATABRICKS_HTTP_PATH: required('SQL warehouse HTTP path'),
  DATABRICKS_TOKEN: required('Personal access token'),
  DATABRICKS_CATALOG: optional,
  DATABRICKS_SCHEMA: optional
});

/**
 * Read connection parameters from environment variables
 */
export function loadConnectionParams(
  env: Record<string, string | undefined> = process.env
): ConnectionParams {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')} ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid Databricks configuration: ${problems.join('; ')}`,
      { problems }
    );
  }

  const config = parsed.data;
  return {
    hostname: config.DATABRICKS_SERVER_HOSTNAME,
    httpPath: config.DATABRICKS_HTTP_PATH,
    accessToken: config.DATABRICKS_TOKEN,
    catalog: config.DATABRICKS_CATALOG,
    schema: config.DATABRICKS_SCHEMA
  };
}

/**
 * Check the fields a connection attempt cannot do without
 */
export function assertConnectionParams(params: ConnectionParams): void {
  const missing: string[] = [];

  if (!params.hostname?.trim()) missing.push('hostname');
  if (!params.httpPath?.trim()) missing.push('httpPath');
  if (!params.accessToken?.trim()) missing.push('accessToken');

  if (missing.length > 0) {
    throw new ConnectionError(
      `Missing required connection parameters: ${missing.join(', ')}`,
      { missing }
    );
  }
}

/**
 * Human-readable configuration summary. The token is never printed.
 */
export function describeConnectionParams(
  env: Record<string, string | undefined> = process.env
): string[] {
  return [
    `  DATABRICKS_SERVER_HOSTNAME: ${env.DATABRICKS_SERVER_HOSTNAME || '❌ Not set'}`,
    `  DATABRICKS_HTTP_PATH: ${env.DATABRICKS_HTTP_PATH || '❌ Not set'}`,
    `  DATABRICKS_TOKEN: ${env.DATABRICKS_TOKEN ? '✅ Set (hidden)' : '❌ Not set'}`,
    `  DATABRICKS_CATALOG: ${env.DATABRICKS_CATALOG || '(driver default)'}`,
    `  DATABRICKS_SCHEMA: ${env.DATABRICKS_SCHEMA || '(driver default)'}`
  ];
}
