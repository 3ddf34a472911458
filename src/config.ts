/**
 * DocModel Configuration — Connector settings from the environment
 *
 * MONGODB_URI and DATABASE_NAME. Both are required; when either is missing
 * there is no configuration and callers decide what that means (the
 * integration suite skips). A value that is present but malformed throws
 * INVALID_CONFIG before any client exists.
 */

import { z } from 'zod';
import { DocModelError } from './errors.js';
import type { ConnectorConfig } from './types.js';

export const ENV_URI = 'MONGODB_URI';
export const ENV_DB_NAME = 'DATABASE_NAME';

export const EnvConfigSchema = z.object({
  [ENV_URI]: z
    .string()
    .regex(/^mongodb(\+srv)?:\/\//, 'must start with mongodb:// or mongodb+srv://'),
  [ENV_DB_NAME]: z
    .string()
    .min(1)
    .regex(/^[^/\\. "$]+$/, 'must not contain /, \\, ., space, " or $'),
});

export function readEnvConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<Omit<ConnectorConfig, 'uri' | 'dbName'>> = {},
): ConnectorConfig | null {
  const uri = env[ENV_URI];
  const dbName = env[ENV_DB_NAME];
  if (!uri || !dbName) return null;

  const parsed = EnvConfigSchema.safeParse({ [ENV_URI]: uri, [ENV_DB_NAME]: dbName });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new DocModelError({
      code: 'INVALID_CONFIG',
      message: `Invalid environment configuration: ${issues}`,
      fix: `No connection was attempted. Set ${ENV_URI} to a MongoDB connection string and ${ENV_DB_NAME} to a valid database name.`,
    });
  }

  return {
    ...overrides,
    uri: parsed.data[ENV_URI],
    dbName: parsed.data[ENV_DB_NAME],
  };
}
