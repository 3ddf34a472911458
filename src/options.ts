/**
 * DocModel Options — Merging per-call overrides onto base options
 *
 * One rule everywhere: overrides apply left to right, and every own property
 * whose value is not undefined replaces the current value.
 */

import type { DbOptions } from 'mongodb';

export function mergeOptions<O extends object>(base: O, ...overrides: ReadonlyArray<O | undefined>): O {
  const merged: O = { ...base };
  for (const override of overrides) {
    if (override === undefined) continue;
    for (const key in override) {
      if (!Object.prototype.hasOwnProperty.call(override, key)) continue;
      const value = override[key];
      if (value !== undefined) merged[key] = value;
    }
  }
  return merged;
}

// ─── Database Options ────────────────────────────────────────────────────────

export const DATABASE_OPTION_KEYS = [
  'readConcern',
  'readPreference',
  'writeConcern',
  'ignoreUndefined',
  'promoteLongs',
  'promoteValues',
  'promoteBuffers',
  'bsonRegExp',
  'useBigInt64',
  'enableUtf8Validation',
] as const satisfies ReadonlyArray<keyof DbOptions>;

/** The database-level settings a connector applies; other DbOptions fields are connection-level. */
export type DatabaseOptions = Pick<DbOptions, (typeof DATABASE_OPTION_KEYS)[number]>;

/**
 * Reduce caller-supplied database options to the recognized, defined fields.
 * A wider DbOptions value is accepted structurally; its extra fields are dropped.
 */
export function buildDatabaseOptions(options: DatabaseOptions): DatabaseOptions {
  const built: DatabaseOptions = {};
  for (const key of DATABASE_OPTION_KEYS) {
    copyDefined(built, options, key);
  }
  return built;
}

function copyDefined<O, K extends keyof O>(target: O, source: O, key: K): void {
  const value = source[key];
  if (value !== undefined) target[key] = value;
}
