/**
 * Options Tests — merge rule and database option reduction
 */

import { describe, it, expect } from 'vitest';
import { ReadConcern, ReadPreference, WriteConcern } from 'mongodb';
import type { DbOptions, FindOptions } from 'mongodb';
import { buildDatabaseOptions, mergeOptions } from '../src/options.js';

describe('mergeOptions', () => {
  it('returns a copy of the base when no overrides are given', () => {
    const base: FindOptions = { limit: 10 };
    const merged = mergeOptions(base);
    expect(merged).toStrictEqual({ limit: 10 });
    expect(merged).not.toBe(base);
  });

  it('forwards an empty object for an empty base', () => {
    expect(mergeOptions<FindOptions>({})).toStrictEqual({});
  });

  it('lets the last defined value win, field by field', () => {
    const merged = mergeOptions<FindOptions>(
      { limit: 10, skip: 0 },
      { limit: 20, maxTimeMS: 100 },
      { limit: 30 },
    );
    expect(merged).toStrictEqual({ limit: 30, skip: 0, maxTimeMS: 100 });
  });

  it('ignores undefined values and undefined overrides', () => {
    const merged = mergeOptions<FindOptions>({ limit: 10 }, undefined, { limit: undefined, skip: 5 });
    expect(merged).toStrictEqual({ limit: 10, skip: 5 });
  });

  it('does not mutate the base or the overrides', () => {
    const base: FindOptions = { limit: 10 };
    const override: FindOptions = { skip: 3 };
    mergeOptions(base, override);
    expect(base).toStrictEqual({ limit: 10 });
    expect(override).toStrictEqual({ skip: 3 });
  });

  it('keeps falsy values that are defined', () => {
    const merged = mergeOptions<FindOptions>({ limit: 10, allowDiskUse: true }, { limit: 0, allowDiskUse: false });
    expect(merged).toStrictEqual({ limit: 0, allowDiskUse: false });
  });
});

describe('buildDatabaseOptions', () => {
  it('keeps the recognized, defined fields', () => {
    const readConcern = new ReadConcern('majority');
    const writeConcern = new WriteConcern('majority');
    const built = buildDatabaseOptions({
      readConcern,
      readPreference: ReadPreference.SECONDARY_PREFERRED,
      writeConcern,
      ignoreUndefined: true,
      promoteLongs: false,
    });

    expect(built).toStrictEqual({
      readConcern,
      readPreference: ReadPreference.SECONDARY_PREFERRED,
      writeConcern,
      ignoreUndefined: true,
      promoteLongs: false,
    });
  });

  it('drops connection-level and undefined fields from a wider DbOptions value', () => {
    const wide: DbOptions = {
      authSource: 'admin',
      retryWrites: false,
      timeoutMS: 500,
      readPreference: undefined,
      useBigInt64: true,
    };
    const built = buildDatabaseOptions(wide);

    expect(built).toStrictEqual({ useBigInt64: true });
  });

  it('returns an empty object when nothing is set', () => {
    expect(buildDatabaseOptions({})).toStrictEqual({});
  });
});
