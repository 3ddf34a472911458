/**
 * Decode Tests — zod schemas as document decoders
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { decodeDocument } from '../src/decode.js';
import { DocModelError } from '../src/errors.js';

const schema = z.object({
  _id: z.string(),
  name: z.string(),
  tags: z.array(z.string()).default([]),
});

describe('decodeDocument', () => {
  it('returns the parsed value, applying schema defaults', () => {
    expect(decodeDocument(schema, { _id: 'a', name: 'Alice' }, 'users', 'findOne')).toEqual({
      _id: 'a',
      name: 'Alice',
      tags: [],
    });
  });

  it('drops fields the schema does not declare', () => {
    expect(decodeDocument(schema, { _id: 'a', name: 'Alice', tags: ['x'], extra: true }, 'users', 'findOne')).toEqual({
      _id: 'a',
      name: 'Alice',
      tags: ['x'],
    });
  });

  it('throws DECODE_ERROR listing each issue path', () => {
    let caught: unknown;
    try {
      decodeDocument(schema, { _id: 1, tags: ['x', 2] }, 'users', 'findMany');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(DocModelError);
    expect(caught).toMatchObject({ code: 'DECODE_ERROR', collection: 'users', operation: 'findMany' });
    expect(caught).toHaveProperty(
      'message',
      expect.stringContaining(
        'does not match the findMany decoder: _id: Expected string, received number, name: Required, tags.1: Expected string, received number',
      ),
    );
  });

  it('reports root-level mismatches', () => {
    expect(() => decodeDocument(schema, null, 'users', 'findOne')).toThrow(
      'Document from "users" does not match the findOne decoder: (root): Expected object, received null',
    );
  });
});
