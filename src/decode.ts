/**
 * DocModel Decoding — Stored documents into typed values
 */

import { DocModelError } from './errors.js';
import type { Decoder } from './types.js';

export function decodeDocument<T>(
  decoder: Decoder<T>,
  raw: unknown,
  collection: string,
  operation: string,
): T {
  const result = decoder.safeParse(raw);
  if (result.success) return result.data;

  const issues = result.error.issues
    .map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`)
    .join(', ');

  throw new DocModelError({
    code: 'DECODE_ERROR',
    message: `Document from "${collection}" does not match the ${operation} decoder: ${issues}`,
    fix: `Align the zod schema passed to the model with the documents stored in "${collection}".`,
    originalError: result.error,
    collection,
    operation,
  });
}
