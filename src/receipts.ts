/**
 * Per-call receipts
 *
 * Model methods return decoded documents or nothing, so a receipt is the only
 * place counts and timing are kept. It travels on the 'operation' event.
 */

import type { OperationReceipt } from './types.js';

export function createReceipt(opts: {
  operation: OperationReceipt['operation'];
  collection: string;
  startTime: number;
  returnedCount?: number;
  matchedCount?: number;
  modifiedCount?: number;
  insertedCount?: number;
  deletedCount?: number;
  success?: boolean;
}): OperationReceipt {
  return {
    operation: opts.operation,
    collection: opts.collection,
    success: opts.success ?? true,
    returnedCount: opts.returnedCount ?? 0,
    matchedCount: opts.matchedCount ?? 0,
    modifiedCount: opts.modifiedCount ?? 0,
    insertedCount: opts.insertedCount ?? 0,
    deletedCount: opts.deletedCount ?? 0,
    duration: Date.now() - opts.startTime,
  };
}
