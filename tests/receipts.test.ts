/**
 * Receipt Tests — Structured operation receipts
 */

import { describe, it, expect } from 'vitest';
import { createReceipt } from '../src/receipts.js';

describe('createReceipt', () => {
  it('creates insert receipt', () => {
    const receipt = createReceipt({
      operation: 'create',
      collection: 'users',
      startTime: Date.now() - 12,
      insertedCount: 1,
    });

    expect(receipt.operation).toBe('create');
    expect(receipt.collection).toBe('users');
    expect(receipt.success).toBe(true);
    expect(receipt.insertedCount).toBe(1);
    expect(receipt.returnedCount).toBe(0);
    expect(receipt.matchedCount).toBe(0);
    expect(receipt.modifiedCount).toBe(0);
    expect(receipt.deletedCount).toBe(0);
    expect(receipt.duration).toBeGreaterThanOrEqual(12);
  });

  it('creates update receipt', () => {
    const receipt = createReceipt({
      operation: 'updateMany',
      collection: 'users',
      startTime: Date.now(),
      matchedCount: 100,
      modifiedCount: 42,
    });

    expect(receipt.matchedCount).toBe(100);
    expect(receipt.modifiedCount).toBe(42);
  });

  it('creates read receipt', () => {
    const receipt = createReceipt({
      operation: 'aggregate',
      collection: 'orders',
      startTime: Date.now(),
      returnedCount: 7,
    });

    expect(receipt.returnedCount).toBe(7);
    expect(receipt.deletedCount).toBe(0);
  });

  it('allows explicit success: false', () => {
    const receipt = createReceipt({
      operation: 'deleteOne',
      collection: 'users',
      startTime: Date.now(),
      success: false,
    });

    expect(receipt.success).toBe(false);
  });
});
