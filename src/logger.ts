/**
 * Model call logging
 *
 * A Model hands each receipt and each mapped failure to its logger, which
 * forwards them as 'operation', 'slow-query' and 'error' events. Logging off
 * means no events at all; nothing is written to a stream here.
 */

import type { DocModelError } from './errors.js';
import type { DocModelEventEmitter } from './events.js';
import type { OperationReceipt } from './types.js';

export interface LoggerConfig {
  enabled: boolean;
  slowQueryMs: number;
}

export const DEFAULT_SLOW_QUERY_MS = 1000;

export class DocModelLogger {
  private config: LoggerConfig;
  private emitter: DocModelEventEmitter;

  constructor(config: LoggerConfig, emitter: DocModelEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  /**
   * Log a completed operation.
   */
  logOperation(receipt: OperationReceipt): void {
    if (!this.config.enabled) return;

    this.emitter.emit('operation', {
      collection: receipt.collection,
      operation: receipt.operation,
      durationMs: receipt.duration,
      receipt,
    });

    if (receipt.duration >= this.config.slowQueryMs) {
      this.emitter.emit('slow-query', {
        collection: receipt.collection,
        operation: receipt.operation,
        durationMs: receipt.duration,
        threshold: this.config.slowQueryMs,
      });
    }
  }

  /**
   * Log a failed operation. Emits only when someone listens for 'error',
   * since an unhandled 'error' event would throw.
   */
  logError(err: DocModelError): void {
    if (!this.config.enabled || !this.emitter.hasListeners('error')) return;

    this.emitter.emit('error', {
      code: err.code,
      message: err.message,
      fix: err.fix,
      collection: err.collection,
      operation: err.operation,
    });
  }
}
