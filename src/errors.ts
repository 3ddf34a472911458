/**
 * DocModel Error System — Normalized errors with fix instructions
 *
 * Every driver failure is caught once, normalized into a DocModelError that
 * names the collection and operation, and carries a hint on how to recover.
 */

import type { DocModelErrorCode } from './types.js';

// ─── DocModelError ───────────────────────────────────────────────────────────

export class DocModelError extends Error {
  readonly code: DocModelErrorCode;
  readonly originalError: unknown;
  readonly collection?: string;
  readonly operation?: string;
  readonly retryable: boolean;
  readonly timestamp: Date;
  readonly fix: string;

  constructor(opts: {
    code: DocModelErrorCode;
    message: string;
    fix: string;
    originalError?: unknown;
    collection?: string;
    operation?: string;
    retryable?: boolean;
  }) {
    super(`${opts.message} Fix: ${opts.fix}`);
    this.name = 'DocModelError';
    this.code = opts.code;
    this.originalError = opts.originalError;
    this.collection = opts.collection;
    this.operation = opts.operation;
    this.retryable = opts.retryable ?? ERROR_RETRYABLE[opts.code];
    this.timestamp = new Date();
    this.fix = opts.fix;
  }
}

export function isDocModelError(err: unknown, code?: DocModelErrorCode): err is DocModelError {
  return err instanceof DocModelError && (code === undefined || err.code === code);
}

// ─── Error Code Metadata ─────────────────────────────────────────────────────

export const ERROR_RETRYABLE: Record<DocModelErrorCode, boolean> = {
  CONNECTION_FAILED: true,
  AUTHENTICATION_FAILED: false,
  NOT_FOUND: false,
  DECODE_ERROR: false,
  EXECUTION_ERROR: false,
  DUPLICATE_KEY: false,
  EMPTY_RESULT: false,
  TIMEOUT: true,
  CANCELLED: false,
  NOT_CONNECTED: false,
  INVALID_CONFIG: false,
  DRIVER_ERROR: true,
};

// ─── MongoDB Error Mapping ───────────────────────────────────────────────────

export function mapMongoError(err: unknown, collection?: string, operation?: string): DocModelError {
  const code = readCode(err);
  const message = readMessage(err);
  const target = collection ?? 'unknown';

  // E11000 duplicate key
  if (code === 11000 || code === 11001) {
    const match = message.match(/index: (\S+)/);
    const indexName = match?.[1] ?? 'unknown';
    return new DocModelError({
      code: 'DUPLICATE_KEY',
      message: `Duplicate key violation on index "${indexName}" in "${target}".`,
      fix: `A document with this key already exists. Use updateOne() to change it, or check for it with findOne() first.`,
      originalError: err,
      collection,
      operation,
    });
  }

  // Authentication
  if (code === 18 || message.includes('Authentication failed') || message.includes('EAUTH')) {
    return new DocModelError({
      code: 'AUTHENTICATION_FAILED',
      message: `MongoDB authentication failed.`,
      fix: `Check the username, password and authSource in the connection URI.`,
      originalError: err,
      collection,
      operation,
    });
  }

  // Connection refused / unreachable
  if (message.includes('ECONNREFUSED') || message.includes('ENOTFOUND') || message.includes('getaddrinfo')) {
    return new DocModelError({
      code: 'CONNECTION_FAILED',
      message: `Cannot connect to MongoDB.`,
      fix: `Verify the MongoDB URI is correct and the server is running. Check firewall and network access.`,
      originalError: err,
      collection,
      operation,
    });
  }

  // Server selection timeout: no reachable server within serverSelectionTimeoutMS
  if (message.includes('Server selection timed out')) {
    return new DocModelError({
      code: operation === 'connect' ? 'CONNECTION_FAILED' : 'TIMEOUT',
      message: `MongoDB server selection timed out.`,
      fix: `Check that the server named in the URI is reachable, or raise serverSelectionTimeoutMS.`,
      originalError: err,
      collection,
      operation,
    });
  }

  // maxTimeMS exceeded (code 50) or client-side operation timeout
  if (code === 50 || message.includes('maxTimeMS') || message.includes('timed out')) {
    return new DocModelError({
      code: 'TIMEOUT',
      message: `MongoDB ${operation ?? 'operation'} timed out on "${target}".`,
      fix: `Add a filter to narrow results, add an index, or raise maxTimeMS.`,
      originalError: err,
      collection,
      operation,
    });
  }

  // Driver-side abort of a signal-carrying call
  if (readName(err) === 'AbortError') {
    return cancelledError(collection, operation, err);
  }

  // A caller deadline (AbortSignal.timeout) fired; its DOMException code is not a server code
  if (readName(err) === 'TimeoutError') {
    return new DocModelError({
      code: 'TIMEOUT',
      message: `${operation ?? 'Operation'} on "${target}" passed the caller's deadline.`,
      fix: `Give the call a longer AbortSignal.timeout() or narrow the work it does.`,
      originalError: err,
      collection,
      operation,
    });
  }

  if (operation === 'connect') {
    return new DocModelError({
      code: 'CONNECTION_FAILED',
      message: `Cannot connect to MongoDB: ${message}`,
      fix: `Check the connection URI and client options.`,
      originalError: err,
      operation,
    });
  }

  // Any other server response is a rejection of the operation itself
  if (code !== undefined) {
    return new DocModelError({
      code: 'EXECUTION_ERROR',
      message: `MongoDB rejected ${operation ?? 'operation'} on "${target}": ${message}`,
      fix: `Check the filter, update or pipeline passed to ${operation ?? 'the operation'}.`,
      originalError: err,
      collection,
      operation,
    });
  }

  // Fallback
  return new DocModelError({
    code: 'DRIVER_ERROR',
    message: `MongoDB driver error on "${target}": ${message}`,
    fix: `Check the original error for details.`,
    originalError: err,
    collection,
    operation,
  });
}

// ─── Generic Error Mapper ────────────────────────────────────────────────────

export function mapNativeError(err: unknown, collection?: string, operation?: string): DocModelError {
  if (err instanceof DocModelError) return err;
  return mapMongoError(err, collection, operation);
}

// ─── Error Helpers ───────────────────────────────────────────────────────────

export function notFoundError(collection: string): DocModelError {
  return new DocModelError({
    code: 'NOT_FOUND',
    message: `No document in "${collection}" matches the filter.`,
    fix: `Use findMany() when zero matches is an expected outcome.`,
    collection,
    operation: 'findOne',
  });
}

export function emptyResultError(collection: string): DocModelError {
  return new DocModelError({
    code: 'EMPTY_RESULT',
    message: `Aggregation on "${collection}" produced no rows.`,
    fix: `Check the $match stages of the pipeline, or treat EMPTY_RESULT as "nothing to report" at the call site.`,
    collection,
    operation: 'aggregate',
  });
}

export function cancelledError(collection?: string, operation?: string, originalError?: unknown): DocModelError {
  return new DocModelError({
    code: 'CANCELLED',
    message: `${operation ?? 'Operation'} on "${collection ?? 'unknown'}" was cancelled.`,
    fix: `The caller's AbortSignal fired. Issue the call again with a fresh signal if it is still needed.`,
    originalError,
    collection,
    operation,
  });
}

export function notConnectedError(label: string): DocModelError {
  return new DocModelError({
    code: 'NOT_CONNECTED',
    message: `Connector "${label}" has no open client.`,
    fix: `Await connector.connect() before creating models.`,
  });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function readCode(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'number' ? err.code : undefined;
}

function readMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

function readName(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('name' in err)) return undefined;
  return typeof err.name === 'string' ? err.name : undefined;
}
