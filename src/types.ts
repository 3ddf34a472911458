/**
 * DocModel — All shared types and interfaces
 *
 * Every other file imports from here. Nothing in here imports runtime code.
 */

import type {
  AggregateOptions,
  DeleteOptions,
  Document,
  Filter,
  FindOptions,
  InsertOneOptions,
  MongoClientOptions,
  UpdateFilter,
  UpdateOptions,
} from 'mongodb';
import type { z } from 'zod';
import type { DatabaseOptions } from './options.js';

// ─── Decoders ────────────────────────────────────────────────────────────────

/**
 * Runtime witness for a document or result type. Any zod schema whose output
 * is `T` qualifies, including ones with defaults or transforms.
 */
export type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ─── Query Payloads (opaque, forwarded verbatim) ─────────────────────────────

export type ModelFilter = Filter<Document>;
export type ModelUpdate = UpdateFilter<Document> | Document[];
export type Pipeline = Document[];

// ─── Call Context ────────────────────────────────────────────────────────────

export interface CallContext {
  /** Aborting the signal fails the call with CANCELLED. */
  signal?: AbortSignal;
}

export type FindCallOptions = FindOptions & CallContext;
export type UpdateCallOptions = UpdateOptions & CallContext;
export type InsertCallOptions = InsertOneOptions & CallContext;
export type DeleteCallOptions = DeleteOptions & CallContext;
export type AggregateCallOptions = AggregateOptions & CallContext;

export interface ModelDefaults {
  find?: FindCallOptions;
  update?: UpdateCallOptions;
  insert?: InsertCallOptions;
  delete?: DeleteCallOptions;
  aggregate?: AggregateCallOptions;
}

// ─── Store Capability ────────────────────────────────────────────────────────
//
// The slice of the driver the Model talks to. `Db` and `Collection<Document>`
// from `mongodb` satisfy these structurally.

export interface DocumentCursor extends AsyncIterable<Document> {
  close(): Promise<void>;
}

export interface UpdateCounts {
  matchedCount: number;
  modifiedCount: number;
}

export interface DeleteCounts {
  deletedCount: number;
}

export interface CollectionHandle {
  readonly collectionName: string;
  findOne(filter: ModelFilter, options: FindOptions): Promise<Document | null>;
  find(filter: ModelFilter, options: FindOptions): DocumentCursor;
  insertOne(doc: Document, options: InsertOneOptions): Promise<unknown>;
  updateOne(filter: ModelFilter, update: ModelUpdate, options: UpdateOptions): Promise<UpdateCounts>;
  updateMany(filter: ModelFilter, update: ModelUpdate, options: UpdateOptions): Promise<UpdateCounts>;
  deleteOne(filter: ModelFilter, options: DeleteOptions): Promise<DeleteCounts>;
  deleteMany(filter: ModelFilter, options: DeleteOptions): Promise<DeleteCounts>;
  aggregate(pipeline: Pipeline, options: AggregateOptions): DocumentCursor;
}

export interface DatabaseHandle {
  readonly databaseName: string;
  collection(name: string): CollectionHandle;
}

// ─── Operation Receipt ───────────────────────────────────────────────────────

export type ModelOperation =
  | 'findOne'
  | 'findMany'
  | 'create'
  | 'updateOne'
  | 'updateMany'
  | 'deleteOne'
  | 'deleteMany'
  | 'aggregate';

export interface OperationReceipt {
  operation: ModelOperation;
  collection: string;
  success: boolean;
  returnedCount: number;
  matchedCount: number;
  modifiedCount: number;
  insertedCount: number;
  deletedCount: number;
  duration: number;
}

// ─── Connection Config ───────────────────────────────────────────────────────

export interface ClientConfig {
  uri: string;
  options?: MongoClientOptions;
}

export interface ConnectorConfig {
  uri: string;
  dbName: string;
  label?: string;
  /** Database-level read / write concern, read preference and BSON settings. */
  databaseOptions?: DatabaseOptions;
  /** Replaces the URI-derived client configuration entirely when present. */
  clientConfig?: ClientConfig;
  logging?: boolean;
  slowQueryMs?: number;
}

export interface Connector<T> {
  connect(): Promise<T>;
}

export interface ConnectionStatus {
  state: 'connected' | 'disconnected';
  uri: string;
  dbName: string;
  label: string;
  uptimeMs: number;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export type DocModelErrorCode =
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'NOT_FOUND'
  | 'DECODE_ERROR'
  | 'EXECUTION_ERROR'
  | 'DUPLICATE_KEY'
  | 'EMPTY_RESULT'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'NOT_CONNECTED'
  | 'DRIVER_ERROR'
  | 'INVALID_CONFIG';

// ─── Event Types ─────────────────────────────────────────────────────────────

export interface DocModelEvents {
  connected: { dbName: string; label: string; uri: string };
  disconnected: { dbName: string; label: string; reason: string; timestamp: Date };
  error: { code: DocModelErrorCode; message: string; fix: string; collection?: string; operation?: string };
  operation: { collection: string; operation: ModelOperation; durationMs: number; receipt: OperationReceipt };
  'slow-query': { collection: string; operation: ModelOperation; durationMs: number; threshold: number };
}
