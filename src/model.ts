/**
 * DocModel — Generic typed model over one MongoDB collection
 *
 * Every call is one driver operation:
 *
 *   caller → Model<T, C>
 *     → mergeOptions (model defaults + per-call overrides)
 *     → cancellation check
 *     → collection handle (resolved once, at construction)
 *     → decode (zod schema for T, or for C on aggregate)
 *     → receipt → logger (emit event)
 *     → return to caller
 *
 * Zero matches differ by operation: findOne rejects with NOT_FOUND, findMany
 * resolves to [], aggregate rejects with EMPTY_RESULT.
 */

import type { Document } from 'mongodb';
import { throwIfCancelled } from './context.js';
import { decodeDocument } from './decode.js';
import { emptyResultError, mapNativeError, notFoundError } from './errors.js';
import { DocModelEventEmitter } from './events.js';
import { DEFAULT_SLOW_QUERY_MS, DocModelLogger } from './logger.js';
import { mergeOptions } from './options.js';
import { createReceipt } from './receipts.js';
import type {
  AggregateCallOptions,
  CallContext,
  CollectionHandle,
  DatabaseHandle,
  Decoder,
  DeleteCallOptions,
  DocumentCursor,
  FindCallOptions,
  InsertCallOptions,
  ModelDefaults,
  ModelFilter,
  ModelOperation,
  ModelUpdate,
  Pipeline,
  UpdateCallOptions,
} from './types.js';

export interface ModelOptions<T, C> {
  /** Decodes stored documents into T. */
  schema: Decoder<T>;
  /** Decodes aggregation output rows into C. */
  resultSchema: Decoder<C>;
  defaults?: ModelDefaults;
  emitter?: DocModelEventEmitter;
  logging?: boolean;
  slowQueryMs?: number;
}

export class Model<T extends Document, C> {
  readonly name: string;

  private readonly collection: CollectionHandle;
  private readonly schema: Decoder<T>;
  private readonly resultSchema: Decoder<C>;
  private readonly defaults: Readonly<Required<ModelDefaults>>;
  private readonly logger: DocModelLogger;

  constructor(db: DatabaseHandle, name: string, options: ModelOptions<T, C>) {
    this.name = name;
    this.collection = db.collection(name);
    this.schema = options.schema;
    this.resultSchema = options.resultSchema;
    this.defaults = {
      find: options.defaults?.find ?? {},
      update: options.defaults?.update ?? {},
      insert: options.defaults?.insert ?? {},
      delete: options.defaults?.delete ?? {},
      aggregate: options.defaults?.aggregate ?? {},
    };
    this.logger = new DocModelLogger(
      {
        enabled: options.logging !== false,
        slowQueryMs: options.slowQueryMs ?? DEFAULT_SLOW_QUERY_MS,
      },
      options.emitter ?? new DocModelEventEmitter(),
    );
  }

  // ─── Read Operations ───────────────────────────────────────────────────────

  async findOne(filter: ModelFilter, ...options: FindCallOptions[]): Promise<T> {
    const startTime = Date.now();
    const opts = mergeOptions(this.defaults.find, ...options);

    return this.run('findOne', opts, async () => {
      const document = await this.collection.findOne(filter, opts);
      if (document === null) throw notFoundError(this.name);

      const decoded = decodeDocument(this.schema, document, this.name, 'findOne');
      this.logger.logOperation(createReceipt({
        operation: 'findOne',
        collection: this.name,
        startTime,
        returnedCount: 1,
      }));
      return decoded;
    });
  }

  async findMany(filter: ModelFilter, ...options: FindCallOptions[]): Promise<T[]> {
    const startTime = Date.now();
    const opts = mergeOptions(this.defaults.find, ...options);

    return this.run('findMany', opts, async () => {
      const results = await this.drain(
        this.collection.find(filter, opts),
        this.schema,
        opts,
        'findMany',
      );
      this.logger.logOperation(createReceipt({
        operation: 'findMany',
        collection: this.name,
        startTime,
        returnedCount: results.length,
      }));
      return results;
    });
  }

  // ─── Write Operations ──────────────────────────────────────────────────────

  /**
   * Insert `document` as given. The driver assigns `_id` to the object it
   * receives, so it gets a shallow copy and the caller's object stays as is.
   */
  async create(document: T, options?: InsertCallOptions): Promise<void> {
    const startTime = Date.now();
    const opts = mergeOptions(this.defaults.insert, options);

    await this.run('create', opts, async () => {
      await this.collection.insertOne({ ...document }, opts);
      this.logger.logOperation(createReceipt({
        operation: 'create',
        collection: this.name,
        startTime,
        insertedCount: 1,
      }));
    });
  }

  async updateOne(filter: ModelFilter, update: ModelUpdate, ...options: UpdateCallOptions[]): Promise<void> {
    const startTime = Date.now();
    const opts = mergeOptions(this.defaults.update, ...options);

    await this.run('updateOne', opts, async () => {
      const result = await this.collection.updateOne(filter, update, opts);
      this.logger.logOperation(createReceipt({
        operation: 'updateOne',
        collection: this.name,
        startTime,
        matchedCount: result.matchedCount,
        modifiedCount: result.modifiedCount,
      }));
    });
  }

  async updateMany(filter: ModelFilter, update: ModelUpdate, ...options: UpdateCallOptions[]): Promise<void> {
    const startTime = Date.now();
    const opts = mergeOptions(this.defaults.update, ...options);

    await this.run('updateMany', opts, async () => {
      const result = await this.collection.updateMany(filter, update, opts);
      this.logger.logOperation(createReceipt({
        operation: 'updateMany',
        collection: this.name,
        startTime,
        matchedCount: result.matchedCount,
        modifiedCount: result.modifiedCount,
      }));
    });
  }

  async deleteOne(filter: ModelFilter, options?: DeleteCallOptions): Promise<void> {
    const startTime = Date.now();
    const opts = mergeOptions(this.defaults.delete, options);

    await this.run('deleteOne', opts, async () => {
      const result = await this.collection.deleteOne(filter, opts);
      this.logger.logOperation(createReceipt({
        operation: 'deleteOne',
        collection: this.name,
        startTime,
        deletedCount: result.deletedCount,
      }));
    });
  }

  async deleteMany(filter: ModelFilter, options?: DeleteCallOptions): Promise<void> {
    const startTime = Date.now();
    const opts = mergeOptions(this.defaults.delete, options);

    await this.run('deleteMany', opts, async () => {
      const result = await this.collection.deleteMany(filter, opts);
      this.logger.logOperation(createReceipt({
        operation: 'deleteMany',
        collection: this.name,
        startTime,
        deletedCount: result.deletedCount,
      }));
    });
  }

  // ─── Aggregation ───────────────────────────────────────────────────────────

  async aggregate(pipeline: Pipeline, ...options: AggregateCallOptions[]): Promise<C[]> {
    const startTime = Date.now();
    const opts = mergeOptions(this.defaults.aggregate, ...options);

    return this.run('aggregate', opts, async () => {
      const results = await this.drain(
        this.collection.aggregate(pipeline, opts),
        this.resultSchema,
        opts,
        'aggregate',
      );
      if (results.length === 0) throw emptyResultError(this.name);

      this.logger.logOperation(createReceipt({
        operation: 'aggregate',
        collection: this.name,
        startTime,
        returnedCount: results.length,
      }));
      return results;
    });
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private async run<R>(operation: ModelOperation, context: CallContext, fn: () => Promise<R>): Promise<R> {
    try {
      throwIfCancelled(context, this.name, operation);
      return await fn();
    } catch (err) {
      const mapped = mapNativeError(err, this.name, operation);
      this.logger.logError(mapped);
      throw mapped;
    }
  }

  /**
   * Decode every row of `cursor`. The cursor is closed on every exit path;
   * a failure to close only surfaces when nothing else failed first.
   */
  private async drain<R>(
    cursor: DocumentCursor,
    decoder: Decoder<R>,
    context: CallContext,
    operation: ModelOperation,
  ): Promise<R[]> {
    const results: R[] = [];
    let failure: unknown = null;

    try {
      for await (const row of cursor) {
        throwIfCancelled(context, this.name, operation);
        results.push(decodeDocument(decoder, row, this.name, operation));
      }
    } catch (err) {
      failure = err;
    }

    try {
      await cursor.close();
    } catch (closeErr) {
      failure ??= closeErr;
    }

    if (failure !== null) throw failure;
    return results;
  }
}
