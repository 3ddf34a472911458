/**
 * DocModel MongoDB Connector
 *
 * Owns exactly one MongoClient. The Db it hands out is a view into that
 * client; closing is the owner's job, through close() or withConnection().
 */

import { MongoClient } from 'mongodb';
import type { Db, Document } from 'mongodb';
import { mapNativeError, notConnectedError } from './errors.js';
import { DocModelEventEmitter } from './events.js';
import { DEFAULT_SLOW_QUERY_MS } from './logger.js';
import { Model } from './model.js';
import type { ModelOptions } from './model.js';
import { buildDatabaseOptions } from './options.js';
import type { ConnectionStatus, Connector, ConnectorConfig } from './types.js';

export class MongoConnector implements Connector<Db> {
  readonly events: DocModelEventEmitter;

  private config: ConnectorConfig;
  private _client: MongoClient | null = null;
  private db: Db | null = null;
  private connecting: Promise<Db> | null = null;
  private connectedAt: Date | null = null;

  constructor(config: ConnectorConfig, emitter: DocModelEventEmitter = new DocModelEventEmitter()) {
    this.config = config;
    this.events = emitter;
  }

  /** The client created by connect(), or null before connect() and after close(). */
  get client(): MongoClient | null {
    return this._client;
  }

  private get label(): string {
    return this.config.label ?? 'default';
  }

  /**
   * Connect and return the configured database. A second call while the
   * client is open, or while the handshake is still in flight, returns the
   * same Db instead of opening another client.
   */
  async connect(): Promise<Db> {
    if (this.db) return this.db;
    if (this.connecting) return this.connecting;

    this.connecting = this.open();
    try {
      return await this.connecting;
    } finally {
      this.connecting = null;
    }
  }

  private async open(): Promise<Db> {
    const { uri, options } = this.config.clientConfig ?? { uri: this.config.uri, options: undefined };

    let client: MongoClient;
    try {
      client = new MongoClient(uri, options);
      await client.connect();
    } catch (err) {
      throw mapNativeError(err, undefined, 'connect');
    }

    const db = this.config.databaseOptions
      ? client.db(this.config.dbName, buildDatabaseOptions(this.config.databaseOptions))
      : client.db(this.config.dbName);

    this._client = client;
    this.db = db;
    this.connectedAt = new Date();
    this.events.emit('connected', {
      dbName: this.config.dbName,
      label: this.label,
      uri: redactUri(uri),
    });
    return db;
  }

  async close(): Promise<void> {
    const client = this._client;
    if (!client) return;

    this._client = null;
    this.db = null;
    this.connectedAt = null;
    await client.close();
    this.events.emit('disconnected', {
      dbName: this.config.dbName,
      label: this.label,
      reason: 'Closed by owner',
      timestamp: new Date(),
    });
  }

  status(): ConnectionStatus {
    return {
      state: this.connectedAt ? 'connected' : 'disconnected',
      uri: redactUri(this.config.clientConfig?.uri ?? this.config.uri),
      dbName: this.config.dbName,
      label: this.label,
      uptimeMs: this.connectedAt ? Date.now() - this.connectedAt.getTime() : 0,
    };
  }

  /**
   * Bind a model to `name` in the connected database. The model reports to
   * this connector's emitter with its logging settings unless overridden.
   */
  model<T extends Document, C>(name: string, options: ModelOptions<T, C>): Model<T, C> {
    if (!this.db) throw notConnectedError(this.label);

    return new Model(this.db, name, {
      emitter: this.events,
      logging: this.config.logging,
      slowQueryMs: this.config.slowQueryMs ?? DEFAULT_SLOW_QUERY_MS,
      ...options,
    });
  }
}

export function createConnector(dbName: string, uri: string): MongoConnector {
  return new MongoConnector({ dbName, uri });
}

/**
 * Connect, hand the database to `fn`, and close the client afterwards,
 * whether `fn` resolves or rejects.
 */
export async function withConnection<R>(
  config: ConnectorConfig,
  fn: (db: Db, connector: MongoConnector) => Promise<R>,
): Promise<R> {
  const connector = new MongoConnector(config);
  const db = await connector.connect();
  try {
    return await fn(db, connector);
  } finally {
    await connector.close();
  }
}

export function redactUri(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.password) url.password = '***';
    return url.toString();
  } catch {
    return uri.replace(/\/\/[^:]+:[^@]+@/, '//***:***@');
  }
}
