/**
 * DocModel — Public API Entry Point
 *
 * Typed CRUD and aggregation over MongoDB collections.
 */

// Model and connector
export { Model } from './model.js';
export type { ModelOptions } from './model.js';
export { MongoConnector, createConnector, withConnection, redactUri } from './connector.js';

// Options
export { mergeOptions, buildDatabaseOptions, DATABASE_OPTION_KEYS } from './options.js';
export type { DatabaseOptions } from './options.js';

// Configuration
export { readEnvConfig, EnvConfigSchema, ENV_URI, ENV_DB_NAME } from './config.js';

// Errors and events
export { DocModelError, ERROR_RETRYABLE, isDocModelError } from './errors.js';
export { DocModelEventEmitter } from './events.js';

// Types
export type {
  AggregateCallOptions,
  CallContext,
  ClientConfig,
  CollectionHandle,
  ConnectionStatus,
  Connector,
  ConnectorConfig,
  DatabaseHandle,
  Decoder,
  DeleteCallOptions,
  DocModelErrorCode,
  DocModelEvents,
  DocumentCursor,
  FindCallOptions,
  InsertCallOptions,
  ModelDefaults,
  ModelFilter,
  ModelOperation,
  ModelUpdate,
  OperationReceipt,
  Pipeline,
  UpdateCallOptions,
} from './types.js';
