// Main entry point
export { DataLoader } from './DataLoader.js';
export type { DataLoaderConfig } from './DataLoader.js';

// Configuration
export { LoaderSettingsSchema, parseSettings } from './config.js';
export type { LoaderSettings, LoaderSettingsInput } from './config.js';

// Errors
export {
  LoaderError,
  InputContractError,
  TransportError,
  UnknownHostError,
  ConfigurationError,
} from './domain/errors/LoaderErrors.js';

// Domain model
export type { NjsonRecord } from './domain/model/NjsonRecord.js';
export { toWireLines, pairLines } from './domain/model/NjsonRecord.js';
export type { LoadSummary } from './domain/model/LoadSummary.js';
export type { ItemOutcome, RecordFailure } from './domain/model/ItemOutcome.js';
export { BulkResponseSchema, BulkItemSchema, BulkActionResultSchema } from './domain/model/BulkResponse.js';
export type { BulkResponse, BulkItem, BulkActionResult } from './domain/model/BulkResponse.js';

// Domain services
export { classifyItem, reconcile } from './domain/services/ResponseReconciler.js';
export type { Reconciliation } from './domain/services/ResponseReconciler.js';
export { classifyTransportFailure, extractReason } from './domain/services/classifyTransportFailure.js';
export { NjsonRecordReader } from './domain/services/NjsonRecordReader.js';
export { lastLine } from './domain/services/lastLine.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type {
  ConnectionFactory,
  BulkConnection,
  ExchangeResult,
  TransportFailure,
} from './domain/ports/ConnectionFactory.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  LoadStartedEvent,
  LoadCompletedEvent,
  LoadFailedEvent,
  LoadProgressEvent,
  BatchStartedEvent,
  BatchCompletedEvent,
  RecordFailedEvent,
  RecordConflictEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { HttpConnectionFactory, NDJSON_CONTENT_TYPE } from './infrastructure/transport/HttpConnectionFactory.js';
export type { HttpConnectionFactoryOptions } from './infrastructure/transport/HttpConnectionFactory.js';
export { parseCredentials, readCredentials } from './infrastructure/transport/readCredentials.js';
export type { Credentials } from './infrastructure/transport/readCredentials.js';
export { createLogger, resolveLogLevel } from './infrastructure/logging/createLogger.js';
