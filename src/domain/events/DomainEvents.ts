import type { LoadSummary } from '../model/LoadSummary.js';

/** Emitted when a load call starts. `source` is the file name, or `batch` for `loadBatch()`. */
export interface LoadStartedEvent {
  readonly type: 'load:started';
  readonly loadId: string;
  readonly source: string;
  readonly timestamp: number;
}

/** Emitted when the input is exhausted and every batch was sent. */
export interface LoadCompletedEvent {
  readonly type: 'load:completed';
  readonly loadId: string;
  readonly summary: LoadSummary;
  readonly timestamp: number;
}

/** Emitted when a fatal error aborts the load. `summary` covers the batches completed before it. */
export interface LoadFailedEvent {
  readonly type: 'load:failed';
  readonly loadId: string;
  readonly error: string;
  readonly summary: LoadSummary;
  readonly timestamp: number;
}

/** Emitted every `printProgressSize` persisted records. */
export interface LoadProgressEvent {
  readonly type: 'load:progress';
  readonly loadId: string;
  readonly totalRecords: number;
  readonly timestamp: number;
}

/** Emitted before a batch is sent. */
export interface BatchStartedEvent {
  readonly type: 'batch:started';
  readonly loadId: string;
  readonly batchIndex: number;
  readonly timestamp: number;
}

/** Emitted after a batch response was reconciled. */
export interface BatchCompletedEvent {
  readonly type: 'batch:completed';
  readonly loadId: string;
  readonly batchIndex: number;
  readonly recordCount: number;
  readonly persistedCount: number;
  readonly failedCount: number;
  readonly conflictCount: number;
  /** Running total of persisted records for this load. */
  readonly totalRecords: number;
  readonly timestamp: number;
}

/** Emitted for each record the store rejected. */
export interface RecordFailedEvent {
  readonly type: 'record:failed';
  readonly loadId: string;
  readonly batchIndex: number;
  readonly id: string | undefined;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted for each `create` skipped because the document already exists. */
export interface RecordConflictEvent {
  readonly type: 'record:conflict';
  readonly loadId: string;
  readonly batchIndex: number;
  readonly id: string | undefined;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | LoadStartedEvent
  | LoadCompletedEvent
  | LoadFailedEvent
  | LoadProgressEvent
  | BatchStartedEvent
  | BatchCompletedEvent
  | RecordFailedEvent
  | RecordConflictEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
