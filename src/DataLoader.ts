import { resolve } from 'node:path';
import type { Logger } from 'pino';
import type { ConnectionFactory } from './domain/ports/ConnectionFactory.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { LoadSummary } from './domain/model/LoadSummary.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { LoaderSettingsInput } from './config.js';
import { parseSettings } from './config.js';
import { LoaderContext } from './application/LoaderContext.js';
import { LoadBatch } from './application/usecases/LoadBatch.js';
import { LoadStream } from './application/usecases/LoadStream.js';
import { FilePathSource } from './infrastructure/sources/FilePathSource.js';
import { HttpConnectionFactory } from './infrastructure/transport/HttpConnectionFactory.js';
import { createLogger } from './infrastructure/logging/createLogger.js';

/** Configuration for a `DataLoader`. */
export interface DataLoaderConfig extends LoaderSettingsInput {
  /**
   * Transport used for bulk requests. Default: an `HttpConnectionFactory` built
   * from `url`, `index`, `authFile`, `requestTimeout` and `refresh`.
   */
  readonly connectionFactory?: ConnectionFactory;
  /** Logger for progress and per-record failures. Default: `createLogger('data-loader')`. */
  readonly logger?: Logger;
}

/**
 * Loads NJSON data (two lines per record: bulk action/key line, then the
 * document) into a search index through the bulk API, in batches.
 *
 * Loads run one batch at a time and never retry: a transport failure aborts
 * the call. Records the store rejects are logged and counted, not thrown.
 *
 * @example
 * ```typescript
 * const loader = new DataLoader({ url: 'http://localhost:9200', index: 'registry', authFile: './auth.cfg' });
 * loader.setBatchSize(250);
 * const { totalRecords } = await loader.loadFile('./registry.njson');
 * ```
 */
export class DataLoader {
  private readonly ctx: LoaderContext;

  constructor(config: DataLoaderConfig) {
    const settings = parseSettings(config);

    let connectionFactory = config.connectionFactory;
    if (!connectionFactory) {
      const http = new HttpConnectionFactory(settings.url, settings.index, {
        timeout: settings.requestTimeout,
        refresh: settings.refresh,
      });
      http.initAuth(settings.authFile);
      connectionFactory = http;
    }

    this.ctx = new LoaderContext(
      connectionFactory,
      config.logger ?? createLogger('data-loader'),
      settings.batchSize,
      settings.printProgressSize,
    );
  }

  /**
   * Set the number of records per bulk request. Applies from the next batch.
   *
   * @throws InputContractError if `size` is not a positive integer.
   */
  setBatchSize(size: number): void {
    this.ctx.batchSize = size;
  }

  getBatchSize(): number {
    return this.ctx.batchSize;
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Send a list of NJSON lines (key, data, key, data, ...) as a single bulk request.
   *
   * @returns Number of records the store persisted.
   * @throws InputContractError if the list has an odd number of lines. Nothing is sent.
   * @throws TransportError if the request fails.
   */
  async loadBatch(lines: readonly string[]): Promise<number> {
    return new LoadBatch(this.ctx).execute(lines);
  }

  /**
   * Load an NJSON file in batches of `batchSize` records.
   *
   * @throws InputContractError if the file ends between a key line and its data line.
   * @throws TransportError if a bulk request fails. Earlier batches stay loaded.
   */
  async loadFile(filePath: string): Promise<LoadSummary> {
    const absolutePath = resolve(filePath);
    this.ctx.logger.info({ file: absolutePath }, `Loading data file: ${absolutePath}`);
    return this.loadSource(new FilePathSource(absolutePath));
  }

  /** Load NJSON data from any source (stream, buffer, file) in batches of `batchSize` records. */
  async loadSource(source: DataSource): Promise<LoadSummary> {
    return new LoadStream(this.ctx).execute(source);
  }
}
