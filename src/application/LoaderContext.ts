import type { Logger } from 'pino';
import type { ConnectionFactory } from '../domain/ports/ConnectionFactory.js';
import { InputContractError } from '../domain/errors/LoaderErrors.js';
import { EventBus } from './EventBus.js';

/**
 * State shared by the load use cases of one `DataLoader`.
 *
 * Holds configuration and collaborators only. Running totals live in each
 * load call, so two loads never share counters.
 */
export class LoaderContext {
  readonly eventBus: EventBus;
  private currentBatchSize: number;

  constructor(
    readonly connectionFactory: ConnectionFactory,
    readonly logger: Logger,
    batchSize: number,
    readonly printProgressSize: number,
  ) {
    this.currentBatchSize = LoaderContext.checkBatchSize(batchSize);
    this.eventBus = new EventBus(logger);
  }

  get batchSize(): number {
    return this.currentBatchSize;
  }

  /** Takes effect from the next batch; a batch being read keeps the size it started with. */
  set batchSize(size: number) {
    this.currentBatchSize = LoaderContext.checkBatchSize(size);
  }

  private static checkBatchSize(size: number): number {
    if (!Number.isInteger(size) || size <= 0) {
      throw new InputContractError('Batch size should be > 0');
    }
    return size;
  }
}
