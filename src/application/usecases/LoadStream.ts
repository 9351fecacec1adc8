import { randomUUID } from 'node:crypto';
import type { DataSource } from '../../domain/ports/DataSource.js';
import type { LoadSummary } from '../../domain/model/LoadSummary.js';
import { EMPTY_SUMMARY, addBatch } from '../../domain/model/LoadSummary.js';
import { toWireLines } from '../../domain/model/NjsonRecord.js';
import { NjsonRecordReader } from '../../domain/services/NjsonRecordReader.js';
import type { LoaderContext } from '../LoaderContext.js';
import { sendBatch } from '../SendBatch.js';

/**
 * Use case: stream NJSON records from a source and send them in batches of
 * `batchSize` records, one bulk request at a time.
 */
export class LoadStream {
  constructor(private readonly ctx: LoaderContext) {}

  async execute(source: DataSource): Promise<LoadSummary> {
    const loadId = randomUUID();
    let summary: LoadSummary = EMPTY_SUMMARY;

    this.ctx.eventBus.emit({
      type: 'load:started',
      loadId,
      source: source.metadata().fileName ?? 'unknown',
      timestamp: Date.now(),
    });

    const reader = new NjsonRecordReader(source.read());

    try {
      let batchIndex = 0;

      while (await reader.hasMore()) {
        summary = await this.loadNextBatch(reader, loadId, batchIndex, summary);
        batchIndex++;

        if (summary.totalRecords !== 0 && summary.totalRecords % this.ctx.printProgressSize === 0) {
          this.reportProgress(loadId, summary);
        }
      }

      this.ctx.logger.info({ totalRecords: summary.totalRecords }, `Loaded ${String(summary.totalRecords)} document(s)`);
    } catch (error) {
      this.ctx.eventBus.emit({
        type: 'load:failed',
        loadId,
        error: error instanceof Error ? error.message : String(error),
        summary,
        timestamp: Date.now(),
      });
      throw error;
    } finally {
      await reader.close();
    }

    this.ctx.eventBus.emit({ type: 'load:completed', loadId, summary, timestamp: Date.now() });
    return summary;
  }

  /** Write up to `batchSize` records into one connection, send it, and fold the result into the totals. */
  private async loadNextBatch(
    reader: NjsonRecordReader,
    loadId: string,
    batchIndex: number,
    summary: LoadSummary,
  ): Promise<LoadSummary> {
    const batchSize = this.ctx.batchSize;
    const connection = this.ctx.connectionFactory.createConnection();
    let recordCount = 0;

    while (recordCount < batchSize) {
      const record = await reader.readRecord();
      if (!record) break;

      connection.write(toWireLines(record));
      recordCount++;
    }

    const reconciliation = await sendBatch(this.ctx, connection, loadId, batchIndex);
    const next = addBatch(
      summary,
      recordCount,
      reconciliation.failures.length,
      reconciliation.conflicts.length,
    );

    this.ctx.eventBus.emit({
      type: 'batch:completed',
      loadId,
      batchIndex,
      recordCount,
      persistedCount: recordCount - reconciliation.errorCount,
      failedCount: reconciliation.failures.length,
      conflictCount: reconciliation.conflicts.length,
      totalRecords: next.totalRecords,
      timestamp: Date.now(),
    });

    return next;
  }

  private reportProgress(loadId: string, summary: LoadSummary): void {
    this.ctx.logger.info({ totalRecords: summary.totalRecords }, `Loaded ${String(summary.totalRecords)} document(s)`);
    this.ctx.eventBus.emit({ type: 'load:progress', loadId, totalRecords: summary.totalRecords, timestamp: Date.now() });
  }
}
