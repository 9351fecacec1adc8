import { randomUUID } from 'node:crypto';
import type { LoadSummary } from '../../domain/model/LoadSummary.js';
import { EMPTY_SUMMARY, addBatch } from '../../domain/model/LoadSummary.js';
import { pairLines, toWireLines } from '../../domain/model/NjsonRecord.js';
import type { LoaderContext } from '../LoaderContext.js';
import { sendBatch } from '../SendBatch.js';

/** Use case: send an in-memory list of NJSON lines as one bulk request. */
export class LoadBatch {
  constructor(private readonly ctx: LoaderContext) {}

  /**
   * @param lines - Key and data lines, alternating. Never split into several requests.
   * @returns Number of records the store persisted.
   */
  async execute(lines: readonly string[]): Promise<number> {
    const records = pairLines(lines);
    if (records.length === 0) return 0;

    const loadId = randomUUID();
    this.ctx.eventBus.emit({ type: 'load:started', loadId, source: 'batch', timestamp: Date.now() });

    let summary: LoadSummary = EMPTY_SUMMARY;
    try {
      const connection = this.ctx.connectionFactory.createConnection();
      for (const record of records) {
        connection.write(toWireLines(record));
      }

      const reconciliation = await sendBatch(this.ctx, connection, loadId, 0);
      summary = addBatch(
        summary,
        records.length,
        reconciliation.failures.length,
        reconciliation.conflicts.length,
      );

      this.ctx.eventBus.emit({
        type: 'batch:completed',
        loadId,
        batchIndex: 0,
        recordCount: records.length,
        persistedCount: records.length - reconciliation.errorCount,
        failedCount: reconciliation.failures.length,
        conflictCount: reconciliation.conflicts.length,
        totalRecords: summary.totalRecords,
        timestamp: Date.now(),
      });
    } catch (error) {
      this.ctx.eventBus.emit({
        type: 'load:failed',
        loadId,
        error: error instanceof Error ? error.message : String(error),
        summary,
        timestamp: Date.now(),
      });
      throw error;
    }

    this.ctx.eventBus.emit({ type: 'load:completed', loadId, summary, timestamp: Date.now() });
    return summary.totalRecords;
  }
}
