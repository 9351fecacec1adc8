import type { BulkConnection } from '../domain/ports/ConnectionFactory.js';
import type { Reconciliation } from '../domain/services/ResponseReconciler.js';
import { reconcile } from '../domain/services/ResponseReconciler.js';
import { classifyTransportFailure } from '../domain/services/classifyTransportFailure.js';
import { lastLine } from '../domain/services/lastLine.js';
import type { LoaderContext } from './LoaderContext.js';

/**
 * Send a fully written batch and reconcile the store's answer.
 *
 * Transport failures are fatal and thrown; per-record failures are logged,
 * emitted as events and folded into the returned reconciliation.
 */
export async function sendBatch(
  ctx: LoaderContext,
  connection: BulkConnection,
  loadId: string,
  batchIndex: number,
): Promise<Reconciliation> {
  ctx.eventBus.emit({ type: 'batch:started', loadId, batchIndex, timestamp: Date.now() });

  const result = await connection.exchange();
  if (!result.ok) {
    throw classifyTransportFailure(result.failure);
  }

  const json = lastLine(result.body);
  ctx.logger.debug({ response: json }, 'Bulk response');

  const reconciliation = reconcile(json);
  if (!reconciliation.parsed) {
    ctx.logger.debug({ batchIndex }, 'Bulk response could not be decoded; counting the batch as persisted');
  }

  for (const failure of reconciliation.failures) {
    ctx.logger.error({ id: failure.id, reason: failure.reason }, `Record ${failure.id ?? '<no id>'}: ${failure.reason}`);
    ctx.eventBus.emit({
      type: 'record:failed',
      loadId,
      batchIndex,
      id: failure.id,
      reason: failure.reason,
      timestamp: Date.now(),
    });
  }

  for (const id of reconciliation.conflicts) {
    ctx.eventBus.emit({ type: 'record:conflict', loadId, batchIndex, id, timestamp: Date.now() });
  }

  return reconciliation;
}
