import type { BulkItem } from '../model/BulkResponse.js';
import { BulkResponseSchema } from '../model/BulkResponse.js';
import type { ItemOutcome, RecordFailure } from '../model/ItemOutcome.js';

/** Outcome of reconciling one bulk response against the batch that was sent. */
export interface Reconciliation {
  /** Records of the batch that were not persisted, tolerated conflicts included. */
  readonly errorCount: number;
  /** Records rejected with an error, in submission order. */
  readonly failures: readonly RecordFailure[];
  /** Ids of `create` actions rejected because the document already exists. */
  readonly conflicts: readonly (string | undefined)[];
  /** `false` when the body could not be decoded; the batch then counts as fully persisted. */
  readonly parsed: boolean;
}

const NOTHING_TO_RECONCILE: Reconciliation = { errorCount: 0, failures: [], conflicts: [], parsed: true };
const UNPARSEABLE: Reconciliation = { errorCount: 0, failures: [], conflicts: [], parsed: false };

/**
 * Classify one item of a bulk response.
 *
 * The `index` result wins over `create`. Only `create` results are checked for
 * the 409 conflict, and the status is matched by prefix since it may arrive
 * rendered as `"409.0"`.
 */
export function classifyItem(item: BulkItem): ItemOutcome {
  const action = item.index ?? item.create;
  if (!action) return { kind: 'success' };

  if (!item.index && action.status !== undefined && String(action.status).startsWith('409')) {
    return { kind: 'tolerated-conflict', id: action._id };
  }

  if (action.error) {
    return {
      kind: 'error',
      id: action._id,
      reason: action.error.reason ?? action.error.type ?? 'unknown error',
    };
  }

  return { kind: 'success' };
}

/**
 * Count the records of a batch that the store did not persist.
 *
 * The body is advisory: anything that does not decode as a bulk response
 * reconciles to zero errors, because the exchange itself already succeeded.
 */
export function reconcile(body: string | null): Reconciliation {
  if (body === null) return UNPARSEABLE;

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return UNPARSEABLE;
  }

  const decoded = BulkResponseSchema.safeParse(json);
  if (!decoded.success) return UNPARSEABLE;

  const response = decoded.data;
  if (!response.errors) return NOTHING_TO_RECONCILE;
  if (!response.items) return UNPARSEABLE;

  const failures: RecordFailure[] = [];
  const conflicts: (string | undefined)[] = [];

  for (const item of response.items) {
    const outcome = classifyItem(item);
    switch (outcome.kind) {
      case 'tolerated-conflict':
        conflicts.push(outcome.id);
        break;
      case 'error':
        failures.push({ id: outcome.id, reason: outcome.reason });
        break;
      case 'success':
        break;
    }
  }

  return {
    errorCount: failures.length + conflicts.length,
    failures,
    conflicts,
    parsed: true,
  };
}
