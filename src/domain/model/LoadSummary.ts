/** Running totals of one load call. Reset at the start of every call, never shared between calls. */
export interface LoadSummary {
  /** Records the store persisted. */
  readonly totalRecords: number;
  /** Records the store rejected with an error. */
  readonly failedRecords: number;
  /** `create` records skipped because the document already existed. Not persisted, not logged. */
  readonly conflictRecords: number;
  /** Bulk exchanges completed. */
  readonly batches: number;
}

export const EMPTY_SUMMARY: LoadSummary = { totalRecords: 0, failedRecords: 0, conflictRecords: 0, batches: 0 };

/** Fold the outcome of one batch into the running totals. */
export function addBatch(
  summary: LoadSummary,
  recordCount: number,
  failedCount: number,
  conflictCount: number,
): LoadSummary {
  return {
    totalRecords: summary.totalRecords + (recordCount - failedCount - conflictCount),
    failedRecords: summary.failedRecords + failedCount,
    conflictRecords: summary.conflictRecords + conflictCount,
    batches: summary.batches + 1,
  };
}
