import { describe, it, expect } from 'vitest';
import { EMPTY_SUMMARY, addBatch } from '../../../src/domain/model/LoadSummary.js';

describe('addBatch', () => {
  it('should keep rejected records and tolerated conflicts apart', () => {
    const summary = addBatch(EMPTY_SUMMARY, 10, 2, 3);

    expect(summary).toEqual({ totalRecords: 5, failedRecords: 2, conflictRecords: 3, batches: 1 });
  });

  it('should accumulate across batches', () => {
    const summary = addBatch(addBatch(EMPTY_SUMMARY, 4, 1, 0), 4, 0, 1);

    expect(summary).toEqual({ totalRecords: 6, failedRecords: 1, conflictRecords: 1, batches: 2 });
  });
});
