/**
 * Migration reporter test suite
 */

import { describe, it, expect } from 'vitest';
import { formatBatchSummary, summarizeBatch } from '@/lib/migration/reporter';
import type { BatchResult } from '@/lib/migration/types';

function batch(action: BatchResult['action'], failures: number, successes: number): BatchResult {
  const outcomes = [
    ...Array.from({ length: failures }, (_, index) => ({
      identifier: `Failed${index + 1}`,
      state: 'failed-at-write' as const,
      error: `error ${index + 1}`,
    })),
    ...Array.from({ length: successes }, (_, index) => ({
      identifier: `Ok${index + 1}`,
      state: 'written' as const,
    })),
  ];
  return { action, outcomes, successCount: successes, errorCount: failures };
}

describe('formatBatchSummary', () => {
  it('should summarize each batch action', () => {
    expect(formatBatchSummary(batch('fetch', 1, 2))).toBe('Fetched 2 datasets. 1 errors.');
    expect(formatBatchSummary(batch('upsert', 0, 3))).toBe('Upsert attempts done. Success: 3. Errors: 0');
    expect(formatBatchSummary(batch('delete', 2, 0))).toBe('Delete attempts done. Success: 0. Errors: 2');
  });
});

describe('summarizeBatch', () => {
  it('should sample the first failures only', () => {
    const summary = summarizeBatch(batch('upsert', 7, 1));

    expect(summary.successCount).toBe(1);
    expect(summary.errorCount).toBe(7);
    expect(summary.errorSample).toEqual([
      'Failed1: error 1',
      'Failed2: error 2',
      'Failed3: error 3',
      'Failed4: error 4',
      'Failed5: error 5',
    ]);
  });

  it('should take a custom sample size', () => {
    expect(summarizeBatch(batch('fetch', 3, 0), 1).errorSample).toEqual(['Failed1: error 1']);
  });
});
