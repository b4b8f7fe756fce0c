/**
 * Migration reporting utilities
 * Turns batch results into the counts and error samples shown to the user
 */

import type { BatchResult } from './types';

export const DEFAULT_ERROR_SAMPLE_SIZE = 5;

export interface BatchSummary {
  successCount: number;
  errorCount: number;
  /** `identifier: message` for the first few failures */
  errorSample: string[];
}

export function summarizeBatch(
  result: BatchResult,
  sampleSize = DEFAULT_ERROR_SAMPLE_SIZE
): BatchSummary {
  const errorSample = result.outcomes
    .filter(outcome => outcome.error !== undefined)
    .slice(0, sampleSize)
    .map(outcome => `${outcome.identifier}: ${outcome.error}`);

  return {
    successCount: result.successCount,
    errorCount: result.errorCount,
    errorSample,
  };
}

/**
 * One-line summary of a batch
 */
export function formatBatchSummary(result: BatchResult): string {
  switch (result.action) {
    case 'fetch':
      return `Fetched ${result.successCount} datasets. ${result.errorCount} errors.`;
    case 'upsert':
      return `Upsert attempts done. Success: ${result.successCount}. Errors: ${result.errorCount}`;
    case 'delete':
      return `Delete attempts done. Success: ${result.successCount}. Errors: ${result.errorCount}`;
  }
}
