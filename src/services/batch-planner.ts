import type { BatchPlan, BatchRange } from '../types';

export interface BatchPlanOptions {
  dynamic?: boolean;
  fixedBatchSize?: number;
  maxBatchWidth?: number;
}

export const SINGLE_BATCH_LIMIT = 20;
export const LARGE_ROSTER_BATCH_SIZE = 25;
export const DEFAULT_FIXED_BATCH_SIZE = 50;

/**
 * Number of batches for a roster. Non-decreasing in total, and every batch holds at least 10 students
 * once the roster is larger than 20.
 *
 * | students | batches |
 * |----------|---------|
 * | 1-20     | 1 |
 * | 21-50    | 2-5 |
 * | 51-100   | 5-8 |
 * | 101-200  | 8-13 |
 * | 201-500  | 13-20 |
 * | 500+     | ceil(total / 25) |
 */
export function batchCountFor(total: number): number {
  if (total <= SINGLE_BATCH_LIMIT) return 1;
  if (total <= 50) return Math.min(5, Math.max(2, Math.floor(total / 10)));
  if (total <= 100) return Math.min(10, Math.max(5, Math.floor(total / 12)));
  if (total <= 200) return Math.min(16, Math.max(8, Math.floor(total / 15)));
  if (total <= 500) return Math.min(20, Math.max(13, Math.floor(total / 20)));
  return Math.ceil(total / LARGE_ROSTER_BATCH_SIZE);
}

/**
 * Splits total into count contiguous ranges whose sizes differ by at most one
 */
function evenSplit(total: number, count: number): BatchRange[] {
  const batches: BatchRange[] = [];
  const base = Math.floor(total / count);
  const remainder = total % count;
  let start = 0;
  for (let i = 0; i < count; i++) {
    const size = base + (i < remainder ? 1 : 0);
    batches.push(Object.freeze({ start, end: start + size }));
    start += size;
  }
  return batches;
}

function fixedSplit(total: number, size: number): BatchRange[] {
  const batches: BatchRange[] = [];
  for (let start = 0; start < total; start += size) {
    batches.push(Object.freeze({ start, end: Math.min(start + size, total) }));
  }
  return batches;
}

/**
 * Divides a roster into the batches processed between workspace cleanups
 */
export function planBatches(total: number, options: BatchPlanOptions = {}): BatchPlan {
  if (total <= 0) {
    return Object.freeze({ total: 0, batchSize: 0, batches: Object.freeze([]) });
  }

  let batches: BatchRange[];
  if (options.dynamic === false) {
    batches = fixedSplit(total, Math.max(1, options.fixedBatchSize ?? DEFAULT_FIXED_BATCH_SIZE));
  } else {
    batches = evenSplit(total, batchCountFor(total));
  }

  if (options.maxBatchWidth !== undefined && options.maxBatchWidth > 0) {
    const widest = Math.max(...batches.map(batch => batch.end - batch.start));
    if (widest > options.maxBatchWidth) {
      batches = options.dynamic === false
        ? fixedSplit(total, options.maxBatchWidth)
        : evenSplit(total, Math.ceil(total / options.maxBatchWidth));
    }
  }

  const batchSize = Math.max(...batches.map(batch => batch.end - batch.start));
  return Object.freeze({ total, batchSize, batches: Object.freeze(batches) });
}
