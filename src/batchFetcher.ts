/**
 * Batch Fetcher
 * Sends course ids to the timetable endpoint in fixed-size batches,
 * one request at a time, with bounded retries and a politeness delay.
 */

import { ConfigError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { SlotAggregator } from './slotAggregator.js';
import { delay, type Sleep } from './utils/delay.js';
import type { BatchResult, FetchSummary, RawSlotRow, TimetableQuery } from './types.js';

export interface BatchFetchOptions {
  batchSize: number;
  retries: number;
  delayMs: number;          // between batches
  retryDelayMs?: number;    // between attempts of one batch
  sleep?: Sleep;
  onBatch?: (result: BatchResult, total: number) => void;
}

export const DEFAULT_RETRY_DELAY_MS = 800;

/**
 * Split values into consecutive chunks of `size` (the last may be shorter)
 */
export function chunk<T>(values: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new ConfigError(`batch size must be a positive integer (got ${size})`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    chunks.push(values.slice(i, i + size));
  }
  return chunks;
}

function field(row: Record<string, unknown>, name: string): string {
  const value = row[name];
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'bigint') return String(value).trim();
  return '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Map a portal row to a RawSlotRow; null when it has no course id or day/time
 */
export function normalizeSlotRow(raw: unknown): RawSlotRow | null {
  if (!isRecord(raw)) return null;

  const courseId = field(raw, 'runningCourseId');
  const dayTime = field(raw, 'slotPeriodCdDays');
  if (!courseId || !dayTime) return null;

  return {
    courseId,
    slotId: field(raw, 'courseSlotId'),
    slotCode: field(raw, 'courseSlotCd'),
    dayTime,
    segmentName: field(raw, 'segName'),
  };
}

/**
 * Fetch every batch in order and feed the rows into the aggregator.
 * A batch that fails all its attempts is logged and skipped; the run carries on.
 */
export async function fetchSlots(
  courseIds: readonly string[],
  query: TimetableQuery,
  options: BatchFetchOptions,
  aggregator: SlotAggregator = new SlotAggregator()
): Promise<{ aggregator: SlotAggregator; summary: FetchSummary }> {
  const batches = chunk(courseIds, options.batchSize);
  const retries = Math.max(0, options.retries);
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const sleep = options.sleep ?? delay;

  const summary: FetchSummary = { batches: [], failedBatches: 0, rowsAccepted: 0, rowsDiscarded: 0 };
  const total = batches.length;

  logger.info('Fetch', `${courseIds.length} courses in ${total} batches (size ${options.batchSize}, retries ${retries})`);

  for (const [i, batch] of batches.entries()) {
    const index = i + 1;
    const result: BatchResult = { index, size: batch.length, attempts: 0, status: 'failed', rows: 0 };

    while (result.attempts < retries + 1) {
      result.attempts++;
      try {
        const items = await query(batch);

        // Normalize everything first so a failed attempt never leaves partial rows
        const rows: RawSlotRow[] = [];
        for (const item of items) {
          const row = normalizeSlotRow(item);
          if (row) {
            rows.push(row);
          } else {
            summary.rowsDiscarded++;
          }
        }
        aggregator.addAll(rows);

        summary.rowsAccepted += rows.length;
        result.status = 'ok';
        result.rows = items.length;
        result.error = undefined;
        logger.progress('Fetch', index, total, `fetched ${batch.length} courses -> ${items.length} rows`);
        break;
      } catch (err) {
        result.error = errorMessage(err);
        if (result.attempts < retries + 1) {
          logger.warn('Fetch', `batch ${index}/${total} attempt ${result.attempts} failed: ${result.error}`);
          await sleep(retryDelayMs);
        }
      }
    }

    if (result.status === 'failed') {
      summary.failedBatches++;
      logger.error('Fetch', `batch ${index}/${total} failed after ${result.attempts} attempts: ${result.error}`, {
        courseIds: batch,
      });
    }

    summary.batches.push(result);
    options.onBatch?.(result, total);

    if (index < total) {
      await sleep(options.delayMs);
    }
  }

  return { aggregator, summary };
}
