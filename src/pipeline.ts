/**
 * Fetch and combine runs, wired from the building blocks.
 * The CLI calls these; tests call them with a stubbed timetable query.
 */

import { fetchSlots } from './batchFetcher.js';
import type { FetchConfig } from './config.js';
import { SlotDatabase } from './db/database.js';
import { ConfigError, errorMessage } from './errors.js';
import { createTimetableClient } from './httpClient.js';
import { readCourseCsvs, sortCourseIds } from './io/courseCsv.js';
import { writeMergedCsv } from './io/mergedCsv.js';
import { loadSlots, writeSlotsCsv, writeSlotsJson } from './io/slotFiles.js';
import { logger } from './logger.js';
import { computeHeuristicSegments, mergeCourses, summarizeMerge, type MergeStats } from './merger.js';
import type { SlotAggregator } from './slotAggregator.js';
import type { CourseOutputRecord, FetchSummary, TimetableQuery } from './types.js';
import type { Sleep } from './utils/delay.js';

export interface FetchRunOptions {
  csvPaths: string[];
  outCsv: string;
  outJson: string;
  dbPath?: string;
}

export interface FetchRunDeps {
  query?: TimetableQuery;
  sleep?: Sleep;
  retryDelayMs?: number;
}

export interface FetchRunResult {
  courses: number;
  slots: SlotAggregator;
  summary: FetchSummary;
}

export async function runFetch(
  config: FetchConfig,
  options: FetchRunOptions,
  deps: FetchRunDeps = {}
): Promise<FetchRunResult> {
  const courses = readCourseCsvs(options.csvPaths);
  const courseIds = sortCourseIds(courses.keys());
  if (courseIds.length === 0) {
    throw new ConfigError('no rcid found in the provided course CSVs');
  }
  logger.info('Fetch', `Loaded ${courseIds.length} courses from ${options.csvPaths.length} file(s)`);

  const query = deps.query ?? createTimetableClient({
    baseUrl: config.baseUrl,
    studentId: config.studentId,
    cookie: config.cookie,
    referer: config.referer,
    timeoutMs: config.timeoutMs,
  });

  const db = options.dbPath ? new SlotDatabase(options.dbPath) : null;
  let runId: number | null = null;

  try {
    if (db) {
      db.initialize();
      runId = db.startFetchRun(courseIds.length);
    }

    const { aggregator, summary } = await fetchSlots(courseIds, query, {
      batchSize: config.batchSize,
      retries: config.retries,
      delayMs: config.sleepMs,
      retryDelayMs: deps.retryDelayMs,
      sleep: deps.sleep,
    });

    writeSlotsJson(options.outJson, aggregator, courses);
    writeSlotsCsv(options.outCsv, aggregator, courses);
    logger.info('Fetch', `Wrote ${options.outCsv} and ${options.outJson}`);

    if (db && runId !== null) {
      db.saveSlots(aggregator, runId);
      db.endFetchRun(runId, summary, 'completed');
    }

    return { courses: courseIds.length, slots: aggregator, summary };
  } catch (err) {
    if (db && runId !== null) {
      db.endFetchRun(runId, null, 'failed', errorMessage(err));
    }
    throw err;
  } finally {
    db?.close();
  }
}

export interface CombineOptions {
  csvPaths: string[];
  slotsJson: string;
  slotsCsv: string;
  out: string;
  dbPath?: string;
}

export interface CombineResult {
  records: CourseOutputRecord[];
  stats: MergeStats;
}

export function runCombine(options: CombineOptions): CombineResult {
  const courses = readCourseCsvs(options.csvPaths);
  const heuristic = computeHeuristicSegments(courses);
  const slots = loadSlots({ jsonPath: options.slotsJson, csvPath: options.slotsCsv });

  const records = mergeCourses(courses, slots, heuristic);
  writeMergedCsv(options.out, records);

  if (options.dbPath) {
    const db = new SlotDatabase(options.dbPath);
    try {
      db.initialize();
      db.saveMergedCourses(records);
    } finally {
      db.close();
    }
  }

  return { records, stats: summarizeMerge(records) };
}
