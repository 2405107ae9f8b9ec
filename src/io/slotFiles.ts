/**
 * Persisted slot aggregation - slots.json and slots.csv
 */

import * as fs from 'fs';
import { logger } from '../logger.js';
import { SlotAggregator } from '../slotAggregator.js';
import type { CourseMeta } from '../types.js';
import { formatCsv, parseCsv } from './csv.js';

export interface SlotJson {
  courseSlotId: string;
  courseSlotCd: string;
  segName: string;
  slotPeriodCdDays: string[];
}

export interface CourseSlotsJson {
  rcid: string;
  ccode: string;
  cname: string;
  slots: SlotJson[];
}

export type SlotsJson = Record<string, CourseSlotsJson>;

export const SLOT_CSV_HEADERS = [
  'rcid',
  'ccode',
  'cname',
  'courseSlotId',
  'courseSlotCd',
  'segName',
  'slotPeriodCdDays',
] as const;

const DAY_TIME_SEPARATOR = ' | ';

/**
 * Course id -> course info with its slots. Course ids without metadata
 * keep their slots with empty code and name.
 */
export function buildSlotsJson(aggregator: SlotAggregator, courses: Map<string, CourseMeta>): SlotsJson {
  const out: SlotsJson = {};
  for (const [courseId, slots] of aggregator.byCourse()) {
    const course = courses.get(courseId);
    out[courseId] = {
      rcid: courseId,
      ccode: course?.code ?? '',
      cname: course?.name ?? '',
      slots: slots.map(slot => ({
        courseSlotId: slot.slotId,
        courseSlotCd: slot.slotCode,
        segName: slot.segmentName,
        slotPeriodCdDays: slot.dayTimes,
      })),
    };
  }
  return out;
}

export function buildSlotsCsv(aggregator: SlotAggregator, courses: Map<string, CourseMeta>): string {
  const rows = aggregator.records().map(record => {
    const course = courses.get(record.key.courseId);
    return {
      rcid: record.key.courseId,
      ccode: course?.code ?? '',
      cname: course?.name ?? '',
      courseSlotId: record.key.slotId,
      courseSlotCd: record.key.slotCode,
      segName: record.segmentName,
      slotPeriodCdDays: [...record.dayTimes].sort().join(DAY_TIME_SEPARATOR),
    };
  });
  return formatCsv(SLOT_CSV_HEADERS, rows);
}

export function writeSlotsJson(filePath: string, aggregator: SlotAggregator, courses: Map<string, CourseMeta>): void {
  fs.writeFileSync(filePath, JSON.stringify(buildSlotsJson(aggregator, courses), null, 2) + '\n', 'utf-8');
}

export function writeSlotsCsv(filePath: string, aggregator: SlotAggregator, courses: Map<string, CourseMeta>): void {
  fs.writeFileSync(filePath, buildSlotsCsv(aggregator, courses), 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  return typeof value === 'string' ? value.trim() : typeof value === 'number' ? String(value) : '';
}

/**
 * Rebuild an aggregator from parsed slots.json content. Entries that are not
 * objects are ignored.
 */
export function slotsFromJson(data: unknown, aggregator: SlotAggregator = new SlotAggregator()): SlotAggregator {
  if (!isRecord(data)) return aggregator;

  for (const [courseId, course] of Object.entries(data)) {
    if (!isRecord(course) || !Array.isArray(course.slots)) continue;
    for (const slot of course.slots) {
      if (!isRecord(slot)) continue;
      const dayTimes = Array.isArray(slot.slotPeriodCdDays) ? slot.slotPeriodCdDays.map(text) : [];
      aggregator.addRecord(
        { courseId: text(course.rcid) || courseId, slotId: text(slot.courseSlotId), slotCode: text(slot.courseSlotCd) },
        dayTimes,
        text(slot.segName)
      );
    }
  }
  return aggregator;
}

/**
 * Rebuild an aggregator from slots.csv content. Columns are found by name
 * fragment, so headers with stray spaces still match.
 */
export function slotsFromCsv(content: string, aggregator: SlotAggregator = new SlotAggregator()): SlotAggregator {
  const { headers, rows } = parseCsv(content);
  const find = (test: (header: string) => boolean, fallback: string) => headers.find(test) ?? fallback;

  const rcidKey = find(h => h.toLowerCase().includes('rcid'), 'rcid');
  const slotIdKey = find(h => h.includes('courseSlotId'), 'courseSlotId');
  const slotCodeKey = find(h => h.includes('courseSlotCd'), 'courseSlotCd');
  const segmentKey = find(h => h.includes('segName'), 'segName');
  const dayTimeKey = find(h => h.includes('slotPeriodCdDays'), 'slotPeriodCdDays');

  for (const row of rows) {
    const courseId = (row[rcidKey] ?? '').trim();
    if (!courseId) continue;
    const dayTimes = (row[dayTimeKey] ?? '').split(DAY_TIME_SEPARATOR).map(s => s.trim()).filter(Boolean);
    aggregator.addRecord(
      {
        courseId,
        slotId: (row[slotIdKey] ?? '').trim(),
        slotCode: (row[slotCodeKey] ?? '').trim(),
      },
      dayTimes,
      (row[segmentKey] ?? '').trim()
    );
  }
  return aggregator;
}

export function readSlotsJson(filePath: string): SlotAggregator {
  const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return slotsFromJson(data);
}

export function readSlotsCsv(filePath: string): SlotAggregator {
  return slotsFromCsv(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * slots.json first; slots.csv only when the JSON is missing or empty
 */
export function loadSlots(paths: { jsonPath?: string; csvPath?: string }): SlotAggregator {
  if (paths.jsonPath && fs.existsSync(paths.jsonPath)) {
    const fromJson = readSlotsJson(paths.jsonPath);
    if (fromJson.size > 0) {
      logger.info('Slots', `Loaded ${fromJson.size} slots from ${paths.jsonPath}`);
      return fromJson;
    }
  }

  if (paths.csvPath && fs.existsSync(paths.csvPath)) {
    const fromCsv = readSlotsCsv(paths.csvPath);
    logger.info('Slots', `Loaded ${fromCsv.size} slots from ${paths.csvPath}`);
    return fromCsv;
  }

  logger.warn('Slots', 'No slot data found; segments will come from course dates only');
  return new SlotAggregator();
}
