/**
 * Slot Aggregator
 * Deduplicates raw timetable rows into one record per (course, slot id, slot code)
 */

import type { CourseSlot, RawSlotRow, SlotKey, SlotRecord } from './types.js';

function keyOf(key: SlotKey): string {
  // JSON keeps the three parts apart even when they contain separators
  return JSON.stringify([key.courseId, key.slotId, key.slotCode]);
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Numeric order for digit-only ids ("9" < "10"), plain string order otherwise
 */
export function compareCourseIds(a: string, b: string): number {
  const aNumeric = /^\d+$/.test(a);
  const bNumeric = /^\d+$/.test(b);
  if (aNumeric && bNumeric) {
    const diff = Number(a) - Number(b);
    if (diff !== 0) return diff;
  }
  return compareStrings(a, b);
}

export function compareSlots(a: { slotId: string; slotCode: string }, b: { slotId: string; slotCode: string }): number {
  return compareStrings(a.slotId, b.slotId) || compareStrings(a.slotCode, b.slotCode);
}

export class SlotAggregator {
  private slots = new Map<string, SlotRecord>();

  get size(): number {
    return this.slots.size;
  }

  /**
   * Add one row. Repeating a (key, day/time) pair has no effect, and the first
   * non-empty segment name seen for a key is never replaced.
   */
  add(row: RawSlotRow): void {
    const record = this.recordFor(row);
    record.dayTimes.add(row.dayTime);
    if (row.segmentName && !record.segmentName) {
      record.segmentName = row.segmentName;
    }
  }

  addAll(rows: Iterable<RawSlotRow>): void {
    for (const row of rows) this.add(row);
  }

  /**
   * Merge a previously persisted record, with the same rules as add()
   */
  addRecord(key: SlotKey, dayTimes: Iterable<string>, segmentName: string = ''): void {
    const record = this.recordFor(key);
    for (const dayTime of dayTimes) {
      if (dayTime) record.dayTimes.add(dayTime);
    }
    if (segmentName && !record.segmentName) {
      record.segmentName = segmentName;
    }
  }

  get(key: SlotKey): SlotRecord | undefined {
    return this.slots.get(keyOf(key));
  }

  courseIds(): string[] {
    const ids = new Set<string>();
    for (const record of this.slots.values()) ids.add(record.key.courseId);
    return [...ids].sort(compareCourseIds);
  }

  /**
   * All records ordered by course id, slot id, slot code
   */
  records(): SlotRecord[] {
    return [...this.slots.values()].sort(
      (a, b) => compareCourseIds(a.key.courseId, b.key.courseId) || compareSlots(a.key, b.key)
    );
  }

  /**
   * Course id -> its slots ordered by (slot id, slot code), day/times sorted
   */
  byCourse(): Map<string, CourseSlot[]> {
    const courses = new Map<string, CourseSlot[]>();
    for (const record of this.records()) {
      const list = courses.get(record.key.courseId) ?? [];
      list.push({
        slotId: record.key.slotId,
        slotCode: record.key.slotCode,
        segmentName: record.segmentName,
        dayTimes: [...record.dayTimes].sort(compareStrings),
      });
      courses.set(record.key.courseId, list);
    }
    return courses;
  }

  private recordFor(key: SlotKey): SlotRecord {
    const id = keyOf(key);
    let record = this.slots.get(id);
    if (!record) {
      record = {
        key: { courseId: key.courseId, slotId: key.slotId, slotCode: key.slotCode },
        dayTimes: new Set(),
        segmentName: '',
      };
      this.slots.set(id, record);
    }
    return record;
  }
}
