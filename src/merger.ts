/**
 * Course/Slot Merger
 * Joins course metadata with fetched slot data into one row per course.
 * Portal segment names win over the date heuristic.
 */

import { classifyCourseDates, DEFAULT_SEGMENT_CALENDAR, type SegmentCalendar } from './segments.js';
import type { SlotAggregator } from './slotAggregator.js';
import type { CourseMeta, CourseOutputRecord } from './types.js';

export interface MergeStats {
  courses: number;
  withSlots: number;
  withSegments: number;
}

/**
 * Course id -> date-derived segment, for courses whose dates classify
 */
export function computeHeuristicSegments(
  courses: Map<string, CourseMeta>,
  calendar: SegmentCalendar = DEFAULT_SEGMENT_CALENDAR
): Map<string, string> {
  const segments = new Map<string, string>();
  for (const [courseId, course] of courses) {
    const segment = classifyCourseDates(course.startDate, course.endDate, calendar);
    if (segment) segments.set(courseId, segment);
  }
  return segments;
}

export function mergeCourses(
  courses: Map<string, CourseMeta>,
  slots: SlotAggregator,
  heuristic: Map<string, string> = new Map()
): CourseOutputRecord[] {
  const slotsByCourse = slots.byCourse();
  const records: CourseOutputRecord[] = [];

  for (const [courseId, course] of courses) {
    let slotCode = '';
    let portalSegment = '';

    // Last non-empty value wins; the slot column is informational only
    for (const slot of slotsByCourse.get(courseId) ?? []) {
      if (slot.slotCode) slotCode = slot.slotCode;
      if (slot.segmentName) portalSegment = slot.segmentName;
    }

    records.push({
      courseId,
      code: course.code,
      name: course.name,
      coordinator: course.coordinator,
      credits: course.credits,
      segment: portalSegment || heuristic.get(courseId) || '',
      slot: slotCode,
    });
  }

  // Plain code-unit order: "CS1010" < "CS2010" < "cs1010"
  return records.sort((a, b) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0));
}

export function summarizeMerge(records: CourseOutputRecord[]): MergeStats {
  return {
    courses: records.length,
    withSlots: records.filter(r => r.slot).length,
    withSegments: records.filter(r => r.segment).length,
  };
}
