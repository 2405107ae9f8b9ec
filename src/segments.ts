/**
 * Segment Classifier
 * Infers the academic-term segment label ("1-4", "2-6", ...) of a course
 * from its start and end dates when the portal has not published one.
 *
 * Approximate segment spans for the Jan-Apr 2026 term:
 *   1: Jan 05 - Feb 09
 *   2: Feb 10 - Mar 09
 *   3: Mar 10 - Mar 20
 *   4: Mar 23 - Apr 27
 *   5-6: later segments
 *
 * Common patterns: 1-6 (full term), 1-4, 1-3, 4-6, 1-2, 2-4.
 */

export interface SegmentCalendar {
  /** Ascending "on-or-before" limits for start buckets 1..4; later starts are bucket 5 */
  startLimits: [Date, Date, Date, Date];
  /** Ascending "on-or-before" limits paired with end labels; later ends take the last label */
  endLimits: { limit: Date; label: number }[];
  /** Label for ends after every limit */
  endFallback: number;
}

function day(year: number, month: number, date: number): Date {
  return new Date(Date.UTC(year, month - 1, date));
}

export const DEFAULT_SEGMENT_CALENDAR: SegmentCalendar = {
  startLimits: [day(2026, 1, 5), day(2026, 2, 10), day(2026, 2, 26), day(2026, 3, 23)],
  endLimits: [
    { limit: day(2026, 2, 9), label: 2 },
    { limit: day(2026, 3, 9), label: 3 },
    { limit: day(2026, 3, 20), label: 4 },
    { limit: day(2026, 4, 27), label: 6 },
  ],
  endFallback: 6,
};

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

// "05 Jan, 2026 00:00"; runs of spaces and one-digit fields are accepted
const PORTAL_DATE = /^(\d{1,2})\s+([A-Za-z]{3}),\s*(\d{4})\s+(\d{1,2}):(\d{1,2})$/;

/**
 * Parse a portal date-time such as "05 Jan, 2026 00:00".
 * Returns null for blank or malformed input, including impossible dates like "31 Feb".
 */
export function parsePortalDate(text: string | null | undefined): Date | null {
  if (!text) return null;
  const match = text.trim().match(PORTAL_DATE);
  if (!match) return null;

  const [, dayStr, monthStr, yearStr, hourStr, minuteStr] = match;
  const month = MONTHS[monthStr.toLowerCase()];
  if (month === undefined) return null;

  const dateOfMonth = parseInt(dayStr, 10);
  const year = parseInt(yearStr, 10);
  const hour = parseInt(hourStr, 10);
  const minute = parseInt(minuteStr, 10);
  if (hour > 23 || minute > 59) return null;

  const date = new Date(Date.UTC(year, month, dateOfMonth, hour, minute));
  // Date.UTC rolls "31 Feb" over into March
  if (date.getUTCMonth() !== month || date.getUTCDate() !== dateOfMonth) return null;
  return date;
}

function startBucket(start: Date, calendar: SegmentCalendar): number {
  const index = calendar.startLimits.findIndex(limit => start.getTime() <= limit.getTime());
  return index === -1 ? calendar.startLimits.length + 1 : index + 1;
}

function endBucket(end: Date, calendar: SegmentCalendar): number {
  const match = calendar.endLimits.find(({ limit }) => end.getTime() <= limit.getTime());
  return match ? match.label : calendar.endFallback;
}

/**
 * Heuristic "<start>-<end>" segment label, or "" when either date is missing.
 * The two buckets are independent; a start bucket above the end bucket is returned as is.
 */
export function classifySegment(
  start: Date | null | undefined,
  end: Date | null | undefined,
  calendar: SegmentCalendar = DEFAULT_SEGMENT_CALENDAR
): string {
  if (!start || !end) return '';
  return `${startBucket(start, calendar)}-${endBucket(end, calendar)}`;
}

export function classifyCourseDates(
  startText: string,
  endText: string,
  calendar: SegmentCalendar = DEFAULT_SEGMENT_CALENDAR
): string {
  return classifySegment(parsePortalDate(startText), parsePortalDate(endText), calendar);
}
