/**
 * Course Slots Type Definitions
 */

// ============ Course Metadata Types ============

export interface CourseMeta {
  courseId: string;     // "17174" (running course id, rcid)
  code: string;         // "CS1010"
  name: string;         // "Discrete Mathematics"
  coordinator: string;
  credits: string;      // "3" (kept verbatim, the portal also uses "1.5")
  startDate: string;    // "05 Jan, 2026 00:00"
  endDate: string;
}

// ============ Slot Types ============

export interface SlotKey {
  courseId: string;
  slotId: string;       // "4521"
  slotCode: string;     // "A", "P1"
}

export interface RawSlotRow extends SlotKey {
  dayTime: string;      // "Mon 09:00-09:55"
  segmentName: string;  // "1-6", or "" when the portal has none
}

export interface SlotRecord {
  key: SlotKey;
  dayTimes: Set<string>;
  segmentName: string;
}

export interface CourseSlot {
  slotId: string;
  slotCode: string;
  segmentName: string;
  dayTimes: string[];   // sorted
}

// ============ Merged Output Types ============

export interface CourseOutputRecord {
  courseId: string;
  code: string;
  name: string;
  coordinator: string;
  credits: string;
  segment: string;      // authoritative "3", heuristic "1-4", or ""
  slot: string;         // one representative slot code
}

// ============ Fetch Types ============

/**
 * One remote call for a batch of running course ids.
 * Resolves with the raw row objects the portal returned.
 */
export type TimetableQuery = (courseIds: string[]) => Promise<unknown[]>;

export interface BatchResult {
  index: number;        // 1-based
  size: number;
  attempts: number;
  status: 'ok' | 'failed';
  rows: number;
  error?: string;
}

export interface FetchSummary {
  batches: BatchResult[];
  failedBatches: number;
  rowsAccepted: number;
  rowsDiscarded: number;
}
