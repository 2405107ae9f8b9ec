import { describe, it, expect } from 'vitest';
import {
  classifyCourseDates,
  classifySegment,
  parsePortalDate,
  type SegmentCalendar,
} from '../segments.js';

const utc = (y: number, m: number, d: number, h = 0, min = 0) => new Date(Date.UTC(y, m - 1, d, h, min));

// ── parsePortalDate ───────────────────────────────────────────────────────────

describe('parsePortalDate', () => {
  it('parses the portal format', () => {
    expect(parsePortalDate('05 Jan, 2026 00:00')).toEqual(utc(2026, 1, 5));
  });

  it('ignores surrounding whitespace and month case', () => {
    expect(parsePortalDate('  10 feb, 2026 13:45 ')).toEqual(utc(2026, 2, 10, 13, 45));
  });

  it('accepts runs of spaces and one-digit fields', () => {
    expect(parsePortalDate('05  Jan, 2026 00:00')).toEqual(utc(2026, 1, 5));
    expect(parsePortalDate('5 Jan,2026  9:5')).toEqual(utc(2026, 1, 5, 9, 5));
  });

  it('returns null for blank or malformed input', () => {
    expect(parsePortalDate('')).toBeNull();
    expect(parsePortalDate(undefined)).toBeNull();
    expect(parsePortalDate('2026-01-05')).toBeNull();
    expect(parsePortalDate('05 Foo, 2026 00:00')).toBeNull();
    expect(parsePortalDate('05 Jan, 2026 24:00')).toBeNull();
  });

  it('rejects days that do not exist', () => {
    expect(parsePortalDate('31 Feb, 2026 00:00')).toBeNull();
  });
});

// ── classifySegment ───────────────────────────────────────────────────────────

describe('classifySegment', () => {
  it('returns empty when either date is missing', () => {
    expect(classifySegment(null, utc(2026, 2, 9))).toBe('');
    expect(classifySegment(utc(2026, 1, 5), undefined)).toBe('');
    expect(classifySegment(null, null)).toBe('');
  });

  it('puts a start exactly on the first boundary in segment 1', () => {
    expect(classifySegment(utc(2026, 1, 5), utc(2026, 2, 9))).toBe('1-2');
  });

  it('moves a start just after the first boundary to segment 2', () => {
    expect(classifySegment(utc(2026, 1, 5, 0, 1), utc(2026, 2, 9))).toBe('2-2');
  });

  it('classifies the start buckets', () => {
    const end = utc(2026, 4, 27);
    expect(classifySegment(utc(2026, 2, 10), end)).toBe('2-6');
    expect(classifySegment(utc(2026, 2, 26), end)).toBe('3-6');
    expect(classifySegment(utc(2026, 3, 23), end)).toBe('4-6');
    expect(classifySegment(utc(2026, 3, 24), end)).toBe('5-6');
  });

  it('classifies the end buckets', () => {
    const start = utc(2026, 1, 5);
    expect(classifySegment(start, utc(2026, 3, 9))).toBe('1-3');
    expect(classifySegment(start, utc(2026, 3, 20))).toBe('1-4');
    expect(classifySegment(start, utc(2026, 3, 21))).toBe('1-6');
    expect(classifySegment(start, utc(2026, 4, 27))).toBe('1-6');
  });

  it('maps ends past the last boundary to 6', () => {
    expect(classifySegment(utc(2026, 1, 5), utc(2026, 5, 30))).toBe('1-6');
  });

  it('does not reconcile a start bucket above the end bucket', () => {
    expect(classifySegment(utc(2026, 4, 1), utc(2026, 2, 1))).toBe('5-2');
  });

  it('is deterministic for the same input', () => {
    const start = utc(2026, 2, 11);
    const end = utc(2026, 3, 20);
    expect(classifySegment(start, end)).toBe(classifySegment(start, end));
    expect(classifySegment(start, end)).toBe('3-4');
  });

  it('accepts another term calendar', () => {
    const calendar: SegmentCalendar = {
      startLimits: [utc(2026, 8, 1), utc(2026, 9, 1), utc(2026, 10, 1), utc(2026, 11, 1)],
      endLimits: [{ limit: utc(2026, 9, 15), label: 2 }],
      endFallback: 6,
    };
    expect(classifySegment(utc(2026, 8, 20), utc(2026, 9, 10), calendar)).toBe('2-2');
    expect(classifySegment(utc(2026, 8, 20), utc(2026, 12, 1), calendar)).toBe('2-6');
  });
});

describe('classifyCourseDates', () => {
  it('parses then classifies', () => {
    expect(classifyCourseDates('05 Jan, 2026 00:00', '20 Mar, 2026 00:00')).toBe('1-4');
  });

  it('returns empty for an unparseable date', () => {
    expect(classifyCourseDates('05 Jan, 2026 00:00', 'TBA')).toBe('');
  });
});
