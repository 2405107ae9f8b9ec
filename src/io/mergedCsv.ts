/**
 * Final merged table - courses_with_slots.csv
 */

import * as fs from 'fs';
import type { CourseOutputRecord } from '../types.js';
import { formatCsv } from './csv.js';

export const MERGED_CSV_HEADERS = ['ccode', 'cname', 'coordname', 'ccrd', 'segment', 'slots'] as const;

export function buildMergedCsv(records: CourseOutputRecord[]): string {
  return formatCsv(
    MERGED_CSV_HEADERS,
    records.map(record => ({
      ccode: record.code,
      cname: record.name,
      coordname: record.coordinator,
      ccrd: record.credits,
      segment: record.segment,
      slots: record.slot,
    }))
  );
}

export function writeMergedCsv(filePath: string, records: CourseOutputRecord[]): void {
  fs.writeFileSync(filePath, buildMergedCsv(records), 'utf-8');
}
