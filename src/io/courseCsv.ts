/**
 * Course metadata loader
 * Reads the courses*.csv exports (rcid, ccode, cname, coordname, ccrd, strtdt, enddt)
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../logger.js';
import { compareCourseIds } from '../slotAggregator.js';
import type { CourseMeta } from '../types.js';
import { parseCsv, type CsvRow } from './csv.js';

const COURSE_CSV_PATTERN = /^courses.*\.csv$/;

function cell(row: CsvRow, column: string): string {
  return (row[column] ?? '').trim();
}

/**
 * Course rows from CSV text, keyed by rcid. Earlier rows win over later duplicates.
 */
export function parseCourseCsv(text: string, courses: Map<string, CourseMeta> = new Map()): Map<string, CourseMeta> {
  const { headers, rows } = parseCsv(text);
  if (headers.length === 0) return courses;

  for (const row of rows) {
    const courseId = cell(row, 'rcid');
    if (!courseId || courses.has(courseId)) continue;

    courses.set(courseId, {
      courseId,
      code: cell(row, 'ccode'),
      name: cell(row, 'cname'),
      coordinator: cell(row, 'coordname'),
      credits: cell(row, 'ccrd'),
      startDate: cell(row, 'strtdt'),
      endDate: cell(row, 'enddt'),
    });
  }

  return courses;
}

/**
 * Read several course CSVs in order; the first file to list an rcid wins.
 * Missing files are skipped.
 */
export function readCourseCsvs(csvPaths: string[]): Map<string, CourseMeta> {
  const courses = new Map<string, CourseMeta>();

  for (const csvPath of csvPaths) {
    if (!fs.existsSync(csvPath)) {
      logger.warn('Courses', `Skipping missing file: ${csvPath}`);
      continue;
    }
    const before = courses.size;
    parseCourseCsv(fs.readFileSync(csvPath, 'utf-8'), courses);
    logger.debug('Courses', `${path.basename(csvPath)}: ${courses.size - before} new courses`);
  }

  return courses;
}

/**
 * Default inputs: courses*.csv in the directory, by name
 */
export function findCourseCsvs(dir: string = process.cwd()): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs.readdirSync(dir)
    .filter(name => COURSE_CSV_PATTERN.test(name))
    .sort()
    .map(name => path.join(dir, name));
}

export function sortCourseIds(ids: Iterable<string>): string[] {
  return [...ids].sort(compareCourseIds);
}
