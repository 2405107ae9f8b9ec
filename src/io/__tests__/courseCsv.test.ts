import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { findCourseCsvs, parseCourseCsv, readCourseCsvs, sortCourseIds } from '../courseCsv.js';

const HEADER = 'rcid,ccode,cname,coordname,ccrd,strtdt,enddt';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'course-csv-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('parseCourseCsv', () => {
  it('maps the portal columns', () => {
    const courses = parseCourseCsv(`${HEADER}\n17174, CS1010 ,Discrete Maths,Dr. A,3,"05 Jan, 2026 00:00","27 Apr, 2026 00:00"\n`);
    expect(courses.get('17174')).toEqual({
      courseId: '17174',
      code: 'CS1010',
      name: 'Discrete Maths',
      coordinator: 'Dr. A',
      credits: '3',
      startDate: '05 Jan, 2026 00:00',
      endDate: '27 Apr, 2026 00:00',
    });
  });

  it('skips rows without rcid and keeps the first duplicate', () => {
    const courses = parseCourseCsv(`${HEADER}\n,X,,,,,\n5,FIRST,,,,,\n5,SECOND,,,,,\n`);
    expect([...courses.keys()]).toEqual(['5']);
    expect(courses.get('5')?.code).toBe('FIRST');
  });
});

describe('readCourseCsvs', () => {
  it('lets earlier files win and skips missing ones', () => {
    const first = path.join(dir, 'courses.csv');
    const second = path.join(dir, 'courses2.csv');
    fs.writeFileSync(first, `${HEADER}\n1,CS1010,,,,,\n`);
    fs.writeFileSync(second, `${HEADER}\n1,CS9999,,,,,\n2,MA1110,,,,,\n`);

    const courses = readCourseCsvs([first, path.join(dir, 'missing.csv'), second]);
    expect([...courses.values()].map(c => c.code)).toEqual(['CS1010', 'MA1110']);
  });
});

describe('findCourseCsvs', () => {
  it('lists courses*.csv by name', () => {
    for (const name of ['courses3.csv', 'courses.csv', 'courses2.csv', 'slots.csv', 'courses.json']) {
      fs.writeFileSync(path.join(dir, name), '');
    }
    expect(findCourseCsvs(dir).map(p => path.basename(p))).toEqual(['courses.csv', 'courses2.csv', 'courses3.csv']);
  });

  it('returns nothing for a missing directory', () => {
    expect(findCourseCsvs(path.join(dir, 'nope'))).toEqual([]);
  });
});

describe('sortCourseIds', () => {
  it('orders numeric ids numerically', () => {
    expect(sortCourseIds(['17200', '9', '17174'])).toEqual(['9', '17174', '17200']);
  });
});
