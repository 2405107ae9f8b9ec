/**
 * Database Module
 * Optional SQLite store for fetch runs, aggregated slots and merged courses
 */

import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { logger } from '../logger.js';
import type { SlotAggregator } from '../slotAggregator.js';
import type { CourseOutputRecord, CourseSlot, FetchSummary } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export type RunStatus = 'running' | 'completed' | 'failed';

export interface FetchRun {
  id: number;
  startedAt: Date;
  endedAt: Date | null;
  status: RunStatus;
  courses: number;
  batches: number;
  failedBatches: number;
  rows: number;
  error: string | null;
}

interface FetchRunRow {
  id: number;
  started_at: string;
  ended_at: string | null;
  status: RunStatus;
  courses: number;
  batches: number;
  failed_batches: number;
  row_count: number;
  error: string | null;
}

interface CourseSlotRow {
  slot_id: string;
  slot_code: string;
  segment_name: string;
  day_times: string;
}

// SQLite CURRENT_TIMESTAMP is UTC without a zone marker
function sqliteDate(value: string): Date {
  return new Date(value.replace(' ', 'T') + 'Z');
}

function parseDayTimes(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
}

export class SlotDatabase {
  private db: Database.Database;

  constructor(dbPath: string = 'slots.db') {
    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
  }

  /**
   * Initialize database with schema
   */
  initialize(): void {
    const schemaPath = join(__dirname, 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');
    this.db.exec(schema);
    logger.debug('Database', 'Schema initialized');
  }

  startFetchRun(courses: number): number {
    const result = this.db.prepare(`
      INSERT INTO fetch_runs (status, courses) VALUES ('running', ?)
    `).run(courses);
    return Number(result.lastInsertRowid);
  }

  endFetchRun(runId: number, summary: FetchSummary | null, status: Exclude<RunStatus, 'running'>, error?: string): void {
    this.db.prepare(`
      UPDATE fetch_runs
      SET ended_at = CURRENT_TIMESTAMP,
          status = ?,
          batches = ?,
          failed_batches = ?,
          row_count = ?,
          error = ?
      WHERE id = ?
    `).run(
      status,
      summary?.batches.length ?? 0,
      summary?.failedBatches ?? 0,
      summary?.rowsAccepted ?? 0,
      error ?? null,
      runId
    );
  }

  /**
   * Save aggregated slots. A slot seen again replaces its previous row.
   */
  saveSlots(aggregator: SlotAggregator, runId: number | null = null): number {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO course_slots
      (course_id, slot_id, slot_code, segment_name, day_times, run_id, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, CURRENT_TIMESTAMP)
    `);

    const records = aggregator.records();
    const transaction = this.db.transaction(() => {
      for (const record of records) {
        stmt.run(
          record.key.courseId,
          record.key.slotId,
          record.key.slotCode,
          record.segmentName,
          JSON.stringify([...record.dayTimes].sort()),
          runId
        );
      }
    });

    transaction();
    logger.info('Database', `Saved ${records.length} course slots`);
    return records.length;
  }

  /**
   * Replace the merged course table with a new merge result, keeping its order
   */
  saveMergedCourses(records: CourseOutputRecord[]): void {
    const clear = this.db.prepare('DELETE FROM merged_courses');
    const stmt = this.db.prepare(`
      INSERT INTO merged_courses (position, course_id, code, name, coordinator, credits, segment, slot)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const transaction = this.db.transaction((rows: CourseOutputRecord[]) => {
      clear.run();
      rows.forEach((r, position) => {
        stmt.run(position, r.courseId, r.code, r.name, r.coordinator, r.credits, r.segment, r.slot);
      });
    });

    transaction(records);
    logger.info('Database', `Saved ${records.length} merged courses`);
  }

  getCourseSlots(courseId: string): CourseSlot[] {
    const rows = this.db.prepare(`
      SELECT slot_id, slot_code, segment_name, day_times
      FROM course_slots WHERE course_id = ?
      ORDER BY slot_id, slot_code
    `).all(courseId) as CourseSlotRow[];

    return rows.map(row => ({
      slotId: row.slot_id,
      slotCode: row.slot_code,
      segmentName: row.segment_name,
      dayTimes: parseDayTimes(row.day_times),
    }));
  }

  getMergedCourses(): CourseOutputRecord[] {
    const rows = this.db.prepare(`
      SELECT course_id, code, name, coordinator, credits, segment, slot
      FROM merged_courses ORDER BY position
    `).all() as {
      course_id: string; code: string; name: string; coordinator: string;
      credits: string; segment: string; slot: string;
    }[];

    return rows.map(row => ({
      courseId: row.course_id,
      code: row.code,
      name: row.name,
      coordinator: row.coordinator,
      credits: row.credits,
      segment: row.segment,
      slot: row.slot,
    }));
  }

  getRecentRuns(limit: number = 5): FetchRun[] {
    const rows = this.db.prepare(`
      SELECT * FROM fetch_runs ORDER BY id DESC LIMIT ?
    `).all(limit) as FetchRunRow[];

    return rows.map(row => ({
      id: row.id,
      startedAt: sqliteDate(row.started_at),
      endedAt: row.ended_at ? sqliteDate(row.ended_at) : null,
      status: row.status,
      courses: row.courses,
      batches: row.batches,
      failedBatches: row.failed_batches,
      rows: row.row_count,
      error: row.error,
    }));
  }

  /**
   * Get statistics
   */
  getStats(): { slots: number; courses: number; merged: number; runs: number } {
    const count = (sql: string) => (this.db.prepare(sql).get() as { count: number }).count;
    return {
      slots: count('SELECT COUNT(*) as count FROM course_slots'),
      courses: count('SELECT COUNT(DISTINCT course_id) as count FROM course_slots'),
      merged: count('SELECT COUNT(*) as count FROM merged_courses'),
      runs: count('SELECT COUNT(*) as count FROM fetch_runs'),
    };
  }

  /**
   * Close database
   */
  close(): void {
    this.db.close();
  }
}
