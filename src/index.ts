#!/usr/bin/env node
/**
 * Course Slots - CLI entry point
 *
 * Usage:
 *   npm run fetch -- --csv courses.csv --csv courses2.csv
 *   npm run combine
 *   npm start -- combo comboData.json courses.csv
 */

import { config } from 'dotenv';
import { Command } from 'commander';
import { resolveFetchConfig, DEFAULTS, type FetchConfigInput } from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import { convertComboFile } from './io/comboResponse.js';
import { findCourseCsvs } from './io/courseCsv.js';
import { levelFromEnv, logger } from './logger.js';
import { runCombine, runFetch } from './pipeline.js';

config();
// The logger singleton is built before .env is loaded
logger.setLevel(levelFromEnv());

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function csvInputs(paths: string[]): string[] {
  return paths.length > 0 ? paths : findCourseCsvs();
}

const program = new Command();

program
  .name('course-slots')
  .description('Fetch, dedupe and merge course timetable slots from AIMS')
  .version('1.0.0');

program
  .command('fetch')
  .description('Fetch deduped timetable slots for every course in the course CSVs')
  .option('--csv <path>', 'Course CSV file (repeatable, default: courses*.csv in cwd)', collect, [])
  .option('--student-id <id>', 'AIMS student id (or AIMS_STUDENT_ID)')
  .option('--cookie <value>', 'Cookie header from a logged-in browser (or AIMS_COOKIE)')
  .option('--referer <url>', 'Referer header (or AIMS_REFERER)')
  .option('--base-url <url>', 'Portal base URL (or AIMS_BASE_URL)')
  .option('--batch-size <n>', `Course ids per request (default: ${DEFAULTS.batchSize})`)
  .option('--sleep-ms <ms>', `Pause between requests (default: ${DEFAULTS.sleepMs})`)
  .option('--retries <n>', `Retries per batch (default: ${DEFAULTS.retries})`)
  .option('--timeout-s <s>', `Request timeout in seconds (default: ${DEFAULTS.timeoutS})`)
  .option('--out-csv <path>', 'Output CSV path', 'slots.csv')
  .option('--out-json <path>', 'Output JSON path', 'slots.json')
  .option('--db <path>', 'Also record the run and slots in a SQLite database')
  .action(async (options: FetchConfigInput & { csv: string[]; outCsv: string; outJson: string; db?: string }) => {
    const fetchConfig = resolveFetchConfig(options);
    logger.startSession('fetch');

    const { courses, slots, summary } = await runFetch(fetchConfig, {
      csvPaths: csvInputs(options.csv),
      outCsv: options.outCsv,
      outJson: options.outJson,
      dbPath: options.db,
    });

    logger.summary('Fetch Complete', {
      'Courses': courses,
      'Batches': summary.batches.length,
      'Failed batches': summary.failedBatches,
      'Rows accepted': summary.rowsAccepted,
      'Rows discarded': summary.rowsDiscarded,
      'Unique slots': slots.size,
    });
  });

program
  .command('combine')
  .description('Merge course metadata with fetched slots into courses_with_slots.csv')
  .option('--csv <path>', 'Course CSV file (repeatable, default: courses*.csv in cwd)', collect, [])
  .option('--slots-json <path>', 'Slots JSON from fetch', 'slots.json')
  .option('--slots-csv <path>', 'Slots CSV, used when the JSON is missing', 'slots.csv')
  .option('-o, --out <path>', 'Output CSV path', 'courses_with_slots.csv')
  .option('--db <path>', 'Also store the merged table in a SQLite database')
  .action((options: { csv: string[]; slotsJson: string; slotsCsv: string; out: string; db?: string }) => {
    const { stats } = runCombine({
      csvPaths: csvInputs(options.csv),
      slotsJson: options.slotsJson,
      slotsCsv: options.slotsCsv,
      out: options.out,
      dbPath: options.db,
    });

    logger.info('Combine', `Created ${options.out} with ${stats.courses} courses`);
    logger.info('Combine', `  - ${stats.withSlots} courses with slots`);
    logger.info('Combine', `  - ${stats.withSegments} courses with segments`);
  });

program
  .command('combo')
  .description('Convert a saved comboHelpAjax JSON response into a course CSV')
  .argument('<input>', 'comboData JSON file')
  .argument('<output>', 'CSV file to write')
  .action((input: string, output: string) => {
    convertComboFile(input, output);
  });

program
  .parseAsync()
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      logger.error('Config', errorMessage(err));
      process.exitCode = 2;
      return;
    }
    logger.error('CLI', errorMessage(err));
    if (err instanceof Error && err.stack) logger.debug('CLI', err.stack);
    process.exitCode = 1;
  })
  .finally(() => {
    logger.flush();
  });
