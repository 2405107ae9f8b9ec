/**
 * Fetch configuration
 * CLI options win over environment variables (.env is loaded by the CLI entry point).
 */

import { ConfigError } from './errors.js';
import { DEFAULT_BASE_URL, DEFAULT_REFERER } from './httpClient.js';

export interface FetchConfig {
  studentId: string;
  cookie: string;
  referer: string;
  baseUrl: string;
  batchSize: number;
  retries: number;
  sleepMs: number;
  timeoutMs: number;
}

export interface FetchConfigInput {
  studentId?: string;
  cookie?: string;
  referer?: string;
  baseUrl?: string;
  batchSize?: string;
  retries?: string;
  sleepMs?: string;
  timeoutS?: string;
}

export const DEFAULTS = {
  batchSize: 20,
  retries: 2,
  sleepMs: 200,
  timeoutS: 30,
} as const;

// Node timers fire after 1 ms for delays above 2^31 - 1 ms
export const MAX_TIMER_MS = 2147483647;

function parseNumber(name: string, raw: string | undefined, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  if (value > max) {
    throw new ConfigError(`${name} must be at most ${max} (got "${raw}")`);
  }
  return value;
}

/**
 * Resolve and validate the fetch configuration. Throws ConfigError on
 * missing credentials or bad numbers, before anything touches the network.
 */
export function resolveFetchConfig(
  input: FetchConfigInput,
  env: NodeJS.ProcessEnv = process.env
): FetchConfig {
  const studentId = (input.studentId || env.AIMS_STUDENT_ID || '').trim();
  const cookie = (input.cookie || env.AIMS_COOKIE || '').trim();

  if (!studentId) {
    throw new ConfigError('missing student id. Pass --student-id or set AIMS_STUDENT_ID');
  }
  if (!cookie) {
    throw new ConfigError('missing cookie. Pass --cookie or set AIMS_COOKIE');
  }

  return {
    studentId,
    cookie,
    referer: input.referer || env.AIMS_REFERER || DEFAULT_REFERER,
    baseUrl: input.baseUrl || env.AIMS_BASE_URL || DEFAULT_BASE_URL,
    batchSize: parseNumber('batch size', input.batchSize ?? env.AIMS_BATCH_SIZE, DEFAULTS.batchSize, 1),
    retries: parseNumber('retries', input.retries ?? env.AIMS_RETRIES, DEFAULTS.retries, 0),
    sleepMs: parseNumber('sleep', input.sleepMs ?? env.AIMS_SLEEP_MS, DEFAULTS.sleepMs, 0, MAX_TIMER_MS),
    timeoutMs: parseNumber('timeout', input.timeoutS ?? env.AIMS_TIMEOUT_S, DEFAULTS.timeoutS, 1, Math.floor(MAX_TIMER_MS / 1000)) * 1000,
  };
}
