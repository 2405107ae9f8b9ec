/**
 * HTTP client for the AIMS timetable endpoint
 * Plain fetch with the browser's session cookie - no login flow here.
 *
 * The endpoint takes form data with a JSON string in `dataObj`:
 *   dataObj={"runningCourseIds":"17174,17175","studentId":"12345"}
 * and answers with a JSON array of slot rows.
 */

import { FetchError } from './errors.js';
import type { TimetableQuery } from './types.js';

export const DEFAULT_BASE_URL = 'https://aims.iith.ac.in/aims';
export const DEFAULT_REFERER = `${DEFAULT_BASE_URL}/courseReg/studentRegForm/68`;
export const USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/142.0.0.0 Safari/537.36';

export interface TimetableClientOptions {
  baseUrl: string;
  studentId: string;
  cookie: string;
  referer: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export function timetableUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/courseReg/getStdntRngCrsTimeTableDtls`;
}

/**
 * Form body for one batch
 */
export function buildTimetableBody(courseIds: string[], studentId: string): string {
  const dataObj = JSON.stringify({ runningCourseIds: courseIds.join(','), studentId: String(studentId) });
  return new URLSearchParams({ dataObj }).toString();
}

/**
 * Create the query function the batch fetcher calls once per batch
 */
export function createTimetableClient(options: TimetableClientOptions): TimetableQuery {
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = timetableUrl(options.baseUrl);
  const origin = new URL(url).origin;

  return async (courseIds: string[]): Promise<unknown[]> => {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: 'POST',
        headers: {
          'Accept': '*/*',
          'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
          'X-Requested-With': 'XMLHttpRequest',
          'Origin': origin,
          'Referer': options.referer,
          'User-Agent': USER_AGENT,
          'Cookie': options.cookie,
        },
        body: buildTimetableBody(courseIds, options.studentId),
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        throw new FetchError(`request timed out after ${options.timeoutMs}ms`, { cause: err });
      }
      throw new FetchError(`request failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }

    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status} ${response.statusText}`.trim(), { status: response.status });
    }

    const raw = await response.text();
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      // An expired cookie gets the HTML login page instead of JSON
      throw new FetchError(`invalid JSON in response: ${raw.slice(0, 80)}`, { cause: err });
    }

    if (!Array.isArray(parsed)) {
      throw new FetchError(`Unexpected response type: ${parsed === null ? 'null' : typeof parsed}`);
    }
    return parsed;
  };
}
