/**
 * Error types shared by the fetch and merge stages
 */

/**
 * Missing credentials or invalid numeric options. Raised before any remote call.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A single timetable request failed (network, HTTP status, or response shape).
 * The batch fetcher retries these.
 */
export class FetchError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.status = options.status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
