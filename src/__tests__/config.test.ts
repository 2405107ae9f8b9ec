import { describe, it, expect } from 'vitest';
import { resolveFetchConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { DEFAULT_BASE_URL, DEFAULT_REFERER } from '../httpClient.js';

const credentials = { AIMS_STUDENT_ID: '42', AIMS_COOKIE: 'test-cookie' };

describe('resolveFetchConfig', () => {
  it('applies defaults', () => {
    expect(resolveFetchConfig({}, credentials)).toEqual({
      studentId: '42',
      cookie: 'test-cookie',
      referer: DEFAULT_REFERER,
      baseUrl: DEFAULT_BASE_URL,
      batchSize: 20,
      retries: 2,
      sleepMs: 200,
      timeoutMs: 30000,
    });
  });

  it('lets options override the environment', () => {
    const config = resolveFetchConfig(
      { studentId: '7', batchSize: '5', timeoutS: '10' },
      { ...credentials, AIMS_BATCH_SIZE: '50', AIMS_RETRIES: '0' }
    );
    expect(config).toMatchObject({ studentId: '7', batchSize: 5, retries: 0, timeoutMs: 10000 });
  });

  it('requires a student id and a cookie', () => {
    expect(() => resolveFetchConfig({}, { AIMS_COOKIE: 'test-cookie' })).toThrow(ConfigError);
    expect(() => resolveFetchConfig({}, { AIMS_STUDENT_ID: '42' })).toThrow('missing cookie');
    expect(() => resolveFetchConfig({ cookie: '  ' }, { AIMS_STUDENT_ID: '42' })).toThrow(ConfigError);
  });

  it('rejects non-positive batch sizes and malformed numbers', () => {
    expect(() => resolveFetchConfig({ batchSize: '0' }, credentials)).toThrow('batch size must be an integer >= 1');
    expect(() => resolveFetchConfig({ retries: '-1' }, credentials)).toThrow(ConfigError);
    expect(() => resolveFetchConfig({ sleepMs: 'soon' }, credentials)).toThrow(ConfigError);
    expect(() => resolveFetchConfig({ timeoutS: '0' }, credentials)).toThrow(ConfigError);
  });

  it('rejects timeouts and sleeps past the longest timer delay', () => {
    expect(resolveFetchConfig({ timeoutS: '2147483' }, credentials).timeoutMs).toBe(2147483000);
    expect(() => resolveFetchConfig({ timeoutS: '2200000' }, credentials)).toThrow('timeout must be at most 2147483');
    expect(resolveFetchConfig({ sleepMs: '2147483647' }, credentials).sleepMs).toBe(2147483647);
    expect(() => resolveFetchConfig({}, { ...credentials, AIMS_SLEEP_MS: '2147483648' })).toThrow(ConfigError);
  });
});
