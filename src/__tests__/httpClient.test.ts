import { describe, it, expect, vi } from 'vitest';
import { FetchError } from '../errors.js';
import { buildTimetableBody, createTimetableClient, timetableUrl } from '../httpClient.js';

function client(fetchImpl: typeof fetch) {
  return createTimetableClient({
    baseUrl: 'https://portal.example.edu/aims/',
    studentId: '42',
    cookie: 'JSESSIONID=test-session',
    referer: 'https://portal.example.edu/aims/courseReg/studentRegForm/1',
    timeoutMs: 1000,
    fetchImpl,
  });
}

describe('buildTimetableBody', () => {
  it('wraps the ids and student id as JSON in dataObj', () => {
    const body = buildTimetableBody(['17174', '17175'], '42');
    expect(body).toBe('dataObj=%7B%22runningCourseIds%22%3A%2217174%2C17175%22%2C%22studentId%22%3A%2242%22%7D');
    expect(new URLSearchParams(body).get('dataObj')).toBe('{"runningCourseIds":"17174,17175","studentId":"42"}');
  });
});

describe('timetableUrl', () => {
  it('appends the endpoint path without doubling slashes', () => {
    expect(timetableUrl('https://portal.example.edu/aims/')).toBe(
      'https://portal.example.edu/aims/courseReg/getStdntRngCrsTimeTableDtls'
    );
  });
});

describe('createTimetableClient', () => {
  it('posts the batch with the session headers and returns the rows', async () => {
    const rows = [{ runningCourseId: '1', slotPeriodCdDays: 'Mon' }];
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(JSON.stringify(rows), { status: 200 }));

    await expect(client(fetchImpl)(['1'])).resolves.toEqual(rows);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://portal.example.edu/aims/courseReg/getStdntRngCrsTimeTableDtls');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(buildTimetableBody(['1'], '42'));
    expect(init?.headers).toMatchObject({
      'Cookie': 'JSESSIONID=test-session',
      'Origin': 'https://portal.example.edu',
      'Referer': 'https://portal.example.edu/aims/courseReg/studentRegForm/1',
      'X-Requested-With': 'XMLHttpRequest',
    });
  });

  it('rejects non-2xx responses with the status', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('busy', { status: 503 }));

    const error = await client(fetchImpl)(['1']).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: 503 });
  });

  it('rejects a body that is not JSON', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('<html>login</html>', { status: 200 }));

    await expect(client(fetchImpl)(['1'])).rejects.toThrow('invalid JSON in response: <html>login</html>');
  });

  it('rejects JSON that is not an array', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('{"error":"session"}', { status: 200 }));

    await expect(client(fetchImpl)(['1'])).rejects.toThrow('Unexpected response type: object');
  });

  it('wraps network failures', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(client(fetchImpl)(['1'])).rejects.toThrow(new FetchError('request failed: fetch failed'));
  });

  it('reports timeouts', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    });

    await expect(client(fetchImpl)(['1'])).rejects.toThrow('request timed out after 1000ms');
  });
});
