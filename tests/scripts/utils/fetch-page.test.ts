import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

const fetchMock = vi.hoisted(() => vi.fn());

vi.mock('node-fetch', () => ({
  default: fetchMock,
}));

import { fetchPage } from '../../../scripts/utils/fetch-page';

function okResponse(body: string) {
  return {
    ok: true,
    status: 200,
    statusText: 'OK',
    arrayBuffer: async () => new TextEncoder().encode(body).buffer,
  };
}

describe('fetchPage', () => {
  let logSpy: MockInstance;
  let warnSpy: MockInstance;
  let errorSpy: MockInstance;

  beforeEach(() => {
    fetchMock.mockReset();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
    errorSpy.mockRestore();
    delete process.env.LEXICON_FETCH_USER_AGENT;
  });

  it('returns the body of a successful response', async () => {
    process.env.LEXICON_FETCH_USER_AGENT = 'test-agent';
    fetchMock.mockResolvedValueOnce(okResponse('<html></html>'));

    const body = await fetchPage('https://example.test/page');

    expect(body?.toString('utf8')).toBe('<html></html>');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://example.test/page');
    expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({ headers: { 'User-Agent': 'test-agent' } });
  });

  it('retries failed attempts and succeeds', async () => {
    fetchMock
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce({ ok: false, status: 503, statusText: 'Service Unavailable' })
      .mockResolvedValueOnce(okResponse('done'));

    const body = await fetchPage('https://example.test/retry', 2, { baseDelayMs: 0 });

    expect(body?.toString('utf8')).toBe('done');
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(warnSpy).toHaveBeenCalledTimes(2);
  });

  it('returns null once retries are exhausted', async () => {
    fetchMock.mockRejectedValue(new Error('offline'));

    const body = await fetchPage('https://example.test/down', 1, { baseDelayMs: 0 });

    expect(body).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const failure = JSON.parse(String(errorSpy.mock.calls[0]?.[0]));
    expect(failure).toMatchObject({
      level: 'error',
      source: 'fetch',
      event: 'fetch.failed',
      message: 'Failed to fetch https://example.test/down after 2 attempt(s)',
    });
  });

  it('backs off longer after each failed attempt', async () => {
    vi.useFakeTimers();
    try {
      fetchMock
        .mockRejectedValueOnce(new Error('first'))
        .mockRejectedValueOnce(new Error('second'))
        .mockResolvedValueOnce(okResponse('late'));

      const pending = fetchPage('https://example.test/slow', 2, { baseDelayMs: 100 });

      await vi.advanceTimersByTimeAsync(99);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(199);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(1);
      expect(fetchMock).toHaveBeenCalledTimes(3);

      expect((await pending)?.toString('utf8')).toBe('late');
    } finally {
      vi.useRealTimers();
    }
  });

  it('rejects a negative retry count', async () => {
    await expect(fetchPage('https://example.test', -1)).rejects.toThrow(RangeError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
