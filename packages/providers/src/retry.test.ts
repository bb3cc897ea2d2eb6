import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fetchWithRetry } from './retry.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
});

function mockResponse(status: number, statusText: string, headers?: Headers): Response {
  return new Response(status === 204 || status === 200 ? 'ok' : null, { status, statusText, headers });
}

function hangUntilAborted(_url: string, init: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init.signal;
    if (!signal) return;
    signal.addEventListener('abort', () => reject(new DOMException('Aborted', 'AbortError')), { once: true });
  });
}

describe('fetchWithRetry', () => {
  it('returns response on success', async () => {
    mockFetch.mockResolvedValueOnce(mockResponse(200, 'OK'));

    const response = await fetchWithRetry('https://example.com', {});
    expect(response.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('passes headers through and replaces the signal', async () => {
    mockFetch.mockResolvedValueOnce(mockResponse(200, 'OK'));

    await fetchWithRetry('https://example.com', { headers: { 'User-Agent': 'test-agent' } });
    const init = mockFetch.mock.calls[0][1];
    expect(init.headers).toEqual({ 'User-Agent': 'test-agent' });
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it('retries on 429 and succeeds', async () => {
    mockFetch
      .mockResolvedValueOnce(mockResponse(429, 'Too Many Requests'))
      .mockResolvedValueOnce(mockResponse(200, 'OK'));

    const response = await fetchWithRetry('https://example.com', {}, {
      maxRetries: 2,
      initialDelayMs: 10,
    });

    expect(response.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('retries on 502 and 503', async () => {
    mockFetch
      .mockResolvedValueOnce(mockResponse(502, 'Bad Gateway'))
      .mockResolvedValueOnce(mockResponse(503, 'Service Unavailable'))
      .mockResolvedValueOnce(mockResponse(200, 'OK'));

    const response = await fetchWithRetry('https://example.com', {}, {
      maxRetries: 3,
      initialDelayMs: 10,
    });

    expect(response.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it('does not retry on 404', async () => {
    mockFetch.mockResolvedValueOnce(mockResponse(404, 'Not Found'));

    await expect(
      fetchWithRetry('https://example.com', {}, { maxRetries: 2 }),
    ).rejects.toThrow('HTTP 404 Not Found for https://example.com');

    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('throws after exhausting retries on persistent 429', async () => {
    mockFetch.mockImplementation(async () => mockResponse(429, 'Too Many Requests'));

    await expect(
      fetchWithRetry('https://example.com', {}, {
        maxRetries: 2,
        initialDelayMs: 10,
      }),
    ).rejects.toThrow('HTTP 429 Too Many Requests (rate limited) for https://example.com');

    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it('respects Retry-After header', async () => {
    const headers = new Headers();
    headers.set('Retry-After', '1');
    mockFetch
      .mockResolvedValueOnce(mockResponse(429, 'Too Many Requests', headers))
      .mockResolvedValueOnce(mockResponse(200, 'OK'));

    const start = Date.now();
    await fetchWithRetry('https://example.com', {}, {
      maxRetries: 1,
      initialDelayMs: 10,
    });
    const elapsed = Date.now() - start;

    expect(elapsed).toBeGreaterThanOrEqual(900);
  });

  it('draws jitter from the injected source', async () => {
    const random = vi.fn(() => 0.5);
    mockFetch
      .mockResolvedValueOnce(mockResponse(500, 'Internal Server Error'))
      .mockResolvedValueOnce(mockResponse(500, 'Internal Server Error'))
      .mockResolvedValueOnce(mockResponse(200, 'OK'));

    await fetchWithRetry('https://example.com', {}, { maxRetries: 2, initialDelayMs: 5, random });

    expect(random).toHaveBeenCalledTimes(2);
  });

  it('retries on network errors', async () => {
    mockFetch
      .mockRejectedValueOnce(new Error('fetch failed: ECONNRESET'))
      .mockResolvedValueOnce(mockResponse(200, 'OK'));

    const response = await fetchWithRetry('https://example.com', {}, {
      maxRetries: 1,
      initialDelayMs: 10,
    });

    expect(response.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('does not retry non-network errors', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Invalid argument'));

    await expect(
      fetchWithRetry('https://example.com', {}, { maxRetries: 2 }),
    ).rejects.toThrow('Invalid argument');

    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('times out a hanging request and retries it', async () => {
    mockFetch.mockImplementation(hangUntilAborted);

    await expect(
      fetchWithRetry('https://example.com/slow', {}, { maxRetries: 1, initialDelayMs: 5, timeoutMs: 20 }),
    ).rejects.toThrow('Request timeout after 20ms for https://example.com/slow');

    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('rethrows a caller abort without retrying', async () => {
    mockFetch.mockImplementation(hangUntilAborted);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    await expect(
      fetchWithRetry('https://example.com', { signal: controller.signal }, { maxRetries: 3, timeoutMs: 5000 }),
    ).rejects.toThrow('Aborted');

    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('stops waiting between retries when aborted', async () => {
    mockFetch.mockResolvedValue(mockResponse(503, 'Service Unavailable'));
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    await expect(
      fetchWithRetry('https://example.com', { signal: controller.signal }, { maxRetries: 3, initialDelayMs: 5000 }),
    ).rejects.toThrow('Aborted');

    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});
