import { describe, expect, it, vi } from 'vitest';
import { RequestTimeoutError, fetchWithTimeout } from './http.js';

function stalledBody(): Response {
  return new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 200 });
}

describe('fetchWithTimeout', () => {
  it('returns the status, headers and body text', async () => {
    const fetchImpl = vi.fn(async () => new Response('hello', { status: 201, headers: { 'x-restli-id': 'id-1' } }));

    const res = await fetchWithTimeout('https://example.test/a', {}, 1000, fetchImpl);

    expect(res.status).toBe(201);
    expect(res.ok).toBe(true);
    expect(res.headers.get('x-restli-id')).toBe('id-1');
    expect(res.text).toBe('hello');
  });

  it('passes an abort signal to fetch', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => new Response('ok'));

    await fetchWithTimeout('https://example.test/a', { method: 'POST' }, 1000, fetchImpl);

    const [, init] = fetchImpl.mock.calls[0];
    expect(init?.method).toBe('POST');
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('times out when the headers never arrive', async () => {
    const fetchImpl = vi.fn(() => new Promise<Response>(() => undefined));

    await expect(fetchWithTimeout('https://example.test/slow', {}, 50, fetchImpl)).rejects.toBeInstanceOf(
      RequestTimeoutError,
    );
  });

  it('times out when the body stalls after the headers', async () => {
    const fetchImpl = vi.fn(async () => stalledBody());

    await expect(fetchWithTimeout('https://example.test/stalled', {}, 50, fetchImpl)).rejects.toThrow(
      'Request to https://example.test/stalled timed out after 50ms',
    );
  });
});
