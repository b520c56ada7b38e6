import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HttpsProxyAgent } from 'https-proxy-agent';
import fetch, { Response } from 'node-fetch';
import { forwardToBackend } from '@/lib/backend';

vi.mock('node-fetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

const fetchMock = vi.mocked(fetch);
const env = { BACKEND_URL: 'http://backend.test/' };

describe('forwardToBackend', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.restoreAllMocks();
  });

  it('requires BACKEND_URL', async () => {
    const result = await forwardToBackend('/chat', '{}', {});

    expect(fetchMock).not.toHaveBeenCalled();
    expect(result).toEqual({
      status: 500,
      body: '{"detail":"BACKEND_URL is not defined in environment variables"}',
      contentType: 'application/json',
    });
  });

  it('relays the body and returns the upstream answer', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response('{"video_id":"abc123DEF45"}', {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      }),
    );

    const result = await forwardToBackend('/process-video', '{"url":"https://youtu.be/abc123DEF45"}', env);

    expect(fetchMock).toHaveBeenCalledWith('http://backend.test/process-video', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"url":"https://youtu.be/abc123DEF45"}',
    });
    expect(result).toEqual({
      status: 200,
      body: '{"video_id":"abc123DEF45"}',
      contentType: 'application/json',
    });
  });

  it('passes error statuses through unchanged', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response('Upstream exploded', { status: 503, headers: { 'Content-Type': 'text/html' } }),
    );

    const result = await forwardToBackend('/chat', '{}', env);

    expect(result).toEqual({ status: 503, body: 'Upstream exploded', contentType: 'text/html' });
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('routes through HTTPS_PROXY when set', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"response":"ok"}', { status: 200 }));

    await forwardToBackend('/chat', '{}', { ...env, HTTPS_PROXY: 'http://proxy.test:8080' });

    expect(fetchMock.mock.calls[0][1]?.agent).toBeInstanceOf(HttpsProxyAgent);
  });

  it('answers 502 when the backend is unreachable', async () => {
    fetchMock.mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:8080'));

    const result = await forwardToBackend('/chat', '{}', env);

    expect(result).toEqual({
      status: 502,
      body: '{"detail":"Backend unreachable: connect ECONNREFUSED 127.0.0.1:8080"}',
      contentType: 'application/json',
    });
  });
});
