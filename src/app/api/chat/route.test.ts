// @vitest-environment node
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fetch, { Response } from 'node-fetch';
import { POST } from './route';

vi.mock('node-fetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

const fetchMock = vi.mocked(fetch);

function chatRequest(body: string) {
  return new Request('http://localhost:3000/api/chat', { method: 'POST', body });
}

describe('POST /api/chat', () => {
  beforeEach(() => {
    vi.stubEnv('BACKEND_URL', 'http://backend.test');
    vi.stubEnv('HTTPS_PROXY', '');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('relays the backend status, body and content type', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response('<h1>Service Unavailable</h1>', { status: 503, headers: { 'Content-Type': 'text/html' } }),
    );
    const body = '{"query":"Who speaks first?","video_id":"abc123DEF45","history":[]}';

    const res = await POST(chatRequest(body));

    expect(fetchMock.mock.calls[0][0]).toBe('http://backend.test/chat');
    expect(fetchMock.mock.calls[0][1]?.body).toBe(body);
    expect(res.status).toBe(503);
    expect(res.headers.get('content-type')).toBe('text/html');
    expect(await res.text()).toBe('<h1>Service Unavailable</h1>');
  });

  it('answers 500 with a detail when the request body cannot be read', async () => {
    const req = chatRequest('{}');
    await req.text();

    const res = await POST(req);

    expect(fetchMock).not.toHaveBeenCalled();
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ detail: 'Internal Server Error' });
  });
});
