import { vi } from 'vitest';
import type { StorageLike } from '@/lib/sessionStore';

export class MemoryStorage implements StorageLike {
  private readonly items = new Map<string, string>();

  getItem(key: string) {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string) {
    this.items.set(key, value);
  }

  removeItem(key: string) {
    this.items.delete(key);
  }

  get size() {
    return this.items.size;
  }
}

export function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status: number) {
  return new Response(body, { status, headers: { 'Content-Type': 'text/html' } });
}

export function createFetchMock() {
  return vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit): Promise<Response> => jsonResponse({}));
}

export type FetchMock = ReturnType<typeof createFetchMock>;

export function requestBody(fetchMock: FetchMock, call: number): unknown {
  const init = fetchMock.mock.calls[call]?.[1];
  return JSON.parse(String(init?.body));
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
