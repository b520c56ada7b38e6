import { HttpsProxyAgent } from 'https-proxy-agent';
import fetch, { type RequestInit } from 'node-fetch';
import { errorMessage } from '@/lib/api';

export type BackendPath = '/process-video' | '/chat';

export interface ForwardResult {
  status: number;
  body: string;
  contentType: string;
}

export interface BackendEnv {
  BACKEND_URL?: string;
  HTTPS_PROXY?: string;
}

function jsonResult(status: number, detail: string): ForwardResult {
  return { status, body: JSON.stringify({ detail }), contentType: 'application/json' };
}

/**
 * Relays a JSON POST to the RAG backend and hands back its answer untouched,
 * so the browser sees the same status codes and error bodies it would get
 * calling the backend directly.
 */
export async function forwardToBackend(
  path: BackendPath,
  body: string,
  env: BackendEnv = process.env,
): Promise<ForwardResult> {
  const backendUrl = env.BACKEND_URL?.replace(/\/$/, '');
  if (!backendUrl) {
    console.error('BACKEND_URL is missing');
    return jsonResult(500, 'BACKEND_URL is not defined in environment variables');
  }

  const options: RequestInit = {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  };
  if (env.HTTPS_PROXY) {
    options.agent = new HttpsProxyAgent(env.HTTPS_PROXY);
  }

  console.log(`Forwarding ${path} to ${backendUrl}`);
  try {
    const response = await fetch(`${backendUrl}${path}`, options);
    const text = await response.text();
    if (!response.ok) {
      console.warn(`Backend ${path} failed with status ${response.status}: ${text}`);
    }
    return {
      status: response.status,
      body: text,
      contentType: response.headers.get('content-type') ?? 'text/plain',
    };
  } catch (e) {
    console.error(`Backend ${path} network error:`, e);
    return jsonResult(502, `Backend unreachable: ${errorMessage(e)}`);
  }
}
