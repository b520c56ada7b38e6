import type {
  ChatRequest,
  ChatResponse,
  ProcessVideoRequest,
  ProcessVideoResponse,
} from '@/types/chat';

export type ApiErrorKind = 'network' | 'http' | 'malformed' | 'empty' | 'config';

export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly status?: number;

  constructor(kind: ApiErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'ApiError';
    this.kind = kind;
    this.status = status;
  }
}

export const PLACEHOLDER_API_BASE = 'YOUR_CLOUD_RUN_API_URL';

export const EMPTY_RESPONSE_MESSAGE =
  'Server returned an empty response. Check your API URL and Backend Logs.';

export function getApiBase() {
  // Example: https://video-chat-backend.example.com or /api for the built-in pass-through
  const base = process.env.NEXT_PUBLIC_API_BASE ?? '/api';
  return base.replace(/\/$/, '');
}

export function isConfiguredBase(base: string) {
  return base.trim().length > 0 && !base.includes(PLACEHOLDER_API_BASE);
}

export interface ApiClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
}

export interface ApiClient {
  readonly baseUrl: string;
  processVideo(url: string): Promise<ProcessVideoResponse>;
  chat(request: ChatRequest): Promise<ChatResponse>;
}

type ResponseBody = { kind: 'json'; data: unknown } | { kind: 'text'; text: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(data: unknown, key: string): string | undefined {
  if (!isRecord(data)) return undefined;
  const value = data[key];
  return typeof value === 'string' ? value : undefined;
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

function serverError(response: Response) {
  return `Server Error: ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`;
}

// JSON is only trusted when the server says so; anything else is kept as text
// so HTML error pages from proxies and load balancers can be surfaced.
async function readBody(response: Response): Promise<ResponseBody> {
  const contentType = response.headers.get('content-type');
  const text = await response.text();

  if (!contentType || !contentType.includes('application/json')) {
    return { kind: 'text', text };
  }
  if (!text.trim()) {
    throw new ApiError('empty', EMPTY_RESPONSE_MESSAGE, response.status);
  }
  try {
    return { kind: 'json', data: JSON.parse(text) };
  } catch {
    throw new ApiError('malformed', 'Invalid Server Response: body is not valid JSON.', response.status);
  }
}

export function createApiClient({ baseUrl, fetchImpl = fetch }: ApiClientOptions): ApiClient {
  const post = async (path: string, payload: unknown) => {
    try {
      return await fetchImpl(`${baseUrl}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      });
    } catch (error) {
      throw new ApiError('network', `Could not reach the server: ${errorMessage(error)}`);
    }
  };

  return {
    baseUrl,

    async processVideo(url) {
      const payload: ProcessVideoRequest = { url };
      const response = await post('/process-video', payload);
      const body = await readBody(response);

      if (body.kind === 'text') {
        if (!response.ok) {
          throw new ApiError('http', body.text || serverError(response), response.status);
        }
        throw new ApiError(
          'malformed',
          'Invalid Server Response: Expected JSON but got text/html.',
          response.status,
        );
      }

      if (!response.ok) {
        throw new ApiError(
          'http',
          readString(body.data, 'detail') || 'Failed to process video',
          response.status,
        );
      }

      const videoId = readString(body.data, 'video_id');
      if (!videoId) {
        throw new ApiError('malformed', 'Invalid Server Response: missing video_id.', response.status);
      }
      return { video_id: videoId };
    },

    async chat(request) {
      const response = await post('/chat', request);
      if (!response.ok) {
        throw new ApiError('http', `Failed to get response (${response.status})`, response.status);
      }

      const body = await readBody(response);
      const reply = body.kind === 'json' ? readString(body.data, 'response') : undefined;
      if (reply === undefined) {
        throw new ApiError('malformed', 'Invalid Server Response: missing response.', response.status);
      }
      return { response: reply };
    },
  };
}
