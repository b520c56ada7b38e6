import type { ChatMessage } from '@/types/chat';

export const VIDEO_ID_KEY = 'atyt_video_id';
export const HISTORY_KEY = 'atyt_history';

export type StorageLike = Pick<Storage, 'getItem' | 'setItem' | 'removeItem'>;

export interface PersistedSession {
  videoId: string;
  history: ChatMessage[];
}

function isChatMessage(value: unknown): value is ChatMessage {
  if (typeof value !== 'object' || value === null) return false;
  if (!('role' in value) || !('content' in value)) return false;
  return (value.role === 'user' || value.role === 'model') && typeof value.content === 'string';
}

export function parseHistory(raw: string | null): ChatMessage[] {
  if (!raw) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) return [];
    return parsed.filter(isChatMessage).map(({ role, content }) => ({ role, content }));
  } catch (e) {
    console.error('Failed to parse history', e);
    return [];
  }
}

/**
 * Session persistence over a Web Storage area. The storage is looked up on
 * every call so the store can be created during server rendering, where there
 * is no `window`; every operation is then a no-op.
 */
export class SessionStore {
  constructor(private readonly resolveStorage: () => StorageLike | undefined) {}

  load(): PersistedSession | null {
    try {
      const storage = this.resolveStorage();
      if (!storage) return null;

      const videoId = storage.getItem(VIDEO_ID_KEY);
      if (!videoId) return null;
      return { videoId, history: parseHistory(storage.getItem(HISTORY_KEY)) };
    } catch (e) {
      console.error('Failed to load session', e);
      return null;
    }
  }

  save(videoId: string | null, history: readonly ChatMessage[]) {
    try {
      const storage = this.resolveStorage();
      if (!storage) return;

      if (videoId === null) {
        storage.removeItem(VIDEO_ID_KEY);
      } else {
        storage.setItem(VIDEO_ID_KEY, videoId);
      }
      storage.setItem(HISTORY_KEY, JSON.stringify(history));
    } catch (e) {
      // Quota exceeded or storage disabled: the in-memory session still works.
      console.error('Failed to save session', e);
    }
  }

  clear() {
    try {
      const storage = this.resolveStorage();
      if (!storage) return;
      storage.removeItem(VIDEO_ID_KEY);
      storage.removeItem(HISTORY_KEY);
    } catch (e) {
      console.error('Failed to clear session', e);
    }
  }
}

// Blocked storage (privacy settings, sandboxed iframes) throws on access.
export function browserSessionStorage(): StorageLike | undefined {
  if (typeof window === 'undefined') return undefined;
  try {
    return window.sessionStorage;
  } catch (e) {
    console.error('Session storage is unavailable', e);
    return undefined;
  }
}
