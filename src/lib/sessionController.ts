import {
  PLACEHOLDER_API_BASE,
  createApiClient,
  errorMessage,
  getApiBase,
  isConfiguredBase,
  type ApiClient,
} from '@/lib/api';
import { SessionStore, browserSessionStorage } from '@/lib/sessionStore';
import type { ChatMessage, DisplayMessage, SessionSnapshot } from '@/types/chat';

export const EMPTY_URL_MESSAGE = 'Please enter a YouTube URL';
export const CONFIG_ERROR_MESSAGE = `Configuration Error: set NEXT_PUBLIC_API_BASE to your backend URL instead of '${PLACEHOLDER_API_BASE}'.`;
export const ANALYZING_STATUS = 'Analyzing transcript (this may take a moment for long videos)...';
export const CHAT_ERROR_MESSAGE = "**Error:** I couldn't reach the server. Please try again.";

export const INITIAL_SNAPSHOT: SessionSnapshot = {
  currentVideoId: null,
  chatHistory: [],
  isProcessing: false,
  view: 'video',
  statusText: '',
  error: null,
  messages: [],
};

type Listener = () => void;

export interface SessionControllerOptions {
  api: ApiClient;
  store: SessionStore;
}

/**
 * Owns the chat session for one video: the persisted state (video id and
 * history), the in-flight flag, and the view the page should show.
 *
 * Every mutation replaces the snapshot, so `getSnapshot`/`subscribe` can be
 * handed straight to `useSyncExternalStore`.
 */
export class SessionController {
  private readonly api: ApiClient;
  private readonly store: SessionStore;
  private readonly listeners = new Set<Listener>();
  private snapshot: SessionSnapshot = INITIAL_SNAPSHOT;
  // Bumped by resetSession so replies to an abandoned session are dropped.
  private generation = 0;

  constructor({ api, store }: SessionControllerOptions) {
    this.api = api;
    this.store = store;
  }

  getSnapshot = (): SessionSnapshot => this.snapshot;

  subscribe = (listener: Listener) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  restoreSession() {
    const saved = this.store.load();
    if (!saved) return;

    // Rendering replaces the transcript, so a second restore shows it once.
    this.commit({
      currentVideoId: saved.videoId,
      chatHistory: saved.history,
      messages: saved.history,
      view: 'chat',
    });
  }

  async processVideo(rawUrl: string) {
    const url = rawUrl.trim();
    if (this.snapshot.isProcessing) return;

    if (!url) {
      this.commit({ error: EMPTY_URL_MESSAGE });
      return;
    }
    if (!isConfiguredBase(this.api.baseUrl)) {
      this.commit({ error: CONFIG_ERROR_MESSAGE });
      return;
    }

    const generation = this.generation;
    this.commit({ isProcessing: true, view: 'status', statusText: ANALYZING_STATUS, error: null });

    try {
      const { video_id: videoId } = await this.api.processVideo(url);
      if (generation !== this.generation) return;

      const sameVideo = videoId === this.snapshot.currentVideoId;
      this.commit({
        currentVideoId: videoId,
        chatHistory: sameVideo ? this.snapshot.chatHistory : [],
        messages: sameVideo ? this.snapshot.messages : [],
        isProcessing: false,
        view: 'chat',
      });
      this.persist();
    } catch (error) {
      console.error('Processing Error:', error);
      if (generation !== this.generation) return;
      this.commit({ isProcessing: false, view: 'video', error: errorMessage(error) });
    }
  }

  async sendMessage(rawQuery: string) {
    const query = rawQuery.trim();
    const { currentVideoId, isProcessing, chatHistory } = this.snapshot;
    if (!query || isProcessing || currentVideoId === null) return;

    const userMessage: ChatMessage = { role: 'user', content: query };
    const generation = this.generation;
    this.commit({
      chatHistory: [...chatHistory, userMessage],
      messages: [...this.snapshot.messages, userMessage],
      isProcessing: true,
    });
    this.persist();

    try {
      const { response } = await this.api.chat({
        query,
        video_id: currentVideoId,
        history: [...chatHistory],
      });
      if (generation !== this.generation) return;

      const modelMessage: ChatMessage = { role: 'model', content: response };
      this.commit({
        chatHistory: [...this.snapshot.chatHistory, modelMessage],
        messages: [...this.snapshot.messages, modelMessage],
        isProcessing: false,
      });
      this.persist();
    } catch (error) {
      console.error('Chat Error:', error);
      if (generation !== this.generation) return;

      // The user's message stays in history; the error bubble is display-only.
      const errorBubble: DisplayMessage = { role: 'model', content: CHAT_ERROR_MESSAGE, isError: true };
      this.commit({ messages: [...this.snapshot.messages, errorBubble], isProcessing: false });
    }
  }

  resetSession() {
    this.store.clear();
    this.generation += 1;
    this.commit(INITIAL_SNAPSHOT);
  }

  dismissError() {
    if (this.snapshot.error === null) return;
    this.commit({ error: null });
  }

  private persist() {
    this.store.save(this.snapshot.currentVideoId, this.snapshot.chatHistory);
  }

  private commit(patch: Partial<SessionSnapshot>) {
    this.snapshot = { ...this.snapshot, ...patch };
    this.listeners.forEach((listener) => listener());
  }
}

export function createSessionController(baseUrl: string = getApiBase()) {
  return new SessionController({
    api: createApiClient({ baseUrl }),
    store: new SessionStore(browserSessionStorage),
  });
}
