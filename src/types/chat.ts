export type ChatRole = 'user' | 'model';

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

// A rendered bubble. Error bubbles are display-only and never persisted.
export interface DisplayMessage extends ChatMessage {
  readonly isError?: boolean;
}

export type SessionView = 'video' | 'status' | 'chat';

export interface SessionState {
  readonly currentVideoId: string | null;
  readonly chatHistory: readonly ChatMessage[];
  readonly isProcessing: boolean;
}

export interface SessionSnapshot extends SessionState {
  readonly view: SessionView;
  readonly statusText: string;
  readonly error: string | null;
  readonly messages: readonly DisplayMessage[];
}

export interface ProcessVideoRequest {
  url: string;
}

export interface ProcessVideoResponse {
  video_id: string;
}

export interface ChatRequest {
  query: string;
  video_id: string;
  history: ChatMessage[];
}

export interface ChatResponse {
  response: string;
}
