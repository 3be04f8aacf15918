/**
 * Shared domain types for the assistant client
 */

/** Role in a conversation */
export type MessageRole = 'system' | 'user' | 'assistant';

/** A single persisted (or about to be persisted) chat message */
export interface ChatMessage {
  id?: number;
  conversationId: number;
  role: MessageRole;
  content: string;
  timestamp: number;
  /** STT model selected when the message was produced */
  sttModel?: string;
  /** LM model selected when the message was produced */
  lmModel?: string;
}

/** A conversation thread */
export interface Conversation {
  id: number;
  title: string;
  createdAt: number;
  lastModified: number;
}

/** Processing state of the assistant pipeline */
export type ProcessingState =
  | 'idle'
  | 'recording'
  | 'uploading'
  | 'transcribing'
  | 'processing';

/** State labels for UI display */
export const STATE_LABELS: Record<ProcessingState, string> = {
  idle: 'Ready',
  recording: 'Recording...',
  uploading: 'Uploading...',
  transcribing: 'Transcribing...',
  processing: 'Thinking...',
};

export const DEFAULT_CONVERSATION_TITLE = 'New Chat';
