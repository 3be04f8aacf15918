/**
 * Assistant Pipeline - Type Definitions
 *
 * Contracts of the collaborators the pipeline core drives. Concrete
 * implementations live under backends/ and client/.
 */

import type { ChatMessage, Conversation } from '../shared/types';
import type { AssistantResponse, AssistantResult } from '../shared/protocol';

// ============ Capture ============

/** Handle to a finished capture (a file path for the ffmpeg recorder) */
export type CaptureArtifact = string;

export interface CaptureService {
  /** Start capturing. Resolves false on permission or device failure, never rejects for those. */
  start(): Promise<boolean>;
  /** Finish capturing. Resolves the artifact, or null when nothing usable was recorded. */
  stop(): Promise<CaptureArtifact | null>;
  /** Abort capture and discard whatever was recorded. */
  cancel(): Promise<void>;
  /** Remove an artifact returned by `stop()` once it is no longer needed. */
  discard(artifact: CaptureArtifact): Promise<void>;
}

export interface PermissionService {
  hasMicrophonePermission(): boolean;
  requestMicrophonePermission(): Promise<boolean>;
}

// ============ Remote Service ============

export interface TranscriptionEndpoint {
  /** Rejects with EmptyTranscriptionError when the transcript is blank. */
  transcribe(artifact: CaptureArtifact, modelId: string): Promise<string>;
}

export interface AssistantEndpoint {
  /**
   * Resolves one AssistantResult; rejects only on transport failure.
   * Aborting `signal` releases the request and any open event stream.
   */
  query(text: string, modelId: string | undefined, signal?: AbortSignal): Promise<AssistantResult>;
}

// ============ Persistence ============

export interface ConversationStore {
  createConversation(title: string): Promise<Conversation>;
  getConversation(id: number): Promise<Conversation | null>;
  updateConversation(conversation: Conversation): Promise<void>;
  getMessages(conversationId: number): Promise<ChatMessage[]>;
  /** Persist a message and return its id */
  createMessage(message: ChatMessage): Promise<number>;
}

// ============ Peripheral ============

export interface CommandDispatcher {
  /** Single best-effort attempt; resolves false on any failure. */
  route(response: AssistantResponse): Promise<boolean>;
}

// ============ Speech ============

export interface SpeechSynthesizerCallbacks {
  onStart?: () => void;
  onComplete?: () => void;
  onError?: (error: Error) => void;
  onCancel?: () => void;
}

/**
 * Single-utterance synthesizer. `speak` starts playback and returns once the
 * request has been accepted; completion arrives through the callbacks.
 * After `stop()` the stopped utterance reports onCancel, never onComplete.
 */
export interface SpeechSynthesizer {
  setCallbacks(callbacks: SpeechSynthesizerCallbacks): void;
  speak(text: string): Promise<void>;
  stop(): void;
  readonly speaking: boolean;
}

// ============ Presentation ============

export interface NoticeOptions {
  durationMs?: number;
}

/** Short-lived user-visible notices (toasts) */
export interface Notifier {
  notify(message: string, options?: NoticeOptions): void;
}

/** Model and speech preferences read at the start of each run */
export interface Preferences {
  sttModel: string;
  lmModel: string;
  ttsEnabled: boolean;
}
