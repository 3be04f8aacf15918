/**
 * Pipeline Controller
 * Orchestrator: capture → upload → transcription → assistant → speech/device
 *
 * Owns the processing state. Exactly one run is active at a time and a new
 * run may only begin from `idle`. Every await is followed by a check that the
 * run is still current, so a run that was stopped (or superseded) never
 * writes state, messages or notices after the fact.
 *
 * `stopProcessing()` is the only cancellation path. It releases the stream,
 * speech and capture synchronously, persists any partial reply, and always
 * leaves the pipeline idle.
 */

import type {
  AssistantEndpoint,
  CaptureArtifact,
  CaptureService,
  CommandDispatcher,
  ConversationStore,
  Notifier,
  PermissionService,
  Preferences,
  TranscriptionEndpoint,
} from './types';
import {
  DEFAULT_CONVERSATION_TITLE,
  type ChatMessage,
  type Conversation,
  type ProcessingState,
} from '../shared/types';
import { ProcessingStateManager, type StateChangeCallback } from './state/app-state';
import { SpeechChunkPlayer } from './services/speech-chunk-player';
import { StreamEventDecoder, type StreamEventHandlers } from './services/stream-event-decoder';
import { ResponseRouter } from './services/response-router';
import { AssistantLogger } from './services/assistant-logger';
import { EmptyTranscriptionError, TranscriptionRequestError, toError } from './errors';

// ============ Notices ============

export const NOTICES = {
  permissionRequired: 'Microphone permission is required to record audio',
  captureFailed: 'Failed to start recording',
  recordingTooShort: 'Recording too short',
  recordingFailed: 'Recording failed',
  serviceUnavailable: 'Assistant service unavailable. Please try again later.',
  processingStopped: 'Processing stopped',
} as const;

// ============ Types ============

/** Assistant reply under construction */
export interface PendingMessage {
  message: ChatMessage;
  /** Position of `message` in the controller's message list */
  index: number;
  content: string;
  conversationId: number;
}

export interface PipelineSettings {
  /** Captures shorter than this are discarded before upload */
  minRecordingDurationMs: number;
  chatTitleMaxLength: number;
  /** Duration of device-command notices */
  shortNoticeMs: number;
}

export interface PipelineControllerCallbacks {
  /** Message list changed (message added, chunk appended, message removed) */
  onMessagesChanged?: (messages: readonly ChatMessage[]) => void;
  /** A text fragment was appended to the pending reply */
  onResponseChunk?: (text: string) => void;
  onConversationTitled?: (title: string) => void;
  /** The conversation's last-modified marker moved after a completed reply */
  onConversationUpdated?: (conversation: Conversation) => void;
}

export interface PipelineControllerDeps {
  capture: CaptureService;
  permissions?: PermissionService;
  transcription: TranscriptionEndpoint;
  assistant: AssistantEndpoint;
  store: ConversationStore;
  dispatcher: CommandDispatcher;
  speech: SpeechChunkPlayer;
  notifier: Notifier;
  /** Read once at the start of every run */
  preferences: () => Preferences;
  stateManager?: ProcessingStateManager;
  decoder?: StreamEventDecoder;
  logger?: AssistantLogger;
  now?: () => number;
  settings?: Partial<PipelineSettings>;
  callbacks?: PipelineControllerCallbacks;
}

export interface InitializeOptions {
  /** Resume this conversation; a new one is created when absent or unknown */
  conversationId?: number;
}

interface Run {
  readonly id: number;
  readonly abort: AbortController;
  readonly preferences: Preferences;
  /** User text persisted for this run, used to skip an echoed transcript */
  userText: string | null;
}

const DEFAULT_SETTINGS: PipelineSettings = {
  minRecordingDurationMs: 500,
  chatTitleMaxLength: 30,
  shortNoticeMs: 1000,
};

// ============ Pipeline Controller ============

export class PipelineController {
  private capture: CaptureService;
  private permissions: PermissionService | null;
  private transcription: TranscriptionEndpoint;
  private assistant: AssistantEndpoint;
  private store: ConversationStore;
  private speech: SpeechChunkPlayer;
  private notifier: Notifier;
  private preferences: () => Preferences;
  private stateManager: ProcessingStateManager;
  private router: ResponseRouter;
  private logger: AssistantLogger;
  private now: () => number;
  private settings: PipelineSettings;
  private callbacks: PipelineControllerCallbacks;

  private conversation: Conversation | null = null;
  private messageList: ChatMessage[] = [];
  private pending: PendingMessage | null = null;

  private run: Run | null = null;
  private nextRunId = 1;
  private startingCapture = false;
  private captureActive = false;
  private recordingStartedAt: number | null = null;

  constructor(deps: PipelineControllerDeps) {
    this.capture = deps.capture;
    this.permissions = deps.permissions ?? null;
    this.transcription = deps.transcription;
    this.assistant = deps.assistant;
    this.store = deps.store;
    this.speech = deps.speech;
    this.notifier = deps.notifier;
    this.preferences = deps.preferences;
    this.stateManager = deps.stateManager ?? new ProcessingStateManager();
    this.logger = deps.logger ?? new AssistantLogger({ enabled: false });
    this.now = deps.now ?? Date.now;
    this.settings = { ...DEFAULT_SETTINGS, ...deps.settings };
    this.callbacks = deps.callbacks ?? {};
    this.router = new ResponseRouter({
      decoder: deps.decoder ?? new StreamEventDecoder(this.logger),
      dispatcher: deps.dispatcher,
      notifier: this.notifier,
      logger: this.logger,
      commandNoticeMs: this.settings.shortNoticeMs,
    });
  }

  // ============ Observation ============

  get state(): ProcessingState {
    return this.stateManager.getState();
  }

  get stateLabel(): string {
    return this.stateManager.getLabel();
  }

  onStateChange(callback: StateChangeCallback): () => void {
    return this.stateManager.subscribe(callback);
  }

  get messages(): readonly ChatMessage[] {
    return this.messageList;
  }

  get pendingMessage(): Readonly<PendingMessage> | null {
    return this.pending;
  }

  get currentConversation(): Conversation | null {
    return this.conversation;
  }

  // ============ Conversation ============

  /**
   * Load a conversation and its messages, or start a new one.
   * Only valid while idle.
   */
  async initialize(options: InitializeOptions = {}): Promise<Conversation> {
    let conversation: Conversation | null = null;
    if (options.conversationId !== undefined) {
      conversation = await this.store.getConversation(options.conversationId);
      if (!conversation) {
        this.logger.warn(`Conversation ${options.conversationId} not found, starting a new one`);
      }
    }

    if (conversation) {
      this.messageList = await this.store.getMessages(conversation.id);
    } else {
      conversation = await this.store.createConversation(DEFAULT_CONVERSATION_TITLE);
      this.messageList = [];
    }

    this.conversation = conversation;
    this.pending = null;
    this.emitMessages();
    return conversation;
  }

  // ============ Operations ============

  async startRecording(): Promise<void> {
    if (!this.stateManager.isIdle() || this.startingCapture) return;

    const run = this.beginRun();
    this.startingCapture = true;

    try {
      if (!(await this.ensurePermission())) {
        if (this.isCurrent(run)) {
          this.endRun();
          this.notifier.notify(NOTICES.permissionRequired);
        }
        return;
      }
      if (!this.isCurrent(run)) return;

      const started = await this.capture.start();

      if (!this.isCurrent(run)) {
        // Stopped while the device was opening
        if (started) await this.capture.cancel();
        return;
      }
      if (!started) {
        this.endRun();
        this.notifier.notify(NOTICES.captureFailed);
        return;
      }

      this.captureActive = true;
      this.recordingStartedAt = this.now();
      this.setState('recording');
    } catch (error) {
      this.failRun(run, error, NOTICES.captureFailed);
    } finally {
      this.startingCapture = false;
    }
  }

  async stopRecording(): Promise<void> {
    const run = this.run;
    if (!this.stateManager.is('recording') || !run) return;

    const startedAt = this.recordingStartedAt ?? this.now();
    const elapsed = this.now() - startedAt;
    this.recordingStartedAt = null;

    try {
      if (elapsed < this.settings.minRecordingDurationMs) {
        this.logger.debug(`Recording discarded after ${elapsed}ms`);
        this.captureActive = false;
        this.endRun();
        this.notifier.notify(NOTICES.recordingTooShort);
        await this.capture.cancel();
        return;
      }

      this.setState('uploading');
      const artifact = await this.capture.stop();
      this.captureActive = false;
      if (!this.isCurrent(run)) {
        // Stopped while the capture was being finalized
        if (artifact) await this.discardArtifact(artifact);
        return;
      }

      if (!artifact) {
        this.endRun();
        this.notifier.notify(NOTICES.recordingFailed);
        return;
      }

      await this.uploadAndProcess(artifact, run);
    } catch (error) {
      this.failRun(run, error, NOTICES.recordingFailed);
    }
  }

  async sendTextMessage(text: string): Promise<void> {
    const trimmed = text.trim();
    if (!trimmed || !this.stateManager.isIdle() || this.startingCapture) return;

    const run = this.beginRun();
    this.setState('processing');

    try {
      await this.persistUserMessage(trimmed);
      run.userText = trimmed;
      if (!this.isCurrent(run)) return;
      await this.processText(trimmed, run);
    } catch (error) {
      this.failRun(run, error, NOTICES.serviceUnavailable);
    }
  }

  /**
   * Cancel whatever is in flight and return to idle. Safe from any state;
   * a second call finds nothing left to stop.
   */
  async stopProcessing(): Promise<void> {
    const wasActive = this.run !== null || !this.stateManager.isIdle();
    const pending = this.takePending();
    const cancelCapture = this.captureActive;

    this.endRun();
    this.speech.forceStop();
    this.captureActive = false;
    this.recordingStartedAt = null;

    const cancelling = cancelCapture ? this.cancelCapture() : Promise.resolve();

    if (pending) {
      await this.finalizePending(pending);
      if (pending.content) await this.touchConversation();
    }
    await cancelling;

    if (wasActive) {
      this.logger.info(NOTICES.processingStopped);
      this.notifier.notify(NOTICES.processingStopped);
    }
  }

  // ============ Run Stages ============

  private async uploadAndProcess(artifact: CaptureArtifact, run: Run): Promise<void> {
    try {
      let transcript: string;
      try {
        transcript = await this.transcription.transcribe(artifact, run.preferences.sttModel);
      } finally {
        await this.discardArtifact(artifact);
      }
      if (!this.isCurrent(run)) return;

      const text = transcript.trim();
      if (!text) throw new EmptyTranscriptionError();

      this.setState('transcribing');
      await this.persistUserMessage(text, run.preferences);
      run.userText = text;
      if (!this.isCurrent(run)) return;

      await this.processText(text, run);
    } catch (error) {
      const notice = error instanceof EmptyTranscriptionError || error instanceof TranscriptionRequestError
        ? `Transcription failed: ${error.message}`
        : NOTICES.serviceUnavailable;
      this.failRun(run, error, notice);
    }
  }

  private async processText(text: string, run: Run): Promise<void> {
    this.setState('processing');
    this.logger.log({ type: 'user', content: text });

    try {
      const result = await this.assistant.query(text, run.preferences.lmModel, run.abort.signal);
      if (!this.isCurrent(run)) return;

      const handlers = this.createStreamHandlers(run);
      const routed = await this.router.route(result, {
        handlers,
        signal: run.abort.signal,
        finish: () => {
          if (this.isCurrent(run)) this.endRun();
        },
      });

      // Sequence closed without done or error
      if (routed.path === 'stream' && routed.outcome === 'ended' && this.isCurrent(run)) {
        this.logger.debug('Stream closed without a done event');
        await handlers.onDone();
      }
    } catch (error) {
      if (!this.isCurrent(run)) return;
      this.speech.forceStop();
      const pending = this.takePending();
      this.failRun(run, error, NOTICES.serviceUnavailable);
      if (pending) await this.finalizePending(pending);
    }
  }

  // ============ Stream Handling ============

  private createStreamHandlers(run: Run): StreamEventHandlers {
    return {
      onTranscribing: () => {
        if (this.isCurrent(run) && this.stateManager.is('uploading')) {
          this.setState('transcribing');
        }
      },

      onGenerating: async (transcript) => {
        if (!this.isCurrent(run)) return;
        this.logger.log({ type: 'stream_start', transcript });

        if (transcript && transcript !== run.userText) {
          await this.persistUserMessage(transcript, run.preferences);
          run.userText = transcript;
          if (!this.isCurrent(run)) return;
        }

        const previous = this.takePending();
        if (previous) await this.finalizePending(previous);
        if (!this.isCurrent(run)) return;

        this.setState('processing');
        this.speech.startStreamMode();
        this.beginPendingMessage(run);
      },

      onChunk: (text) => {
        if (!this.isCurrent(run)) return;
        this.logger.log({ type: 'chunk', text });

        const pending = this.pending ?? this.beginPendingMessage(run, true);
        pending.content += text;
        pending.message.content = pending.content;

        this.callbacks.onResponseChunk?.(text);
        this.emitMessages();
        this.speech.pushChunk(text);
      },

      onError: (message) => {
        if (!this.isCurrent(run)) return;
        this.logger.error(message);

        this.speech.forceStop();
        const pending = this.takePending();
        if (pending && !pending.content) {
          this.removeMessage(pending.message);
        }
        this.endRun();
        this.notifier.notify(message);
      },

      onDone: async () => {
        if (!this.isCurrent(run)) return;

        this.speech.endStreamMode();
        const pending = this.takePending();
        this.endRun();

        if (pending) {
          if (pending.content) this.logger.log({ type: 'response', content: pending.content });
          await this.finalizePending(pending);
        }
        await this.touchConversation();
      },

      onUnknown: (event) => {
        this.logger.warn(`Ignoring unknown stream event (${event.type})`);
      },
    };
  }

  private beginPendingMessage(run: Run, implicit = false): PendingMessage {
    if (implicit) {
      // Chunks without a preceding generating status still get spoken
      this.speech.startStreamMode();
    }

    const conversationId = this.requireConversation().id;
    const message: ChatMessage = {
      conversationId,
      role: 'assistant',
      content: '',
      timestamp: this.now(),
      sttModel: run.preferences.sttModel,
      lmModel: run.preferences.lmModel,
    };

    this.messageList.push(message);
    this.pending = {
      message,
      index: this.messageList.length - 1,
      content: '',
      conversationId,
    };
    this.emitMessages();
    return this.pending;
  }

  /** Detach the pending handle so no other path can persist it */
  private takePending(): PendingMessage | null {
    const pending = this.pending;
    this.pending = null;
    return pending;
  }

  /** Persist non-empty content, drop an empty placeholder */
  private async finalizePending(pending: PendingMessage): Promise<void> {
    if (!pending.content) {
      this.removeMessage(pending.message);
      return;
    }

    pending.message.content = pending.content;
    await this.persistMessage(pending.message);
  }

  // ============ Persistence ============

  private async persistUserMessage(text: string, preferences?: Preferences): Promise<void> {
    const conversation = this.requireConversation();
    const isFirstMessage = this.messageList.length === 0;

    const message: ChatMessage = {
      conversationId: conversation.id,
      role: 'user',
      content: text,
      timestamp: this.now(),
      sttModel: preferences?.sttModel,
    };
    this.messageList.push(message);
    this.emitMessages();

    await this.persistMessage(message);

    if (isFirstMessage) {
      await this.retitle(conversation, text);
    }
  }

  private async persistMessage(message: ChatMessage): Promise<void> {
    try {
      message.id = await this.store.createMessage(message);
    } catch (error) {
      this.logger.error(`Failed to save message: ${toError(error).message}`);
    }
  }

  private async retitle(conversation: Conversation, text: string): Promise<void> {
    const title = makeChatTitle(text, this.settings.chatTitleMaxLength);
    conversation.title = title;
    try {
      await this.store.updateConversation(conversation);
      this.callbacks.onConversationTitled?.(title);
    } catch (error) {
      this.logger.error(`Failed to rename conversation: ${toError(error).message}`);
    }
  }

  private async touchConversation(): Promise<void> {
    const conversation = this.conversation;
    if (!conversation) return;

    conversation.lastModified = this.now();
    try {
      await this.store.updateConversation(conversation);
      this.callbacks.onConversationUpdated?.(conversation);
    } catch (error) {
      this.logger.error(`Failed to update conversation: ${toError(error).message}`);
    }
  }

  private requireConversation(): Conversation {
    if (!this.conversation) {
      throw new Error('PipelineController.initialize() must be called first');
    }
    return this.conversation;
  }

  // ============ Run Bookkeeping ============

  private beginRun(): Run {
    const run: Run = {
      id: this.nextRunId++,
      abort: new AbortController(),
      preferences: this.preferences(),
      userText: null,
    };
    this.run = run;
    return run;
  }

  private isCurrent(run: Run): boolean {
    return this.run === run;
  }

  /** Release the active run's stream and return to idle */
  private endRun(): void {
    const run = this.run;
    this.run = null;
    run?.abort.abort();
    this.setState('idle');
  }

  private failRun(run: Run, error: unknown, notice: string): void {
    if (!this.isCurrent(run)) return;

    this.logger.error(toError(error).message);
    this.speech.forceStop();
    if (this.captureActive) {
      this.captureActive = false;
      void this.cancelCapture();
    }
    this.recordingStartedAt = null;
    this.endRun();
    this.notifier.notify(notice);
  }

  private async ensurePermission(): Promise<boolean> {
    if (!this.permissions) return true;
    if (this.permissions.hasMicrophonePermission()) return true;
    return this.permissions.requestMicrophonePermission();
  }

  private async cancelCapture(): Promise<void> {
    try {
      await this.capture.cancel();
    } catch (error) {
      this.logger.warn(`Failed to cancel capture: ${toError(error).message}`);
    }
  }

  private async discardArtifact(artifact: CaptureArtifact): Promise<void> {
    try {
      await this.capture.discard(artifact);
    } catch (error) {
      this.logger.warn(`Failed to remove recording: ${toError(error).message}`);
    }
  }

  private setState(next: ProcessingState): void {
    const previous = this.stateManager.getState();
    if (previous === next) return;
    this.stateManager.setState(next);
    this.logger.log({ type: 'state', from: previous, to: next });
  }

  private removeMessage(message: ChatMessage): void {
    const index = this.messageList.indexOf(message);
    if (index !== -1) {
      this.messageList.splice(index, 1);
      this.emitMessages();
    }
  }

  private emitMessages(): void {
    this.callbacks.onMessagesChanged?.(this.messageList);
  }
}

/** Title derived from the first user message */
export function makeChatTitle(text: string, maxLength = 30): string {
  const trimmed = text.trim();
  return trimmed.length > maxLength ? `${trimmed.slice(0, maxLength)}...` : trimmed;
}
