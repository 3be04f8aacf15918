/**
 * In-process stand-ins for the pipeline's collaborators
 */

import { vi } from 'vitest';
import type { AssistantResponse, AssistantResult, ServerEvent, ServerEventType } from '../../shared/protocol';
import type {
  AssistantEndpoint,
  CaptureArtifact,
  CaptureService,
  CommandDispatcher,
  NoticeOptions,
  Notifier,
  SpeechSynthesizer,
  SpeechSynthesizerCallbacks,
  TranscriptionEndpoint,
} from '../../src/types';

/** Let every pending promise continuation run */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

// ============ Speech ============

export class FakeSynthesizer implements SpeechSynthesizer {
  spoken: string[] = [];
  stopCount = 0;
  private callbacks: SpeechSynthesizerCallbacks = {};
  private active = false;

  get speaking(): boolean {
    return this.active;
  }

  setCallbacks(callbacks: SpeechSynthesizerCallbacks): void {
    this.callbacks = callbacks;
  }

  speak(text: string): Promise<void> {
    this.spoken.push(text);
    this.active = true;
    this.callbacks.onStart?.();
    return Promise.resolve();
  }

  stop(): void {
    this.stopCount++;
    if (!this.active) return;
    this.active = false;
    this.callbacks.onCancel?.();
  }

  /** Report the current utterance as finished */
  finish(): void {
    this.active = false;
    this.callbacks.onComplete?.();
  }

  fail(message = 'audio device busy'): void {
    this.active = false;
    this.callbacks.onError?.(new Error(message));
  }

  /** Finish utterances until nothing is being spoken */
  finishAll(limit = 50): void {
    for (let i = 0; i < limit && this.active; i++) {
      this.finish();
    }
  }
}

// ============ Notices ============

export class RecordingNotifier implements Notifier {
  notices: Array<{ message: string; options?: NoticeOptions }> = [];

  notify(message: string, options?: NoticeOptions): void {
    this.notices.push({ message, options });
  }

  get messages(): string[] {
    return this.notices.map((notice) => notice.message);
  }
}

// ============ Event Stream ============

/** Server event sequence fed by the test */
export class EventChannel implements AsyncIterable<ServerEvent> {
  released = false;
  private buffer: ServerEvent[] = [];
  private waiters: Array<(result: IteratorResult<ServerEvent>) => void> = [];
  private closed = false;

  push(type: ServerEventType, data: string): this {
    const event: ServerEvent = { type, data };
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
    } else {
      this.buffer.push(event);
    }
    return this;
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<ServerEvent> {
    return {
      next: () => {
        const event = this.buffer.shift();
        if (event) return Promise.resolve({ value: event, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise((resolve) => this.waiters.push(resolve));
      },
      return: () => {
        this.released = true;
        this.closed = true;
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}

export function streaming(events: AsyncIterable<ServerEvent>): AssistantResult {
  return { kind: 'streaming', events };
}

// ============ Endpoints ============

export class FakeCapture implements CaptureService {
  startResult = true;
  artifact: CaptureArtifact | null = '/tmp/recording-test.wav';
  start = vi.fn(async (): Promise<boolean> => this.startResult);
  stop = vi.fn(async (): Promise<CaptureArtifact | null> => this.artifact);
  cancel = vi.fn(async (): Promise<void> => undefined);
  discard = vi.fn(async (_artifact: CaptureArtifact): Promise<void> => undefined);
}

export class FakeTranscription implements TranscriptionEndpoint {
  transcript = 'hello there';
  transcribe = vi.fn(async (_artifact: CaptureArtifact, _modelId: string): Promise<string> => this.transcript);
}

export class FakeAssistant implements AssistantEndpoint {
  result: AssistantResult | Error = { kind: 'error', message: 'no result configured' };
  query = vi.fn(async (_text: string, _modelId: string | undefined, _signal?: AbortSignal): Promise<AssistantResult> => {
    if (this.result instanceof Error) throw this.result;
    return this.result;
  });
}

export class FakeDispatcher implements CommandDispatcher {
  sent = true;
  route = vi.fn(async (_response: AssistantResponse): Promise<boolean> => this.sent);
}
