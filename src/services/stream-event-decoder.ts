/**
 * Stream Event Decoder
 *
 * Consumes the server's event sequence and turns each event into a handler
 * call. Status, data and error payloads come in two encodings: the current
 * JSON shape and the older plain-text one. JSON is tried first; whatever does
 * not decode as JSON is read with the legacy rules.
 */

import {
  isChunkPayload,
  isStatusPayload,
  tryParseJson,
  type ServerEvent,
} from '../../shared/protocol';
import type { AssistantLogger } from './assistant-logger';

// ============ Decoded Shapes ============

export type StatusSignal =
  | { kind: 'transcribing' }
  | { kind: 'generating'; transcript?: string }
  | { kind: 'ignored'; status: string };

export type StreamOutcome = 'done' | 'error' | 'ended' | 'aborted';

/**
 * Callbacks invoked in event-arrival order. Each is awaited before the next
 * event is read.
 */
export interface StreamEventHandlers {
  onTranscribing(): void | Promise<void>;
  onGenerating(transcript: string | undefined): void | Promise<void>;
  onChunk(text: string): void | Promise<void>;
  onError(message: string): void | Promise<void>;
  onDone(): void | Promise<void>;
  onUnknown?(event: ServerEvent): void;
}

const LEGACY_TRANSCRIPT_PREFIX = 'Transcription complete:';
const LEGACY_TRANSCRIBING = 'Transcribing';
const LEGACY_GENERATING = 'generating';

function nonBlank(text: string | null | undefined): string | undefined {
  const trimmed = text?.trim();
  return trimmed ? trimmed : undefined;
}

// ============ Payload Decoding ============

export function decodeStatus(payload: string): StatusSignal {
  const parsed = tryParseJson(payload);

  if (isStatusPayload(parsed)) {
    switch (parsed.status) {
      case 'transcribing':
        return { kind: 'transcribing' };
      case 'generating':
        return { kind: 'generating', transcript: nonBlank(parsed.transcription) };
      default:
        return { kind: 'ignored', status: parsed.status };
    }
  }

  return decodeLegacyStatus(payload);
}

function decodeLegacyStatus(payload: string): StatusSignal {
  if (payload.startsWith(LEGACY_TRANSCRIPT_PREFIX)) {
    return {
      kind: 'generating',
      transcript: nonBlank(payload.slice(LEGACY_TRANSCRIPT_PREFIX.length)),
    };
  }
  if (payload.includes(LEGACY_TRANSCRIBING)) {
    return { kind: 'transcribing' };
  }
  if (payload.includes(LEGACY_GENERATING)) {
    return { kind: 'generating' };
  }
  return { kind: 'ignored', status: payload };
}

/** `{"chunk": "..."}`, or the raw payload when it is anything else */
export function decodeChunk(payload: string): string {
  const parsed = tryParseJson(payload);
  return isChunkPayload(parsed) ? parsed.chunk : payload;
}

export function decodeErrorMessage(payload: string): string {
  const parsed = tryParseJson(payload);

  if (typeof parsed === 'object' && parsed !== null) {
    const error = 'error' in parsed ? parsed.error : undefined;
    if (typeof error === 'string' && error.trim()) return error;
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
    const message = 'message' in parsed ? parsed.message : undefined;
    if (typeof message === 'string' && message.trim()) return message;
  }

  return nonBlank(payload) ?? 'Unknown server error';
}

// ============ Stream Consumption ============

export class StreamEventDecoder {
  constructor(private logger?: AssistantLogger) {}

  /**
   * Read events until `done`, `error`, the end of the sequence, or abort.
   * Breaking out of the loop releases the underlying iterator.
   */
  async consume(
    events: AsyncIterable<ServerEvent>,
    handlers: StreamEventHandlers,
    signal?: AbortSignal
  ): Promise<StreamOutcome> {
    if (signal?.aborted) return 'aborted';

    for await (const event of events) {
      if (signal?.aborted) return 'aborted';

      switch (event.type) {
        case 'status':
          await this.handleStatus(event.data, handlers);
          break;

        case 'data':
          await handlers.onChunk(decodeChunk(event.data));
          break;

        case 'error':
          await handlers.onError(decodeErrorMessage(event.data));
          return 'error';

        case 'done':
          await handlers.onDone();
          return 'done';

        default:
          this.logger?.debug(`Unknown stream event: ${event.data}`);
          handlers.onUnknown?.(event);
          break;
      }

      if (signal?.aborted) return 'aborted';
    }

    return 'ended';
  }

  private async handleStatus(payload: string, handlers: StreamEventHandlers): Promise<void> {
    const signal = decodeStatus(payload);

    switch (signal.kind) {
      case 'transcribing':
        await handlers.onTranscribing();
        break;
      case 'generating':
        await handlers.onGenerating(signal.transcript);
        break;
      case 'ignored':
        this.logger?.debug(`Ignored status: ${signal.status}`);
        break;
    }
  }
}
