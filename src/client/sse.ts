/**
 * Server-Sent Events parsing for the assistant stream
 *
 * Wire format (one event per block):
 *   event: status
 *   data: {"status":"generating","transcription":"..."}
 *
 *   data: {"chunk":"Hel"}
 *
 *   event: done
 *   data: {}
 */

import { tryParseJson, type ServerEvent, type ServerEventType } from '../../shared/protocol';

function toEventType(name: string | null): ServerEventType {
  switch (name) {
    case 'status':
    case 'error':
    case 'done':
      return name;
    case null:
    case 'data':
    case 'message':
      return 'data';
    default:
      return 'unknown';
  }
}

/**
 * Turn one `data:` line into an event.
 * status/done keep the full payload; chunk and error JSON are reduced to their text.
 */
export function toServerEvent(eventName: string | null, payload: string): ServerEvent {
  const type = toEventType(eventName);
  if (type !== 'data') return { type, data: payload };

  const parsed = tryParseJson(payload);
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    if ('chunk' in parsed && typeof parsed.chunk === 'string') {
      return { type: 'data', data: parsed.chunk };
    }
    if ('error' in parsed) {
      const error = parsed.error;
      return { type: 'error', data: typeof error === 'string' ? error : JSON.stringify(error) };
    }
  }

  return { type, data: payload };
}

/**
 * Parse an SSE body into server events. Ends after `done` or `error`.
 * Leaving before the body is drained (terminal event, or the consumer
 * breaking out of its loop) cancels the body.
 */
export async function* parseServerEvents(body: ReadableStream<Uint8Array>): AsyncGenerator<ServerEvent> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let eventName: string | null = null;
  let drained = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        buffer += decoder.decode();
      } else {
        buffer += decoder.decode(value, { stream: true });
      }

      // Process complete lines, keep the incomplete tail in the buffer
      const lines = buffer.split('\n');
      buffer = done ? '' : lines.pop() ?? '';

      for (const rawLine of lines) {
        const line = rawLine.trim();

        if (!line) {
          eventName = null;
          continue;
        }
        if (line.startsWith(':')) continue;

        if (line.startsWith('event:')) {
          eventName = line.slice(6).trim();
        } else if (line.startsWith('data:')) {
          const event = toServerEvent(eventName, line.slice(5).trim());
          yield event;

          if (event.type === 'done' || event.type === 'error') return;
        }
      }

      if (done) {
        drained = true;
        return;
      }
    }
  } finally {
    if (!drained) {
      try {
        await reader.cancel();
      } catch {
        // Body already errored (request aborted)
      }
    }
    reader.releaseLock();
  }
}
