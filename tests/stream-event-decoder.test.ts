import { describe, it, expect } from 'vitest';
import {
  StreamEventDecoder,
  decodeChunk,
  decodeErrorMessage,
  decodeStatus,
  type StreamEventHandlers,
} from '../src/services/stream-event-decoder';
import { EventChannel } from './helpers/fakes';

function recordingHandlers(calls: string[], overrides: Partial<StreamEventHandlers> = {}): StreamEventHandlers {
  return {
    onTranscribing: () => { calls.push('transcribing'); },
    onGenerating: (transcript) => { calls.push(`generating:${transcript ?? '-'}`); },
    onChunk: (text) => { calls.push(`chunk:${text}`); },
    onError: (message) => { calls.push(`error:${message}`); },
    onDone: () => { calls.push('done'); },
    onUnknown: (event) => { calls.push(`unknown:${event.data}`); },
    ...overrides,
  };
}

describe('decodeStatus', () => {
  it('reads the JSON status shape', () => {
    expect(decodeStatus('{"status":"transcribing"}')).toEqual({ kind: 'transcribing' });
    expect(decodeStatus('{"status":"generating","transcription":"hello there"}'))
      .toEqual({ kind: 'generating', transcript: 'hello there' });
    expect(decodeStatus('{"status":"generating"}')).toEqual({ kind: 'generating' });
    expect(decodeStatus('{"status":"generating","transcription":null}')).toEqual({ kind: 'generating' });
  });

  it('ignores JSON statuses it does not know', () => {
    expect(decodeStatus('{"status":"queued"}')).toEqual({ kind: 'ignored', status: 'queued' });
  });

  it('falls back to the legacy text shape', () => {
    expect(decodeStatus('Transcription complete: hello there'))
      .toEqual({ kind: 'generating', transcript: 'hello there' });
    expect(decodeStatus('Transcribing audio...')).toEqual({ kind: 'transcribing' });
    expect(decodeStatus('Response generating')).toEqual({ kind: 'generating' });
  });

  it('decodes legacy and JSON transcripts identically', () => {
    expect(decodeStatus('Transcription complete: hello there'))
      .toEqual(decodeStatus('{"status":"generating","transcription":"hello there"}'));
  });

  it('treats a blank legacy transcript as none', () => {
    expect(decodeStatus('Transcription complete:   ')).toEqual({ kind: 'generating' });
  });

  it('reads JSON that is not a status object with the legacy rules', () => {
    expect(decodeStatus('"still generating"')).toEqual({ kind: 'generating' });
    expect(decodeStatus('[1,2]')).toEqual({ kind: 'ignored', status: '[1,2]' });
  });
});

describe('decodeChunk', () => {
  it('unwraps {chunk}', () => {
    expect(decodeChunk('{"chunk":"Hel"}')).toBe('Hel');
  });

  it('passes anything else through as text', () => {
    expect(decodeChunk('plain text')).toBe('plain text');
    expect(decodeChunk('{"other":1}')).toBe('{"other":1}');
    expect(decodeChunk('42')).toBe('42');
  });
});

describe('decodeErrorMessage', () => {
  it('finds the message in the known shapes', () => {
    expect(decodeErrorMessage('{"error":"model overloaded"}')).toBe('model overloaded');
    expect(decodeErrorMessage('{"error":{"code":"E1","message":"quota exceeded"}}')).toBe('quota exceeded');
    expect(decodeErrorMessage('{"message":"bad request"}')).toBe('bad request');
  });

  it('uses the raw payload otherwise', () => {
    expect(decodeErrorMessage('boom')).toBe('boom');
    expect(decodeErrorMessage('')).toBe('Unknown server error');
  });
});

describe('StreamEventDecoder.consume', () => {
  it('dispatches events in arrival order and stops at done', async () => {
    const channel = new EventChannel()
      .push('status', '{"status":"generating"}')
      .push('data', '{"chunk":"Hel"}')
      .push('data', 'lo')
      .push('unknown', 'ping')
      .push('done', '{}')
      .push('data', '{"chunk":"late"}');
    const calls: string[] = [];

    const outcome = await new StreamEventDecoder().consume(channel, recordingHandlers(calls));

    expect(outcome).toBe('done');
    expect(calls).toEqual(['generating:-', 'chunk:Hel', 'chunk:lo', 'unknown:ping', 'done']);
    expect(channel.released).toBe(true);
  });

  it('stops at an error event', async () => {
    const channel = new EventChannel()
      .push('data', '{"chunk":"Par"}')
      .push('error', '{"error":"model overloaded"}')
      .push('done', '{}');
    const calls: string[] = [];

    const outcome = await new StreamEventDecoder().consume(channel, recordingHandlers(calls));

    expect(outcome).toBe('error');
    expect(calls).toEqual(['chunk:Par', 'error:model overloaded']);
  });

  it('reports a sequence that closes without a terminal event', async () => {
    const channel = new EventChannel().push('data', 'Hi');
    channel.close();
    const calls: string[] = [];

    const outcome = await new StreamEventDecoder().consume(channel, recordingHandlers(calls));

    expect(outcome).toBe('ended');
    expect(calls).toEqual(['chunk:Hi']);
  });

  it('waits for each handler before reading the next event', async () => {
    const channel = new EventChannel()
      .push('status', 'Transcription complete: turn it on')
      .push('data', '{"chunk":"ok"}')
      .push('done', '{}');
    const calls: string[] = [];
    const handlers = recordingHandlers(calls, {
      onGenerating: async (transcript) => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        calls.push(`generating:${transcript ?? '-'}`);
      },
    });

    await new StreamEventDecoder().consume(channel, handlers);

    expect(calls).toEqual(['generating:turn it on', 'chunk:ok', 'done']);
  });

  it('stops after the handler that observed an abort', async () => {
    const controller = new AbortController();
    const channel = new EventChannel()
      .push('data', '{"chunk":"one"}')
      .push('data', '{"chunk":"two"}');
    const calls: string[] = [];
    const handlers = recordingHandlers(calls, {
      onChunk: (text) => {
        calls.push(`chunk:${text}`);
        controller.abort();
      },
    });

    const outcome = await new StreamEventDecoder().consume(channel, handlers, controller.signal);

    expect(outcome).toBe('aborted');
    expect(calls).toEqual(['chunk:one']);
    expect(channel.released).toBe(true);
  });

  it('does not read from an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const channel = new EventChannel().push('data', 'x');
    const calls: string[] = [];

    const outcome = await new StreamEventDecoder().consume(channel, recordingHandlers(calls), controller.signal);

    expect(outcome).toBe('aborted');
    expect(calls).toEqual([]);
  });
});
