/**
 * Assistant Service Client
 *
 * HTTP client for the remote inference service: transcription, assistant
 * requests (streamed text generation or structured device control) and a
 * health probe. Uses native fetch.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import {
  decodeAssistantResponse,
  type AssistantResult,
} from '../../shared/protocol';
import type { AssistantEndpoint, CaptureArtifact, TranscriptionEndpoint } from '../types';
import type { AssistantLogger } from '../services/assistant-logger';
import { EmptyTranscriptionError, TranscriptionRequestError } from '../errors';
import { parseServerEvents } from './sse';

export interface DeviceIdentity {
  id: string;
  name: string;
  model: string;
  mac?: string;
}

export interface AssistantApiConfig {
  baseUrl: string;
  device: DeviceIdentity;
  /** Applies until response headers arrive; an open stream is not cut off */
  requestTimeoutMs?: number;
  healthTimeoutMs?: number;
  fetch?: typeof fetch;
  logger?: AssistantLogger;
}

export const ENDPOINTS = {
  assistant: '/api/v1/assistant/handle',
  transcribe: '/stt/transcribe',
  health: '/health',
} as const;

const INVALID_RESPONSE_MESSAGE = 'Invalid response from server';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class AssistantApiClient implements AssistantEndpoint, TranscriptionEndpoint {
  private config: Required<Omit<AssistantApiConfig, 'logger'>>;
  private logger?: AssistantLogger;

  constructor(config: AssistantApiConfig) {
    this.config = {
      requestTimeoutMs: 60_000,
      healthTimeoutMs: 5_000,
      fetch: (input, init) => fetch(input, init),
      ...config,
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
    };
    this.logger = config.logger;
  }

  // ============ Assistant ============

  async query(text: string, modelId: string | undefined, signal?: AbortSignal): Promise<AssistantResult> {
    const body: Record<string, string> = { user_query: text };
    if (this.config.device.mac) body.source_device_mac = this.config.device.mac;
    if (modelId) body.lm_model = modelId;

    this.logger?.debug(`Assistant request: ${text.slice(0, 50)}`);

    const response = await this.request(ENDPOINTS.assistant, {
      method: 'POST',
      headers: { ...this.getHeaders(), 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    }, this.config.requestTimeoutMs, signal);

    if (response.status !== 200) {
      const detail = await response.text();
      this.logger?.error(`Assistant request failed (${response.status}): ${detail}`);
      return { kind: 'error', message: `Request failed: ${response.status}` };
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('text/event-stream')) {
      if (!response.body) {
        return { kind: 'error', message: 'No response body received' };
      }
      this.logger?.debug('Streaming response');
      return { kind: 'streaming', events: parseServerEvents(response.body) };
    }

    return this.decodeJsonResult(await response.text());
  }

  private decodeJsonResult(text: string): AssistantResult {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      this.logger?.error(`Assistant response is not JSON: ${text.slice(0, 200)}`);
      return { kind: 'error', message: INVALID_RESPONSE_MESSAGE };
    }

    if (!isRecord(json)) {
      return { kind: 'error', message: INVALID_RESPONSE_MESSAGE };
    }

    if (json.status === 'error') {
      const error = json.error;
      const message = isRecord(error) && typeof error.message === 'string' ? error.message : 'Unknown error';
      return { kind: 'error', message };
    }

    const response = decodeAssistantResponse(json.result);
    if (!response) {
      this.logger?.error(`Assistant response has an unexpected shape: ${text.slice(0, 200)}`);
      return { kind: 'error', message: INVALID_RESPONSE_MESSAGE };
    }
    return { kind: 'structured', response };
  }

  // ============ Transcription ============

  async transcribe(artifact: CaptureArtifact, modelId: string): Promise<string> {
    const audio = await readFile(artifact);

    const form = new FormData();
    form.append('audio', new Blob([new Uint8Array(audio)], { type: 'audio/wav' }), basename(artifact));
    form.append('stt_model_name', modelId);

    const response = await this.request(ENDPOINTS.transcribe, {
      method: 'POST',
      headers: this.getHeaders(),
      body: form,
    }, this.config.requestTimeoutMs);

    if (!response.ok) {
      const detail = await response.text();
      this.logger?.error(`Transcription failed (${response.status}): ${detail}`);
      throw new TranscriptionRequestError(`Request failed: ${response.status}`, response.status);
    }

    const json: unknown = await response.json();
    if (!isRecord(json) || json.status !== 'success') {
      const error = isRecord(json) ? json.error : undefined;
      const message = typeof error === 'string' ? error : 'Unexpected transcription response';
      throw new TranscriptionRequestError(message, response.status);
    }

    const transcription = typeof json.transcription === 'string' ? json.transcription.trim() : '';
    if (!transcription) {
      throw new EmptyTranscriptionError();
    }
    return transcription;
  }

  // ============ Health ============

  /** True when the server answers `{"status":"ok"}` */
  async checkHealth(): Promise<boolean> {
    try {
      const response = await this.request(ENDPOINTS.health, {
        method: 'GET',
        headers: this.getHeaders(),
      }, this.config.healthTimeoutMs);

      if (response.status !== 200) {
        this.logger?.warn(`Health check failed: ${response.status}`);
        return false;
      }
      const json: unknown = await response.json();
      return isRecord(json) && json.status === 'ok';
    } catch (error) {
      this.logger?.warn(`Cannot connect to server: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  // ============ Helpers ============

  getHeaders(): Record<string, string> {
    const { device } = this.config;
    const headers: Record<string, string> = {
      'X-Device-Id': device.id,
      'X-Device-Name': device.name,
      'X-Device-Model': device.model,
    };
    if (device.mac) headers['X-Device-MAC'] = device.mac;
    return headers;
  }

  /**
   * fetch with a timeout on the wait for response headers.
   * `signal` stays attached for the life of the body.
   */
  private async request(
    path: string,
    init: RequestInit,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<Response> {
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);

    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const timer = setTimeout(() => {
      controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    try {
      return await this.config.fetch(`${this.config.baseUrl}${path}`, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      signal?.removeEventListener('abort', onAbort);
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
