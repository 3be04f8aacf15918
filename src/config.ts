/**
 * Client configuration
 * Centralized configuration with environment overrides
 */

export interface ServerSettings {
  baseUrl: string;
  /** Timeout for assistant and transcription requests */
  requestTimeoutMs: number;
}

export interface ModelSettings {
  stt: string;
  lm: string;
}

export interface SpeechSettings {
  enabled: boolean;
  /** Synthesizer executable (espeak-ng compatible flags) */
  binary: string;
  /** Words per minute passed to the synthesizer */
  rate: number;
  pitch: number;
  volume: number;
  /** Spell out numbers, currency and symbols before speaking */
  normalizeNumbers: boolean;
}

export interface CaptureSettings {
  /** ffmpeg input format, e.g. 'pulse', 'alsa', 'avfoundation' */
  inputFormat: string;
  inputDevice: string;
  sampleRate: number;
  minRecordingDurationMs: number;
}

export interface DeviceSettings {
  /** Identity sent in X-Device-* headers */
  id: string;
  name: string;
  model: string;
  mac?: string;
  /** WebSocket bridge that owns the peripheral link */
  bridgeUrl: string;
  ackTimeoutMs: number;
}

export interface NoticeSettings {
  /** Device command sent/failed notices */
  shortDurationMs: number;
}

export interface ClientConfig {
  server: ServerSettings;
  models: ModelSettings;
  speech: SpeechSettings;
  capture: CaptureSettings;
  device: DeviceSettings;
  notices: NoticeSettings;
  chatTitleMaxLength: number;
  debug: boolean;
}

function envString(name: string, fallback: string): string {
  const value = process.env[name];
  return value && value.trim() ? value.trim() : fallback;
}

function envNumber(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function envFlag(name: string, fallback: boolean): boolean {
  const value = process.env[name];
  if (value === undefined || value === '') return fallback;
  return value === '1' || value.toLowerCase() === 'true';
}

/** Build the configuration from defaults and the current environment */
export function resolveConfig(): ClientConfig {
  const mac = process.env.ASSISTANT_DEVICE_MAC?.trim();

  return {
    server: {
      baseUrl: envString('ASSISTANT_SERVER_URL', 'http://localhost:5000').replace(/\/+$/, ''),
      requestTimeoutMs: envNumber('ASSISTANT_REQUEST_TIMEOUT_MS', 60_000),
    },
    models: {
      stt: envString('ASSISTANT_STT_MODEL', 'small'),
      lm: envString('ASSISTANT_LM_MODEL', 'gemini-2.5-flash'),
    },
    speech: {
      enabled: envFlag('ASSISTANT_TTS_ENABLED', true),
      binary: envString('ASSISTANT_TTS_BINARY', 'espeak-ng'),
      rate: envNumber('ASSISTANT_TTS_RATE', 175),
      pitch: envNumber('ASSISTANT_TTS_PITCH', 50),
      volume: envNumber('ASSISTANT_TTS_VOLUME', 100),
      normalizeNumbers: envFlag('ASSISTANT_TTS_NORMALIZE', false),
    },
    capture: {
      inputFormat: envString('ASSISTANT_FFMPEG_FORMAT', 'pulse'),
      inputDevice: envString('ASSISTANT_FFMPEG_INPUT', 'default'),
      sampleRate: 16000,
      minRecordingDurationMs: 500,
    },
    device: {
      id: envString('ASSISTANT_DEVICE_ID', 'terminal-client'),
      name: envString('ASSISTANT_DEVICE_NAME', 'Terminal Client'),
      model: envString('ASSISTANT_DEVICE_MODEL', 'node'),
      mac: mac ? mac : undefined,
      bridgeUrl: envString('ASSISTANT_DEVICE_BRIDGE_URL', 'ws://localhost:8765'),
      ackTimeoutMs: 5000,
    },
    notices: {
      shortDurationMs: 1000,
    },
    chatTitleMaxLength: 30,
    debug: envFlag('ASSISTANT_DEBUG', false),
  };
}

export const config: ClientConfig = resolveConfig();
