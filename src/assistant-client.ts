/**
 * Assistant Client
 *
 * Composition root: builds the pipeline controller from configuration.
 * Every collaborator can be swapped, which is how the terminal front end
 * and the tests share one wiring.
 */

import type {
  CaptureService,
  CommandDispatcher,
  ConversationStore,
  NoticeOptions,
  Notifier,
  Preferences,
  SpeechSynthesizer,
  TranscriptionEndpoint,
  AssistantEndpoint,
} from './types';
import type { ClientConfig } from './config';
import { getConversationsFile, getRecordingsDir } from './cache';
import { PipelineController, type PipelineControllerCallbacks } from './pipeline-controller';
import { ProcessingStateManager } from './state/app-state';
import { AssistantApiClient } from './client/assistant-api';
import { FfmpegRecorder } from './backends/native/recorder';
import { CommandSpeechSynthesizer } from './backends/native/speech';
import { WebSocketCommandDispatcher } from './backends/device/websocket-dispatcher';
import { FileConversationStore } from './backends/stores/file-store';
import { SpeechChunkPlayer } from './services/speech-chunk-player';
import { TextNormalizer } from './services/text-normalizer';
import { AssistantLogger } from './services/assistant-logger';

/** Prints notices through the logger */
export class ConsoleNotifier implements Notifier {
  constructor(private logger: AssistantLogger) {}

  notify(message: string, _options?: NoticeOptions): void {
    this.logger.warn(`» ${message}`);
  }
}

export interface AssistantClientOverrides {
  capture?: CaptureService;
  transcription?: TranscriptionEndpoint;
  assistant?: AssistantEndpoint;
  store?: ConversationStore;
  dispatcher?: CommandDispatcher;
  synthesizer?: SpeechSynthesizer;
  notifier?: Notifier;
  logger?: AssistantLogger;
  callbacks?: PipelineControllerCallbacks;
}

export interface AssistantClient {
  controller: PipelineController;
  api: AssistantApiClient;
  speech: SpeechChunkPlayer;
  /** Mutable; read at the start of every run */
  preferences: Preferences;
  logger: AssistantLogger;
}

export function createAssistantClient(
  config: ClientConfig,
  overrides: AssistantClientOverrides = {}
): AssistantClient {
  const logger = overrides.logger ?? new AssistantLogger({ debug: config.debug });

  const preferences: Preferences = {
    sttModel: config.models.stt,
    lmModel: config.models.lm,
    ttsEnabled: config.speech.enabled,
  };

  const api = new AssistantApiClient({
    baseUrl: config.server.baseUrl,
    device: config.device,
    requestTimeoutMs: config.server.requestTimeoutMs,
    logger,
  });

  const synthesizer = overrides.synthesizer ?? new CommandSpeechSynthesizer({
    binary: config.speech.binary,
    rate: config.speech.rate,
    pitch: config.speech.pitch,
    volume: config.speech.volume,
  });

  const speech = new SpeechChunkPlayer(synthesizer, {
    isEnabled: () => preferences.ttsEnabled,
    normalizer: new TextNormalizer({ spellNumbers: config.speech.normalizeNumbers }),
    logger,
  });

  const controller = new PipelineController({
    capture: overrides.capture ?? new FfmpegRecorder({
      outputDir: getRecordingsDir(),
      inputFormat: config.capture.inputFormat,
      inputDevice: config.capture.inputDevice,
      sampleRate: config.capture.sampleRate,
      logger,
    }),
    transcription: overrides.transcription ?? api,
    assistant: overrides.assistant ?? api,
    store: overrides.store ?? new FileConversationStore(getConversationsFile()),
    dispatcher: overrides.dispatcher ?? new WebSocketCommandDispatcher({
      url: config.device.bridgeUrl,
      ackTimeoutMs: config.device.ackTimeoutMs,
      logger,
    }),
    speech,
    notifier: overrides.notifier ?? new ConsoleNotifier(logger),
    preferences: () => ({ ...preferences }),
    stateManager: new ProcessingStateManager(),
    logger,
    settings: {
      minRecordingDurationMs: config.capture.minRecordingDurationMs,
      chatTitleMaxLength: config.chatTitleMaxLength,
      shortNoticeMs: config.notices.shortDurationMs,
    },
    callbacks: overrides.callbacks,
  });

  return { controller, api, speech, preferences, logger };
}
