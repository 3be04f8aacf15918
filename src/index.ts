/**
 * Assistant Pipeline Library
 * Capture → transcription → streamed generation → speech, with device-control routing
 */

// Main orchestrator
export { PipelineController, NOTICES, makeChatTitle } from './pipeline-controller';
export type {
  PendingMessage,
  PipelineSettings,
  PipelineControllerCallbacks,
  PipelineControllerDeps,
  InitializeOptions,
} from './pipeline-controller';
export { createAssistantClient, ConsoleNotifier } from './assistant-client';
export type { AssistantClient, AssistantClientOverrides } from './assistant-client';

// Types
export type * from './types';
export * from '../shared/types';
export * from '../shared/protocol';
export { EmptyTranscriptionError, TranscriptionRequestError } from './errors';

// State
export { ProcessingStateManager } from './state/app-state';
export type { StateChangeCallback } from './state/app-state';

// Services
export * from './services';

// Clients and backends
export { AssistantApiClient, ENDPOINTS } from './client/assistant-api';
export type { AssistantApiConfig, DeviceIdentity } from './client/assistant-api';
export { parseServerEvents } from './client/sse';
export { FfmpegRecorder } from './backends/native/recorder';
export { CommandSpeechSynthesizer } from './backends/native/speech';
export { WebSocketCommandDispatcher, extractMacAddress, prepareDeviceCommand } from './backends/device/websocket-dispatcher';
export { InMemoryConversationStore } from './backends/stores/memory-store';
export { FileConversationStore } from './backends/stores/file-store';

// Configuration
export { config, resolveConfig } from './config';
export type { ClientConfig } from './config';
export { getDataDir, getRecordingsDir, getConversationsFile } from './cache';
