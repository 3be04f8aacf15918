export { SpeechChunkPlayer } from './speech-chunk-player';
export type { SpeechChunkPlayerOptions } from './speech-chunk-player';
export { StreamEventDecoder, decodeStatus, decodeChunk, decodeErrorMessage } from './stream-event-decoder';
export type { StatusSignal, StreamOutcome, StreamEventHandlers } from './stream-event-decoder';
export { ResponseRouter, UNEXPECTED_RESPONSE_MESSAGE, COMMAND_FAILED_MESSAGE } from './response-router';
export type { RouteOutcome, RouteContext, ResponseRouterOptions } from './response-router';
export { TextNormalizer } from './text-normalizer';
export type { TextNormalizerOptions } from './text-normalizer';
export { AssistantLogger } from './assistant-logger';
export type { AssistantLogEvent, AssistantLoggerOptions } from './assistant-logger';
