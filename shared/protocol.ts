/**
 * Assistant Service Protocol
 *
 * Wire shapes exchanged with the remote assistant service and the
 * decoders that turn them into internal types.
 */

// ============ Server Events ============

export type ServerEventType = 'status' | 'data' | 'error' | 'done' | 'unknown';

/** One item of the server-streamed event sequence. `data` is the raw payload. */
export interface ServerEvent {
  readonly type: ServerEventType;
  readonly data: string;
}

/** JSON status payload: `{"status":"generating","transcription":"..."}` */
export interface StatusPayload {
  status: string;
  transcription?: string;
}

/** JSON data payload: `{"chunk":"..."}` */
export interface ChunkPayload {
  chunk: string;
}

// ============ Structured (device-control) Response ============

export interface AssistantOutput {
  generatedOutput: string;
}

export interface AssistantError {
  code: string;
  message: string;
}

export interface AssistantResponse {
  task: string;
  userData: string;
  processingDevice: string;
  sourceDevice: string;
  targetDevice: string;
  parentDevice?: string;
  outputFormat?: string[];
  output: AssistantOutput;
  error?: AssistantError;
}

export const TASK_TEXT_GENERATION = 'text-generation';
export const TASK_DEVICE_CONTROL = 'bt-control';

export function isDeviceControl(response: AssistantResponse): boolean {
  return response.task === TASK_DEVICE_CONTROL;
}

export function isTextGeneration(response: AssistantResponse): boolean {
  return response.task === TASK_TEXT_GENERATION;
}

export function hasError(response: AssistantResponse): response is AssistantResponse & { error: AssistantError } {
  return response.error !== undefined;
}

// ============ Assistant Result ============

export interface StreamingResult {
  kind: 'streaming';
  events: AsyncIterable<ServerEvent>;
}

export interface StructuredResult {
  kind: 'structured';
  response: AssistantResponse;
}

export interface ErrorResult {
  kind: 'error';
  message: string;
}

export type AssistantResult = StreamingResult | StructuredResult | ErrorResult;

// ============ Type Guards ============

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/** Parse JSON, returning undefined instead of throwing */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function isStatusPayload(value: unknown): value is StatusPayload {
  if (!isRecord(value) || typeof value.status !== 'string') return false;
  return value.transcription === undefined
    || value.transcription === null
    || typeof value.transcription === 'string';
}

export function isChunkPayload(value: unknown): value is ChunkPayload {
  return isRecord(value) && typeof value.chunk === 'string';
}

/**
 * Decode the wire form (kebab-case keys) of a structured response.
 * Returns null when a required field is missing or has the wrong type.
 */
export function decodeAssistantResponse(value: unknown): AssistantResponse | null {
  if (!isRecord(value)) return null;

  const task = value['task'];
  const userData = value['user-data'];
  const processingDevice = value['processing-device'];
  const sourceDevice = value['source-device'];
  const targetDevice = value['target-device'];
  const output = value['output'];

  if (
    typeof task !== 'string' ||
    typeof sourceDevice !== 'string' ||
    typeof targetDevice !== 'string' ||
    !isRecord(output) ||
    typeof output['generated_output'] !== 'string'
  ) {
    return null;
  }

  const response: AssistantResponse = {
    task,
    userData: optionalString(userData) ?? '',
    processingDevice: optionalString(processingDevice) ?? '',
    sourceDevice,
    targetDevice,
    output: { generatedOutput: output['generated_output'] },
  };

  const parentDevice = optionalString(value['parent-device']);
  if (parentDevice !== undefined) {
    response.parentDevice = parentDevice;
  }

  const outputFormat = value['output-format'];
  if (Array.isArray(outputFormat)) {
    response.outputFormat = outputFormat.filter((item): item is string => typeof item === 'string');
  }

  const error = value['error'];
  if (isRecord(error)) {
    response.error = {
      code: optionalString(error['code']) ?? 'UNKNOWN',
      message: optionalString(error['message']) ?? 'Unknown error',
    };
  }

  return response;
}
