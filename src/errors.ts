/**
 * Domain errors raised by the remote-service clients.
 */

/** The transcription endpoint answered, but with blank text */
export class EmptyTranscriptionError extends Error {
  constructor(message = 'Empty transcription received') {
    super(message);
    this.name = 'EmptyTranscriptionError';
  }
}

/** The transcription endpoint rejected the upload or returned an unusable body */
export class TranscriptionRequestError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'TranscriptionRequestError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
