export type ErrorKind =
  | 'missing_credential'
  | 'invalid_configuration'
  | 'transcription_failed'
  | 'translation_failed'
  | 'invalid_request'
  | 'session_busy'
  | 'session_not_found';

/**
 * Base class for every error the backend reports to a caller
 */
export class AppError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.kind = kind;
  }

  toJSON(): { kind: ErrorKind; message: string } {
    return { kind: this.kind, message: this.message };
  }
}

export class MissingCredentialError extends AppError {
  constructor(variable: string) {
    super('missing_credential', `${variable} environment variable not found. Please set your API key.`);
    this.name = 'MissingCredentialError';
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super('invalid_configuration', message);
    this.name = 'ConfigurationError';
  }
}

export class TranscriptionError extends AppError {
  constructor(cause: unknown) {
    super('transcription_failed', `An error occurred during transcription: ${describeError(cause)}`, { cause });
    this.name = 'TranscriptionError';
  }
}

export class TranslationError extends AppError {
  constructor(cause: unknown) {
    super('translation_failed', `An error occurred during translation: ${describeError(cause)}`, { cause });
    this.name = 'TranslationError';
  }
}

export class InvalidRequestError extends AppError {
  constructor(message: string) {
    super('invalid_request', message);
    this.name = 'InvalidRequestError';
  }
}

export class SessionBusyError extends AppError {
  constructor() {
    super('session_busy', 'Another request for this session is still being processed');
    this.name = 'SessionBusyError';
  }
}

export class SessionNotFoundError extends AppError {
  constructor(sessionId: string) {
    super('session_not_found', `Session ${sessionId} not found or expired`);
    this.name = 'SessionNotFoundError';
  }
}

export type SessionError = TranscriptionError | TranslationError | InvalidRequestError | SessionBusyError;

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
