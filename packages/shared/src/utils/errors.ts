export class LexiscreenError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'LexiscreenError';
  }
}

export class ModalityAnalysisError extends LexiscreenError {
  constructor(message: string, cause?: Error, code = 'MODALITY_ANALYSIS_ERROR') {
    super(message, code, cause);
    this.name = 'ModalityAnalysisError';
  }
}

export class ModalityTimeoutError extends ModalityAnalysisError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message, undefined, 'MODALITY_TIMEOUT');
    this.name = 'ModalityTimeoutError';
  }
}

export class NoInputProvidedError extends LexiscreenError {
  constructor(message = 'At least one input (text, audio, or handwriting image) is required') {
    super(message, 'NO_INPUT_PROVIDED');
    this.name = 'NoInputProvidedError';
  }
}

export class SchemaValidationError extends LexiscreenError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends LexiscreenError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class SessionError extends LexiscreenError {
  constructor(message: string, cause?: Error) {
    super(message, 'SESSION_ERROR', cause);
    this.name = 'SessionError';
  }
}

export class PersistenceError extends LexiscreenError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
