export class NewscheckError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'NewscheckError';
  }
}

export class ConfigurationError extends NewscheckError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class SchemaValidationError extends NewscheckError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class LlmError extends NewscheckError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class ClassificationError extends NewscheckError {
  constructor(message: string, cause?: Error) {
    super(message, 'CLASSIFICATION_ERROR', cause);
    this.name = 'ClassificationError';
  }
}

export class PersistenceError extends NewscheckError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}
