export type ErrorCode = 'SOURCE_UNAVAILABLE' | 'CONFIG_INVALID' | 'PERSISTENCE_FAILED';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Neither the remote list nor the local cache produced any endpoints.
export class SourceUnavailableError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super('SOURCE_UNAVAILABLE', message, options);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, options);
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super('PERSISTENCE_FAILED', message, options);
  }
}
