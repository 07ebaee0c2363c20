/**
 * Raised by the HTTP clients once retries are exhausted or the upstream
 * answers with a non-retryable status.
 */
export class DataSourceError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DataSourceError';
  }
}

/** Raised while building the application config from the environment. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
