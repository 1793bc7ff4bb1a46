export class RepoCoderError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RepoCoderError';
  }
}

/** Bad caller input: action string, directory, empty crawl. */
export class ValidationError extends RepoCoderError {
  constructor(
    message: string,
    field?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', { field, ...context });
    this.name = 'ValidationError';
  }
}

/** Missing API key, unknown provider, bad config file. */
export class ConfigurationError extends RepoCoderError {
  constructor(
    message: string,
    configKey?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'CONFIGURATION_ERROR', { configKey, ...context });
    this.name = 'ConfigurationError';
  }
}

export class BundleError extends RepoCoderError {
  constructor(
    message: string,
    outputFile?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'BUNDLE_ERROR', { outputFile, ...context });
    this.name = 'BundleError';
  }
}

export class ProviderError extends RepoCoderError {
  constructor(
    message: string,
    public provider: string,
    public status?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'PROVIDER_ERROR', { provider, status, ...context });
    this.name = 'ProviderError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Node system error code (ENOENT, EACCES, ...) when present. */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
