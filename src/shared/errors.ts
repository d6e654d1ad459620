export type ErrorCode =
  | 'INVALID_INPUT'
  | 'STORAGE_UNAVAILABLE'
  | 'PROVIDER_FAILURE'
  | 'CONFIGURATION';

export class ThreatIntelError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Caller error: malformed IP, feed record or handler payload. Raised before
 * anything is persisted.
 */
export class InvalidInputError extends ThreatIntelError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

export class StorageError extends ThreatIntelError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE_UNAVAILABLE', message, { cause });
  }
}

export class ProviderError extends ThreatIntelError {
  readonly provider: string;

  constructor(provider: string, message: string, cause?: unknown) {
    super('PROVIDER_FAILURE', `${provider}: ${message}`, { cause });
    this.provider = provider;
  }
}

export class ConfigurationError extends ThreatIntelError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
