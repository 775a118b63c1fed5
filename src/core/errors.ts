export type ServiceErrorKind = 'network' | 'http' | 'rate-limit' | 'parse' | 'invalid-request' | 'unexpected';

/**
 * Failure of a call to the external translation service
 */
export class ServiceError extends Error {
  readonly kind: ServiceErrorKind;
  readonly status?: number;

  constructor(kind: ServiceErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'ServiceError';
    this.kind = kind;
    this.status = status;
  }
}

/**
 * Invalid translator configuration (bad placeholder prefix, etc.)
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Normalize a caught value into a loggable message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
