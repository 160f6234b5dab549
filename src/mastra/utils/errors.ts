/**
 * Raised when a service is constructed or configured with values it cannot work with
 * (non-positive capacity, overlap not smaller than chunk size, ...).
 */
export class ConfigurationError extends Error {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

/**
 * Extract a printable message from a caught value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
