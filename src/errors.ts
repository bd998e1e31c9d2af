/**
 * Raised while assembling the configuration, before any traversal starts.
 * The entry point reports it and exits with a non-zero status.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
