/**
 * Raised for conditions that must stop the process before the dashboard runs:
 * an unusable terminal or malformed static configuration.
 */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
  }
}

export function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
