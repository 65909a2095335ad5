/**
 * Error types
 */

/** Invalid or unreadable configuration. Fatal at startup. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(field ? `${field}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

/**
 * A required capability is unusable (e.g. no signer key for live orders).
 * Ends the symbol loop that hit it; other symbols keep running.
 */
export class FatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FatalError';
  }
}

/** HTTP or SDK failure talking to the venue. Transient. */
export class VenueError extends Error {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly status?: number,
  ) {
    super(status !== undefined ? `${message} (status: ${status})` : message);
    this.name = 'VenueError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
