/**
 * Channel Sorter Errors
 */

/**
 * Error thrown when a playlist source cannot be retrieved
 */
export class FetchError extends Error {
  constructor(
    public readonly url: string,
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * Error thrown when a required input file does not exist or cannot be read
 */
export class ConfigMissingError extends Error {
  constructor(public readonly path: string, public readonly cause?: Error) {
    super(`Config file not found: ${path}`);
    this.name = 'ConfigMissingError';
  }
}

/**
 * Error thrown when the output document cannot be persisted
 */
export class WriteError extends Error {
  constructor(public readonly path: string, public readonly cause?: Error) {
    super(`Failed to write output to ${path}${cause ? `: ${cause.message}` : ''}`);
    this.name = 'WriteError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
