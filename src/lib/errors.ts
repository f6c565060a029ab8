/**
 * Error taxonomy for a batch run. Validation failures live in ./sanitization.
 */

export type ConnectionFailureReason = 'auth' | 'network' | 'timeout' | 'unknown';

/**
 * @description The command source is missing or cannot be read.
 */
export class NotFoundError extends Error {
  constructor(
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Commands file not found: ${path}`, options);
    this.name = 'NotFoundError';
  }
}

/**
 * @description The SSH session could not be opened.
 */
export class ConnectionError extends Error {
  constructor(
    message: string,
    public readonly reason: ConnectionFailureReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * @description A single command's channel failed; the session is still usable.
 */
export class ChannelError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ChannelError';
  }
}

/**
 * @description The session itself went away while a command was running.
 */
export class ConnectionLostError extends Error {
  constructor(
    message: string,
    public readonly command?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConnectionLostError';
  }
}

/**
 * @description Best-effort message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
