/**
 * Base class for every failure raised by the BMS collector.
 *
 * The poller branches on the concrete subclass to decide how loudly a
 * failed cycle is reported; none of them stop the polling timer.
 */
export class BmsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BmsError';
  }
}

/**
 * Endpoint unreachable, timed out, aborted, answered with a non-success
 * status, or returned a body that is not the expected JSON shape.
 */
export class ConnectivityError extends BmsError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConnectivityError';
  }
}

/**
 * Endpoint rejected the bearer token (401/403).
 */
export class AuthError extends BmsError {
  constructor(
    public readonly status: number,
    message = `BMS rejected credentials (HTTP ${status})`,
  ) {
    super(message);
    this.name = 'AuthError';
  }
}

/**
 * A single point could not be turned into a record.
 * Scoped to that point; the rest of the batch continues.
 */
export class MalformedRecordError extends BmsError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`[${path}] ${reason}`);
    this.name = 'MalformedRecordError';
  }
}

/**
 * Persistent writer could not store a batch.
 */
export class SinkUnavailableError extends BmsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SinkUnavailableError';
  }
}

/**
 * Format an unknown thrown value for a log line.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message !== error.message) {
      return `${error.name}: ${error.message} (cause: ${cause.message})`;
    }
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
