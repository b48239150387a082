/**
 * Base class for errors raised by this package itself. Errors coming from
 * Cassandra are never wrapped; they reach the caller as the driver raised them.
 *
 * @example
 * ```typescript
 * try {
 *   await session.query('SELECT * FROM users').exec();
 * } catch (error) {
 *   if (error instanceof SessionClosedError) {
 *     // reopen
 *   }
 * }
 * ```
 */
export class DriverError extends Error {
  /** Stable machine-readable code */
  public readonly code: string;
  public readonly details?: unknown;

  constructor(
    code: string,
    message: string,
    options?: {
      details?: unknown;
      cause?: Error;
    },
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options?.details;

    if (options?.cause) {
      this.cause = options.cause;
    }
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }
}

export class SessionClosedError extends DriverError {
  constructor() {
    super('SESSION_CLOSED', 'Session has been closed');
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ClusterConfigError extends DriverError {
  declare readonly details: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[]) {
    super('INVALID_CLUSTER_CONFIG', message, { details: issues });
  }
}

export class HostUnavailableError extends DriverError {
  constructor(address: string) {
    super('HOST_UNAVAILABLE', `No available host to serve the request (last tried ${address})`, {
      details: { address },
    });
  }
}

/**
 * Normalizes a thrown value for observed events. The original value is what
 * gets rethrown; this copy only feeds telemetry.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
