/**
 * Base class for every error thrown by this library.
 */
export class DocDbError extends Error {
  override readonly name: string = 'DocDbError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** An operator or constraint does not fit the declared type of its target. Raised at build time. */
export class SchemaTypeError extends DocDbError {
  override readonly name = 'SchemaTypeError';
}

/** Malformed caller input, e.g. a non-positive limit. */
export class InvalidArgumentError extends DocDbError {
  override readonly name = 'InvalidArgumentError';
}

export class UnknownPropertyError extends DocDbError {
  override readonly name = 'UnknownPropertyError';

  constructor(
    readonly property: string,
    message?: string,
  ) {
    super(message ?? `Unknown property: "${property}"`);
  }
}

export class PropertyTypeError extends DocDbError {
  override readonly name = 'PropertyTypeError';

  constructor(
    readonly property: string,
    readonly reason: string,
  ) {
    super(`Invalid value for property "${property}": ${reason}`);
  }
}

/**
 * A page fetch failed mid-iteration. Records already yielded stay valid;
 * `yielded` tells how many there were.
 */
export class RemoteFetchError extends DocDbError {
  override readonly name = 'RemoteFetchError';

  constructor(
    readonly yielded: number,
    override readonly cause?: unknown,
    message?: string,
  ) {
    super(message ?? `Failed to fetch results after ${yielded} record(s): ${describeCause(cause)}`);
  }
}

/** A create or update call failed. The record keeps its dirty state so commit() can be retried. */
export class RemoteWriteError extends DocDbError {
  override readonly name = 'RemoteWriteError';

  constructor(
    readonly recordId: string | undefined,
    override readonly cause?: unknown,
  ) {
    super(
      recordId === undefined
        ? `Failed to create record: ${describeCause(cause)}`
        : `Failed to update record ${recordId}: ${describeCause(cause)}`,
    );
  }
}

/** Non-success response (or unreadable body) from the remote API. */
export class EndpointError extends DocDbError {
  override readonly name = 'EndpointError';

  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
