/**
 * Failures of a single cluster health fetch.
 *
 * The collector treats every subclass the same way (up = 0), except that a
 * DecodeError also counts as a JSON parse failure.
 */

export type ErrorMetadata = Record<string, unknown>;

export interface ClusterHealthErrorOptions {
  cause?: unknown;
  metadata?: ErrorMetadata;
}

/** Base for all fetch errors. Preserves prototype chain for instanceof. */
export class ClusterHealthError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, options?: ClusterHealthErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.metadata = options?.metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The request could not be sent or no response arrived. */
export class TransportError extends ClusterHealthError {}

/** The endpoint answered with something other than 200. */
export class UnexpectedStatusError extends ClusterHealthError {
  readonly statusCode: number;

  constructor(statusCode: number, options?: ClusterHealthErrorOptions) {
    super(`HTTP request failed with code ${statusCode}`, options);
    this.statusCode = statusCode;
  }
}

/** The body could not be read or does not match the health schema. */
export class DecodeError extends ClusterHealthError {}
