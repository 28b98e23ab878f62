/**
 * Error Hierarchy for keymirror
 *
 * Every failure of a sync run is one of four kinds:
 * - InvalidAddressError: the layout address is malformed or under-specified
 * - FetchFailedError: a remote call failed at the transport level
 * - MalformedResponseError: a remote payload lacks the expected revision id
 * - StoreError: the local store could not be opened or written
 *
 * All of them are terminal; the CLI reports the message and exits non-zero.
 */

export type KeymirrorErrorCode = 'INVALID_ADDRESS' | 'FETCH_FAILED' | 'MALFORMED_RESPONSE' | 'STORE_ERROR';

/**
 * Abstract base class for all keymirror errors.
 */
export abstract class KeymirrorError extends Error {
  /** Error code for programmatic error handling */
  abstract readonly code: KeymirrorErrorCode;

  constructor(
    message: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * The configuration page address could not be decoded
 */
export class InvalidAddressError extends KeymirrorError {
  readonly code = 'INVALID_ADDRESS' as const;

  constructor(
    message: string,
    public readonly address: string,
    cause?: Error
  ) {
    super(message, cause);
  }
}

/**
 * A remote request failed before a usable response arrived
 */
export class FetchFailedError extends KeymirrorError {
  readonly code = 'FETCH_FAILED' as const;

  constructor(
    message: string,
    public readonly url: string,
    cause?: Error
  ) {
    super(message, cause);
  }
}

/**
 * The remote response was not JSON or lacked `layout.revision.hashId`
 */
export class MalformedResponseError extends KeymirrorError {
  readonly code = 'MALFORMED_RESPONSE' as const;
}

/**
 * Opening the store or executing a statement against it failed
 */
export class StoreError extends KeymirrorError {
  readonly code = 'STORE_ERROR' as const;
}

/**
 * Type guard to check if an error is a KeymirrorError
 */
export function isKeymirrorError(error: unknown): error is KeymirrorError {
  return error instanceof KeymirrorError;
}

/**
 * Get a safe error message from an unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Normalize a thrown value into an Error so it can be attached as a cause
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
