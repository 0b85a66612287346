/**
 * Base error type for every failure raised by the envelope-encryption layer.
 *
 * Each subclass fixes a `kind` so callers can branch on the failure category
 * without importing every concrete class.
 */

export type SealedMailErrorKind =
  | 'framing'
  | 'policy'
  | 'argument'
  | 'lookup'
  | 'parsing'
  | 'encryption'
  | 'decryption'
  | 'keyStore';

export abstract class SealedMailError extends Error {
  public abstract readonly kind: SealedMailErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/**
 * Narrows an unknown caught value to a {@link SealedMailError}, optionally of a given kind.
 */
export function isSealedMailError(value: unknown, kind?: SealedMailErrorKind): value is SealedMailError {
  if (!(value instanceof SealedMailError)) {
    return false;
  }
  return kind === undefined || value.kind === kind;
}

/**
 * Raised when a caller-supplied argument is empty or malformed.
 */
export class InvalidArgumentError extends SealedMailError {
  public readonly kind = 'argument';

  constructor(message = 'Invalid argument', cause?: unknown) {
    super(message, cause);
  }
}

/**
 * Raised when no locally held key can be found for an operation.
 */
export class KeyNotFoundError extends SealedMailError {
  public readonly kind = 'lookup';

  constructor(message = 'Key not found', cause?: unknown) {
    super(message, cause);
  }
}
