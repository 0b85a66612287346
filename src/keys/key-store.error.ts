import { SealedMailError } from '../shared/sealed-mail.error';

/**
 * Error raised by the in-memory key store when a primitive fails or a key is missing.
 */
export class KeyStoreError extends SealedMailError {
  public readonly kind = 'keyStore';
  public readonly keyId?: string;

  constructor(message: string, options: { keyId?: string; cause?: unknown } = {}) {
    super(message, options.cause);
    this.keyId = options.keyId;
  }
}
