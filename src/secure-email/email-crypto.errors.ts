import { SealedMailError } from '../shared/sealed-mail.error';

export { InvalidArgumentError, KeyNotFoundError } from '../shared/sealed-mail.error';

/**
 * A secure body or key attachment does not hold the expected JSON record.
 */
export class SecureDataParsingError extends SealedMailError {
  public readonly kind = 'parsing';

  constructor(message = 'Failed to parse secure data', cause?: unknown) {
    super(message, cause);
  }
}

export class SecureDataEncryptionError extends SealedMailError {
  public readonly kind = 'encryption';

  constructor(message = 'Failed to encrypt secure data', cause?: unknown) {
    super(message, cause);
  }
}

export class SecureDataDecryptionError extends SealedMailError {
  public readonly kind = 'decryption';

  constructor(message = 'Failed to decrypt secure data', cause?: unknown) {
    super(message, cause);
  }
}
