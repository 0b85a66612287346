import { SealedMailError } from '../shared/sealed-mail.error';

/**
 * Sealed data is shorter than the wrapped-key zone of the envelope.
 */
export class SealedDataTooShortError extends SealedMailError {
  public readonly kind = 'framing';
  public readonly length: number;

  constructor(length: number) {
    super(`Sealed value too short: ${length} bytes`);
    this.length = length;
  }
}

/**
 * Sealed data is not valid Base64.
 */
export class SealedDataEncodingError extends SealedMailError {
  public readonly kind = 'framing';

  constructor(message = 'Sealed value is not valid Base64') {
    super(message);
  }
}

/**
 * A sealed value names an algorithm outside the supported set.
 */
export class UnsupportedAlgorithmError extends SealedMailError {
  public readonly kind = 'policy';
  public readonly algorithm: string;

  constructor(algorithm: string) {
    super(`Unsupported algorithm: ${algorithm}`);
    this.algorithm = algorithm;
  }
}

export class SealingEncryptionError extends SealedMailError {
  public readonly kind = 'encryption';
}

export class SealingDecryptionError extends SealedMailError {
  public readonly kind = 'decryption';
}
