import { Logger } from '@nestjs/common';
import { DEFAULT_RSA_KEY_BITS, MIN_RSA_KEY_BITS, RSA_KEY_BITS_STEP } from './config.constants';

const logger = new Logger('ConfigValidation');

/**
 * Checks a MIME type has the `type/subtype` shape (RFC 6838 restricted-name characters).
 */
export function isValidMimeType(mimeType: string): boolean {
  return /^[a-zA-Z0-9][a-zA-Z0-9!#$&^_.+-]{0,126}\/[a-zA-Z0-9][a-zA-Z0-9!#$&^_.+-]{0,126}$/.test(mimeType);
}

/**
 * Checks a Content-ID has the `id-left@id-right` shape with no whitespace or angle brackets.
 */
export function isValidContentId(contentId: string): boolean {
  return /^[^\s<>@]+@[^\s<>@]+$/.test(contentId);
}

/**
 * Validates the RSA modulus size used for key pairs generated by the in-memory key store.
 *
 * @throws {Error} If the size is below the minimum or not a multiple of 1024
 */
export function validateRsaKeyBits(bits: number): void {
  if (bits < MIN_RSA_KEY_BITS || bits % RSA_KEY_BITS_STEP !== 0) {
    throw new Error(
      `Invalid SEALMAIL_RSA_KEY_BITS: ${bits} (must be a multiple of ${RSA_KEY_BITS_STEP} and at least ${MIN_RSA_KEY_BITS})`,
    );
  }

  if (bits !== DEFAULT_RSA_KEY_BITS) {
    logger.warn(
      `SEALMAIL_RSA_KEY_BITS=${bits}: single-recipient sealed values reserve a 256-byte wrapped-key zone, ` +
        `so keys of this size can only be used for secure email key exchange.`,
    );
  }
}

/**
 * Validates secure attachment metadata.
 *
 * @throws {Error} If the MIME type or Content-ID is malformed
 */
export function validateSecureAttachment(label: string, mimeType: string, contentId: string): void {
  if (!isValidMimeType(mimeType)) {
    throw new Error(`Invalid ${label} MIME type: "${mimeType}"`);
  }
  if (!isValidContentId(contentId)) {
    throw new Error(`Invalid ${label} content id: "${contentId}"`);
  }
}
