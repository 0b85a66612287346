import { SealedDataTooShortError } from './unsealer.errors';

/**
 * Length of the wrapped symmetric key zone at the start of an asymmetric envelope
 * (one RSA block for a 2048-bit key).
 */
export const WRAPPED_KEY_SIZE = 256;

export interface SealedEnvelope {
  wrappedKey: Uint8Array;
  cipherBody: Uint8Array;
}

/**
 * Split an asymmetric envelope into its wrapped-key and payload zones.
 *
 * Layout: `[0, 256)` wrapped key, `[256, end)` AES-CBC-PKCS7 payload. No IV is embedded.
 *
 * @throws {SealedDataTooShortError} If the envelope is shorter than the wrapped-key zone
 */
export function splitEnvelope(data: Uint8Array): SealedEnvelope {
  if (data.length < WRAPPED_KEY_SIZE) {
    throw new SealedDataTooShortError(data.length);
  }
  return {
    wrappedKey: data.slice(0, WRAPPED_KEY_SIZE),
    cipherBody: data.slice(WRAPPED_KEY_SIZE),
  };
}

/**
 * Inverse of {@link splitEnvelope}.
 *
 * @throws {RangeError} If `wrappedKey` is not exactly one wrapped-key zone long
 */
export function joinEnvelope(envelope: SealedEnvelope): Uint8Array {
  if (envelope.wrappedKey.length !== WRAPPED_KEY_SIZE) {
    throw new RangeError(`Wrapped key must be ${WRAPPED_KEY_SIZE} bytes, got ${envelope.wrappedKey.length}`);
  }
  const result = new Uint8Array(WRAPPED_KEY_SIZE + envelope.cipherBody.length);
  result.set(envelope.wrappedKey, 0);
  result.set(envelope.cipherBody, WRAPPED_KEY_SIZE);
  return result;
}
