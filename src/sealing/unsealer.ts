import type { KeyStore } from '../keys/interfaces';
import { decodeBase64, utf8Decode } from '../shared/encoding.utils';
import { isSymmetricAlgorithmSupported, resolvePublicKeyAlgorithm } from './algorithms';
import { splitEnvelope } from './envelope.codec';
import { KeyDescriptor, KeyKind, SealedValue } from './interfaces';
import { SealedDataEncodingError, UnsupportedAlgorithmError } from './unsealer.errors';

function decodeSealedData(valueBase64: string): Uint8Array {
  const data = decodeBase64(valueBase64);
  if (data === undefined) {
    throw new SealedDataEncodingError();
  }
  return data;
}

/**
 * Decrypts sealed values for one key.
 *
 * An asymmetric envelope carries its own symmetric key wrapped with the public half of
 * `keyDescriptor.keyId`; a symmetric value is ciphertext under the key store entry of that id.
 * Key store failures propagate unchanged.
 */
export class Unsealer {
  constructor(
    private readonly keyStore: KeyStore,
    private readonly keyDescriptor: KeyDescriptor,
  ) {}

  /**
   * Unseal a Base64 value and read the plaintext as UTF-8.
   *
   * @throws {SealedDataEncodingError} If the value is not Base64
   * @throws {SealedDataTooShortError} If an asymmetric envelope is shorter than 256 bytes
   */
  unseal(valueBase64: string): string {
    const data = decodeSealedData(valueBase64);
    switch (this.keyDescriptor.keyKind) {
      case KeyKind.ASYMMETRIC:
        return utf8Decode(this.openEnvelope(data));
      case KeyKind.SYMMETRIC:
        return utf8Decode(this.keyStore.decryptSymmetricById(this.keyDescriptor.keyId, data));
    }
  }

  /**
   * Unseal a sealed attribute after checking its algorithm is supported.
   *
   * @throws {UnsupportedAlgorithmError} Before any key store call when the algorithm is unknown
   */
  unsealValue(sealedValue: SealedValue): string {
    if (!isSymmetricAlgorithmSupported(sealedValue.algorithm)) {
      throw new UnsupportedAlgorithmError(sealedValue.algorithm);
    }
    return this.unseal(sealedValue.base64EncodedSealedData);
  }

  /**
   * Unseal Base64 text given as bytes. Always reads the asymmetric two-zone layout.
   */
  unsealBytes(valueBase64: Uint8Array): Uint8Array {
    return this.openEnvelope(decodeSealedData(utf8Decode(valueBase64)));
  }

  private openEnvelope(data: Uint8Array): Uint8Array {
    const { wrappedKey, cipherBody } = splitEnvelope(data);
    const symmetricKey = this.keyStore.decryptAsymmetric(
      this.keyDescriptor.keyId,
      resolvePublicKeyAlgorithm(this.keyDescriptor.algorithm),
      wrappedKey,
    );
    return this.keyStore.decryptSymmetric(symmetricKey, cipherBody);
  }
}

/**
 * Unseal an attribute with the symmetric key it names.
 */
export function unsealAttribute(keyStore: KeyStore, sealedValue: SealedValue): string {
  const unsealer = new Unsealer(keyStore, {
    keyId: sealedValue.keyId,
    keyKind: KeyKind.SYMMETRIC,
    algorithm: sealedValue.algorithm,
  });
  return unsealer.unsealValue(sealedValue);
}
