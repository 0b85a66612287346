import { Inject, Injectable, Logger } from '@nestjs/common';
import type { KeyStore } from '../keys/interfaces';
import { KEY_STORE } from '../keys/key-store.constants';
import { encodeBase64, utf8Encode } from '../shared/encoding.utils';
import { getErrorMessage } from '../shared/error.utils';
import { SymmetricKeyEncryptionAlgorithm } from './algorithms';
import { SealedValue } from './interfaces';
import { SealingDecryptionError, SealingEncryptionError } from './unsealer.errors';

/**
 * Write-side sealing of attribute values under a named symmetric key (AES-CBC-PKCS7).
 */
@Injectable()
export class SealingService {
  private readonly logger = new Logger(SealingService.name);

  constructor(@Inject(KEY_STORE) private readonly keyStore: KeyStore) {}

  /**
   * Seal `payload` with the symmetric key `keyId`.
   * @throws {SealingEncryptionError} Wrapping the key store failure
   */
  seal(keyId: string, payload: Uint8Array): Uint8Array {
    try {
      return this.keyStore.encryptSymmetricById(keyId, payload);
    } catch (error) {
      this.logger.error(
        `Failed to seal value with key ${keyId}: ${getErrorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new SealingEncryptionError('Failed to seal string', error);
    }
  }

  /**
   * Inverse of {@link seal}.
   * @throws {SealingDecryptionError} Wrapping the key store failure
   */
  unseal(keyId: string, payload: Uint8Array): Uint8Array {
    try {
      return this.keyStore.decryptSymmetricById(keyId, payload);
    } catch (error) {
      this.logger.error(
        `Failed to unseal value with key ${keyId}: ${getErrorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new SealingDecryptionError('Failed to unseal string', error);
    }
  }

  /**
   * Seal a string into the attribute shape the service stores.
   */
  sealAttribute(keyId: string, plaintext: string): SealedValue {
    return {
      keyId,
      algorithm: SymmetricKeyEncryptionAlgorithm.AES_CBC_PKCS7PADDING,
      plainTextType: 'string',
      base64EncodedSealedData: encodeBase64(this.seal(keyId, utf8Encode(plaintext))),
    };
  }
}
