import { Logger } from '@nestjs/common';
import { createCipheriv, createDecipheriv, createPublicKey, generateKeyPairSync, randomBytes, randomUUID } from 'crypto';
import type { KeyObject } from 'crypto';
import * as forge from 'node-forge';
import { getErrorMessage } from '../shared/error.utils';
import { KeyStoreError } from './key-store.error';
import { AES_BLOCK_SIZE, KeyStore, PublicKey, PublicKeyEncryptionAlgorithm, PublicKeyFormat } from './interfaces';
import { DEFAULT_RSA_KEY_BITS } from '../config/config.constants';

export const SYMMETRIC_KEY_SIZE = 32;

const ZERO_IV = new Uint8Array(AES_BLOCK_SIZE);

interface StoredKeyPair {
  publicKey: KeyObject;
  privateKey: forge.pki.rsa.PrivateKey;
}

export interface InMemoryKeyStoreOptions {
  rsaKeyBits?: number;
}

function toBinaryString(data: Uint8Array): string {
  return Buffer.from(data).toString('binary');
}

function fromBinaryString(data: string): Uint8Array {
  return new Uint8Array(Buffer.from(data, 'binary'));
}

function aesCipherName(key: Uint8Array): 'aes-128-cbc' | 'aes-192-cbc' | 'aes-256-cbc' {
  switch (key.length) {
    case 16:
      return 'aes-128-cbc';
    case 24:
      return 'aes-192-cbc';
    case 32:
      return 'aes-256-cbc';
    default:
      throw new KeyStoreError(`Invalid AES key length: ${key.length} bytes`);
  }
}

function forgeScheme(algorithm: PublicKeyEncryptionAlgorithm): {
  scheme: 'RSA-OAEP' | 'RSAES-PKCS1-V1_5';
  options?: { md: forge.md.MessageDigest; mgf1: { md: forge.md.MessageDigest } };
} {
  switch (algorithm) {
    case PublicKeyEncryptionAlgorithm.RSA_ECB_OAEPSHA1:
      return { scheme: 'RSA-OAEP', options: { md: forge.md.sha1.create(), mgf1: { md: forge.md.sha1.create() } } };
    case PublicKeyEncryptionAlgorithm.RSA_ECB_PKCS1:
      return { scheme: 'RSAES-PKCS1-V1_5' };
  }
}

/**
 * Process-local key store.
 *
 * RSA key pairs are generated with node:crypto and used through node-forge, which still
 * implements PKCS#1 v1.5 private-key decryption (Node 20 refuses it). Symmetric operations
 * are AES-CBC with PKCS#7 padding; calls without an IV use sixteen zero bytes.
 *
 * Keys live only as long as the instance.
 */
export class InMemoryKeyStore implements KeyStore {
  private readonly logger = new Logger(InMemoryKeyStore.name);
  private readonly rsaKeyBits: number;
  private readonly keyPairs = new Map<string, StoredKeyPair>();
  private readonly symmetricKeys = new Map<string, Uint8Array>();

  constructor(options: InMemoryKeyStoreOptions = {}) {
    this.rsaKeyBits = options.rsaKeyBits ?? DEFAULT_RSA_KEY_BITS;
  }

  /**
   * Generate an RSA key pair and keep it under `keyId`.
   * @returns The public half in the requested DER format
   */
  generateKeyPair(keyId: string = randomUUID(), format: PublicKeyFormat = PublicKeyFormat.SPKI): PublicKey {
    try {
      const { publicKey, privateKey } = generateKeyPairSync('rsa', {
        modulusLength: this.rsaKeyBits,
        publicExponent: 0x10001,
      });
      const privatePem = privateKey.export({ type: 'pkcs1', format: 'pem' }).toString();
      this.keyPairs.set(keyId, { publicKey, privateKey: forge.pki.privateKeyFromPem(privatePem) });
      this.logger.debug(`Generated ${this.rsaKeyBits}-bit key pair ${keyId}`);
    } catch (error) {
      const errorMessage = getErrorMessage(error);
      this.logger.error(`Failed to generate key pair: ${errorMessage}`);
      throw new KeyStoreError(`Failed to generate key pair: ${errorMessage}`, { keyId, cause: error });
    }
    return this.getPublicKey(keyId, format);
  }

  getPublicKey(keyId: string, format: PublicKeyFormat = PublicKeyFormat.SPKI): PublicKey {
    const keyPair = this.requireKeyPair(keyId);
    const der = keyPair.publicKey.export({
      type: format === PublicKeyFormat.SPKI ? 'spki' : 'pkcs1',
      format: 'der',
    });
    return { keyId, keyFormat: format, publicKey: new Uint8Array(der) };
  }

  deleteKeyPair(keyId: string): boolean {
    return this.keyPairs.delete(keyId);
  }

  /**
   * Store a symmetric key under `keyId`, generating one when `key` is omitted.
   * @returns The key identifier
   */
  addSymmetricKey(keyId: string = randomUUID(), key?: Uint8Array): string {
    const material = key ?? this.generateRandomSymmetricKey();
    aesCipherName(material);
    this.symmetricKeys.set(keyId, new Uint8Array(material));
    return keyId;
  }

  deleteSymmetricKey(keyId: string): boolean {
    return this.symmetricKeys.delete(keyId);
  }

  removeAllKeys(): void {
    this.keyPairs.clear();
    this.symmetricKeys.clear();
  }

  encryptAsymmetric(
    publicKey: Uint8Array,
    keyFormat: PublicKeyFormat,
    algorithm: PublicKeyEncryptionAlgorithm,
    plaintext: Uint8Array,
  ): Uint8Array {
    try {
      const keyObject = createPublicKey({
        key: Buffer.from(publicKey),
        format: 'der',
        type: keyFormat === PublicKeyFormat.SPKI ? 'spki' : 'pkcs1',
      });
      const forgeKey = forge.pki.publicKeyFromPem(keyObject.export({ type: 'spki', format: 'pem' }).toString());
      const { scheme, options } = forgeScheme(algorithm);
      return fromBinaryString(forgeKey.encrypt(toBinaryString(plaintext), scheme, options));
    } catch (error) {
      throw new KeyStoreError(`Failed to encrypt with public key: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  decryptAsymmetric(keyId: string, algorithm: PublicKeyEncryptionAlgorithm, ciphertext: Uint8Array): Uint8Array {
    const keyPair = this.requireKeyPair(keyId);
    try {
      const { scheme, options } = forgeScheme(algorithm);
      return fromBinaryString(keyPair.privateKey.decrypt(toBinaryString(ciphertext), scheme, options));
    } catch (error) {
      throw new KeyStoreError(`Failed to decrypt with private key: ${getErrorMessage(error)}`, {
        keyId,
        cause: error,
      });
    }
  }

  encryptSymmetric(key: Uint8Array, plaintext: Uint8Array, iv: Uint8Array = ZERO_IV): Uint8Array {
    try {
      const cipher = createCipheriv(aesCipherName(key), key, iv);
      return new Uint8Array(Buffer.concat([cipher.update(plaintext), cipher.final()]));
    } catch (error) {
      if (error instanceof KeyStoreError) {
        throw error;
      }
      throw new KeyStoreError(`Failed to encrypt with symmetric key: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  decryptSymmetric(key: Uint8Array, ciphertext: Uint8Array, iv: Uint8Array = ZERO_IV): Uint8Array {
    try {
      const decipher = createDecipheriv(aesCipherName(key), key, iv);
      return new Uint8Array(Buffer.concat([decipher.update(ciphertext), decipher.final()]));
    } catch (error) {
      if (error instanceof KeyStoreError) {
        throw error;
      }
      throw new KeyStoreError(`Failed to decrypt with symmetric key: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  encryptSymmetricById(keyId: string, plaintext: Uint8Array): Uint8Array {
    return this.encryptSymmetric(this.requireSymmetricKey(keyId), plaintext);
  }

  decryptSymmetricById(keyId: string, ciphertext: Uint8Array): Uint8Array {
    return this.decryptSymmetric(this.requireSymmetricKey(keyId), ciphertext);
  }

  generateRandomSymmetricKey(): Uint8Array {
    return this.randomBytes(SYMMETRIC_KEY_SIZE);
  }

  randomBytes(size: number): Uint8Array {
    if (!Number.isInteger(size) || size < 0) {
      throw new KeyStoreError(`Invalid random byte count: ${size}`);
    }
    return new Uint8Array(randomBytes(size));
  }

  privateKeyExists(keyId: string): boolean {
    return this.keyPairs.has(keyId);
  }

  symmetricKeyExists(keyId: string): boolean {
    return this.symmetricKeys.has(keyId);
  }

  private requireKeyPair(keyId: string): StoredKeyPair {
    const keyPair = this.keyPairs.get(keyId);
    if (!keyPair) {
      throw new KeyStoreError(`Key pair not found: ${keyId}`, { keyId });
    }
    return keyPair;
  }

  private requireSymmetricKey(keyId: string): Uint8Array {
    const key = this.symmetricKeys.get(keyId);
    if (!key) {
      throw new KeyStoreError(`Symmetric key not found: ${keyId}`, { keyId });
    }
    return key;
  }
}
