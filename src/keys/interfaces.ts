/** AES block size; also the length of every IV, including the implicit all-zero one. */
export const AES_BLOCK_SIZE = 16;

/**
 * RSA padding schemes understood by the key store.
 * Values are the canonical names written into sealed key records.
 */
export enum PublicKeyEncryptionAlgorithm {
  RSA_ECB_OAEPSHA1 = 'RSA_ECB_OAEPSHA1',
  RSA_ECB_PKCS1 = 'RSA_ECB_PKCS1',
}

/**
 * DER encodings a recipient public key may be published in.
 */
export enum PublicKeyFormat {
  /** PKCS#1 RSAPublicKey */
  RSA_PUBLIC_KEY = 'RSA_PUBLIC_KEY',
  /** X.509 SubjectPublicKeyInfo */
  SPKI = 'SPKI',
}

/**
 * Capabilities the envelope-encryption layer needs from a key store.
 *
 * Every method is synchronous and may throw. Implementations own their own thread safety
 * and key persistence.
 */
export interface KeyStore {
  /** Wrap `plaintext` with a DER-encoded RSA public key. */
  encryptAsymmetric(
    publicKey: Uint8Array,
    keyFormat: PublicKeyFormat,
    algorithm: PublicKeyEncryptionAlgorithm,
    plaintext: Uint8Array,
  ): Uint8Array;

  /** Unwrap `ciphertext` with the private key of key pair `keyId`. */
  decryptAsymmetric(keyId: string, algorithm: PublicKeyEncryptionAlgorithm, ciphertext: Uint8Array): Uint8Array;

  /** AES-CBC-PKCS7 with a raw key. When `iv` is omitted the store's implicit IV applies. */
  encryptSymmetric(key: Uint8Array, plaintext: Uint8Array, iv?: Uint8Array): Uint8Array;

  decryptSymmetric(key: Uint8Array, ciphertext: Uint8Array, iv?: Uint8Array): Uint8Array;

  encryptSymmetricById(keyId: string, plaintext: Uint8Array): Uint8Array;

  decryptSymmetricById(keyId: string, ciphertext: Uint8Array): Uint8Array;

  generateRandomSymmetricKey(): Uint8Array;

  randomBytes(size: number): Uint8Array;

  privateKeyExists(keyId: string): boolean;

  symmetricKeyExists(keyId: string): boolean;
}

/**
 * Public half of a key pair as exported by a key store.
 */
export interface PublicKey {
  keyId: string;
  keyFormat: PublicKeyFormat;
  publicKey: Uint8Array;
}
