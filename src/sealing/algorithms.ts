import { PublicKeyEncryptionAlgorithm } from '../keys/interfaces';

/**
 * Symmetric algorithms a sealed attribute may name.
 */
export enum SymmetricKeyEncryptionAlgorithm {
  AES_CBC_PKCS7PADDING = 'AES/CBC/PKCS7Padding',
}

/**
 * Public key algorithm name that selects OAEP-SHA1 unwrapping. Every other name selects PKCS#1 v1.5.
 */
export const DEFAULT_PUBLIC_KEY_ALGORITHM = 'RSAEncryptionOAEPAESCBC';

const SUPPORTED_SYMMETRIC_ALGORITHMS: readonly string[] = Object.values(SymmetricKeyEncryptionAlgorithm);

export function isSymmetricAlgorithmSupported(algorithm: string): boolean {
  return SUPPORTED_SYMMETRIC_ALGORITHMS.includes(algorithm);
}

export function resolvePublicKeyAlgorithm(algorithm: string): PublicKeyEncryptionAlgorithm {
  return algorithm === DEFAULT_PUBLIC_KEY_ALGORITHM
    ? PublicKeyEncryptionAlgorithm.RSA_ECB_OAEPSHA1
    : PublicKeyEncryptionAlgorithm.RSA_ECB_PKCS1;
}
