/**
 * Kind of key a sealed value was produced with.
 */
export enum KeyKind {
  /** Symmetric key wrapped with an RSA public key and embedded in the envelope */
  ASYMMETRIC = 'ASYMMETRIC',
  /** Symmetric key held by the key store under an identifier */
  SYMMETRIC = 'SYMMETRIC',
}

/**
 * Identifies which key store entry and cipher to unseal with.
 */
export interface KeyDescriptor {
  keyId: string;
  keyKind: KeyKind;
  algorithm: string;
}

/**
 * A sealed attribute as stored by the remote service.
 */
export interface SealedValue {
  keyId: string;
  algorithm: string;
  plainTextType: string;
  base64EncodedSealedData: string;
}
