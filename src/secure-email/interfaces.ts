import type { PublicKey, PublicKeyEncryptionAlgorithm } from '../keys/interfaces';

/**
 * A named, typed blob carried by an email message.
 */
export interface EmailAttachment {
  fileName: string;
  contentId: string;
  mimeType: string;
  inlineAttachment: boolean;
  data: Uint8Array;
}

/**
 * One encrypted body plus one wrapped symmetric key per recipient.
 */
export interface SecurePackage {
  keyAttachments: Set<EmailAttachment>;
  bodyAttachment: EmailAttachment;
}

/** Public key of one message recipient. */
export type RecipientPublicKey = PublicKey;

/**
 * Message body encrypted under a per-message symmetric key.
 */
export interface SecureData {
  encryptedData: Uint8Array;
  initVector: Uint8Array;
}

/**
 * The per-message symmetric key wrapped for one recipient key pair.
 */
export interface SealedKeyRecord {
  publicKeyId: string;
  encryptedKey: Uint8Array;
  algorithm: PublicKeyEncryptionAlgorithm;
}
