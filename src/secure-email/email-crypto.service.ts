import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CONFIG_NAMESPACE } from '../config/config.constants';
import type { SealMailConfiguration, SecureAttachmentConfig } from '../config/config.types';
import { AES_BLOCK_SIZE } from '../keys/interfaces';
import { KeyStore, PublicKeyEncryptionAlgorithm } from '../keys/interfaces';
import { KEY_STORE } from '../keys/key-store.constants';
import { KeyStoreError } from '../keys/key-store.error';
import { getErrorMessage } from '../shared/error.utils';
import { isSealedMailError } from '../shared/sealed-mail.error';
import {
  InvalidArgumentError,
  KeyNotFoundError,
  SecureDataDecryptionError,
  SecureDataEncryptionError,
} from './email-crypto.errors';
import { EmailAttachment, RecipientPublicKey, SealedKeyRecord, SecurePackage } from './interfaces';
import { decodeSealedKey, encodeSealedKey } from './sealed-key.codec';
import { decodeSecureData, encodeSecureData } from './secure-data.codec';
import { fromAttachmentList, isSecurePackage, toAttachmentList } from './secure-package.utils';

/** Wrap algorithm used for every outgoing key attachment. */
const KEY_WRAP_ALGORITHM = PublicKeyEncryptionAlgorithm.RSA_ECB_OAEPSHA1;

/**
 * Multi-recipient secure email.
 *
 * A body is encrypted once under a fresh AES key and IV. The key is then wrapped with each
 * distinct recipient public key, one key attachment per recipient. Any recipient holding a
 * matching private key can recover the body.
 */
@Injectable()
export class EmailCryptoService {
  private readonly logger = new Logger(EmailCryptoService.name);

  constructor(
    @Inject(KEY_STORE) private readonly keyStore: KeyStore,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Encrypt `data` for every recipient in `keys`.
   *
   * Recipients sharing a key id are wrapped once; the first occurrence wins. Key attachments
   * are numbered from 1 in recipient order.
   *
   * @throws {InvalidArgumentError} If `data` or `keys` is empty
   * @throws {SecureDataEncryptionError} Wrapping any key store failure
   */
  encrypt(data: Uint8Array, keys: RecipientPublicKey[]): SecurePackage {
    if (data.length === 0) {
      throw new InvalidArgumentError('Data to encrypt is empty');
    }
    if (keys.length === 0) {
      throw new InvalidArgumentError('No recipient public keys');
    }

    const attachments = this.getAttachmentConfig();
    const recipients = this.distinctRecipients(keys);

    return this.withKeyStoreErrors(
      (cause) => new SecureDataEncryptionError('Failed to encrypt secure data', cause),
      () => {
        const symmetricKey = this.keyStore.generateRandomSymmetricKey();
        const initVector = this.keyStore.randomBytes(AES_BLOCK_SIZE);
        const encryptedData = this.keyStore.encryptSymmetric(symmetricKey, data, initVector);

        const bodyAttachment = this.buildAttachment(
          attachments.body,
          attachments.body.fileName,
          encodeSecureData({ encryptedData, initVector }),
        );

        const keyAttachments = new Set<EmailAttachment>();
        recipients.forEach((recipient, index) => {
          const record: SealedKeyRecord = {
            publicKeyId: recipient.keyId,
            encryptedKey: this.keyStore.encryptAsymmetric(
              recipient.publicKey,
              recipient.keyFormat,
              KEY_WRAP_ALGORITHM,
              symmetricKey,
            ),
            algorithm: KEY_WRAP_ALGORITHM,
          };
          keyAttachments.add(
            this.buildAttachment(
              attachments.keyExchange,
              `${attachments.keyExchange.fileName} ${index + 1}`,
              encodeSealedKey(record),
            ),
          );
        });

        this.logger.debug(`Encrypted ${data.length} bytes for ${recipients.length} recipient key(s)`);
        return { keyAttachments, bodyAttachment };
      },
    );
  }

  /**
   * Decrypt a package with the first key attachment whose private key is held locally.
   *
   * @throws {InvalidArgumentError} If the body is empty or there are no key attachments
   * @throws {SecureDataParsingError} If an attachment does not hold a valid record
   * @throws {KeyNotFoundError} If no key attachment matches a local private key
   * @throws {SecureDataDecryptionError} Wrapping any key store failure
   */
  decrypt(securePackage: SecurePackage): Uint8Array {
    const { bodyAttachment, keyAttachments } = securePackage;
    if (bodyAttachment.data.length === 0) {
      throw new InvalidArgumentError('Secure body attachment is empty');
    }
    if (keyAttachments.size === 0) {
      throw new InvalidArgumentError('No secure key attachments');
    }

    const secureData = decodeSecureData(bodyAttachment.data);
    const toDecryptionError = (cause: unknown) => new SecureDataDecryptionError('Failed to decrypt secure data', cause);

    const matches: SealedKeyRecord[] = [];
    for (const attachment of keyAttachments) {
      if (attachment.data.length === 0) {
        continue;
      }
      const record = decodeSealedKey(attachment.data);
      const held = this.withKeyStoreErrors(toDecryptionError, () =>
        this.keyStore.privateKeyExists(record.publicKeyId),
      );
      if (held) {
        matches.push(record);
      }
    }

    const [match] = matches;
    if (match === undefined) {
      throw new KeyNotFoundError('No local private key matches any secure key attachment');
    }
    if (matches.length > 1) {
      this.logger.warn(
        `${matches.length} secure key attachments match local private keys; using ${match.publicKeyId}`,
      );
    }

    return this.withKeyStoreErrors(toDecryptionError, () => {
      const symmetricKey = this.keyStore.decryptAsymmetric(match.publicKeyId, match.algorithm, match.encryptedKey);
      return this.keyStore.decryptSymmetric(symmetricKey, secureData.encryptedData, secureData.initVector);
    });
  }

  /**
   * Encrypt and flatten into message attachments, keys first.
   */
  encryptToAttachments(data: Uint8Array, keys: RecipientPublicKey[]): EmailAttachment[] {
    return toAttachmentList(this.encrypt(data, keys));
  }

  /**
   * Decrypt a received message's attachments.
   *
   * @throws {InvalidArgumentError} If the secure body attachment is missing
   */
  decryptAttachments(attachments: EmailAttachment[]): Uint8Array {
    return this.decrypt(fromAttachmentList(attachments, this.getAttachmentConfig()));
  }

  /**
   * Whether a received message carries a secure body attachment.
   */
  isSecureEmail(attachments: EmailAttachment[]): boolean {
    return isSecurePackage(attachments, this.getAttachmentConfig());
  }

  private distinctRecipients(keys: RecipientPublicKey[]): RecipientPublicKey[] {
    const byKeyId = new Map<string, RecipientPublicKey>();
    for (const key of keys) {
      if (!byKeyId.has(key.keyId)) {
        byKeyId.set(key.keyId, key);
      }
    }
    return [...byKeyId.values()];
  }

  private buildAttachment(config: SecureAttachmentConfig, fileName: string, data: Uint8Array): EmailAttachment {
    return {
      fileName,
      contentId: config.contentId,
      mimeType: config.mimeType,
      inlineAttachment: false,
      data,
    };
  }

  private getAttachmentConfig(): SealMailConfiguration['secureAttachments'] {
    return this.configService.getOrThrow<SealMailConfiguration['secureAttachments']>(
      `${CONFIG_NAMESPACE}.secureAttachments`,
    );
  }

  /**
   * Run key store calls, re-raising their failures as one error type.
   * Errors raised by this SDK outside the key store pass through unchanged.
   */
  private withKeyStoreErrors<T>(wrap: (cause: unknown) => Error, operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      if (isSealedMailError(error) && !(error instanceof KeyStoreError)) {
        throw error;
      }
      this.logger.error(
        `Key store operation failed: ${getErrorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw wrap(error);
    }
  }
}
