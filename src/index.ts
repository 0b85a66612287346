import 'reflect-metadata';

export { createSealMailClient } from './client';
export type { SealMailClient } from './client';
export { SealMailModule } from './sealmail.module';
export type { SealMailModuleOptions } from './sealmail.module';
export { buildSealMailConfig } from './app.config';
export type { SealMailConfiguration, SecureAttachmentConfig } from './config/config.types';

export { AES_BLOCK_SIZE, KeyStore, PublicKey, PublicKeyEncryptionAlgorithm, PublicKeyFormat } from './keys/interfaces';
export { InMemoryKeyStore } from './keys/in-memory-key-store';
export type { InMemoryKeyStoreOptions } from './keys/in-memory-key-store';
export { KeyStoreError } from './keys/key-store.error';
export { KEY_STORE } from './keys/key-store.constants';

export { KeyDescriptor, KeyKind, SealedValue } from './sealing/interfaces';
export { SymmetricKeyEncryptionAlgorithm, DEFAULT_PUBLIC_KEY_ALGORITHM } from './sealing/algorithms';
export { Unsealer, unsealAttribute } from './sealing/unsealer';
export { SealingService } from './sealing/sealing.service';
export {
  SealedDataEncodingError,
  SealedDataTooShortError,
  SealingDecryptionError,
  SealingEncryptionError,
  UnsupportedAlgorithmError,
} from './sealing/unsealer.errors';

export { EmailCryptoService } from './secure-email/email-crypto.service';
export {
  EmailAttachment,
  RecipientPublicKey,
  SealedKeyRecord,
  SecureData,
  SecurePackage,
} from './secure-email/interfaces';
export { fromAttachmentList, isSecurePackage, toAttachmentList } from './secure-email/secure-package.utils';
export {
  SecureDataDecryptionError,
  SecureDataEncryptionError,
  SecureDataParsingError,
} from './secure-email/email-crypto.errors';

export { EntityUnsealer } from './unsealing/entity-unsealer.interface';
export { EmailFolderUnsealer } from './unsealing/email-folder.unsealer';
export { EmailAddressUnsealer } from './unsealing/email-address.unsealer';
export { EmailMessageUnsealer } from './unsealing/email-message.unsealer';
export { unsealList } from './unsealing/partial-results';

export { BlocklistSealingService, hashBlockedValue } from './blocklist/blocklist-sealing.service';
export type { SealBlockedAddressesRequest } from './blocklist/blocklist-sealing.service';

export * from './entities/owner.interface';
export * from './entities/email-folder.interface';
export * from './entities/email-address.interface';
export * from './entities/email-message.interface';
export * from './entities/blocked-address.interface';
export * from './entities/list-result.interface';

export {
  InvalidArgumentError,
  KeyNotFoundError,
  SealedMailError,
  SealedMailErrorKind,
  isSealedMailError,
} from './shared/sealed-mail.error';
