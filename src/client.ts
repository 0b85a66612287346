import { Logger } from '@nestjs/common';
import type { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { buildSealMailConfig } from './app.config';
import { BlocklistSealingService } from './blocklist/blocklist-sealing.service';
import { logConfigurationSummary } from './config/config.utils';
import type { KeyStore } from './keys/interfaces';
import { KEY_STORE } from './keys/key-store.constants';
import { SealMailModule, SealMailModuleOptions } from './sealmail.module';
import { SealingService } from './sealing/sealing.service';
import { EmailCryptoService } from './secure-email/email-crypto.service';
import { EmailAddressUnsealer } from './unsealing/email-address.unsealer';
import { EmailFolderUnsealer } from './unsealing/email-folder.unsealer';
import { EmailMessageUnsealer } from './unsealing/email-message.unsealer';

export interface SealMailClient {
  keyStore: KeyStore;
  sealing: SealingService;
  emailCrypto: EmailCryptoService;
  folders: EmailFolderUnsealer;
  addresses: EmailAddressUnsealer;
  messages: EmailMessageUnsealer;
  blocklist: BlocklistSealingService;
  /** Dispose of the underlying application context. */
  close(): Promise<void>;
}

/**
 * Create a standalone client with every SDK service resolved.
 *
 * Configuration is read from the environment; invalid values fail here, before any
 * service is used.
 */
export async function createSealMailClient(options: SealMailModuleOptions = {}): Promise<SealMailClient> {
  const logger = new Logger('SealMailClient');
  const config = buildSealMailConfig();

  const app: INestApplicationContext = await NestFactory.createApplicationContext(SealMailModule.forRoot(options), {
    logger: config.logging.levels,
  });

  if (config.logging.summary) {
    logConfigurationSummary(config);
  }
  logger.debug(`Client ready (${options.keyStore ? 'provided' : 'in-memory'} key store)`);

  return {
    keyStore: app.get<KeyStore>(KEY_STORE),
    sealing: app.get(SealingService),
    emailCrypto: app.get(EmailCryptoService),
    folders: app.get(EmailFolderUnsealer),
    addresses: app.get(EmailAddressUnsealer),
    messages: app.get(EmailMessageUnsealer),
    blocklist: app.get(BlocklistSealingService),
    close: () => app.close(),
  };
}
