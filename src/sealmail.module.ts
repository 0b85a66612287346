import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import appConfig from './app.config';
import { BlocklistSealingService } from './blocklist/blocklist-sealing.service';
import { CONFIG_NAMESPACE } from './config/config.constants';
import { InMemoryKeyStore } from './keys/in-memory-key-store';
import type { KeyStore } from './keys/interfaces';
import { KEY_STORE } from './keys/key-store.constants';
import { SealingService } from './sealing/sealing.service';
import { EmailCryptoService } from './secure-email/email-crypto.service';
import { EmailAddressUnsealer } from './unsealing/email-address.unsealer';
import { EmailFolderUnsealer } from './unsealing/email-folder.unsealer';
import { EmailMessageUnsealer } from './unsealing/email-message.unsealer';

export interface SealMailModuleOptions {
  /** Key store to use. Defaults to an {@link InMemoryKeyStore} sized from configuration. */
  keyStore?: KeyStore;
}

const SERVICES = [
  SealingService,
  EmailCryptoService,
  EmailFolderUnsealer,
  EmailAddressUnsealer,
  EmailMessageUnsealer,
  BlocklistSealingService,
];

@Module({})
export class SealMailModule {
  static forRoot(options: SealMailModuleOptions = {}): DynamicModule {
    const { keyStore } = options;
    const keyStoreProvider =
      keyStore === undefined
        ? {
            provide: KEY_STORE,
            inject: [ConfigService],
            useFactory: (config: ConfigService): KeyStore =>
              new InMemoryKeyStore({
                rsaKeyBits: config.getOrThrow<number>(`${CONFIG_NAMESPACE}.keyStore.rsaKeyBits`),
              }),
          }
        : { provide: KEY_STORE, useValue: keyStore };

    return {
      module: SealMailModule,
      imports: [ConfigModule.forRoot({ load: [appConfig], ignoreEnvFile: true })],
      providers: [keyStoreProvider, ...SERVICES],
      exports: [KEY_STORE, ConfigModule, ...SERVICES],
    };
  }
}
