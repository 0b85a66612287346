import { Test } from '@nestjs/testing';
import { createSealMailClient } from '../client';
import { InMemoryKeyStore } from '../keys/in-memory-key-store';
import type { KeyStore } from '../keys/interfaces';
import { KEY_STORE } from '../keys/key-store.constants';
import { SealMailModule } from '../sealmail.module';
import { SealingService } from '../sealing/sealing.service';
import { EmailCryptoService } from '../secure-email/email-crypto.service';
import { EmailAddressUnsealer } from '../unsealing/email-address.unsealer';
import { createMockKeyStore } from '../../test/helpers/key-store.mock';
import { silenceNestLogger } from '../../test/helpers/silence-logger';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

describe('SealMailModule', () => {
  const restoreLogger = silenceNestLogger();

  afterAll(() => restoreLogger());

  it('should provide an in-memory key store by default', async () => {
    const module = await Test.createTestingModule({ imports: [SealMailModule.forRoot()] }).compile();

    expect(module.get<KeyStore>(KEY_STORE)).toBeInstanceOf(InMemoryKeyStore);
    expect(module.get(EmailAddressUnsealer)).toBeInstanceOf(EmailAddressUnsealer);
  });

  it('should use the key store it is given', async () => {
    const keyStore = createMockKeyStore();
    keyStore.encryptSymmetricById.mockReturnValue(new Uint8Array([1]));

    const module = await Test.createTestingModule({ imports: [SealMailModule.forRoot({ keyStore })] }).compile();
    module.get(SealingService).seal('sym-1', new Uint8Array([2]));

    expect(module.get<KeyStore>(KEY_STORE)).toBe(keyStore);
    expect(keyStore.encryptSymmetricById).toHaveBeenCalledWith('sym-1', new Uint8Array([2]));
    expect(module.get(EmailCryptoService)).toBeInstanceOf(EmailCryptoService);
  });
});

describe('createSealMailClient', () => {
  const originalLevels = process.env.SEALMAIL_LOG_LEVELS;

  beforeAll(() => {
    process.env.SEALMAIL_LOG_LEVELS = 'error';
  });

  afterAll(() => {
    if (originalLevels === undefined) {
      delete process.env.SEALMAIL_LOG_LEVELS;
    } else {
      process.env.SEALMAIL_LOG_LEVELS = originalLevels;
    }
  });

  it('should encrypt and decrypt a secure email end to end', async () => {
    const keyStore = new InMemoryKeyStore();
    const client = await createSealMailClient({ keyStore });
    try {
      const recipient = keyStore.generateKeyPair('key-a');

      expect(client.keyStore).toBe(keyStore);

      const attachments = client.emailCrypto.encryptToAttachments(encoder.encode('hello world'), [recipient]);

      expect(decoder.decode(client.emailCrypto.decryptAttachments(attachments))).toBe('hello world');
    } finally {
      await client.close();
    }
  });

  it('should fail fast on invalid configuration', async () => {
    process.env.SEALMAIL_RSA_KEY_BITS = '1000';
    try {
      await expect(createSealMailClient()).rejects.toThrow('Invalid SEALMAIL_RSA_KEY_BITS: 1000');
    } finally {
      delete process.env.SEALMAIL_RSA_KEY_BITS;
    }
  });
});
