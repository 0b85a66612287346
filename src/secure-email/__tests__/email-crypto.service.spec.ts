import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { InMemoryKeyStore } from '../../keys/in-memory-key-store';
import { AES_BLOCK_SIZE, KeyStore, PublicKeyEncryptionAlgorithm, PublicKeyFormat } from '../../keys/interfaces';
import { KEY_STORE } from '../../keys/key-store.constants';
import { KeyStoreError } from '../../keys/key-store.error';
import { encodeBase64 } from '../../shared/encoding.utils';
import { EmailCryptoService } from '../email-crypto.service';
import {
  InvalidArgumentError,
  KeyNotFoundError,
  SecureDataDecryptionError,
  SecureDataEncryptionError,
  SecureDataParsingError,
} from '../email-crypto.errors';
import { EmailAttachment, RecipientPublicKey, SecurePackage } from '../interfaces';
import { decodeSealedKey } from '../sealed-key.codec';
import { createTestConfigService } from '../../../test/helpers/config';
import { countKeyStoreCalls, createMockKeyStore } from '../../../test/helpers/key-store.mock';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

async function createService(keyStore: KeyStore): Promise<EmailCryptoService> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      EmailCryptoService,
      { provide: KEY_STORE, useValue: keyStore },
      { provide: ConfigService, useValue: createTestConfigService() },
    ],
  }).compile();

  return module.get<EmailCryptoService>(EmailCryptoService);
}

function jsonAttachment(template: EmailAttachment, value: unknown): EmailAttachment {
  return { ...template, data: encoder.encode(JSON.stringify(value)) };
}

describe('EmailCryptoService', () => {
  const restoreLogger = silenceNestLogger();

  afterAll(() => restoreLogger());

  describe('with the in-memory key store', () => {
    let keyStore: InMemoryKeyStore;
    let service: EmailCryptoService;
    let recipientA: RecipientPublicKey;
    let recipientB: RecipientPublicKey;

    beforeEach(async () => {
      keyStore = new InMemoryKeyStore();
      recipientA = keyStore.generateKeyPair('key-a');
      recipientB = keyStore.generateKeyPair('key-b');
      service = await createService(keyStore);
    });

    it('should produce one key attachment per recipient and one body attachment', () => {
      const securePackage = service.encrypt(encoder.encode('hello world'), [recipientA, recipientB]);
      const keyAttachments = [...securePackage.keyAttachments];

      expect(keyAttachments).toHaveLength(2);
      expect(keyAttachments.map((attachment) => attachment.fileName)).toEqual(['Secure Data 1', 'Secure Data 2']);
      expect(keyAttachments.map((attachment) => decodeSealedKey(attachment.data).publicKeyId)).toEqual([
        'key-a',
        'key-b',
      ]);
      expect(keyAttachments[0]).toMatchObject({
        contentId: 'securekeyexchangedata@sealmail.local',
        mimeType: 'application/x-sealmail-key',
        inlineAttachment: false,
      });
      expect(securePackage.bodyAttachment).toMatchObject({
        fileName: 'Secure Email',
        contentId: 'securebody@sealmail.local',
        mimeType: 'application/x-sealmail-body',
        inlineAttachment: false,
      });
    });

    it('should write the documented JSON records', () => {
      const securePackage = service.encrypt(encoder.encode('hello world'), [recipientA]);
      const [keyAttachment] = [...securePackage.keyAttachments];

      const body: unknown = JSON.parse(decoder.decode(securePackage.bodyAttachment.data));
      const key: unknown = JSON.parse(decoder.decode(keyAttachment.data));

      expect(Object.keys(Object(body)).sort()).toEqual(['encryptedData', 'initVectorKeyID']);
      expect(key).toMatchObject({ publicKeyId: 'key-a', algorithm: 'RSA_ECB_OAEPSHA1' });
    });

    it('should wrap the key once per distinct key id', () => {
      const encryptAsymmetric = jest.spyOn(keyStore, 'encryptAsymmetric');

      const securePackage = service.encrypt(encoder.encode('hello world'), [recipientA, { ...recipientA }]);

      expect(securePackage.keyAttachments.size).toBe(1);
      expect(encryptAsymmetric).toHaveBeenCalledTimes(1);
    });

    it('should decrypt with only the second recipient key held', () => {
      const securePackage = service.encrypt(encoder.encode('hello world'), [recipientA, recipientB]);
      keyStore.deleteKeyPair('key-a');

      expect(decoder.decode(service.decrypt(securePackage))).toBe('hello world');
    });

    it('should still decrypt via the first recipient when the second key is dropped', () => {
      const securePackage = service.encrypt(encoder.encode('hello world'), [recipientA, recipientB]);
      keyStore.deleteKeyPair('key-b');

      expect(decoder.decode(service.decrypt(securePackage))).toBe('hello world');
    });

    it('should fail with KeyNotFoundError when no recipient key is held', () => {
      const securePackage = service.encrypt(encoder.encode('hello world'), [recipientA, recipientB]);
      keyStore.removeAllKeys();

      expect(() => service.decrypt(securePackage)).toThrow(KeyNotFoundError);
    });

    it('should use the first matching attachment and warn when several match', () => {
      const warn = jest.spyOn(Logger.prototype, 'warn');
      warn.mockClear();
      const decryptAsymmetric = jest.spyOn(keyStore, 'decryptAsymmetric');
      const securePackage = service.encrypt(encoder.encode('hello world'), [recipientA, recipientB]);

      expect(decoder.decode(service.decrypt(securePackage))).toBe('hello world');
      expect(decryptAsymmetric).toHaveBeenCalledTimes(1);
      expect(decryptAsymmetric.mock.calls[0][0]).toBe('key-a');
      expect(warn).toHaveBeenCalledWith('2 secure key attachments match local private keys; using key-a');
    });

    it('should skip empty key attachments', () => {
      const securePackage = service.encrypt(encoder.encode('hello world'), [recipientB]);
      const [keyAttachment] = [...securePackage.keyAttachments];
      const withEmpty: SecurePackage = {
        bodyAttachment: securePackage.bodyAttachment,
        keyAttachments: new Set([{ ...keyAttachment, fileName: 'Secure Data 0', data: new Uint8Array(0) }, keyAttachment]),
      };

      expect(decoder.decode(service.decrypt(withEmpty))).toBe('hello world');
    });

    it('should round-trip through a message attachment list', () => {
      const attachments = service.encryptToAttachments(encoder.encode('hello world'), [recipientA, recipientB]);
      const unrelated: EmailAttachment = {
        fileName: 'photo.png',
        contentId: 'photo@example.com',
        mimeType: 'image/png',
        inlineAttachment: true,
        data: new Uint8Array([1]),
      };

      expect(attachments.map((attachment) => attachment.fileName)).toEqual([
        'Secure Data 1',
        'Secure Data 2',
        'Secure Email',
      ]);
      expect(service.isSecureEmail([unrelated, ...attachments])).toBe(true);
      expect(service.isSecureEmail([unrelated])).toBe(false);
      expect(decoder.decode(service.decryptAttachments([unrelated, ...attachments]))).toBe('hello world');
    });

    describe('malformed packages', () => {
      let securePackage: SecurePackage;
      let keyAttachment: EmailAttachment;

      beforeEach(() => {
        securePackage = service.encrypt(encoder.encode('hello world'), [recipientA]);
        [keyAttachment] = [...securePackage.keyAttachments];
      });

      it('should reject a body that is not JSON', () => {
        const corrupt: SecurePackage = {
          ...securePackage,
          bodyAttachment: { ...securePackage.bodyAttachment, data: encoder.encode('not json') },
        };

        expect(() => service.decrypt(corrupt)).toThrow(SecureDataParsingError);
      });

      it('should reject a body whose IV is not 16 bytes', () => {
        const corrupt: SecurePackage = {
          ...securePackage,
          bodyAttachment: jsonAttachment(securePackage.bodyAttachment, {
            encryptedData: encodeBase64(new Uint8Array(16)),
            initVectorKeyID: encodeBase64(new Uint8Array(8)),
          }),
        };

        expect(() => service.decrypt(corrupt)).toThrow(
          'Malformed secure data: IV must be 16 bytes, got 8',
        );
      });

      it('should reject a key record with an unknown algorithm', () => {
        const corrupt: SecurePackage = {
          ...securePackage,
          keyAttachments: new Set([
            jsonAttachment(keyAttachment, {
              publicKeyId: 'key-a',
              encryptedKey: encodeBase64(new Uint8Array(256)),
              algorithm: 'RSA_ECB_NOPADDING',
            }),
          ]),
        };

        expect(() => service.decrypt(corrupt)).toThrow('Malformed sealed key: invalid algorithm');
      });

      it('should wrap an unwrap failure as SecureDataDecryptionError with its cause', () => {
        const corrupt: SecurePackage = {
          ...securePackage,
          keyAttachments: new Set([
            jsonAttachment(keyAttachment, {
              publicKeyId: 'key-a',
              encryptedKey: encodeBase64(new Uint8Array(256)),
              algorithm: PublicKeyEncryptionAlgorithm.RSA_ECB_OAEPSHA1,
            }),
          ]),
        };

        let caught: unknown;
        try {
          service.decrypt(corrupt);
        } catch (error) {
          caught = error;
        }

        expect(caught).toBeInstanceOf(SecureDataDecryptionError);
        expect(caught instanceof Error && caught.cause).toBeInstanceOf(KeyStoreError);
      });
    });
  });

  describe('with a mock key store', () => {
    let keyStore: jest.Mocked<KeyStore>;
    let service: EmailCryptoService;
    const recipient: RecipientPublicKey = {
      keyId: 'key-a',
      keyFormat: PublicKeyFormat.SPKI,
      publicKey: new Uint8Array([1, 2, 3]),
    };

    beforeEach(async () => {
      keyStore = createMockKeyStore();
      service = await createService(keyStore);
    });

    it('should reject empty data without touching the key store', () => {
      expect(() => service.encrypt(new Uint8Array(0), [recipient])).toThrow(InvalidArgumentError);
      expect(countKeyStoreCalls(keyStore)).toBe(0);
    });

    it('should reject an empty recipient list without touching the key store', () => {
      expect(() => service.encrypt(encoder.encode('hello world'), [])).toThrow(InvalidArgumentError);
      expect(countKeyStoreCalls(keyStore)).toBe(0);
    });

    it('should reject a package with an empty body or no key attachments', () => {
      const body: EmailAttachment = {
        fileName: 'Secure Email',
        contentId: 'securebody@sealmail.local',
        mimeType: 'application/x-sealmail-body',
        inlineAttachment: false,
        data: new Uint8Array(0),
      };
      const key: EmailAttachment = { ...body, fileName: 'Secure Data 1', data: new Uint8Array([1]) };

      expect(() => service.decrypt({ bodyAttachment: body, keyAttachments: new Set([key]) })).toThrow(
        'Secure body attachment is empty',
      );
      expect(() =>
        service.decrypt({ bodyAttachment: { ...body, data: new Uint8Array([1]) }, keyAttachments: new Set() }),
      ).toThrow('No secure key attachments');
      expect(countKeyStoreCalls(keyStore)).toBe(0);
    });

    it('should wrap key store failures as SecureDataEncryptionError with the original cause', () => {
      const failure = new Error('no entropy');
      keyStore.generateRandomSymmetricKey.mockImplementation(() => {
        throw failure;
      });

      let caught: unknown;
      try {
        service.encrypt(encoder.encode('hello world'), [recipient]);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SecureDataEncryptionError);
      expect(caught).toMatchObject({ kind: 'encryption', cause: failure });
    });

    it('should wrap the fixed OAEP-SHA1 algorithm for every recipient', () => {
      keyStore.generateRandomSymmetricKey.mockReturnValue(new Uint8Array(32));
      keyStore.randomBytes.mockReturnValue(new Uint8Array(16));
      keyStore.encryptSymmetric.mockReturnValue(new Uint8Array(16));
      keyStore.encryptAsymmetric.mockReturnValue(new Uint8Array(256));

      service.encrypt(encoder.encode('hello world'), [recipient]);

      expect(AES_BLOCK_SIZE).toBe(16);
      expect(keyStore.randomBytes).toHaveBeenCalledWith(AES_BLOCK_SIZE);
      expect(keyStore.encryptAsymmetric).toHaveBeenCalledWith(
        recipient.publicKey,
        recipient.keyFormat,
        PublicKeyEncryptionAlgorithm.RSA_ECB_OAEPSHA1,
        new Uint8Array(32),
      );
    });
  });
});
