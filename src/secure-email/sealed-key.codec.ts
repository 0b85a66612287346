import { decodeBase64, encodeBase64, utf8Encode } from '../shared/encoding.utils';
import { SealedKeyDto } from './dto/sealed-key.dto';
import { SecureDataParsingError } from './email-crypto.errors';
import { SealedKeyRecord } from './interfaces';
import { parseJsonRecord } from './json-record.codec';

export function encodeSealedKey(record: SealedKeyRecord): Uint8Array {
  return utf8Encode(
    JSON.stringify({
      publicKeyId: record.publicKeyId,
      encryptedKey: encodeBase64(record.encryptedKey),
      algorithm: record.algorithm,
    }),
  );
}

/**
 * @throws {SecureDataParsingError} If the JSON is malformed or names an unknown algorithm
 */
export function decodeSealedKey(data: Uint8Array): SealedKeyRecord {
  const dto = parseJsonRecord(SealedKeyDto, data, 'sealed key');
  const encryptedKey = decodeBase64(dto.encryptedKey);
  if (encryptedKey === undefined) {
    throw new SecureDataParsingError('Malformed sealed key: invalid Base64');
  }
  return { publicKeyId: dto.publicKeyId, encryptedKey, algorithm: dto.algorithm };
}
