import { AES_BLOCK_SIZE } from '../keys/interfaces';
import { decodeBase64, encodeBase64, utf8Encode } from '../shared/encoding.utils';
import { SecureDataDto } from './dto/secure-data.dto';
import { SecureDataParsingError } from './email-crypto.errors';
import { SecureData } from './interfaces';
import { parseJsonRecord } from './json-record.codec';

export function encodeSecureData(secureData: SecureData): Uint8Array {
  return utf8Encode(
    JSON.stringify({
      encryptedData: encodeBase64(secureData.encryptedData),
      initVectorKeyID: encodeBase64(secureData.initVector),
    }),
  );
}

/**
 * @throws {SecureDataParsingError} If the JSON is malformed or the IV is not one AES block
 */
export function decodeSecureData(data: Uint8Array): SecureData {
  const dto = parseJsonRecord(SecureDataDto, data, 'secure data');
  const encryptedData = decodeBase64(dto.encryptedData);
  const initVector = decodeBase64(dto.initVectorKeyID);

  if (encryptedData === undefined || initVector === undefined) {
    throw new SecureDataParsingError('Malformed secure data: invalid Base64');
  }
  if (initVector.length !== AES_BLOCK_SIZE) {
    throw new SecureDataParsingError(`Malformed secure data: IV must be ${AES_BLOCK_SIZE} bytes, got ${initVector.length}`);
  }
  return { encryptedData, initVector };
}
