import { plainToInstance } from 'class-transformer';
import type { ClassConstructor } from 'class-transformer';
import { validateSync } from 'class-validator';
import { utf8Decode } from '../shared/encoding.utils';
import { getErrorMessage } from '../shared/error.utils';
import { SecureDataParsingError } from './email-crypto.errors';

/**
 * Parse UTF-8 JSON bytes into a validated DTO instance.
 *
 * @throws {SecureDataParsingError} On malformed JSON, a non-object payload, or failed validation
 */
export function parseJsonRecord<T extends object>(dtoClass: ClassConstructor<T>, data: Uint8Array, label: string): T {
  let plain: unknown;
  try {
    plain = JSON.parse(utf8Decode(data));
  } catch (error) {
    throw new SecureDataParsingError(`Malformed ${label} JSON: ${getErrorMessage(error)}`, error);
  }

  if (typeof plain !== 'object' || plain === null || Array.isArray(plain)) {
    throw new SecureDataParsingError(`Malformed ${label}: expected a JSON object`);
  }

  const instance = plainToInstance(dtoClass, plain);
  const errors = validateSync(instance, { forbidUnknownValues: true });
  if (errors.length > 0) {
    const properties = errors.map((error) => error.property).join(', ');
    throw new SecureDataParsingError(`Malformed ${label}: invalid ${properties}`);
  }
  return instance;
}
