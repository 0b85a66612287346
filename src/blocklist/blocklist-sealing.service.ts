import { Inject, Injectable, Logger } from '@nestjs/common';
import { createHash } from 'crypto';
import {
  BlockedAddressAction,
  BlockedAddressHashAlgorithm,
  BlockedAddressLevel,
  SealedBlockedAddress,
  UnsealedBlockedAddress,
} from '../entities/blocked-address.interface';
import { KeyStore } from '../keys/interfaces';
import { KEY_STORE } from '../keys/key-store.constants';
import { SealingService } from '../sealing/sealing.service';
import { unsealAttribute } from '../sealing/unsealer';
import { getErrorMessage } from '../shared/error.utils';
import { InvalidArgumentError, KeyNotFoundError } from '../shared/sealed-mail.error';
import { getDomain, normalizeEmailAddress } from './email-address.utils';

export interface SealBlockedAddressesRequest {
  owner: string;
  /** Scopes the block to one email address instead of every address of the owner */
  emailAddressId?: string;
  addresses: string[];
  level: BlockedAddressLevel;
  action: BlockedAddressAction;
  symmetricKeyId: string;
}

/**
 * Hash of a blocked value as looked up by the mail service: base64 SHA-256 of `prefix|value`.
 */
export function hashBlockedValue(prefix: string, value: string): string {
  return createHash('sha256').update(`${prefix}|${value}`, 'utf8').digest('base64');
}

/**
 * Prepares blocklist entries for storage and reads them back.
 */
@Injectable()
export class BlocklistSealingService {
  private readonly logger = new Logger(BlocklistSealingService.name);

  constructor(
    @Inject(KEY_STORE) private readonly keyStore: KeyStore,
    private readonly sealingService: SealingService,
  ) {}

  /**
   * Normalize, hash and seal the given addresses.
   *
   * @throws {InvalidArgumentError} If the list is empty, any address is invalid, or two addresses normalize to the same value
   * @throws {SealingEncryptionError} If a value cannot be sealed
   */
  sealBlockedAddresses(request: SealBlockedAddressesRequest): SealedBlockedAddress[] {
    if (request.addresses.length === 0) {
      throw new InvalidArgumentError('At least one address must be provided');
    }

    const values = new Set<string>();
    for (const address of request.addresses) {
      const normalized = normalizeEmailAddress(address);
      if (normalized === undefined) {
        throw new InvalidArgumentError(`Invalid email address: ${address}`);
      }
      const value = request.level === BlockedAddressLevel.DOMAIN ? getDomain(normalized) : normalized;
      if (values.has(value)) {
        throw new InvalidArgumentError(`Duplicate blocked value: ${value}`);
      }
      values.add(value);
    }

    const prefix = request.emailAddressId ?? request.owner;
    return [...values].map((value) => {
      const blocked: SealedBlockedAddress = {
        hashedBlockedValue: hashBlockedValue(prefix, value),
        hashAlgorithm: BlockedAddressHashAlgorithm.SHA256,
        sealedValue: this.sealingService.sealAttribute(request.symmetricKeyId, value),
        action: request.action,
      };
      if (request.emailAddressId !== undefined) {
        blocked.emailAddressId = request.emailAddressId;
      }
      return blocked;
    });
  }

  /**
   * Unseal stored blocklist entries. Entries that cannot be unsealed are returned with a
   * failed status and an empty address.
   */
  unsealBlocklist(sealedItems: SealedBlockedAddress[]): UnsealedBlockedAddress[] {
    return sealedItems.map((item): UnsealedBlockedAddress => {
      const base = {
        hashedBlockedValue: item.hashedBlockedValue,
        action: item.action,
        ...(item.emailAddressId === undefined ? {} : { emailAddressId: item.emailAddressId }),
      };
      try {
        if (!this.keyStore.symmetricKeyExists(item.sealedValue.keyId)) {
          throw new KeyNotFoundError(`Symmetric key not found: ${item.sealedValue.keyId}`);
        }
        const address = unsealAttribute(this.keyStore, item.sealedValue);
        return { ...base, address, status: { type: 'completed' } };
      } catch (error) {
        this.logger.warn(`Failed to unseal blocked address ${item.hashedBlockedValue}: ${getErrorMessage(error)}`);
        const cause = error instanceof Error ? error : new Error(getErrorMessage(error));
        return { ...base, address: '', status: { type: 'failed', cause } };
      }
    });
  }
}
