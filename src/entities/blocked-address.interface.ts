import type { SealedValue } from '../sealing/interfaces';

export enum BlockedAddressAction {
  /** Message is dropped and never appears in the account */
  DROP = 'DROP',
  /** Message is delivered to the spam folder, if available */
  SPAM = 'SPAM',
}

export enum BlockedAddressLevel {
  ADDRESS = 'ADDRESS',
  DOMAIN = 'DOMAIN',
}

export enum BlockedAddressHashAlgorithm {
  SHA256 = 'SHA256',
}

export interface SealedBlockedAddress {
  hashedBlockedValue: string;
  hashAlgorithm: BlockedAddressHashAlgorithm;
  sealedValue: SealedValue;
  action: BlockedAddressAction;
  emailAddressId?: string;
}

export type UnsealedBlockedAddressStatus = { type: 'completed' } | { type: 'failed'; cause: Error };

export interface UnsealedBlockedAddress {
  /** Empty when the value could not be unsealed */
  address: string;
  hashedBlockedValue: string;
  action: BlockedAddressAction;
  status: UnsealedBlockedAddressStatus;
  emailAddressId?: string;
}
