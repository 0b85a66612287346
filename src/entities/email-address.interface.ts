import type { SealedValue } from '../sealing/interfaces';
import type { PartialEmailFolder, SealedEmailFolder, UnsealedEmailFolder } from './email-folder.interface';
import type { Owner } from './owner.interface';

interface EmailAddressFields {
  id: string;
  owner: string;
  owners: Owner[];
  emailAddress: string;
  size: number;
  numberOfEmailMessages: number;
  version: number;
  createdAt: Date;
  updatedAt: Date;
  lastReceivedAt?: Date;
}

export interface SealedEmailAddress extends EmailAddressFields {
  sealedAlias?: SealedValue;
  folders: SealedEmailFolder[];
}

export interface UnsealedEmailAddress extends EmailAddressFields {
  alias?: string;
  folders: UnsealedEmailFolder[];
}

/** An email address whose sealed fields could not be read. */
export interface PartialEmailAddress extends EmailAddressFields {
  folders: PartialEmailFolder[];
}
