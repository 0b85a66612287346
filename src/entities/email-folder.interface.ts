import type { SealedValue } from '../sealing/interfaces';
import type { Owner } from './owner.interface';

/**
 * Fields shared by every representation of an email folder.
 */
export interface PartialEmailFolder {
  id: string;
  owner: string;
  owners: Owner[];
  emailAddressId: string;
  folderName: string;
  size: number;
  unseenCount: number;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface SealedEmailFolder extends PartialEmailFolder {
  sealedCustomFolderName?: SealedValue;
}

export interface UnsealedEmailFolder extends PartialEmailFolder {
  customFolderName?: string;
}
