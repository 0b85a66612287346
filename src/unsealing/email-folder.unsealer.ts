import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ListResult } from '../entities/list-result.interface';
import type { PartialEmailFolder, SealedEmailFolder, UnsealedEmailFolder } from '../entities/email-folder.interface';
import { KeyStore } from '../keys/interfaces';
import { KEY_STORE } from '../keys/key-store.constants';
import { unsealAttribute } from '../sealing/unsealer';
import type { EntityUnsealer } from './entity-unsealer.interface';
import { unsealList } from './partial-results';

@Injectable()
export class EmailFolderUnsealer implements EntityUnsealer<SealedEmailFolder, UnsealedEmailFolder> {
  private readonly logger = new Logger(EmailFolderUnsealer.name);

  constructor(@Inject(KEY_STORE) private readonly keyStore: KeyStore) {}

  unseal(sealed: SealedEmailFolder): UnsealedEmailFolder {
    const { sealedCustomFolderName, ...folder } = sealed;
    if (sealedCustomFolderName === undefined) {
      return folder;
    }
    return { ...folder, customFolderName: unsealAttribute(this.keyStore, sealedCustomFolderName) };
  }

  unsealList(sealedFolders: SealedEmailFolder[]): ListResult<UnsealedEmailFolder, PartialEmailFolder> {
    return unsealList(sealedFolders, (folder) => this.unseal(folder), toPartialEmailFolder, this.logger);
  }
}

export function toPartialEmailFolder(sealed: SealedEmailFolder): PartialEmailFolder {
  const { sealedCustomFolderName: _sealed, ...partial } = sealed;
  return partial;
}
