import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  PartialEmailAddress,
  SealedEmailAddress,
  UnsealedEmailAddress,
} from '../entities/email-address.interface';
import type { ListResult } from '../entities/list-result.interface';
import { KeyStore } from '../keys/interfaces';
import { KEY_STORE } from '../keys/key-store.constants';
import { unsealAttribute } from '../sealing/unsealer';
import { EmailFolderUnsealer, toPartialEmailFolder } from './email-folder.unsealer';
import type { EntityUnsealer } from './entity-unsealer.interface';
import { unsealList } from './partial-results';

/**
 * Unseals an email address alias and every folder it owns.
 */
@Injectable()
export class EmailAddressUnsealer implements EntityUnsealer<SealedEmailAddress, UnsealedEmailAddress> {
  private readonly logger = new Logger(EmailAddressUnsealer.name);

  constructor(
    @Inject(KEY_STORE) private readonly keyStore: KeyStore,
    private readonly folderUnsealer: EmailFolderUnsealer,
  ) {}

  unseal(sealed: SealedEmailAddress): UnsealedEmailAddress {
    const { sealedAlias, folders, ...address } = sealed;
    const unsealedFolders = folders.map((folder) => this.folderUnsealer.unseal(folder));
    if (sealedAlias === undefined) {
      return { ...address, folders: unsealedFolders };
    }
    return { ...address, alias: unsealAttribute(this.keyStore, sealedAlias), folders: unsealedFolders };
  }

  unsealList(sealedAddresses: SealedEmailAddress[]): ListResult<UnsealedEmailAddress, PartialEmailAddress> {
    return unsealList(sealedAddresses, (address) => this.unseal(address), toPartialEmailAddress, this.logger);
  }
}

function toPartialEmailAddress(sealed: SealedEmailAddress): PartialEmailAddress {
  const { sealedAlias: _sealed, folders, ...partial } = sealed;
  return { ...partial, folders: folders.map(toPartialEmailFolder) };
}
