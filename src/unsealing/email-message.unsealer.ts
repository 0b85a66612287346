import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  EmailHeaderDetails,
  EmailMessageAddress,
  PartialEmailMessage,
  SealedEmailMessage,
  UnsealedEmailMessage,
} from '../entities/email-message.interface';
import type { ListResult } from '../entities/list-result.interface';
import { KeyStore } from '../keys/interfaces';
import { KEY_STORE } from '../keys/key-store.constants';
import { KeyKind } from '../sealing/interfaces';
import { Unsealer } from '../sealing/unsealer';
import { parseJsonRecord } from '../secure-email/json-record.codec';
import { utf8Encode } from '../shared/encoding.utils';
import { EmailHeaderDetailsDto, EmailMessageAddressDto } from './dto/email-header-details.dto';
import type { EntityUnsealer } from './entity-unsealer.interface';
import { unsealList } from './partial-results';

function toAddresses(addresses: EmailMessageAddressDto[] | undefined): EmailMessageAddress[] {
  return (addresses ?? []).map(({ emailAddress, displayName }) =>
    displayName === undefined ? { emailAddress } : { emailAddress, displayName },
  );
}

function toHeaderDetails(dto: EmailHeaderDetailsDto): EmailHeaderDetails {
  const details: EmailHeaderDetails = {
    from: toAddresses(dto.from),
    to: toAddresses(dto.to),
    cc: toAddresses(dto.cc),
    bcc: toAddresses(dto.bcc),
    replyTo: toAddresses(dto.replyTo),
    hasAttachments: dto.hasAttachments ?? false,
  };
  if (dto.subject !== undefined) details.subject = dto.subject;
  if (dto.date !== undefined) details.date = new Date(dto.date);
  if (dto.inReplyTo !== undefined) details.inReplyTo = dto.inReplyTo;
  if (dto.references !== undefined) details.references = dto.references;
  return details;
}

/**
 * Unseals message headers, which are sealed with the recipient key pair rather than a
 * symmetric key, and raw RFC 822 message data.
 */
@Injectable()
export class EmailMessageUnsealer implements EntityUnsealer<SealedEmailMessage, UnsealedEmailMessage> {
  private readonly logger = new Logger(EmailMessageUnsealer.name);

  constructor(@Inject(KEY_STORE) private readonly keyStore: KeyStore) {}

  /**
   * @throws {SecureDataParsingError} If the unsealed header is not valid header JSON
   */
  unseal(sealed: SealedEmailMessage): UnsealedEmailMessage {
    const { rfc822Header, ...message } = sealed;
    const unsealer = new Unsealer(this.keyStore, {
      keyId: rfc822Header.keyId,
      keyKind: KeyKind.ASYMMETRIC,
      algorithm: rfc822Header.algorithm,
    });
    const headerJson = unsealer.unseal(rfc822Header.base64EncodedSealedData);
    const dto = parseJsonRecord(EmailHeaderDetailsDto, utf8Encode(headerJson), 'email header');

    return { ...message, ...toHeaderDetails(dto) };
  }

  unsealList(sealedMessages: SealedEmailMessage[]): ListResult<UnsealedEmailMessage, PartialEmailMessage> {
    return unsealList(sealedMessages, (message) => this.unseal(message), toPartialEmailMessage, this.logger);
  }

  /**
   * Unseal raw RFC 822 data stored as Base64 text in an asymmetric envelope.
   */
  unsealRfc822Data(keyId: string, algorithm: string, sealedData: Uint8Array): Uint8Array {
    const unsealer = new Unsealer(this.keyStore, { keyId, keyKind: KeyKind.ASYMMETRIC, algorithm });
    const data = unsealer.unsealBytes(sealedData);
    this.logger.debug(`Unsealed ${data.length} bytes of RFC 822 data with key ${keyId}`);
    return data;
  }
}

function toPartialEmailMessage(sealed: SealedEmailMessage): PartialEmailMessage {
  const { rfc822Header: _sealed, ...partial } = sealed;
  return partial;
}
