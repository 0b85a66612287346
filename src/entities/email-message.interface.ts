import type { SealedValue } from '../sealing/interfaces';
import type { Owner } from './owner.interface';

export type EmailMessageDirection = 'INBOUND' | 'OUTBOUND';

export type EmailMessageState = 'QUEUED' | 'SENT' | 'DELIVERED' | 'UNDELIVERED' | 'FAILED' | 'RECEIVED' | 'DELETED';

export type EncryptionStatus = 'ENCRYPTED' | 'UNENCRYPTED';

export interface EmailMessageAddress {
  emailAddress: string;
  displayName?: string;
}

/**
 * Header fields carried inside the sealed RFC 822 header attribute.
 */
export interface EmailHeaderDetails {
  from: EmailMessageAddress[];
  to: EmailMessageAddress[];
  cc: EmailMessageAddress[];
  bcc: EmailMessageAddress[];
  replyTo: EmailMessageAddress[];
  hasAttachments: boolean;
  subject?: string;
  date?: Date;
  inReplyTo?: string;
  references?: string[];
}

export interface PartialEmailMessage {
  id: string;
  owner: string;
  owners: Owner[];
  emailAddressId: string;
  folderId: string;
  previousFolderId?: string;
  clientRefId?: string;
  direction: EmailMessageDirection;
  state: EmailMessageState;
  seen: boolean;
  repliedTo: boolean;
  forwarded: boolean;
  version: number;
  size: number;
  encryptionStatus: EncryptionStatus;
  sortDate: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface SealedEmailMessage extends PartialEmailMessage {
  rfc822Header: SealedValue;
}

export interface UnsealedEmailMessage extends PartialEmailMessage, EmailHeaderDetails {}
