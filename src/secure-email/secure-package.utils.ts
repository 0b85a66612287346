import type { SealMailConfiguration } from '../config/config.types';
import { InvalidArgumentError } from './email-crypto.errors';
import { EmailAttachment, SecurePackage } from './interfaces';

type SecureAttachmentsConfig = SealMailConfiguration['secureAttachments'];

/**
 * Flatten a package into the attachments of an outgoing message: key attachments first, body last.
 */
export function toAttachmentList(securePackage: SecurePackage): EmailAttachment[] {
  return [...securePackage.keyAttachments, securePackage.bodyAttachment];
}

/**
 * Rebuild a package from received attachments, matching on content id.
 * Attachments of other kinds are ignored.
 *
 * @throws {InvalidArgumentError} If no secure body attachment is present
 */
export function fromAttachmentList(attachments: EmailAttachment[], config: SecureAttachmentsConfig): SecurePackage {
  const bodyAttachment = attachments.find((attachment) => attachment.contentId === config.body.contentId);
  if (!bodyAttachment) {
    throw new InvalidArgumentError('Secure body attachment not found');
  }
  const keyAttachments = new Set(
    attachments.filter((attachment) => attachment.contentId === config.keyExchange.contentId),
  );
  return { keyAttachments, bodyAttachment };
}

export function isSecurePackage(attachments: EmailAttachment[], config: SecureAttachmentsConfig): boolean {
  return attachments.some((attachment) => attachment.contentId === config.body.contentId);
}
