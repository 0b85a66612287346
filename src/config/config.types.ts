import type { LogLevel } from '@nestjs/common';

/**
 * Metadata stamped on one kind of secure email attachment.
 */
export interface SecureAttachmentConfig {
  fileName: string;
  mimeType: string;
  contentId: string;
}

/**
 * Configuration type definition for type-safe access
 */
export interface SealMailConfiguration {
  environment: string;
  logging: {
    levels: LogLevel[];
    summary: boolean;
  };
  keyStore: {
    rsaKeyBits: number;
  };
  secureAttachments: {
    keyExchange: SecureAttachmentConfig;
    body: SecureAttachmentConfig;
  };
}
