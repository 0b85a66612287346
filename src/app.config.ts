import { registerAs } from '@nestjs/config';
import * as process from 'process';
import {
  CONFIG_NAMESPACE,
  DEFAULT_LOG_LEVELS,
  DEVELOPMENT_LOG_LEVELS,
  DEFAULT_RSA_KEY_BITS,
  DEFAULT_SECURE_KEY_FILE_NAME,
  DEFAULT_SECURE_KEY_MIME_TYPE,
  DEFAULT_SECURE_KEY_CONTENT_ID,
  DEFAULT_SECURE_BODY_FILE_NAME,
  DEFAULT_SECURE_BODY_MIME_TYPE,
  DEFAULT_SECURE_BODY_CONTENT_ID,
} from './config/config.constants';
import {
  parseLogLevels,
  parseNumberWithDefault,
  parseOptionalBoolean,
  parseStringWithDefault,
} from './config/config.parsers';
import { validateRsaKeyBits, validateSecureAttachment } from './config/config.validators';
import type { SealMailConfiguration } from './config/config.types';

/**
 * Builds logging configuration.
 *
 * Optional environment variables:
 * - SEALMAIL_LOG_LEVELS: Comma-separated NestJS log levels (default: log,error,warn;
 *   development adds debug,verbose)
 * - SEALMAIL_LOG_CONFIG_SUMMARY: Log the resolved configuration when a client is created (default: false)
 */
function buildLoggingConfig(environment: string): SealMailConfiguration['logging'] {
  const defaults = environment === 'development' ? DEVELOPMENT_LOG_LEVELS : DEFAULT_LOG_LEVELS;

  return {
    levels: parseLogLevels(process.env.SEALMAIL_LOG_LEVELS, defaults),
    summary: parseOptionalBoolean(process.env.SEALMAIL_LOG_CONFIG_SUMMARY, false),
  };
}

/**
 * Builds in-memory key store configuration.
 *
 * Optional environment variables:
 * - SEALMAIL_RSA_KEY_BITS: Modulus size of generated key pairs (default: 2048)
 */
function buildKeyStoreConfig(): SealMailConfiguration['keyStore'] {
  const rsaKeyBits = parseNumberWithDefault(process.env.SEALMAIL_RSA_KEY_BITS, DEFAULT_RSA_KEY_BITS);
  validateRsaKeyBits(rsaKeyBits);

  return { rsaKeyBits };
}

/**
 * Builds the metadata stamped on secure email attachments.
 *
 * Optional environment variables:
 * - SEALMAIL_SECURE_KEY_FILE_NAME / _MIME_TYPE / _CONTENT_ID: key exchange attachments
 * - SEALMAIL_SECURE_BODY_FILE_NAME / _MIME_TYPE / _CONTENT_ID: body attachment
 *
 * @throws {Error} If a MIME type or content id is malformed, or both kinds share a content id
 */
function buildSecureAttachmentsConfig(): SealMailConfiguration['secureAttachments'] {
  const keyExchange = {
    fileName: parseStringWithDefault(process.env.SEALMAIL_SECURE_KEY_FILE_NAME, DEFAULT_SECURE_KEY_FILE_NAME),
    mimeType: parseStringWithDefault(process.env.SEALMAIL_SECURE_KEY_MIME_TYPE, DEFAULT_SECURE_KEY_MIME_TYPE),
    contentId: parseStringWithDefault(process.env.SEALMAIL_SECURE_KEY_CONTENT_ID, DEFAULT_SECURE_KEY_CONTENT_ID),
  };
  const body = {
    fileName: parseStringWithDefault(process.env.SEALMAIL_SECURE_BODY_FILE_NAME, DEFAULT_SECURE_BODY_FILE_NAME),
    mimeType: parseStringWithDefault(process.env.SEALMAIL_SECURE_BODY_MIME_TYPE, DEFAULT_SECURE_BODY_MIME_TYPE),
    contentId: parseStringWithDefault(process.env.SEALMAIL_SECURE_BODY_CONTENT_ID, DEFAULT_SECURE_BODY_CONTENT_ID),
  };

  validateSecureAttachment('secure key attachment', keyExchange.mimeType, keyExchange.contentId);
  validateSecureAttachment('secure body attachment', body.mimeType, body.contentId);

  if (keyExchange.contentId === body.contentId) {
    throw new Error('Secure key and body attachments must use different content ids');
  }

  return { keyExchange, body };
}

/**
 * Builds the complete configuration from environment variables.
 */
export function buildSealMailConfig(): SealMailConfiguration {
  const environment = parseStringWithDefault(process.env.NODE_ENV, 'production');

  return {
    environment,
    logging: buildLoggingConfig(environment),
    keyStore: buildKeyStoreConfig(),
    secureAttachments: buildSecureAttachmentsConfig(),
  };
}

/**
 * Register Config SealMail
 */
export default registerAs(CONFIG_NAMESPACE, buildSealMailConfig);
