import type { LogLevel } from '@nestjs/common';

export const BOOLEAN_TRUE_VALUES = ['true', '1', 'yes', 'on'];

export const CONFIG_NAMESPACE = 'sealmail';

// Logging
export const ALLOWED_LOG_LEVELS: readonly LogLevel[] = ['log', 'error', 'warn', 'debug', 'verbose', 'fatal'];
export const DEFAULT_LOG_LEVELS: LogLevel[] = ['log', 'error', 'warn'];
export const DEVELOPMENT_LOG_LEVELS: LogLevel[] = ['log', 'error', 'warn', 'debug', 'verbose'];

// Key store
export const DEFAULT_RSA_KEY_BITS = 2048;
export const MIN_RSA_KEY_BITS = 2048;
export const RSA_KEY_BITS_STEP = 1024;

// Secure email attachments
export const DEFAULT_SECURE_KEY_FILE_NAME = 'Secure Data';
export const DEFAULT_SECURE_KEY_MIME_TYPE = 'application/x-sealmail-key';
export const DEFAULT_SECURE_KEY_CONTENT_ID = 'securekeyexchangedata@sealmail.local';
export const DEFAULT_SECURE_BODY_FILE_NAME = 'Secure Email';
export const DEFAULT_SECURE_BODY_MIME_TYPE = 'application/x-sealmail-body';
export const DEFAULT_SECURE_BODY_CONTENT_ID = 'securebody@sealmail.local';
