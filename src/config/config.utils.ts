import { Logger } from '@nestjs/common';
import type { SealMailConfiguration } from './config.types';

/* c8 ignore start */
/**
 * Log Configuration Summary
 *
 * Logs a summary of the loaded configuration for debugging purposes.
 *
 * @param config - The complete configuration object
 */
export function logConfigurationSummary(config: SealMailConfiguration): void {
  const summaryLogger = new Logger('Configuration');

  summaryLogger.log(`Environment: ${config.environment}`);
  summaryLogger.log(`Log Levels: ${config.logging.levels.join(', ')}`);
  summaryLogger.log(`In-memory RSA key size: ${config.keyStore.rsaKeyBits} bits`);

  const { keyExchange, body } = config.secureAttachments;
  summaryLogger.log(`Secure key attachment: "${keyExchange.fileName}" ${keyExchange.mimeType} <${keyExchange.contentId}>`);
  summaryLogger.log(`Secure body attachment: "${body.fileName}" ${body.mimeType} <${body.contentId}>`);

  summaryLogger.log('Configuration loaded successfully');
}
/* c8 ignore stop */
