import type { LogLevel } from '@nestjs/common';
import { ALLOWED_LOG_LEVELS, BOOLEAN_TRUE_VALUES } from './config.constants';

export function parseOptionalBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (BOOLEAN_TRUE_VALUES.includes(normalized)) {
    return true;
  }

  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return defaultValue;
}

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a string environment variable with a default value.
 *
 * @param value - The string value to parse
 * @param defaultValue - The default value to return if not provided
 * @returns The trimmed value or default
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value.trim();
}

function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.some((level) => level === value);
}

/**
 * Parses a comma-separated list of NestJS log levels.
 *
 * @example
 * ```
 * SEALMAIL_LOG_LEVELS=log,warn,error
 * // Returns: ['log', 'warn', 'error']
 * ```
 * @throws {Error} If any entry is not a known log level
 */
export function parseLogLevels(value: string | undefined, defaultLevels: LogLevel[]): LogLevel[] {
  if (!value || !value.trim()) {
    return defaultLevels;
  }

  const entries = value
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);

  const levels: LogLevel[] = [];
  const invalid: string[] = [];
  for (const entry of entries) {
    if (isLogLevel(entry)) {
      if (!levels.includes(entry)) {
        levels.push(entry);
      }
    } else {
      invalid.push(entry);
    }
  }

  if (invalid.length > 0) {
    throw new Error(
      `Invalid log level(s) in SEALMAIL_LOG_LEVELS: ${invalid.join(', ')} (allowed: ${ALLOWED_LOG_LEVELS.join(', ')})`,
    );
  }

  return levels.length > 0 ? levels : defaultLevels;
}
