import { isEmail } from 'class-validator';

/**
 * Lowercase and trim an address. Returns undefined when it is not a valid email address.
 */
export function normalizeEmailAddress(address: string): string | undefined {
  const normalized = address.trim().toLowerCase();
  return isEmail(normalized) ? normalized : undefined;
}

export function getDomain(normalizedAddress: string): string {
  return normalizedAddress.slice(normalizedAddress.lastIndexOf('@') + 1);
}
