const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Standard (RFC 4648 §4) Base64 encoding with padding.
 */
export function encodeBase64(data: Uint8Array): string {
  return Buffer.from(data).toString('base64');
}

/**
 * Returns true when `value` is canonical padded standard Base64.
 */
export function isBase64(value: string): boolean {
  return BASE64_PATTERN.test(value);
}

/**
 * Strict Base64 decode. Whitespace, including MIME line breaks, is ignored; any other
 * character outside the alphabet yields undefined instead of being skipped the way
 * `Buffer.from(value, 'base64')` does.
 */
export function decodeBase64(value: string): Uint8Array | undefined {
  const compact = value.replace(/\s+/g, '');
  if (!isBase64(compact)) {
    return undefined;
  }
  return new Uint8Array(Buffer.from(compact, 'base64'));
}

export function utf8Encode(value: string): Uint8Array {
  return new Uint8Array(Buffer.from(value, 'utf-8'));
}

export function utf8Decode(data: Uint8Array): string {
  return Buffer.from(data).toString('utf-8');
}
