/**
 * Base64 encoding/decoding using Node.js Buffer
 *
 * Used for attachment payloads, encoded-word headers and outbound
 * MIME parts.
 */

/** RFC 2045 limit for encoded lines */
const MIME_LINE_LENGTH = 76;

/**
 * Encodes a string or Buffer to base64
 *
 * @param data - The data to encode (strings are taken as UTF-8)
 * @returns Base64 encoded string on a single line
 */
export function base64Encode(data: string | Buffer): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
  return buffer.toString('base64');
}

/**
 * Encodes data to base64 wrapped at 76 columns with CRLF, as MIME bodies
 * require
 */
export function base64EncodeWrapped(data: string | Buffer): string {
  const encoded = base64Encode(data);
  const lines: string[] = [];
  for (let i = 0; i < encoded.length; i += MIME_LINE_LENGTH) {
    lines.push(encoded.slice(i, i + MIME_LINE_LENGTH));
  }
  return lines.join('\r\n');
}

/**
 * Decodes a base64 string to a Buffer
 *
 * @param encoded - The base64 encoded string
 * @returns Decoded Buffer
 */
export function base64Decode(encoded: string): Buffer {
  // MIME base64 is line-wrapped
  const cleaned = encoded.replace(/\s/g, '');
  return Buffer.from(cleaned, 'base64');
}
