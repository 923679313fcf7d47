/**
 * Quoted-Printable decoding (RFC 2045 section 6.7)
 */

/**
 * Decodes a quoted-printable string to a Buffer.
 *
 * Soft line breaks (`=` at end of line) are removed, `=XX` escapes become
 * bytes and an `=` not followed by two hex digits is kept literally.
 * Characters above 0xFF are not valid here and are reduced to their low byte.
 *
 * @param encoded - The quoted-printable encoded string
 */
export function quotedPrintableDecode(encoded: string): Buffer {
  const bytes: number[] = [];
  let i = 0;

  while (i < encoded.length) {
    const char = encoded[i];

    if (char === '=') {
      if (encoded[i + 1] === '\r' && encoded[i + 2] === '\n') {
        i += 3;
        continue;
      }
      if (encoded[i + 1] === '\n') {
        i += 2;
        continue;
      }

      const hex = encoded.substring(i + 1, i + 3);
      if (/^[0-9A-Fa-f]{2}$/.test(hex)) {
        bytes.push(parseInt(hex, 16));
        i += 3;
      } else {
        bytes.push(0x3d);
        i++;
      }
    } else {
      bytes.push(char.charCodeAt(0) & 0xff);
      i++;
    }
  }

  return Buffer.from(bytes);
}
