/**
 * Content transfer encodings used when reading and composing messages
 *
 * @packageDocumentation
 */

export { base64Encode, base64EncodeWrapped, base64Decode } from './base64.js';
export { quotedPrintableDecode } from './quoted-printable.js';
