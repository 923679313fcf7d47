/**
 * MIME Multipart Parser
 *
 * Turns raw RFC 822 bytes into a tree of MIME parts per RFC 2046.
 * The input is handled as a latin1 string so every byte maps to one
 * character and binary payloads survive untouched until decoding.
 *
 * @packageDocumentation
 */

import {
  decodeEncodedWords,
  decodeWithCharset,
  getHeader,
  parseContentType,
  parseHeaderFields,
  parseParameterizedValue,
  type ContentType,
  type ParameterizedValue,
} from './header-parser.js';
import { base64Decode } from '../encoding/base64.js';
import { quotedPrintableDecode } from '../encoding/quoted-printable.js';
import { MailParseError } from '../types/errors.js';
import type { HeaderField } from '../types/message.js';

/**
 * Represents a parsed MIME part
 */
export interface MimePart {
  /** Part headers in order of appearance */
  headers: HeaderField[];
  /** Content type information */
  contentType: ContentType;
  /** Content-Disposition, when present */
  disposition?: ParameterizedValue;
  /** Content transfer encoding, lowercased */
  encoding: string;
  /** Decoded payload bytes; empty for multipart containers */
  payload: Buffer;
  /** Child parts (for multipart) */
  parts?: MimePart[];
}

/**
 * Extracts the boundary from a Content-Type header
 *
 * @param contentType - Content-Type header value
 * @returns Boundary string or undefined
 */
export function extractBoundary(contentType: string): string | undefined {
  return parseContentType(contentType).params['boundary'];
}

/**
 * Whether the text after a delimiter ends it: end of input, a line break,
 * transport padding, or the "--" of the closing delimiter
 */
function endsDelimiter(body: string, pos: number): boolean {
  const char = body[pos];
  if (char === '-') return body[pos + 1] === '-';
  return char === undefined || char === '\r' || char === '\n' || char === ' ' || char === '\t';
}

/**
 * Splits a multipart body into individual parts
 *
 * @param body - Raw multipart body
 * @param boundary - Boundary string (without --)
 * @returns Raw part strings, or null when the boundary never occurs
 */
export function splitMultipartBody(body: string, boundary: string): string[] | null {
  const delimiter = `--${boundary}`;

  // Delimiters only count at the start of a line
  const positions: number[] = [];
  let search = 0;
  for (;;) {
    const index = body.indexOf(delimiter, search);
    if (index === -1) break;
    const atLineStart = index === 0 || body[index - 1] === '\n';
    if (atLineStart && endsDelimiter(body, index + delimiter.length)) {
      positions.push(index);
    }
    search = index + delimiter.length;
  }

  if (positions.length === 0) return null;

  const parts: string[] = [];
  for (let i = 0; i < positions.length; i++) {
    const start = positions[i];

    // Closing delimiter
    if (body.startsWith('--', start + delimiter.length)) break;

    const lineEnd = body.indexOf('\n', start);
    if (lineEnd === -1) break;

    const end = i + 1 < positions.length ? positions[i + 1] : body.length;
    let partContent = body.substring(lineEnd + 1, end);

    // The line break before a delimiter belongs to the delimiter
    if (partContent.endsWith('\r\n')) {
      partContent = partContent.slice(0, -2);
    } else if (partContent.endsWith('\n')) {
      partContent = partContent.slice(0, -1);
    }

    if (partContent.length > 0) {
      parts.push(partContent);
    }
  }

  return parts;
}

/**
 * Decodes content based on Content-Transfer-Encoding
 *
 * @param content - Raw content (latin1 view of the bytes)
 * @param encoding - Content-Transfer-Encoding value
 * @returns Decoded bytes
 */
export function decodeContent(content: string, encoding: string): Buffer {
  switch (encoding.toLowerCase()) {
    case 'base64':
      return base64Decode(content);
    case 'quoted-printable':
      return quotedPrintableDecode(content);
    default:
      // 7bit, 8bit, binary
      return Buffer.from(content, 'latin1');
  }
}

/**
 * Parses a single MIME part (headers + body)
 *
 * @param rawPart - Raw part content (latin1 view of the bytes)
 * @throws MailParseError if a multipart part has no usable boundary
 */
export function parseMimePart(rawPart: string): MimePart {
  let headerBlock: string;
  let bodyContent: string;

  const leadingBlank = rawPart.match(/^\r?\n/);
  const separatorMatch = rawPart.match(/\r?\n\r?\n/);

  if (leadingBlank) {
    // No headers at all
    headerBlock = '';
    bodyContent = rawPart.substring(leadingBlank[0].length);
  } else if (separatorMatch && separatorMatch.index !== undefined) {
    headerBlock = rawPart.substring(0, separatorMatch.index);
    bodyContent = rawPart.substring(separatorMatch.index + separatorMatch[0].length);
  } else {
    headerBlock = rawPart;
    bodyContent = '';
  }

  // Raw 8-bit header bytes are taken as UTF-8
  const headers = parseHeaderFields(Buffer.from(headerBlock, 'latin1').toString('utf-8'));
  const contentType = parseContentType(getHeader(headers, 'Content-Type'));
  const encoding = (getHeader(headers, 'Content-Transfer-Encoding') ?? '7bit').toLowerCase();
  const dispositionHeader = getHeader(headers, 'Content-Disposition');
  const disposition = dispositionHeader !== undefined
    ? parseParameterizedValue(dispositionHeader)
    : undefined;

  if (contentType.type === 'multipart') {
    const boundary = contentType.params['boundary'];
    if (!boundary) {
      throw new MailParseError(
        `Multipart part of type ${contentType.type}/${contentType.subtype} has no boundary`,
        headerBlock
      );
    }
    const rawParts = splitMultipartBody(bodyContent, boundary);
    if (rawParts === null) {
      throw new MailParseError(`Boundary "${boundary}" not found in multipart body`, bodyContent.slice(0, 200));
    }
    return {
      headers,
      contentType,
      disposition,
      encoding,
      payload: Buffer.alloc(0),
      parts: rawParts.map(p => parseMimePart(p)),
    };
  }

  return {
    headers,
    contentType,
    disposition,
    encoding,
    payload: decodeContent(bodyContent, encoding),
  };
}

/**
 * Parses a complete MIME message
 *
 * @param rawMessage - Raw message bytes, or a string of latin1 characters
 * @returns Parsed MIME part tree
 */
export function parseMimeMessage(rawMessage: Buffer | string): MimePart {
  const raw = typeof rawMessage === 'string' ? rawMessage : rawMessage.toString('latin1');
  return parseMimePart(raw);
}

/**
 * Yields every part of the tree depth-first, the root first
 */
export function* walkMimeTree(part: MimePart): Generator<MimePart> {
  yield part;
  for (const child of part.parts ?? []) {
    yield* walkMimeTree(child);
  }
}

/**
 * Decodes a leaf part's payload to text using its charset parameter
 */
export function partText(part: MimePart): string {
  return decodeWithCharset(part.payload, part.contentType.params['charset'] ?? 'utf-8');
}

/**
 * Filename of a part: the disposition's filename parameter, else the
 * Content-Type name parameter
 */
export function partFilename(part: MimePart): string | undefined {
  const name = part.disposition?.params['filename'] ?? part.contentType.params['name'];
  return name === undefined ? undefined : decodeEncodedWords(name);
}
