/**
 * MIME Header Parser
 *
 * Parses MIME message headers including:
 * - Folded headers (RFC 5322)
 * - Encoded words (RFC 2047)
 * - Parameter values, including RFC 2231 extended and continued parameters
 *
 * @packageDocumentation
 */

import { TextDecoder } from 'node:util';
import { base64Decode } from '../encoding/base64.js';
import { quotedPrintableDecode } from '../encoding/quoted-printable.js';
import type { HeaderField, Headers } from '../types/message.js';

/**
 * A header value split into its main token and parameters,
 * e.g. `attachment; filename="a.pdf"`
 */
export interface ParameterizedValue {
  /** Lowercased main value */
  value: string;
  /** Parameters keyed by lowercased name */
  params: Record<string, string>;
}

/**
 * Parsed Content-Type header
 */
export interface ContentType {
  type: string;
  subtype: string;
  params: Record<string, string>;
}

const ENCODED_WORD = /=\?([^?\s]+)\?([BbQq])\?([^?\s]*)\?=/g;

// Whitespace between two adjacent encoded words is not displayed (RFC 2047 section 6.2)
const ADJACENT_ENCODED_WORDS = /(=\?[^?\s]+\?[BbQq]\?[^?\s]*\?=)[ \t\r\n]+(?==\?[^?\s]+\?[BbQq]\?[^?\s]*\?=)/g;

/**
 * Decodes bytes with the named charset, falling back to UTF-8 for charsets
 * the runtime does not know
 *
 * @param buffer - Bytes to decode
 * @param charset - Charset label as found in a header, e.g. "ISO-8859-1"
 */
export function decodeWithCharset(buffer: Buffer, charset: string): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset.trim().toLowerCase());
  } catch (err) {
    if (!(err instanceof RangeError)) throw err;
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(buffer);
}

/**
 * Decodes RFC 2047 encoded words in header values
 * Format: =?charset?encoding?encoded_text?=
 *
 * @param value - Header value potentially containing encoded words
 * @returns Decoded header value
 */
export function decodeEncodedWords(value: string): string {
  return value
    .replace(ADJACENT_ENCODED_WORDS, '$1')
    .replace(ENCODED_WORD, (match: string, charset: string, encoding: string, encodedText: string) => {
      // RFC 2231 allows a language suffix: charset*lang
      const label = charset.split('*')[0];
      const decoded = encoding.toUpperCase() === 'B'
        ? base64Decode(encodedText)
        // In Q-encoding, underscores represent spaces
        : quotedPrintableDecode(encodedText.replace(/_/g, ' '));
      return label ? decodeWithCharset(decoded, label) : match;
    });
}

/**
 * Unfolds folded headers (RFC 5322 section 2.2.3)
 * Folded headers have CRLF followed by whitespace
 *
 * @param headerBlock - Raw header block with potential folding
 * @returns Unfolded header block
 */
export function unfoldHeaders(headerBlock: string): string {
  return headerBlock
    .replace(/\r\n[ \t]+/g, ' ')
    .replace(/\n[ \t]+/g, ' ');
}

/**
 * Parses a header block into fields, in order of appearance.
 * Names keep their case and values stay encoded.
 *
 * @param headerBlock - Raw header block (headers separated by CRLF or LF)
 */
export function parseHeaderFields(headerBlock: string): HeaderField[] {
  const fields: HeaderField[] = [];

  for (const line of unfoldHeaders(headerBlock).split(/\r?\n/)) {
    if (!line.trim()) continue;

    const colonIndex = line.indexOf(':');
    if (colonIndex <= 0) continue;

    const name = line.substring(0, colonIndex).trim();
    // Header names cannot contain whitespace; this is body text or garbage
    if (/\s/.test(name)) continue;

    fields.push({ name, value: line.substring(colonIndex + 1).trim() });
  }

  return fields;
}

/**
 * Returns the first value of a header, matching the name case-insensitively
 */
export function getHeader(fields: readonly HeaderField[], name: string): string | undefined {
  const wanted = name.toLowerCase();
  return fields.find(field => field.name.toLowerCase() === wanted)?.value;
}

/**
 * Collapses header fields into a map keyed by the name as received.
 * A repeated header keeps its last value.
 */
export function toHeaderMap(fields: readonly HeaderField[]): Headers {
  const headers: Headers = new Map();
  for (const field of fields) {
    headers.set(field.name, field.value);
  }
  return headers;
}

/**
 * Splits a header value on semicolons that are not inside a quoted string
 */
function splitParameters(headerValue: string): string[] {
  const segments: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < headerValue.length; i++) {
    const char = headerValue[i];
    if (inQuotes && char === '\\' && i + 1 < headerValue.length) {
      current += char + headerValue[++i];
      continue;
    }
    if (char === '"') inQuotes = !inQuotes;
    if (char === ';' && !inQuotes) {
      segments.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  segments.push(current);

  return segments.map(s => s.trim());
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return value;
}

/**
 * Turns a percent-encoded RFC 2231 value into bytes
 */
function percentDecode(value: string): Buffer {
  const bytes: number[] = [];
  for (let i = 0; i < value.length; i++) {
    const hex = value.substring(i + 1, i + 3);
    if (value[i] === '%' && /^[0-9A-Fa-f]{2}$/.test(hex)) {
      bytes.push(parseInt(hex, 16));
      i += 2;
    } else {
      bytes.push(...Buffer.from(value[i], 'utf-8'));
    }
  }
  return Buffer.from(bytes);
}

interface ParameterSection {
  index: number;
  extended: boolean;
  raw: string;
}

/**
 * Reassembles `name*0*=utf-8''a%20; name*1="b"` style parameters
 */
function combineSections(sections: ParameterSection[]): string {
  sections.sort((a, b) => a.index - b.index);

  let charset = 'utf-8';
  const chunks: Buffer[] = [];

  sections.forEach((section, position) => {
    if (!section.extended) {
      chunks.push(Buffer.from(section.raw, 'utf-8'));
      return;
    }
    let raw = section.raw;
    if (position === 0) {
      // charset'language'value
      const match = raw.match(/^([^']*)'[^']*'(.*)$/);
      if (match) {
        charset = match[1] || charset;
        raw = match[2];
      }
    }
    chunks.push(percentDecode(raw));
  });

  return decodeWithCharset(Buffer.concat(chunks), charset);
}

/**
 * Parses a structured header value with parameters
 *
 * @param headerValue - e.g. `attachment; filename="report.pdf"`
 */
export function parseParameterizedValue(headerValue: string): ParameterizedValue {
  const [first = '', ...rest] = splitParameters(headerValue);
  const params: Record<string, string> = {};
  const sectioned = new Map<string, ParameterSection[]>();

  for (const segment of rest) {
    const eqIndex = segment.indexOf('=');
    if (eqIndex === -1) continue;

    const key = segment.substring(0, eqIndex).trim().toLowerCase();
    const raw = unquote(segment.substring(eqIndex + 1).trim());

    const section = key.match(/^([^*]+)\*(?:(\d+)(\*)?)?$/);
    if (!section) {
      params[key] = raw;
      continue;
    }

    const [, name, index, star] = section;
    const entry: ParameterSection = {
      index: index === undefined ? 0 : parseInt(index, 10),
      // "name*" is extended; "name*N" only when followed by another "*"
      extended: index === undefined || star === '*',
      raw,
    };
    const list = sectioned.get(name) ?? [];
    list.push(entry);
    sectioned.set(name, list);
  }

  for (const [name, sections] of sectioned) {
    params[name] = combineSections(sections);
  }

  return { value: first.toLowerCase(), params };
}

/**
 * Extracts a specific parameter from a header value
 * e.g., from "multipart/mixed; boundary=abc" extracts "abc"
 *
 * @param headerValue - Full header value with parameters
 * @param paramName - Parameter name to extract
 * @returns Parameter value or undefined
 */
export function extractHeaderParam(headerValue: string, paramName: string): string | undefined {
  return parseParameterizedValue(headerValue).params[paramName.toLowerCase()];
}

/**
 * Parses a Content-Type header value. A missing or malformed type
 * is treated as text/plain.
 *
 * @param contentType - Content-Type header value
 */
export function parseContentType(contentType: string | undefined): ContentType {
  const { value, params } = parseParameterizedValue(contentType ?? 'text/plain');
  const match = value.match(/^([^/\s]+)\/([^/\s]+)$/);
  if (!match) {
    return { type: 'text', subtype: 'plain', params };
  }
  return { type: match[1], subtype: match[2], params };
}
