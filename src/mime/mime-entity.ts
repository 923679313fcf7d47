/**
 * Outbound MIME entity
 *
 * A mutable MIME node used to build messages for sending: ordered headers,
 * an already transfer-encoded body or child entities, and serialization to
 * CRLF-delimited text.
 *
 * @packageDocumentation
 */

import { randomBytes } from 'node:crypto';
import { base64Encode, base64EncodeWrapped } from '../encoding/base64.js';
import type { HeaderField } from '../types/message.js';

/** RFC 5322 hard limit for a line, excluding CRLF */
const MAX_LINE_LENGTH = 998;

/** Bytes of text per encoded word, keeps each word under 75 characters */
const ENCODED_WORD_BYTES = 45;

function isAscii(value: string): boolean {
  return /^[\x00-\x7f]*$/.test(value);
}

/**
 * Encodes a header value as RFC 2047 base64 encoded words when it is not
 * plain ASCII. Words are split on character boundaries and folded.
 */
export function encodeHeaderValue(value: string): string {
  if (isAscii(value)) return value;

  const words: string[] = [];
  let chunk = '';
  for (const char of value) {
    if (Buffer.byteLength(chunk + char, 'utf-8') > ENCODED_WORD_BYTES) {
      words.push(chunk);
      chunk = '';
    }
    chunk += char;
  }
  if (chunk) words.push(chunk);

  return words.map(word => `=?utf-8?b?${base64Encode(word)}?=`).join('\r\n ');
}

/**
 * Formats one parameter; non-ASCII values use the RFC 2231 extended form
 */
function formatParam(name: string, value: string): string {
  if (!isAscii(value)) {
    const encoded = encodeURIComponent(value).replace(/['()*!]/g, c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
    return `${name}*=utf-8''${encoded}`;
  }
  return `${name}="${value.replace(/(["\\])/g, '\\$1')}"`;
}

function formatParameterized(value: string, params: Record<string, string>): string {
  return [value, ...Object.entries(params).map(([k, v]) => formatParam(k, v))].join('; ');
}

function generateBoundary(): string {
  return `===============${randomBytes(12).toString('hex')}==`;
}

export class MimeEntity {
  private readonly fields: HeaderField[] = [];
  private readonly children: MimeEntity[] = [];
  private content = '';
  readonly mediaType: string;
  readonly boundary?: string;

  /**
   * @param mediaType - e.g. "text/plain" or "multipart/mixed"
   * @param params - Content-Type parameters; a boundary is generated for multipart types
   */
  constructor(mediaType: string, params: Record<string, string> = {}) {
    this.mediaType = mediaType.toLowerCase();
    const contentParams = { ...params };
    if (this.isMultipart) {
      this.boundary = contentParams['boundary'] ?? generateBoundary();
      contentParams['boundary'] = this.boundary;
    }
    this.addHeader('Content-Type', formatParameterized(this.mediaType, contentParams));
    this.addHeader('MIME-Version', '1.0');
  }

  /**
   * Builds a UTF-8 text part. ASCII text is sent as 7bit, anything else
   * or text with overlong lines as base64.
   */
  static text(text: string, subtype: string = 'plain'): MimeEntity {
    const entity = new MimeEntity(`text/${subtype}`, { charset: 'utf-8' });
    const normalized = text.replace(/\r?\n/g, '\r\n');
    const overlong = normalized.split('\r\n').some(line => line.length > MAX_LINE_LENGTH);

    if (isAscii(normalized) && !overlong) {
      entity.addHeader('Content-Transfer-Encoding', '7bit');
      entity.setContent(normalized);
    } else {
      entity.addHeader('Content-Transfer-Encoding', 'base64');
      entity.setContent(base64EncodeWrapped(normalized));
    }
    return entity;
  }

  /**
   * Builds a base64 encoded attachment part
   */
  static attachment(payload: Buffer, mediaType: string, filename: string): MimeEntity {
    const entity = new MimeEntity(mediaType);
    entity.addHeader('Content-Transfer-Encoding', 'base64');
    entity.addHeader('Content-Disposition', formatParameterized('attachment', { filename }));
    entity.setContent(base64EncodeWrapped(payload));
    return entity;
  }

  get isMultipart(): boolean {
    return this.mediaType.startsWith('multipart/');
  }

  get parts(): readonly MimeEntity[] {
    return this.children;
  }

  get headers(): readonly HeaderField[] {
    return this.fields;
  }

  /**
   * Appends a header; an existing header of the same name is kept
   *
   * @throws TypeError if the name or value contains a line break
   */
  addHeader(name: string, value: string): this {
    if (/[\r\n]/.test(name) || /[\r\n]/.test(value)) {
      throw new TypeError(`Header ${JSON.stringify(name)} cannot contain line breaks`);
    }
    this.fields.push({ name, value });
    return this;
  }

  /**
   * First value of a header, matched case-insensitively
   */
  getHeader(name: string): string | undefined {
    const wanted = name.toLowerCase();
    return this.fields.find(f => f.name.toLowerCase() === wanted)?.value;
  }

  hasHeader(name: string): boolean {
    return this.getHeader(name) !== undefined;
  }

  /**
   * Sets the transfer-encoded body of a leaf entity
   */
  setContent(encoded: string): this {
    if (this.isMultipart) {
      throw new TypeError(`Cannot set content on ${this.mediaType}; attach parts instead`);
    }
    this.content = encoded;
    return this;
  }

  attach(part: MimeEntity): this {
    if (!this.isMultipart) {
      throw new TypeError(`Cannot attach parts to ${this.mediaType}`);
    }
    this.children.push(part);
    return this;
  }

  /**
   * Serializes the entity with CRLF line endings
   */
  toString(): string {
    const head = this.fields
      .map(({ name, value }) => `${name}: ${name.toLowerCase().startsWith('content-') ? value : encodeHeaderValue(value)}`)
      .join('\r\n');

    if (!this.isMultipart) {
      return `${head}\r\n\r\n${this.content}`;
    }

    const body = this.children
      .map(child => `--${this.boundary}\r\n${child.toString()}\r\n`)
      .join('');
    return `${head}\r\n\r\n${body}--${this.boundary}--\r\n`;
  }

  toBuffer(): Buffer {
    return Buffer.from(this.toString(), 'utf-8');
  }
}
