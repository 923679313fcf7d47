/**
 * Attachment
 *
 * Immutable view over one decoded MIME part whose disposition is
 * "attachment". It keeps its own copy of the payload and does not refer
 * back to the message it came from.
 *
 * @packageDocumentation
 */

import { stat, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { partFilename, type MimePart } from '../mime/multipart-parser.js';
import { MailError } from '../types/errors.js';

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return false;
    }
    throw err;
  }
}

/**
 * Rounds to the nearest integer, halves to the even neighbour
 */
function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction !== 0.5) return Math.round(value);
  return floor % 2 === 0 ? floor : floor + 1;
}

export class Attachment {
  /** Filename from the part's disposition or content type */
  readonly name?: string;
  private readonly bytes: Buffer;

  constructor(name: string | undefined, payload: Buffer | undefined) {
    this.name = name;
    this.bytes = payload ? Buffer.from(payload) : Buffer.alloc(0);
  }

  /**
   * Decoded bytes; each read returns a fresh copy
   */
  get payload(): Buffer {
    return Buffer.from(this.bytes);
  }

  /**
   * Builds an attachment from a parsed MIME part
   */
  static fromMimePart(part: MimePart): Attachment {
    return new Attachment(partFilename(part), part.payload);
  }

  /**
   * Payload length in whole kilobytes (1000 bytes), halves rounded to even
   */
  get size(): number {
    return roundHalfEven(this.bytes.length / 1000);
  }

  /**
   * Whether the size rounds to zero. Such attachments are dropped when a
   * message is parsed.
   */
  get isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Writes the payload to disk, replacing any existing file.
   *
   * Without a path the attachment's own name is used in the current
   * directory; a directory path gets the attachment's name appended.
   *
   * @returns The path written to
   * @throws MailError if a name is needed and the attachment has none
   */
  async save(path?: string): Promise<string> {
    let target: string;
    if (path === undefined) {
      target = this.fileName();
    } else if (await isDirectory(path)) {
      target = join(path, this.fileName());
    } else {
      target = path;
    }

    await writeFile(target, this.bytes);
    return target;
  }

  toString(): string {
    return `<Attachment ${this.name ?? ''}>`;
  }

  private fileName(): string {
    // Names come from the sender; never let them leave the target directory
    const name = this.name === undefined ? '' : basename(this.name);
    if (!name || name === '.' || name === '..') {
      throw new MailError('Attachment has no usable name; pass a file path to save()', 'NO_ATTACHMENT_NAME', 'io');
    }
    return name;
  }
}
