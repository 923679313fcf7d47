/**
 * Outbound message composition
 *
 * Builds the MIME structure of a message to be handed to a mail
 * transport. Nothing here talks to a server.
 *
 * @packageDocumentation
 */

import { randomInt } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { hostname } from 'node:os';
import { basename } from 'node:path';
import { guessMediaType } from './media-types.js';
import { formatRfc5322Date } from '../mime/date.js';
import { MimeEntity } from '../mime/mime-entity.js';
import type { AttachmentSource, ComposeOptions } from '../types/compose.js';

/**
 * Generates a Message-ID header value, e.g. `<172034.4242.88231@host>`
 *
 * @param domain - Right-hand side of the id; defaults to the host name
 */
export function makeMessageId(domain: string = hostname()): string {
  return `<${Date.now()}.${process.pid}.${randomInt(1_000_000_000)}@${domain}>`;
}

/**
 * Turns an attachment source into a MIME part. A path is read from disk,
 * its media type guessed from the extension and its content base64
 * encoded; a ready MIME entity is used as given.
 */
export async function toMimeAttachment(source: AttachmentSource): Promise<MimeEntity> {
  if (source instanceof MimeEntity) {
    return source;
  }
  const payload = await readFile(source);
  return MimeEntity.attachment(payload, guessMediaType(source), basename(source));
}

/**
 * Composes an outbound message.
 *
 * - Plain text without attachments gives a single text/plain entity.
 * - HTML gives multipart/mixed wrapping a multipart/alternative that holds
 *   the HTML part only.
 * - With attachments (even an empty list) the text part and one part per
 *   attachment go into multipart/mixed.
 *
 * Reply-To defaults to the sender; an explicit `replyTo` overrides it.
 *
 * @throws Error from the file system when an attachment path cannot be read
 * @throws TypeError if a header value contains a line break
 */
export async function composeMessage(options: ComposeOptions): Promise<MimeEntity> {
  const text = options.text ?? '';
  let message: MimeEntity;

  if (!options.isHtml && options.attachments === undefined) {
    message = MimeEntity.text(text, 'plain');
  } else {
    message = new MimeEntity('multipart/mixed');
    if (options.isHtml) {
      // TODO: attach a text/plain alternative derived from the HTML
      const alternative = new MimeEntity('multipart/alternative');
      alternative.attach(MimeEntity.text(text, 'html'));
      message.attach(alternative);
    } else {
      message.attach(MimeEntity.text(text, 'plain'));
    }
    for (const source of options.attachments ?? []) {
      message.attach(await toMimeAttachment(source));
    }
  }

  message.addHeader('To', options.to);
  if (options.cc) {
    message.addHeader('Cc', options.cc);
  }
  if (options.bcc) {
    message.addHeader('Bcc', options.bcc);
  }

  if (options.sender) {
    message.addHeader('From', options.sender);
    if (!options.replyTo) {
      message.addHeader('Reply-To', options.sender);
    }
  }

  if (!message.hasHeader('Date')) {
    message.addHeader('Date', formatRfc5322Date(new Date()));
  }
  if (!message.hasHeader('Message-ID')) {
    message.addHeader('Message-ID', makeMessageId());
  }

  if (options.replyTo) {
    message.addHeader('Reply-To', options.replyTo);
  }

  message.addHeader('Subject', options.subject);

  return message;
}
