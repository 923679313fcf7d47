/**
 * Raw FETCH reply parser
 *
 * Turns one FETCH response entry - the response line and the BODY[]
 * literal - into the message data model.
 *
 * @packageDocumentation
 */

import { decodeEncodedWords, getHeader, toHeaderMap } from '../mime/header-parser.js';
import { parseMimeMessage, partText, walkMimeTree, type MimePart } from '../mime/multipart-parser.js';
import { parseRfc5322Date } from '../mime/date.js';
import { parseFlags, parseGmailMessageId, parseLabels, parseThreadId } from '../protocol/fetch-attributes.js';
import { Attachment } from './attachment.js';
import type { MessageData } from '../types/message.js';

interface Bodies {
  body?: string;
  html?: string;
}

/**
 * Finds the plain-text and HTML bodies.
 *
 * For multipart messages every part is visited depth-first and a later
 * text/plain or text/html part replaces an earlier one. A single text/*
 * part is taken as the plain body whatever its subtype.
 */
function extractBodies(root: MimePart): Bodies {
  const { type } = root.contentType;

  if (type === 'multipart') {
    const bodies: Bodies = {};
    for (const part of walkMimeTree(root)) {
      const { type: partType, subtype } = part.contentType;
      if (partType !== 'text') continue;
      if (subtype === 'plain') {
        bodies.body = partText(part);
      } else if (subtype === 'html') {
        bodies.html = partText(part);
      }
    }
    return bodies;
  }

  if (type === 'text') {
    return { body: partText(root) };
  }

  return {};
}

/**
 * Collects attachments among the top-level parts, leaving out those whose
 * size rounds to zero kilobytes
 */
function extractAttachments(root: MimePart): Attachment[] {
  return (root.parts ?? [])
    .filter(part => part.disposition?.value === 'attachment')
    .map(part => Attachment.fromMimePart(part))
    .filter(attachment => attachment.size > 0);
}

/**
 * Parses a FETCH reply into message data
 *
 * @param headerBlock - FETCH response line with FLAGS and X-GM-* attributes
 * @param rawBody - Full RFC 822 message (BODY[] literal)
 * @throws MailParseError if the Date header is missing or invalid, or the MIME structure is malformed
 */
export function parseRawMessage(headerBlock: string, rawBody: Buffer | string): MessageData {
  const root = parseMimeMessage(rawBody);
  const { body, html } = extractBodies(root);

  return {
    headers: toHeaderMap(root.headers),
    subject: decodeEncodedWords(getHeader(root.headers, 'Subject') ?? ''),
    body,
    html,
    to: getHeader(root.headers, 'To'),
    fr: getHeader(root.headers, 'From'),
    cc: getHeader(root.headers, 'Cc'),
    deliveredTo: getHeader(root.headers, 'Delivered-To'),
    sentAt: parseRfc5322Date(getHeader(root.headers, 'Date')),
    flags: parseFlags(headerBlock),
    labels: parseLabels(headerBlock),
    threadId: parseThreadId(headerBlock),
    messageId: parseGmailMessageId(headerBlock),
    attachments: extractAttachments(root),
  };
}
