/**
 * Outbound composition types for gmail-imap-message
 */

import type { MimeEntity } from '../mime/mime-entity.js';

/**
 * An attachment given either as a ready MIME part or as a file path
 */
export type AttachmentSource = MimeEntity | string;

/**
 * Parameters of an outbound message
 */
export interface ComposeOptions {
  subject: string;
  /** Recipient header value, written verbatim */
  to: string;
  cc?: string;
  bcc?: string;
  /** Body text, HTML markup when `isHtml` is set */
  text?: string;
  isHtml?: boolean;
  /** When given (even empty) the message is built as multipart/mixed */
  attachments?: AttachmentSource[];
  /** From header */
  sender?: string;
  /** Reply-To header; defaults to `sender` */
  replyTo?: string;
}
