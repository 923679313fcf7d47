/**
 * Message types for gmail-imap-message
 */

import type { Attachment } from '../message/attachment.js';

/**
 * Standard IMAP system flags
 */
export const SYSTEM_FLAGS = {
  seen: '\\Seen',
  answered: '\\Answered',
  flagged: '\\Flagged',
  deleted: '\\Deleted',
  draft: '\\Draft',
} as const;

export type SystemFlag = (typeof SYSTEM_FLAGS)[keyof typeof SYSTEM_FLAGS];

/**
 * Header name to raw value, names as received, last occurrence wins
 */
export type Headers = Map<string, string>;

/**
 * A single header line as it appeared in the message
 */
export interface HeaderField {
  /** Header name, case preserved */
  name: string;
  /** Unfolded raw value */
  value: string;
}

/**
 * Data items requested by the lazy fetch
 */
export const MESSAGE_FETCH_ITEMS = 'BODY.PEEK[] FLAGS X-GM-THRID X-GM-MSGID X-GM-LABELS';

/**
 * Everything a single FETCH reply is parsed into
 */
export interface MessageData {
  headers: Headers;
  /** Subject with encoded words decoded */
  subject: string;
  /** Last text/plain part found */
  body?: string;
  /** Last text/html part found */
  html?: string;
  to?: string;
  /** Raw From header */
  fr?: string;
  cc?: string;
  deliveredTo?: string;
  sentAt: Date;
  flags: Set<string>;
  labels: Set<string>;
  /** Gmail conversation id (X-GM-THRID) */
  threadId?: string;
  /** Gmail global message id (X-GM-MSGID), not the Message-ID header */
  messageId?: string;
  attachments: Attachment[];
}

/**
 * Lifecycle of a message's lazily fetched data
 */
export type LoadState = 'unloaded' | 'fetching' | 'loaded';
