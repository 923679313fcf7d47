/**
 * Type exports for gmail-imap-message
 */

// Configuration types
export type { MessageConfig, LogLevel } from './config.js';

// Message types
export { SYSTEM_FLAGS, MESSAGE_FETCH_ITEMS } from './message.js';
export type { SystemFlag, Headers, HeaderField, MessageData, LoadState } from './message.js';

// Session types
export type { MailSession, MailboxHandle, RawFetchResult, StoreAction } from './session.js';

// Compose types
export type { ComposeOptions, AttachmentSource } from './compose.js';

// Error types
export {
  MailError,
  MailParseError,
  MailProtocolError,
  MailConfigError
} from './errors.js';

export type { ErrorSource } from './errors.js';
