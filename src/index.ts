/**
 * gmail-imap-message - Gmail IMAP message model
 *
 * Lazily fetched messages with parsed headers, bodies, attachments,
 * flags and Gmail labels, mutation operations that issue UID STORE and
 * UID COPY commands, and an outbound MIME composer.
 *
 * @packageDocumentation
 */

// Export all types
export * from './types/index.js';

// Configuration and logging
export { resolveConfig, loadConfigFromEnv, DEFAULT_TRASH_MAILBOXES, DEFAULT_ARCHIVE_MAILBOX } from './config.js';
export type { MessageConfigInput } from './config.js';
export { createMailLogger, getDefaultLogger, setDefaultLogger } from './logger.js';
export type { Logger } from './logger.js';

// Encoding utilities
export * from './encoding/index.js';

// MIME parsing and building
export * from './mime/index.js';

// Protocol response extraction
export * from './protocol/index.js';

// Command construction
export * from './commands/index.js';

// Session over raw commands
export * from './session/index.js';

// Message model
export * from './message/index.js';

// Composition
export * from './compose/index.js';
