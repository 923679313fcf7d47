/**
 * Configuration types for gmail-imap-message
 */

/**
 * Log levels understood by the library logger
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Account conventions used by message mutations
 */
export interface MessageConfig {
  /**
   * Candidate trash mailbox names in probe order. The first one present on
   * the account is used; when none is present the last entry is used.
   */
  trashMailboxes: string[];
  /** Mailbox that archive() moves messages to */
  archiveMailbox: string;
  /** Minimum level written by the default logger */
  logLevel: LogLevel;
}
