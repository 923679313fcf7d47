/**
 * Error types for gmail-imap-message
 */

/**
 * Error source categories
 */
export type ErrorSource = 'parse' | 'protocol' | 'config' | 'io';

/**
 * Base error class for every failure raised by this library
 */
export class MailError extends Error {
  /** Error code */
  code: string;
  /** Error source category */
  source: ErrorSource;

  constructor(message: string, code: string, source: ErrorSource) {
    super(message);
    this.name = 'MailError';
    this.code = code;
    this.source = source;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Parse error (missing Date header, malformed MIME structure)
 */
export class MailParseError extends MailError {
  override source: 'parse' = 'parse';
  /** Raw data that failed to parse */
  rawData: string;

  constructor(message: string, rawData: string) {
    super(message, 'PARSE_ERROR', 'parse');
    this.name = 'MailParseError';
    this.rawData = rawData;
  }
}

/**
 * Protocol error (server answered NO/BAD, or returned no data for a UID)
 */
export class MailProtocolError extends MailError {
  override source: 'protocol' = 'protocol';
  /** Server response text */
  serverResponse: string;
  /** Command that caused the error */
  command?: string;

  constructor(message: string, serverResponse: string, command?: string) {
    super(message, 'PROTOCOL_ERROR', 'protocol');
    this.name = 'MailProtocolError';
    this.serverResponse = serverResponse;
    this.command = command;
  }
}

/**
 * Configuration error (values rejected by the config schema)
 */
export class MailConfigError extends MailError {
  override source: 'config' = 'config';
  /** One entry per rejected setting, formatted as "path: reason" */
  issues: string[];

  constructor(message: string, issues: string[]) {
    super(message, 'CONFIG_ERROR', 'config');
    this.name = 'MailConfigError';
    this.issues = issues;
  }
}
