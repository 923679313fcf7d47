/**
 * Configuration loading for gmail-imap-message
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { MailConfigError } from './types/errors.js';
import type { MessageConfig } from './types/config.js';

/**
 * Default configuration values
 */
export const DEFAULT_TRASH_MAILBOXES = ['[Gmail]/Trash', '[Gmail]/Bin'] as const;
export const DEFAULT_ARCHIVE_MAILBOX = '[Gmail]/All Mail';
export const DEFAULT_LOG_LEVEL = 'warn';

const configSchema = z.object({
  trashMailboxes: z.array(z.string().min(1)).min(1).default(() => [...DEFAULT_TRASH_MAILBOXES]),
  archiveMailbox: z.string().min(1).default(DEFAULT_ARCHIVE_MAILBOX),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default(DEFAULT_LOG_LEVEL),
});

/**
 * Configuration as accepted from callers, every field optional
 */
export type MessageConfigInput = z.input<typeof configSchema>;

const envSchema = z.object({
  GMAIL_TRASH_MAILBOXES: z.string().optional(),
  GMAIL_ARCHIVE_MAILBOX: z.string().optional(),
  GMAIL_LOG_LEVEL: z.string().optional(),
});

function parseConfig(input: unknown): MessageConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new MailConfigError(`Invalid message configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Validates configuration and fills in defaults
 *
 * @throws MailConfigError listing every rejected setting
 */
export function resolveConfig(input: MessageConfigInput = {}): MessageConfig {
  return parseConfig(input);
}

/**
 * Reads configuration from environment variables:
 * GMAIL_TRASH_MAILBOXES (comma separated), GMAIL_ARCHIVE_MAILBOX, GMAIL_LOG_LEVEL
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): MessageConfig {
  const vars = envSchema.parse(env);
  const input: Record<string, unknown> = {};

  if (vars.GMAIL_TRASH_MAILBOXES !== undefined) {
    input.trashMailboxes = vars.GMAIL_TRASH_MAILBOXES.split(',').map(s => s.trim()).filter(s => s.length > 0);
  }
  if (vars.GMAIL_ARCHIVE_MAILBOX !== undefined) {
    input.archiveMailbox = vars.GMAIL_ARCHIVE_MAILBOX;
  }
  if (vars.GMAIL_LOG_LEVEL !== undefined) {
    input.logLevel = vars.GMAIL_LOG_LEVEL.toLowerCase();
  }

  return parseConfig(input);
}
