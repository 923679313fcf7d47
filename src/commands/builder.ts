/**
 * IMAP Command Builder
 *
 * Builds the UID-addressed commands the message model needs, per RFC 3501
 * and Gmail's IMAP extensions. Commands are returned without the tag - the
 * executor is responsible for adding tags.
 *
 * @packageDocumentation
 */

import type { StoreAction } from '../types/session.js';

/**
 * Quotes a string for use in IMAP commands when it is not a plain atom
 *
 * @param value - The string to escape
 * @returns Atom or quoted string
 */
export function escapeString(value: string): string {
  if (value.length === 0 || /[\s"\\(){}\[\]%*\x00-\x1f\x7f]/.test(value)) {
    return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
  }
  return value;
}

/**
 * Formats a Gmail label. System labels such as \Important or \Inbox are
 * flag-like atoms and must not be quoted.
 */
function formatLabel(label: string): string {
  return /^\\[A-Za-z]+$/.test(label) ? label : escapeString(label);
}

function assertUid(uid: number): void {
  if (!Number.isInteger(uid) || uid < 1) {
    throw new RangeError(`Invalid UID: ${uid}`);
  }
}

/**
 * CommandBuilder provides static methods to construct IMAP commands
 */
export class CommandBuilder {
  /**
   * Builds a SELECT command to open a mailbox for read/write
   *
   * @param mailbox - Mailbox name
   */
  static select(mailbox: string): string {
    return `SELECT ${escapeString(mailbox)}`;
  }

  /**
   * Builds a LIST command to list mailboxes
   *
   * @param reference - Reference name (usually empty string)
   * @param pattern - Mailbox pattern (e.g., "*" for all, "%" for top-level)
   */
  static list(reference: string = '', pattern: string = '*'): string {
    return `LIST ${escapeString(reference)} ${escapeString(pattern)}`;
  }

  /**
   * Builds a UID FETCH command for one message
   *
   * @param uid - Message UID
   * @param items - Data items, e.g. "BODY.PEEK[] FLAGS X-GM-LABELS"
   */
  static uidFetch(uid: number, items: string): string {
    assertUid(uid);
    return `UID FETCH ${uid} (${items})`;
  }

  /**
   * Builds a UID STORE command to modify message flags
   *
   * @param uid - Message UID
   * @param flags - Flags to add or remove
   * @param action - 'add' for +FLAGS, 'remove' for -FLAGS
   */
  static uidStoreFlags(uid: number, flags: string[], action: StoreAction): string {
    assertUid(uid);
    const operator = action === 'add' ? '+FLAGS' : '-FLAGS';
    return `UID STORE ${uid} ${operator} (${flags.join(' ')})`;
  }

  /**
   * Builds a UID STORE command to modify Gmail labels
   *
   * @param uid - Message UID
   * @param labels - Labels to add or remove
   * @param action - 'add' for +X-GM-LABELS, 'remove' for -X-GM-LABELS
   */
  static uidStoreLabels(uid: number, labels: string[], action: StoreAction): string {
    assertUid(uid);
    const operator = action === 'add' ? '+X-GM-LABELS' : '-X-GM-LABELS';
    return `UID STORE ${uid} ${operator} (${labels.map(formatLabel).join(' ')})`;
  }

  /**
   * Builds a UID COPY command to copy a message to another mailbox
   *
   * @param uid - Message UID
   * @param mailbox - Destination mailbox name
   */
  static uidCopy(uid: number, mailbox: string): string {
    assertUid(uid);
    return `UID COPY ${uid} ${escapeString(mailbox)}`;
  }
}
