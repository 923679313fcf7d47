/**
 * LIST response parsing
 *
 * @packageDocumentation
 */

import { tokenize, getTokenValue, type Token } from './tokenizer.js';

/**
 * Information about a single mailbox from a LIST response
 */
export interface MailboxInfo {
  /** Mailbox name */
  name: string;
  /** Hierarchy delimiter character, null when the server sent NIL */
  delimiter: string | null;
  /** Mailbox attributes, e.g. \HasNoChildren or \Trash */
  attributes: string[];
}

/**
 * Parses a single LIST response line
 *
 * LIST responses have the format:
 * * LIST (\Attributes) "delimiter" "mailbox name"
 *
 * @param line - Raw response line
 * @returns Mailbox info, or null when the line is not a LIST response
 */
export function parseListLine(line: string): MailboxInfo | null {
  const listMatch = line.trim().match(/^\*\s+(?:LIST|LSUB)\s+/i);
  if (!listMatch) return null;

  const { tokens } = tokenize(line.trim(), listMatch[0].length);
  const [attributesToken, delimiterToken, nameToken] = tokens;
  if (!attributesToken || attributesToken.type !== 'list' || !nameToken) {
    return null;
  }

  const name = getTokenValue(nameToken);
  if (name === null) return null;

  return {
    name,
    delimiter: delimiterToken ? getTokenValue(delimiterToken) : null,
    attributes: attributesToken.value
      .map((t: Token) => getTokenValue(t))
      .filter((v): v is string => v !== null),
  };
}

/**
 * Parses LIST response lines into a flat MailboxInfo array, skipping
 * lines of other responses
 */
export function parseListResponse(lines: string[]): MailboxInfo[] {
  const mailboxes: MailboxInfo[] = [];
  for (const line of lines) {
    const parsed = parseListLine(line);
    if (parsed) mailboxes.push(parsed);
  }
  return mailboxes;
}
