/**
 * FETCH attribute extraction
 *
 * Gmail's X-GM-* attributes have no structured representation in the
 * message itself, so they are located by pattern in the FETCH response
 * line that precedes the BODY[] literal, e.g.
 *
 *   1 (X-GM-THRID 1803 X-GM-MSGID 1804 X-GM-LABELS ("Work" \Important) UID 42 FLAGS (\Seen) BODY[] {2310}
 *
 * @packageDocumentation
 */

import { tokenize, getTokenValue } from './tokenizer.js';

const FLAGS_PATTERN = /(?:^|[\s(])FLAGS \(([^)]*)\)/;
const LABELS_PATTERN = /X-GM-LABELS \(/;
const THREAD_ID_PATTERN = /X-GM-THRID (\d+)/;
const MESSAGE_ID_PATTERN = /X-GM-MSGID (\d+)/;
const UID_PATTERN = /(?:^|[\s(])UID (\d+)/;

/**
 * Parses the FLAGS list, e.g. `FLAGS (\Seen \Flagged)`
 *
 * @param headerBlock - FETCH response line
 * @returns Flag tokens; empty when the attribute is absent
 */
export function parseFlags(headerBlock: string): Set<string> {
  const match = headerBlock.match(FLAGS_PATTERN);
  if (!match) return new Set();
  return new Set(match[1].split(/\s+/).filter(flag => flag.length > 0));
}

/**
 * Parses the X-GM-LABELS list. Quoted labels keep inner spaces and lose
 * their quotes; a repeated label is kept once.
 *
 * @param headerBlock - FETCH response line
 * @returns Labels; empty when the attribute is absent
 */
export function parseLabels(headerBlock: string): Set<string> {
  const match = LABELS_PATTERN.exec(headerBlock);
  if (!match) return new Set();

  const { tokens } = tokenize(headerBlock, match.index + match[0].length);
  const labels = new Set<string>();
  for (const token of tokens) {
    const value = getTokenValue(token);
    if (value) labels.add(value);
  }
  return labels;
}

/**
 * Gmail thread id (X-GM-THRID), if present
 */
export function parseThreadId(headerBlock: string): string | undefined {
  return headerBlock.match(THREAD_ID_PATTERN)?.[1];
}

/**
 * Gmail message id (X-GM-MSGID), if present
 */
export function parseGmailMessageId(headerBlock: string): string | undefined {
  return headerBlock.match(MESSAGE_ID_PATTERN)?.[1];
}

/**
 * UID attribute, if present
 */
export function parseUid(headerBlock: string): number | undefined {
  const match = headerBlock.match(UID_PATTERN);
  return match ? parseInt(match[1], 10) : undefined;
}
