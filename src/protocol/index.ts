/**
 * Protocol Module
 *
 * Response tokenizing and extraction of FETCH and LIST data.
 *
 * @packageDocumentation
 */

export { tokenize, getTokenValue } from './tokenizer.js';
export type { Token, TokenizeResult } from './tokenizer.js';

export {
  parseFlags,
  parseLabels,
  parseThreadId,
  parseGmailMessageId,
  parseUid,
} from './fetch-attributes.js';

export { parseListLine, parseListResponse } from './list-parser.js';
export type { MailboxInfo } from './list-parser.js';
