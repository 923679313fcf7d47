/**
 * IMAP Response Tokenizer
 *
 * Reads atoms, quoted strings, NIL and parenthesized lists out of a
 * response line. Literals are not expanded; `{123}` comes back as an atom.
 *
 * @packageDocumentation
 */

/**
 * A token from an IMAP response
 */
export type Token =
  | { type: 'atom'; value: string }
  | { type: 'quoted'; value: string }
  | { type: 'nil'; value: null }
  | { type: 'list'; value: Token[] };

/**
 * Result of reading tokens from a position
 */
export interface TokenizeResult {
  tokens: Token[];
  /** Index just past the last consumed character */
  pos: number;
}

/**
 * Characters that end an atom. Backslash is not one of them: it starts
 * flags and system labels such as \Seen or \Important.
 */
const ATOM_SPECIALS = new Set(['(', ')', ' ', '\t', '\r', '\n', '"']);

function readQuoted(input: string, start: number): { value: string; pos: number } {
  let pos = start + 1;
  let value = '';

  while (pos < input.length) {
    const char = input[pos];
    if (char === '\\' && pos + 1 < input.length) {
      value += input[pos + 1];
      pos += 2;
      continue;
    }
    if (char === '"') {
      return { value, pos: pos + 1 };
    }
    value += char;
    pos++;
  }

  // Unterminated quoted string - return what we have
  return { value, pos };
}

/**
 * Tokenizes input from `start` until the end of the line, or until the
 * `)` closing the list the caller is inside of
 *
 * @param input - Response text
 * @param start - Position to start reading at
 */
export function tokenize(input: string, start: number = 0): TokenizeResult {
  const tokens: Token[] = [];
  let pos = start;

  while (pos < input.length) {
    const char = input[pos];

    if (char === ' ' || char === '\t') {
      pos++;
      continue;
    }
    if (char === '\r' || char === '\n' || char === ')') {
      break;
    }

    if (char === '"') {
      const quoted = readQuoted(input, pos);
      tokens.push({ type: 'quoted', value: quoted.value });
      pos = quoted.pos;
      continue;
    }

    if (char === '(') {
      const inner = tokenize(input, pos + 1);
      tokens.push({ type: 'list', value: inner.tokens });
      // Skip the closing paren when present
      pos = input[inner.pos] === ')' ? inner.pos + 1 : inner.pos;
      continue;
    }

    let end = pos;
    while (end < input.length && !ATOM_SPECIALS.has(input[end])) end++;
    const atom = input.slice(pos, end);
    tokens.push(atom.toUpperCase() === 'NIL' ? { type: 'nil', value: null } : { type: 'atom', value: atom });
    pos = end;
  }

  return { tokens, pos };
}

/**
 * String value of an atom or quoted token; null for NIL and lists
 */
export function getTokenValue(token: Token): string | null {
  return token.type === 'atom' || token.type === 'quoted' ? token.value : null;
}
