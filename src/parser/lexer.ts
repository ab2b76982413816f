/**
 * Tokenizer for the type-declaration dialect.
 *
 * Comments are legal wherever whitespace is. `Hint:` comments are kept on the
 * token that follows them; every other comment is dropped.
 */

import { SchemaSyntaxError, type SourcePosition } from '../core/errors.js';

export type TokenKind = 'identifier' | 'string' | 'number' | 'punct' | 'eof';

export interface Token {
  kind: TokenKind;
  /** Identifier name, punctuation character, number text or decoded string. */
  text: string;
  position: SourcePosition;
  /** Hint comments seen since the previous token. */
  hints: string[];
}

export const HINT_PREFIX = 'Hint:';

const PUNCTUATION = new Set(['=', ';', '|', '{', '}', '[', ']', '<', '>', '(', ')', ',', ':', '?']);

const IDENTIFIER_START = /[A-Za-z_$]/;
const IDENTIFIER_PART = /[A-Za-z0-9_$]/;
const DIGIT = /[0-9]/;
const NUMBER = /^-?[0-9]+(\.[0-9]+)?([eE][+-]?[0-9]+)?/;

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  b: '\b',
  f: '\f',
  v: '\v',
  '0': '\0',
};

/**
 * Extract the text of a hint from a comment body with its delimiters removed.
 * Returns undefined for ordinary comments.
 */
export function hintText(body: string): string | undefined {
  const unstarred = body
    .split('\n')
    .map((line) => line.replace(/^\s*\*+/, ''))
    .join(' ');
  const trimmed = unstarred.trimStart();
  if (!trimmed.startsWith(HINT_PREFIX)) return undefined;
  return trimmed.slice(HINT_PREFIX.length).replace(/\s+/g, ' ').trim();
}

/**
 * Split dialect source into tokens, ending with a single `eof` token.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let offset = 0;
  let line = 1;
  let lineStart = 0;
  let hints: string[] = [];

  function position(): SourcePosition {
    return { offset, line, column: offset - lineStart + 1 };
  }

  function advance(count: number) {
    for (let i = 0; i < count && offset < text.length; i++) {
      if (text[offset] === '\n') {
        line++;
        lineStart = offset + 1;
      }
      offset++;
    }
  }

  function push(kind: TokenKind, value: string, start: SourcePosition) {
    tokens.push({ kind, text: value, position: start, hints });
    hints = [];
  }

  function readString(start: SourcePosition): string {
    const quote = text[offset];
    advance(1);
    let value = '';
    while (offset < text.length) {
      const ch = text[offset];
      if (ch === quote) {
        advance(1);
        return value;
      }
      if (ch === '\n') break;
      if (ch === '\\') {
        const escaped = text[offset + 1];
        if (escaped === undefined) break;
        if (escaped === 'u') {
          const hex = text.slice(offset + 2, offset + 6);
          if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
            throw new SchemaSyntaxError('Invalid unicode escape', position());
          }
          value += String.fromCharCode(parseInt(hex, 16));
          advance(6);
          continue;
        }
        value += ESCAPES[escaped] ?? escaped;
        advance(2);
        continue;
      }
      value += ch;
      advance(1);
    }
    throw new SchemaSyntaxError('Unterminated string literal', start);
  }

  while (offset < text.length) {
    const ch = text[offset];
    const start = position();

    if (/\s/.test(ch)) {
      advance(1);
      continue;
    }

    if (text.startsWith('//', offset)) {
      const end = text.indexOf('\n', offset);
      const stop = end === -1 ? text.length : end;
      const hint = hintText(text.slice(offset + 2, stop));
      if (hint !== undefined) hints.push(hint);
      advance(stop - offset);
      continue;
    }

    if (text.startsWith('/*', offset)) {
      const end = text.indexOf('*/', offset + 2);
      if (end === -1) {
        throw new SchemaSyntaxError('Unterminated block comment', start);
      }
      const hint = hintText(text.slice(offset + 2, end));
      if (hint !== undefined) hints.push(hint);
      advance(end + 2 - offset);
      continue;
    }

    if (ch === '"' || ch === "'") {
      push('string', readString(start), start);
      continue;
    }

    if (DIGIT.test(ch) || (ch === '-' && DIGIT.test(text[offset + 1] ?? ''))) {
      const match = NUMBER.exec(text.slice(offset));
      const raw = match ? match[0] : ch;
      advance(raw.length);
      push('number', raw, start);
      continue;
    }

    if (IDENTIFIER_START.test(ch)) {
      let end = offset + 1;
      while (end < text.length && IDENTIFIER_PART.test(text[end])) end++;
      const name = text.slice(offset, end);
      advance(end - offset);
      push('identifier', name, start);
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      advance(1);
      push('punct', ch, start);
      continue;
    }

    throw new SchemaSyntaxError(`Unexpected character "${ch}"`, start);
  }

  push('eof', '', position());
  return tokens;
}
