/**
 * Tokenizer for filter expressions.
 */

import { FilterParseError } from '../errors.js';

export type TokenKind =
  | 'dot' // .
  | 'recurse' // ..
  | 'field' // .name
  | 'ident'
  | 'number'
  | 'string'
  | 'punct' // [ ] { } ( ) | , : ? ;
  | 'op' // == != <= >= < > + - * / % //
  | 'eof';

export interface Token {
  kind: TokenKind;
  /** Identifier name, operator text, or the decoded string / number source. */
  text: string;
  position: number;
}

const PUNCTUATION = new Set(['[', ']', '{', '}', '(', ')', '|', ',', ':', '?', ';']);
const TWO_CHAR_OPS = new Set(['==', '!=', '<=', '>=', '//']);
const ONE_CHAR_OPS = new Set(['<', '>', '+', '-', '*', '/', '%']);

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;
const NUMBER = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source.charAt(pos);

    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      pos++;
      continue;
    }

    if (ch === '#') {
      while (pos < source.length && source.charAt(pos) !== '\n') pos++;
      continue;
    }

    if (ch === '.') {
      const next = source.charAt(pos + 1);
      if (next === '.') {
        tokens.push({ kind: 'recurse', text: '..', position: pos });
        pos += 2;
        continue;
      }
      if (IDENT_START.test(next)) {
        const start = pos;
        pos++;
        while (pos < source.length && IDENT_PART.test(source.charAt(pos))) pos++;
        tokens.push({ kind: 'field', text: source.slice(start + 1, pos), position: start });
        continue;
      }
      if (!/\d/.test(next)) {
        tokens.push({ kind: 'dot', text: '.', position: pos });
        pos++;
        continue;
      }
    }

    const number = NUMBER.exec(source.slice(pos));
    if (number !== null && (/\d/.test(ch) || ch === '.')) {
      tokens.push({ kind: 'number', text: number[0], position: pos });
      pos += number[0].length;
      continue;
    }

    if (ch === '"') {
      const start = pos;
      pos++;
      while (pos < source.length && source.charAt(pos) !== '"') {
        if (source.charAt(pos) === '\\') {
          if (source.charAt(pos + 1) === '(') {
            throw new FilterParseError('string interpolation is not supported', pos);
          }
          pos++;
        }
        pos++;
      }
      if (pos >= source.length) {
        throw new FilterParseError('unterminated string literal', start);
      }
      pos++;
      tokens.push({ kind: 'string', text: decodeString(source.slice(start, pos), start), position: start });
      continue;
    }

    if (IDENT_START.test(ch)) {
      const start = pos;
      while (pos < source.length && IDENT_PART.test(source.charAt(pos))) pos++;
      tokens.push({ kind: 'ident', text: source.slice(start, pos), position: start });
      continue;
    }

    const pair = source.slice(pos, pos + 2);
    if (TWO_CHAR_OPS.has(pair)) {
      tokens.push({ kind: 'op', text: pair, position: pos });
      pos += 2;
      continue;
    }
    if (ONE_CHAR_OPS.has(ch)) {
      tokens.push({ kind: 'op', text: ch, position: pos });
      pos++;
      continue;
    }
    if (PUNCTUATION.has(ch)) {
      tokens.push({ kind: 'punct', text: ch, position: pos });
      pos++;
      continue;
    }

    throw new FilterParseError(`unexpected character '${ch}'`, pos);
  }

  tokens.push({ kind: 'eof', text: '', position: source.length });
  return tokens;
}

function decodeString(literal: string, position: number): string {
  let decoded: unknown;
  try {
    decoded = JSON.parse(literal);
  } catch {
    throw new FilterParseError('invalid escape in string literal', position);
  }
  if (typeof decoded !== 'string') {
    throw new FilterParseError('invalid string literal', position);
  }
  return decoded;
}
