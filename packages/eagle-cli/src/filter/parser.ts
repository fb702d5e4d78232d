/**
 * Recursive-descent parser for filter expressions.
 *
 * Precedence, loosest first: `|`, `,`, `//`, `or`, `and`, comparisons
 * (non-associative), `+ -`, `* / %`, unary minus, postfix suffixes.
 */

import { FilterParseError } from '../errors.js';
import type {
  ArithmeticOperator,
  ComparisonOperator,
  FilterNode,
  IfBranch,
  ObjectEntry,
} from './ast.js';
import { tokenize, type Token } from './lexer.js';

const IDENTITY: FilterNode = { type: 'identity' };

const RESERVED = new Set(['and', 'or', 'if', 'then', 'elif', 'else', 'end']);

const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['==', '!=', '<', '<=', '>', '>='];
const ADDITIVE_OPERATORS: readonly ArithmeticOperator[] = ['+', '-'];
const MULTIPLICATIVE_OPERATORS: readonly ArithmeticOperator[] = ['*', '/', '%'];

function matchOperator<T extends string>(token: Token, operators: readonly T[]): T | undefined {
  if (token.kind !== 'op') return undefined;
  return operators.find((op) => op === token.text);
}

/**
 * Parse a filter expression. An empty expression is the identity filter.
 */
export function parseFilter(source: string): FilterNode {
  return new Parser(tokenize(source)).parseProgram();
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parseProgram(): FilterNode {
    if (this.peek().kind === 'eof') return IDENTITY;
    const node = this.parsePipe(true);
    if (this.peek().kind !== 'eof') {
      throw this.unexpected();
    }
    return node;
  }

  // ── token helpers ──

  private peek(offset = 0): Token {
    const last = this.tokens.length - 1;
    const token = this.tokens[Math.min(this.index + offset, last)];
    if (token === undefined) {
      throw new FilterParseError('unexpected end of input', 0);
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.index++;
    return token;
  }

  private isPunct(text: string): boolean {
    const token = this.peek();
    return token.kind === 'punct' && token.text === text;
  }

  private isKeyword(text: string): boolean {
    const token = this.peek();
    return token.kind === 'ident' && token.text === text;
  }

  private expectPunct(text: string): void {
    if (!this.isPunct(text)) throw this.unexpected(`expected '${text}'`);
    this.next();
  }

  private expectKeyword(text: string): void {
    if (!this.isKeyword(text)) throw this.unexpected(`expected '${text}'`);
    this.next();
  }

  private unexpected(expectation?: string): FilterParseError {
    const token = this.peek();
    const found =
      token.kind === 'eof'
        ? 'end of input'
        : token.kind === 'string'
          ? JSON.stringify(token.text)
          : `'${token.kind === 'field' ? '.' + token.text : token.text}'`;
    const detail = expectation === undefined ? `unexpected ${found}` : `${expectation}, found ${found}`;
    return new FilterParseError(detail, token.position);
  }

  // ── binary levels ──

  private parsePipe(allowComma: boolean): FilterNode {
    const left = allowComma ? this.parseComma() : this.parseAlternative();
    if (this.isPunct('|')) {
      this.next();
      return { type: 'pipe', left, right: this.parsePipe(allowComma) };
    }
    return left;
  }

  private parseComma(): FilterNode {
    let left = this.parseAlternative();
    while (this.isPunct(',')) {
      this.next();
      left = { type: 'comma', left, right: this.parseAlternative() };
    }
    return left;
  }

  private parseAlternative(): FilterNode {
    const left = this.parseOr();
    const token = this.peek();
    if (token.kind === 'op' && token.text === '//') {
      this.next();
      return { type: 'alternative', left, right: this.parseAlternative() };
    }
    return left;
  }

  private parseOr(): FilterNode {
    let left = this.parseAnd();
    while (this.isKeyword('or')) {
      this.next();
      left = { type: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): FilterNode {
    let left = this.parseComparison();
    while (this.isKeyword('and')) {
      this.next();
      left = { type: 'and', left, right: this.parseComparison() };
    }
    return left;
  }

  private parseComparison(): FilterNode {
    const left = this.parseAdditive();
    const operator = matchOperator(this.peek(), COMPARISON_OPERATORS);
    if (operator === undefined) return left;
    this.next();
    const right = this.parseAdditive();
    if (matchOperator(this.peek(), COMPARISON_OPERATORS) !== undefined) {
      throw this.unexpected('comparison operators cannot be chained');
    }
    return { type: 'binary', operator, left, right };
  }

  private parseAdditive(): FilterNode {
    let left = this.parseMultiplicative();
    for (;;) {
      const operator = matchOperator(this.peek(), ADDITIVE_OPERATORS);
      if (operator === undefined) return left;
      this.next();
      left = { type: 'binary', operator, left, right: this.parseMultiplicative() };
    }
  }

  private parseMultiplicative(): FilterNode {
    let left = this.parseUnary();
    for (;;) {
      const operator = matchOperator(this.peek(), MULTIPLICATIVE_OPERATORS);
      if (operator === undefined) return left;
      this.next();
      left = { type: 'binary', operator, left, right: this.parseUnary() };
    }
  }

  private parseUnary(): FilterNode {
    const token = this.peek();
    if (token.kind === 'op' && token.text === '-') {
      this.next();
      return { type: 'negate', body: this.parseUnary() };
    }
    return this.parsePostfix();
  }

  // ── terms ──

  private parsePostfix(): FilterNode {
    let node = this.parsePrimary();
    for (;;) {
      const token = this.peek();
      if (token.kind === 'field') {
        this.next();
        node = { type: 'field', target: node, name: token.text };
      } else if (token.kind === 'dot') {
        const after = this.peek(1);
        if (after.kind === 'string') {
          this.next();
          this.next();
          node = { type: 'field', target: node, name: after.text };
        } else if (after.kind === 'punct' && after.text === '[') {
          this.next();
          node = this.parseBracket(node);
        } else {
          throw this.unexpected();
        }
      } else if (this.isPunct('[')) {
        node = this.parseBracket(node);
      } else if (this.isPunct('?')) {
        this.next();
        node = { type: 'optional', body: node };
      } else {
        return node;
      }
    }
  }

  /** `[]`, `[i]`, `[from:to]` applied to `target`. */
  private parseBracket(target: FilterNode): FilterNode {
    this.expectPunct('[');
    if (this.isPunct(']')) {
      this.next();
      return { type: 'iterate', target };
    }
    if (this.isPunct(':')) {
      this.next();
      const to = this.parsePipe(true);
      this.expectPunct(']');
      return { type: 'slice', target, from: null, to };
    }
    const index = this.parsePipe(true);
    if (this.isPunct(':')) {
      this.next();
      const to = this.isPunct(']') ? null : this.parsePipe(true);
      this.expectPunct(']');
      return { type: 'slice', target, from: index, to };
    }
    this.expectPunct(']');
    return { type: 'index', target, index };
  }

  private parsePrimary(): FilterNode {
    const token = this.peek();
    switch (token.kind) {
      case 'dot': {
        this.next();
        const after = this.peek();
        if (after.kind === 'string') {
          this.next();
          return { type: 'field', target: IDENTITY, name: after.text };
        }
        if (after.kind === 'punct' && after.text === '[') {
          return this.parseBracket(IDENTITY);
        }
        return IDENTITY;
      }
      case 'recurse':
        this.next();
        return { type: 'recurse' };
      case 'field':
        this.next();
        return { type: 'field', target: IDENTITY, name: token.text };
      case 'number':
        this.next();
        return { type: 'literal', value: Number(token.text) };
      case 'string':
        this.next();
        return { type: 'literal', value: token.text };
      case 'ident':
        return this.parseIdentifier(token);
      case 'punct':
        if (token.text === '(') {
          this.next();
          const inner = this.parsePipe(true);
          this.expectPunct(')');
          return inner;
        }
        if (token.text === '[') {
          this.next();
          if (this.isPunct(']')) {
            this.next();
            return { type: 'array', body: null };
          }
          const body = this.parsePipe(true);
          this.expectPunct(']');
          return { type: 'array', body };
        }
        if (token.text === '{') {
          return this.parseObject();
        }
        throw this.unexpected();
      default:
        throw this.unexpected();
    }
  }

  private parseIdentifier(token: Token): FilterNode {
    switch (token.text) {
      case 'true':
        this.next();
        return { type: 'literal', value: true };
      case 'false':
        this.next();
        return { type: 'literal', value: false };
      case 'null':
        this.next();
        return { type: 'literal', value: null };
      case 'if':
        return this.parseIf();
      default:
        break;
    }
    if (RESERVED.has(token.text)) {
      throw this.unexpected();
    }

    this.next();
    const args: FilterNode[] = [];
    if (this.isPunct('(')) {
      this.next();
      args.push(this.parsePipe(true));
      while (this.isPunct(';')) {
        this.next();
        args.push(this.parsePipe(true));
      }
      this.expectPunct(')');
    }
    return { type: 'call', name: token.text, args, position: token.position };
  }

  private parseIf(): FilterNode {
    this.expectKeyword('if');
    const branches: IfBranch[] = [];
    const condition = this.parsePipe(true);
    this.expectKeyword('then');
    branches.push({ condition, then: this.parsePipe(true) });

    while (this.isKeyword('elif')) {
      this.next();
      const elifCondition = this.parsePipe(true);
      this.expectKeyword('then');
      branches.push({ condition: elifCondition, then: this.parsePipe(true) });
    }

    let otherwise: FilterNode | null = null;
    if (this.isKeyword('else')) {
      this.next();
      otherwise = this.parsePipe(true);
    }
    this.expectKeyword('end');
    return { type: 'if', branches, otherwise };
  }

  private parseObject(): FilterNode {
    this.expectPunct('{');
    const entries: ObjectEntry[] = [];
    if (this.isPunct('}')) {
      this.next();
      return { type: 'object', entries };
    }

    for (;;) {
      entries.push(this.parseObjectEntry());
      if (this.isPunct(',')) {
        this.next();
        continue;
      }
      this.expectPunct('}');
      return { type: 'object', entries };
    }
  }

  private parseObjectEntry(): ObjectEntry {
    const token = this.peek();

    if (token.kind === 'punct' && token.text === '(') {
      this.next();
      const key = this.parsePipe(true);
      this.expectPunct(')');
      this.expectPunct(':');
      return { key, value: this.parsePipe(false) };
    }

    if (token.kind === 'ident' || token.kind === 'string') {
      this.next();
      const key: FilterNode = { type: 'literal', value: token.text };
      if (this.isPunct(':')) {
        this.next();
        return { key, value: this.parsePipe(false) };
      }
      return { key, value: { type: 'field', target: IDENTITY, name: token.text } };
    }

    throw this.unexpected('expected an object key');
  }
}
