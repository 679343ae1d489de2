/**
 * rson — Lexer.
 *
 * Scans source text left to right into tokens using longest-match rules.
 * Offsets are UTF-8 byte offsets so they line up with what crosses the
 * bridge, even though scanning happens over the decoded string.
 */

import { LexError } from './errors';
import { Punctuation, Token, isKeyword } from './token';

export interface TokenizeOptions {
  /** "skip" drops comments (default), "retain" yields them as tokens */
  comments?: 'skip' | 'retain';
}

const PUNCTUATION = new Set<string>(['{', '}', '[', ']', '(', ')', ':', ',']);

function isPunctuation(ch: string): ch is Punctuation {
  return PUNCTUATION.has(ch);
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isIdentStart(ch: string | undefined): boolean {
  return ch !== undefined && ((ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_');
}

function isIdentPart(ch: string | undefined): boolean {
  return isIdentStart(ch) || isDigit(ch);
}

function isHexQuad(text: string): boolean {
  return /^[0-9A-Fa-f]{4}$/.test(text);
}

function utf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  b: '\b',
  f: '\f',
  '/': '/',
  '\\': '\\',
  '"': '"',
};

export class Lexer {
  private readonly source: string;
  private readonly keepComments: boolean;
  /** UTF-16 index into `source` */
  private index = 0;
  /** UTF-8 byte offset of `index` */
  private offset = 0;

  constructor(source: string, options: TokenizeOptions = {}) {
    this.source = source;
    this.keepComments = options.comments === 'retain';
  }

  /**
   * Produce the next token. Returns an `eof` token once the input is
   * exhausted, and keeps returning it on further calls.
   */
  next(): Token {
    for (;;) {
      const token = this.scan();
      if (token.kind !== 'comment' || this.keepComments) return token;
    }
  }

  // ── Scanning ─────────────────────────────────────────────

  private scan(): Token {
    this.skipWhitespace();

    const start = this.offset;
    const ch = this.peek();

    if (ch === undefined) {
      return { kind: 'eof', span: { start, end: start } };
    }
    if (isPunctuation(ch)) {
      this.advance();
      return { kind: 'punct', value: ch, span: { start, end: this.offset } };
    }
    if (ch === '"') return this.readString();
    if (ch === '/') return this.readComment();
    if (ch === '-' || ch === '+' || isDigit(ch)) return this.readNumber();
    if (isIdentStart(ch)) return this.readWord();

    throw new LexError('UnexpectedByte', start);
  }

  private readString(): Token {
    const start = this.offset;
    this.advance(); // opening quote

    let value = '';
    let runStart = this.index;

    for (;;) {
      const ch = this.peek();
      if (ch === undefined) {
        throw new LexError('UnterminatedString', start);
      }
      if (ch === '"') {
        value += this.source.slice(runStart, this.index);
        this.advance();
        return { kind: 'string', value, span: { start, end: this.offset } };
      }
      if (ch === '\\') {
        value += this.source.slice(runStart, this.index);
        value += this.readEscape(start);
        runStart = this.index;
        continue;
      }
      if (this.atLoneSurrogate()) {
        throw new LexError('UnexpectedByte', this.offset);
      }
      this.advance();
    }
  }

  /**
   * Decode one escape sequence, cursor on the backslash.
   */
  private readEscape(stringStart: number): string {
    const escapeStart = this.offset;
    this.advance(); // backslash

    const letter = this.peek();
    if (letter === undefined) {
      throw new LexError('UnterminatedString', stringStart);
    }

    const simple = SIMPLE_ESCAPES[letter];
    if (simple !== undefined) {
      this.advance();
      return simple;
    }
    if (letter !== 'u') {
      throw new LexError('InvalidEscape', escapeStart);
    }

    this.advance();
    const high = this.readHexQuad(escapeStart);

    if (high >= 0xdc00 && high <= 0xdfff) {
      throw new LexError('InvalidEscape', escapeStart);
    }
    if (high < 0xd800 || high > 0xdbff) {
      return String.fromCharCode(high);
    }

    // high surrogate: must be followed by an escaped low surrogate
    if (!this.source.startsWith('\\u', this.index)) {
      throw new LexError('InvalidEscape', escapeStart);
    }
    this.advance();
    this.advance();
    const low = this.readHexQuad(escapeStart);
    if (low < 0xdc00 || low > 0xdfff) {
      throw new LexError('InvalidEscape', escapeStart);
    }
    return String.fromCharCode(high, low);
  }

  private readHexQuad(escapeStart: number): number {
    const digits = this.source.slice(this.index, this.index + 4);
    if (!isHexQuad(digits)) {
      throw new LexError('InvalidEscape', escapeStart);
    }
    this.index += 4;
    this.offset += 4;
    return parseInt(digits, 16);
  }

  private readNumber(): Token {
    const start = this.offset;
    const startIndex = this.index;

    if (this.peek() === '-' || this.peek() === '+') {
      this.advance();
      if (!isDigit(this.peek())) {
        throw new LexError('UnexpectedByte', start);
      }
    }
    this.skipDigits();

    if (this.peek() === '.' && isDigit(this.peekAt(1))) {
      this.advance();
      this.skipDigits();
    }

    const marker = this.peek();
    if (marker === 'e' || marker === 'E') {
      this.advance();
      if (this.peek() === '-' || this.peek() === '+') this.advance();
      if (!isDigit(this.peek())) {
        throw new LexError('InvalidNumber', start);
      }
      this.skipDigits();
    }

    const lexeme = this.source.slice(startIndex, this.index);
    const value = Number(lexeme);
    if (!Number.isFinite(value)) {
      throw new LexError('InvalidNumber', start);
    }
    return { kind: 'number', lexeme, value, span: { start, end: this.offset } };
  }

  private readWord(): Token {
    const start = this.offset;
    const startIndex = this.index;
    while (isIdentPart(this.peek())) this.advance();

    const word = this.source.slice(startIndex, this.index);
    const span = { start, end: this.offset };
    return isKeyword(word)
      ? { kind: 'keyword', value: word, span }
      : { kind: 'ident', name: word, span };
  }

  private readComment(): Token {
    const start = this.offset;
    const startIndex = this.index;
    const second = this.peekAt(1);

    if (second === '/') {
      while (this.peek() !== undefined && this.peek() !== '\n') this.advance();
      const text = this.source.slice(startIndex, this.index).trimEnd();
      return { kind: 'comment', style: 'line', text, span: { start, end: this.offset } };
    }

    if (second === '*') {
      const close = this.source.indexOf('*/', this.index + 2);
      if (close < 0) {
        throw new LexError('UnterminatedComment', start);
      }
      while (this.index < close + 2) this.advance();
      const text = this.source.slice(startIndex, this.index);
      return { kind: 'comment', style: 'block', text, span: { start, end: this.offset } };
    }

    throw new LexError('UnexpectedByte', start);
  }

  // ── Cursor helpers ───────────────────────────────────────

  private peek(): string | undefined {
    return this.index < this.source.length ? this.source[this.index] : undefined;
  }

  private peekAt(distance: number): string | undefined {
    const at = this.index + distance;
    return at < this.source.length ? this.source[at] : undefined;
  }

  /** On a surrogate code unit that is not half of a pair */
  private atLoneSurrogate(): boolean {
    const codePoint = this.source.codePointAt(this.index);
    return codePoint !== undefined && codePoint >= 0xd800 && codePoint <= 0xdfff;
  }

  /** Move past one code point, keeping the byte offset in step */
  private advance(): void {
    const codePoint = this.source.codePointAt(this.index);
    if (codePoint === undefined) return;
    this.index += codePoint > 0xffff ? 2 : 1;
    this.offset += utf8Length(codePoint);
  }

  private skipDigits(): void {
    while (isDigit(this.peek())) this.advance();
  }

  private skipWhitespace(): void {
    for (;;) {
      const ch = this.peek();
      if (ch !== ' ' && ch !== '\t' && ch !== '\n' && ch !== '\r') return;
      this.advance();
    }
  }
}

/**
 * Lazily tokenize `source`. The sequence ends with a single `eof` token.
 * Lexical errors are thrown as `LexError` when the offending token is reached.
 */
export function* tokenize(source: string, options: TokenizeOptions = {}): Generator<Token, void, undefined> {
  const lexer = new Lexer(source, options);
  for (;;) {
    const token = lexer.next();
    yield token;
    if (token.kind === 'eof') return;
  }
}
