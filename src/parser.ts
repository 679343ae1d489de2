/**
 * rson — Parser.
 *
 * Grammar:
 *   value    := null | true | false | number | string
 *             | ident                      (bare word, read as a string)
 *             | ident sequence | ident mapping   (tagged variant)
 *             | sequence | mapping
 *   sequence := '[' items? ']' | '(' items? ')'
 *   mapping  := '{' (entry (',' entry)* ','?)? '}'
 *   entry    := value ':' value
 *   items    := value (',' value)* ','?
 *
 * Comment tokens are trivia: they never decide a production. When present
 * they are gathered and attached to the next element, or to the container
 * they close.
 */

import { ParseError } from './errors';
import { Punctuation, Token, describeToken } from './token';
import {
  Comment,
  Document,
  MappingEntry,
  Value,
  bool,
  mapping,
  nullValue,
  number,
  sequence,
  string,
  tagged,
  withLeadingComments,
} from './value';

type Frame =
  | { kind: 'sequence'; tag: string | null; close: ']' | ')'; items: Value[]; leading: Comment[] }
  | { kind: 'mapping'; tag: string | null; entries: MappingEntry[]; key: Value | null; leading: Comment[] };

function openFrame(punct: Punctuation, tag: string | null): Frame | null {
  switch (punct) {
    case '[':
      return { kind: 'sequence', tag, close: ']', items: [], leading: [] };
    case '(':
      return { kind: 'sequence', tag, close: ')', items: [], leading: [] };
    case '{':
      return { kind: 'mapping', tag, entries: [], key: null, leading: [] };
    default:
      return null;
  }
}

function closerOf(frame: Frame): Punctuation {
  return frame.kind === 'sequence' ? frame.close : '}';
}

function closeFrame(frame: Frame, closing: Comment[]): Value {
  const body = frame.kind === 'sequence' ? sequence(frame.items, closing) : mapping(frame.entries, closing);
  return frame.tag === null ? body : tagged(frame.tag, body);
}

export class Parser {
  private readonly tokens: Iterator<Token>;
  private current: Token;
  private pending: Comment[] = [];
  private lastEnd = 0;

  constructor(tokens: Iterable<Token>) {
    this.tokens = tokens[Symbol.iterator]();
    this.current = this.pull();
  }

  // ── Public API ───────────────────────────────────────────

  /**
   * Parse exactly one value followed by end of input.
   */
  parseDocument(): Document {
    const leading = this.takeComments();
    const value = withLeadingComments(this.parseValue(), leading);

    if (this.current.kind !== 'eof') {
      throw this.unexpected();
    }
    return { value, trailingComments: this.takeComments() };
  }

  // ── Productions ──────────────────────────────────────────

  /**
   * Containers are tracked on an explicit stack of frames, so nesting depth
   * is bounded by memory rather than by the call stack.
   */
  private parseValue(): Value {
    const frames: Frame[] = [];
    let done = this.begin(frames);

    for (;;) {
      if (done !== null) {
        if (frames.length === 0) return done;
        done = this.deliver(frames, frames[frames.length - 1], done);
        continue;
      }

      // a container was opened or took an element: close it or start the next one
      const frame = frames[frames.length - 1];
      if (this.atPunct(closerOf(frame))) {
        const closing = this.takeComments();
        this.advance();
        frames.pop();
        done = closeFrame(frame, closing);
      } else {
        frame.leading = this.takeComments();
        done = this.begin(frames);
      }
    }
  }

  /**
   * Start a value at the cursor. Scalars come back complete; an opening
   * delimiter pushes a frame and yields null.
   */
  private begin(frames: Frame[]): Value | null {
    const token = this.current;

    switch (token.kind) {
      case 'punct': {
        const frame = openFrame(token.value, null);
        if (frame === null) throw this.unexpected();
        this.advance();
        frames.push(frame);
        return null;
      }
      case 'keyword': {
        this.advance();
        if (this.atOpening()) {
          throw new ParseError(
            'MalformedTaggedIdentifier',
            token.span.start,
            `Keyword "${token.value}" cannot name a tagged variant`,
          );
        }
        if (token.value === 'null') return nullValue();
        return bool(token.value === 'true');
      }
      case 'ident': {
        this.advance();
        const open = this.current;
        const frame = open.kind === 'punct' && open.value !== '[' ? openFrame(open.value, token.name) : null;
        if (frame === null) return string(token.name);
        this.advance();
        frames.push(frame);
        return null;
      }
      case 'string':
        this.advance();
        return string(token.value);
      case 'number':
        this.advance();
        return number(token.value, token.lexeme);
      case 'comment':
      case 'eof':
        break;
    }
    throw this.unexpected();
  }

  /**
   * Hand a finished value to the innermost container. Returns the next
   * finished value when the hand-off itself completes one, else null.
   */
  private deliver(frames: Frame[], frame: Frame, value: Value): Value | null {
    if (frame.kind === 'sequence') {
      frame.items.push(withLeadingComments(value, frame.leading));
      this.expectSeparator(frame.close);
      return null;
    }

    if (frame.key === null) {
      this.expectPunct(':');
      // comments around the colon travel with the entry
      const inner = this.takeComments();
      frame.key = withLeadingComments(value, [...frame.leading, ...inner]);
      return this.begin(frames);
    }

    frame.entries.push([frame.key, value]);
    frame.key = null;
    this.expectSeparator('}');
    return null;
  }

  // ── Token helpers ────────────────────────────────────────

  /**
   * After an element: either a comma, or the closing delimiter (left in place).
   */
  private expectSeparator(close: Punctuation): void {
    if (this.atPunct(',')) {
      this.advance();
      return;
    }
    if (!this.atPunct(close)) {
      throw this.unexpected();
    }
  }

  private expectPunct(value: Punctuation): void {
    if (!this.atPunct(value)) {
      throw this.unexpected();
    }
    this.advance();
  }

  private atPunct(value: Punctuation): boolean {
    return this.current.kind === 'punct' && this.current.value === value;
  }

  /** True at the body of a tagged variant */
  private atOpening(): boolean {
    return this.atPunct('(') || this.atPunct('{');
  }

  private advance(): void {
    this.lastEnd = this.current.span.end;
    this.current = this.pull();
  }

  /** Next significant token; comments on the way are queued */
  private pull(): Token {
    for (;;) {
      const next = this.tokens.next();
      if (next.done) {
        return { kind: 'eof', span: { start: this.lastEnd, end: this.lastEnd } };
      }
      const token = next.value;
      if (token.kind !== 'comment') return token;
      this.pending.push({ style: token.style, text: token.text });
      this.lastEnd = token.span.end;
    }
  }

  private takeComments(): Comment[] {
    const taken = this.pending;
    this.pending = [];
    return taken;
  }

  private unexpected(): ParseError {
    const token = this.current;
    if (token.kind === 'eof') {
      return new ParseError('UnexpectedEndOfInput', token.span.start, 'Unexpected end of input');
    }
    return new ParseError('UnexpectedToken', token.span.start, `Unexpected ${describeToken(token)}`);
  }
}

/**
 * Parse a token sequence into a document (root value plus trailing comments).
 */
export function parseDocument(tokens: Iterable<Token>): Document {
  return new Parser(tokens).parseDocument();
}

/**
 * Parse a token sequence into a single value. All tokens must be consumed.
 */
export function parse(tokens: Iterable<Token>): Value {
  return parseDocument(tokens).value;
}
