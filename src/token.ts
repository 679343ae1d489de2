/**
 * rson — Token definitions shared by the lexer and parser.
 */

export type Punctuation = '{' | '}' | '[' | ']' | '(' | ')' | ':' | ',';

export type Keyword = 'true' | 'false' | 'null';

/** Byte span [start, end) in the UTF-8 encoding of the source */
export interface Span {
  start: number;
  end: number;
}

export type Token =
  | { readonly kind: 'punct'; readonly value: Punctuation; readonly span: Span }
  | { readonly kind: 'ident'; readonly name: string; readonly span: Span }
  | { readonly kind: 'keyword'; readonly value: Keyword; readonly span: Span }
  | { readonly kind: 'string'; readonly value: string; readonly span: Span }
  | { readonly kind: 'number'; readonly lexeme: string; readonly value: number; readonly span: Span }
  | { readonly kind: 'comment'; readonly style: 'line' | 'block'; readonly text: string; readonly span: Span }
  | { readonly kind: 'eof'; readonly span: Span };

export type TokenKind = Token['kind'];

export const KEYWORDS: ReadonlySet<string> = new Set(['true', 'false', 'null']);

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * True for names the lexer would produce as an identifier token.
 * Keywords are not identifiers.
 */
export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name) && !KEYWORDS.has(name);
}

export function isKeyword(name: string): name is Keyword {
  return KEYWORDS.has(name);
}

/** Short human description of a token for error messages */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'punct':
      return `'${token.value}'`;
    case 'ident':
      return `identifier ${token.name}`;
    case 'keyword':
      return `keyword ${token.value}`;
    case 'string':
      return 'string';
    case 'number':
      return `number ${token.lexeme}`;
    case 'comment':
      return 'comment';
    case 'eof':
      return 'end of input';
  }
}
