/**
 * rson — Error taxonomy.
 *
 * Lexer and parser errors carry a UTF-8 byte offset into the original input.
 * Bridge errors describe failures at the module boundary and carry no offset.
 */

export const LEX_ERROR_KINDS = [
  'UnterminatedString',
  'UnterminatedComment',
  'UnexpectedByte',
  'InvalidEscape',
  'InvalidNumber',
] as const;

export const PARSE_ERROR_KINDS = [
  'UnexpectedToken',
  'UnexpectedEndOfInput',
  'MalformedTaggedIdentifier',
] as const;

export const BRIDGE_ERROR_KINDS = [
  'InvalidUtf8',
  'OutOfMemory',
  'InvalidPointer',
  'InputTooLarge',
] as const;

export type LexErrorKind = (typeof LEX_ERROR_KINDS)[number];
export type ParseErrorKind = (typeof PARSE_ERROR_KINDS)[number];
export type BridgeErrorKind = (typeof BRIDGE_ERROR_KINDS)[number];

export abstract class RsonError extends Error {
  abstract readonly kind: LexErrorKind | ParseErrorKind | BridgeErrorKind;
}

const LEX_MESSAGES: Record<LexErrorKind, string> = {
  UnterminatedString: 'Unterminated string',
  UnterminatedComment: 'Unterminated block comment',
  UnexpectedByte: 'Unexpected character',
  InvalidEscape: 'Invalid escape sequence',
  InvalidNumber: 'Invalid number',
};

export class LexError extends RsonError {
  readonly kind: LexErrorKind;
  readonly offset: number;

  constructor(kind: LexErrorKind, offset: number) {
    super(`${LEX_MESSAGES[kind]} at byte ${offset}`);
    this.name = 'LexError';
    this.kind = kind;
    this.offset = offset;
  }
}

export class ParseError extends RsonError {
  readonly kind: ParseErrorKind;
  readonly offset: number;

  constructor(kind: ParseErrorKind, offset: number, detail: string) {
    super(`${detail} at byte ${offset}`);
    this.name = 'ParseError';
    this.kind = kind;
    this.offset = offset;
  }
}

export class BridgeError extends RsonError {
  readonly kind: BridgeErrorKind;

  constructor(kind: BridgeErrorKind, message: string) {
    super(message);
    this.name = 'BridgeError';
    this.kind = kind;
  }
}

/**
 * Render anything thrown as a one-line message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
