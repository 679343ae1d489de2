/**
 * rson - Engine facade
 *
 * tokenize → parse → encode, with lexer and parser failures turned into a
 * positioned error result. Holds no state between calls.
 */

import { tokenize } from './lexer';
import { parseDocument } from './parser';
import { encodeDocument } from './encoder';
import { LexError, LexErrorKind, ParseError, ParseErrorKind } from './errors';
import { EngineOptions } from './types';

export type EngineError =
  | { stage: 'lex'; kind: LexErrorKind; offset: number; message: string }
  | { stage: 'parse'; kind: ParseErrorKind; offset: number; message: string };

export type RunResult =
  | { ok: true; output: string }
  | { ok: false; error: EngineError };

/**
 * Parse `input` and re-encode it canonically.
 * Never throws for malformed input; the first error is returned instead.
 */
export function run(input: string, options: EngineOptions = {}): RunResult {
  try {
    const tokens = tokenize(input, { comments: options.comments === 'preserve' ? 'retain' : 'skip' });
    const doc = parseDocument(tokens);
    return { ok: true, output: encodeDocument(doc, options.encode) };
  } catch (err) {
    if (err instanceof LexError) {
      return { ok: false, error: { stage: 'lex', kind: err.kind, offset: err.offset, message: err.message } };
    }
    if (err instanceof ParseError) {
      return { ok: false, error: { stage: 'parse', kind: err.kind, offset: err.offset, message: err.message } };
    }
    throw err;
  }
}
