/**
 * Unit tests for the lexer
 */

import { tokenize } from './lexer';
import { LexError } from './errors';
import { Token } from './token';

function lexErrorOf(source: string): LexError {
  try {
    [...tokenize(source)];
  } catch (err) {
    if (err instanceof LexError) return err;
    throw err;
  }
  throw new Error(`Expected a LexError for ${JSON.stringify(source)}`);
}

function kinds(tokens: Token[]): string[] {
  return tokens.map(t => (t.kind === 'punct' ? t.value : t.kind));
}

describe('tokenize', () => {
  describe('Token classification', () => {
    it('should classify punctuation, strings, numbers, identifiers and keywords', () => {
      const tokens = [...tokenize('{"n": -1.5, k: [true, null]}')];

      expect(kinds(tokens)).toEqual([
        '{', 'string', ':', 'number', ',', 'ident', ':', '[', 'keyword', ',', 'keyword', ']', '}', 'eof',
      ]);
      expect(tokens[1]).toEqual({ kind: 'string', value: 'n', span: { start: 1, end: 4 } });
      expect(tokens[3]).toEqual({ kind: 'number', lexeme: '-1.5', value: -1.5, span: { start: 6, end: 10 } });
      expect(tokens[5]).toEqual({ kind: 'ident', name: 'k', span: { start: 12, end: 13 } });
      expect(tokens[13]).toEqual({ kind: 'eof', span: { start: 28, end: 28 } });
    });

    it('should tell keywords from identifiers that start with them', () => {
      const tokens = [...tokenize('true truthy _x9 null')];

      expect(tokens.map(t => t.kind)).toEqual(['keyword', 'ident', 'ident', 'keyword', 'eof']);
      expect(tokens[1]).toMatchObject({ name: 'truthy' });
      expect(tokens[2]).toMatchObject({ name: '_x9' });
    });

    it('should report spans as UTF-8 byte offsets', () => {
      const tokens = [...tokenize('"é" x')];

      expect(tokens[0]).toEqual({ kind: 'string', value: 'é', span: { start: 0, end: 4 } });
      expect(tokens[1]).toEqual({ kind: 'ident', name: 'x', span: { start: 5, end: 6 } });
    });

    it('should count astral characters as four bytes', () => {
      const tokens = [...tokenize('"😀" 1')];

      expect(tokens[0].span).toEqual({ start: 0, end: 6 });
      expect(tokens[1].span).toEqual({ start: 7, end: 8 });
    });
  });

  describe('Numbers', () => {
    it('should keep the lexeme and decode the value', () => {
      const [token] = [...tokenize('1.50')];
      expect(token).toMatchObject({ kind: 'number', lexeme: '1.50', value: 1.5 });
    });

    it('should accept signs and exponents', () => {
      const values = [...tokenize('+3 2e3 1.5E-2 -0')]
        .filter(t => t.kind === 'number')
        .map(t => (t.kind === 'number' ? t.value : NaN));

      expect(values).toEqual([3, 2000, 0.015, -0]);
      expect(Object.is(values[3], -0)).toBe(true);
    });

    it('should reject an exponent without digits', () => {
      const err = lexErrorOf('[1e]');
      expect(err.kind).toBe('InvalidNumber');
      expect(err.offset).toBe(1);
    });

    it('should reject numbers that overflow a double', () => {
      const err = lexErrorOf('1e999');
      expect(err.kind).toBe('InvalidNumber');
      expect(err.offset).toBe(0);
    });

    it('should reject a sign without digits', () => {
      const err = lexErrorOf('-x');
      expect(err.kind).toBe('UnexpectedByte');
      expect(err.offset).toBe(0);
    });

    it('should stop before a dot that has no digits after it', () => {
      const tokens = tokenize('1.');
      expect(tokens.next().value).toMatchObject({ kind: 'number', lexeme: '1' });

      expect(() => tokens.next()).toThrow('Unexpected character at byte 1');
    });
  });

  describe('Strings', () => {
    it('should resolve escapes', () => {
      const [token] = [...tokenize('"a\\nb\\t\\"\\\\\\/\\u00e9\\ud83d\\ude00"')];
      expect(token).toMatchObject({ kind: 'string', value: 'a\nb\t"\\/é😀' });
    });

    it('should report an unterminated string at its opening quote', () => {
      const err = lexErrorOf('{"key":   "abc');
      expect(err.kind).toBe('UnterminatedString');
      expect(err.offset).toBe(10);
      expect(err.message).toBe('Unterminated string at byte 10');
    });

    it('should treat a trailing backslash as unterminated', () => {
      const err = lexErrorOf('"abc\\');
      expect(err.kind).toBe('UnterminatedString');
      expect(err.offset).toBe(0);
    });

    it('should reject unknown escape letters', () => {
      const err = lexErrorOf('["ok", "\\q"]');
      expect(err.kind).toBe('InvalidEscape');
      expect(err.offset).toBe(8);
    });

    it('should reject short unicode escapes', () => {
      const err = lexErrorOf('"\\u12"');
      expect(err.kind).toBe('InvalidEscape');
      expect(err.offset).toBe(1);
    });

    it('should reject raw lone surrogates in string literals', () => {
      const err = lexErrorOf('["a\uD800b"]');
      expect(err.kind).toBe('UnexpectedByte');
      expect(err.offset).toBe(3);
    });

    it('should reject unpaired surrogates', () => {
      expect(lexErrorOf('"\\udc00"').kind).toBe('InvalidEscape');
      expect(lexErrorOf('"\\ud83dx"').kind).toBe('InvalidEscape');
      expect(lexErrorOf('"\\ud83d\\u0041"').kind).toBe('InvalidEscape');
    });
  });

  describe('Comments', () => {
    it('should skip comments by default', () => {
      const tokens = [...tokenize('// note\n[1 /* b */]')];
      expect(kinds(tokens)).toEqual(['[', 'number', ']', 'eof']);
    });

    it('should retain comments when asked', () => {
      const tokens = [...tokenize('// note\n[1 /* b */]', { comments: 'retain' })];

      expect(kinds(tokens)).toEqual(['comment', '[', 'number', 'comment', ']', 'eof']);
      expect(tokens[0]).toEqual({ kind: 'comment', style: 'line', text: '// note', span: { start: 0, end: 7 } });
      expect(tokens[3]).toEqual({ kind: 'comment', style: 'block', text: '/* b */', span: { start: 11, end: 18 } });
    });

    it('should report an unterminated block comment at its start', () => {
      const err = lexErrorOf('[1 /* x');
      expect(err.kind).toBe('UnterminatedComment');
      expect(err.offset).toBe(3);
    });

    it('should reject a lone slash', () => {
      const err = lexErrorOf('[1 / 2]');
      expect(err.kind).toBe('UnexpectedByte');
      expect(err.offset).toBe(3);
    });
  });

  describe('Errors and laziness', () => {
    it('should report unexpected characters with their offset', () => {
      const err = lexErrorOf('[1, @]');
      expect(err.kind).toBe('UnexpectedByte');
      expect(err.offset).toBe(4);
    });

    it('should not scan past the token being requested', () => {
      const tokens = tokenize('[ @');

      expect(tokens.next().value).toMatchObject({ kind: 'punct', value: '[' });
      expect(() => tokens.next()).toThrow(LexError);
    });

    it('should end with exactly one eof token', () => {
      const tokens = [...tokenize('   ')];
      expect(tokens).toEqual([{ kind: 'eof', span: { start: 3, end: 3 } }]);
    });
  });
});
