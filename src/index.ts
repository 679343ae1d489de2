/**
 * rson — public API
 *
 * Exports the lexer, parser, encoder, engine facade and memory bridge for
 * programmatic use.
 */

export { Lexer, tokenize } from './lexer';
export type { TokenizeOptions } from './lexer';
export { Parser, parse, parseDocument } from './parser';
export { Encoder, encode, encodeDocument, quote } from './encoder';
export { run } from './engine';
export type { RunResult, EngineError } from './engine';
export { GuestModule, HostBridge, createBridge, NULL_PTR } from './bridge';
export type { GuestExports, GuestOptions, HostBridgeOptions } from './bridge';
export { LinearMemory, Allocator, PAGE_SIZE } from './memory';
export { RsonProject, parseRepoConfig } from './project';
export { initRepoConfig } from './init';
export { RsonError, LexError, ParseError, BridgeError } from './errors';
export type { LexErrorKind, ParseErrorKind, BridgeErrorKind } from './errors';
export {
  nullValue,
  bool,
  number,
  string,
  sequence,
  mapping,
  tagged,
  withLeadingComments,
  canonicalNumber,
  equals,
} from './value';
export type {
  Value,
  ValueType,
  NullValue,
  BoolValue,
  NumberValue,
  StringValue,
  SequenceValue,
  MappingValue,
  MappingEntry,
  TaggedValue,
  Comment,
  Document,
} from './value';
export { isIdentifier } from './token';
export type { Token, TokenKind, Span } from './token';
export type {
  EncodeOptions,
  EngineOptions,
  CommentPolicy,
  RepoConfig,
  ResolvedConfig,
  FileReport,
  FormatSummary,
} from './types';
export { DEFAULT_ENCODE_OPTIONS } from './types';
