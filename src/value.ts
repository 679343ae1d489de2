/**
 * rson — Value tree.
 *
 * A closed discriminated union over the seven value variants. Every node is
 * frozen at construction; the helpers below are the only way the parser and
 * callers build trees.
 */

import { isIdentifier } from './token';

export interface Comment {
  readonly style: 'line' | 'block';
  /** Full comment text including its delimiters */
  readonly text: string;
}

interface Trivia {
  /** Comments that preceded this node (only when comments are preserved) */
  readonly leadingComments?: readonly Comment[];
}

interface ContainerTrivia extends Trivia {
  /** Comments between the last element and the closing delimiter */
  readonly closingComments?: readonly Comment[];
}

export interface NullValue extends Trivia {
  readonly type: 'null';
}

export interface BoolValue extends Trivia {
  readonly type: 'bool';
  readonly value: boolean;
}

export interface NumberValue extends Trivia {
  readonly type: 'number';
  /** Source text of the literal; Number(lexeme) is always `value` */
  readonly lexeme: string;
  readonly value: number;
}

export interface StringValue extends Trivia {
  readonly type: 'string';
  readonly value: string;
}

export interface SequenceValue extends ContainerTrivia {
  readonly type: 'sequence';
  readonly items: readonly Value[];
}

export type MappingEntry = readonly [key: Value, value: Value];

export interface MappingValue extends ContainerTrivia {
  readonly type: 'mapping';
  readonly entries: readonly MappingEntry[];
}

export interface TaggedValue extends Trivia {
  readonly type: 'tagged';
  readonly tag: string;
  readonly body: SequenceValue | MappingValue;
}

export type Value =
  | NullValue
  | BoolValue
  | NumberValue
  | StringValue
  | SequenceValue
  | MappingValue
  | TaggedValue;

export type ValueType = Value['type'];

/**
 * A parsed input: the root value plus any comments after it.
 */
export interface Document {
  readonly value: Value;
  readonly trailingComments: readonly Comment[];
}

// ── Construction ─────────────────────────────────────────

export function nullValue(): NullValue {
  return Object.freeze({ type: 'null' });
}

export function bool(value: boolean): BoolValue {
  return Object.freeze({ type: 'bool', value });
}

/**
 * Shortest decimal text that reads back as exactly `value`.
 * Negative zero keeps its sign.
 */
export function canonicalNumber(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value);
}

export function number(value: number, lexeme: string = canonicalNumber(value)): NumberValue {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Numbers must be finite, got ${value}`);
  }
  if (!Object.is(Number(lexeme), value)) {
    throw new RangeError(`Lexeme "${lexeme}" does not decode to ${canonicalNumber(value)}`);
  }
  return Object.freeze({ type: 'number', lexeme, value });
}

/** A high surrogate with no low one after it, or a low one with no high one before it */
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Strings hold Unicode scalar values only; lone surrogates are rejected.
 */
export function string(value: string): StringValue {
  if (LONE_SURROGATE.test(value)) {
    throw new RangeError(`Strings must not contain lone surrogates: ${JSON.stringify(value)}`);
  }
  return Object.freeze({ type: 'string', value });
}

export function sequence(items: readonly Value[], closingComments?: readonly Comment[]): SequenceValue {
  const node: SequenceValue = { type: 'sequence', items: Object.freeze([...items]) };
  return Object.freeze(withClosing(node, closingComments));
}

export function mapping(entries: readonly MappingEntry[], closingComments?: readonly Comment[]): MappingValue {
  const frozen = entries.map(([k, v]): MappingEntry => Object.freeze([k, v] as const));
  const node: MappingValue = { type: 'mapping', entries: Object.freeze(frozen) };
  return Object.freeze(withClosing(node, closingComments));
}

export function tagged(tag: string, body: SequenceValue | MappingValue): TaggedValue {
  if (!isIdentifier(tag)) {
    throw new RangeError(`Invalid tag identifier: ${JSON.stringify(tag)}`);
  }
  return Object.freeze({ type: 'tagged', tag, body });
}

/**
 * Copy of `value` with leading comments attached. Returns `value` itself
 * when there is nothing to attach.
 */
export function withLeadingComments<T extends Value>(value: T, comments: readonly Comment[]): T {
  if (comments.length === 0) return value;
  const annotated: T = { ...value, leadingComments: Object.freeze([...comments]) };
  Object.freeze(annotated);
  return annotated;
}

function withClosing<T extends SequenceValue | MappingValue>(
  node: T,
  comments: readonly Comment[] | undefined,
): T {
  if (!comments || comments.length === 0) return node;
  return { ...node, closingComments: Object.freeze([...comments]) };
}

// ── Comparison ───────────────────────────────────────────

/**
 * Structural equality. Numbers compare by decoded value; lexemes and
 * comments are ignored. Walks pairs off an explicit stack, so deep trees
 * are fine.
 */
export function equals(a: Value, b: Value): boolean {
  const pending: [Value, Value][] = [[a, b]];

  for (let pair = pending.pop(); pair !== undefined; pair = pending.pop()) {
    if (!sameNode(pair[0], pair[1], pending)) return false;
  }
  return true;
}

/** Compare one pair of nodes, queueing their children */
function sameNode(a: Value, b: Value, pending: [Value, Value][]): boolean {
  switch (a.type) {
    case 'null':
      return b.type === 'null';
    case 'bool':
      return b.type === 'bool' && a.value === b.value;
    case 'number':
      return b.type === 'number' && Object.is(a.value, b.value);
    case 'string':
      return b.type === 'string' && a.value === b.value;
    case 'sequence': {
      if (b.type !== 'sequence' || a.items.length !== b.items.length) return false;
      const other = b.items;
      a.items.forEach((item, i) => pending.push([item, other[i]]));
      return true;
    }
    case 'mapping': {
      if (b.type !== 'mapping' || a.entries.length !== b.entries.length) return false;
      const other = b.entries;
      a.entries.forEach(([key, value], i) => {
        pending.push([key, other[i][0]], [value, other[i][1]]);
      });
      return true;
    }
    case 'tagged':
      if (b.type !== 'tagged' || a.tag !== b.tag) return false;
      pending.push([a.body, b.body]);
      return true;
  }
}
