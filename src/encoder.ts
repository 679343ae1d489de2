/**
 * rson — Canonical encoder.
 *
 * Renders a value tree as text. Output depends only on the tree and the
 * options: strings are re-escaped, numbers are printed from their decoded
 * value, and containers switch to one element per line once they grow past
 * `multilineThreshold` elements or hold anything that needs its own line.
 */

import { EncodeOptions, DEFAULT_ENCODE_OPTIONS } from './types';
import { isIdentifier } from './token';
import { Comment, Document, MappingValue, SequenceValue, Value, canonicalNumber } from './value';

interface Rendered {
  text: string;
  /** True when `text` spans several lines */
  multiline: boolean;
}

interface Element extends Rendered {
  comments: readonly Comment[];
}

/** A container whose children are still being rendered */
interface Frame {
  open: string;
  close: string;
  /** Tag written before a tagged variant's body */
  prefix: string;
  depth: number;
  /** Values in render order; mappings alternate key and value */
  values: readonly Value[];
  keyed: boolean;
  /** Comments written before each element */
  comments: readonly (readonly Comment[])[];
  closing: readonly Comment[];
  rendered: Rendered[];
}

function flat(text: string): Rendered {
  return { text, multiline: false };
}

function sequenceFrame(open: string, close: string, prefix: string, value: SequenceValue, depth: number): Frame {
  return {
    open,
    close,
    prefix,
    depth,
    values: value.items,
    keyed: false,
    comments: value.items.map(item => item.leadingComments ?? []),
    closing: value.closingComments ?? [],
    rendered: [],
  };
}

function mappingFrame(prefix: string, value: MappingValue, depth: number): Frame {
  return {
    open: '{',
    close: '}',
    prefix,
    depth,
    values: value.entries.flatMap(([key, item]) => [key, item]),
    keyed: true,
    comments: value.entries.map(([key, item]) => [...(key.leadingComments ?? []), ...(item.leadingComments ?? [])]),
    closing: value.closingComments ?? [],
    rendered: [],
  };
}

const ESCAPES: Record<string, string> = {
  '"': '\\"',
  '\\': '\\\\',
  '\n': '\\n',
  '\t': '\\t',
  '\r': '\\r',
  '\b': '\\b',
  '\f': '\\f',
};

const NEEDS_ESCAPE = /["\\\u0000-\u001f\u007f]/g;

/**
 * Quote and escape a string the canonical way.
 */
export function quote(text: string): string {
  const body = text.replace(NEEDS_ESCAPE, ch => {
    const simple = ESCAPES[ch];
    if (simple !== undefined) return simple;
    return '\\u' + ch.charCodeAt(0).toString(16).padStart(4, '0');
  });
  return `"${body}"`;
}

export class Encoder {
  private options: EncodeOptions;

  constructor(options: Partial<EncodeOptions> = {}) {
    this.options = { ...DEFAULT_ENCODE_OPTIONS, ...options };
  }

  /**
   * Render a single value, including comments attached to the root.
   */
  encode(value: Value): string {
    const lines = (value.leadingComments ?? []).map(c => c.text);
    lines.push(this.render(value));
    return lines.join('\n');
  }

  /**
   * Render a parsed document. The result always ends with a newline.
   */
  encodeDocument(doc: Document): string {
    const lines = [this.encode(doc.value), ...doc.trailingComments.map(c => c.text)];
    return lines.join('\n') + '\n';
  }

  // ── Rendering ────────────────────────────────────────────

  /**
   * Post-order walk over an explicit stack, so nesting depth is bounded by
   * memory rather than by the call stack.
   */
  private render(root: Value): string {
    const frames: Frame[] = [];
    let done = this.enter(root, 0, false, frames);

    for (;;) {
      if (done !== null) {
        if (frames.length === 0) return done.text;
        frames[frames.length - 1].rendered.push(done);
      }

      const frame = frames[frames.length - 1];
      const next = frame.rendered.length;
      if (next < frame.values.length) {
        const asKey = frame.keyed && next % 2 === 0;
        done = this.enter(frame.values[next], frame.depth + 1, asKey, frames);
      } else {
        frames.pop();
        done = this.leave(frame);
      }
    }
  }

  /**
   * Render a scalar, or push a frame for a container and return null.
   * String keys that read back as identifiers are written bare.
   */
  private enter(value: Value, depth: number, asKey: boolean, frames: Frame[]): Rendered | null {
    switch (value.type) {
      case 'null':
        return flat('null');
      case 'bool':
        return flat(value.value ? 'true' : 'false');
      case 'number':
        return flat(canonicalNumber(value.value));
      case 'string':
        return flat(asKey && isIdentifier(value.value) ? value.value : quote(value.value));
      case 'sequence':
        frames.push(sequenceFrame('[', ']', '', value, depth));
        return null;
      case 'mapping':
        frames.push(mappingFrame('', value, depth));
        return null;
      case 'tagged':
        frames.push(
          value.body.type === 'sequence'
            ? sequenceFrame('(', ')', value.tag, value.body, depth)
            : mappingFrame(value.tag, value.body, depth),
        );
        return null;
      default: {
        const unreachable: never = value;
        return unreachable;
      }
    }
  }

  private leave(frame: Frame): Rendered {
    const elements = frame.comments.map((comments, i): Element => {
      if (!frame.keyed) {
        return { comments, ...frame.rendered[i] };
      }
      const key = frame.rendered[2 * i];
      const value = frame.rendered[2 * i + 1];
      return {
        comments,
        text: `${key.text}: ${value.text}`,
        multiline: key.multiline || value.multiline,
      };
    });

    const body = this.renderContainer(frame.open, frame.close, elements, frame.closing, frame.depth);
    return { text: frame.prefix + body.text, multiline: body.multiline };
  }

  private renderContainer(
    open: string,
    close: string,
    elements: Element[],
    closing: readonly Comment[],
    depth: number,
  ): Rendered {
    if (elements.length === 0 && closing.length === 0) {
      return flat(open + close);
    }

    const multiline =
      elements.length > this.options.multilineThreshold ||
      closing.length > 0 ||
      elements.some(e => e.comments.length > 0 || e.multiline);

    if (!multiline) {
      // concatenated rather than joined: deep single-line trees stay linear
      let text = open;
      elements.forEach((element, i) => {
        text += (i > 0 ? ', ' : '') + element.text;
      });
      return flat(text + close);
    }

    const pad = this.options.indent.repeat(depth + 1);
    const lines: string[] = [];

    elements.forEach((element, i) => {
      for (const comment of element.comments) {
        lines.push(pad + comment.text);
      }
      const last = i === elements.length - 1;
      const comma = !last || this.options.trailingCommas ? ',' : '';
      lines.push(pad + element.text + comma);
    });
    for (const comment of closing) {
      lines.push(pad + comment.text);
    }

    return {
      text: `${open}\n${lines.join('\n')}\n${this.options.indent.repeat(depth)}${close}`,
      multiline: true,
    };
  }
}

/**
 * Encode a value tree as canonical text.
 */
export function encode(value: Value, options: Partial<EncodeOptions> = {}): string {
  return new Encoder(options).encode(value);
}

/**
 * Encode a parsed document, trailing comments and final newline included.
 */
export function encodeDocument(doc: Document, options: Partial<EncodeOptions> = {}): string {
  return new Encoder(options).encodeDocument(doc);
}
