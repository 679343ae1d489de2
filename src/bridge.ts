/**
 * rson — Foreign memory bridge.
 *
 * The guest side owns a linear memory and exposes four exports shaped like a
 * sandboxed module's: `memory`, `guestAlloc`, `guestFree` and `run`. The
 * host side never shares objects with the guest; it only moves bytes:
 *
 *   1. ptr = guestAlloc(len)        reserve an input buffer
 *   2. memory.write(ptr, bytes)     copy UTF-8 input in
 *   3. [out, outLen] = run(ptr, len)
 *   4. memory.read(out, outLen)     copy the result out
 *   5. guestFree(out)               hand the result buffer back
 *
 * The guest releases the input buffer inside `run`, and releases the previous
 * result buffer at the start of every `run`. Nothing read from memory stays
 * valid across calls.
 *
 * Result buffers start with one status byte followed by a UTF-8 payload:
 *   0  formatted output
 *   1  engine error, JSON {stage, kind, offset, message}
 *   2  bridge error, JSON {kind, message}
 * `[0, 0]` means no result buffer could be allocated.
 */

import { EngineError, RunResult, run } from './engine';
import { Allocator, LinearMemory } from './memory';
import {
  BRIDGE_ERROR_KINDS,
  BridgeError,
  BridgeErrorKind,
  LEX_ERROR_KINDS,
  PARSE_ERROR_KINDS,
} from './errors';
import { EngineOptions, DEFAULT_MAX_INPUT_BYTES } from './types';

export const STATUS_OK = 0;
export const STATUS_ENGINE_ERROR = 1;
export const STATUS_BRIDGE_ERROR = 2;

export const NULL_PTR = 0;

export interface GuestExports {
  readonly memory: LinearMemory;
  guestAlloc(len: number): number;
  guestFree(ptr: number): void;
  run(ptr: number, len: number): [ptr: number, len: number];
}

export interface GuestOptions extends EngineOptions {
  /** Pages reserved at instantiation (default 1) */
  initialPages?: number;
  /** Upper bound on memory growth (default 1024, i.e. 64 MiB) */
  maxPages?: number;
}

// ── Guest side ───────────────────────────────────────────

/**
 * One module instance: its memory, its allocator and the buffer holding the
 * last result. This is the only mutable state on the guest side; the engine
 * it calls into keeps none.
 */
export class GuestModule {
  readonly memory: LinearMemory;
  private readonly allocator: Allocator;
  private readonly engineOptions: EngineOptions;
  private readonly encoder = new TextEncoder();
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });
  private resultPtr = NULL_PTR;

  constructor(options: GuestOptions = {}) {
    this.memory = new LinearMemory(options.initialPages ?? 1, options.maxPages ?? 1024);
    this.allocator = new Allocator(this.memory);
    this.engineOptions = { encode: options.encode, comments: options.comments };
  }

  get exports(): GuestExports {
    return {
      memory: this.memory,
      guestAlloc: len => this.guestAlloc(len),
      guestFree: ptr => this.guestFree(ptr),
      run: (ptr, len) => this.run(ptr, len),
    };
  }

  /** Bytes currently reserved, for leak checks */
  get liveBytes(): number {
    return this.allocator.liveBytes;
  }

  guestAlloc(len: number): number {
    if (!Number.isInteger(len) || len < 0) {
      return NULL_PTR;
    }
    return this.allocator.alloc(len);
  }

  guestFree(ptr: number): void {
    if (!this.allocator.free(ptr)) {
      throw new BridgeError('InvalidPointer', `guestFree: ${ptr} is not a live allocation`);
    }
    if (ptr === this.resultPtr) {
      this.resultPtr = NULL_PTR;
    }
  }

  run(ptr: number, len: number): [ptr: number, len: number] {
    this.releaseResult();

    const reserved = this.allocator.sizeOf(ptr);
    if (reserved === undefined || !Number.isInteger(len) || len < 0 || len > reserved) {
      return this.bridgeFailure('InvalidPointer', `run: ${ptr}+${len} is not inside a live allocation`);
    }

    const input = this.memory.read(ptr, len);
    this.allocator.free(ptr);

    // A fatal decoder throws only on malformed input
    let text: string;
    try {
      text = this.decoder.decode(input);
    } catch {
      return this.bridgeFailure('InvalidUtf8', 'Input is not valid UTF-8');
    }

    const result = run(text, this.engineOptions);
    return result.ok
      ? this.writeResult(STATUS_OK, result.output)
      : this.writeResult(STATUS_ENGINE_ERROR, JSON.stringify(result.error));
  }

  private bridgeFailure(kind: BridgeErrorKind, message: string): [number, number] {
    return this.writeResult(STATUS_BRIDGE_ERROR, JSON.stringify({ kind, message }));
  }

  private writeResult(status: number, payload: string): [number, number] {
    const body = this.encoder.encode(payload);
    const ptr = this.allocator.alloc(body.byteLength + 1);
    if (ptr === NULL_PTR) {
      return [NULL_PTR, 0];
    }

    const view = this.memory.view();
    view[ptr] = status;
    view.set(body, ptr + 1);
    this.resultPtr = ptr;
    return [ptr, body.byteLength + 1];
  }

  private releaseResult(): void {
    if (this.resultPtr !== NULL_PTR) {
      this.allocator.free(this.resultPtr);
      this.resultPtr = NULL_PTR;
    }
  }
}

// ── Host side ────────────────────────────────────────────

export interface HostBridgeOptions {
  /** Inputs above this many UTF-8 bytes are refused before any allocation */
  maxInputBytes?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isOneOf<T extends string>(options: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && options.some(option => option === value);
}

function readEngineError(payload: unknown): EngineError {
  if (isRecord(payload)) {
    const { stage, kind, offset, message } = payload;
    if (typeof offset === 'number' && typeof message === 'string') {
      if (stage === 'lex' && isOneOf(LEX_ERROR_KINDS, kind)) {
        return { stage, kind, offset, message };
      }
      if (stage === 'parse' && isOneOf(PARSE_ERROR_KINDS, kind)) {
        return { stage, kind, offset, message };
      }
    }
  }
  throw new Error(`Malformed engine error payload: ${JSON.stringify(payload)}`);
}

function readBridgeError(payload: unknown): BridgeError {
  if (isRecord(payload)) {
    const { kind, message } = payload;
    if (isOneOf(BRIDGE_ERROR_KINDS, kind) && typeof message === 'string') {
      return new BridgeError(kind, message);
    }
  }
  throw new Error(`Malformed bridge error payload: ${JSON.stringify(payload)}`);
}

/**
 * Host-side client. Performs the allocate / write / call / read / free
 * sequence and turns the result buffer back into a RunResult. Bridge-level
 * failures are thrown as BridgeError; grammar errors come back as results.
 */
export class HostBridge {
  private readonly guest: GuestExports;
  private readonly maxInputBytes: number;
  private readonly encoder = new TextEncoder();
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(guest: GuestExports, options: HostBridgeOptions = {}) {
    this.guest = guest;
    this.maxInputBytes = options.maxInputBytes ?? DEFAULT_MAX_INPUT_BYTES;
  }

  run(text: string): RunResult {
    return this.runBytes(this.encoder.encode(text));
  }

  /**
   * Send raw bytes across. Exposed for callers that already hold UTF-8
   * (or want to see how the guest treats bytes that are not).
   */
  runBytes(input: Uint8Array): RunResult {
    if (input.byteLength > this.maxInputBytes) {
      throw new BridgeError(
        'InputTooLarge',
        `Input is ${input.byteLength} bytes, limit is ${this.maxInputBytes}`,
      );
    }

    const ptr = this.guest.guestAlloc(input.byteLength);
    if (ptr === NULL_PTR) {
      throw new BridgeError('OutOfMemory', `Could not allocate ${input.byteLength} bytes for input`);
    }
    this.guest.memory.write(ptr, input);

    const [outPtr, outLen] = this.guest.run(ptr, input.byteLength);
    if (outPtr === NULL_PTR) {
      throw new BridgeError('OutOfMemory', 'Module could not allocate a result buffer');
    }

    const bytes = this.guest.memory.read(outPtr, outLen);
    this.guest.guestFree(outPtr);
    return this.decodeResult(bytes);
  }

  private decodeResult(bytes: Uint8Array): RunResult {
    const status = bytes[0];
    const payload = this.decoder.decode(bytes.subarray(1));

    switch (status) {
      case STATUS_OK:
        return { ok: true, output: payload };
      case STATUS_ENGINE_ERROR:
        return { ok: false, error: readEngineError(JSON.parse(payload)) };
      case STATUS_BRIDGE_ERROR:
        throw readBridgeError(JSON.parse(payload));
      default:
        throw new Error(`Unknown result status ${status}`);
    }
  }
}

/**
 * Instantiate a guest module and connect a host client to it.
 */
export function createBridge(options: GuestOptions & HostBridgeOptions = {}): HostBridge {
  const guest = new GuestModule(options);
  return new HostBridge(guest.exports, { maxInputBytes: options.maxInputBytes });
}
