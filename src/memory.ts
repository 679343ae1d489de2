/**
 * rson — Linear memory and allocator for the guest module.
 *
 * The memory is one contiguous byte region that grows in 64 KiB pages.
 * Growing swaps in a new backing buffer, so any view taken before a grow
 * keeps pointing at the old bytes.
 */

import { BridgeError } from './errors';

export const PAGE_SIZE = 64 * 1024;

/** Every block starts on this boundary; offset 0 is never handed out */
export const ALIGNMENT = 8;

export class LinearMemory {
  private bytes: Uint8Array;
  readonly maxPages: number;

  constructor(initialPages: number = 1, maxPages: number = 1024) {
    if (!Number.isInteger(initialPages) || initialPages < 1 || initialPages > maxPages) {
      throw new RangeError(`Invalid initial page count ${initialPages} (max ${maxPages})`);
    }
    this.bytes = new Uint8Array(initialPages * PAGE_SIZE);
    this.maxPages = maxPages;
  }

  get pages(): number {
    return this.bytes.byteLength / PAGE_SIZE;
  }

  get byteLength(): number {
    return this.bytes.byteLength;
  }

  /** Current backing buffer; replaced on every grow */
  get buffer(): ArrayBufferLike {
    return this.bytes.buffer;
  }

  /**
   * Add `delta` pages. Returns the previous page count, or -1 when the
   * memory would exceed `maxPages` (the memory is left unchanged).
   */
  grow(delta: number): number {
    const previous = this.pages;
    if (delta < 0 || previous + delta > this.maxPages) {
      return -1;
    }
    if (delta > 0) {
      const next = new Uint8Array((previous + delta) * PAGE_SIZE);
      next.set(this.bytes);
      this.bytes = next;
    }
    return previous;
  }

  /** Fresh view over the whole current buffer */
  view(): Uint8Array {
    return new Uint8Array(this.bytes.buffer);
  }

  /** Copy `len` bytes out of memory starting at `ptr` */
  read(ptr: number, len: number): Uint8Array {
    this.checkRange(ptr, len);
    return this.bytes.slice(ptr, ptr + len);
  }

  write(ptr: number, data: Uint8Array): void {
    this.checkRange(ptr, data.byteLength);
    this.bytes.set(data, ptr);
  }

  private checkRange(ptr: number, len: number): void {
    if (!Number.isInteger(ptr) || !Number.isInteger(len) || ptr < 0 || len < 0 || ptr + len > this.bytes.byteLength) {
      throw new BridgeError('InvalidPointer', `Range ${ptr}+${len} is outside linear memory (${this.bytes.byteLength} bytes)`);
    }
  }
}

interface FreeBlock {
  ptr: number;
  size: number;
}

function alignUp(n: number): number {
  return Math.ceil(n / ALIGNMENT) * ALIGNMENT;
}

/**
 * First-fit free-list allocator over a LinearMemory.
 *
 * Space above `top` has never been handed out; freed blocks go to a list
 * kept sorted by address and merged with their neighbours. A block that
 * ends at `top` is returned to the untouched region instead.
 */
export class Allocator {
  private readonly memory: LinearMemory;
  private readonly live = new Map<number, number>();
  private freeList: FreeBlock[] = [];
  private top = ALIGNMENT;

  constructor(memory: LinearMemory) {
    this.memory = memory;
  }

  /**
   * Reserve at least `len` bytes. Returns 0 when memory cannot grow far
   * enough; allocator state is unchanged in that case.
   */
  alloc(len: number): number {
    const size = alignUp(Math.max(len, 1));

    const index = this.freeList.findIndex(block => block.size >= size);
    if (index >= 0) {
      const block = this.freeList[index];
      if (block.size === size) {
        this.freeList.splice(index, 1);
      } else {
        this.freeList[index] = { ptr: block.ptr + size, size: block.size - size };
      }
      this.live.set(block.ptr, size);
      return block.ptr;
    }

    const end = this.top + size;
    if (end > this.memory.byteLength) {
      const missing = Math.ceil((end - this.memory.byteLength) / PAGE_SIZE);
      if (this.memory.grow(missing) < 0) {
        return 0;
      }
    }

    const ptr = this.top;
    this.top = end;
    this.live.set(ptr, size);
    return ptr;
  }

  /**
   * Release a block returned by `alloc`. Returns false for pointers that
   * are not live.
   */
  free(ptr: number): boolean {
    const size = this.live.get(ptr);
    if (size === undefined) {
      return false;
    }
    this.live.delete(ptr);

    let block: FreeBlock = { ptr, size };
    let at = this.freeList.findIndex(b => b.ptr > ptr);
    if (at < 0) at = this.freeList.length;

    const before = this.freeList[at - 1];
    if (before && before.ptr + before.size === block.ptr) {
      block = { ptr: before.ptr, size: before.size + block.size };
      this.freeList.splice(at - 1, 1);
      at--;
    }
    const after = this.freeList[at];
    if (after && block.ptr + block.size === after.ptr) {
      block = { ptr: block.ptr, size: block.size + after.size };
      this.freeList.splice(at, 1);
    }

    if (block.ptr + block.size === this.top) {
      this.top = block.ptr;
    } else {
      this.freeList.splice(at, 0, block);
    }
    return true;
  }

  /** Size reserved for a live pointer, or undefined */
  sizeOf(ptr: number): number | undefined {
    return this.live.get(ptr);
  }

  get liveBlocks(): number {
    return this.live.size;
  }

  get liveBytes(): number {
    let total = 0;
    for (const size of this.live.values()) total += size;
    return total;
  }
}
