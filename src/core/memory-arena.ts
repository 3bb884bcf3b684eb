/**
 * Linear memory and the arena allocator that hands it out to the host.
 *
 * The host never passes its own pointers across the boundary. It asks the
 * guest for a buffer, writes request bytes into it, and later releases it
 * with the exact length it asked for. Memory grows in 64 KiB pages up to a
 * fixed ceiling; running out is fatal.
 */

/** Size of one linear memory page. */
export const PAGE_SIZE = 65_536;

/** First address the arena hands out. Address 0 is never a valid buffer. */
export const HEAP_BASE = 8;

const ALIGNMENT = 8;

function alignUp(size: number): number {
  return Math.ceil(size / ALIGNMENT) * ALIGNMENT;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Misuse of the allocator: bad size, unknown address, mismatched release. */
export class ArenaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArenaError';
  }
}

/** The memory ceiling has been reached. There is no fallback allocator. */
export class ArenaExhaustedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArenaExhaustedError';
  }
}

/** A read or write fell outside memory or outside a live buffer. */
export class MemoryAccessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MemoryAccessError';
  }
}

// ---------------------------------------------------------------------------
// LinearMemory
// ---------------------------------------------------------------------------

export interface LinearMemoryOptions {
  initialPages: number;
  maxPages: number;
}

/**
 * A growable byte region shared between host and guest, modelled on a
 * WebAssembly memory: page-granular, bounds-checked, never shrinks.
 */
export class LinearMemory {
  readonly maxPages: number;
  private storage: Uint8Array;

  constructor(options: LinearMemoryOptions) {
    if (options.initialPages < 0 || options.initialPages > options.maxPages) {
      throw new RangeError(
        `initialPages (${options.initialPages}) must be between 0 and maxPages (${options.maxPages})`,
      );
    }
    this.maxPages = options.maxPages;
    this.storage = new Uint8Array(options.initialPages * PAGE_SIZE);
  }

  get pages(): number {
    return this.storage.byteLength / PAGE_SIZE;
  }

  get byteLength(): number {
    return this.storage.byteLength;
  }

  /**
   * Grow by `delta` pages, preserving contents.
   *
   * @returns The previous page count, or -1 if the ceiling would be exceeded.
   */
  grow(delta: number): number {
    const previous = this.pages;
    if (previous + delta > this.maxPages) {
      return -1;
    }
    const next = new Uint8Array((previous + delta) * PAGE_SIZE);
    next.set(this.storage);
    this.storage = next;
    return previous;
  }

  /** Copy `length` bytes out of memory starting at `address`. */
  read(address: number, length: number): Uint8Array {
    this.check(address, length);
    return this.storage.slice(address, address + length);
  }

  /** Copy `data` into memory starting at `address`. */
  write(address: number, data: Uint8Array): void {
    this.check(address, data.byteLength);
    this.storage.set(data, address);
  }

  private check(address: number, length: number): void {
    if (
      !Number.isSafeInteger(address) ||
      !Number.isSafeInteger(length) ||
      address < 0 ||
      length < 0 ||
      address + length > this.storage.byteLength
    ) {
      throw new MemoryAccessError(
        `Access [${address}, ${address + length}) is out of bounds for ${this.storage.byteLength} bytes of memory`,
      );
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryArena
// ---------------------------------------------------------------------------

interface Allocation {
  /** Size the host asked for. Must be repeated on release. */
  size: number;
  /** Aligned size actually reserved. */
  reserved: number;
}

interface FreeBlock {
  address: number;
  reserved: number;
}

/**
 * First-fit allocator over a {@link LinearMemory}.
 *
 * Freed blocks are kept sorted by address and coalesced with their
 * neighbours; a free block that reaches the bump pointer is returned to it.
 */
export class MemoryArena {
  private readonly live = new Map<number, Allocation>();
  private readonly free: FreeBlock[] = [];
  private top = HEAP_BASE;

  constructor(private readonly memory: LinearMemory) {}

  /** Number of buffers currently held by the host. */
  get liveAllocations(): number {
    return this.live.size;
  }

  /** Sum of the sizes of all live buffers, as requested. */
  get bytesInUse(): number {
    let total = 0;
    for (const allocation of this.live.values()) {
      total += allocation.size;
    }
    return total;
  }

  /**
   * Reserve `size` bytes and return the buffer's address. Contents are
   * whatever was there before.
   *
   * @throws ArenaExhaustedError when the memory ceiling is reached.
   */
  allocate(size: number): number {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new ArenaError(`Invalid allocation size: ${size}`);
    }

    const reserved = Math.max(alignUp(size), ALIGNMENT);
    const address = this.takeFree(reserved) ?? this.bump(reserved, size);
    this.live.set(address, { size, reserved });
    return address;
  }

  /**
   * Release a buffer. `size` must equal the size passed to `allocate`.
   *
   * @throws ArenaError for an unknown address or a mismatched size.
   */
  release(address: number, size: number): void {
    const allocation = this.live.get(address);
    if (!allocation) {
      throw new ArenaError(`Release of unknown or already released address ${address}`);
    }
    if (allocation.size !== size) {
      throw new ArenaError(
        `Release size mismatch at address ${address}: allocated ${allocation.size} bytes, released ${size}`,
      );
    }

    this.live.delete(address);
    this.insertFree({ address, reserved: allocation.reserved });
  }

  /**
   * Require `[address, address + length)` to lie inside one live buffer.
   * Zero-length ranges touch nothing and always pass.
   *
   * @throws MemoryAccessError otherwise.
   */
  assertOwned(address: number, length: number): void {
    if (!Number.isSafeInteger(address) || !Number.isSafeInteger(length) || length < 0) {
      throw new MemoryAccessError(`Invalid range: address ${address}, length ${length}`);
    }
    if (length === 0) return;

    for (const [start, allocation] of this.live) {
      if (address >= start && address + length <= start + allocation.size) {
        return;
      }
    }

    throw new MemoryAccessError(
      `Range [${address}, ${address + length}) is not inside a live allocation`,
    );
  }

  private takeFree(reserved: number): number | undefined {
    const index = this.free.findIndex((block) => block.reserved >= reserved);
    if (index === -1) return undefined;

    const block = this.free[index];
    if (block.reserved === reserved) {
      this.free.splice(index, 1);
    } else {
      this.free[index] = {
        address: block.address + reserved,
        reserved: block.reserved - reserved,
      };
    }
    return block.address;
  }

  private bump(reserved: number, requested: number): number {
    const address = this.top;
    const end = address + reserved;

    if (end > this.memory.byteLength) {
      const missing = Math.ceil((end - this.memory.byteLength) / PAGE_SIZE);
      if (this.memory.grow(missing) === -1) {
        throw new ArenaExhaustedError(
          `Out of memory: cannot allocate ${requested} bytes within the ` +
            `${this.memory.maxPages * PAGE_SIZE} byte ceiling`,
        );
      }
    }

    this.top = end;
    return address;
  }

  private insertFree(block: FreeBlock): void {
    let index = this.free.findIndex((candidate) => candidate.address > block.address);
    if (index === -1) index = this.free.length;
    this.free.splice(index, 0, block);

    // Merge with the following block
    const next = this.free[index + 1];
    if (next && block.address + block.reserved === next.address) {
      block.reserved += next.reserved;
      this.free.splice(index + 1, 1);
    }

    // Merge with the preceding block
    const previous = this.free[index - 1];
    if (previous && previous.address + previous.reserved === block.address) {
      previous.reserved += block.reserved;
      this.free.splice(index, 1);
    }

    // Hand a trailing free block back to the bump pointer
    const last = this.free[this.free.length - 1];
    if (last && last.address + last.reserved === this.top) {
      this.top = last.address;
      this.free.pop();
    }
  }
}
