/**
 * Guest module: the export table a host drives.
 *
 * Wires the memory arena, wire codec, descriptor and dispatcher around one
 * {@link PluginNode}. Every boundary call is synchronous and serves exactly
 * one request.
 *
 * Host protocol violations (touching memory the host does not own through
 * a live allocation, releasing with the wrong size, exhausting memory) are
 * thrown. Everything about the request itself is answered with a
 * `success: false` response.
 */

import { DEFAULT_CONFIG, parseMemoryLimit } from '../types/config.js';
import type { ModuleConfig } from '../types/config.js';
import type { PluginDescriptor, PluginInfo } from '../types/descriptor.js';
import type { Response } from '../types/protocol.js';
import { buildDescriptor, encodeDescriptor } from './descriptor.js';
import { dispatch } from './dispatcher.js';
import type { Logger } from './logger.js';
import { createLogger } from './logger.js';
import { LinearMemory, MemoryArena, PAGE_SIZE } from './memory-arena.js';
import type { PluginNode } from './plugin-node.js';
import { decodeRequest, encodeResponse } from './wire-codec.js';

// ---------------------------------------------------------------------------
// Export table
// ---------------------------------------------------------------------------

/** Raw exports, shaped like a WebAssembly instance's. */
export interface GuestExports {
  memory: LinearMemory;
  alloc(size: number): number;
  dealloc(address: number, size: number): void;
  /** Write the descriptor, truncated to `outCapacity`; returns its full length. */
  metadata(outAddress: number, outCapacity: number): number;
  /** Serve one request; returns the full response length. */
  call(inAddress: number, inLength: number, outAddress: number, outCapacity: number): number;
}

export interface GuestModuleOptions {
  node: PluginNode;
  info: PluginInfo;
  /** Defaults to {@link DEFAULT_CONFIG}. */
  config?: ModuleConfig;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// GuestModule
// ---------------------------------------------------------------------------

export class GuestModule {
  readonly memory: LinearMemory;
  readonly descriptor: PluginDescriptor;

  private readonly arena: MemoryArena;
  private readonly node: PluginNode;
  private readonly descriptorBytes: Uint8Array;
  private readonly logger: Logger;

  constructor(options: GuestModuleOptions) {
    const config = options.config ?? DEFAULT_CONFIG;
    const maxPages = Math.floor(parseMemoryLimit(config.memory.limit) / PAGE_SIZE);

    this.memory = new LinearMemory({ initialPages: 1, maxPages });
    this.arena = new MemoryArena(this.memory);
    this.node = options.node;
    this.descriptor = buildDescriptor(options.info, [options.node.definition], config);
    this.descriptorBytes = encodeDescriptor(this.descriptor);
    this.logger = options.logger ?? createLogger('guest');
  }

  /** Buffers currently held by the host. */
  get liveAllocations(): number {
    return this.arena.liveAllocations;
  }

  allocate(size: number): number {
    return this.arena.allocate(size);
  }

  release(address: number, size: number): void {
    this.arena.release(address, size);
  }

  describe(outAddress: number, outCapacity: number): number {
    return this.writeOut(this.descriptorBytes, outAddress, outCapacity);
  }

  invoke(inAddress: number, inLength: number, outAddress: number, outCapacity: number): number {
    this.arena.assertOwned(inAddress, inLength);
    this.arena.assertOwned(outAddress, outCapacity);

    const response = this.handle(this.memory.read(inAddress, inLength));
    return this.writeOut(encodeResponse(response), outAddress, outCapacity);
  }

  /** Decode and dispatch raw request bytes, bypassing guest memory. */
  handle(requestBytes: Uint8Array): Response {
    const decoded = decodeRequest(requestBytes);
    if (!decoded.ok) {
      this.logger.debug('Request rejected', {
        ok: false,
        error_code: decoded.error.code,
        bytes: requestBytes.byteLength,
      });
      return { success: false, error: decoded.error.message };
    }
    return dispatch(decoded.request, this.node, this.logger.child('dispatch'));
  }

  exports(): GuestExports {
    return {
      memory: this.memory,
      alloc: (size) => this.allocate(size),
      dealloc: (address, size) => this.release(address, size),
      metadata: (outAddress, outCapacity) => this.describe(outAddress, outCapacity),
      call: (inAddress, inLength, outAddress, outCapacity) =>
        this.invoke(inAddress, inLength, outAddress, outCapacity),
    };
  }

  private writeOut(bytes: Uint8Array, outAddress: number, outCapacity: number): number {
    this.arena.assertOwned(outAddress, outCapacity);
    const count = Math.min(bytes.byteLength, outCapacity);
    if (count > 0) {
      this.memory.write(outAddress, bytes.subarray(0, count));
    }
    return bytes.byteLength;
  }
}
