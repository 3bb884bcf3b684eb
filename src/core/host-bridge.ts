/**
 * Host-side driver for a guest export table.
 *
 * Owns the allocate → write → call → read → release dance, including the
 * retry with an exactly-sized buffer when the guest reports a response
 * longer than the buffer it was given. Used by the CLI and by tests that
 * exercise a module through its raw exports.
 */

import { DESCRIPTOR_JSON_SCHEMA } from '../types/descriptor-schema.js';
import type { PluginDescriptor } from '../types/descriptor.js';
import type { JsonValue, Phase, Request, Response } from '../types/protocol.js';
import { PHASES } from '../types/protocol.js';
import type { GuestExports } from './guest-module.js';
import type { Logger } from './logger.js';
import { createLogger } from './logger.js';
import { schemaValidator } from './schema-validator.js';
import { decodeResponse, encodeRequest } from './wire-codec.js';

const DEFAULT_INITIAL_CAPACITY = 4096;

const validateDescriptor = schemaValidator.compile<PluginDescriptor>(DESCRIPTOR_JSON_SCHEMA);

// ---------------------------------------------------------------------------
// Errors and results
// ---------------------------------------------------------------------------

/** The guest answered with something that is not a valid document. */
export class HostBridgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HostBridgeError';
  }
}

export interface HostBridgeOptions {
  /** First output buffer size tried for every call. */
  initialCapacity?: number;
  logger?: Logger;
}

/** Outcome of running all three phases for one input. */
export type PipelineOutcome =
  | { ok: true; output: JsonValue | undefined; next?: string }
  | { ok: false; phase: Phase; error: string };

// ---------------------------------------------------------------------------
// HostBridge
// ---------------------------------------------------------------------------

export class HostBridge {
  private readonly initialCapacity: number;
  private readonly logger: Logger;

  constructor(
    private readonly guest: GuestExports,
    options: HostBridgeOptions = {},
  ) {
    this.initialCapacity = options.initialCapacity ?? DEFAULT_INITIAL_CAPACITY;
    this.logger = options.logger ?? createLogger('host-bridge');
  }

  /**
   * Read and validate the guest's descriptor.
   *
   * @throws HostBridgeError if the document is not JSON or fails the
   *   descriptor schema.
   */
  describe(): PluginDescriptor {
    const bytes = this.readOut((address, capacity) => this.guest.metadata(address, capacity));

    let parsed: unknown;
    try {
      parsed = JSON.parse(new TextDecoder().decode(bytes));
    } catch (err) {
      throw new HostBridgeError(
        `Descriptor is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const result = validateDescriptor(parsed);
    if (!result.valid) {
      throw new HostBridgeError(`Descriptor failed validation: ${result.errors.join('; ')}`);
    }
    return result.value;
  }

  /** Send raw request bytes and decode the response. */
  callRaw(requestBytes: Uint8Array): Response {
    const inAddress = this.guest.alloc(requestBytes.byteLength);
    try {
      this.guest.memory.write(inAddress, requestBytes);
      const bytes = this.readOut((outAddress, outCapacity) =>
        this.guest.call(inAddress, requestBytes.byteLength, outAddress, outCapacity),
      );

      const decoded = decodeResponse(bytes);
      if (!decoded.ok) {
        throw new HostBridgeError(decoded.error);
      }
      return decoded.response;
    } finally {
      this.guest.dealloc(inAddress, requestBytes.byteLength);
    }
  }

  /** Encode and send one request. */
  call(request: Request): Response {
    return this.callRaw(encodeRequest(request));
  }

  /**
   * Run prep → exec → post for `input`, feeding each phase the previous
   * phase's output. Stops at the first failure.
   */
  runPipeline(node: string, input: JsonValue, config?: JsonValue): PipelineOutcome {
    let current: JsonValue | undefined = input;
    let next: string | undefined;

    for (const phase of PHASES) {
      const request: Request = { node, function: phase };
      if (current !== undefined) request.input = current;
      if (config !== undefined) request.config = config;

      const response = this.call(request);
      if (!response.success) {
        this.logger.debug('Pipeline stopped', { node, phase, ok: false });
        return { ok: false, phase, error: response.error };
      }
      current = response.output;
      next = response.next;
    }

    return next !== undefined ? { ok: true, output: current, next } : { ok: true, output: current };
  }

  /**
   * Run `write` against a fresh output buffer. When it reports more bytes
   * than fit, run it once more against an exactly-sized buffer.
   */
  private readOut(write: (address: number, capacity: number) => number): Uint8Array {
    const first = this.writeInto(write, this.initialCapacity);
    if (first.bytes !== undefined) {
      return first.bytes;
    }

    this.logger.debug('Output buffer too small, retrying', {
      capacity: this.initialCapacity,
      length: first.length,
    });
    const second = this.writeInto(write, first.length);
    if (second.bytes === undefined) {
      throw new HostBridgeError(
        `Guest output grew between calls: ${first.length} bytes, then ${second.length}`,
      );
    }
    return second.bytes;
  }

  private writeInto(
    write: (address: number, capacity: number) => number,
    capacity: number,
  ): { length: number; bytes?: Uint8Array } {
    const address = this.guest.alloc(capacity);
    try {
      const length = write(address, capacity);
      if (length > capacity) {
        return { length };
      }
      return { length, bytes: this.guest.memory.read(address, length) };
    } finally {
      this.guest.dealloc(address, capacity);
    }
  }
}
