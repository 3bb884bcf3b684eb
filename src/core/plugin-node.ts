/**
 * Node contract for the guest module.
 *
 * A node implements the three phases of one pipeline step plus the
 * {@link NodeDefinition} it advertises in the capability descriptor. The
 * guest module hosts exactly one node; the dispatcher calls one phase per
 * request.
 *
 * Phases are synchronous and stateless across calls: everything a phase
 * needs arrives in its input and config.
 */

import type { NodeDefinition } from '../types/descriptor.js';
import type { ErrorPayload } from '../types/errors.js';
import type { JsonValue } from '../types/protocol.js';
import type { Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Context and result
// ---------------------------------------------------------------------------

/** Per-call context handed to a phase. */
export interface PhaseContext {
  /** `node` field of the request being served. */
  node: string;
  /** Request `config`, absent when the host sent none or `null`. */
  config?: JsonValue;
  /** Logger bound to this node and phase. */
  logger: Logger;
}

/**
 * Discriminated union returned by a phase. Either an output (plus the
 * routing action, for `post`) or a structured error.
 *
 * A phase may also throw; see `dispatch` for how throws are mapped.
 */
export type PhaseResult =
  | { ok: true; output: JsonValue; next?: string }
  | { ok: false; error: ErrorPayload };

/** One phase handler. `input` is absent when the request carried none. */
export type PhaseHandler = (input: JsonValue | undefined, context: PhaseContext) => PhaseResult;

// ---------------------------------------------------------------------------
// PluginNode
// ---------------------------------------------------------------------------

/**
 * The interface every hosted node implements.
 *
 * Call order per node instance: `prep` → `exec` → `post`, each phase's
 * input being the previous phase's output.
 */
export interface PluginNode {
  readonly definition: NodeDefinition;
  prep: PhaseHandler;
  exec: PhaseHandler;
  post: PhaseHandler;
}
