/**
 * Host/guest message protocol types.
 *
 * Defines the request envelope the host writes into guest memory and the
 * response envelope the guest writes back. Payloads are open JSON values;
 * each phase handler validates only the sub-fields it reads.
 */

// ---------------------------------------------------------------------------
// JSON values
// ---------------------------------------------------------------------------

/** Any value that survives a JSON encode/decode cycle unchanged. */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/** A JSON object. */
export type JsonObject = { [key: string]: JsonValue };

// ---------------------------------------------------------------------------
// Phases
// ---------------------------------------------------------------------------

/** The three phases of a node computation, in call order. */
export const PHASES = ['prep', 'exec', 'post'] as const;

/** Closed phase variant. Anything else is rejected at the boundary. */
export type Phase = (typeof PHASES)[number];

const PHASE_SET: ReadonlySet<string> = new Set<string>(PHASES);

/** Narrow a raw `function` field to a {@link Phase}. */
export function isPhase(value: string): value is Phase {
  return PHASE_SET.has(value);
}

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

/**
 * A request as decoded from the wire. `function` is still a raw string here:
 * the dispatcher narrows it, so an unknown name can be reported verbatim.
 * A JSON `null` for `config` or `input` has already been mapped to absent.
 */
export interface WireRequest {
  node: string;
  function: string;
  config?: JsonValue;
  input?: JsonValue;
}

/** A request the host builds before encoding. */
export interface Request {
  node: string;
  function: Phase;
  config?: JsonValue;
  input?: JsonValue;
}

// ---------------------------------------------------------------------------
// Response
// ---------------------------------------------------------------------------

/** A successful phase result. `next` is only ever set by `post`. */
export interface SuccessResponse {
  success: true;
  output?: JsonValue;
  next?: string;
}

/** A failed phase result. Carries no output. */
export interface FailureResponse {
  success: false;
  error: string;
}

/** Discriminated union of everything the guest can answer. */
export type Response = SuccessResponse | FailureResponse;
