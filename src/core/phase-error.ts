/**
 * PhaseError: structured failure raised by phase handlers.
 *
 * A handler throws PhaseError to fail its phase with a specific code and
 * message. The dispatcher tells PhaseError apart from every other throw:
 * PhaseError becomes `{ success: false, error: message }`, anything else
 * becomes a generic HANDLER_ERROR with no internals in the message.
 *
 * Boundary codes (encoding, malformed request, unknown function) are not
 * a handler's to raise; they are normalized to HANDLER_ERROR and the
 * original message is kept.
 */

import type { ErrorCodeValue, ErrorPayload } from '../types/errors.js';
import { ErrorCode, RESERVED_BOUNDARY_CODES } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol
// ---------------------------------------------------------------------------

/** Global-registry symbol so copies of this module loaded twice agree. */
const PHASE_ERROR_BRAND: unique symbol = Symbol.for('word-counter.PhaseError');

// ---------------------------------------------------------------------------
// PhaseError
// ---------------------------------------------------------------------------

export interface PhaseErrorOptions {
  code: ErrorCodeValue;
  message: string;
}

export class PhaseError extends Error {
  /** Machine-readable code (normalized if reserved). */
  readonly code: ErrorCodeValue;

  /** @internal */
  readonly [PHASE_ERROR_BRAND] = true as const;

  constructor(options: PhaseErrorOptions) {
    super(options.message);
    this.name = 'PhaseError';
    this.code = RESERVED_BOUNDARY_CODES.has(options.code) ? ErrorCode.HANDLER_ERROR : options.code;
  }

  /** Code and message only; never the stack. */
  toErrorPayload(): ErrorPayload {
    return { code: this.code, message: this.message };
  }
}

// ---------------------------------------------------------------------------
// Type guard
// ---------------------------------------------------------------------------

/**
 * Type guard for PhaseError. Falls back to the registry brand when the
 * value comes from another copy of this module.
 */
export function isPhaseError(value: unknown): value is PhaseError {
  if (value instanceof PhaseError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    value instanceof Error &&
    PHASE_ERROR_BRAND in value &&
    value[PHASE_ERROR_BRAND] === true &&
    'code' in value &&
    typeof value.code === 'string'
  );
}
