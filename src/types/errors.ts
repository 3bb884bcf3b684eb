/**
 * Error taxonomy for guest calls.
 *
 * Every code here is recovered inside the call and surfaced to the host as
 * a `success: false` response. Allocator faults are not part of this set;
 * they are thrown (see core/memory-arena.ts).
 */

export const ErrorCode = {
  INVALID_ENCODING: 'INVALID_ENCODING',
  MALFORMED_REQUEST: 'MALFORMED_REQUEST',
  UNKNOWN_FUNCTION: 'UNKNOWN_FUNCTION',
  MISSING_INPUT: 'MISSING_INPUT',
  MISSING_PREP_DATA: 'MISSING_PREP_DATA',
  MISSING_EXEC_RESULT: 'MISSING_EXEC_RESULT',
  INVALID_INPUT_SHAPE: 'INVALID_INPUT_SHAPE',
  HANDLER_ERROR: 'HANDLER_ERROR',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Structured error produced by the codec, dispatcher or a phase handler. */
export interface ErrorPayload {
  code: ErrorCodeValue;
  message: string;
}

/**
 * Codes owned by the call boundary. A phase handler may not raise these;
 * they are normalized to HANDLER_ERROR when it tries.
 */
export const RESERVED_BOUNDARY_CODES: ReadonlySet<ErrorCodeValue> = new Set<ErrorCodeValue>([
  ErrorCode.INVALID_ENCODING,
  ErrorCode.MALFORMED_REQUEST,
  ErrorCode.UNKNOWN_FUNCTION,
]);
