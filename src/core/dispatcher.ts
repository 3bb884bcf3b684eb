/**
 * Phase dispatcher.
 *
 * Routes a decoded request to the phase named by its `function` field and
 * turns whatever the phase does into exactly one {@link Response}:
 *
 * - `{ ok: true }` results become successes; `next` survives only for `post`.
 * - `{ ok: false }` results and thrown PhaseErrors become failures carrying
 *   their message.
 * - Any other throw becomes a generic HANDLER_ERROR; the detail goes to the
 *   log, never to the host.
 * - Outputs that would not survive JSON encoding become HANDLER_ERROR.
 */

import { ErrorCode } from '../types/errors.js';
import type { ErrorPayload } from '../types/errors.js';
import { isPhase } from '../types/protocol.js';
import type { Phase, Response, SuccessResponse, WireRequest } from '../types/protocol.js';
import type { Logger } from './logger.js';
import { createLogger } from './logger.js';
import { isPhaseError } from './phase-error.js';
import type { PhaseContext, PhaseResult, PluginNode } from './plugin-node.js';
import { isEncodable } from './wire-codec.js';

export const INTERNAL_ERROR_MESSAGE = 'Phase handler encountered an internal error';
export const NON_ENCODABLE_OUTPUT_MESSAGE = 'Phase handler produced an output that is not valid JSON';

const defaultLogger = createLogger('dispatcher');

// ---------------------------------------------------------------------------
// Phase selection
// ---------------------------------------------------------------------------

function runPhase(
  node: PluginNode,
  phase: Phase,
  request: WireRequest,
  context: PhaseContext,
): PhaseResult {
  switch (phase) {
    case 'prep':
      return node.prep(request.input, context);
    case 'exec':
      return node.exec(request.input, context);
    case 'post':
      return node.post(request.input, context);
    default: {
      const unreachable: never = phase;
      throw new Error(`Unhandled phase: ${String(unreachable)}`);
    }
  }
}

function failure(error: ErrorPayload): { response: Response; code: string } {
  return { response: { success: false, error: error.message }, code: error.code };
}

// ---------------------------------------------------------------------------
// dispatch
// ---------------------------------------------------------------------------

/**
 * Serve one request with `node`. Never throws for anything a phase does.
 */
export function dispatch(request: WireRequest, node: PluginNode, logger: Logger = defaultLogger): Response {
  if (!isPhase(request.function)) {
    logger.debug('Unknown function', {
      node: request.node,
      ok: false,
      error_code: ErrorCode.UNKNOWN_FUNCTION,
      function: request.function,
    });
    return { success: false, error: `Unknown function: ${request.function}` };
  }

  const phase = request.function;
  const phaseLogger = logger.withContext({ node: request.node, phase });
  const context: PhaseContext = { node: request.node, logger: phaseLogger };
  if (request.config !== undefined) context.config = request.config;

  const start = performance.now();
  const { response, code } = settle(phase, () => runPhase(node, phase, request, context), phaseLogger);
  const durationMs = performance.now() - start;

  phaseLogger.debug('Phase completed', {
    ok: response.success,
    duration_ms: durationMs,
    ...(code !== undefined ? { error_code: code } : {}),
  });

  return response;
}

function settle(
  phase: Phase,
  run: () => PhaseResult,
  logger: Logger,
): { response: Response; code?: string } {
  let result: PhaseResult;
  try {
    result = run();
  } catch (err) {
    if (isPhaseError(err)) {
      return failure(err.toErrorPayload());
    }
    logger.error('Phase handler threw', { error: err });
    return failure({ code: ErrorCode.HANDLER_ERROR, message: INTERNAL_ERROR_MESSAGE });
  }

  if (!result.ok) {
    return failure(result.error);
  }

  if (!isEncodable(result.output)) {
    logger.error('Phase handler returned a non-encodable output');
    return failure({ code: ErrorCode.HANDLER_ERROR, message: NON_ENCODABLE_OUTPUT_MESSAGE });
  }

  const response: SuccessResponse = { success: true, output: result.output };
  if (phase === 'post' && result.next !== undefined) {
    response.next = result.next;
  }
  return { response };
}
