/**
 * word-count node: sanitize (prep), aggregate (exec), route (post).
 *
 * Prep requires a `text` field. Exec and post read their fields
 * leniently: a missing or mistyped field takes its default, so any input
 * that is present is accepted.
 */

import { schemaValidator } from '../../core/schema-validator.js';
import type { PhaseContext, PhaseResult, PluginNode } from '../../core/plugin-node.js';
import { ErrorCode } from '../../types/errors.js';
import type { ErrorCodeValue } from '../../types/errors.js';
import type { JsonValue } from '../../types/protocol.js';
import { cleanText, computeWordStats, routeByWordCount } from './text-stats.js';
import { resolveWordCounterConfig } from './word-counter-config.js';
import { WORD_COUNT_NODE_DEFINITION, WORD_COUNTER_INPUT_SCHEMA } from './word-counter-definition.js';

// ---------------------------------------------------------------------------
// Phase input shapes
// ---------------------------------------------------------------------------

interface PrepInput {
  text: string;
  case_sensitive?: boolean;
}

const validatePrepInput = schemaValidator.compile<PrepInput>(WORD_COUNTER_INPUT_SCHEMA);

/** `input[key]` when `input` is an object. */
function field(input: JsonValue, key: string): JsonValue | undefined {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return undefined;
  }
  return input[key];
}

function fail(code: ErrorCodeValue, message: string): PhaseResult {
  return { ok: false, error: { code, message } };
}

// ---------------------------------------------------------------------------
// Phases
// ---------------------------------------------------------------------------

/** Replace non-word characters with spaces; keep the original text alongside. */
export function prepWordCount(input: JsonValue | undefined): PhaseResult {
  if (input === undefined) {
    return fail(ErrorCode.MISSING_INPUT, 'No input provided');
  }

  const parsed = validatePrepInput(input);
  if (!parsed.valid) {
    return fail(ErrorCode.INVALID_INPUT_SHAPE, `Failed to parse input: ${parsed.errors.join('; ')}`);
  }

  const { text, case_sensitive = false } = parsed.value;
  return {
    ok: true,
    output: { original_text: text, cleaned_text: cleanText(text), case_sensitive },
  };
}

export function execWordCount(input: JsonValue | undefined, context: PhaseContext): PhaseResult {
  if (input === undefined) {
    return fail(ErrorCode.MISSING_PREP_DATA, 'No prep data provided');
  }

  const cleanedText = field(input, 'cleaned_text');
  const caseSensitive = field(input, 'case_sensitive');

  const resolved = resolveWordCounterConfig(context.config);
  if (resolved.rejected) {
    context.logger.warn('Ignoring invalid word-count config, using defaults', {
      errors: resolved.errors,
    });
  }

  const stats = computeWordStats(typeof cleanedText === 'string' ? cleanedText : '', {
    caseSensitive: caseSensitive === true,
    minWordLength: resolved.config.min_word_length,
    stopWords: resolved.config.stop_words,
  });
  return { ok: true, output: stats };
}

/**
 * Pick the route from `total_words`; the exec result passes through
 * unchanged. A count that is not a non-negative integer routes as 0.
 */
export function postWordCount(input: JsonValue | undefined): PhaseResult {
  if (input === undefined) {
    return fail(ErrorCode.MISSING_EXEC_RESULT, 'No exec result provided');
  }

  const count = field(input, 'total_words');
  const totalWords = typeof count === 'number' && Number.isInteger(count) && count >= 0 ? count : 0;

  return { ok: true, output: input, next: routeByWordCount(totalWords) };
}

// ---------------------------------------------------------------------------
// Node
// ---------------------------------------------------------------------------

export const wordCounterNode: PluginNode = {
  definition: WORD_COUNT_NODE_DEFINITION,
  prep: prepWordCount,
  exec: execWordCount,
  post: postWordCount,
};
