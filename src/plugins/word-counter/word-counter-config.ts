/**
 * Per-node configuration for word-count.
 *
 * Arrives as the request `config` on `exec`. An absent config means
 * defaults; an invalid one is reported back to the caller so it can be
 * logged, and defaults are used in its place.
 */

import { schemaValidator } from '../../core/schema-validator.js';
import type { JsonObject, JsonValue } from '../../types/protocol.js';

export interface WordCounterConfig {
  /** Minimum word length in code points. */
  min_word_length: number;
  stop_words: string[];
}

export const DEFAULT_STOP_WORDS: readonly string[] = [
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'has', 'he',
  'in', 'is', 'it', 'its', 'of', 'on', 'that', 'the', 'to', 'was', 'will', 'with',
];

export const DEFAULT_MIN_WORD_LENGTH = 1;

export function defaultWordCounterConfig(): WordCounterConfig {
  return { min_word_length: DEFAULT_MIN_WORD_LENGTH, stop_words: [...DEFAULT_STOP_WORDS] };
}

/** JSON Schema for the config, also advertised as the node's `configSchema`. */
export const WORD_COUNTER_CONFIG_SCHEMA: JsonObject = {
  type: 'object',
  properties: {
    min_word_length: {
      type: 'integer',
      minimum: 0,
      default: DEFAULT_MIN_WORD_LENGTH,
      description: 'Minimum word length to count',
    },
    stop_words: {
      type: 'array',
      items: { type: 'string' },
      default: [...DEFAULT_STOP_WORDS],
      description: 'Words to exclude from counting',
    },
  },
};

const validateConfig = schemaValidator.compile<Partial<WordCounterConfig>>(WORD_COUNTER_CONFIG_SCHEMA);

export type ResolvedWordCounterConfig =
  | { config: WordCounterConfig; rejected: false }
  | { config: WordCounterConfig; rejected: true; errors: string[] };

/**
 * Resolve a raw request config. Missing fields of a valid config take
 * their defaults; an invalid config is replaced wholesale.
 */
export function resolveWordCounterConfig(raw: JsonValue | undefined): ResolvedWordCounterConfig {
  if (raw === undefined) {
    return { config: defaultWordCounterConfig(), rejected: false };
  }

  const result = validateConfig(raw);
  if (!result.valid) {
    return { config: defaultWordCounterConfig(), rejected: true, errors: result.errors };
  }

  const { min_word_length, stop_words } = result.value;
  return {
    config: {
      min_word_length: min_word_length ?? DEFAULT_MIN_WORD_LENGTH,
      stop_words: stop_words ?? [...DEFAULT_STOP_WORDS],
    },
    rejected: false,
  };
}
