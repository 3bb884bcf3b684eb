/**
 * Descriptor entries for the word-count node and the module that ships it.
 */

import type { NodeDefinition, NodeExample, PluginInfo } from '../../types/descriptor.js';
import type { JsonObject } from '../../types/protocol.js';
import { WORD_COUNTER_CONFIG_SCHEMA } from './word-counter-config.js';

export const WORD_COUNT_NODE_TYPE = 'word-count';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

/** Input of the node as a whole, which is the input of `prep`. */
export const WORD_COUNTER_INPUT_SCHEMA: JsonObject = {
  type: 'object',
  properties: {
    text: { type: 'string', description: 'Text to analyze' },
    case_sensitive: {
      type: 'boolean',
      default: false,
      description: 'Whether to treat words case-sensitively',
    },
  },
  required: ['text'],
};

/** Output of the node, which is the output of `exec` carried through `post`. */
export const WORD_COUNTER_OUTPUT_SCHEMA: JsonObject = {
  type: 'object',
  properties: {
    total_words: { type: 'integer', minimum: 0, description: 'Total number of words' },
    unique_words: { type: 'integer', minimum: 0, description: 'Number of unique words' },
    word_frequencies: {
      type: 'object',
      additionalProperties: { type: 'integer' },
      description: 'Word frequency map',
    },
    average_word_length: { type: 'number', description: 'Average length of words' },
    longest_word: { type: 'string', description: 'The longest word found' },
    shortest_word: { type: 'string', description: 'The shortest word found' },
  },
  required: [
    'total_words',
    'unique_words',
    'word_frequencies',
    'average_word_length',
    'longest_word',
    'shortest_word',
  ],
};

// ---------------------------------------------------------------------------
// Example
// ---------------------------------------------------------------------------

export const BASIC_TEXT_ANALYSIS_EXAMPLE: NodeExample = {
  name: 'Basic text analysis',
  description: 'Stop words are dropped before counting',
  input: { text: 'The quick brown fox jumps over the lazy dog', case_sensitive: false },
  output: {
    total_words: 7,
    unique_words: 7,
    word_frequencies: { quick: 1, brown: 1, fox: 1, jumps: 1, over: 1, lazy: 1, dog: 1 },
    average_word_length: 29 / 7,
    longest_word: 'quick',
    shortest_word: 'fox',
  },
};

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

export const WORD_COUNT_NODE_DEFINITION: NodeDefinition = {
  type: WORD_COUNT_NODE_TYPE,
  category: 'text',
  description: 'Count words and analyze text statistics',
  configSchema: WORD_COUNTER_CONFIG_SCHEMA,
  inputSchema: WORD_COUNTER_INPUT_SCHEMA,
  outputSchema: WORD_COUNTER_OUTPUT_SCHEMA,
  examples: [BASIC_TEXT_ANALYSIS_EXAMPLE],
};

export const WORD_COUNTER_PLUGIN_INFO: PluginInfo = {
  name: 'word-counter',
  version: '1.0.0',
  description: 'Word counting and analysis plugin',
  author: 'Word Counter Contributors',
  license: 'MIT',
  runtime: 'wasm',
  binary: 'plugin.wasm',
  requirements: { host: '>=1.0.0' },
};
