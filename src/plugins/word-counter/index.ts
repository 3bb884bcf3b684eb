import { GuestModule } from '../../core/guest-module.js';
import type { ModuleConfig } from '../../types/config.js';
import { wordCounterNode } from './word-counter-handler.js';
import { WORD_COUNTER_PLUGIN_INFO } from './word-counter-definition.js';

export { wordCounterNode, prepWordCount, execWordCount, postWordCount } from './word-counter-handler.js';
export {
  WORD_COUNT_NODE_TYPE,
  WORD_COUNT_NODE_DEFINITION,
  WORD_COUNTER_PLUGIN_INFO,
} from './word-counter-definition.js';
export {
  type WordCounterConfig,
  DEFAULT_STOP_WORDS,
  defaultWordCounterConfig,
  resolveWordCounterConfig,
} from './word-counter-config.js';
export {
  type WordStats,
  type WordCountRoute,
  cleanText,
  computeWordStats,
  routeByWordCount,
} from './text-stats.js';

/** The word-counter module: the word-count node in a guest module. */
export function createWordCounterModule(config?: ModuleConfig): GuestModule {
  return new GuestModule({ node: wordCounterNode, info: WORD_COUNTER_PLUGIN_INFO, config });
}
