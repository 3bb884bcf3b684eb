export const VERSION = '1.0.0';

// Guest module and its host-side driver
export { GuestModule, type GuestExports, type GuestModuleOptions } from './core/guest-module.js';
export {
  HostBridge,
  HostBridgeError,
  type HostBridgeOptions,
  type PipelineOutcome,
} from './core/host-bridge.js';

// Boundary pieces
export {
  LinearMemory,
  MemoryArena,
  ArenaError,
  ArenaExhaustedError,
  MemoryAccessError,
  PAGE_SIZE,
  HEAP_BASE,
} from './core/memory-arena.js';
export {
  decodeRequest,
  encodeResponse,
  encodeRequest,
  decodeResponse,
  isEncodable,
} from './core/wire-codec.js';
export { dispatch } from './core/dispatcher.js';
export { buildDescriptor, encodeDescriptor } from './core/descriptor.js';

// Configuration and logging
export { loadConfig, resolveConfigPath, CONFIG_PATH_ENV } from './core/config-loader.js';
export { createLogger, configureLogging, type Logger, type LogLevel } from './core/logger.js';

// The word-counter node
export {
  createWordCounterModule,
  wordCounterNode,
  WORD_COUNT_NODE_TYPE,
  WORD_COUNTER_PLUGIN_INFO,
} from './plugins/word-counter/index.js';

export * from './types/index.js';
