export {
  PHASES,
  isPhase,
  type Phase,
  type JsonValue,
  type JsonObject,
  type WireRequest,
  type Request,
  type SuccessResponse,
  type FailureResponse,
  type Response,
} from './protocol.js';

export {
  ErrorCode,
  type ErrorCodeValue,
  type ErrorPayload,
  RESERVED_BOUNDARY_CODES,
} from './errors.js';

export {
  type NodeExample,
  type NodeDefinition,
  type Permissions,
  type Requirements,
  type PluginInfo,
  type PluginDescriptor,
} from './descriptor.js';

export { DESCRIPTOR_JSON_SCHEMA } from './descriptor-schema.js';

export {
  type ConfigLogLevel,
  type MemoryConfig,
  type ExecutionConfig,
  type LoggingConfig,
  type ModuleConfig,
  DEFAULT_CONFIG,
  parseMemoryLimit,
  parseConfig,
} from './config.js';
