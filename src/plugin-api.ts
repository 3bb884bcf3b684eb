// Node-author public API. External nodes import from 'word-counter-plugin/plugin'.

// Phase contract
export type { PluginNode, PhaseHandler, PhaseContext, PhaseResult } from './core/plugin-node.js';
export type { Logger, LogContext } from './core/logger.js';

// Structured errors
export { PhaseError, isPhaseError } from './core/phase-error.js';
export type { PhaseErrorOptions } from './core/phase-error.js';

// Schemas for phase payloads
export { schemaValidator, type Validator, type ValidationResult } from './core/schema-validator.js';

// Descriptor types for node definitions
export type { NodeDefinition, NodeExample, PluginInfo } from './types/index.js';

// Protocol and error types
export type { JsonValue, JsonObject, Phase, ErrorPayload, ErrorCodeValue } from './types/index.js';

// Error codes (runtime value)
export { ErrorCode } from './types/index.js';
