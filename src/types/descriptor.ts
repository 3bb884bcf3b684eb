/**
 * Capability descriptor types.
 *
 * The descriptor is the document the guest reports when the host asks it to
 * describe itself: identity, the node types it implements with their JSON
 * Schemas, and the resource limits the host should enforce.
 */

import type { JsonObject, JsonValue } from './protocol.js';

// ---------------------------------------------------------------------------
// Node declaration
// ---------------------------------------------------------------------------

/** A worked invocation shown to pipeline authors. */
export type NodeExample = {
  name: string;
  description?: string;
  config?: JsonObject;
  input: JsonValue;
  output: JsonValue;
};

/**
 * One node type provided by the module. Schemas are plain JSON Schema
 * documents, reported as-is to the host.
 */
export type NodeDefinition = {
  type: string;
  category: string;
  description: string;
  configSchema?: JsonObject;
  inputSchema?: JsonObject;
  outputSchema?: JsonObject;
  examples?: NodeExample[];
};

// ---------------------------------------------------------------------------
// Limits and requirements
// ---------------------------------------------------------------------------

/** Resource limits declared to (and enforced by) the host. */
export type Permissions = {
  /** Memory ceiling, e.g. `"5MB"`. */
  memory: string;
  /** Execution timeout per call, in milliseconds. */
  timeout: number;
};

export type Requirements = {
  /** Semver range of host versions the module runs on. */
  host: string;
};

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/** Static identity fields, fixed at build time. */
export type PluginInfo = {
  name: string;
  version: string;
  description: string;
  author: string;
  license: string;
  runtime: string;
  binary: string;
  requirements: Requirements;
};

/** Top-level descriptor document. */
export type PluginDescriptor = PluginInfo & {
  nodes: NodeDefinition[];
  permissions: Permissions;
};
