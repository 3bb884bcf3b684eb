/**
 * Capability descriptor assembly.
 *
 * Combines the module's static identity, the hosted node's definition and
 * the resource limits from module configuration into one document. The
 * encoded bytes are computed once per module instance, so every
 * `describe` call writes identical bytes.
 */

import type { ModuleConfig } from '../types/config.js';
import type { NodeDefinition, PluginDescriptor, PluginInfo } from '../types/descriptor.js';

/** Build the descriptor document. Key order is fixed. */
export function buildDescriptor(
  info: PluginInfo,
  nodes: NodeDefinition[],
  config: Pick<ModuleConfig, 'memory' | 'execution'>,
): PluginDescriptor {
  return {
    name: info.name,
    version: info.version,
    description: info.description,
    author: info.author,
    license: info.license,
    runtime: info.runtime,
    binary: info.binary,
    nodes,
    permissions: {
      memory: config.memory.limit,
      timeout: config.execution.timeout_ms,
    },
    requirements: { host: info.requirements.host },
  };
}

/** UTF-8 JSON encoding of a descriptor. */
export function encodeDescriptor(descriptor: PluginDescriptor): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(descriptor));
}
