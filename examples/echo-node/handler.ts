/**
 * Echo node: minimal example of a node hosted by the guest module.
 *
 * prep wraps the input; exec and post pass it along.
 */

import type { PhaseResult, PluginNode } from '../../src/core/plugin-node.js';
import { ErrorCode } from '../../src/types/errors.js';
import type { JsonValue } from '../../src/types/protocol.js';

function requireInput(input: JsonValue | undefined, phase: string): PhaseResult | undefined {
  if (input !== undefined) return undefined;
  return {
    ok: false,
    error: { code: ErrorCode.MISSING_INPUT, message: `No input provided to ${phase}` },
  };
}

const echoNode: PluginNode = {
  definition: {
    type: 'echo',
    category: 'debug',
    description: 'Returns its input unchanged',
    inputSchema: { type: 'object', properties: { text: { type: 'string' } } },
    outputSchema: { type: 'object', required: ['echoed'], properties: { echoed: {} } },
    examples: [{ name: 'Echo text', input: { text: 'hello' }, output: { echoed: { text: 'hello' } } }],
  },

  prep: (input) => requireInput(input, 'prep') ?? { ok: true, output: { echoed: input ?? null } },

  exec: (input) => requireInput(input, 'exec') ?? { ok: true, output: input ?? null },

  post: (input) => requireInput(input, 'post') ?? { ok: true, output: input ?? null },
};

export default echoNode;
