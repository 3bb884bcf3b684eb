/**
 * Runtime JSON Schema that validates a PluginDescriptor using ajv.
 *
 * Kept as a plain object (not a TypeScript type) so it can be fed
 * directly to `ajv.compile(DESCRIPTOR_JSON_SCHEMA)`. The host bridge runs
 * every descriptor it reads through it.
 */

const schemaDocument = {
  type: 'object' as const,
  required: ['type'] as string[],
};

export const DESCRIPTOR_JSON_SCHEMA = {
  type: 'object' as const,
  required: [
    'name',
    'version',
    'description',
    'author',
    'license',
    'runtime',
    'binary',
    'nodes',
    'permissions',
    'requirements',
  ],
  additionalProperties: false,

  $defs: {
    schemaDocument,

    example: {
      type: 'object' as const,
      required: ['name', 'input', 'output'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' },
        description: { type: 'string' },
        config: { type: 'object' },
        input: {},
        output: {},
      },
    },

    nodeDefinition: {
      type: 'object' as const,
      required: ['type', 'category', 'description'],
      additionalProperties: false,
      properties: {
        type: { type: 'string', minLength: 1 },
        category: { type: 'string' },
        description: { type: 'string' },
        configSchema: { $ref: '#/$defs/schemaDocument' },
        inputSchema: { $ref: '#/$defs/schemaDocument' },
        outputSchema: { $ref: '#/$defs/schemaDocument' },
        examples: {
          type: 'array',
          items: { $ref: '#/$defs/example' },
        },
      },
    },
  },

  properties: {
    name: { type: 'string', minLength: 1 },
    version: { type: 'string' },
    description: { type: 'string' },
    author: { type: 'string' },
    license: { type: 'string' },
    runtime: { type: 'string' },
    binary: { type: 'string' },
    nodes: {
      type: 'array',
      minItems: 1,
      items: { $ref: '#/$defs/nodeDefinition' },
    },
    permissions: {
      type: 'object',
      required: ['memory', 'timeout'],
      additionalProperties: false,
      properties: {
        memory: { type: 'string', pattern: '^[0-9]+(KB|MB|GB)$' },
        timeout: { type: 'integer', minimum: 1 },
      },
    },
    requirements: {
      type: 'object',
      required: ['host'],
      additionalProperties: false,
      properties: {
        host: { type: 'string' },
      },
    },
  },
} as const;
