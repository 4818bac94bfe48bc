/**
 * Runtime JSON Schema for `engine.toml`, fed to ajv by `parseConfig()`.
 *
 * Every section and key is optional; `parseConfig()` fills in defaults.
 */

export const CONFIG_JSON_SCHEMA = {
  $id: 'https://phaseline.dev/schemas/engine-config.json',
  type: 'object' as const,
  additionalProperties: true,

  properties: {
    engine: {
      type: 'object',
      additionalProperties: false,
      properties: {
        development: { type: 'boolean' },
        call_timeout_ms: { type: 'integer', minimum: 0 },
      },
    },
    logging: {
      type: 'object',
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
      },
    },
    fallback: {
      type: 'object',
      additionalProperties: false,
      properties: {
        status: { type: 'integer', minimum: 100, maximum: 599 },
      },
    },
  },
};
