import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ToolParameterSchema } from './types.js';

/**
 * JSON Schema for a tool's parameters, refs inlined
 */
export function toJsonSchema(parameters: ToolParameterSchema): Record<string, unknown> {
  const { $schema: _dialect, ...schema } = zodToJsonSchema(parameters, { $refStrategy: 'none' });
  return schema;
}
