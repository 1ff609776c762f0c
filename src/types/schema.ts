/**
 * The JSON Schema subset used to declare module parameters and run plans.
 */

export interface JsonSchemaProperty {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description?: string;
  default?: unknown;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  format?: string;
  minimum?: number;
  maximum?: number;
  enum?: readonly unknown[];
  items?: JsonSchemaProperty;
  minItems?: number;
  maxItems?: number;
  properties?: Record<string, JsonSchemaProperty>;
  required?: readonly string[];
  additionalProperties?: boolean;
}

export interface JsonSchema {
  type: 'object';
  required?: readonly string[];
  additionalProperties: false;
  properties: Record<string, JsonSchemaProperty>;
}

/** Schema for modules that take no parameters. */
export const NO_PARAMS: JsonSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {},
};
