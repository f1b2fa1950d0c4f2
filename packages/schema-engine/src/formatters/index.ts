export { toJsonSchema } from './json-schema-formatter.js';
export type { JsonSchema, JsonSchemaOptions } from './json-schema-formatter.js';
