/**
 * Interface exports for schema-engine
 */

export type { IDerivationEngine } from './derivation-engine.js';
export type { ISchemaModifier, SchemaTransform } from './schema-modifier.js';
