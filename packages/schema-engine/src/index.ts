/**
 * @typedwire/schema-engine
 *
 * Derives wire schemas from type descriptors and edits them afterwards:
 * derivation, annotation resolution, discriminated coproducts and targeted
 * modification of nested schemas.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Type descriptors
export { t, descriptorName, descriptorOf } from './descriptors/index.js';
export type {
  FieldSpec,
  FieldInput,
  ProductFields,
  NamedDescriptor,
  LabelledVariant,
  VariantInput,
} from './descriptors/index.js';

// Configuration
import { createConfiguration as _createConfiguration } from './configuration/index.js';
export {
  createConfiguration,
  defaultConfiguration,
  withDiscriminator,
  withNamingPolicy,
  withSnakeCaseMemberNames,
  withKebabCaseMemberNames,
} from './configuration/index.js';

// Derivation Module
import { DerivationEngine as _DerivationEngine } from './derivation/index.js';
export { DerivationEngine } from './derivation/index.js';
export type { DerivationEngineOptions } from './derivation/index.js';
export { SchemaRegistry } from './registry/index.js';
export { AnnotationResolver } from './annotations/index.js';
export type { AnnotationBundle } from './annotations/index.js';

// Coproducts
export { oneOfUsingField, oneOfWrapped, addDiscriminatorField, variantFor } from './coproduct/index.js';
export type { OneOfOptions, OneOfWrappedOptions, WrappedVariant } from './coproduct/index.js';

// Modification Module
import { SchemaModifier as _SchemaModifier } from './modification/index.js';
import type { SchemaModifierOptions as _SchemaModifierOptions } from './modification/index.js';
export {
  SchemaModifier,
  EACH_FIELD,
  modify,
  modifyUnsafe,
  getAt,
  ContainerRegistry,
  containerField,
  containerArrayField,
} from './modification/index.js';
export type { SchemaModifierOptions, ContainerLens, SchemaPath, AtPath, ElementOf, FieldKeys } from './modification/index.js';

// Validation
export { applyValidation, isValidFor } from './validation/index.js';

// Formatters
export { toJsonSchema } from './formatters/index.js';
export type { JsonSchema, JsonSchemaOptions } from './formatters/index.js';

// Adapters
export { describeZod } from './adapters/index.js';
export type { DescribeZodOptions } from './adapters/index.js';

import type { ConfigurationInput, Logger, Schema, TypeDescriptor } from '@typedwire/core';
import type { SchemaRegistry as _SchemaRegistry } from './registry/index.js';
import type { DeriveOptions as _DeriveOptions } from './types/index.js';

/**
 * Factory function to create a DerivationEngine
 *
 * @param configuration - Naming policy and discriminator settings (validated)
 * @param registry - Schemas that take precedence over derivation
 */
export function createDerivationEngine(
  configuration: ConfigurationInput = {},
  registry?: _SchemaRegistry,
  logger?: Logger
): _DerivationEngine {
  return new _DerivationEngine({
    configuration: _createConfiguration(configuration),
    ...(registry ? { registry } : {}),
    ...(logger ? { logger } : {}),
  });
}

/**
 * Factory function to create a SchemaModifier
 */
export function createSchemaModifier(options: _SchemaModifierOptions = {}): _SchemaModifier {
  return new _SchemaModifier(options);
}

/**
 * One-off derivation with a fresh engine
 */
export function deriveSchema<T>(
  descriptor: TypeDescriptor<T>,
  configuration: ConfigurationInput = {},
  options: _DeriveOptions = {}
): Schema<T> {
  return createDerivationEngine(configuration).derive(descriptor, options);
}
