export { SchemaModifier, EACH_FIELD, modify, modifyUnsafe, getAt } from './schema-modifier.js';
export type { SchemaModifierOptions } from './schema-modifier.js';
export { ContainerRegistry, containerField, containerArrayField } from './container-registry.js';
export type { ContainerLens } from './container-registry.js';
export type { SchemaPath, AtPath, ElementOf, FieldKeys } from './typed-path.js';
