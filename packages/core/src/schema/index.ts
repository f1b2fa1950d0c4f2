export {
  createSchema,
  primitive,
  array,
  optional,
  map,
  ref,
  field,
  product,
  coproduct,
  stringSchema,
  integerSchema,
  numberSchema,
  booleanSchema,
  binarySchema,
  dateSchema,
  dateTimeSchema,
  uuidSchema,
  unknownSchema,
} from './builders.js';
export type { ProductFieldInput, ProductOptions, CoproductVariantInput, CoproductOptions } from './builders.js';
export {
  withDescription,
  withDefault,
  withExample,
  withFormat,
  withDeprecated,
  withHidden,
  withName,
  withValidator,
  withType,
  schemaOf,
  isOptional,
} from './metadata.js';
export { schemaEquals } from './equality.js';
export { collectDefinitions, dereference } from './definitions.js';
export { each, toSegment, fieldPath, formatFieldPath } from './field-path.js';
export type { PathToken } from './field-path.js';
