export { t, descriptorName, descriptorOf } from './type-builder.js';
export type {
  FieldSpec,
  FieldInput,
  ProductFields,
  NamedDescriptor,
  LabelledVariant,
  VariantInput,
} from './type-builder.js';
