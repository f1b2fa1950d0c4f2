export { oneOfUsingField, oneOfWrapped, addDiscriminatorField } from './one-of.js';
export type { OneOfOptions, OneOfWrappedOptions, WrappedVariant } from './one-of.js';
export { variantFor } from './variant-for.js';
