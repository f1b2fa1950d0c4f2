/**
 * Explicit metadata declared alongside a type or one of its fields
 */

import type { SchemaDefault } from './schema.js';
import type { Validator } from './validator.js';

export interface Annotations {
  /** Wire name; wins over the configured naming policy */
  encodedName?: string;
  description?: string;
  default?: SchemaDefault;
  encodedExample?: unknown;
  format?: string;
  deprecated?: boolean;
  hidden?: boolean;
  /** Appended to the validators already on the schema */
  validator?: Validator;
}
