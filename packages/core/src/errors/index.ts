/**
 * Error exports for core
 */

export {
  SchemaError,
  SchemaConstructionError,
  DerivationUnavailableError,
  PathNotFoundError,
  ConfigurationError,
  wrapError,
} from './schema-error.js';
export type { SchemaErrorCode, SchemaErrorDetails } from './schema-error.js';
