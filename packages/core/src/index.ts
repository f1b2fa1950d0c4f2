/**
 * @typedwire/core
 *
 * Schema and validator model shared by the typedwire packages
 */

// Types
export * from './types/index.js';

// Schema model
export * from './schema/index.js';

// Validators
export * from './validators/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
