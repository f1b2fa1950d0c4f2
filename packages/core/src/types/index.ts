export * from './schema.js';
export * from './validator.js';
export * from './annotations.js';
export * from './configuration.js';
export * from './field-path.js';
export * from './type-descriptor.js';
