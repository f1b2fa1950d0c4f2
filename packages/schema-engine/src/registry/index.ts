export { SchemaRegistry } from './schema-registry.js';
