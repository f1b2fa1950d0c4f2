export { AnnotationResolver } from './annotation-resolver.js';
export type { AnnotationBundle } from './annotation-resolver.js';
