export { DerivationEngine } from './derivation-engine.js';
export type { DerivationEngineOptions } from './derivation-engine.js';
