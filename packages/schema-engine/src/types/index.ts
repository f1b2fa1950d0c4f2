export type { DeriveOptions, DerivationResult } from './derivation.js';
