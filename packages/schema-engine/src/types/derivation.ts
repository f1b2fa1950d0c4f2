/**
 * Derivation Types
 */

import type { DerivationUnavailableError, Schema } from '@typedwire/core';

/** Per-call overrides; they apply to the root coproduct only */
export interface DeriveOptions {
  /** Discriminator field; wins over the type's and the configuration's */
  discriminator?: string;
  /** Turns a variant label into its discriminator value; wins over fixed variant values */
  label?: (variantLabel: string) => string;
}

export type DerivationResult<T> =
  | { ok: true; schema: Schema<T> }
  | { ok: false; error: DerivationUnavailableError };
