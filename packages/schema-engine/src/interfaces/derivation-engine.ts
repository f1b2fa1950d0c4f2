/**
 * Derivation Engine Interface
 */

import type { CoproductDescriptor, Schema, TypeDescriptor } from '@typedwire/core';
import type { DerivationResult, DeriveOptions } from '../types/index.js';

/**
 * Builds schemas from caller-supplied type descriptors.
 */
export interface IDerivationEngine {
  /**
   * Derive the schema of a type.
   *
   * @param descriptor - Structural description of the type
   * @param options - Overrides for a root coproduct
   * @throws DerivationUnavailableError if a component type has no schema
   */
  derive<T>(descriptor: TypeDescriptor<T>, options?: DeriveOptions): Schema<T>;

  deriveCoproduct<T>(descriptor: CoproductDescriptor<T>, options?: DeriveOptions): Schema<T>;

  /**
   * Derive without throwing for missing component schemas.
   */
  tryDerive<T>(descriptor: TypeDescriptor<T>, options?: DeriveOptions): DerivationResult<T>;
}
