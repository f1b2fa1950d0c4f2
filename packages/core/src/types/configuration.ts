/**
 * Derivation configuration types
 */

export type NamingPolicyName = 'identity' | 'snake_case' | 'kebab-case' | 'SCREAMING_SNAKE_CASE';

export type NameTransform = (name: string) => string;

export type NamingPolicy = NamingPolicyName | NameTransform;

/**
 * Policy applied while deriving schemas. Frozen once created.
 */
export interface Configuration {
  /** Policy `toEncodedName` was built from */
  readonly naming: NamingPolicy;
  /** Policy `toDiscriminatorValue` was built from, when it differs from `naming` */
  readonly discriminatorValue?: NamingPolicy;
  /** Maps a source field name to its wire name */
  readonly toEncodedName: NameTransform;
  /** Field carrying the variant label of a coproduct, if coproducts are discriminated */
  readonly discriminator?: string;
  /** Maps a variant type name to its discriminator value */
  readonly toDiscriminatorValue: NameTransform;
}

/** User-facing input accepted by `createConfiguration` */
export interface ConfigurationInput {
  naming?: NamingPolicy;
  discriminator?: string;
  /** Defaults to the field naming policy */
  discriminatorValue?: NamingPolicy;
}
