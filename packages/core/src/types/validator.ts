/**
 * Validator types
 *
 * Validators are plain data describing a constraint on a decoded value.
 * Documentation collaborators read them, validation collaborators evaluate them.
 */

/** Values an enumeration validator may list */
export type EnumerationValue = string | number | boolean;

/**
 * Result of a custom check: `true` when the value is accepted,
 * `false` or a message when it is rejected.
 */
export type CustomCheckResult = boolean | string;

export interface MinValidator {
  kind: 'min';
  value: number;
  /** When true the bound itself is rejected (`>` rather than `>=`) */
  exclusive: boolean;
}

export interface MaxValidator {
  kind: 'max';
  value: number;
  exclusive: boolean;
}

export interface PatternValidator {
  kind: 'pattern';
  /** Regular expression source, matched with `RegExp#test` */
  pattern: string;
}

export interface MinLengthValidator {
  kind: 'minLength';
  value: number;
}

export interface MaxLengthValidator {
  kind: 'maxLength';
  value: number;
}

export interface MinSizeValidator {
  kind: 'minSize';
  value: number;
}

export interface MaxSizeValidator {
  kind: 'maxSize';
  value: number;
}

export interface EnumerationValidator {
  kind: 'enumeration';
  values: readonly EnumerationValue[];
}

export interface CustomValidator {
  kind: 'custom';
  /** Stable identifier; used for equality and documentation */
  id: string;
  check: (value: unknown) => CustomCheckResult;
}

export interface MappedValidator {
  kind: 'mapped';
  /** Stable identifier of the projection */
  id: string;
  project: (value: unknown) => unknown;
  inner: Validator;
}

export interface AllValidator {
  kind: 'all';
  validators: readonly Validator[];
}

export interface AnyValidator {
  kind: 'any';
  validators: readonly Validator[];
}

/** Applies the inner validator to every element of a contained collection */
export interface EachValidator {
  kind: 'each';
  inner: Validator;
}

export type Validator =
  | MinValidator
  | MaxValidator
  | PatternValidator
  | MinLengthValidator
  | MaxLengthValidator
  | MinSizeValidator
  | MaxSizeValidator
  | EnumerationValidator
  | CustomValidator
  | MappedValidator
  | AllValidator
  | AnyValidator
  | EachValidator;

export type ValidatorKind = Validator['kind'];

/** A single failed constraint */
export interface ValidationFailure {
  /** Source field names / element indexes leading to the failing value */
  path: string[];
  validator: Validator;
  value: unknown;
  message: string;
}
