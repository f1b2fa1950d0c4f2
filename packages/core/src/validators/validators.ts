/**
 * Validator constructors and combinators
 */

import type {
  AllValidator,
  AnyValidator,
  CustomCheckResult,
  CustomValidator,
  EachValidator,
  EnumerationValidator,
  EnumerationValue,
  MappedValidator,
  MaxLengthValidator,
  MaxSizeValidator,
  MaxValidator,
  MinLengthValidator,
  MinSizeValidator,
  MinValidator,
  PatternValidator,
  Validator,
} from '../types/index.js';

export const Validators = {
  min(value: number, exclusive = false): MinValidator {
    return { kind: 'min', value, exclusive };
  },

  max(value: number, exclusive = false): MaxValidator {
    return { kind: 'max', value, exclusive };
  },

  positive(): MinValidator {
    return { kind: 'min', value: 0, exclusive: true };
  },

  nonNegative(): MinValidator {
    return { kind: 'min', value: 0, exclusive: false };
  },

  pattern(pattern: string | RegExp): PatternValidator {
    return { kind: 'pattern', pattern: typeof pattern === 'string' ? pattern : pattern.source };
  },

  minLength(value: number): MinLengthValidator {
    return { kind: 'minLength', value };
  },

  maxLength(value: number): MaxLengthValidator {
    return { kind: 'maxLength', value };
  },

  nonEmptyString(): MinLengthValidator {
    return { kind: 'minLength', value: 1 };
  },

  minSize(value: number): MinSizeValidator {
    return { kind: 'minSize', value };
  },

  maxSize(value: number): MaxSizeValidator {
    return { kind: 'maxSize', value };
  },

  nonEmpty(): MinSizeValidator {
    return { kind: 'minSize', value: 1 };
  },

  enumeration(values: readonly EnumerationValue[]): EnumerationValidator {
    return { kind: 'enumeration', values: [...values] };
  },

  custom(id: string, check: (value: unknown) => CustomCheckResult): CustomValidator {
    return { kind: 'custom', id, check };
  },

  /**
   * Validate a projection of the value, e.g. the length of a list or a field of a record.
   */
  mapped(id: string, project: (value: unknown) => unknown, inner: Validator): MappedValidator {
    return { kind: 'mapped', id, project, inner };
  },

  all(...validators: Validator[]): AllValidator {
    return { kind: 'all', validators: flattenAll(validators) };
  },

  any(...validators: Validator[]): AnyValidator {
    return { kind: 'any', validators };
  },

  each(inner: Validator): EachValidator {
    return { kind: 'each', inner };
  },
} as const;

function flattenAll(validators: readonly Validator[]): Validator[] {
  return validators.flatMap((v) => (v.kind === 'all' ? flattenAll(v.validators) : [v]));
}

/**
 * Conjunction of two validators. Nested conjunctions are flattened, so
 * `and(and(a, b), c)` holds `[a, b, c]`.
 */
export function and(first: Validator, second: Validator): AllValidator {
  return { kind: 'all', validators: flattenAll([first, second]) };
}
