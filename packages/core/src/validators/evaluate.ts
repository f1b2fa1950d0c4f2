/**
 * Validator evaluation against decoded values
 */

import type { ValidationFailure, Validator } from '../types/index.js';
import { showValidator } from './show.js';

function failure(path: string[], validator: Validator, value: unknown, message: string): ValidationFailure[] {
  return [{ path, validator, value, message }];
}

function sizeOf(value: unknown): number | undefined {
  if (Array.isArray(value)) return value.length;
  if (value instanceof Set || value instanceof Map) return value.size;
  return undefined;
}

function elementsOf(value: unknown): Array<[string, unknown]> | undefined {
  if (Array.isArray(value)) {
    return value.map((item, i) => [String(i), item]);
  }
  if (value instanceof Set) {
    return Array.from(value, (item, i) => [String(i), item]);
  }
  if (value instanceof Map) {
    return Array.from(value, ([k, v]) => [String(k), v]);
  }
  return undefined;
}

/**
 * Evaluate a validator. Returns every failed constraint; an empty array means the value is valid.
 *
 * Bounds only apply to numbers, length constraints to strings and size constraints to
 * collections; values of another type pass, type checking belongs to the codec.
 */
export function validate(validator: Validator, value: unknown, path: string[] = []): ValidationFailure[] {
  switch (validator.kind) {
    case 'min': {
      if (typeof value !== 'number') return [];
      const ok = validator.exclusive ? value > validator.value : value >= validator.value;
      return ok ? [] : failure(path, validator, value, `expected ${value} to be ${showValidator(validator)}`);
    }

    case 'max': {
      if (typeof value !== 'number') return [];
      const ok = validator.exclusive ? value < validator.value : value <= validator.value;
      return ok ? [] : failure(path, validator, value, `expected ${value} to be ${showValidator(validator)}`);
    }

    case 'pattern':
      if (typeof value !== 'string') return [];
      return new RegExp(validator.pattern).test(value)
        ? []
        : failure(path, validator, value, `expected '${value}' to match ${validator.pattern}`);

    case 'minLength':
      if (typeof value !== 'string') return [];
      return value.length >= validator.value
        ? []
        : failure(path, validator, value, `expected length of at least ${validator.value}, got ${value.length}`);

    case 'maxLength':
      if (typeof value !== 'string') return [];
      return value.length <= validator.value
        ? []
        : failure(path, validator, value, `expected length of at most ${validator.value}, got ${value.length}`);

    case 'minSize': {
      const size = sizeOf(value);
      if (size === undefined) return [];
      return size >= validator.value
        ? []
        : failure(path, validator, value, `expected at least ${validator.value} elements, got ${size}`);
    }

    case 'maxSize': {
      const size = sizeOf(value);
      if (size === undefined) return [];
      return size <= validator.value
        ? []
        : failure(path, validator, value, `expected at most ${validator.value} elements, got ${size}`);
    }

    case 'enumeration':
      return validator.values.some((allowed) => allowed === value)
        ? []
        : failure(path, validator, value, `expected one of ${validator.values.join(', ')}`);

    case 'custom': {
      const result = validator.check(value);
      if (result === true) return [];
      const message = typeof result === 'string' ? result : `failed check '${validator.id}'`;
      return failure(path, validator, value, message);
    }

    case 'mapped':
      return validate(validator.inner, validator.project(value), path);

    case 'all':
      return validator.validators.flatMap((v) => validate(v, value, path));

    case 'any': {
      const results = validator.validators.map((v) => validate(v, value, path));
      if (results.some((r) => r.length === 0)) return [];
      return failure(path, validator, value, `expected ${showValidator(validator) || 'at least one alternative'} to hold`);
    }

    case 'each': {
      const inner = validator.inner;
      if (value === undefined || value === null) return [];
      const elements = elementsOf(value);
      if (!elements) {
        // a present optional value is its own single element
        return validate(inner, value, path);
      }
      return elements.flatMap(([key, element]) => validate(inner, element, [...path, key]));
    }
  }
}

/**
 * Shortcut for `validate(...).length === 0`
 */
export function isValid(validator: Validator, value: unknown): boolean {
  return validate(validator, value).length === 0;
}
