import type { Validator } from '../types/index.js';

function listEquals(a: readonly Validator[], b: readonly Validator[]): boolean {
  return a.length === b.length && a.every((v, i) => {
    const other = b[i];
    return other !== undefined && validatorEquals(v, other);
  });
}

/**
 * Structural validator equality. Custom checks and projections compare by id.
 */
export function validatorEquals(a: Validator, b: Validator): boolean {
  switch (a.kind) {
    case 'min':
      return b.kind === 'min' && b.value === a.value && b.exclusive === a.exclusive;
    case 'max':
      return b.kind === 'max' && b.value === a.value && b.exclusive === a.exclusive;
    case 'pattern':
      return b.kind === 'pattern' && b.pattern === a.pattern;
    case 'minLength':
      return b.kind === 'minLength' && b.value === a.value;
    case 'maxLength':
      return b.kind === 'maxLength' && b.value === a.value;
    case 'minSize':
      return b.kind === 'minSize' && b.value === a.value;
    case 'maxSize':
      return b.kind === 'maxSize' && b.value === a.value;
    case 'enumeration': {
      if (b.kind !== 'enumeration') return false;
      const other = b.values;
      return other.length === a.values.length && a.values.every((v, i) => v === other[i]);
    }
    case 'custom':
      return b.kind === 'custom' && b.id === a.id;
    case 'mapped':
      return b.kind === 'mapped' && b.id === a.id && validatorEquals(a.inner, b.inner);
    case 'all':
      return b.kind === 'all' && listEquals(a.validators, b.validators);
    case 'any':
      return b.kind === 'any' && listEquals(a.validators, b.validators);
    case 'each':
      return b.kind === 'each' && validatorEquals(a.inner, b.inner);
  }
}

export function validatorListEquals(a: readonly Validator[], b: readonly Validator[]): boolean {
  return listEquals(a, b);
}
