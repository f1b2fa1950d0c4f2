/**
 * Short textual rendering of validators, used in documentation
 */

import type { Validator } from '../types/index.js';

export function showValidator(validator: Validator): string {
  switch (validator.kind) {
    case 'min':
      return `${validator.exclusive ? '>' : '>='}${validator.value}`;
    case 'max':
      return `${validator.exclusive ? '<' : '<='}${validator.value}`;
    case 'pattern':
      return `~${validator.pattern}`;
    case 'minLength':
      return `length>=${validator.value}`;
    case 'maxLength':
      return `length<=${validator.value}`;
    case 'minSize':
      return `size>=${validator.value}`;
    case 'maxSize':
      return `size<=${validator.value}`;
    case 'enumeration':
      return `in(${validator.values.join(',')})`;
    case 'custom':
      return validator.id;
    case 'mapped':
      return `${validator.id}->(${showValidator(validator.inner)})`;
    case 'all':
      return validator.validators.map(showValidator).filter(Boolean).join(' and ');
    case 'any': {
      const parts = validator.validators.map(showValidator).filter(Boolean);
      return parts.length > 1 ? `(${parts.join(' or ')})` : parts.join('');
    }
    case 'each':
      return `each(${showValidator(validator.inner)})`;
  }
}
