/**
 * Field and variant naming policies
 */

import type { NamingPolicy, NameTransform } from '../types/index.js';

function splitWords(name: string, separator: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, `$1${separator}$2`)
    .replace(/([a-z\d])([A-Z])/g, `$1${separator}$2`)
    .replace(/[-_\s]+/g, separator);
}

/** `fruitAmount` -> `fruit_amount`, `HTTPServer` -> `http_server` */
export function toSnakeCase(name: string): string {
  return splitWords(name, '_').toLowerCase();
}

/** `fruitAmount` -> `fruit-amount` */
export function toKebabCase(name: string): string {
  return splitWords(name, '-').toLowerCase();
}

/** `fruitAmount` -> `FRUIT_AMOUNT` */
export function toScreamingSnakeCase(name: string): string {
  return splitWords(name, '_').toUpperCase();
}

export function identity(name: string): string {
  return name;
}

/**
 * Resolve a named policy (or a custom function) to a transform
 */
export function resolveNamingPolicy(policy: NamingPolicy): NameTransform {
  if (typeof policy === 'function') {
    return policy;
  }

  switch (policy) {
    case 'identity':
      return identity;
    case 'snake_case':
      return toSnakeCase;
    case 'kebab-case':
      return toKebabCase;
    case 'SCREAMING_SNAKE_CASE':
      return toScreamingSnakeCase;
  }
}
