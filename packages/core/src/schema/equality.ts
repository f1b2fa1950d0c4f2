/**
 * Structural schema equality
 */

import type { Schema, SchemaDefault, SchemaType } from '../types/index.js';
import { deepEqual } from '../utils/index.js';
import { validatorListEquals } from '../validators/index.js';

function defaultEquals(a: SchemaDefault | undefined, b: SchemaDefault | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return deepEqual(a.value, b.value) && deepEqual(a.encoded, b.encoded);
}

function typeEquals(a: SchemaType, b: SchemaType): boolean {
  switch (a.kind) {
    case 'primitive':
      return b.kind === 'primitive' && b.primitive === a.primitive;
    case 'array':
      return b.kind === 'array' && schemaEquals(a.element, b.element);
    case 'option':
      return b.kind === 'option' && schemaEquals(a.element, b.element);
    case 'map':
      return b.kind === 'map' && schemaEquals(a.value, b.value);
    case 'ref':
      return b.kind === 'ref' && b.name === a.name;
    case 'product': {
      if (b.kind !== 'product' || b.fields.length !== a.fields.length) return false;
      const other = b.fields;
      return a.fields.every((f, i) => {
        const g = other[i];
        return g !== undefined && f.name === g.name && f.encodedName === g.encodedName && schemaEquals(f.schema, g.schema);
      });
    }
    case 'coproduct': {
      if (b.kind !== 'coproduct' || b.discriminator !== a.discriminator || b.variants.length !== a.variants.length) {
        return false;
      }
      const other = b.variants;
      return a.variants.every((v, i) => {
        const w = other[i];
        return w !== undefined && v.discriminatorValue === w.discriminatorValue && schemaEquals(v.schema, w.schema);
      });
    }
  }
}

/**
 * Structural equality of two schemas, metadata included.
 * Custom validators compare by id; coproduct matchers are not compared.
 */
export function schemaEquals(a: Schema, b: Schema): boolean {
  if (a === b) return true;

  return (
    a.name === b.name &&
    a.description === b.description &&
    a.format === b.format &&
    a.deprecated === b.deprecated &&
    a.hidden === b.hidden &&
    defaultEquals(a.default, b.default) &&
    deepEqual(a.encodedExample, b.encodedExample) &&
    validatorListEquals(a.validators, b.validators) &&
    typeEquals(a.type, b.type)
  );
}
