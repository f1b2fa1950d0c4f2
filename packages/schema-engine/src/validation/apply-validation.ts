/**
 * Schema-driven validation
 *
 * Evaluates every validator attached to a schema tree against a decoded value.
 * Structure is followed as far as the value has it; checking that the value
 * has the right shape is the codec's job, not this one's.
 */

import type { Schema, ValidationFailure, Validator } from '@typedwire/core';
import { collectDefinitions, dereference, validate } from '@typedwire/core';
import { variantFor } from '../coproduct/index.js';

interface Walk {
  root: Schema;
  definitions: ReadonlyMap<string, Schema> | undefined;
}

/**
 * Validate a decoded value against a schema. Returns every failure, each with
 * the path (source field names, element indexes, map keys) to the failing value.
 */
export function applyValidation(schema: Schema, value: unknown): ValidationFailure[] {
  return visit(schema, value, [], { root: schema, definitions: undefined });
}

export function isValidFor(schema: Schema, value: unknown): boolean {
  return applyValidation(schema, value).length === 0;
}

function visit(schema: Schema, value: unknown, path: string[], walk: Walk): ValidationFailure[] {
  if (schema.type.kind === 'ref') {
    walk.definitions ??= collectDefinitions(walk.root);
    return visit(dereference(walk.root, schema, walk.definitions), value, path, walk);
  }

  const type = schema.type;
  if (type.kind === 'option' && (value === undefined || value === null)) {
    return [];
  }

  const own = schema.validators.flatMap((v) => validateNode(v, schema, value, path));
  return [...own, ...visitChildren(schema, value, path, walk)];
}

/**
 * Evaluate a node validator. `each` takes its elements from the schema kind:
 * array items, map values, or the present value of an option.
 */
function validateNode(validator: Validator, schema: Schema, value: unknown, path: string[]): ValidationFailure[] {
  if (validator.kind === 'all') {
    return validator.validators.flatMap((v) => validateNode(v, schema, value, path));
  }
  if (validator.kind !== 'each' || value === undefined || value === null) {
    return validate(validator, value, path);
  }

  const inner = validator.inner;
  switch (schema.type.kind) {
    case 'array':
      if (!Array.isArray(value)) return [];
      return value.flatMap((item: unknown, i) => validate(inner, item, [...path, String(i)]));
    case 'map':
      return entriesOf(value).flatMap(([key, item]) => validate(inner, item, [...path, key]));
    case 'option':
      return validate(inner, value, path);
    default:
      return validate(validator, value, path);
  }
}

function visitChildren(schema: Schema, value: unknown, path: string[], walk: Walk): ValidationFailure[] {
  const type = schema.type;

  switch (type.kind) {
    case 'option':
      return visit(type.element, value, path, walk);

    case 'array': {
      const element = type.element;
      if (!Array.isArray(value)) return [];
      return value.flatMap((item: unknown, i) => visit(element, item, [...path, String(i)], walk));
    }

    case 'map': {
      const valueSchema = type.value;
      return entriesOf(value).flatMap(([key, item]) => visit(valueSchema, item, [...path, key], walk));
    }

    case 'product': {
      if (typeof value !== 'object' || value === null) return [];
      const instance = value;
      return type.fields.flatMap((f) => {
        const fieldValue: unknown = Reflect.get(instance, f.name);
        // absent values of optional fields and fields with a default are not checked
        if (fieldValue === undefined && (f.schema.type.kind === 'option' || f.schema.default !== undefined)) {
          return [];
        }
        return visit(f.schema, fieldValue, [...path, f.name], walk);
      });
    }

    case 'coproduct': {
      const variant = variantFor(schema, value);
      return variant ? visit(variant.schema, value, path, walk) : [];
    }

    case 'primitive':
    case 'ref':
      return [];
  }
}

function entriesOf(value: unknown): Array<[string, unknown]> {
  if (value instanceof Map) {
    return Array.from(value, ([k, v]): [string, unknown] => [String(k), v]);
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.entries(value);
  }
  return [];
}
