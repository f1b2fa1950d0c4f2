/**
 * Non-destructive metadata updates. Each returns a new schema and shares
 * the untouched parts of the original.
 */

import type { Schema, SchemaType, Validator } from '../types/index.js';

export function withDescription<T>(schema: Schema<T>, description: string): Schema<T> {
  return Object.freeze({ ...schema, description });
}

export function withDefault<T>(schema: Schema<T>, value: unknown, encoded?: unknown): Schema<T> {
  return Object.freeze({ ...schema, default: encoded === undefined ? { value } : { value, encoded } });
}

export function withExample<T>(schema: Schema<T>, encodedExample: unknown): Schema<T> {
  return Object.freeze({ ...schema, encodedExample });
}

export function withFormat<T>(schema: Schema<T>, format: string): Schema<T> {
  return Object.freeze({ ...schema, format });
}

export function withDeprecated<T>(schema: Schema<T>, deprecated = true): Schema<T> {
  return Object.freeze({ ...schema, deprecated });
}

export function withHidden<T>(schema: Schema<T>, hidden = true): Schema<T> {
  return Object.freeze({ ...schema, hidden });
}

export function withName<T>(schema: Schema<T>, name: string): Schema<T> {
  return Object.freeze({ ...schema, name });
}

/**
 * Append a validator. Validators already on the schema are kept; together they form a conjunction.
 */
export function withValidator<T>(schema: Schema<T>, validator: Validator): Schema<T> {
  return Object.freeze({ ...schema, validators: Object.freeze([...schema.validators, validator]) });
}

export function withType<T>(schema: Schema<T>, type: SchemaType): Schema<T> {
  return Object.freeze({ ...schema, type: Object.freeze(type) });
}

/**
 * Drop the phantom type of a schema, e.g. after a derivation assembled it from untyped parts
 */
export function schemaOf<T>(schema: Schema): Schema<T> {
  const { _type: _untyped, ...rest } = schema;
  return Object.freeze(rest);
}

/** `option` schemas, and schemas with a default, may be absent on the wire */
export function isOptional(schema: Schema): boolean {
  return schema.type.kind === 'option' || schema.default !== undefined;
}
