/**
 * JSON Schema formatter
 *
 * Renders a schema tree as a JSON Schema (2020-12) document. Named products and
 * coproducts become entries of `$defs` and are referenced with `$ref`, which is
 * also how recursive schemas are written. Coproducts with a discriminator field
 * carry an OpenAPI style `discriminator` object.
 */

import type { PrimitiveKind, Schema, Validator } from '@typedwire/core';
import { isOptional, SchemaConstructionError, schemaEquals } from '@typedwire/core';

export type JsonSchema = { [keyword: string]: unknown };

export interface JsonSchemaOptions {
  /** Prefix of `$ref` values; the default points into the document's own `$defs` */
  refPrefix?: string;
}

const PRIMITIVE_TYPES: Record<PrimitiveKind, string | undefined> = {
  string: 'string',
  integer: 'integer',
  number: 'number',
  boolean: 'boolean',
  binary: 'string',
  date: 'string',
  datetime: 'string',
  uuid: 'string',
  unknown: undefined,
};

class JsonSchemaWriter {
  readonly definitions: Record<string, JsonSchema> = {};
  /** Schema each definition name was written from */
  private readonly sources = new Map<string, Schema>();

  constructor(private readonly refPrefix: string) {}

  write(schema: Schema): JsonSchema {
    const type = schema.type;
    if (type.kind === 'ref') {
      return { $ref: this.refTo(type.name) };
    }
    if ((type.kind === 'product' || type.kind === 'coproduct') && schema.name !== undefined) {
      this.define(schema.name, schema);
      return { $ref: this.refTo(schema.name) };
    }
    return this.inline(schema);
  }

  refTo(name: string): string {
    return `${this.refPrefix}${name}`;
  }

  private define(name: string, schema: Schema): void {
    const existing = this.sources.get(name);
    if (existing !== undefined) {
      if (existing !== schema && !schemaEquals(existing, schema)) {
        throw new SchemaConstructionError(
          `Different schemas share the definition name '${name}'`,
          { name },
          'Rename one of them with withName before rendering.'
        );
      }
      return;
    }
    this.sources.set(name, schema);
    this.definitions[name] = this.inline(schema);
  }

  private inline(schema: Schema): JsonSchema {
    return { ...this.structure(schema), ...annotationsOf(schema), ...validatorKeywords(schema.validators) };
  }

  private structure(schema: Schema): JsonSchema {
    const type = schema.type;

    switch (type.kind) {
      case 'primitive': {
        const jsonType = PRIMITIVE_TYPES[type.primitive];
        return jsonType ? { type: jsonType } : {};
      }

      case 'array':
        return { type: 'array', items: this.write(type.element) };

      case 'option':
        return this.write(type.element);

      case 'map':
        return { type: 'object', additionalProperties: this.write(type.value) };

      case 'product': {
        const visible = type.fields.filter((f) => !f.schema.hidden);
        const properties = Object.fromEntries(visible.map((f) => [f.encodedName, this.write(f.schema)]));
        const required = visible.filter((f) => !isOptional(f.schema)).map((f) => f.encodedName);
        return { type: 'object', properties, ...(required.length > 0 ? { required } : {}) };
      }

      case 'coproduct': {
        const oneOf = type.variants.map((v) => this.write(v.schema));
        if (type.discriminator === undefined) return { oneOf };

        const mapping: Record<string, string> = {};
        for (const variant of type.variants) {
          if (variant.discriminatorValue !== undefined && variant.schema.name !== undefined) {
            mapping[variant.discriminatorValue] = this.refTo(variant.schema.name);
          }
        }
        return { oneOf, discriminator: { propertyName: type.discriminator, mapping } };
      }

      case 'ref':
        return { $ref: this.refTo(type.name) };
    }
  }
}

function annotationsOf(schema: Schema): JsonSchema {
  const out: JsonSchema = {};
  if (schema.description !== undefined) out.description = schema.description;
  if (schema.format !== undefined) out.format = schema.format;
  if (schema.default !== undefined) {
    out.default = schema.default.encoded !== undefined ? schema.default.encoded : schema.default.value;
  }
  if (schema.encodedExample !== undefined) out.examples = [schema.encodedExample];
  if (schema.deprecated) out.deprecated = true;
  return out;
}

/**
 * Validators with a JSON Schema counterpart. Custom, mapped, alternative and
 * per-element validators have none and are left out.
 */
function validatorKeywords(validators: readonly Validator[]): JsonSchema {
  const out: JsonSchema = {};
  for (const validator of validators) {
    switch (validator.kind) {
      case 'min':
        out[validator.exclusive ? 'exclusiveMinimum' : 'minimum'] = validator.value;
        break;
      case 'max':
        out[validator.exclusive ? 'exclusiveMaximum' : 'maximum'] = validator.value;
        break;
      case 'pattern':
        out.pattern = validator.pattern;
        break;
      case 'minLength':
        out.minLength = validator.value;
        break;
      case 'maxLength':
        out.maxLength = validator.value;
        break;
      case 'minSize':
        out.minItems = validator.value;
        break;
      case 'maxSize':
        out.maxItems = validator.value;
        break;
      case 'enumeration':
        out.enum = [...validator.values];
        break;
      case 'all':
        Object.assign(out, validatorKeywords(validator.validators));
        break;
      case 'custom':
      case 'mapped':
      case 'any':
      case 'each':
        break;
    }
  }
  return out;
}

/**
 * Render a schema as a JSON Schema document. `$defs` is present when the tree
 * has named products or coproducts.
 */
export function toJsonSchema(schema: Schema, options: JsonSchemaOptions = {}): JsonSchema {
  const writer = new JsonSchemaWriter(options.refPrefix ?? '#/$defs/');
  const document = writer.write(schema);
  const names = Object.keys(writer.definitions);
  return names.length > 0 ? { ...document, $defs: writer.definitions } : document;
}
