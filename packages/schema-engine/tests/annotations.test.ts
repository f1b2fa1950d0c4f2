import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  field,
  integerSchema,
  product,
  stringSchema,
  Validators,
  withDescription,
  withValidator,
} from '@typedwire/core';
import { AnnotationResolver } from '../src/index.js';

describe('AnnotationResolver', () => {
  const resolver = new AnnotationResolver();

  it('overlays every annotation on a schema', () => {
    const schema = resolver.applyToSchema(integerSchema(), {
      encodedName: 'Quantity',
      description: 'How many',
      default: { value: 1 },
      encodedExample: 5,
      format: 'int32',
      deprecated: true,
      hidden: true,
      validator: Validators.min(0),
    });

    expect(schema).toEqual({
      type: { kind: 'primitive', primitive: 'integer' },
      name: 'Quantity',
      description: 'How many',
      default: { value: 1 },
      encodedExample: 5,
      format: 'int32',
      deprecated: true,
      hidden: true,
      validators: [Validators.min(0)],
    });
  });

  it('replaces descriptions and appends validators', () => {
    const base = withValidator(withDescription(integerSchema(), 'old'), Validators.min(0));
    const schema = resolver.applyToSchema(base, { description: 'new', validator: Validators.max(9) });

    expect(schema.description).toBe('new');
    expect(schema.validators).toEqual([Validators.min(0), Validators.max(9)]);
  });

  it('renames fields without renaming their schema', () => {
    const renamed = resolver.applyToField(field('lastName', stringSchema(), 'last_name'), {
      encodedName: 'surname',
      description: 'Family name',
    });

    expect(renamed.name).toBe('lastName');
    expect(renamed.encodedName).toBe('surname');
    expect(renamed.schema.name).toBeUndefined();
    expect(renamed.schema.description).toBe('Family name');
  });

  it('applies field and type bundles to a product', () => {
    const person = product([{ name: 'name', schema: stringSchema() }], { name: 'Person' });

    const resolved = resolver.resolve(person, {
      fields: { name: { encodedName: 'fullName' } },
      type: { description: 'A human' },
    });

    expect(resolved.description).toBe('A human');
    expect(resolved.type.kind === 'product' && resolved.type.fields.map((f) => f.encodedName)).toEqual(['fullName']);
  });

  it('rejects bundles for unknown fields', () => {
    const person = product([{ name: 'name', schema: stringSchema() }], { name: 'Person' });

    expect(() => resolver.resolve(person, { fields: { nickname: { description: 'x' } } })).toThrow(
      "Annotations given for unknown field 'nickname'"
    );
  });

  it('rejects field bundles for non-products', () => {
    expect(() => resolver.resolve(stringSchema(), { fields: { length: { description: 'x' } } })).toThrow(
      'Field annotations given for a primitive schema'
    );
  });

  it('rejects renames that make two fields clash', () => {
    const person = product(
      [
        { name: 'firstName', schema: stringSchema() },
        { name: 'lastName', schema: stringSchema() },
      ],
      { name: 'Person' }
    );

    expect(() => resolver.resolve(person, { fields: { lastName: { encodedName: 'firstName' } } })).toThrow(
      "Duplicate encoded field name 'firstName' in product 'Person'"
    );
  });

  it('validates bundles', () => {
    expect(() => resolver.assertValid({ format: '' }, 'type')).toThrow(ConfigurationError);
  });
});
