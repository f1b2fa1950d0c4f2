import { describe, expect, it } from 'vitest';
import { numberSchema, product, SchemaConstructionError, withDescription } from '@typedwire/core';
import type { Schema } from '@typedwire/core';
import {
  addDiscriminatorField,
  createDerivationEngine,
  deriveSchema,
  oneOfUsingField,
  oneOfWrapped,
  variantFor,
} from '../src/index.js';
import { EntityType, PersonType } from './fixtures.js';

interface Circle {
  kind: 'CIRCLE';
  radius: number;
}

interface Square {
  kind: 'SQUARE';
  side: number;
}

type Shape = Circle | Square;

const circle = product([{ name: 'radius', schema: numberSchema() }], { name: 'Circle' });
const square = product([{ name: 'side', schema: numberSchema() }], { name: 'Square' });

function coproductOf(schema: Schema) {
  if (schema.type.kind !== 'coproduct') {
    throw new Error(`expected a coproduct, got ${schema.type.kind}`);
  }
  return schema.type;
}

describe('oneOfUsingField', () => {
  const shape = oneOfUsingField(
    'kind',
    (s: Shape) => s.kind,
    (kind) => kind.toLowerCase(),
    [
      ['CIRCLE', circle],
      ['SQUARE', square],
    ],
    { name: 'Shape' }
  );

  it('turns each mapping entry into a labelled variant', () => {
    const type = coproductOf(shape);

    expect(shape.name).toBe('Shape');
    expect(type.discriminator).toBe('kind');
    expect(type.variants.map((v) => v.discriminatorValue)).toEqual(['circle', 'square']);
    expect(type.variants.map((v) => v.schema)).toEqual([circle, square]);
  });

  it('maps instances to their variant through the extractor', () => {
    const instance: Shape = { kind: 'SQUARE', side: 2 };

    expect(coproductOf(shape).matcher?.match(instance)).toBe('square');
    expect(variantFor(shape, instance)?.schema).toBe(square);
  });

  it('finds no variant for a value outside the mapping', () => {
    expect(variantFor(shape, { kind: 'TRIANGLE' })).toBeUndefined();
  });

  it('rejects values that render to the same label', () => {
    expect(() =>
      oneOfUsingField(
        'kind',
        (s: Shape) => s.kind,
        () => 'shape',
        [
          ['CIRCLE', circle],
          ['SQUARE', square],
        ],
        { name: 'Shape' }
      )
    ).toThrow("Duplicate discriminator value 'shape' in coproduct 'Shape'");
  });
});

describe('oneOfWrapped', () => {
  it('wraps every variant in a single-field product', () => {
    const shape = oneOfWrapped<Shape>([
      { label: 'circle', schema: circle },
      { label: 'square', schema: square },
    ]);
    const type = coproductOf(shape);

    expect(type.discriminator).toBeUndefined();
    expect(type.variants.map((v) => v.discriminatorValue)).toEqual(['circle', 'square']);
    expect(type.variants[0]?.schema.type).toEqual({
      kind: 'product',
      fields: [{ name: 'circle', encodedName: 'circle', schema: circle }],
    });
  });
});

describe('addDiscriminatorField', () => {
  const entity = withDescription(deriveSchema(EntityType), 'A party to a contract');

  it('adds discriminator metadata and keeps the variant schemas', () => {
    const added = addDiscriminatorField('kind', entity, { person: 'Person', org: 'Organization' });
    const before = coproductOf(entity);
    const after = coproductOf(added);

    expect(after.discriminator).toBe('kind');
    expect(after.variants.map((v) => v.discriminatorValue)).toEqual(['person', 'org']);
    expect(after.variants.map((v) => v.schema)).toEqual(before.variants.map((v) => v.schema));
    after.variants.forEach((v, i) => expect(v.schema).toBe(before.variants[i]?.schema));
  });

  it('keeps the metadata of the coproduct itself', () => {
    const added = addDiscriminatorField('kind', entity, { person: 'Person', org: 'Organization' });

    expect(added.name).toBe('Entity');
    expect(added.description).toBe('A party to a contract');
  });

  it('uses variant schema names as values without a mapping', () => {
    const added = addDiscriminatorField('type', entity);

    expect(coproductOf(added).variants.map((v) => v.discriminatorValue)).toEqual(['Person', 'Organization']);
  });

  it('lets the discriminator field pick the variant of a value', () => {
    const added = addDiscriminatorField('kind', entity, { person: 'Person', org: 'Organization' });

    expect(variantFor(added, { kind: 'org', title: 'ACME' })?.schema.name).toBe('Organization');
    expect(variantFor(added, { title: 'ACME' })).toBeUndefined();
  });

  it('rejects schemas that are not coproducts', () => {
    expect(() => addDiscriminatorField('kind', deriveSchema(PersonType))).toThrow(
      "Cannot add discriminator 'kind' to a product schema"
    );
  });

  it('rejects coproducts that already have a discriminator', () => {
    const derived = createDerivationEngine({ discriminator: 'kind' }).derive(EntityType);

    expect(() => addDiscriminatorField('type', derived)).toThrow("Coproduct 'Entity' already has discriminator 'kind'");
  });

  it('rejects unknown variant names', () => {
    expect(() => addDiscriminatorField('kind', entity, { person: 'Person', robot: 'Robot' })).toThrow(
      "Unknown variant 'Robot' for discriminator value 'robot'"
    );
  });

  it('rejects mappings that leave a variant out', () => {
    expect(() => addDiscriminatorField('kind', entity, { person: 'Person' })).toThrow(
      "No discriminator value for variant 'Organization'"
    );
  });

  it('rejects mappings that name a variant twice', () => {
    expect(() =>
      addDiscriminatorField('kind', entity, { person: 'Person', human: 'Person', org: 'Organization' })
    ).toThrow(SchemaConstructionError);
  });
});

describe('variantFor', () => {
  it('requires a coproduct', () => {
    expect(() => variantFor(circle, {})).toThrow('Expected a coproduct schema, found product');
  });
});
