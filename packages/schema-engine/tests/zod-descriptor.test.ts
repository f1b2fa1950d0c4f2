import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { DerivationUnavailableError, Validators } from '@typedwire/core';
import type { Schema } from '@typedwire/core';
import { deriveSchema, describeZod } from '../src/index.js';

function fieldsOf(schema: Schema) {
  if (schema.type.kind !== 'product') {
    throw new Error(`expected a product, got ${schema.type.kind}`);
  }
  return schema.type.fields;
}

describe('describeZod', () => {
  const FruitAmountZ = z.object({
    fruit: z.string().min(1),
    amount: z.number().int().positive(),
  });
  const BasketZ = z
    .object({
      fruits: z.array(FruitAmountZ).max(10),
      note: z.string().optional(),
    })
    .describe('A basket');

  it('describes objects, arrays and options', () => {
    const schema = deriveSchema(
      describeZod(BasketZ, { name: 'Basket', names: new Map<z.ZodTypeAny, string>([[FruitAmountZ, 'FruitAmount']]) })
    );

    expect(schema.name).toBe('Basket');
    expect(schema.description).toBe('A basket');

    const [fruits, note] = fieldsOf(schema);
    expect(note?.schema.type.kind).toBe('option');
    expect(fruits?.schema.validators).toEqual([Validators.maxSize(10)]);

    const fruitsType = fruits?.schema.type;
    if (fruitsType?.kind !== 'array') throw new Error('expected an array of fruits');
    expect(fruitsType.element.name).toBe('FruitAmount');

    const [fruit, amount] = fieldsOf(fruitsType.element);
    expect(fruit?.schema.validators).toEqual([Validators.minLength(1)]);
    expect(amount?.schema.type).toEqual({ kind: 'primitive', primitive: 'integer' });
    expect(amount?.schema.validators).toEqual([Validators.positive()]);
  });

  it('names nested objects after their position', () => {
    const OrderZ = z.object({ customer: z.object({ email: z.string().email() }) });

    const customer = fieldsOf(deriveSchema(describeZod(OrderZ, { name: 'Order' })))[0]?.schema;
    expect(customer?.name).toBe('OrderCustomer');
    expect(customer && fieldsOf(customer)[0]?.schema.format).toBe('email');
  });

  it('moves defaults and descriptions onto fields', () => {
    const PageZ = z.object({
      size: z.number().int().default(20),
      title: z.string().describe('Display name'),
    });

    const [size, title] = fieldsOf(deriveSchema(describeZod(PageZ, { name: 'Page' })));
    expect(size?.schema.default).toEqual({ value: 20 });
    expect(size?.schema.type).toEqual({ kind: 'primitive', primitive: 'integer' });
    expect(title?.schema.description).toBe('Display name');
  });

  it('describes enums, uuids and records', () => {
    const StockZ = z.object({
      id: z.string().uuid(),
      fruit: z.enum(['apple', 'pear']),
      counts: z.record(z.number()),
    });

    const [id, fruit, counts] = fieldsOf(deriveSchema(describeZod(StockZ, { name: 'Stock' })));
    expect(id?.schema.type).toEqual({ kind: 'primitive', primitive: 'uuid' });
    expect(id?.schema.format).toBe('uuid');
    expect(fruit?.schema.validators).toEqual([Validators.enumeration(['apple', 'pear'])]);
    expect(counts?.schema.type.kind).toBe('map');
  });

  it('describes discriminated unions as discriminated coproducts', () => {
    const PersonZ = z.object({ kind: z.literal('person'), name: z.string() });
    const OrgZ = z.object({ kind: z.literal('org'), title: z.string() });
    const EntityZ = z.discriminatedUnion('kind', [PersonZ, OrgZ]);

    const schema = deriveSchema(
      describeZod(EntityZ, {
        name: 'Entity',
        names: new Map<z.ZodTypeAny, string>([
          [PersonZ, 'Person'],
          [OrgZ, 'Organization'],
        ]),
      })
    );

    if (schema.type.kind !== 'coproduct') throw new Error('expected a coproduct');
    expect(schema.type.discriminator).toBe('kind');
    expect(schema.type.variants.map((v) => [v.discriminatorValue, v.schema.name])).toEqual([
      ['person', 'Person'],
      ['org', 'Organization'],
    ]);
  });

  it('describes recursive schemas through z.lazy', () => {
    interface Category {
      name: string;
      children: Category[];
    }
    const CategoryZ: z.ZodType<Category> = z.lazy(() =>
      z.object({
        name: z.string(),
        children: z.array(CategoryZ),
      })
    );

    const schema = deriveSchema(describeZod(CategoryZ, { name: 'Category' }));

    expect(schema.name).toBe('Category');
    const children = fieldsOf(schema)[1]?.schema.type;
    if (children?.kind !== 'array') throw new Error('expected an array of children');
    expect(children.element.type).toEqual({ kind: 'ref', name: 'Category' });
  });

  it('leaves unsupported zod types to the schema registry', () => {
    const TaggedZ = z.object({ tag: z.symbol() });

    expect(() => deriveSchema(describeZod(TaggedZ, { name: 'Tagged' }))).toThrow(DerivationUnavailableError);
    expect(() => deriveSchema(describeZod(TaggedZ, { name: 'Tagged' }))).toThrow(
      "No schema available for type 'TaggedTag' (required by Tagged)"
    );
  });
});
