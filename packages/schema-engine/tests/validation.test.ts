import { describe, expect, it } from 'vitest';
import {
  each,
  integerSchema,
  map,
  numberSchema,
  product,
  Validators,
  withValidator,
} from '@typedwire/core';
import { applyValidation, deriveSchema, isValidFor, modify, oneOfUsingField } from '../src/index.js';
import { BasketType, TreeNodeType } from './fixtures.js';

describe('applyValidation', () => {
  const basket = deriveSchema(BasketType);
  const checked = modify(basket, 'fruits', each, 'amount')((s) => withValidator(s, Validators.min(1)));
  const bounded = modify(checked, 'fruits')((s) => withValidator(s, Validators.maxSize(2)));

  it('reports nested failures with their path', () => {
    const failures = applyValidation(bounded, {
      fruits: [
        { fruit: 'apple', amount: 0 },
        { fruit: 'pear', amount: 3 },
      ],
    });

    expect(failures).toEqual([
      { path: ['fruits', '0', 'amount'], validator: Validators.min(1), value: 0, message: 'expected 0 to be >=1' },
    ]);
  });

  it('checks collection validators before their elements', () => {
    const failures = applyValidation(bounded, {
      fruits: [
        { fruit: 'apple', amount: 1 },
        { fruit: 'pear', amount: 1 },
        { fruit: 'plum', amount: 0 },
      ],
    });

    expect(failures.map((f) => [f.path.join('.'), f.message])).toEqual([
      ['fruits', 'expected at most 2 elements, got 3'],
      ['fruits.2.amount', 'expected 0 to be >=1'],
    ]);
  });

  it('checks present optional values and skips absent ones', () => {
    const noted = modify(basket, 'note', each)((s) => withValidator(s, Validators.minLength(3)));

    expect(applyValidation(noted, { fruits: [] })).toEqual([]);
    expect(applyValidation(noted, { fruits: [], note: 'ok' }).map((f) => f.message)).toEqual([
      'expected length of at least 3, got 2',
    ]);
  });

  it('validates the variant chosen by the matcher', () => {
    interface Circle {
      kind: 'CIRCLE';
      radius: number;
    }
    const circle = product([{ name: 'radius', schema: withValidator(numberSchema(), Validators.positive()) }], {
      name: 'Circle',
    });
    const shape = oneOfUsingField('kind', (c: Circle) => c.kind, (k) => k.toLowerCase(), [['CIRCLE', circle]]);

    const failures = applyValidation(shape, { kind: 'CIRCLE', radius: -1 });

    expect(failures.map((f) => [f.path, f.message])).toEqual([[['radius'], 'expected -1 to be >0']]);
  });

  it('follows recursive references', () => {
    const tree = modify(deriveSchema(TreeNodeType), 'value')((s) => withValidator(s, Validators.nonNegative()));

    const failures = applyValidation(tree, { value: 1, children: [{ value: 2, children: [{ value: -1, children: [] }] }] });

    expect(failures.map((f) => f.path)).toEqual([['children', '0', 'children', '0', 'value']]);
  });

  it('validates map values by key', () => {
    const stock = map(withValidator(integerSchema(), Validators.max(5)));

    expect(applyValidation(stock, { apple: 1, pear: 9 }).map((f) => [f.path, f.message])).toEqual([
      [['pear'], 'expected 9 to be <=5'],
    ]);
    expect(applyValidation(stock, new Map([['plum', 6]])).map((f) => f.path)).toEqual([['plum']]);
  });

  it('applies each-validators on a map to its values', () => {
    const counts = withValidator(map(integerSchema()), Validators.each(Validators.min(1)));

    const failures = applyValidation(counts, { a: 0, b: 5 });
    expect(failures.map((f) => [f.path, f.value, f.message])).toEqual([[['a'], 0, 'expected 0 to be >=1']]);
  });

  it('hands each map value to a custom each-validator', () => {
    const seen: unknown[] = [];
    const labels = withValidator(
      map(integerSchema()),
      Validators.all(
        Validators.maxSize(3),
        Validators.each(
          Validators.custom('recorded', (value) => {
            seen.push(value);
            return true;
          })
        )
      )
    );

    expect(applyValidation(labels, { x: 1, y: 2 })).toEqual([]);
    expect(seen).toEqual([1, 2]);
  });

  it('accepts valid values', () => {
    expect(isValidFor(bounded, { fruits: [{ fruit: 'apple', amount: 2 }] })).toBe(true);
  });
});
