/**
 * zod adapter
 *
 * Builds type descriptors from zod schemas, so types already described with zod
 * do not need a second, hand-written description.
 *
 * Objects become products and need a name: the root takes `options.name`, nested
 * schemas a name from `options.names` or one composed from their position
 * (`Order` + field `customer` -> `OrderCustomer`). Recursive schemas are written
 * with `z.lazy`; the adapter memoises by zod node, so the recursion resolves to
 * the same named product and derives to a `ref`.
 */

import { z } from 'zod';
import type { Annotations, EnumerationValue, TypeDescriptor, Validator, VariantDescriptor } from '@typedwire/core';
import { SchemaConstructionError, Validators } from '@typedwire/core';
import { descriptorOf, t } from '../descriptors/index.js';

export interface DescribeZodOptions {
  /** Name of the root type */
  name: string;
  /** Names for nested schemas, by zod node */
  names?: ReadonlyMap<z.ZodTypeAny, string>;
}

interface AdapterContext {
  names: ReadonlyMap<z.ZodTypeAny, string>;
  memo: Map<z.ZodTypeAny, TypeDescriptor>;
}

/**
 * Describe a zod schema.
 *
 * @example
 * ```ts
 * const Order = z.object({ id: z.string().uuid(), lines: z.array(OrderLine) });
 * const descriptor = describeZod(Order, { name: 'Order', names: new Map([[OrderLine, 'OrderLine']]) });
 * const schema = engine.derive(descriptor);
 * ```
 */
export function describeZod<S extends z.ZodTypeAny>(schema: S, options: DescribeZodOptions): TypeDescriptor<z.output<S>> {
  const context: AdapterContext = { names: options.names ?? new Map(), memo: new Map() };
  return descriptorOf<z.output<S>>(describe(schema, options.name, context));
}

function describe(node: z.ZodTypeAny, suggested: string, context: AdapterContext): TypeDescriptor {
  const memoised = context.memo.get(node);
  if (memoised) return memoised;

  const name = context.names.get(node) ?? suggested;
  const described = withDescription(describeNode(node, name, context), node.description);
  context.memo.set(node, described);
  return described;
}

function describeNode(node: z.ZodTypeAny, name: string, context: AdapterContext): TypeDescriptor {
  if (node instanceof z.ZodLazy) {
    const lazy = node;
    let resolved: TypeDescriptor | undefined;
    return t.lazy(() => {
      resolved ??= describe(lazy.schema, name, context);
      return resolved;
    });
  }

  if (node instanceof z.ZodString) return describeString(node);
  if (node instanceof z.ZodNumber) return describeNumber(node);
  if (node instanceof z.ZodBigInt) return t.integer();
  if (node instanceof z.ZodBoolean) return t.boolean();
  if (node instanceof z.ZodDate) return t.datetime();
  if (node instanceof z.ZodUnknown || node instanceof z.ZodAny) return t.unknown();

  if (node instanceof z.ZodLiteral) {
    const value: unknown = node.value;
    return enumerationOf([value], context.names.get(node));
  }

  if (node instanceof z.ZodEnum) {
    const values: readonly unknown[] = node.options;
    return enumerationOf(values, context.names.get(node));
  }

  if (node instanceof z.ZodOptional || node instanceof z.ZodNullable) {
    return t.optional(describe(node.unwrap(), name, context));
  }

  if (node instanceof z.ZodDefault) {
    const inner = describe(node.removeDefault(), name, context);
    return t.annotate(inner, { default: { value: node._def.defaultValue() } });
  }

  if (node instanceof z.ZodEffects) return describe(node.innerType(), name, context);
  if (node instanceof z.ZodBranded) return describe(node.unwrap(), name, context);

  if (node instanceof z.ZodArray) {
    const validators: Validator[] = [];
    if (node._def.minLength) validators.push(Validators.minSize(node._def.minLength.value));
    if (node._def.maxLength) validators.push(Validators.maxSize(node._def.maxLength.value));
    if (node._def.exactLength) {
      validators.push(Validators.minSize(node._def.exactLength.value), Validators.maxSize(node._def.exactLength.value));
    }
    return withValidators(t.array(describe(node.element, name, context)), validators);
  }

  if (node instanceof z.ZodRecord) {
    return t.map(describe(node.valueSchema, `${name}Value`, context));
  }

  if (node instanceof z.ZodObject) {
    return describeObject(node, name, context);
  }

  if (node instanceof z.ZodDiscriminatedUnion) {
    return describeDiscriminatedUnion(node, name, context);
  }

  if (node instanceof z.ZodUnion) {
    const options: readonly z.ZodTypeAny[] = node.options;
    const variants: VariantDescriptor[] = options.map((option, i) => {
      const type = describe(option, `${name}Option${i + 1}`, context);
      return { label: variantLabel(type, `${name}Option${i + 1}`), type };
    });
    return { kind: 'coproduct', name, variants };
  }

  return t.opaque(name);
}

function describeObject(node: z.AnyZodObject, name: string, context: AdapterContext): TypeDescriptor {
  const shape: Record<string, z.ZodTypeAny> = node.shape;
  const fields = Object.entries(shape).map(([fieldName, fieldType]) => {
    const type = describe(fieldType, `${name}${capitalize(fieldName)}`, context);
    // defaults and descriptions of a field live on the field
    const { default: defaultValue, description, ...rest } = type.annotations ?? {};
    const annotations: Annotations = description !== undefined ? { description } : {};
    const bare = stripAnnotations(type, rest);
    return {
      name: fieldName,
      type: bare,
      ...(defaultValue !== undefined ? { default: defaultValue } : {}),
      ...(Object.keys(annotations).length > 0 ? { annotations } : {}),
    };
  });
  return { kind: 'product', name, fields };
}

function describeDiscriminatedUnion(
  node: z.ZodDiscriminatedUnion<string, z.ZodDiscriminatedUnionOption<string>[]>,
  name: string,
  context: AdapterContext
): TypeDescriptor {
  const discriminator = node.discriminator;
  const options: readonly z.AnyZodObject[] = node.options;

  const variants: VariantDescriptor[] = options.map((option, i) => {
    const tag: unknown = option.shape[discriminator] instanceof z.ZodLiteral ? option.shape[discriminator].value : undefined;
    const value = typeof tag === 'string' ? tag : undefined;
    const suggested = `${name}${value !== undefined ? capitalize(value) : `Option${i + 1}`}`;
    const type = describe(option, suggested, context);
    return value !== undefined
      ? { label: variantLabel(type, suggested), type, discriminatorValue: value }
      : { label: variantLabel(type, suggested), type };
  });

  if (variants.some((v) => v.discriminatorValue === undefined)) {
    throw new SchemaConstructionError(
      `Discriminated union '${name}' has an option without a string literal '${discriminator}'`,
      { type: name, discriminator }
    );
  }
  return { kind: 'coproduct', name, variants, discriminator };
}

function describeString(node: z.ZodString): TypeDescriptor {
  const validators: Validator[] = [];
  let base: TypeDescriptor = t.string();
  let format: string | undefined;

  for (const check of node._def.checks) {
    switch (check.kind) {
      case 'min':
        validators.push(Validators.minLength(check.value));
        break;
      case 'max':
        validators.push(Validators.maxLength(check.value));
        break;
      case 'length':
        validators.push(Validators.minLength(check.value), Validators.maxLength(check.value));
        break;
      case 'regex':
        validators.push(Validators.pattern(check.regex));
        break;
      case 'uuid':
        base = t.uuid();
        break;
      case 'datetime':
        base = t.datetime();
        break;
      case 'email':
      case 'url':
        format = check.kind === 'url' ? 'uri' : 'email';
        break;
      default:
        break;
    }
  }

  const formatted = format !== undefined ? t.annotate(base, { format }) : base;
  return withValidators(formatted, validators);
}

function describeNumber(node: z.ZodNumber): TypeDescriptor {
  const validators: Validator[] = [];
  let integer = false;

  for (const check of node._def.checks) {
    switch (check.kind) {
      case 'int':
        integer = true;
        break;
      case 'min':
        validators.push(Validators.min(check.value, !check.inclusive));
        break;
      case 'max':
        validators.push(Validators.max(check.value, !check.inclusive));
        break;
      default:
        break;
    }
  }

  return withValidators(integer ? t.integer() : t.number(), validators);
}

function enumerationOf(values: readonly unknown[], name: string | undefined): TypeDescriptor {
  const allowed = values.filter(isEnumerationValue);
  if (allowed.length !== values.length) return t.unknown();
  if (name !== undefined) return t.enumeration(name, allowed);

  const { name: _unnamed, ...unnamed } = t.enumeration('', allowed);
  return unnamed;
}

function isEnumerationValue(value: unknown): value is EnumerationValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function withValidators(descriptor: TypeDescriptor, validators: readonly Validator[]): TypeDescriptor {
  const [first, ...rest] = validators;
  if (first === undefined) return descriptor;
  const validator = rest.length === 0 ? first : Validators.all(first, ...rest);
  return t.annotate(descriptor, { validator });
}

function withDescription(descriptor: TypeDescriptor, description: string | undefined): TypeDescriptor {
  return description !== undefined ? t.annotate(descriptor, { description }) : descriptor;
}

function stripAnnotations(descriptor: TypeDescriptor, annotations: Annotations): TypeDescriptor {
  if (descriptor.kind === 'lazy') return descriptor;
  const { annotations: _previous, ...bare } = descriptor;
  return Object.keys(annotations).length > 0 ? { ...bare, annotations } : bare;
}

function variantLabel(descriptor: TypeDescriptor, fallback: string): string {
  return descriptor.kind === 'product' || descriptor.kind === 'coproduct' || descriptor.kind === 'opaque'
    ? descriptor.name
    : fallback;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
