/**
 * DerivationEngine
 *
 * Builds a schema from a type descriptor. Named component types are looked up
 * in the schema registry first; everything else is derived structurally.
 *
 * Self-referential types are described with `t.lazy`. While a named type is
 * being derived, any nested occurrence of it becomes a `ref` placeholder,
 * resolvable with `dereference(root, ref)` once the tree is complete.
 */

import type {
  Configuration,
  CoproductDescriptor,
  CoproductVariantInput,
  FieldDescriptor,
  ProductDescriptor,
  ProductField,
  Schema,
  TypeDescriptor,
} from '@typedwire/core';
import {
  array,
  coproduct,
  createSchema,
  DerivationUnavailableError,
  field,
  Logger,
  map,
  optional,
  primitive,
  ref,
  schemaOf,
  silentLogger,
  withDefault,
  withName,
} from '@typedwire/core';
import { AnnotationResolver } from '../annotations/index.js';
import { defaultConfiguration } from '../configuration/index.js';
import { descriptorName } from '../descriptors/index.js';
import type { IDerivationEngine } from '../interfaces/index.js';
import { SchemaRegistry } from '../registry/index.js';
import type { DerivationResult, DeriveOptions } from '../types/index.js';

export interface DerivationEngineOptions {
  configuration?: Configuration;
  registry?: SchemaRegistry;
  logger?: Logger;
}

interface DerivationContext {
  /** Names of the types currently being derived, outermost first */
  trail: string[];
  /** Schema name each type on the trail will end up with */
  refNames: Map<string, string>;
  /** Named descriptors finished during this call whose schema holds no ref */
  completed: Map<TypeDescriptor, Schema>;
  /** Overrides for the root coproduct only */
  rootOptions: DeriveOptions;
  root: TypeDescriptor;
}

export class DerivationEngine implements IDerivationEngine {
  readonly configuration: Configuration;
  readonly registry: SchemaRegistry;
  private readonly logger: Logger;
  private readonly annotations = new AnnotationResolver();

  constructor(options: DerivationEngineOptions = {}) {
    this.configuration = options.configuration ?? defaultConfiguration;
    this.logger = (options.logger ?? silentLogger).child({ component: 'derivation' });
    this.registry = options.registry ?? new SchemaRegistry(this.logger);
  }

  /**
   * Derive the schema of a type.
   *
   * @throws DerivationUnavailableError if a component type has neither a registered
   * schema nor a structural description
   */
  derive<T>(descriptor: TypeDescriptor<T>, options: DeriveOptions = {}): Schema<T> {
    const context: DerivationContext = {
      trail: [],
      refNames: new Map(),
      completed: new Map(),
      rootOptions: options,
      root: descriptor,
    };
    return schemaOf<T>(this.deriveNode(descriptor, context));
  }

  /**
   * Derive a coproduct, optionally overriding the discriminator field and the
   * function turning variant labels into discriminator values.
   */
  deriveCoproduct<T>(descriptor: CoproductDescriptor<T>, options: DeriveOptions = {}): Schema<T> {
    return this.derive(descriptor, options);
  }

  /**
   * Like `derive`, but reports a missing schema as a result instead of throwing.
   * Meant for wiring-time checks over a set of endpoint types.
   */
  tryDerive<T>(descriptor: TypeDescriptor<T>, options: DeriveOptions = {}): DerivationResult<T> {
    try {
      return { ok: true, schema: this.derive(descriptor, options) };
    } catch (error) {
      if (error instanceof DerivationUnavailableError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  private deriveNode(descriptor: TypeDescriptor, context: DerivationContext): Schema {
    if (descriptor.kind === 'lazy') {
      const resolved = descriptor.resolve();
      const schema = this.deriveNode(resolved, { ...context, root: context.root === descriptor ? resolved : context.root });
      return this.annotations.applyToSchema(schema, descriptor.annotations);
    }

    const name = descriptorName(descriptor);
    if (name !== undefined) {
      const registered = this.registry.lookup(name);
      if (registered) {
        this.logger.debug('Using registered schema', { type: name });
        return registered;
      }

      if (context.trail.includes(name)) {
        this.logger.debug('Recursive reference', { type: name, trail: context.trail });
        return ref(context.refNames.get(name) ?? name);
      }

      const memo = context.completed.get(descriptor);
      if (memo) return memo;
    }

    const schema = this.deriveStructure(descriptor, name, context);
    if (name !== undefined) {
      // a ref placeholder depends on the trail it was derived under
      if (!containsRef(schema)) context.completed.set(descriptor, schema);
      this.logger.debug('Derived schema', { type: name, kind: schema.type.kind });
    }
    return schema;
  }

  private deriveStructure(
    descriptor: Exclude<TypeDescriptor, { kind: 'lazy' }>,
    name: string | undefined,
    context: DerivationContext
  ): Schema {
    switch (descriptor.kind) {
      case 'primitive': {
        const base = primitive(descriptor.primitive);
        const named = name !== undefined ? withName(base, name) : base;
        return this.annotations.applyToSchema(named, descriptor.annotations);
      }

      case 'array':
        return this.annotations.applyToSchema(array(this.deriveNode(descriptor.element, context)), descriptor.annotations);

      case 'option':
        return this.annotations.applyToSchema(optional(this.deriveNode(descriptor.element, context)), descriptor.annotations);

      case 'map':
        return this.annotations.applyToSchema(map(this.deriveNode(descriptor.value, context)), descriptor.annotations);

      case 'product':
        return this.withTrail(descriptor, context, () => this.deriveProduct(descriptor, context));

      case 'coproduct':
        return this.withTrail(descriptor, context, () => this.deriveCoproductNode(descriptor, context));

      case 'opaque':
        throw new DerivationUnavailableError(descriptor.name, context.trail);
    }
  }

  private withTrail(
    descriptor: ProductDescriptor | CoproductDescriptor,
    context: DerivationContext,
    build: () => Schema
  ): Schema {
    const name = descriptor.name;
    // a type renamed with encodedName is referenced by its new name
    context.refNames.set(name, descriptor.annotations?.encodedName ?? name);
    context.trail.push(name);
    try {
      return build();
    } finally {
      context.trail.pop();
      if (!context.trail.includes(name)) context.refNames.delete(name);
    }
  }

  private deriveField(descriptor: FieldDescriptor, context: DerivationContext): ProductField {
    let schema = this.deriveNode(descriptor.type, context);
    if (descriptor.default !== undefined) {
      schema = withDefault(schema, descriptor.default.value, descriptor.default.encoded);
    }
    return field(descriptor.name, schema, this.configuration.toEncodedName(descriptor.name));
  }

  private deriveProduct(descriptor: ProductDescriptor, context: DerivationContext): Schema {
    const fields = descriptor.fields.map((f) => this.deriveField(f, context));

    // Assembled without the uniqueness check: encodedName annotations may still
    // resolve clashes produced by the naming policy. The resolver rebuilds the product.
    const raw = createSchema({ kind: 'product', fields }, { name: descriptor.name });

    const fieldAnnotations = Object.fromEntries(
      descriptor.fields.flatMap((f) => (f.annotations ? [[f.name, f.annotations] as const] : []))
    );
    return this.annotations.resolve(raw, {
      fields: fieldAnnotations,
      type: descriptor.annotations,
    });
  }

  private deriveCoproductNode(descriptor: CoproductDescriptor, context: DerivationContext): Schema {
    const isRoot = context.root === descriptor;
    const overrides = isRoot ? context.rootOptions : {};
    const discriminator = overrides.discriminator ?? descriptor.discriminator ?? this.configuration.discriminator;

    const variants: CoproductVariantInput[] = descriptor.variants.map((variant) => {
      const schema = this.deriveNode(variant.type, context);
      if (discriminator === undefined) {
        return { schema };
      }
      const discriminatorValue = overrides.label
        ? overrides.label(variant.label)
        : variant.discriminatorValue ?? this.configuration.toDiscriminatorValue(variant.label);
      return { schema, discriminatorValue };
    });

    const assembled = coproduct(variants, {
      name: descriptor.name,
      ...(discriminator !== undefined ? { discriminator } : {}),
    });
    return this.annotations.resolve(assembled, { type: descriptor.annotations });
  }
}

function containsRef(schema: Schema): boolean {
  const type = schema.type;
  switch (type.kind) {
    case 'ref':
      return true;
    case 'primitive':
      return false;
    case 'array':
    case 'option':
      return containsRef(type.element);
    case 'map':
      return containsRef(type.value);
    case 'product':
      return type.fields.some((f) => containsRef(f.schema));
    case 'coproduct':
      return type.variants.some((v) => containsRef(v.schema));
  }
}
