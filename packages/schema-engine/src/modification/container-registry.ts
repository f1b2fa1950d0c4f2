/**
 * Container Registry
 *
 * Lets the `each` path segment descend into collection-like types that are not
 * modelled as arrays, options or maps, e.g. a `Page { items, total }` wrapper.
 */

import type { Schema } from '@typedwire/core';
import { ConfigurationError, field, withType } from '@typedwire/core';

/**
 * Lens onto the element schema of a container.
 */
export interface ContainerLens {
  /** Element schema, or undefined when the schema does not have the expected shape */
  unwrap(container: Schema): Schema | undefined;
  /** Container with its element schema replaced */
  rewrap(container: Schema, element: Schema): Schema;
}

export class ContainerRegistry {
  private lenses = new Map<string, ContainerLens>();

  /**
   * Register a container lens for a schema name. An existing lens for the name is replaced.
   */
  register(schemaName: string, lens: ContainerLens): this {
    this.lenses.set(schemaName, lens);
    return this;
  }

  lookup(schemaName: string): ContainerLens | undefined {
    return this.lenses.get(schemaName);
  }

  has(schemaName: string): boolean {
    return this.lenses.has(schemaName);
  }

  names(): string[] {
    return Array.from(this.lenses.keys());
  }
}

/**
 * Lens for a product that holds its elements in one field, typically an array field.
 * `each` on such a container lands on the field's schema; the segments that follow
 * continue from there.
 */
export function containerField(fieldName: string): ContainerLens {
  return {
    unwrap(container) {
      const type = container.type;
      if (type.kind !== 'product') return undefined;
      return type.fields.find((f) => f.name === fieldName)?.schema;
    },
    rewrap(container, element) {
      const type = container.type;
      if (type.kind !== 'product') {
        throw new ConfigurationError(`Container lens for field '${fieldName}' applied to a ${type.kind} schema`);
      }
      return withType(container, {
        kind: 'product',
        fields: type.fields.map((f) => (f.name === fieldName ? field(f.name, element, f.encodedName) : f)),
      });
    },
  };
}

/**
 * Lens for a product whose elements live in an array field: `each` lands on the
 * array's element schema.
 */
export function containerArrayField(fieldName: string): ContainerLens {
  const outer = containerField(fieldName);
  return {
    unwrap(container) {
      const inner = outer.unwrap(container);
      return inner?.type.kind === 'array' ? inner.type.element : undefined;
    },
    rewrap(container, element) {
      const inner = outer.unwrap(container);
      if (!inner || inner.type.kind !== 'array') {
        throw new ConfigurationError(`Container field '${fieldName}' is not an array`);
      }
      return outer.rewrap(container, withType(inner, { kind: 'array', element }));
    },
  };
}
