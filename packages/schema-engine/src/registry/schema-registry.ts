/**
 * Schema Registry
 *
 * Explicit mapping from type name to a hand-written schema. The derivation
 * engine consults it before deriving any named type, so a registered schema
 * always wins over derivation.
 *
 * Precedence: the most recently registered schema for a name wins.
 */

import type { Schema, TypeDescriptor } from '@typedwire/core';
import { ConfigurationError, DerivationUnavailableError, Logger, silentLogger } from '@typedwire/core';
import { descriptorName } from '../descriptors/index.js';

export class SchemaRegistry {
  private schemas = new Map<string, Schema>();

  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * Register a schema for a type name, or for the name of a descriptor.
   * An existing entry for the same name is replaced.
   */
  register<T>(type: string | TypeDescriptor<T>, schema: Schema<T>): this {
    const name = typeof type === 'string' ? type : descriptorName(type);
    if (name === undefined) {
      throw new ConfigurationError(`Cannot register a schema for an unnamed ${typeof type === 'string' ? 'type' : type.kind} descriptor`);
    }

    if (this.schemas.has(name)) {
      this.logger.debug('Replacing registered schema', { type: name });
    }
    this.schemas.set(name, schema);
    return this;
  }

  lookup(name: string): Schema | undefined {
    return this.schemas.get(name);
  }

  /**
   * Get a schema by name, throw if none is registered
   */
  lookupOrThrow(name: string): Schema {
    const schema = this.schemas.get(name);
    if (!schema) {
      throw new DerivationUnavailableError(name);
    }
    return schema;
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  unregister(name: string): boolean {
    return this.schemas.delete(name);
  }

  /**
   * List all registered type names, in registration order
   */
  names(): string[] {
    return Array.from(this.schemas.keys());
  }

  /**
   * Independent copy; later registrations on either side do not affect the other
   */
  fork(): SchemaRegistry {
    const copy = new SchemaRegistry(this.logger);
    for (const [name, schema] of this.schemas) {
      copy.schemas.set(name, schema);
    }
    return copy;
  }
}
