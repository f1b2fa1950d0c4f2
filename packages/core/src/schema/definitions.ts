/**
 * Named schema lookup and reference resolution
 */

import { SchemaConstructionError } from '../errors/index.js';
import type { Schema } from '../types/index.js';

function children(schema: Schema): Schema[] {
  const type = schema.type;
  switch (type.kind) {
    case 'array':
    case 'option':
      return [type.element];
    case 'map':
      return [type.value];
    case 'product':
      return type.fields.map((f) => f.schema);
    case 'coproduct':
      return type.variants.map((v) => v.schema);
    case 'primitive':
    case 'ref':
      return [];
  }
}

/**
 * Collect the named product and coproduct nodes of a tree, outermost first.
 * When a name occurs twice the first occurrence is kept.
 */
export function collectDefinitions(root: Schema): Map<string, Schema> {
  const definitions = new Map<string, Schema>();
  const pending: Schema[] = [root];

  while (pending.length > 0) {
    const next = pending.shift();
    if (next === undefined) break;

    const kind = next.type.kind;
    if (next.name !== undefined && (kind === 'product' || kind === 'coproduct') && !definitions.has(next.name)) {
      definitions.set(next.name, next);
    }
    pending.push(...children(next));
  }

  return definitions;
}

/**
 * Resolve a `ref` node against the named schemas of `root`. Other schemas are returned as-is.
 */
export function dereference(root: Schema, schema: Schema, definitions?: ReadonlyMap<string, Schema>): Schema {
  if (schema.type.kind !== 'ref') return schema;

  const name = schema.type.name;
  const target = (definitions ?? collectDefinitions(root)).get(name);
  if (!target) {
    throw new SchemaConstructionError(`Unresolved schema reference '${name}'`, { ref: name });
  }
  return target;
}
