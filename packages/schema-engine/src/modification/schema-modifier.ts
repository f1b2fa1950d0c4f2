/**
 * SchemaModifier
 *
 * Replaces exactly one nested node of a schema. The path is resolved fully
 * before anything is rebuilt, so a path that does not match leaves nothing
 * half-modified. Untouched subtrees are shared with the original.
 */

import type { FieldPath, FieldPathSegment, PathToken, Schema } from '@typedwire/core';
import {
  field,
  Logger,
  PathNotFoundError,
  schemaOf,
  silentLogger,
  toSegment,
  formatFieldPath,
  withType,
} from '@typedwire/core';
import type { ISchemaModifier, SchemaTransform } from '../interfaces/index.js';
import { ContainerRegistry } from './container-registry.js';
import type { AtPath, SchemaPath } from './typed-path.js';

export interface SchemaModifierOptions {
  containers?: ContainerRegistry;
  logger?: Logger;
}

/** Untyped path segment accepted by `modifyUnsafe`; `each` descends into containers */
export const EACH_FIELD = 'each';

/** One resolved step: how to put a new child back into the parent */
interface Step {
  rebuild: (child: Schema) => Schema;
}

export class SchemaModifier implements ISchemaModifier {
  readonly containers: ContainerRegistry;
  private readonly logger: Logger;

  constructor(options: SchemaModifierOptions = {}) {
    this.containers = options.containers ?? new ContainerRegistry();
    this.logger = (options.logger ?? silentLogger).child({ component: 'modification' });
  }

  /**
   * Typed modification. The path is checked against `T` at compile time:
   *
   * @example
   * ```ts
   * modifier.modify(basketSchema, 'fruits', each, 'amount')((s) => withDescription(s, 'How many fruits?'));
   * ```
   */
  modify<T, P extends PathToken[] & SchemaPath<T>>(
    root: Schema<T>,
    ...path: P
  ): (transform: (schema: Schema<AtPath<T, P>>) => Schema<AtPath<T, P>>) => Schema<T> {
    const tokens: readonly PathToken[] = path;
    const segments = tokens.map((token) => toSegment(token));
    return (transform) => this.modifyPath(root, segments)((node) => transform(schemaOf<AtPath<T, P>>(node)));
  }

  modifyPath<T>(root: Schema<T>, path: FieldPath): (transform: SchemaTransform) => Schema<T> {
    return (transform) => {
      const { steps, target } = this.resolve(root, path);

      let replaced = transform(target);
      for (const step of [...steps].reverse()) {
        replaced = step.rebuild(replaced);
      }

      this.logger.debug('Modified schema', { path: formatFieldPath(path) });
      return schemaOf<T>(replaced);
    };
  }

  /**
   * Untyped modification over plain field names. Nothing checks the path against
   * the schema's type up front: a typo or a stale path is only reported when the
   * returned function runs, as a PathNotFoundError. Prefer `modify`.
   *
   * The name `each` descends into an array, option, map or registered container;
   * on a product it names a field.
   */
  modifyUnsafe<T>(root: Schema<T>, fields: readonly string[]): (transform: SchemaTransform) => Schema<T> {
    return (transform) => this.modifyPath(root, this.interpretUnsafe(root, fields))(transform);
  }

  getAt(root: Schema, path: FieldPath): Schema {
    return this.resolve(root, path).target;
  }

  /**
   * Walk the path, recording each parent and how to rebuild it.
   * Throws before any node is rebuilt.
   */
  private resolve(root: Schema, path: FieldPath): { steps: Step[]; target: Schema } {
    const steps: Step[] = [];
    let node = root;

    for (const [index, segment] of path.entries()) {
      const next = this.step(node, segment, path.slice(0, index));
      steps.push(next.step);
      node = next.child;
    }

    return { steps, target: node };
  }

  private step(node: Schema, segment: FieldPathSegment, resolved: FieldPath): { step: Step; child: Schema } {
    const type = node.type;

    if (segment.kind === 'field') {
      if (type.kind !== 'product') {
        throw new PathNotFoundError(resolved, segment, type.kind);
      }
      const position = type.fields.findIndex((f) => f.name === segment.name);
      const target = type.fields[position];
      if (position < 0 || target === undefined) {
        throw new PathNotFoundError(
          resolved,
          segment,
          type.kind,
          `fields: ${type.fields.map((f) => f.name).join(', ') || 'none'}`
        );
      }
      const fields = type.fields;
      return {
        child: target.schema,
        step: {
          rebuild: (child) =>
            withType(node, {
              kind: 'product',
              fields: fields.map((f, i) => (i === position ? field(f.name, child, f.encodedName) : f)),
            }),
        },
      };
    }

    switch (type.kind) {
      case 'array':
        return { child: type.element, step: { rebuild: (child) => withType(node, { kind: 'array', element: child }) } };
      case 'option':
        return { child: type.element, step: { rebuild: (child) => withType(node, { kind: 'option', element: child }) } };
      case 'map':
        return { child: type.value, step: { rebuild: (child) => withType(node, { kind: 'map', value: child }) } };
      default: {
        const lens = node.name !== undefined ? this.containers.lookup(node.name) : undefined;
        const element = lens?.unwrap(node);
        if (!lens || !element) {
          throw new PathNotFoundError(resolved, segment, type.kind, node.name ? `no container registered for '${node.name}'` : undefined);
        }
        return { child: element, step: { rebuild: (child) => lens.rewrap(node, child) } };
      }
    }
  }

  private interpretUnsafe(root: Schema, fields: readonly string[]): FieldPath {
    const path: FieldPathSegment[] = [];
    let node = root;

    for (const name of fields) {
      const segment: FieldPathSegment =
        name === EACH_FIELD && this.isContainer(node) ? { kind: 'each' } : { kind: 'field', name };
      node = this.step(node, segment, path).child;
      path.push(segment);
    }

    return path;
  }

  private isContainer(node: Schema): boolean {
    const kind = node.type.kind;
    if (kind === 'array' || kind === 'option' || kind === 'map') return true;
    return node.name !== undefined && this.containers.has(node.name);
  }
}

const defaultModifier = new SchemaModifier();

/**
 * Typed modification with the default modifier (no custom containers)
 */
export function modify<T, P extends PathToken[] & SchemaPath<T>>(
  root: Schema<T>,
  ...path: P
): (transform: (schema: Schema<AtPath<T, P>>) => Schema<AtPath<T, P>>) => Schema<T> {
  return defaultModifier.modify(root, ...path);
}

/**
 * Untyped modification with the default modifier. See `SchemaModifier#modifyUnsafe`
 * for why this is riskier than `modify`.
 */
export function modifyUnsafe<T>(root: Schema<T>, fields: readonly string[]): (transform: SchemaTransform) => Schema<T> {
  return defaultModifier.modifyUnsafe(root, fields);
}

export function getAt(root: Schema, ...path: PathToken[]): Schema {
  return defaultModifier.getAt(root, path.map((token) => toSegment(token)));
}
