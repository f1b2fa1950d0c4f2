/**
 * Schema Modifier Interface
 */

import type { FieldPath, Schema } from '@typedwire/core';

export type SchemaTransform = (schema: Schema) => Schema;

/**
 * Targeted updates of nested schemas.
 */
export interface ISchemaModifier {
  /**
   * Replace the node at `path` with the result of a transform.
   *
   * @returns Function applying a transform and returning the new root
   * @throws PathNotFoundError if the path does not match the schema; nothing is modified
   */
  modifyPath<T>(root: Schema<T>, path: FieldPath): (transform: SchemaTransform) => Schema<T>;

  /**
   * Read the node at `path`.
   */
  getAt(root: Schema, path: FieldPath): Schema;
}
