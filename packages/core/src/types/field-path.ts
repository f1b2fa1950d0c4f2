/**
 * Field paths locate a sub-schema inside a larger schema
 */

export interface FieldSegment {
  kind: 'field';
  name: string;
}

/** Descends into the element schema of a collection, option or custom container */
export interface EachSegment {
  kind: 'each';
}

export type FieldPathSegment = FieldSegment | EachSegment;

export type FieldPath = readonly FieldPathSegment[];
