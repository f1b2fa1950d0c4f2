/**
 * Annotation Resolution
 *
 * Overlays explicitly declared metadata onto derived schemas:
 * - `encodedName` on a field wins over the name produced by the naming policy
 * - description, default, example, format, deprecated and hidden replace earlier values
 * - a validator is appended to the validators already present
 */

import type { Annotations, ProductField, Schema } from '@typedwire/core';
import {
  annotationsSchema,
  ConfigurationError,
  field,
  product,
  withDefault,
  withDeprecated,
  withDescription,
  withExample,
  withFormat,
  withHidden,
  withName,
  withType,
  withValidator,
} from '@typedwire/core';

/** Metadata for a whole type and for its fields, keyed by source field name */
export interface AnnotationBundle {
  type?: Annotations;
  fields?: Readonly<Record<string, Annotations>>;
}

export class AnnotationResolver {
  /**
   * Reject malformed bundles before they reach a schema
   */
  assertValid(annotations: Annotations, where: string): void {
    const parsed = annotationsSchema.safeParse(annotations);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
      throw new ConfigurationError(`Invalid annotations on ${where}: ${issues}`, { where });
    }
  }

  /**
   * Overlay metadata on a schema node. `encodedName` renames the schema itself.
   */
  applyToSchema<T>(schema: Schema<T>, annotations: Annotations | undefined): Schema<T> {
    if (!annotations) return schema;

    let result = schema;
    if (annotations.encodedName !== undefined) result = withName(result, annotations.encodedName);
    if (annotations.description !== undefined) result = withDescription(result, annotations.description);
    if (annotations.default !== undefined) {
      result = withDefault(result, annotations.default.value, annotations.default.encoded);
    }
    if (annotations.encodedExample !== undefined) result = withExample(result, annotations.encodedExample);
    if (annotations.format !== undefined) result = withFormat(result, annotations.format);
    if (annotations.deprecated !== undefined) result = withDeprecated(result, annotations.deprecated);
    if (annotations.hidden !== undefined) result = withHidden(result, annotations.hidden);
    if (annotations.validator !== undefined) result = withValidator(result, annotations.validator);
    return result;
  }

  /**
   * Overlay field metadata: `encodedName` renames the field, the rest goes on the field's schema.
   */
  applyToField(target: ProductField, annotations: Annotations | undefined): ProductField {
    if (!annotations) return target;

    const { encodedName, ...schemaAnnotations } = annotations;
    return field(target.name, this.applyToSchema(target.schema, schemaAnnotations), encodedName ?? target.encodedName);
  }

  /**
   * Apply a bundle to a derived schema. Field bundles require a product schema and
   * must name existing fields. Products are rebuilt, which checks the final field
   * names for clashes.
   */
  resolve<T>(schema: Schema<T>, bundle: AnnotationBundle): Schema<T> {
    let result = schema;
    const fieldBundles = bundle.fields ? Object.entries(bundle.fields) : [];
    const type = schema.type;

    if (fieldBundles.length > 0 && type.kind !== 'product') {
      throw new ConfigurationError(`Field annotations given for a ${type.kind} schema`, {
        schema: schema.name,
        fields: fieldBundles.map(([name]) => name),
      });
    }

    if (type.kind === 'product') {
      const known = new Set(type.fields.map((f) => f.name));
      for (const [name, annotations] of fieldBundles) {
        if (!known.has(name)) {
          throw new ConfigurationError(`Annotations given for unknown field '${name}'`, { schema: schema.name, field: name });
        }
        this.assertValid(annotations, `field '${name}'`);
      }

      const rebuilt = product(
        type.fields.map((f) => this.applyToField(f, ownEntry(bundle.fields, f.name))),
        schema.name !== undefined ? { name: schema.name } : {}
      );
      result = withType(result, rebuilt.type);
    }

    if (bundle.type) {
      this.assertValid(bundle.type, schema.name ? `type '${schema.name}'` : 'type');
    }
    return this.applyToSchema(result, bundle.type);
  }
}

function ownEntry(record: Readonly<Record<string, Annotations>> | undefined, key: string): Annotations | undefined {
  return record && Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}
