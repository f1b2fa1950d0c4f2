/**
 * Error types raised by schema construction, derivation and modification.
 * All of them are programmer or wiring errors: none is retried.
 */

import type { FieldPathSegment, SchemaKind } from '../types/index.js';

export type SchemaErrorCode =
  | 'SCHEMA_CONSTRUCTION'
  | 'DERIVATION_UNAVAILABLE'
  | 'PATH_NOT_FOUND'
  | 'INVALID_CONFIGURATION';

export interface SchemaErrorDetails {
  /** Error code for programmatic handling */
  code: SchemaErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class SchemaError extends Error {
  readonly code: SchemaErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: SchemaErrorDetails) {
    super(details.message);
    this.name = 'SchemaError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    Error.captureStackTrace?.(this, new.target);
  }

  /**
   * Format error with its code and suggested action
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  /**
   * Convert to JSON for structured error output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Malformed schema input: duplicate field names, duplicate discriminator values,
 * a discriminator on something that is not a coproduct.
 */
export class SchemaConstructionError extends SchemaError {
  constructor(message: string, context?: Record<string, unknown>, suggestion?: string) {
    super({ code: 'SCHEMA_CONSTRUCTION', message, context, suggestion });
    this.name = 'SchemaConstructionError';
  }
}

/**
 * A component type has neither a registered schema nor a structural description.
 */
export class DerivationUnavailableError extends SchemaError {
  readonly typeName: string;
  /** Names of the enclosing types, outermost first */
  readonly trail: readonly string[];

  constructor(typeName: string, trail: readonly string[] = []) {
    const where = trail.length > 0 ? ` (required by ${trail.join(' -> ')})` : '';
    super({
      code: 'DERIVATION_UNAVAILABLE',
      message: `No schema available for type '${typeName}'${where}`,
      suggestion: `Register a schema for '${typeName}' in the SchemaRegistry passed to the derivation engine.`,
      context: { typeName, trail: [...trail] },
    });
    this.name = 'DerivationUnavailableError';
    this.typeName = typeName;
    this.trail = [...trail];
  }
}

/**
 * A field path segment does not match the schema shape it is applied to.
 */
export class PathNotFoundError extends SchemaError {
  /** Segments resolved successfully before the failing one */
  readonly resolved: readonly FieldPathSegment[];
  readonly segment: FieldPathSegment;
  readonly actualKind: SchemaKind;

  constructor(resolved: readonly FieldPathSegment[], segment: FieldPathSegment, actualKind: SchemaKind, detail?: string) {
    const at = resolved.length > 0 ? formatSegments(resolved) : '<root>';
    const expected = segment.kind === 'field' ? `field '${segment.name}'` : 'a collection element';
    super({
      code: 'PATH_NOT_FOUND',
      message: `Cannot resolve ${expected} at ${at}: found ${actualKind} schema${detail ? ` (${detail})` : ''}`,
      suggestion:
        segment.kind === 'each'
          ? 'Register a container for this schema name, or remove the "each" segment.'
          : 'Check the field name against the source (not the encoded) field names of the product.',
      context: { resolved: formatSegments(resolved), segment: formatSegments([segment]), actualKind },
    });
    this.name = 'PathNotFoundError';
    this.resolved = resolved;
    this.segment = segment;
    this.actualKind = actualKind;
  }
}

/**
 * Invalid configuration or annotation input.
 */
export class ConfigurationError extends SchemaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ code: 'INVALID_CONFIGURATION', message, context });
    this.name = 'ConfigurationError';
  }
}

function formatSegments(segments: readonly FieldPathSegment[]): string {
  return segments.map((s) => (s.kind === 'field' ? s.name : 'each')).join('.');
}

/**
 * Helper to wrap unknown errors as SchemaError
 */
export function wrapError(error: unknown, defaultCode: SchemaErrorCode = 'SCHEMA_CONSTRUCTION'): SchemaError {
  if (error instanceof SchemaError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new SchemaError({
    code: defaultCode,
    message,
    cause,
  });
}
