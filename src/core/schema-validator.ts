/**
 * Schema validation engine.
 *
 * Validates decoded envelopes and phase payloads against JSON Schemas
 * using ajv. Schemas are compiled once, when the validator for them is
 * created, and reused for every call; a compiled validator is a type
 * guard for the shape it checks.
 */

import _Ajv from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

// ---------------------------------------------------------------------------
// Validation result
// ---------------------------------------------------------------------------

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

/** A compiled schema: checks an unknown value and narrows it to `T`. */
export type Validator<T> = (value: unknown) => ValidationResult<T>;

// ---------------------------------------------------------------------------
// SchemaValidator
// ---------------------------------------------------------------------------

export class SchemaValidator {
  private readonly ajv: InstanceType<typeof Ajv>;

  constructor() {
    this.ajv = new Ajv({ allErrors: true, strict: false });
  }

  /**
   * Compile a JSON Schema into a reusable validator.
   *
   * `T` is the shape the schema guarantees; keeping the two in step is
   * the caller's job.
   *
   * @throws If the schema itself is invalid.
   */
  compile<T>(schema: Record<string, unknown>): Validator<T> {
    const validateFn = this.ajv.compile<T>(schema);

    return (value: unknown): ValidationResult<T> => {
      if (validateFn(value)) {
        return { valid: true, value };
      }

      const errors = (validateFn.errors ?? []).map((err) => {
        const path = err.instancePath || '/';
        if (err.keyword === 'additionalProperties') {
          const extra = String(err.params['additionalProperty'] ?? '');
          return `${path}: additional property "${extra}" not allowed`;
        }
        if (err.keyword === 'required') {
          const missing = String(err.params['missingProperty'] ?? '');
          return `${path}: required property "${missing}" is missing`;
        }
        return `${path}: ${err.message ?? 'unknown error'}`;
      });

      return { valid: false, errors };
    };
  }
}

/** Shared instance; ajv compilation is the expensive part, not the instance. */
export const schemaValidator = new SchemaValidator();
