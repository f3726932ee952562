// ---------------------------------------------------------------------------
// PrioBus — Configuration Validator
// ---------------------------------------------------------------------------
// Checks a merged configuration object against a JSON Schema (via Ajv).
// Invalid configuration is reported as a list of readable errors.
// ---------------------------------------------------------------------------

import Ajv, { type ErrorObject, type JSONSchemaType, type ValidateFunction } from 'ajv';
import type { PrioBusConfig } from '../types/config';

const ROOT_SCHEMA: JSONSchemaType<PrioBusConfig> = {
  type: 'object',
  required: ['dispatcher', 'logging'],
  properties: {
    dispatcher: {
      type: 'object',
      required: ['maxEventsPerDrain', 'handlerErrors'],
      properties: {
        maxEventsPerDrain: { type: 'integer', minimum: 0 },
        handlerErrors: { type: 'string', enum: ['isolate', 'propagate'] },
      },
      additionalProperties: false,
    },
    logging: {
      type: 'object',
      required: ['level', 'format'],
      properties: {
        level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
        format: { type: 'string', enum: ['json', 'text'] },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export class ConfigValidator {
  private readonly rootValidator: ValidateFunction<PrioBusConfig>;

  constructor() {
    const ajv = new Ajv({ allErrors: true });
    this.rootValidator = ajv.compile(ROOT_SCHEMA);
  }

  /**
   * Validate the full configuration shape.
   *
   * @returns A result with `valid: false` and human-readable errors if invalid.
   */
  validate(config: unknown): ValidationResult {
    if (this.rootValidator(config)) {
      return { valid: true, errors: [] };
    }
    return {
      valid: false,
      errors: this.formatErrors(this.rootValidator.errors ?? []),
    };
  }

  isValid(config: unknown): config is PrioBusConfig {
    return this.rootValidator(config);
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private formatErrors(errors: ErrorObject[]): string[] {
    return errors.map((e) => {
      const path = e.instancePath || '/';
      return `${path}: ${e.message ?? 'unknown error'}`;
    });
  }
}
