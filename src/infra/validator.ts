import { isPlainObject } from './types.js';

export type FieldRule =
  | { type: 'string'; required?: boolean; max?: number; min?: number; pattern?: RegExp }
  | { type: 'number'; required?: boolean; min?: number; max?: number; integer?: boolean }
  | { type: 'boolean'; required?: boolean }
  | { type: 'enum'; values: readonly string[]; required?: boolean }
  | { type: 'object'; required?: boolean; schema?: Schema }
  | { type: 'custom'; check: (v: unknown) => string | null; required?: boolean };

export type Schema = Record<string, FieldRule>;

/**
 * Checks `data` against `schema` and returns one message per violation.
 * Fields are required unless the rule says `required: false`; nested object
 * rules report paths as `parent.child`.
 */
export function validate(data: Record<string, unknown>, schema: Schema, prefix = ''): string[] {
  const errors: string[] = [];

  for (const [key, rule] of Object.entries(schema)) {
    const field = prefix ? `${prefix}.${key}` : key;
    const value = data[key];
    const isPresent = value !== undefined && value !== null;

    if (rule.required !== false && !isPresent) {
      errors.push(`${field} is required`);
      continue;
    }

    if (!isPresent) continue;

    switch (rule.type) {
      case 'string':
        if (typeof value !== 'string') {
          errors.push(`${field} must be a string`);
        } else {
          if (rule.min !== undefined && value.length < rule.min)
            errors.push(`${field} must be at least ${rule.min} characters`);
          if (rule.max !== undefined && value.length > rule.max)
            errors.push(`${field} must be at most ${rule.max} characters`);
          if (rule.pattern && !rule.pattern.test(value))
            errors.push(`${field} has invalid format`);
        }
        break;

      case 'number':
        if (typeof value !== 'number' || Number.isNaN(value)) {
          errors.push(`${field} must be a number`);
        } else {
          if (rule.integer && !Number.isInteger(value))
            errors.push(`${field} must be an integer`);
          if (rule.min !== undefined && value < rule.min)
            errors.push(`${field} must be >= ${rule.min}`);
          if (rule.max !== undefined && value > rule.max)
            errors.push(`${field} must be <= ${rule.max}`);
        }
        break;

      case 'boolean':
        if (typeof value !== 'boolean') errors.push(`${field} must be a boolean`);
        break;

      case 'enum':
        if (typeof value !== 'string' || !rule.values.includes(value))
          errors.push(`${field} must be one of: ${rule.values.join(', ')}`);
        break;

      case 'object':
        if (!isPlainObject(value)) {
          errors.push(`${field} must be an object`);
        } else if (rule.schema) {
          errors.push(...validate(value, rule.schema, field));
        }
        break;

      case 'custom': {
        const problem = rule.check(value);
        if (problem) errors.push(`${field}: ${problem}`);
        break;
      }
    }
  }

  return errors;
}
