import type { ValidationRule } from '../model/FieldDefinition.js';
import type { FieldCheck } from '../model/ValidationResult.js';
import { isEmptyValue } from '../model/FieldDefinition.js';
import { ValidationError, ValidationErrorsBatch, passed, failed, toErrorList } from '../model/ValidationResult.js';
import { resolveValidator } from './validators.js';

/**
 * Check a single field against its rule.
 *
 * Optional fields short-circuit on empty values. Required fields fail on
 * empty values before any type check. Fields without a registered validator pass unchanged.
 */
export function checkField<T>(fieldName: string, value: T, rule: ValidationRule = {}): FieldCheck<T> {
  if (isEmptyValue(value)) {
    return rule.optional ? passed(value) : failed(new ValidationError(fieldName, `This field (${fieldName}) is required.`));
  }

  const validator = resolveValidator(fieldName, rule.validateAs);
  if (!validator) return passed(value);

  const message = validator(value, rule);
  return message === null ? passed(value) : failed(new ValidationError(fieldName, message));
}

/** Fail-fast validation. Returns the value untouched or throws `ValidationError`. */
export function validate<T>(fieldName: string, value: T, rule: ValidationRule = {}): T {
  const result = checkField(fieldName, value, rule);
  if (!result.ok) throw result.error;
  return result.value;
}

/**
 * Collects failures across several independent field checks so they can be
 * reported together. Each session owns its own error list.
 */
export class ValidationSession {
  private readonly collected: ValidationError[] = [];

  /** Check one field, recording the failure if there is one. Returns whether the field passed. */
  check(fieldName: string, value: unknown, rule: ValidationRule = {}): boolean {
    const result = checkField(fieldName, value, rule);
    if (!result.ok) {
      this.collected.push(result.error);
    }
    return result.ok;
  }

  get errors(): readonly ValidationError[] {
    return [...this.collected];
  }

  get isValid(): boolean {
    return this.collected.length === 0;
  }

  /** Throw every collected failure at once, in the order the fields were checked. */
  assertValid(): void {
    const errors = toErrorList(this.collected);
    if (errors) {
      throw new ValidationErrorsBatch(errors);
    }
  }
}
