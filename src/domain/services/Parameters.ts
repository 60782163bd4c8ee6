import type { AuthParams } from '../model/ClientConfig.js';
import type { Field, ParameterFields, RequestParams } from '../model/FieldDefinition.js';
import { ValidatedField } from '../model/FieldDefinition.js';
import { ValidationSession } from './FieldValidator.js';

export interface ParametersOptions {
  /** Authentication parameters merged in before the call's own fields. */
  readonly auth?: AuthParams;
  /** Validate on construction. Default: `true`. */
  readonly validate?: boolean;
}

/**
 * Self-validating set of request parameters for one API call.
 *
 * Fields are either bare values, validated by their own name, or
 * `ValidatedField`s carrying explicit directives. Authentication parameters
 * come first and can be overridden by the caller's fields.
 */
export class Parameters {
  private readonly fields: ReadonlyMap<string, Field>;

  constructor(fields: ParameterFields, options: ParametersOptions = {}) {
    this.fields = new Map<string, Field>(Object.entries({ ...options.auth, ...fields }));

    if (options.validate ?? true) {
      this.validateAll();
    }
  }

  /** Flatten to a fresh `name → value` object. Mutating the result never affects this container. */
  toMap(): RequestParams {
    const params: RequestParams = {};
    for (const [name, entry] of this.fields) {
      params[name] = entry instanceof ValidatedField ? entry.value : entry;
    }
    return params;
  }

  /** Validate every field in insertion order, throwing `ValidationErrorsBatch` with all failures. */
  validateAll(): void {
    const session = new ValidationSession();

    for (const [name, entry] of this.fields) {
      if (entry instanceof ValidatedField) {
        session.check(name, entry.value, entry.rule);
      } else {
        session.check(name, entry);
      }
    }

    session.assertValid();
  }
}
