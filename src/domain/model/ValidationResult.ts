/** Wire shape of a single field-level failure, as reported in `validation_errors`. */
export interface FieldErrorDetail {
  readonly fieldname: string;
  readonly message: string;
}

/** A single field that failed validation. */
export class ValidationError extends Error {
  readonly fieldname: string;

  constructor(fieldname: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.fieldname = fieldname;
  }

  get details(): readonly FieldErrorDetail[] {
    return [{ fieldname: this.fieldname, message: this.message }];
  }
}

/** Non-empty, ordered list of validation errors. */
export type ValidationErrorList = readonly [ValidationError, ...ValidationError[]];

/** Aggregate of every field that failed during one validation pass, in the order the fields were checked. */
export class ValidationErrorsBatch extends Error {
  readonly errors: ValidationErrorList;

  constructor(errors: ValidationErrorList) {
    super('Validation errors occurred.');
    this.name = 'ValidationErrorsBatch';
    this.errors = errors;
  }

  get details(): readonly FieldErrorDetail[] {
    return this.errors.map((error) => ({ fieldname: error.fieldname, message: error.message }));
  }
}

/** Outcome of checking one field. */
export type FieldCheck<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: ValidationError };

export function passed<T>(value: T): FieldCheck<T> {
  return { ok: true, value };
}

export function failed<T>(error: ValidationError): FieldCheck<T> {
  return { ok: false, error };
}

/** Narrow a list of errors to the non-empty tuple, or `null` when there is nothing to report. */
export function toErrorList(errors: readonly ValidationError[]): ValidationErrorList | null {
  const [first, ...rest] = errors;
  return first ? [first, ...rest] : null;
}
