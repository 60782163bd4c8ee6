/** Built-in validator kinds a field can be checked against. */
export type ValidatorKind =
  | 'integer'
  | 'domain-name'
  | 'email'
  | 'ipv4'
  | 'ipv6'
  | 'record-type'
  | 'zone-type'
  | 'ttl'
  | 'redirect-type'
  | 'caa-flag'
  | 'caa-type'
  | 'algorithm'
  | 'fptype'
  | 'tlsa-usage'
  | 'tlsa-selector'
  | 'tlsa-matching-type'
  | 'rows-per-page'
  | 'api-bool'
  | 'required'
  | 'valid';

/** Any value that can be sent as a request parameter. */
export type ParamValue = string | number | boolean | readonly string[] | null | undefined;

/** Validation directives attached to a single field. */
export interface ValidationRule {
  /** When `true`, an empty or missing value is accepted without further checks. */
  readonly optional?: boolean;
  /** Validator to run instead of the one registered for the field's own name. */
  readonly validateAs?: ValidatorKind;
  /** Inclusive lower bound for `integer` fields. `0` is a real bound. */
  readonly minValue?: number;
  /** Inclusive upper bound for `integer` fields. */
  readonly maxValue?: number;
}

/** A parameter value paired with the rule it must satisfy. */
export class ValidatedField {
  constructor(
    readonly value: ParamValue,
    readonly rule: ValidationRule,
  ) {}
}

/** A parameter is either a bare value (validated by its name) or a value with explicit directives. */
export type Field = ParamValue | ValidatedField;

/** Named parameters for one API call, in declaration order. */
export type ParameterFields = Readonly<Record<string, Field>>;

/** Flattened parameters as sent over the wire. */
export type RequestParams = Record<string, ParamValue>;

export function field(value: ParamValue, rule: ValidationRule): ValidatedField {
  return new ValidatedField(value, rule);
}

export function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === null || value === '') return true;
  if (Array.isArray(value) && value.length === 0) return true;
  return false;
}
