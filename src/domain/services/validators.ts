import type { ValidationRule, ValidatorKind } from '../model/FieldDefinition.js';
import { toDnsRecordType } from '../model/DnsRecordType.js';
import { isZoneType } from '../model/ZoneType.js';
import { isTtl } from '../model/Ttl.js';

/** Returns a failure message, or `null` when the value is acceptable. */
export type ValidatorFn = (value: unknown, rule: ValidationRule) => string | null;

const DOMAIN_NAME_PATTERN = /^((?=[a-z0-9-]{1,63}\.)(xn--)?[a-z0-9]+(-[a-z0-9]+)*\.)+[a-z]{2,63}$/i;
const EMAIL_PATTERN = /^[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9-.]+$/;
const DIGITS_PATTERN = /^[0-9]+$/;
const HEXTET_PATTERN = /^[0-9a-f]{1,4}$/i;

const SSHFP_ALGORITHMS = ['RSA', 'DSA', 'ECDSA', 'ED25519'];
const SSHFP_FINGERPRINT_TYPES = ['SHA-1', 'SHA-256'];
const CAA_TYPES = ['issue', 'issuewild', 'iodef'];

/** Native integers and strings of decimal digits. Anything else yields `null`. */
export function toInteger(value: unknown): number | null {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null;
  if (typeof value === 'string' && DIGITS_PATTERN.test(value)) return Number(value);
  return null;
}

function oneOfIntegers(allowed: readonly number[], message: string): ValidatorFn {
  return (value) => {
    const int = toInteger(value);
    return int !== null && allowed.includes(int) ? null : message;
  };
}

function oneOfStrings(allowed: readonly string[], message: string, codes: readonly number[] = []): ValidatorFn {
  return (value) => {
    if (typeof value === 'string' && allowed.includes(value.toUpperCase())) return null;
    const int = toInteger(value);
    return int !== null && codes.includes(int) ? null : message;
  };
}

const isInteger: ValidatorFn = (value, rule) => {
  const int = toInteger(value);
  if (int === null) return 'This field must be an integer.';
  if (rule.minValue !== undefined && int < rule.minValue) {
    return `This field must be at least ${String(rule.minValue)}.`;
  }
  if (rule.maxValue !== undefined && int > rule.maxValue) {
    return `This field must be at most ${String(rule.maxValue)}.`;
  }
  return null;
};

const isIpv4: ValidatorFn = (value) => {
  const octets = typeof value === 'string' ? value.split('.') : [];
  const valid = octets.length === 4 && octets.every((octet) => DIGITS_PATTERN.test(octet) && Number(octet) <= 255);
  return valid ? null : 'This field must be a valid IPv4 address.';
};

const isIpv6: ValidatorFn = (value) => {
  const hextets = typeof value === 'string' ? value.split(':') : [];
  const valid = hextets.length === 8 && hextets.every((hextet) => HEXTET_PATTERN.test(hextet));
  return valid ? null : 'This field must be a valid IPv6 address.';
};

const VALIDATORS: Readonly<Record<ValidatorKind, ValidatorFn>> = {
  integer: isInteger,
  'domain-name': (value) =>
    typeof value === 'string' && DOMAIN_NAME_PATTERN.test(value) ? null : 'This field must be a valid domain name.',
  email: (value) => (typeof value === 'string' && EMAIL_PATTERN.test(value) ? null : 'This field must be a valid email.'),
  ipv4: isIpv4,
  ipv6: isIpv6,
  'record-type': (value) => (toDnsRecordType(value) !== null ? null : 'This field must be a valid domain record type.'),
  'zone-type': (value) =>
    isZoneType(value) ? null : 'This field must be a valid zone type. (master, slave, parked, geodns, domain or reverse)',
  ttl: (value) =>
    isTtl(value)
      ? null
      : 'This field must be a valid ttl. (1 minute, 5 minutes, 15 minutes, 30 minutes, 1 hour, 6 hours, 12 hours, ' +
        '1 day, 2 days, 3 days, 1 week, 2 weeks, or 1 month) or (60, 300, 900, 1800, 3600, 21600, 43200, 86400, ' +
        '172800, 259200, 604800, 1209600, or 2592000)',
  'redirect-type': oneOfIntegers([301, 302], 'This field must be 301 (permanent) or 302 (temporary).'),
  'caa-flag': oneOfIntegers([0, 128], 'This field must be 0 (non-critical) or 128 (critical).'),
  'caa-type': (value) =>
    typeof value === 'string' && CAA_TYPES.includes(value.toLowerCase())
      ? null
      : 'This field must be one of issue, issuewild, iodef.',
  algorithm: oneOfStrings(SSHFP_ALGORITHMS, 'This field must be RSA, DSA, ECDSA, or Ed25519.', [1, 2, 3, 4]),
  fptype: oneOfStrings(SSHFP_FINGERPRINT_TYPES, 'This field must be one of SHA-1 or SHA-256.', [1, 2]),
  'tlsa-usage': oneOfIntegers([0, 1, 2, 3], 'This field must be one of: 0, 1, 2, or 3'),
  'tlsa-selector': oneOfIntegers([0, 1], 'This field must be one of: 0 or 1'),
  'tlsa-matching-type': oneOfIntegers([0, 1, 2], 'This field must be one of: 0, 1, or 2'),
  'rows-per-page': oneOfIntegers([10, 20, 30, 50, 100], 'This field must be one of: 10, 20, 30, 50, or 100.'),
  'api-bool': oneOfIntegers([0, 1], 'This field must be 0 or 1.'),
  required: (value) => (value === undefined || value === null || value === '' ? 'This field is required.' : null),
  valid: () => null,
};

/** Validator used for a wire field when no `validateAs` is given. Unlisted fields are not checked. */
const FIELD_VALIDATORS: Readonly<Record<string, ValidatorKind>> = {
  'admin-mail': 'email',
  algorithm: 'algorithm',
  caa_flag: 'caa-flag',
  caa_type: 'caa-type',
  caa_value: 'valid',
  'default-ttl': 'integer',
  'delete-current-records': 'api-bool',
  'domain-name': 'domain-name',
  email: 'email',
  expire: 'integer',
  fptype: 'fptype',
  frame: 'api-bool',
  'frame-title': 'valid',
  'from-domain': 'domain-name',
  'geodns-location': 'integer',
  'group-id': 'integer',
  mail: 'email',
  'master-ip': 'ipv4',
  page: 'integer',
  port: 'integer',
  'primary-ns': 'domain-name',
  priority: 'integer',
  record: 'required',
  'record-id': 'integer',
  'record-type': 'record-type',
  'redirect-type': 'redirect-type',
  refresh: 'integer',
  retry: 'integer',
  'rows-per-page': 'rows-per-page',
  'save-path': 'api-bool',
  status: 'api-bool',
  tlsa_matching_type: 'tlsa-matching-type',
  tlsa_selector: 'tlsa-selector',
  tlsa_usage: 'tlsa-usage',
  ttl: 'ttl',
  weight: 'integer',
  'zone-type': 'zone-type',
};

/** Resolve the validator for a field: explicit `validateAs` first, then the field's own name. */
export function resolveValidator(fieldName: string, validateAs?: ValidatorKind): ValidatorFn | null {
  const kind = validateAs ?? FIELD_VALIDATORS[fieldName];
  return kind ? VALIDATORS[kind] : null;
}
