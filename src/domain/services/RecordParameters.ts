import type { Field, ParameterFields, ValidatorKind } from '../model/FieldDefinition.js';
import type { DnsRecordType } from '../model/DnsRecordType.js';
import { field } from '../model/FieldDefinition.js';
import { toDnsRecordType } from '../model/DnsRecordType.js';
import { ValidationError } from '../model/ValidationResult.js';
import { validate } from './FieldValidator.js';
import { isRecord, readScalar, readString } from './payload.js';

type NumericInput = number | string;

/** Record fields shared by create and update. Which ones apply depends on the record type. */
export interface RecordFields {
  /** Host name. `''` (the default) targets the zone apex. */
  readonly host?: string;
  readonly record?: string;
  readonly ttl?: NumericInput;
  readonly priority?: NumericInput;
  readonly weight?: NumericInput;
  readonly port?: NumericInput;
  /** WR records: 301 or 302. */
  readonly redirectType?: NumericInput;
  /** WR records: show the target inside a frame. */
  readonly frame?: NumericInput | boolean;
  readonly frameTitle?: string;
  readonly frameKeywords?: string;
  readonly frameDescription?: string;
  /** SSHFP records: RSA, DSA, ECDSA, Ed25519 or their numeric codes 1–4. */
  readonly algorithm?: NumericInput;
  /** SSHFP records: SHA-1, SHA-256 or 1, 2. */
  readonly fptype?: NumericInput;
  /** CAA records: 0 (non critical) or 128 (critical). */
  readonly caaFlag?: NumericInput;
  readonly caaType?: string;
  readonly caaValue?: string;
  readonly tlsaUsage?: NumericInput;
  readonly tlsaSelector?: NumericInput;
  readonly tlsaMatchingType?: NumericInput;
}

export interface RecordParameterInput extends RecordFields {
  readonly domainName?: string;
  readonly recordType?: string;
  /** Only for updates. */
  readonly recordId?: NumericInput;
}

interface RecordTemplate {
  /** Validator for the `record` value, or `null` when the type sends no `record`. */
  readonly recordAs: ValidatorKind | null;
  readonly extra?: (input: RecordFields) => ParameterFields;
}

function apiBool(value: NumericInput | boolean): NumericInput {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

const RECORD_TEMPLATES: Readonly<Record<DnsRecordType, RecordTemplate>> = {
  A: { recordAs: 'ipv4' },
  AAAA: { recordAs: 'ipv6' },
  MX: { recordAs: 'domain-name', extra: (input) => ({ priority: input.priority ?? 10 }) },
  CNAME: { recordAs: 'domain-name' },
  TXT: { recordAs: 'valid' },
  SPF: { recordAs: 'valid' },
  NS: { recordAs: 'domain-name' },
  SRV: {
    recordAs: 'domain-name',
    extra: (input) => ({
      priority: input.priority,
      weight: input.weight,
      port: field(input.port, { optional: true }),
    }),
  },
  WR: {
    recordAs: 'valid',
    extra: (input) => ({
      'redirect-type': input.redirectType,
      frame: apiBool(input.frame ?? 0),
      'frame-title': field(input.frameTitle ?? '', { optional: true }),
      'frame-keywords': field(input.frameKeywords ?? '', { optional: true }),
      'frame-description': field(input.frameDescription ?? '', { optional: true }),
    }),
  },
  RP: { recordAs: 'valid' },
  SSHFP: {
    recordAs: 'valid',
    extra: (input) => ({ algorithm: input.algorithm, fptype: input.fptype }),
  },
  ALIAS: { recordAs: 'domain-name' },
  CAA: {
    recordAs: null,
    extra: (input) => ({ caa_flag: input.caaFlag, caa_type: input.caaType, caa_value: input.caaValue }),
  },
  NAPTR: { recordAs: 'valid' },
  PTR: { recordAs: 'valid' },
  TLSA: {
    recordAs: 'valid',
    extra: (input) => ({
      tlsa_usage: input.tlsaUsage ?? 0,
      tlsa_selector: input.tlsaSelector ?? 0,
      tlsa_matching_type: input.tlsaMatchingType ?? 0,
    }),
  },
};

/**
 * Build the parameter fields for creating or updating a record of the given type.
 *
 * Throws `ValidationError` on `record-type` before any template runs when the type is missing or unknown.
 */
export function buildRecordFields(input: RecordParameterInput): ParameterFields {
  validate('record-type', input.recordType);
  const type = toDnsRecordType(input.recordType);
  if (!type) {
    throw new ValidationError('record-type', 'This field must be a valid domain record type.');
  }

  const template = RECORD_TEMPLATES[type];
  const fields: Record<string, Field> = {
    'domain-name': input.domainName,
    'record-type': type,
    host: field(input.host ?? '', { optional: true }),
    ttl: input.ttl,
  };

  if (template.recordAs !== null) {
    fields['record'] = field(input.record, { validateAs: template.recordAs });
  }

  Object.assign(fields, template.extra?.(input));

  if (input.recordId !== undefined) {
    fields['record-id'] = input.recordId;
  }

  return fields;
}

/** Map a fetched record (snake-case payload) back to update arguments. */
export function recordFieldsFromPayload(payload: unknown): RecordParameterInput {
  if (!isRecord(payload)) return {};

  return {
    recordType: readString(payload, 'type'),
    host: readString(payload, 'host'),
    record: readString(payload, 'record'),
    ttl: readScalar(payload, 'ttl'),
    priority: readScalar(payload, 'priority'),
    weight: readScalar(payload, 'weight'),
    port: readScalar(payload, 'port'),
    redirectType: readScalar(payload, 'redirect_type'),
    frame: readScalar(payload, 'frame'),
    frameTitle: readString(payload, 'frame_title'),
    frameKeywords: readString(payload, 'frame_keywords'),
    frameDescription: readString(payload, 'frame_description'),
    algorithm: readScalar(payload, 'algorithm'),
    fptype: readScalar(payload, 'fptype'),
    caaFlag: readScalar(payload, 'caa_flag'),
    caaType: readString(payload, 'caa_type'),
    caaValue: readString(payload, 'caa_value'),
    tlsaUsage: readScalar(payload, 'tlsa_usage'),
    tlsaSelector: readScalar(payload, 'tlsa_selector'),
    tlsaMatchingType: readScalar(payload, 'tlsa_matching_type'),
  };
}
