import { describe, it, expect } from 'vitest';
import { buildRecordFields, recordFieldsFromPayload } from '../../../src/domain/services/RecordParameters.js';
import { Parameters } from '../../../src/domain/services/Parameters.js';
import { ValidationError, ValidationErrorsBatch } from '../../../src/domain/model/ValidationResult.js';
import type { RecordParameterInput } from '../../../src/domain/services/RecordParameters.js';

function wire(input: RecordParameterInput) {
  return new Parameters(buildRecordFields(input)).toMap();
}

describe('buildRecordFields', () => {
  it('should build A record parameters with the canonical type name', () => {
    expect(wire({ domainName: 'example.com', recordType: 'a', host: 'www', record: '10.0.0.1', ttl: 3600 })).toEqual({
      'domain-name': 'example.com',
      'record-type': 'A',
      host: 'www',
      ttl: 3600,
      record: '10.0.0.1',
    });
  });

  it('should default the host to the zone apex', () => {
    expect(wire({ domainName: 'example.com', recordType: 'TXT', record: 'v=spf1 -all', ttl: 60 })['host']).toBe('');
  });

  it('should default the MX priority to 10', () => {
    const params = wire({ domainName: 'example.com', recordType: 'MX', record: 'mail.example.com', ttl: 300 });
    expect(params['priority']).toBe(10);
  });

  it('should add SRV fields with an optional port', () => {
    const params = wire({
      domainName: 'example.com',
      recordType: 'SRV',
      host: '_sip._tcp',
      record: 'sip.example.com',
      ttl: 3600,
      priority: 5,
      weight: 0,
    });

    expect(params).toMatchObject({ priority: 5, weight: 0 });
    expect(params['port']).toBeUndefined();
  });

  it('should send WR frame flags as 1 or 0', () => {
    expect(
      wire({
        domainName: 'example.com',
        recordType: 'WR',
        record: 'https://example.org',
        ttl: 3600,
        redirectType: 301,
        frame: true,
      }),
    ).toEqual({
      'domain-name': 'example.com',
      'record-type': 'WR',
      host: '',
      ttl: 3600,
      record: 'https://example.org',
      'redirect-type': 301,
      frame: 1,
      'frame-title': '',
      'frame-keywords': '',
      'frame-description': '',
    });
  });

  it('should build CAA parameters without a record value', () => {
    const params = wire({
      domainName: 'example.com',
      recordType: 'CAA',
      ttl: 3600,
      caaFlag: 0,
      caaType: 'issue',
      caaValue: 'letsencrypt.org',
    });

    expect('record' in params).toBe(false);
    expect(params).toMatchObject({ caa_flag: 0, caa_type: 'issue', caa_value: 'letsencrypt.org' });
  });

  it('should default TLSA parameters to 0', () => {
    const params = wire({ domainName: 'example.com', recordType: 'TLSA', record: 'abcdef', ttl: 3600 });
    expect(params).toMatchObject({ tlsa_usage: 0, tlsa_selector: 0, tlsa_matching_type: 0 });
  });

  it('should add the record id for updates', () => {
    const params = wire({ domainName: 'example.com', recordType: 'CNAME', record: 'example.org', ttl: 60, recordId: 7 });
    expect(params['record-id']).toBe(7);
  });

  it('should validate the record value with the type validator', () => {
    expect(() => wire({ domainName: 'example.com', recordType: 'A', record: 'example.org', ttl: 60 })).toThrow(
      ValidationErrorsBatch,
    );
    try {
      wire({ domainName: 'example.com', recordType: 'A', record: 'example.org', ttl: 60 });
    } catch (error) {
      if (error instanceof ValidationErrorsBatch) {
        expect(error.details).toEqual([{ fieldname: 'record', message: 'This field must be a valid IPv4 address.' }]);
      }
    }
  });

  it('should reject an unknown record type before building anything', () => {
    expect(() => buildRecordFields({ domainName: 'example.com', recordType: 'XYZ' })).toThrow(
      new ValidationError('record-type', 'This field must be a valid domain record type.'),
    );
    expect(() => buildRecordFields({ domainName: 'example.com' })).toThrow('This field (record-type) is required.');
  });
});

describe('recordFieldsFromPayload', () => {
  it('should map a fetched record to update arguments', () => {
    expect(recordFieldsFromPayload({ id: '7', type: 'A', host: 'www', record: '10.0.0.1', ttl: '3600' })).toEqual({
      recordType: 'A',
      host: 'www',
      record: '10.0.0.1',
      ttl: '3600',
    });
  });

  it('should map nothing from a non-object payload', () => {
    expect(recordFieldsFromPayload(null)).toEqual({});
  });
});
