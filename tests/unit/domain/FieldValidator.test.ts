import { describe, it, expect } from 'vitest';
import { checkField, validate, ValidationSession } from '../../../src/domain/services/FieldValidator.js';
import { ValidationError, ValidationErrorsBatch } from '../../../src/domain/model/ValidationResult.js';

function messageOf(fieldName: string, value: unknown, rule = {}): string | null {
  const result = checkField(fieldName, value, rule);
  return result.ok ? null : result.error.message;
}

describe('checkField', () => {
  describe('required and optional values', () => {
    it('should reject an empty required value naming the field', () => {
      expect(messageOf('domain-name', '')).toBe('This field (domain-name) is required.');
      expect(messageOf('domain-name', undefined)).toBe('This field (domain-name) is required.');
      expect(messageOf('ns', [])).toBe('This field (ns) is required.');
    });

    it('should accept an empty optional value without running its validator', () => {
      expect(messageOf('group-id', '', { optional: true })).toBeNull();
      expect(messageOf('master-ip', null, { optional: true })).toBeNull();
    });

    it('should still validate a non-empty optional value', () => {
      expect(messageOf('group-id', 'abc', { optional: true })).toBe('This field must be an integer.');
    });

    it('should pass fields that have no registered validator', () => {
      expect(messageOf('server', 'ns1.example.com')).toBeNull();
    });
  });

  describe('integers', () => {
    it('should accept native integers and digit strings', () => {
      expect(messageOf('page', 3)).toBeNull();
      expect(messageOf('page', '42')).toBeNull();
    });

    it('should reject fractions and non-numeric strings', () => {
      expect(messageOf('page', 2.5)).toBe('This field must be an integer.');
      expect(messageOf('page', '4a')).toBe('This field must be an integer.');
    });

    it('should treat bounds as inclusive', () => {
      const rule = { minValue: 1200, maxValue: 43200 };
      expect(messageOf('refresh', 1200, rule)).toBeNull();
      expect(messageOf('refresh', '43200', rule)).toBeNull();
      expect(messageOf('refresh', 1199, rule)).toBe('This field must be at least 1200.');
      expect(messageOf('refresh', 43201, rule)).toBe('This field must be at most 43200.');
    });

    it('should enforce a lower bound of zero', () => {
      expect(messageOf('weight', -1, { minValue: 0 })).toBe('This field must be at least 0.');
      expect(messageOf('weight', 0, { minValue: 0 })).toBeNull();
    });
  });

  describe('addresses and names', () => {
    it('should validate domain names', () => {
      expect(messageOf('domain-name', 'example.com')).toBeNull();
      expect(messageOf('domain-name', 'Sub.Example.CO.uk')).toBeNull();
      expect(messageOf('domain-name', 'localhost')).toBe('This field must be a valid domain name.');
      expect(messageOf('domain-name', '-bad-.com')).toBe('This field must be a valid domain name.');
    });

    it('should validate IPv4 addresses', () => {
      expect(messageOf('master-ip', '10.10.10.10')).toBeNull();
      expect(messageOf('master-ip', '256.1.1.1')).toBe('This field must be a valid IPv4 address.');
      expect(messageOf('master-ip', '1.2.3')).toBe('This field must be a valid IPv4 address.');
    });

    it('should require all eight IPv6 groups', () => {
      const rule = { validateAs: 'ipv6' as const };
      expect(messageOf('record', '2001:0db8:0000:0000:0000:ff00:0042:8329', rule)).toBeNull();
      expect(messageOf('record', '2001:db8::1', rule)).toBe('This field must be a valid IPv6 address.');
    });

    it('should validate emails', () => {
      expect(messageOf('admin-mail', 'hostmaster@example.com')).toBeNull();
      expect(messageOf('admin-mail', 'hostmaster')).toBe('This field must be a valid email.');
    });
  });

  describe('enumerations', () => {
    it('should match record and zone types case-insensitively', () => {
      expect(messageOf('record-type', 'cname')).toBeNull();
      expect(messageOf('record-type', 'BOGUS')).toBe('This field must be a valid domain record type.');
      expect(messageOf('zone-type', 'Master')).toBeNull();
    });

    it('should accept TTLs as seconds or labels', () => {
      expect(messageOf('ttl', 3600)).toBeNull();
      expect(messageOf('ttl', '86400')).toBeNull();
      expect(messageOf('ttl', '1 Hour')).toBeNull();
      expect(messageOf('ttl', 3601)).not.toBeNull();
    });

    it('should accept SSHFP algorithms by name or code', () => {
      expect(messageOf('algorithm', 'ed25519')).toBeNull();
      expect(messageOf('algorithm', 4)).toBeNull();
      expect(messageOf('algorithm', 5)).toBe('This field must be RSA, DSA, ECDSA, or Ed25519.');
      expect(messageOf('fptype', 'sha-256')).toBeNull();
    });

    it('should restrict fixed numeric sets', () => {
      expect(messageOf('caa_flag', 128)).toBeNull();
      expect(messageOf('caa_flag', 1)).toBe('This field must be 0 (non-critical) or 128 (critical).');
      expect(messageOf('rows-per-page', '20')).toBeNull();
      expect(messageOf('rows-per-page', 25)).toBe('This field must be one of: 10, 20, 30, 50, or 100.');
      expect(messageOf('redirect-type', 303)).toBe('This field must be 301 (permanent) or 302 (temporary).');
    });
  });

  it('should prefer validateAs over the field name', () => {
    expect(messageOf('record', '10.0.0.1', { validateAs: 'domain-name' })).toBe(
      'This field must be a valid domain name.',
    );
  });
});

describe('validate', () => {
  it('should return the value when it passes', () => {
    expect(validate('record-id', '123')).toBe('123');
  });

  it('should throw the first failure as a ValidationError', () => {
    expect(() => validate('record-id', 'abc')).toThrow(ValidationError);

    try {
      validate('record-id', 'abc');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.fieldname).toBe('record-id');
        expect(error.details).toEqual([{ fieldname: 'record-id', message: 'This field must be an integer.' }]);
      }
    }
  });
});

describe('ValidationSession', () => {
  it('should collect failures in the order fields were checked', () => {
    const session = new ValidationSession();

    expect(session.check('domain-name', 'nope')).toBe(false);
    expect(session.check('page', 1)).toBe(true);
    expect(session.check('master-ip', '1.1.1')).toBe(false);

    expect(session.isValid).toBe(false);
    expect(session.errors.map((error) => error.fieldname)).toEqual(['domain-name', 'master-ip']);
  });

  it('should throw a batch holding every failure', () => {
    const session = new ValidationSession();
    session.check('domain-name', '');
    session.check('record-id', 'x');

    expect(() => session.assertValid()).toThrow(ValidationErrorsBatch);
    try {
      session.assertValid();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationErrorsBatch);
      if (error instanceof ValidationErrorsBatch) {
        expect(error.message).toBe('Validation errors occurred.');
        expect(error.details).toEqual([
          { fieldname: 'domain-name', message: 'This field (domain-name) is required.' },
          { fieldname: 'record-id', message: 'This field must be an integer.' },
        ]);
      }
    }
  });

  it('should not throw when nothing failed', () => {
    const session = new ValidationSession();
    session.check('page', 1);
    expect(() => session.assertValid()).not.toThrow();
  });

  it('should keep each session independent', () => {
    const first = new ValidationSession();
    const second = new ValidationSession();
    first.check('page', 'x');

    expect(first.errors).toHaveLength(1);
    expect(second.errors).toHaveLength(0);
  });
});
