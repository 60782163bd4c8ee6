import { describe, it, expect } from 'vitest';
import { ApiResponse } from '../../../src/domain/model/ApiResponse.js';

describe('ApiResponse', () => {
  it('should report a 200 response as successful with snake case keys', () => {
    const response = ApiResponse.fromTransport({ status: 200, body: { zoneName: 'example.com', testTTL: 60 } });

    expect(response.success).toBe(true);
    expect(response.error).toBeUndefined();
    expect(response.toResult()).toEqual({
      status_code: 200,
      success: true,
      payload: { zone_name: 'example.com', test_ttl: 60 },
    });
  });

  it('should keep list and scalar bodies', () => {
    expect(ApiResponse.fromTransport({ status: 200, body: [{ a: 1 }, { b: 2 }] }).payload).toEqual([{ a: 1 }, { b: 2 }]);
    expect(ApiResponse.fromTransport({ status: 200, body: 5 }).payload).toBe(5);
  });

  it('should treat a Failed status as an error carrying its description', () => {
    const response = ApiResponse.fromTransport({
      status: 200,
      body: { status: 'Failed', statusDescription: 'Missing domain-name parameter.' },
    });

    expect(response.success).toBe(false);
    expect(response.toResult()).toEqual({
      status_code: 200,
      success: false,
      payload: { status: 'Failed', status_description: 'Missing domain-name parameter.' },
      error: 'Missing domain-name parameter.',
    });
  });

  it('should fall back to a generic message for a Failed status without description', () => {
    const response = ApiResponse.fromTransport({ status: 200, body: { status: 'Failed' } });
    expect(response.error).toBe('API request failed.');
  });

  it('should report non-200 statuses', () => {
    const response = ApiResponse.fromTransport({ status: 503, body: null });

    expect(response.success).toBe(false);
    expect(response.toResult()).toEqual({
      status_code: 503,
      success: false,
      payload: null,
      error: 'HTTP response 503',
    });
  });

  it('should prefer an embedded error over the status code', () => {
    const response = ApiResponse.fromTransport({ status: 500, body: { error: 'Upstream unavailable' } });
    expect(response.error).toBe('Upstream unavailable');
    expect(response.statusCode).toBe(500);
  });

  it('should report an unpopulated envelope as a failure', () => {
    expect(ApiResponse.empty().toResult()).toEqual({ status_code: null, success: false, payload: {} });
    expect(ApiResponse.empty({ debug: true }).toResult()).toEqual({
      status_code: null,
      success: false,
      payload: {},
      error: 'Response has not yet been created from a transport response.',
    });
  });

  it('should carry validation errors on local failures', () => {
    const response = ApiResponse.failure({
      error: 'Validation error.',
      statusCode: null,
      validationErrors: [{ fieldname: 'ttl', message: 'bad ttl' }],
    });

    expect(response.toResult()).toEqual({
      status_code: null,
      success: false,
      payload: {},
      error: 'Validation error.',
      validation_errors: [{ fieldname: 'ttl', message: 'bad ttl' }],
    });
  });

  it('should serialize the result as JSON', () => {
    const response = ApiResponse.fromTransport({ status: 200, body: { id: 1 } });
    expect(response.toString()).toBe('{"status_code":200,"success":true,"payload":{"id":1}}');
  });
});
