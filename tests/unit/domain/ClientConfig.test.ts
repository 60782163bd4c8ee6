import { describe, it, expect } from 'vitest';
import { resolveAuthParams } from '../../../src/domain/model/ClientConfig.js';
import { ConfigurationError } from '../../../src/domain/model/ApiError.js';

describe('resolveAuthParams', () => {
  it('should send the main account id when present', () => {
    expect(resolveAuthParams({ authId: 'test-auth-id', subAuthId: 5, authPassword: 'test-secret' })).toEqual({
      'auth-id': 'test-auth-id',
      'auth-password': 'test-secret',
    });
  });

  it('should fall back to the sub-user id, then the sub-user name', () => {
    expect(resolveAuthParams({ subAuthId: 123, subAuthUser: 'sub-user', authPassword: 'test-secret' })).toEqual({
      'sub-auth-id': '123',
      'auth-password': 'test-secret',
    });
    expect(resolveAuthParams({ subAuthUser: 'sub-user', authPassword: 'test-secret' })).toEqual({
      'sub-auth-user': 'sub-user',
      'auth-password': 'test-secret',
    });
  });

  it('should ignore blank identifiers', () => {
    expect(resolveAuthParams({ authId: '', subAuthUser: 'sub-user', authPassword: 'test-secret' })).toEqual({
      'sub-auth-user': 'sub-user',
      'auth-password': 'test-secret',
    });
  });

  it('should require an identifier and a password', () => {
    expect(() => resolveAuthParams({ authPassword: 'test-secret' })).toThrow(
      new ConfigurationError('One of authId, subAuthId or subAuthUser must be configured'),
    );
    expect(() => resolveAuthParams({ authId: 'test-auth-id' })).toThrow(
      new ConfigurationError('authPassword must be configured'),
    );
  });

  it('should send whatever is configured in testing mode', () => {
    expect(resolveAuthParams({}, true)).toEqual({});
    expect(resolveAuthParams({ authId: 'test-auth-id' }, true)).toEqual({ 'auth-id': 'test-auth-id' });
  });
});
