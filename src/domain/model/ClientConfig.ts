import { ConfigurationError } from './ApiError.js';

/** Wire authentication parameters. Exactly one identifier field is present outside testing mode. */
export interface AuthParams {
  readonly 'auth-id'?: string;
  readonly 'sub-auth-id'?: string;
  readonly 'sub-auth-user'?: string;
  readonly 'auth-password'?: string;
}

export interface Credentials {
  /** Main account API user id. Takes precedence over sub-user credentials. */
  readonly authId?: string;
  /** Sub-user id. Used when no `authId` is set. */
  readonly subAuthId?: string | number;
  /** Sub-user name. Used when neither `authId` nor `subAuthId` is set. */
  readonly subAuthUser?: string;
  readonly authPassword?: string;
}

function present(value: string | number | undefined): value is string | number {
  return value !== undefined && String(value) !== '';
}

/**
 * Build the authentication parameters sent with every request.
 *
 * Priority: `authId` > `subAuthId` > `subAuthUser`. Outside testing mode an
 * identifier and a password are both required.
 */
export function resolveAuthParams(credentials: Credentials, testing = false): AuthParams {
  const password = present(credentials.authPassword) ? { 'auth-password': credentials.authPassword } : {};

  let identity: AuthParams;
  if (present(credentials.authId)) {
    identity = { 'auth-id': credentials.authId };
  } else if (present(credentials.subAuthId)) {
    identity = { 'sub-auth-id': String(credentials.subAuthId) };
  } else if (present(credentials.subAuthUser)) {
    identity = { 'sub-auth-user': credentials.subAuthUser };
  } else if (testing) {
    identity = {};
  } else {
    throw new ConfigurationError('One of authId, subAuthId or subAuthUser must be configured');
  }

  if (!present(credentials.authPassword) && !testing) {
    throw new ConfigurationError('authPassword must be configured');
  }

  return { ...identity, ...password };
}
