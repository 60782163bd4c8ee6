import type { ApiResponse } from '../domain/model/ApiResponse.js';
import type { EndpointOutcome } from './invokeEndpoint.js';

/** Update arguments plus the flag that turns on fetch-then-merge. */
export type Patchable<TArgs> = TArgs & { readonly patch?: boolean };

export interface PatchUpdateOptions<TArgs extends object, K extends keyof TArgs> {
  /** Fetches the current state of the object being updated. */
  readonly get: (keyArgs: Partial<Pick<TArgs, K>>) => Promise<ApiResponse>;
  /** Arguments forwarded to `get`. Everything else is withheld. */
  readonly keys: readonly K[];
  /** Convert the fetched payload into update arguments. */
  readonly toArgs: (payload: unknown) => Partial<TArgs>;
}

export function pickKeys<T extends object, K extends keyof T>(
  source: T,
  keys: readonly K[],
): Partial<Pick<T, K>> {
  const picked: Partial<Pick<T, K>> = {};
  for (const key of keys) {
    if (Object.hasOwn(source, key)) {
      picked[key] = source[key];
    }
  }
  return picked;
}

/** Fetched values fill the gaps; every argument the caller actually supplied wins. */
export function mergeDefaults<T extends object>(defaults: Partial<T>, args: T): T {
  const entries: [string, unknown][] = Object.entries(args);
  const explicit = Object.fromEntries(entries.filter(([, value]) => value !== undefined));
  return { ...args, ...defaults, ...explicit };
}

/**
 * Wrap an update endpoint so `patch: true` first fetches the current object
 * and merges it under the caller's arguments. A failed fetch is returned as-is
 * and the update never runs. Without the flag the wrapper is a passthrough.
 */
export function withPatchUpdate<TArgs extends object, K extends keyof TArgs>(
  update: (args: TArgs) => Promise<EndpointOutcome>,
  options: PatchUpdateOptions<TArgs, K>,
): (args: Patchable<TArgs>) => Promise<EndpointOutcome> {
  return async (args) => {
    if (!args.patch) {
      return update(args);
    }

    const current = await options.get(pickKeys<TArgs, K>(args, options.keys));
    if (!current.success) {
      return current;
    }

    return update(mergeDefaults<TArgs>(options.toArgs(current.payload), args));
  };
}
