import type { Credentials } from './domain/model/ClientConfig.js';
import type { ApiResponse } from './domain/model/ApiResponse.js';
import type { HttpTransport } from './domain/ports/HttpTransport.js';
import type { Logger } from './domain/ports/Logger.js';
import type { EventType, EventPayload } from './domain/events/DomainEvents.js';
import type { LogThreshold } from './infrastructure/logging/JsonLogger.js';
import { resolveAuthParams } from './domain/model/ClientConfig.js';
import { ApiContext } from './application/ApiContext.js';
import { EventBus } from './application/EventBus.js';
import { mergeDefaults } from './application/patchUpdate.js';
import { AccountApi } from './application/endpoints/AccountApi.js';
import { RecordApi } from './application/endpoints/RecordApi.js';
import { SoaApi } from './application/endpoints/SoaApi.js';
import { ZoneApi } from './application/endpoints/ZoneApi.js';
import { loadEnvSettings } from './infrastructure/config/envConfig.js';
import { createLogger } from './infrastructure/logging/JsonLogger.js';
import { FetchTransport } from './infrastructure/transport/FetchTransport.js';

export const DEFAULT_BASE_URL = 'https://api.cloudns.net';

export interface CloudnsClientConfig extends Credentials {
  /** Report raw failure messages instead of generic ones. Default: `false`. */
  readonly debug?: boolean;
  /** Skip the credential checks. Missing credentials are simply not sent. Default: `false`. */
  readonly testing?: boolean;
  /** Default: `https://api.cloudns.net`. */
  readonly baseUrl?: string;
  /** Request timeout in milliseconds for the default transport. Default: `30000`. */
  readonly timeout?: number;
  /** Default: a `FetchTransport`. */
  readonly transport?: HttpTransport;
  /** Default: a JSON-lines logger on stderr filtered by `logLevel`. */
  readonly logger?: Logger;
  /** Level for the default logger. Default: `silent`. */
  readonly logLevel?: LogThreshold;
}

/**
 * Client for the ClouDNS HTTP API.
 *
 * Every call resolves with an `ApiResponse` and never rejects. Invalid
 * configuration throws `ConfigurationError` from the constructor.
 *
 * @example
 * ```ts
 * const client = new CloudnsClient({ authId: '1234', authPassword: 'secret' });
 * const result = await client.record.create({
 *   domainName: 'example.com',
 *   recordType: 'A',
 *   host: 'www',
 *   record: '10.0.0.1',
 *   ttl: 3600,
 * });
 * console.log(result.toResult());
 * ```
 */
export class CloudnsClient {
  readonly zone: ZoneApi;
  readonly record: RecordApi;
  readonly soa: SoaApi;

  private readonly account: AccountApi;
  private readonly eventBus: EventBus;

  constructor(config: CloudnsClientConfig = {}) {
    const auth = resolveAuthParams(config, config.testing ?? false);
    const logger = config.logger ?? createLogger('cloudns-api-client', { level: config.logLevel ?? 'silent' });
    this.eventBus = new EventBus(logger);

    const ctx = new ApiContext({
      baseUrl: config.baseUrl ?? DEFAULT_BASE_URL,
      auth,
      debug: config.debug ?? false,
      transport: config.transport ?? new FetchTransport({ timeout: config.timeout }),
      eventBus: this.eventBus,
      logger,
    });

    this.account = new AccountApi(ctx);
    this.zone = new ZoneApi(ctx);
    this.record = new RecordApi(ctx);
    this.soa = new SoaApi(ctx);
  }

  /** Build a client from `CLOUDNS_*` environment variables. `overrides` win over the environment. */
  static fromEnv(
    env: Readonly<Record<string, string | undefined>> = process.env,
    overrides: CloudnsClientConfig = {},
  ): CloudnsClient {
    return new CloudnsClient(mergeDefaults<CloudnsClientConfig>(loadEnvSettings(env), overrides));
  }

  getLogin(): Promise<ApiResponse> {
    return this.account.getLogin();
  }

  getNameservers(): Promise<ApiResponse> {
    return this.account.getNameservers();
  }

  getMyIp(): Promise<ApiResponse> {
    return this.account.getMyIp();
  }

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }
}
