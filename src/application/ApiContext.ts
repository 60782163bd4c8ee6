import type { AuthParams } from '../domain/model/ClientConfig.js';
import type { ParameterFields, RequestParams } from '../domain/model/FieldDefinition.js';
import type { HttpMethod, HttpTransport, TransportResponse } from '../domain/ports/HttpTransport.js';
import type { Logger } from '../domain/ports/Logger.js';
import type { ApiResponse } from '../domain/model/ApiResponse.js';
import type { Endpoint } from './invokeEndpoint.js';
import { Parameters } from '../domain/services/Parameters.js';
import { invokeEndpoint } from './invokeEndpoint.js';
import type { EventBus } from './EventBus.js';

export interface ApiContextOptions {
  readonly baseUrl: string;
  readonly auth: AuthParams;
  readonly debug: boolean;
  readonly transport: HttpTransport;
  readonly eventBus: EventBus;
  readonly logger: Logger;
}

/**
 * Shared plumbing for every endpoint group: authentication, URL building,
 * the transport, and the call guard with its events and logging.
 *
 * Internal class. Endpoint groups receive a reference to it from `CloudnsClient`.
 */
export class ApiContext {
  readonly auth: AuthParams;
  readonly debug: boolean;
  readonly transport: HttpTransport;
  readonly eventBus: EventBus;
  readonly logger: Logger;
  private readonly baseUrl: string;

  constructor(options: ApiContextOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.auth = options.auth;
    this.debug = options.debug;
    this.transport = options.transport;
    this.eventBus = options.eventBus;
    this.logger = options.logger;
  }

  /** Build a parameter container seeded with this client's authentication. */
  parameters(fields: ParameterFields, options: { validate?: boolean } = {}): Parameters {
    return new Parameters(fields, { auth: this.auth, validate: options.validate });
  }

  get(path: string, params: Parameters | RequestParams): Promise<TransportResponse> {
    return this.send('GET', path, params);
  }

  post(path: string, params: Parameters | RequestParams): Promise<TransportResponse> {
    return this.send('POST', path, params);
  }

  /** Run an endpoint through the call guard, emitting lifecycle events around it. */
  async run(operation: string, endpoint: Endpoint): Promise<ApiResponse> {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    const log = this.logger.child({ operation, requestId });

    this.eventBus.emit({ type: 'request:started', requestId, operation, timestamp: startedAt });
    log.debug('API call started');

    const response = await invokeEndpoint(endpoint, { debug: this.debug, logger: log });
    const durationMs = Date.now() - startedAt;

    if (response.success && response.statusCode !== null) {
      log.debug('API call succeeded', { statusCode: response.statusCode, durationMs });
      this.eventBus.emit({
        type: 'request:completed',
        requestId,
        operation,
        statusCode: response.statusCode,
        durationMs,
        timestamp: Date.now(),
      });
    } else {
      const error = response.error ?? 'Response was not populated.';
      log.debug('API call failed', { statusCode: response.statusCode, error, durationMs });
      this.eventBus.emit({
        type: 'request:failed',
        requestId,
        operation,
        statusCode: response.statusCode,
        error,
        validationErrors: response.validationErrors,
        durationMs,
        timestamp: Date.now(),
      });
    }

    return response;
  }

  private send(method: HttpMethod, path: string, params: Parameters | RequestParams): Promise<TransportResponse> {
    return this.transport.send({
      method,
      url: `${this.baseUrl}/${path}`,
      params: params instanceof Parameters ? params.toMap() : params,
    });
  }
}
