import type { RequestParams } from '../model/FieldDefinition.js';

export type HttpMethod = 'GET' | 'POST';

export interface TransportRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly params: RequestParams;
}

/** Status code plus the JSON-decoded body. */
export interface TransportResponse {
  readonly status: number;
  readonly body: unknown;
}

/**
 * Issues one HTTP request. Implementations reject with `TransportTimeoutError`
 * or `TransportNetworkError` when no usable response is available.
 */
export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
}
