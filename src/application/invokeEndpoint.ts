import type { TransportResponse } from '../domain/ports/HttpTransport.js';
import type { Logger } from '../domain/ports/Logger.js';
import { ApiResponse } from '../domain/model/ApiResponse.js';
import { ApiError } from '../domain/model/ApiError.js';
import { TransportError } from '../domain/model/TransportError.js';
import { ValidationError, ValidationErrorsBatch } from '../domain/model/ValidationResult.js';

/** What an endpoint closure may resolve to: a raw transport response, or an envelope built elsewhere. */
export type EndpointOutcome = TransportResponse | ApiResponse;

export type Endpoint = () => Promise<EndpointOutcome>;

export const TIMEOUT_MESSAGE = 'API Connection timed out.';
export const NETWORK_MESSAGE = 'API Network Connection error.';
export const VALIDATION_MESSAGE = 'Validation error.';
export const UNEXPECTED_MESSAGE = 'Something went wrong.';

const GATEWAY_TIMEOUT = 504;
const SERVER_ERROR = 500;

export interface InvokeOptions {
  /** Report the underlying message of unexpected failures instead of the generic one. */
  readonly debug?: boolean;
  readonly logger?: Logger;
}

/** Map anything thrown by an endpoint to a failed response. */
export function toFailureResponse(error: unknown, options: InvokeOptions = {}): ApiResponse {
  const responseOptions = { debug: options.debug };

  if (error instanceof TransportError) {
    return error.kind === 'timeout'
      ? ApiResponse.failure({ error: TIMEOUT_MESSAGE, statusCode: GATEWAY_TIMEOUT }, responseOptions)
      : ApiResponse.failure({ error: NETWORK_MESSAGE, statusCode: SERVER_ERROR }, responseOptions);
  }

  if (error instanceof ApiError) {
    return ApiResponse.failure({ error: error.message, statusCode: error.statusCode }, responseOptions);
  }

  if (error instanceof ValidationError || error instanceof ValidationErrorsBatch) {
    return ApiResponse.failure(
      { error: VALIDATION_MESSAGE, statusCode: null, validationErrors: error.details },
      responseOptions,
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  options.logger?.error('Unexpected failure during API call', {
    error: message,
    stack: error instanceof Error ? error.stack : undefined,
  });

  return ApiResponse.failure(
    { error: options.debug ? message : UNEXPECTED_MESSAGE, statusCode: SERVER_ERROR },
    responseOptions,
  );
}

/**
 * Run one endpoint and always resolve with an `ApiResponse`. Nothing thrown
 * by the endpoint or its transport reaches the caller.
 */
export async function invokeEndpoint(endpoint: Endpoint, options: InvokeOptions = {}): Promise<ApiResponse> {
  try {
    const outcome = await endpoint();
    return outcome instanceof ApiResponse ? outcome : ApiResponse.fromTransport(outcome, { debug: options.debug });
  } catch (error) {
    return toFailureResponse(error, options);
  }
}
