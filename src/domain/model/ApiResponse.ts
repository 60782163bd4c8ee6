import type { TransportResponse } from '../ports/HttpTransport.js';
import type { FieldErrorDetail } from './ValidationResult.js';
import { isRecord, normalizePayload } from '../services/payload.js';

export const HTTP_OK = 200;

/** Remote status marker for application-level failures reported with HTTP 200. */
const FAILED_STATUS = 'Failed';

const UNPOPULATED_ERROR = 'Response has not yet been created from a transport response.';

export interface ApiSuccess {
  readonly status_code: number;
  readonly success: true;
  readonly payload: unknown;
}

export interface ApiFailure {
  readonly status_code: number | null;
  readonly success: false;
  readonly payload: unknown;
  readonly error?: string;
  readonly validation_errors?: readonly FieldErrorDetail[];
}

/** Serializable outcome of one API call. */
export type ApiResult = ApiSuccess | ApiFailure;

export interface ApiResponseOptions {
  /** Surface misuse and raw failure messages in results. */
  readonly debug?: boolean;
}

export interface FailureInit {
  readonly error: string;
  readonly statusCode: number | null;
  readonly validationErrors?: readonly FieldErrorDetail[];
}

interface ResponseState {
  readonly raw: TransportResponse | null;
  readonly payload: unknown;
  readonly error?: string;
  readonly statusCode: number | null;
  readonly validationErrors?: readonly FieldErrorDetail[];
}

function detectError(status: number, body: unknown, payload: unknown): string | undefined {
  if (isRecord(body) && body['error'] !== undefined && body['error'] !== null) {
    return String(body['error']);
  }
  if (status !== HTTP_OK) {
    return `HTTP response ${String(status)}`;
  }
  if (isRecord(payload) && payload['status'] === FAILED_STATUS) {
    const description = payload['status_description'];
    return typeof description === 'string' && description !== '' ? description : 'API request failed.';
  }
  return undefined;
}

/**
 * Normalized outcome of one remote call. Write-once: every instance is built
 * by one of the static factories and never changes afterwards.
 */
export class ApiResponse {
  /** The transport response this envelope was built from, if any. */
  readonly raw: TransportResponse | null;
  readonly payload: unknown;
  readonly error: string | undefined;
  readonly statusCode: number | null;
  readonly validationErrors: readonly FieldErrorDetail[] | undefined;
  private readonly debug: boolean;

  private constructor(state: ResponseState, options: ApiResponseOptions) {
    this.raw = state.raw;
    this.payload = state.payload;
    this.error = state.error;
    this.statusCode = state.statusCode;
    this.validationErrors = state.validationErrors;
    this.debug = options.debug ?? false;
  }

  /** An envelope that was never populated. Reports `success: false`. */
  static empty(options: ApiResponseOptions = {}): ApiResponse {
    return new ApiResponse({ raw: null, payload: {}, statusCode: null }, options);
  }

  /** Classify a transport response: embedded `error`, non-OK status, then a `Failed` status marker. */
  static fromTransport(response: TransportResponse, options: ApiResponseOptions = {}): ApiResponse {
    const payload = normalizePayload(response.body);
    return new ApiResponse(
      {
        raw: response,
        payload,
        error: detectError(response.status, response.body, payload),
        statusCode: response.status,
      },
      options,
    );
  }

  /** A failure produced locally, without a usable transport response. */
  static failure(init: FailureInit, options: ApiResponseOptions = {}): ApiResponse {
    return new ApiResponse(
      {
        raw: null,
        payload: {},
        error: init.error,
        statusCode: init.statusCode,
        validationErrors: init.validationErrors,
      },
      options,
    );
  }

  get success(): boolean {
    return this.statusCode === HTTP_OK && this.error === undefined;
  }

  toResult(): ApiResult {
    if (this.success && this.statusCode !== null) {
      return { status_code: this.statusCode, success: true, payload: this.payload };
    }

    const error = this.error ?? (this.debug && this.raw === null ? UNPOPULATED_ERROR : undefined);

    return {
      status_code: this.statusCode,
      success: false,
      payload: this.payload,
      ...(error !== undefined ? { error } : {}),
      ...(this.validationErrors && this.validationErrors.length > 0 ? { validation_errors: this.validationErrors } : {}),
    };
  }

  toString(): string {
    return JSON.stringify(this.toResult());
  }
}
