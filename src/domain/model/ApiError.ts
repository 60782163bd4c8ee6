/**
 * Raised deliberately by endpoint logic. The call guard turns it into a failed
 * response carrying this message and status code.
 */
export class ApiError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 400) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
  }
}

export class RecordNotFoundError extends ApiError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'RecordNotFoundError';
  }
}

/** Invalid or missing client configuration. Thrown when the client is constructed, never from an API call. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
