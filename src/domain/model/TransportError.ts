export type TransportErrorKind = 'timeout' | 'network';

/** Base class for failures raised by an `HttpTransport` before a usable response exists. */
export abstract class TransportError extends Error {
  abstract readonly kind: TransportErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** The request did not complete within the configured timeout. */
export class TransportTimeoutError extends TransportError {
  readonly kind = 'timeout';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportTimeoutError';
  }
}

/** DNS resolution, TLS, redirect loops, refused connections or an undecodable body. */
export class TransportNetworkError extends TransportError {
  readonly kind = 'network';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportNetworkError';
  }
}
