import type { RequestParams } from '../../domain/model/FieldDefinition.js';
import type { HttpTransport, TransportRequest, TransportResponse } from '../../domain/ports/HttpTransport.js';
import { TransportNetworkError, TransportTimeoutError } from '../../domain/model/TransportError.js';

export interface FetchTransportOptions {
  /** Request timeout in milliseconds. Default: `30000` (30 seconds). */
  readonly timeout?: number;
  /** Extra HTTP headers sent with every request. */
  readonly headers?: Readonly<Record<string, string>>;
}

/** Encode parameters: `undefined`/`null` are skipped, arrays become repeated keys, booleans become `1`/`0`. */
export function encodeParams(params: RequestParams): URLSearchParams {
  const encoded = new URLSearchParams();

  for (const [name, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue;

    if (Array.isArray(value)) {
      for (const item of value) {
        encoded.append(name, String(item));
      }
    } else if (typeof value === 'boolean') {
      encoded.append(name, value ? '1' : '0');
    } else {
      encoded.append(name, String(value));
    }
  }

  return encoded;
}

/**
 * HTTP transport on the global Fetch API. GET requests carry the parameters
 * in the query string, POST requests as a form-encoded body.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeout: number;
  private readonly headers: Readonly<Record<string, string>>;

  constructor(options?: FetchTransportOptions) {
    this.timeout = options?.timeout ?? 30000;
    this.headers = options?.headers ?? {};
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeout);

    let response: Response;
    let text: string;
    try {
      response = await this.fetchWithSignal(request, controller.signal);
      text = await readText(response, controller.signal, request.url);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransportTimeoutError(`Request to ${request.url} timed out after ${String(this.timeout)}ms`, {
          cause: error,
        });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }

    try {
      const body: unknown = JSON.parse(text);
      return { status: response.status, body };
    } catch (error) {
      if (!response.ok) {
        return { status: response.status, body: null };
      }
      throw new TransportNetworkError(`Response from ${request.url} is not valid JSON`, { cause: error });
    }
  }

  private async fetchWithSignal(request: TransportRequest, signal: AbortSignal): Promise<Response> {
    const encoded = encodeParams(request.params);
    const init: RequestInit =
      request.method === 'GET'
        ? { method: 'GET', headers: { ...this.headers } }
        : {
            method: 'POST',
            headers: { 'Content-Type': 'application/x-www-form-urlencoded', ...this.headers },
            body: encoded.toString(),
          };
    const query = encoded.toString();
    const url = request.method === 'GET' && query !== '' ? `${request.url}?${query}` : request.url;

    try {
      return await fetch(url, { ...init, signal });
    } catch (error) {
      throw new TransportNetworkError(`Request to ${request.url} failed`, { cause: error });
    }
  }
}

/** Read the body, giving up as soon as `signal` aborts, even if the stream itself never settles. */
function readText(response: Response, signal: AbortSignal, url: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new TransportNetworkError(`Reading the response from ${url} was aborted`, { cause: signal.reason }));
    };
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });

    void response.text().then(
      (text) => {
        signal.removeEventListener('abort', onAbort);
        resolve(text);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(new TransportNetworkError(`Reading the response from ${url} failed`, { cause: error }));
      },
    );
  });
}
