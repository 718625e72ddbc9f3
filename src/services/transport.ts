import { request, type Dispatcher } from 'undici';
import type { HttpRequest, HttpResponse, HttpTransport } from '../types/transport.js';

export interface UndiciTransportOptions {
  dispatcher?: Dispatcher;
}

/**
 * Default transport. Sends through undici's global dispatcher unless one is
 * given; non-2xx statuses are returned, never thrown.
 */
export class UndiciTransport implements HttpTransport {
  constructor(private readonly options: UndiciTransportOptions = {}) {}

  async execute(httpRequest: HttpRequest): Promise<HttpResponse> {
    const { statusCode, headers, body } = await request(httpRequest.url, {
      method: httpRequest.method,
      headers: httpRequest.headers,
      body: httpRequest.body,
      signal: httpRequest.signal,
      bodyTimeout: httpRequest.timeout,
      headersTimeout: httpRequest.timeout,
      throwOnError: false,
      ...(this.options.dispatcher && { dispatcher: this.options.dispatcher }),
    });

    return { statusCode, headers, body };
  }
}
