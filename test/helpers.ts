import { vi } from 'vitest';
import type { HttpRequest, HttpResponse, HttpTransport } from '../src/types/transport.js';

export function stubResponse(statusCode: number, body: unknown = ''): HttpResponse {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return {
    statusCode,
    headers: { 'content-type': 'application/json' },
    body: {
      text: async () => text,
      dump: async () => undefined,
    },
  };
}

/**
 * Transport that answers with the given outcomes in order; the last outcome
 * repeats once the list is used up.
 */
export function createStubTransport(...outcomes: Array<HttpResponse | Error>) {
  const requests: HttpRequest[] = [];
  const execute = vi.fn(async (request: HttpRequest): Promise<HttpResponse> => {
    requests.push(request);
    const outcome = outcomes[Math.min(requests.length, outcomes.length) - 1];
    if (outcome === undefined) {
      throw new Error('no stubbed response');
    }
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  });

  const transport: HttpTransport = { execute };
  return { transport, execute, requests };
}

export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected promise to reject');
}

export const COUNTRY_QUERY = `
  query Country($code: ID!) {
    country(code: $code) {
      code
      name
      native
      phone
      capital
      languages {
        code
        name
        native
      }
    }
  }`;

export const countryData = {
  country: {
    code: 'AL',
    name: 'Albania',
    native: 'Shqipëria',
    phone: '355',
    capital: 'Tirana',
    languages: [
      {
        code: 'sq',
        name: 'Albanian',
        native: 'Shqip',
      },
    ],
  },
};
