import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { GraphQLClient } from '../src/services/graphql-client.js';
import { UndiciTransport } from '../src/services/transport.js';
import { StaticTokenProvider } from '../src/services/token-providers.js';
import { TransportError, UnexpectedStatusError } from '../src/utils/errors.js';
import { COUNTRY_QUERY, captureError, countryData } from './helpers.js';

const ORIGIN = 'https://countries.test';

describe('UndiciTransport', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('posts the envelope and returns the raw response', async () => {
    const body = JSON.stringify({ query: COUNTRY_QUERY, variables: { code: 'AL' } });
    agent.get(ORIGIN)
      .intercept({ path: '/query', method: 'POST', body })
      .reply(200, { data: countryData });
    const transport = new UndiciTransport({ dispatcher: agent });

    const response = await transport.execute({
      url: `${ORIGIN}/query`,
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(await response.body.text())).toEqual({ data: countryData });
  });

  it('returns error statuses instead of throwing', async () => {
    agent.get(ORIGIN).intercept({ path: '/query', method: 'POST' }).reply(503, 'unavailable');
    const transport = new UndiciTransport({ dispatcher: agent });

    const response = await transport.execute({ url: `${ORIGIN}/query`, method: 'POST', headers: {}, body: '{}' });

    expect(response.statusCode).toBe(503);
    expect(await response.body.text()).toBe('unavailable');
  });

  it('runs a query end to end', async () => {
    agent.get(ORIGIN)
      .intercept({ path: '/query', method: 'POST' })
      .reply(200, { data: countryData });
    const client = new GraphQLClient({
      endpoint: `${ORIGIN}/query`,
      transport: new UndiciTransport({ dispatcher: agent }),
    });

    await expect(client.query(COUNTRY_QUERY, { code: 'AL' })).resolves.toEqual(countryData);
    agent.assertNoPendingInterceptors();
  });

  it('retries an unauthorized response end to end', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/query', method: 'POST' }).reply(401, '');
    pool.intercept({ path: '/query', method: 'POST' }).reply(200, { data: countryData });
    const client = new GraphQLClient({
      endpoint: `${ORIGIN}/query`,
      transport: new UndiciTransport({ dispatcher: agent }),
      tokenProvider: new StaticTokenProvider('test-token'),
    });

    await expect(client.query(COUNTRY_QUERY, { code: 'AL' })).resolves.toEqual(countryData);
    agent.assertNoPendingInterceptors();
  });

  it('maps a non-OK status end to end', async () => {
    agent.get(ORIGIN).intercept({ path: '/query', method: 'POST' }).reply(500, 'boom');
    const client = new GraphQLClient({
      endpoint: `${ORIGIN}/query`,
      transport: new UndiciTransport({ dispatcher: agent }),
    });

    const error = await captureError(client.query(COUNTRY_QUERY, { code: 'AL' }));

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toMatchObject({ statusCode: 500, details: { statusCode: 500, response: 'boom' } });
  });

  it('surfaces connection failures as transport errors', async () => {
    agent.get(ORIGIN)
      .intercept({ path: '/query', method: 'POST' })
      .replyWithError(new Error('socket hang up'));
    const client = new GraphQLClient({
      endpoint: `${ORIGIN}/query`,
      transport: new UndiciTransport({ dispatcher: agent }),
    });

    const error = await captureError(client.query(COUNTRY_QUERY, { code: 'AL' }));

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ code: 'TRANSPORT_ERROR' });
  });
});
