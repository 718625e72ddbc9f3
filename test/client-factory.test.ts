import { describe, it, expect, afterEach, vi } from 'vitest';
import { createClientFromEnv, tokenProviderFromEnv } from '../src/services/client-factory.js';
import { OAuthTokenProvider } from '../src/services/oauth.js';
import { StaticTokenProvider } from '../src/services/token-providers.js';
import { getEnv, resetEnv } from '../src/config/env.js';
import { ConfigurationError } from '../src/utils/errors.js';
import { COUNTRY_QUERY, createStubTransport, stubResponse } from './helpers.js';

function stubEnv(values: Record<string, string>): void {
  for (const [name, value] of Object.entries(values)) {
    vi.stubEnv(name, value);
  }
  resetEnv();
}

describe('environment configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnv();
  });

  it('applies defaults', () => {
    stubEnv({ GRAPHQL_ENDPOINT: 'https://countries.test/query' });

    expect(getEnv()).toMatchObject({
      GRAPHQL_ENDPOINT: 'https://countries.test/query',
      GRAPHQL_TIMEOUT: 30000,
      GRAPHQL_MAX_RETRIES: 3,
      GRAPHQL_RETRY_SCOPE: 'call',
    });
  });

  it('reports every invalid variable', () => {
    stubEnv({ GRAPHQL_MAX_RETRIES: 'many', GRAPHQL_RETRY_SCOPE: 'global' });

    let thrown: unknown;
    try {
      getEnv();
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigurationError);
    expect(thrown instanceof ConfigurationError && thrown.message.split('\n')[0]).toBe(
      'Environment validation failed:'
    );
    expect(thrown instanceof ConfigurationError && thrown.details.issues).toHaveLength(2);
  });

  it('builds a client from the environment', async () => {
    stubEnv({ GRAPHQL_ENDPOINT: 'https://countries.test/query', GRAPHQL_MAX_RETRIES: '1' });
    const { transport, execute } = createStubTransport(stubResponse(401, ''));

    const client = createClientFromEnv({ transport });

    expect(client.endpoint).toBe('https://countries.test/query');
    await expect(client.query(COUNTRY_QUERY, { code: 'AL' })).rejects.toThrow(
      'failed to retry, max retry count reached'
    );
    expect(execute).toHaveBeenCalledTimes(2);
  });

  it('lets an explicit endpoint win', () => {
    stubEnv({ GRAPHQL_ENDPOINT: 'https://countries.test/query' });

    expect(createClientFromEnv({ endpoint: 'https://other.test/graphql' }).endpoint).toBe(
      'https://other.test/graphql'
    );
  });

  it('requires an endpoint', () => {
    stubEnv({ GRAPHQL_ENDPOINT: '' });
    delete process.env.GRAPHQL_ENDPOINT;
    resetEnv();

    expect(() => createClientFromEnv()).toThrow(
      'GRAPHQL_ENDPOINT is required to create a client from the environment'
    );
  });

  it('prefers the OAuth provider when its variables are set', () => {
    stubEnv({
      GRAPHQL_TOKEN: 'test-static-token',
      OAUTH_CLIENT_ID: 'test-client',
      OAUTH_CLIENT_SECRET: 'test-secret',
      OAUTH_TOKEN_URL: 'https://auth.test/oauth/token',
    });

    expect(tokenProviderFromEnv()).toBeInstanceOf(OAuthTokenProvider);
  });

  it('falls back to a static token', async () => {
    stubEnv({ GRAPHQL_TOKEN: 'test-static-token' });

    const provider = tokenProviderFromEnv();

    expect(provider).toBeInstanceOf(StaticTokenProvider);
    await expect(provider?.token()).resolves.toBe('test-static-token');
  });
});
