import { getEnv } from '../config/env.js';
import { ConfigurationError } from '../utils/errors.js';
import { GraphQLClient } from './graphql-client.js';
import { OAuthTokenProvider } from './oauth.js';
import { StaticTokenProvider } from './token-providers.js';
import type { GraphQLClientOptions, TokenProvider } from '../types/graphql.js';

/**
 * Builds a client from GRAPHQL_* and OAUTH_* variables. Explicit overrides
 * win over the environment.
 */
export function createClientFromEnv(overrides: Partial<GraphQLClientOptions> = {}): GraphQLClient {
  const env = getEnv();

  const endpoint = overrides.endpoint ?? env.GRAPHQL_ENDPOINT;
  if (!endpoint) {
    throw new ConfigurationError('GRAPHQL_ENDPOINT is required to create a client from the environment');
  }

  return new GraphQLClient({
    timeout: env.GRAPHQL_TIMEOUT,
    maxRetries: env.GRAPHQL_MAX_RETRIES,
    retryScope: env.GRAPHQL_RETRY_SCOPE,
    tokenProvider: tokenProviderFromEnv(),
    ...overrides,
    endpoint,
  });
}

export function tokenProviderFromEnv(): TokenProvider | undefined {
  const env = getEnv();

  if (env.OAUTH_CLIENT_ID && env.OAUTH_CLIENT_SECRET && env.OAUTH_TOKEN_URL) {
    return new OAuthTokenProvider({
      tokenUrl: env.OAUTH_TOKEN_URL,
      clientId: env.OAUTH_CLIENT_ID,
      clientSecret: env.OAUTH_CLIENT_SECRET,
      scope: env.OAUTH_SCOPE,
      timeout: env.GRAPHQL_TIMEOUT,
    });
  }

  if (env.GRAPHQL_TOKEN) {
    return new StaticTokenProvider(env.GRAPHQL_TOKEN);
  }

  return undefined;
}
