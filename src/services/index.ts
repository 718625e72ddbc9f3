// Service exports for easy importing
export { GraphQLClient } from './graphql-client.js';
export { AuthRetryController, RetryBudget, DEFAULT_MAX_RETRIES } from './auth-retry-controller.js';
export { UndiciTransport, type UndiciTransportOptions } from './transport.js';
export { OAuthTokenProvider } from './oauth.js';
export { StaticTokenProvider } from './token-providers.js';
export { createClientFromEnv, tokenProviderFromEnv } from './client-factory.js';
export { validateVariables, buildRequestBody } from './request-builder.js';
export { decodeResponse } from './response-decoder.js';
