export * from './services/index.js';
export {
  GraphQLClientError,
  VariablesValidationError,
  TransportError,
  UnexpectedStatusError,
  DecodeError,
  GraphQLResponseError,
  TokenProviderError,
  RetryExhaustedError,
  ConfigurationError,
  AuthenticationError,
  ExternalServiceError,
  isGraphQLClientError,
  type SerializedClientError,
} from './utils/errors.js';
export { logger, createRequestLogger } from './utils/logger.js';
export { getEnv, getLoggerEnv, resetEnv, type Environment, type LoggerEnvironment } from './config/env.js';

export type {
  GraphQLClientMetrics,
  GraphQLClientOptions,
  GraphQLErrorLocation,
  GraphQLErrorPayload,
  GraphQLRequest,
  GraphQLResponse,
  OperationOptions,
  OperationType,
  OperationVariables,
  RetryScope,
  TokenProvider,
  ValidatedVariables,
  VariableMap,
} from './types/graphql.js';
export type { HttpRequest, HttpResponse, HttpResponseBody, HttpTransport } from './types/transport.js';
export type { OAuthTokenInfo, OAuthTokenProviderOptions, OAuthTokenResponse } from './types/oauth.js';
