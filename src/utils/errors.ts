import type { GraphQLErrorLocation, GraphQLErrorPayload } from '../types/graphql.js';

export interface SerializedClientError {
  code: string;
  message: string;
  details: Record<string, unknown>;
}

export class GraphQLClientError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.details = details ?? {};

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): SerializedClientError {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class VariablesValidationError extends GraphQLClientError {
  constructor(reason: string, details?: Record<string, unknown>, cause?: unknown) {
    super(`failed to validate operation variables: ${reason}`, 'VALIDATION_ERROR', details, cause);
  }
}

export class TransportError extends GraphQLClientError {
  constructor(originalError: unknown, details?: Record<string, unknown>) {
    super(
      `failed to do request: ${describeCause(originalError)}`,
      'TRANSPORT_ERROR',
      details,
      originalError
    );
  }
}

export class UnexpectedStatusError extends GraphQLClientError {
  public readonly statusCode: number;

  constructor(statusCode: number, details?: Record<string, unknown>) {
    super(`unexpected status code: ${statusCode}`, 'UNEXPECTED_STATUS', { statusCode, ...details });
    this.statusCode = statusCode;
  }
}

export class DecodeError extends GraphQLClientError {
  constructor(reason: string, details?: Record<string, unknown>, cause?: unknown) {
    super(`failed to decode response: ${reason}`, 'DECODE_ERROR', details, cause);
  }
}

/**
 * A server-reported error. The message is the first error's message verbatim;
 * every error of the response stays available on `errors`.
 */
export class GraphQLResponseError extends GraphQLClientError {
  public readonly locations: GraphQLErrorLocation[];
  public readonly path: Array<string | number>;
  public readonly extensions: unknown;
  public readonly errors: GraphQLErrorPayload[];

  constructor(first: GraphQLErrorPayload, others: GraphQLErrorPayload[] = []) {
    super(first.message, 'GRAPHQL_ERROR', { errorCount: others.length + 1 });
    this.locations = first.locations ?? [];
    this.path = first.path ?? [];
    this.extensions = first.extensions;
    this.errors = [first, ...others];
  }
}

export class TokenProviderError extends GraphQLClientError {
  constructor(originalError: unknown) {
    super(`failed to get token: ${describeCause(originalError)}`, 'TOKEN_PROVIDER_ERROR', {}, originalError);
  }
}

/**
 * Unauthorized responses outlasted the retry ceiling. When the last attempt went
 * out without a credential because the provider failed, that failure is the cause.
 */
export class RetryExhaustedError extends GraphQLClientError {
  public readonly attempts: number;

  constructor(maxRetries: number, cause?: TokenProviderError) {
    super('failed to retry, max retry count reached', 'RETRY_EXHAUSTED', { maxRetries }, cause);
    this.attempts = maxRetries + 1;
  }
}

export class ConfigurationError extends GraphQLClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

export class AuthenticationError extends GraphQLClientError {
  constructor(message: string = 'Authentication failed', details?: Record<string, unknown>) {
    super(message, 'AUTHENTICATION_ERROR', details);
  }
}

export class ExternalServiceError extends GraphQLClientError {
  constructor(
    service: string,
    message: string,
    originalError?: Error,
    details?: Record<string, unknown>
  ) {
    super(
      `${service} service error: ${message}`,
      'EXTERNAL_SERVICE_ERROR',
      {
        service,
        originalMessage: originalError?.message,
        ...details,
      },
      originalError
    );
  }
}

export function isGraphQLClientError(error: unknown): error is GraphQLClientError {
  return error instanceof GraphQLClientError;
}

function describeCause(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
