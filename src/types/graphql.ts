import type { Logger } from 'pino';
import type { ZodType } from 'zod';
import type { HttpTransport } from './transport.js';

export type OperationType = 'query' | 'mutation';

/**
 * Variables accepted by `query` and `mutation`: a string-keyed mapping (plain
 * object or `Map<string, unknown>`) or a structured record (a class instance).
 * The exact shape is checked at run time before anything is sent.
 */
export type VariableMap = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;
export type OperationVariables = VariableMap | object;

export type ValidatedVariables =
  | { kind: 'mapping'; values: Record<string, unknown> }
  | { kind: 'record'; value: object };

export interface GraphQLRequest {
  operation: OperationType;
  query: string;
  variables: ValidatedVariables;
}

export interface GraphQLErrorLocation {
  line: number;
  column: number;
}

export interface GraphQLErrorPayload {
  message: string;
  locations?: GraphQLErrorLocation[];
  path?: Array<string | number>;
  extensions?: unknown;
}

export interface GraphQLResponse<T = unknown> {
  data?: T;
  errors?: GraphQLErrorPayload[] | null;
}

export interface TokenProvider {
  token(): Promise<string>;
  /** Drop any token the provider itself cached; called after the server rejects one. */
  invalidate?(): void;
}

export type RetryScope = 'call' | 'client';

export interface GraphQLClientOptions {
  endpoint: string;
  transport?: HttpTransport;
  tokenProvider?: TokenProvider;
  maxRetries?: number;
  retryScope?: RetryScope;
  timeout?: number;
  headers?: Record<string, string>;
  logger?: Logger;
}

export interface OperationOptions<T> {
  signal?: AbortSignal;
  schema?: ZodType<T>;
  timeout?: number;
  headers?: Record<string, string>;
}

export interface GraphQLClientMetrics {
  requestCount: number;
  errorCount: number;
  retryCount: number;
  averageResponseTime: number;
  lastRequestTime?: number;
}
