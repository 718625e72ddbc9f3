import { z } from 'zod';
import type { Logger } from 'pino';
import { logger as defaultLogger, createRequestLogger } from '../utils/logger.js';
import {
  ConfigurationError,
  RetryExhaustedError,
  TokenProviderError,
  TransportError,
  UnexpectedStatusError,
} from '../utils/errors.js';
import { generateRequestId } from '../utils/request-id.js';
import { buildRequestBody, validateVariables } from './request-builder.js';
import { assertNoErrors, decodeData, decodeResponse } from './response-decoder.js';
import { AuthRetryController, DEFAULT_MAX_RETRIES, type RetryBudget } from './auth-retry-controller.js';
import { UndiciTransport } from './transport.js';
import type { HttpResponse, HttpTransport } from '../types/transport.js';
import type {
  GraphQLClientMetrics,
  GraphQLClientOptions,
  OperationOptions,
  OperationType,
  OperationVariables,
} from '../types/graphql.js';

const clientOptionsSchema = z.object({
  endpoint: z.string().url('endpoint must be an absolute URL'),
  maxRetries: z.number().int().min(0).default(DEFAULT_MAX_RETRIES),
  retryScope: z.enum(['call', 'client']).default('call'),
  timeout: z.number().int().positive().optional(),
  headers: z.record(z.string()).default({}),
});

type ResolvedClientOptions = z.infer<typeof clientOptionsSchema>;

export class GraphQLClient {
  private readonly settings: ResolvedClientOptions;
  private readonly transport: HttpTransport;
  private readonly controller: AuthRetryController;
  private readonly logger: Logger;
  private readonly metrics: GraphQLClientMetrics = {
    requestCount: 0,
    errorCount: 0,
    retryCount: 0,
    averageResponseTime: 0,
  };

  constructor(options: GraphQLClientOptions) {
    const parsed = clientOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const errorMessages = parsed.error.errors.map(
        (err) => `${err.path.join('.')}: ${err.message}`
      );
      throw new ConfigurationError(
        `Invalid GraphQL client options:\n${errorMessages.join('\n')}`,
        { issues: errorMessages }
      );
    }

    this.settings = parsed.data;
    this.transport = options.transport ?? new UndiciTransport();
    this.logger = options.logger ?? defaultLogger;
    this.controller = new AuthRetryController({
      tokenProvider: options.tokenProvider,
      maxRetries: parsed.data.maxRetries,
      retryScope: parsed.data.retryScope,
      logger: this.logger,
    });
  }

  get endpoint(): string {
    return this.settings.endpoint;
  }

  async query<T = unknown>(
    query: string,
    variables?: OperationVariables,
    options?: OperationOptions<T>
  ): Promise<T> {
    return this.execute<T>('query', query, variables, options);
  }

  async mutation<T = unknown>(
    mutation: string,
    variables?: OperationVariables,
    options?: OperationOptions<T>
  ): Promise<T> {
    return this.execute<T>('mutation', mutation, variables, options);
  }

  private async execute<T>(
    operation: OperationType,
    query: string,
    variables: OperationVariables | undefined,
    options: OperationOptions<T> = {}
  ): Promise<T> {
    const requestId = generateRequestId();
    const requestLogger = createRequestLogger(requestId, this.logger);
    const operationName = this.extractOperationName(query);
    const startTime = Date.now();

    try {
      const body = buildRequestBody({
        operation,
        query,
        variables: validateVariables(variables ?? {}),
      });

      const data = await this.performRequest<T>(
        body,
        this.controller.createBudget(),
        requestId,
        requestLogger,
        options
      );

      const responseTime = Date.now() - startTime;
      this.updateMetrics(responseTime, false);

      requestLogger.debug({
        operation,
        operationName,
        responseTime,
      }, 'GraphQL request completed successfully');

      return data;

    } catch (error) {
      const responseTime = Date.now() - startTime;
      this.updateMetrics(responseTime, true);

      requestLogger.error({
        error,
        operation,
        operationName,
        responseTime,
        query: this.sanitizeQuery(query),
      }, 'GraphQL request failed');

      throw error;
    }
  }

  private async performRequest<T>(
    body: string,
    budget: RetryBudget,
    requestId: string,
    requestLogger: Logger,
    options: OperationOptions<T>
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      if (options.signal?.aborted) {
        throw new TransportError(options.signal.reason ?? new Error('request aborted'), { attempt });
      }

      let token: string | undefined;
      let tokenFailure: TokenProviderError | undefined;
      try {
        token = await this.controller.ensureToken();
      } catch (error) {
        if (!(error instanceof TokenProviderError)) {
          throw error;
        }
        // The server decides; a 401 is then charged to the retry budget.
        tokenFailure = error;
        requestLogger.warn({ attempt, error }, 'Token provider failed, sending without credential');
      }

      const headers: Record<string, string> = {
        ...this.settings.headers,
        ...options.headers,
        'Content-Type': 'application/json',
        'Accept': 'application/json',
        'X-Request-ID': requestId,
        ...(token ? { 'Authorization': `Bearer ${token}` } : {}),
      };

      requestLogger.debug({ attempt, authenticated: Boolean(token) }, 'Sending GraphQL request');

      let response: HttpResponse;
      try {
        response = await this.transport.execute({
          url: this.settings.endpoint,
          method: 'POST',
          headers,
          body,
          signal: options.signal,
          timeout: options.timeout ?? this.settings.timeout,
        });
      } catch (error) {
        throw new TransportError(error, { attempt });
      }

      if (response.statusCode === 401) {
        await this.readBody(response, 'dump', attempt);
        this.controller.invalidate(token);

        if (!budget.consume()) {
          throw new RetryExhaustedError(this.controller.maxRetries, tokenFailure);
        }

        this.metrics.retryCount++;
        requestLogger.warn({ attempt, statusCode: response.statusCode }, 'Unauthorized, clearing token and retrying');
        continue;
      }

      if (response.statusCode !== 200) {
        const errorText = await this.readBody(response, 'text', attempt);
        throw new UnexpectedStatusError(response.statusCode, {
          response: errorText.substring(0, 500),
        });
      }

      const envelope = decodeResponse(await this.readBody(response, 'text', attempt));
      assertNoErrors(envelope);
      return decodeData(envelope.data, options.schema);
    }
  }

  private async readBody(response: HttpResponse, mode: 'text', attempt: number): Promise<string>;
  private async readBody(response: HttpResponse, mode: 'dump', attempt: number): Promise<void>;
  private async readBody(
    response: HttpResponse,
    mode: 'text' | 'dump',
    attempt: number
  ): Promise<string | void> {
    try {
      return mode === 'text' ? await response.body.text() : await response.body.dump();
    } catch (error) {
      throw new TransportError(error, { attempt, statusCode: response.statusCode });
    }
  }

  private extractOperationName(query: string): string | undefined {
    const match = query.match(/(query|mutation)\s+(\w+)/);
    return match?.[2];
  }

  private sanitizeQuery(query: string): string {
    return query.replace(/\s+/g, ' ').trim().substring(0, 200) + '...';
  }

  private updateMetrics(responseTime: number, isError: boolean): void {
    this.metrics.requestCount++;
    this.metrics.lastRequestTime = Date.now();

    if (isError) {
      this.metrics.errorCount++;
    }

    // Rolling average weighted towards recent requests
    const weight = 0.1;
    this.metrics.averageResponseTime =
      (this.metrics.averageResponseTime * (1 - weight)) + (responseTime * weight);
  }

  getMetrics(): GraphQLClientMetrics {
    return { ...this.metrics };
  }

  /** Shared unauthorized-retry counter; only moves when `retryScope` is `'client'`. */
  getRetryCount(): number {
    return this.controller.getRetryCount();
  }
}
