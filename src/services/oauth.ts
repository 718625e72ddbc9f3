import { request } from 'undici';
import { z } from 'zod';
import type { Logger } from 'pino';
import { logger as defaultLogger } from '../utils/logger.js';
import { AuthenticationError, ExternalServiceError, isGraphQLClientError } from '../utils/errors.js';
import type { TokenProvider } from '../types/graphql.js';
import type { OAuthTokenInfo, OAuthTokenProviderOptions, OAuthTokenResponse } from '../types/oauth.js';

const tokenResponseSchema: z.ZodType<OAuthTokenResponse> = z.object({
  access_token: z.string().min(1, 'missing access_token'),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
});

/**
 * OAuth 2.0 client-credentials token provider. Tokens are cached until shortly
 * before they expire; concurrent callers share one token request.
 */
export class OAuthTokenProvider implements TokenProvider {
  private tokenInfo: OAuthTokenInfo | null = null;
  private refreshPromise: Promise<OAuthTokenInfo> | null = null;
  private readonly logger: Logger;

  static readonly TOKEN_REFRESH_BUFFER = 60000; // 60 seconds before expiry
  static readonly DEFAULT_EXPIRES_IN = 3600;

  constructor(private readonly options: OAuthTokenProviderOptions) {
    this.logger = options.logger ?? defaultLogger;
  }

  async token(): Promise<string> {
    if (!this.tokenInfo || this.isTokenExpiringSoon()) {
      const tokenInfo = await this.refreshToken();
      return tokenInfo.accessToken;
    }

    return this.tokenInfo.accessToken;
  }

  async refreshToken(): Promise<OAuthTokenInfo> {
    if (this.refreshPromise) {
      return this.refreshPromise;
    }

    this.refreshPromise = this.performTokenRefresh();

    try {
      const tokenInfo = await this.refreshPromise;
      this.tokenInfo = tokenInfo;
      return tokenInfo;
    } finally {
      this.refreshPromise = null;
    }
  }

  private async performTokenRefresh(): Promise<OAuthTokenInfo> {
    const startTime = Date.now();

    try {
      this.logger.info('Requesting OAuth token');

      const form = new URLSearchParams({
        grant_type: 'client_credentials',
        client_id: this.options.clientId,
        client_secret: this.options.clientSecret,
      });
      if (this.options.scope) {
        form.set('scope', this.options.scope);
      }

      const { statusCode, body } = await request(this.options.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Accept': 'application/json',
        },
        body: form.toString(),
        bodyTimeout: this.options.timeout,
        headersTimeout: this.options.timeout,
        throwOnError: false,
        ...(this.options.dispatcher && { dispatcher: this.options.dispatcher }),
      });

      const responseTime = Date.now() - startTime;

      if (statusCode !== 200) {
        const errorText = await body.text();
        this.logger.error({
          statusCode,
          response: errorText,
          responseTime,
        }, 'OAuth token request failed');

        if (statusCode === 401 || statusCode === 403) {
          throw new AuthenticationError('Invalid OAuth credentials', { statusCode });
        }

        throw new ExternalServiceError(
          'OAuth Provider',
          `Token request failed with status ${statusCode}`,
          undefined,
          { statusCode, response: errorText }
        );
      }

      const parsed = tokenResponseSchema.safeParse(await body.json());
      if (!parsed.success) {
        throw new AuthenticationError(
          `Invalid token response: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`
        );
      }

      const tokenResponse = parsed.data;
      const expiresIn = tokenResponse.expires_in ?? OAuthTokenProvider.DEFAULT_EXPIRES_IN;
      const tokenInfo: OAuthTokenInfo = {
        accessToken: tokenResponse.access_token,
        tokenType: tokenResponse.token_type || 'Bearer',
        expiresAt: Date.now() + (expiresIn * 1000),
        refreshToken: tokenResponse.refresh_token || '',
        scope: tokenResponse.scope || '',
      };

      this.logger.info({
        responseTime,
        expiresIn,
        tokenType: tokenInfo.tokenType,
      }, 'OAuth token obtained successfully');

      return tokenInfo;

    } catch (error) {
      const responseTime = Date.now() - startTime;
      this.logger.error({ error, responseTime }, 'Failed to obtain OAuth token');

      if (isGraphQLClientError(error)) {
        throw error;
      }

      throw new ExternalServiceError(
        'OAuth Provider',
        'Token request failed',
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  private isTokenExpiringSoon(): boolean {
    if (!this.tokenInfo) {
      return true;
    }

    return Date.now() >= (this.tokenInfo.expiresAt - OAuthTokenProvider.TOKEN_REFRESH_BUFFER);
  }

  invalidate(): void {
    this.tokenInfo = null;
    this.refreshPromise = null;
    this.logger.info('OAuth token cleared');
  }

  getTokenInfo(): OAuthTokenInfo | null {
    return this.tokenInfo ? { ...this.tokenInfo } : null;
  }
}
