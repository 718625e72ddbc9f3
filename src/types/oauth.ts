import type { Logger } from 'pino';
import type { Dispatcher } from 'undici';

export interface OAuthTokenResponse {
  access_token: string;
  token_type?: string;
  expires_in?: number;
  refresh_token?: string;
  scope?: string;
}

export interface OAuthTokenInfo {
  accessToken: string;
  tokenType: string;
  expiresAt: number;
  refreshToken?: string;
  scope?: string;
}

export interface OAuthTokenProviderOptions {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  scope?: string;
  timeout?: number;
  dispatcher?: Dispatcher;
  logger?: Logger;
}
