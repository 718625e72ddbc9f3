import type { Logger } from 'pino';
import { TokenProviderError } from '../utils/errors.js';
import type { RetryScope, TokenProvider } from '../types/graphql.js';

export const DEFAULT_MAX_RETRIES = 3;

/**
 * Counts unauthorized retries against a ceiling. `consume` increments, checks
 * and resets in one synchronous step, so concurrent calls sharing a budget
 * cannot interleave between the check and the reset.
 */
export class RetryBudget {
  private count = 0;

  constructor(private readonly ceiling: number) {}

  consume(): boolean {
    this.count++;
    if (this.count > this.ceiling) {
      this.count = 0;
      return false;
    }
    return true;
  }

  get current(): number {
    return this.count;
  }
}

export interface AuthRetryControllerOptions {
  tokenProvider?: TokenProvider;
  maxRetries: number;
  retryScope: RetryScope;
  logger: Logger;
}

export class AuthRetryController {
  private token: string | undefined;
  private refreshPromise: Promise<string> | null = null;
  private readonly sharedBudget: RetryBudget;

  constructor(private readonly options: AuthRetryControllerOptions) {
    this.sharedBudget = new RetryBudget(options.maxRetries);
  }

  get maxRetries(): number {
    return this.options.maxRetries;
  }

  createBudget(): RetryBudget {
    return this.options.retryScope === 'client'
      ? this.sharedBudget
      : new RetryBudget(this.options.maxRetries);
  }

  getRetryCount(): number {
    return this.sharedBudget.current;
  }

  /**
   * Returns the cached token, asking the provider for one when nothing is
   * cached. Concurrent callers share a single provider call.
   */
  async ensureToken(): Promise<string | undefined> {
    if (this.token || !this.options.tokenProvider) {
      return this.token;
    }

    if (!this.refreshPromise) {
      this.refreshPromise = this.fetchToken(this.options.tokenProvider).finally(() => {
        this.refreshPromise = null;
      });
    }

    return this.refreshPromise;
  }

  /**
   * Forgets a token the server rejected. A token cached by a concurrent
   * refresh after `rejected` was sent is kept.
   */
  invalidate(rejected: string | undefined): void {
    if (!rejected || this.token !== rejected) {
      return;
    }

    this.token = undefined;
    this.options.tokenProvider?.invalidate?.();
    this.options.logger.debug('Cached token cleared after unauthorized response');
  }

  private async fetchToken(provider: TokenProvider): Promise<string> {
    let token: string;
    try {
      token = await provider.token();
    } catch (error) {
      throw new TokenProviderError(error);
    }

    if (!token) {
      throw new TokenProviderError(new Error('token provider returned an empty token'));
    }

    this.token = token;
    return token;
  }
}
