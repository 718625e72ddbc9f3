import type { TokenProvider } from '../types/graphql.js';

export class StaticTokenProvider implements TokenProvider {
  constructor(private readonly secret: string) {}

  async token(): Promise<string> {
    return this.secret;
  }
}
