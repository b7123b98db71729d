/**
 * Authenticator over a token obtained out of band (for example a badge
 * cookie copied from a browser session). It never expires locally; when the
 * backend rejects it the same value is handed back, and the retry fails.
 * @packageDocumentation
 */

import type { Authenticator } from '../types.js';

export class StaticTokenAuthenticator implements Authenticator {
  constructor(private readonly token: string) {}

  async login(): Promise<string> {
    if (!this.token) {
      throw new Error('No credential token configured');
    }
    return this.token;
  }

  isExpired(_token: string): boolean {
    return false;
  }
}
