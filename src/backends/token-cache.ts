/**
 * Process-wide credential token cache.
 *
 * Reads of a valid token never wait. Refreshes are single-flight: every
 * caller that observes an invalid token while a login is running awaits that
 * same login instead of starting its own.
 *
 * @packageDocumentation
 */

import { UpstreamUnavailableError, errorMessage } from '../errors.js';
import { type Logger, defaultLogger } from '../logger.js';
import type { Authenticator } from '../types.js';

export class TokenCache {
  private token: string | null = null;
  private inflight: Promise<string> | null = null;
  private readonly authenticator: Authenticator;
  private readonly logger: Logger;

  constructor(authenticator: Authenticator, logger: Logger = defaultLogger) {
    this.authenticator = authenticator;
    this.logger = logger;
  }

  /** The cached token when still valid, otherwise a refreshed one. */
  get(): Promise<string> {
    const current = this.token;
    if (current !== null && !this.authenticator.isExpired(current)) {
      return Promise.resolve(current);
    }
    return this.refresh(current);
  }

  /**
   * Replace `stale` with a fresh token. If another caller has already
   * installed a different valid token, that one is returned without a login.
   */
  refresh(stale: string | null): Promise<string> {
    if (this.inflight) return this.inflight;

    const current = this.token;
    if (current !== null && current !== stale && !this.authenticator.isExpired(current)) {
      return Promise.resolve(current);
    }

    this.inflight = this.login().finally(() => {
      this.inflight = null;
    });
    return this.inflight;
  }

  private async login(): Promise<string> {
    this.logger.info('Logging in to credential backend');
    let token: string;
    try {
      token = await this.authenticator.login();
    } catch (err) {
      this.token = null;
      throw new UpstreamUnavailableError(`Credential login failed: ${errorMessage(err)}`, { cause: err });
    }
    this.token = token;
    return token;
  }
}
