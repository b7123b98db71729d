/**
 * Configuration Management
 *
 * Reads the relay settings from environment variables and turns the
 * configured backend credentials into model bindings.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { AgentBackend, DEFAULT_AGENT_BASE_URL } from './backends/agent.js';
import {
  CredentialBackend,
  DEFAULT_ASSISTANT_ID,
  DEFAULT_CREDENTIAL_BASE_URL,
  DEFAULT_KEEP_ALIVE_INTERVAL_MS,
} from './backends/credential.js';
import { StaticTokenAuthenticator } from './backends/static-token.js';
import { type Logger, defaultLogger } from './logger.js';
import type { ModelBinding } from './relay.js';
import type { Authenticator } from './types.js';

/** Empty strings count as unset. */
const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional(),
);

const flag = z.preprocess(
  (value) => (typeof value === 'string' ? ['1', 'true', 'yes'].includes(value.trim().toLowerCase()) : value),
  z.boolean().default(false),
);

function numberWithDefault(fallback: number) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().nonnegative().default(fallback),
  );
}

/**
 * Environment schema
 */
const EnvSchema = z.object({
  API_KEY: optionalString,
  AGENT_APP_KEY: optionalString,
  AGENT_VISITOR_KEY: optionalString,
  AGENT_BASE_URL: optionalString,
  CREDENTIAL_TOKEN: optionalString,
  CREDENTIAL_BASE_URL: optionalString,
  CREDENTIAL_ASSISTANT_ID: numberWithDefault(DEFAULT_ASSISTANT_ID),
  CREDENTIAL_KEEPALIVE_INTERVAL: numberWithDefault(DEFAULT_KEEP_ALIVE_INTERVAL_MS / 1000),
  HOST: optionalString,
  PORT: numberWithDefault(8000),
  PRINT_STATISTICS_INTERVAL: numberWithDefault(30),
  TEARDOWN_TIMEOUT_MS: numberWithDefault(5_000),
  VERBOSE: flag,
});

export interface RelayServerConfig {
  host: string;
  port: number;
  apiKey?: string;
  agent?: {
    appKey: string;
    visitorKey: string;
    baseUrl: string;
  };
  credential?: {
    token: string;
    baseUrl: string;
    assistantId: number;
    /** 0 disables the periodic login check */
    keepAliveIntervalMs: number;
  };
  /** Seconds between statistics reports; 0 disables them */
  statisticsIntervalSec: number;
  teardownTimeoutMs: number;
  verbose: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Model ids served by each backend kind.
 */
export const AGENT_MODEL_ID = 'deepseek-r1';
export const CREDENTIAL_MODEL_ID = 'ibit';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid environment: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim());
  }
  const e = parsed.data;

  return {
    host: e.HOST ?? '0.0.0.0',
    port: e.PORT,
    apiKey: e.API_KEY,
    agent: e.AGENT_APP_KEY && e.AGENT_VISITOR_KEY
      ? {
          appKey: e.AGENT_APP_KEY,
          visitorKey: e.AGENT_VISITOR_KEY,
          baseUrl: e.AGENT_BASE_URL ?? DEFAULT_AGENT_BASE_URL,
        }
      : undefined,
    credential: e.CREDENTIAL_TOKEN
      ? {
          token: e.CREDENTIAL_TOKEN,
          baseUrl: e.CREDENTIAL_BASE_URL ?? DEFAULT_CREDENTIAL_BASE_URL,
          assistantId: e.CREDENTIAL_ASSISTANT_ID,
          keepAliveIntervalMs: e.CREDENTIAL_KEEPALIVE_INTERVAL * 1000,
        }
      : undefined,
    statisticsIntervalSec: e.PRINT_STATISTICS_INTERVAL,
    teardownTimeoutMs: e.TEARDOWN_TIMEOUT_MS,
    verbose: e.VERBOSE,
  };
}

export interface BindingDeps {
  logger?: Logger;
  /** Replaces the static-token authenticator for the credential backend */
  authenticator?: Authenticator;
}

/**
 * Build one model binding per configured backend. At least one is required.
 */
export function buildModelBindings(config: RelayServerConfig, deps: BindingDeps = {}): ModelBinding[] {
  const logger = deps.logger ?? defaultLogger;
  const bindings: ModelBinding[] = [];

  if (config.agent) {
    bindings.push({
      id: AGENT_MODEL_ID,
      backend: new AgentBackend({ ...config.agent, logger }),
    });
  }

  if (config.credential || deps.authenticator) {
    bindings.push({
      id: CREDENTIAL_MODEL_ID,
      backend: new CredentialBackend({
        authenticator: deps.authenticator ?? new StaticTokenAuthenticator(config.credential?.token ?? ''),
        baseUrl: config.credential?.baseUrl,
        assistantId: config.credential?.assistantId,
        keepAliveIntervalMs: config.credential?.keepAliveIntervalMs,
        logger,
      }),
    });
  }

  if (bindings.length === 0) {
    throw new ConfigError(
      'No valid models configured: set AGENT_APP_KEY and AGENT_VISITOR_KEY, or CREDENTIAL_TOKEN',
    );
  }
  return bindings;
}
