/**
 * Relay tuning options and their defaults.
 * @packageDocumentation
 */

export interface RelayOptions {
  /** Ms to wait on a session teardown before abandoning it (default: 5000) */
  teardownTimeoutMs: number;
  /** Events buffered between the upstream reader and the client writer (default: 16) */
  channelCapacity: number;
  /** `owned_by` reported in the models listing */
  ownedBy: string;
}

export const DEFAULT_RELAY_OPTIONS: RelayOptions = {
  teardownTimeoutMs: 5_000,
  channelCapacity: 16,
  ownedBy: 'session-relay',
};

export function resolveRelayOptions(partial?: Partial<RelayOptions>): RelayOptions {
  if (!partial) return { ...DEFAULT_RELAY_OPTIONS };
  return {
    teardownTimeoutMs: partial.teardownTimeoutMs ?? DEFAULT_RELAY_OPTIONS.teardownTimeoutMs,
    channelCapacity: partial.channelCapacity ?? DEFAULT_RELAY_OPTIONS.channelCapacity,
    ownedBy: partial.ownedBy ?? DEFAULT_RELAY_OPTIONS.ownedBy,
  };
}
