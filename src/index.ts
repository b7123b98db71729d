/**
 * chat-session-relay
 *
 * OpenAI-compatible relay in front of session-oriented chat backends. Each
 * request gets its own upstream conversation, created before the query and
 * torn down afterwards, and the backend's reasoning/answer event stream is
 * remapped onto `chat.completion.chunk` records.
 *
 * @example
 * ```typescript
 * import { AgentBackend, ChatRelay, startServer } from 'chat-session-relay';
 *
 * const relay = new ChatRelay({
 *   models: [{ id: 'deepseek-r1', backend: new AgentBackend({ appKey, visitorKey }) }],
 * });
 * await startServer(relay, { port: 8000 });
 * ```
 *
 * @packageDocumentation
 */

// Orchestration
export { ChatRelay } from './relay.js';
export type { ChatRelayOptions, ModelBinding, PreparedRequest, RecordWriter } from './relay.js';
export { withSession } from './session.js';
export type { SessionOptions } from './session.js';

// Request shaping
export { normalizeMessages, extractTextContent, formatSystemPrompt } from './normalizer.js';
export { encodeHistory, composeQuery, HISTORY_MARKER, HISTORY_TRAILER } from './history.js';

// Streaming
export {
  demultiplex,
  readBody,
  parseLine,
  classifyAgentRecord,
  createThinkTagClassifier,
} from './stream/demux.js';
export type { RecordClassifier } from './stream/demux.js';
export { BoundedChannel, ChannelClosedError, pipeThroughChannel } from './stream/channel.js';
export {
  buildCompletion,
  createCompletionMeta,
  synthesizeStream,
  renderChunk,
  renderSseStream,
  encodeSseRecord,
  toChunk,
  STOP_CHUNK,
  SSE_DONE,
} from './synthesizer.js';
export type { CompletionMeta } from './synthesizer.js';

// Backends
export { AgentBackend, DEFAULT_AGENT_BASE_URL } from './backends/agent.js';
export type { AgentBackendOptions } from './backends/agent.js';
export {
  CredentialBackend,
  DEFAULT_CREDENTIAL_BASE_URL,
  DEFAULT_ASSISTANT_ID,
  DEFAULT_KEEP_ALIVE_INTERVAL_MS,
} from './backends/credential.js';
export type { CredentialBackendOptions } from './backends/credential.js';
export { TokenCache } from './backends/token-cache.js';
export { StaticTokenAuthenticator } from './backends/static-token.js';
export { collectAnswer, requireEvents } from './backends/types.js';
export type { ChatBackend, FetchFn } from './backends/types.js';

// Server
export { createRelayServer, startServer } from './server.js';
export type { RelayServerOptions, ListenOptions } from './server.js';

// Configuration
export { loadConfig, buildModelBindings, ConfigError, AGENT_MODEL_ID, CREDENTIAL_MODEL_ID } from './config.js';
export type { RelayServerConfig, BindingDeps } from './config.js';
export { resolveRelayOptions, DEFAULT_RELAY_OPTIONS } from './relay-config.js';
export type { RelayOptions } from './relay-config.js';

// Errors, logging, statistics
export {
  RelayError,
  ValidationError,
  AuthError,
  NotFoundError,
  UpstreamUnavailableError,
  toErrorEnvelope,
} from './errors.js';
export type { ErrorEnvelope, RelayErrorType } from './errors.js';
export { defaultLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export { StatsCollector, estimateTokens } from './stats.js';
export type { StatsSnapshot, ModelStats } from './stats.js';

export * from './types.js';
