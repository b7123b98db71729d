#!/usr/bin/env node
/**
 * Session Relay CLI
 *
 * Starts the OpenAI-compatible relay server.
 *
 * Usage:
 *   chat-session-relay [options]
 *
 * Options:
 *   --port <number>    Port to listen on (default: 8000, or PORT)
 *   --host <string>    Host to bind to (default: 0.0.0.0, or HOST)
 *   -v, --verbose      Log every request and response
 *   -h, --help         Show this help message
 *
 * Environment Variables:
 *   AGENT_APP_KEY, AGENT_VISITOR_KEY   Agent backend keys (model "deepseek-r1")
 *   AGENT_BASE_URL                     Agent backend origin
 *   CREDENTIAL_TOKEN                   Credential backend token (model "ibit")
 *   CREDENTIAL_BASE_URL                Credential backend origin
 *   CREDENTIAL_ASSISTANT_ID            Assistant id sent upstream (default: 43)
 *   CREDENTIAL_KEEPALIVE_INTERVAL      Seconds between login checks (default: 60, 0 disables)
 *   API_KEY                            Require `Authorization: Bearer <API_KEY>`
 *   PRINT_STATISTICS_INTERVAL          Seconds between statistics reports (0 disables)
 *   TEARDOWN_TIMEOUT_MS                Upper bound on session teardown
 *   VERBOSE                            Same as --verbose
 *
 * @packageDocumentation
 */

import type * as http from 'node:http';
import { buildModelBindings, loadConfig } from './config.js';
import { defaultLogger } from './logger.js';
import { ChatRelay } from './relay.js';
import { startServer } from './server.js';
import { StatsCollector } from './stats.js';

function printHelp(): void {
  console.log(`
Session Relay - OpenAI-compatible relay for session-oriented chat backends

Usage:
  chat-session-relay [options]

Options:
  --port <number>    Port to listen on (default: 8000)
  --host <string>    Host to bind to (default: 0.0.0.0)
  -v, --verbose      Log every request and response
  -h, --help         Show this help message
`);
}

interface CliArgs {
  port?: number;
  host?: string;
  verbose: boolean;
  help: boolean;
}

function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { verbose: false, help: false };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-h' || arg === '--help') {
      parsed.help = true;
    } else if (arg === '-v' || arg === '--verbose') {
      parsed.verbose = true;
    } else if (arg === '--port') {
      const port = parseInt(args[++i] ?? '', 10);
      if (isNaN(port) || port < 1 || port > 65535) {
        throw new Error('Invalid port number');
      }
      parsed.port = port;
    } else if (arg === '--host') {
      const host = args[++i];
      if (!host) throw new Error('--host requires a value');
      parsed.host = host;
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
  }
  return parsed;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    return;
  }

  const config = loadConfig();
  const logger = defaultLogger;
  const stats = new StatsCollector();

  const relay = new ChatRelay({
    models: buildModelBindings(config, { logger }),
    apiKey: config.apiKey,
    logger,
    stats,
    verbose: args.verbose || config.verbose,
    options: { teardownTimeoutMs: config.teardownTimeoutMs },
  });

  // Clear leftover agent conversations and verify the credential login
  await relay.init();

  const server = await startServer(relay, {
    port: args.port ?? config.port,
    host: args.host ?? config.host,
    logger,
    stats,
  });

  let statsTimer: ReturnType<typeof setInterval> | null = null;
  if (config.statisticsIntervalSec > 0) {
    statsTimer = setInterval(() => console.log(`\n${stats.formatStats()}\n`), config.statisticsIntervalSec * 1000);
    statsTimer.unref();
  }

  registerShutdown(server, () => {
    if (statsTimer) clearInterval(statsTimer);
    relay.close();
  });
}

// Graceful shutdown
function registerShutdown(server: http.Server, cleanup: () => void): void {
  const shutdown = () => {
    defaultLogger.info('Shutting down...');
    cleanup();
    server.close(() => {
      process.exit(0);
    });
    // Force exit after 5s
    setTimeout(() => process.exit(1), 5000).unref();
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err: unknown) => {
  console.error('Failed to start relay:', err instanceof Error ? err.message : err);
  process.exit(1);
});
