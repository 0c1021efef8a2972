#!/usr/bin/env node
/**
 * Storage MCP Gateway
 *
 * Exposes storage-appliance administration operations as a gated MCP tool
 * catalog over JSON-RPC/HTTP. Each `tools/list` is narrowed by task type,
 * natural-language intent, caller scope, a tool-count cap and a blocklist,
 * and sized against a fixed context budget.
 */

import { ApplianceHttpClient } from './client/appliance-client.js';
import { loadSettings, type GatewaySettings } from './config/settings.js';
import { HTTP_DEFAULTS, SERVER_NAME, SERVER_VERSION } from './constants.js';
import { ConfigError, Errors } from './errors/index.js';
import { createGateway } from './server/gateway.js';
import { logger, LogLevel } from './utils/logger.js';

/**
 * Print usage instructions
 */
function printUsage(): void {
  console.error(`
${SERVER_NAME} v${SERVER_VERSION}
Gated MCP tool server for storage appliances

USAGE:
  node dist/index.js [OPTIONS]

OPTIONS:
  --port=PORT      HTTP port (default: PORT or ${HTTP_DEFAULTS.PORT})
  --debug          Enable debug logging
  --help           Show this help message

ENVIRONMENT:
  MCP_ACCESS_TOKEN / TOKEN_SCOPES / JWT_SECRET   Caller credentials (one is required)
  APPLIANCE_URL, APPLIANCE_API_KEY               Appliance API endpoint and key
  FILTER_CONFIG_PATH                             Gating config (default: filter-config.json)
  INTENT_PRECEDENCE=intent|explicit              Which task-type source wins
  STRICT_CONTEXT_LIMIT=true                      Reject listings over the context budget

EXAMPLES:
  node dist/index.js --port=8080
  curl -H "Authorization: Bearer $MCP_ACCESS_TOKEN" \\
       -d '{"jsonrpc":"2.0","id":1,"method":"tools/list","params":{"query":"show me my zfs pools"}}' \\
       http://localhost:8080/mcp
`);
}

function resolvePort(args: string[], settings: GatewaySettings): number {
  const portArg = args.find(arg => arg.startsWith('--port='));
  if (!portArg) {
    return settings.port;
  }
  const port = Number.parseInt(portArg.slice('--port='.length), 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw Errors.invalidConfig('--port', `"${portArg}" is not a valid port`);
  }
  return port;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  let settings: GatewaySettings;
  let port: number;
  try {
    settings = loadSettings();
    port = resolvePort(args, settings);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Invalid configuration', { error: error.message, details: error.details });
      process.exit(1);
    }
    throw error;
  }

  logger.setLevel(args.includes('--debug') ? LogLevel.DEBUG : settings.logLevel);

  logger.info(`${SERVER_NAME} v${SERVER_VERSION} starting`, {
    transport: settings.transport,
    nodeVersion: process.version,
    platform: process.platform
  });

  const applianceUrl = settings.appliance.url;
  if (!applianceUrl) {
    logger.error('Invalid configuration', { error: 'APPLIANCE_URL must be set' });
    process.exit(1);
  }

  const client = new ApplianceHttpClient({ ...settings.appliance, url: applianceUrl });
  const gateway = createGateway(settings, client);

  const server = gateway.app.listen(port);
  await new Promise<void>((resolve, reject) => {
    server.once('listening', resolve);
    server.once('error', reject);
  });

  const address = server.address();
  const boundPort = address !== null && typeof address === 'object' ? address.port : port;
  logger.serverStarted(settings.transport, {
    port: boundPort,
    version: SERVER_VERSION,
    tools: gateway.registry.size,
    estimator: gateway.gate.estimatorMode,
    endpoints: {
      mcp: `POST http://localhost:${boundPort}${HTTP_DEFAULTS.MCP_PATH}`,
      health: `GET http://localhost:${boundPort}/health`,
      metrics: `GET http://localhost:${boundPort}/metrics`
    }
  });

  const shutdown = (reason: string) => {
    logger.serverStopped(reason);
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', {
      error: error.message,
      stack: error.stack
    });
    shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', {
      reason: reason instanceof Error ? reason.message : String(reason)
    });
  });
}

main().catch((error: unknown) => {
  logger.error('Fatal error', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined
  });
  process.exit(1);
});
