#!/usr/bin/env node
/**
 * Proxy CLI
 *
 * Usage:
 *   compat-proxy [options]
 *
 * Options:
 *   --port <number>    Port to listen on (default: 4000)
 *   --host <string>    Host to bind to (default: 0.0.0.0)
 *   --config <path>    JSON config file (default: $PROXY_CONFIG)
 *   -v, --verbose      Enable verbose logging
 *   -h, --help         Show this help message
 *   --version          Show version
 *
 * @packageDocumentation
 */

import { config as loadDotenv } from 'dotenv';
import { CliUsageError, parseCliArgs, type CliOptions } from './cli-args.js';
import { checkEnvironment, loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { ProviderRegistry } from './providers/registry.js';
import { createProxyServer } from './server.js';
import { VERSION } from './version.js';

const SHUTDOWN_TIMEOUT_MS = 5_000;

function printHelp(): void {
  console.log(`
compat-proxy v${VERSION} - OpenAI-compatible routing proxy

Usage:
  compat-proxy [options]

Options:
  --port <number>    Port to listen on (default: 4000)
  --host <string>    Host to bind to (default: 0.0.0.0)
  --config <path>    JSON config file (default: $PROXY_CONFIG)
  -v, --verbose      Enable verbose logging
  -h, --help         Show this help message
  --version          Show version

Environment Variables:
  OPENAI_API_KEY         OpenAI API key
  OPENAI_BASE_URL        OpenAI base URL (optional)
  OPENAI_ORGANIZATION    OpenAI organization (optional)
  AZURE_ENDPOINT         Azure OpenAI endpoint
  AZURE_OPENAI_API_KEY   Azure OpenAI API key
  AZURE_DEPLOYMENT       Azure deployment name (optional)
  AZURE_API_VERSION      Azure API version (default: 2024-02-15-preview)
  USE_AZURE_IDENTITY     Authenticate to Azure with the identity chain
  AZURE_AD_TOKEN         Pre-issued Azure AD token, sent as a static bearer
                         (no identity chain, no refresh)
  MASTER_KEY             Key clients must present (default: sk-1234)
  PORT, HOST             Listen address
  PROXY_CONFIG           JSON config file
  PROXY_VERBOSE          Enable verbose logging

Example:
  OPENAI_API_KEY=... compat-proxy --port 4000

  # Point an OpenAI client at the proxy:
  # OPENAI_BASE_URL=http://localhost:4000/v1 OPENAI_API_KEY=$MASTER_KEY your-app
`);
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`);
      console.error('Run with --help for usage.');
      process.exit(1);
    }
    throw err;
  }

  if (options.help) {
    printHelp();
    return;
  }

  if (options.version) {
    console.log(VERSION);
    return;
  }

  loadDotenv();

  const config = loadConfig({ configPath: options.configPath });
  if (options.port !== undefined) config.port = options.port;
  if (options.host !== undefined) config.host = options.host;
  if (options.verbose) config.verbose = true;

  const logger = createLogger({ verbose: config.verbose });
  logger.info(`compat-proxy v${VERSION}`);

  if (!checkEnvironment(config, logger)) {
    process.exit(1);
  }

  const registry = ProviderRegistry.fromConfig(config, { logger });
  const server = createProxyServer(config, registry, logger);
  await server.start();

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);

    const timer = setTimeout(() => {
      logger.warn('Shutdown timed out, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    timer.unref();

    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Error during shutdown:', err);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error('Failed to start proxy:', err instanceof Error ? err.message : err);
  process.exit(1);
});
