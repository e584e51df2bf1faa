#!/usr/bin/env node
// Relay Service - Entry point

import { loadConfig } from './config.js';
import { FatalConfigError, describeError } from './errors.js';
import { createConsoleLogger } from './log.js';
import { ProcessSurface } from './process-surface.js';
import { Relay } from './relay.js';

const logger = createConsoleLogger();

async function main() {
  logger.info('[relay] Loading config...');
  const config = loadConfig();

  const command = config.surface.command;
  if (config.monitor.enabled && !command) {
    throw new FatalConfigError('Chat surface helper is required (SURFACE_COMMAND env or surface.command in config)');
  }

  const surface = new ProcessSurface({
    command: command ?? 'chat-surface',
    args: config.surface.args,
    requestTimeoutMs: config.surface.requestTimeoutMs,
    logger,
  });

  const relay = new Relay(config, { surface, logger });

  // Graceful shutdown
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`[relay] Received ${signal}, shutting down...`);
    try {
      await relay.stop();
    } catch (err) {
      logger.error(`[relay] Shutdown failed: ${describeError(err)}`);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await relay.start();
}

main().catch((err: unknown) => {
  if (err instanceof FatalConfigError) {
    logger.error(`[relay] Fatal configuration error: ${err.message}`);
    process.exit(1);
  }
  logger.error(`[relay] Fatal error: ${describeError(err)}`);
  process.exit(1);
});
