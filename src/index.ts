#!/usr/bin/env node
/**
 * Crypto Signal Watcher
 *
 * Entry point for the application.
 * Handles process signals for graceful shutdown.
 */

import { App } from './app.js';
import { USAGE, parseCliArgs } from './cli.js';
import { loadConfig, loadEnvFile } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { logger } from './logger.js';

let app: App | null = null;

// Graceful shutdown handler
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, initiating graceful shutdown...`);

  try {
    if (app) {
      await app.stop(`Received ${signal}`);
    }
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error: errorMessage(error) });
    process.exit(1);
  }
}

// Register signal handlers
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  shutdown('uncaughtException').catch(() => process.exit(1));
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: errorMessage(reason) });
});

async function main(): Promise<void> {
  try {
    const cli = parseCliArgs(process.argv.slice(2));
    if (cli.help) {
      console.log(USAGE);
      process.exit(0);
    }

    loadEnvFile();
    const config = loadConfig(process.env, cli.overrides);
    logger.level = config.logging.level;

    logger.info('='.repeat(50));
    logger.info(`Crypto Signal Watcher: ${config.pair.symbol}`);
    logger.info('='.repeat(50));

    app = new App(config);
    await app.start();

    // Log status periodically
    setInterval(() => {
      if (app) {
        logger.debug('Application status', app.getStatus());
      }
    }, 60000).unref();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error('Invalid configuration', { key: error.key, error: error.message });
    } else {
      logger.error('Failed to start application', { error: errorMessage(error) });
    }
    process.exit(1);
  }
}

void main();
