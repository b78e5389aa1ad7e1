/**
 * Homework Status Bot
 *
 * Entry point for the application.
 * Checks the tokens, then polls until the process is stopped.
 */

import { App } from './app.js';
import { config, credentialsFrom } from './config.js';
import { checkTokens, findMissingCredentials } from './credentials.js';
import { logger, logCritical } from './logger.js';

const credentials = credentialsFrom(config);
if (!checkTokens(credentials)) {
  logCritical('Отсутствуют обязательные переменные окружения', {
    missing: findMissingCredentials(credentials),
  });
  process.exit(1);
}

// Create application instance
const app = new App(config);

// Graceful shutdown handler
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, initiating graceful shutdown...`);

  try {
    await app.stop(`Received ${signal}`);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

// Register signal handlers
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

async function main(): Promise<void> {
  // Log status periodically
  const statusTimer = setInterval(() => {
    logger.debug('Application status', app.getStatus());
  }, 60000); // Every minute

  try {
    await app.run();
  } finally {
    clearInterval(statusTimer);
  }
}

main().catch((error: unknown) => {
  logger.error('Bot terminated', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
