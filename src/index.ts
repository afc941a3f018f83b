/**
 * Dietary bot - Telegram food diary with nutrition summaries and reminders.
 *
 * Entry point for the application.
 */

import 'dotenv/config';

import { createContainerAsync, type Container } from './core/container.js';

let container: Container | undefined;
let isShuttingDown = false;

async function main(): Promise<void> {
  // Loads config, opens storage and the food catalog
  container = await createContainerAsync();

  const { logger, config } = container;
  logger.info(
    {
      storage: container.store.name,
      foods: container.catalog.size,
      estimator: config.openRouterApiKey ? config.llm.model : null,
      defaultTimezone: config.defaultTimezone,
    },
    'Dietary bot starting...'
  );

  await container.start();
}

// Handle shutdown gracefully
async function shutdown(exitCode = 0): Promise<void> {
  if (isShuttingDown) {
    return; // Already shutting down, ignore duplicate signals
  }
  isShuttingDown = true;

  if (container) {
    await container.shutdown();
  }
  process.exit(exitCode);
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

process.on('uncaughtException', (error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Uncaught exception:', error);
  void shutdown(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Unhandled rejection:', reason);
  void shutdown(1);
});

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start:', error);
  process.exit(1);
});
