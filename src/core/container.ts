import type { Logger } from '../types/logger.js';
import type { BotConfig } from '../config/index.js';
import { loadConfig } from '../config/index.js';
import type { Gateway } from '../ports/gateway.js';
import type { PersistenceAdapter } from '../ports/persistence.js';
import { createTelegramGateway } from '../channels/index.js';
import { createMemoryStore } from '../storage/memory-store.js';
import { createPostgresStore } from '../storage/postgres-store.js';
import { type FoodCatalog, loadFoodCatalog } from '../nutrition/food-catalog.js';
import { type NutritionEstimator, createOpenRouterEstimator } from '../nutrition/nutrition-estimator.js';
import { createNutritionResolver } from '../nutrition/nutrition-resolver.js';
import { type DietAdvisor, createOpenRouterAdvisor } from '../nutrition/diet-advisor.js';
import { type NutritionLedger, createNutritionLedger } from '../ledger/ledger.js';
import {
  type DialogueService,
  type DialogueServiceDeps,
  createDialogueService,
} from '../dialogue/dialogue-service.js';
import { type ReminderScheduler, createReminderScheduler } from '../reminders/reminder-scheduler.js';
import { ConfigError, errorMessage } from './errors.js';
import { type Dispatcher, createDispatcher } from './dispatcher.js';
import { createLogger } from './logger.js';

/**
 * Container holding all application dependencies.
 */
export interface Container {
  config: BotConfig;
  logger: Logger;
  store: PersistenceAdapter;
  gateway: Gateway;
  catalog: FoodCatalog;
  ledger: NutritionLedger;
  dialogue: DialogueService;
  scheduler: ReminderScheduler;
  dispatcher: Dispatcher;
  /** Start receiving messages and ticking reminders */
  start(): Promise<void>;
  /** Stop intake, finish in-flight work, release storage */
  shutdown(): Promise<void>;
}

/**
 * Replacements for the pieces that talk to the outside world.
 */
export interface ContainerOverrides {
  logger?: Logger;
  store?: PersistenceAdapter;
  gateway?: Gateway;
  estimator?: NutritionEstimator | null;
  advisor?: DietAdvisor | null;
  now?: () => Date;
}

async function createStore(config: BotConfig, logger: Logger): Promise<PersistenceAdapter> {
  if (!config.databaseUrl) {
    logger.warn('DATABASE_URL not set, using in-memory storage (data is lost on restart)');
    return createMemoryStore();
  }

  const store = createPostgresStore(config.databaseUrl, logger);
  try {
    await store.migrate(config.persistence.schemaPath);
  } catch (error) {
    await store.close();
    throw error;
  }
  logger.info('PostgreSQL storage initialized');
  return store;
}

function createEstimator(config: BotConfig, logger: Logger): NutritionEstimator | null {
  if (!config.openRouterApiKey) {
    logger.info('OPENROUTER_API_KEY not set, nutrition estimates and dietitian answers disabled');
    return null;
  }
  logger.info({ model: config.llm.model }, 'Nutrition estimator configured');
  return createOpenRouterEstimator(
    {
      apiKey: config.openRouterApiKey,
      model: config.llm.model,
      timeoutMs: config.llm.timeoutMs,
      appName: config.llm.appName,
    },
    logger
  );
}

function createAdvisor(config: BotConfig, logger: Logger): DietAdvisor | null {
  if (!config.openRouterApiKey) {
    return null;
  }
  return createOpenRouterAdvisor(
    {
      apiKey: config.openRouterApiKey,
      model: config.llm.model,
      timeoutMs: config.llm.adviceTimeoutMs,
      appName: config.llm.appName,
      maxAnswerTokens: config.llm.maxAnswerTokens,
    },
    logger
  );
}

function createGateway(config: BotConfig, logger: Logger): Gateway {
  if (!config.telegramBotToken) {
    throw new ConfigError('TELEGRAM_BOT_TOKEN is required');
  }
  return createTelegramGateway(
    { botToken: config.telegramBotToken, sendAttempts: config.telegram.sendAttempts },
    logger
  );
}

/**
 * Build the application from a loaded configuration.
 */
export async function createContainer(config: BotConfig, overrides: ContainerOverrides = {}): Promise<Container> {
  const logger: Logger =
    overrides.logger ??
    createLogger({
      logDir: config.paths.logs,
      maxFiles: config.logging.maxFiles,
      level: config.logging.level,
      pretty: config.logging.pretty,
    });

  const gateway = overrides.gateway ?? createGateway(config, logger);
  const catalog = await loadFoodCatalog(config.nutrition.catalogPath, config.nutrition.matchThreshold);
  logger.info({ foods: catalog.size, path: config.nutrition.catalogPath }, 'Food catalog loaded');

  const estimator = overrides.estimator === undefined ? createEstimator(config, logger) : overrides.estimator;
  const advisor = overrides.advisor === undefined ? createAdvisor(config, logger) : overrides.advisor;
  const store = overrides.store ?? (await createStore(config, logger));

  const ledger = createNutritionLedger(
    store,
    logger,
    {
      maxQuantity: config.ledger.maxQuantity,
      maxDescriptionLength: config.ledger.maxDescriptionLength,
      clockSkewMs: config.ledger.clockSkewMinutes * 60_000,
    },
    overrides.now
  );
  const resolver = createNutritionResolver(catalog, estimator, logger);

  const dialogueDeps: DialogueServiceDeps = { store, ledger, resolver, gateway, logger, advisor };
  if (overrides.now) dialogueDeps.now = overrides.now;
  const dialogue = createDialogueService(dialogueDeps, {
    sessionTimeoutMs: config.dialogue.sessionTimeoutMinutes * 60_000,
    recentMessageLimit: config.dialogue.recentMessageLimit,
    diaryLimit: config.dialogue.diaryLimit,
    defaultTimezone: config.defaultTimezone,
    limits: {
      maxDescriptionLength: config.ledger.maxDescriptionLength,
      maxQuantity: config.ledger.maxQuantity,
    },
    retry: {
      attempts: config.persistence.retryAttempts,
      baseDelayMs: config.persistence.retryBaseDelayMs,
      maxDelayMs: config.persistence.retryMaxDelayMs,
    },
  });

  const scheduler = createReminderScheduler(
    store,
    gateway,
    logger,
    {
      tickIntervalMs: config.reminders.tickIntervalSeconds * 1000,
      retryWindowMs: config.reminders.retryWindowMinutes * 60_000,
      defaultTimezone: config.defaultTimezone,
    },
    overrides.now
  );

  const dispatcher = createDispatcher(gateway, dialogue, logger);

  const start = async (): Promise<void> => {
    await gateway.start();
    dispatcher.start();
    scheduler.start();
    logger.info({ gateway: gateway.name, storage: store.name }, 'Dietary bot started');
  };

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    try {
      await gateway.stop();
      await dispatcher.stop();
      await scheduler.stop();
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error while stopping');
    }
    await store.close();
    logger.info('Shutdown complete');
  };

  return { config, logger, store, gateway, catalog, ledger, dialogue, scheduler, dispatcher, start, shutdown };
}

/**
 * Load configuration from file and environment, then build the application.
 */
export async function createContainerAsync(overrides: ContainerOverrides = {}): Promise<Container> {
  const config = await loadConfig();
  return createContainer(config, overrides);
}
