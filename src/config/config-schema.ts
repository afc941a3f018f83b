import { z } from 'zod';
import { isValidTimezone } from '../nutrition/aggregation.js';

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const logLevelSchema = z.enum(LOG_LEVELS);

/**
 * Bot configuration file schema (data/config/bot.json).
 *
 * Every field is optional; parsing fills in the defaults, so
 * `configFileSchema.parse({})` yields the complete default configuration.
 * Secrets (bot token, database URL, API key) are never read from the file.
 */
export const configFileSchema = z.object({
  /** Schema version for migrations */
  version: z.number().int().positive().default(CONFIG_FILE_VERSION),

  /** IANA timezone given to new users */
  defaultTimezone: z
    .string()
    .refine(isValidTimezone, { message: 'Unknown IANA timezone' })
    .default('UTC'),

  dialogue: z
    .object({
      /** Non-idle sessions older than this are reset */
      sessionTimeoutMinutes: z.number().positive().default(15),
      /** Inbound message IDs remembered per user for duplicate suppression */
      recentMessageLimit: z.number().int().positive().default(50),
      /** Entries shown by the diary command */
      diaryLimit: z.number().int().positive().default(10),
    })
    .default({}),

  ledger: z
    .object({
      /** How far in the future eatenAt may be */
      clockSkewMinutes: z.number().nonnegative().default(5),
      maxQuantity: z.number().positive().default(100_000),
      maxDescriptionLength: z.number().int().positive().default(200),
    })
    .default({}),

  persistence: z
    .object({
      retryAttempts: z.number().int().positive().default(3),
      retryBaseDelayMs: z.number().int().nonnegative().default(200),
      retryMaxDelayMs: z.number().int().nonnegative().default(2_000),
      /** SQL schema applied at startup (Postgres only) */
      schemaPath: z.string().default('db/schema.sql'),
    })
    .default({}),

  reminders: z
    .object({
      tickIntervalSeconds: z.number().positive().default(30),
      /** Occurrences older than this are recorded as missed */
      retryWindowMinutes: z.number().positive().default(30),
    })
    .default({}),

  nutrition: z
    .object({
      catalogPath: z.string().default('data/foods.json'),
      /** Minimum name similarity (0-1) for a catalog match */
      matchThreshold: z.number().min(0).max(1).default(0.8),
    })
    .default({}),

  llm: z
    .object({
      /** Model used for nutrition estimates and dietitian answers */
      model: z.string().default('openai/gpt-4o-mini'),
      timeoutMs: z.number().int().positive().default(15_000),
      /** Time allowed for a dietitian answer or meal plan */
      adviceTimeoutMs: z.number().int().positive().default(60_000),
      maxAnswerTokens: z.number().int().positive().default(500),
      /** App name for API tracking */
      appName: z.string().default('DietaryBot'),
    })
    .default({}),

  telegram: z
    .object({
      sendAttempts: z.number().int().positive().default(3),
    })
    .default({}),

  logging: z
    .object({
      level: logLevelSchema.default('info'),
      pretty: z.boolean().default(true),
      maxFiles: z.number().int().positive().default(10),
    })
    .default({}),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Merged application configuration.
 *
 * Priority (lowest to highest):
 * 1. Hardcoded defaults
 * 2. Config file values
 * 3. Environment variables
 */
export interface BotConfig extends ConfigFile {
  /** Telegram bot token (env only; required to start) */
  telegramBotToken: string | null;
  /** PostgreSQL connection string; in-process store when null */
  databaseUrl: string | null;
  /** OpenRouter key; nutrition estimates are disabled when null */
  openRouterApiKey: string | null;

  paths: {
    data: string;
    config: string;
    logs: string;
  };
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: BotConfig = {
  ...configFileSchema.parse({}),
  telegramBotToken: null,
  databaseUrl: null,
  openRouterApiKey: null,
  paths: {
    data: 'data',
    config: 'data/config',
    logs: 'data/logs',
  },
};
