import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { BotConfig, ConfigFile } from './config-schema.js';
import { CONFIG_FILE_VERSION, DEFAULT_CONFIG, configFileSchema, logLevelSchema } from './config-schema.js';
import { ConfigError } from '../core/errors.js';
import { isValidTimezone } from '../nutrition/aggregation.js';

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file (data/config/bot.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: ConfigFile | null = null;

  constructor(configPath = 'data/config', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Load and merge configuration from all sources.
   */
  async load(): Promise<BotConfig> {
    this.loadedConfig = await this.loadConfigFile();

    const config: BotConfig = {
      ...structuredClone(DEFAULT_CONFIG),
      ...(this.loadedConfig ? structuredClone(this.loadedConfig) : {}),
      paths: { ...DEFAULT_CONFIG.paths, config: this.configPath },
    };

    this.mergeEnvironment(config);
    return config;
  }

  /**
   * Get the parsed config file (for debugging).
   */
  getLoadedConfigFile(): ConfigFile | null {
    return this.loadedConfig;
  }

  private async loadConfigFile(): Promise<ConfigFile | null> {
    const filePath = join(this.configPath, 'bot.json');

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // No file: defaults apply
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to read config file ${filePath}: ${message}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Config file ${filePath} is not valid JSON: ${message}`);
    }

    const result = configFileSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid config file ${filePath}: ${issues}`);
    }

    if (result.data.version > CONFIG_FILE_VERSION) {
      throw new ConfigError(
        `Config file version (${String(result.data.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return result.data;
  }

  /**
   * Override config with environment variables.
   */
  private mergeEnvironment(config: BotConfig): void {
    // Secrets (always from env)
    const telegramToken = this.env['TELEGRAM_BOT_TOKEN'];
    if (telegramToken) {
      config.telegramBotToken = telegramToken;
    }

    const databaseUrl = this.env['DATABASE_URL'];
    if (databaseUrl) {
      config.databaseUrl = databaseUrl;
    }

    const openRouterKey = this.env['OPENROUTER_API_KEY'];
    if (openRouterKey) {
      config.openRouterApiKey = openRouterKey;
    }

    const model = this.env['NUTRITION_MODEL'];
    if (model) {
      config.llm.model = model;
    }

    const timezone = this.env['DEFAULT_TIMEZONE'];
    if (timezone) {
      if (!isValidTimezone(timezone)) {
        throw new ConfigError(`DEFAULT_TIMEZONE must be an IANA timezone, got "${timezone}"`);
      }
      config.defaultTimezone = timezone;
    }

    const logLevel = this.env['LOG_LEVEL'];
    if (logLevel) {
      const parsed = logLevelSchema.safeParse(logLevel.toLowerCase());
      if (!parsed.success) {
        throw new ConfigError(`LOG_LEVEL must be one of ${logLevelSchema.options.join(', ')}`);
      }
      config.logging.level = parsed.data;
    }

    const sessionTimeout = this.readPositiveNumber('SESSION_TIMEOUT_MINUTES');
    if (sessionTimeout !== null) {
      config.dialogue.sessionTimeoutMinutes = sessionTimeout;
    }

    const tickSeconds = this.readPositiveNumber('REMINDER_TICK_SECONDS');
    if (tickSeconds !== null) {
      config.reminders.tickIntervalSeconds = tickSeconds;
    }

    if (this.env['NODE_ENV'] === 'production') {
      config.logging.pretty = false;
    }

    // Data paths
    const dataPath = this.env['DATA_PATH'];
    if (dataPath) {
      config.paths.data = dataPath;
      config.paths.logs = join(dataPath, 'logs');
      config.nutrition.catalogPath = join(dataPath, 'foods.json');
    }
  }

  private readPositiveNumber(name: string): number | null {
    const value = this.env[name];
    if (!value) return null;
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new ConfigError(`${name} must be a positive number, got "${value}"`);
    }
    return parsed;
  }
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(configPath?: string): Promise<BotConfig> {
  return createConfigLoader(configPath).load();
}
