import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigLoader } from '../../../src/config/config-loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/config-schema.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('ConfigLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dietary-bot-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const writeConfig = (content: unknown): Promise<void> =>
    writeFile(join(dir, 'bot.json'), typeof content === 'string' ? content : JSON.stringify(content));

  it('uses defaults when there is no file and no env', async () => {
    const config = await new ConfigLoader(dir, {}).load();

    expect(config.defaultTimezone).toBe('UTC');
    expect(config.dialogue).toEqual({ sessionTimeoutMinutes: 15, recentMessageLimit: 50, diaryLimit: 10 });
    expect(config.reminders).toEqual({ tickIntervalSeconds: 30, retryWindowMinutes: 30 });
    expect(config.telegramBotToken).toBeNull();
    expect(config.databaseUrl).toBeNull();
    expect(config.paths.config).toBe(dir);
  });

  it('reads the config file and fills in missing fields', async () => {
    await writeConfig({ version: 1, defaultTimezone: 'Europe/Berlin', dialogue: { sessionTimeoutMinutes: 20 } });

    const loader = new ConfigLoader(dir, {});
    const config = await loader.load();

    expect(config.defaultTimezone).toBe('Europe/Berlin');
    expect(config.dialogue).toEqual({ sessionTimeoutMinutes: 20, recentMessageLimit: 50, diaryLimit: 10 });
    expect(config.ledger).toEqual(DEFAULT_CONFIG.ledger);
    expect(loader.getLoadedConfigFile()?.defaultTimezone).toBe('Europe/Berlin');
  });

  it('lets the environment win over the file', async () => {
    await writeConfig({ defaultTimezone: 'Europe/Berlin', reminders: { tickIntervalSeconds: 10 } });

    const config = await new ConfigLoader(dir, {
      TELEGRAM_BOT_TOKEN: 'test-token',
      DATABASE_URL: 'postgres://localhost/test',
      OPENROUTER_API_KEY: 'test-key',
      NUTRITION_MODEL: 'test/model',
      DEFAULT_TIMEZONE: 'Asia/Tokyo',
      LOG_LEVEL: 'DEBUG',
      SESSION_TIMEOUT_MINUTES: '5',
      REMINDER_TICK_SECONDS: '60',
      NODE_ENV: 'production',
    }).load();

    expect(config.telegramBotToken).toBe('test-token');
    expect(config.databaseUrl).toBe('postgres://localhost/test');
    expect(config.openRouterApiKey).toBe('test-key');
    expect(config.llm.model).toBe('test/model');
    expect(config.defaultTimezone).toBe('Asia/Tokyo');
    expect(config.logging.level).toBe('debug');
    expect(config.logging.pretty).toBe(false);
    expect(config.dialogue.sessionTimeoutMinutes).toBe(5);
    expect(config.reminders.tickIntervalSeconds).toBe(60);
  });

  it('moves data paths under DATA_PATH', async () => {
    const config = await new ConfigLoader(dir, { DATA_PATH: '/srv/bot' }).load();

    expect(config.paths.data).toBe('/srv/bot');
    expect(config.paths.logs).toBe(join('/srv/bot', 'logs'));
    expect(config.nutrition.catalogPath).toBe(join('/srv/bot', 'foods.json'));
  });

  it('does not modify the defaults', async () => {
    await new ConfigLoader(dir, { DEFAULT_TIMEZONE: 'Asia/Tokyo', NUTRITION_MODEL: 'test/model' }).load();

    expect(DEFAULT_CONFIG.defaultTimezone).toBe('UTC');
    expect(DEFAULT_CONFIG.llm.model).toBe('openai/gpt-4o-mini');
  });

  describe('invalid input', () => {
    it('rejects malformed JSON', async () => {
      await writeConfig('{ not json');
      await expect(new ConfigLoader(dir, {}).load()).rejects.toThrow(/is not valid JSON/);
    });

    it('names the offending field', async () => {
      await writeConfig({ dialogue: { sessionTimeoutMinutes: -1 } });
      await expect(new ConfigLoader(dir, {}).load()).rejects.toThrow(/dialogue\.sessionTimeoutMinutes/);
    });

    it('rejects a newer file version', async () => {
      await writeConfig({ version: 2 });
      await expect(new ConfigLoader(dir, {}).load()).rejects.toThrow(
        'Config file version (2) is newer than supported (1)'
      );
    });

    it('rejects an unknown timezone in the file', async () => {
      await writeConfig({ defaultTimezone: 'Europe/Berln' });
      await expect(new ConfigLoader(dir, {}).load()).rejects.toThrow(
        `Invalid config file ${join(dir, 'bot.json')}: defaultTimezone: Unknown IANA timezone`
      );
    });

    it('rejects an unknown timezone in the environment', async () => {
      await expect(new ConfigLoader(dir, { DEFAULT_TIMEZONE: 'Europe/Berln' }).load()).rejects.toThrow(
        'DEFAULT_TIMEZONE must be an IANA timezone, got "Europe/Berln"'
      );
    });

    it('rejects an unknown log level', async () => {
      await expect(new ConfigLoader(dir, { LOG_LEVEL: 'loud' }).load()).rejects.toBeInstanceOf(ConfigError);
    });

    it('rejects a non-positive number', async () => {
      await expect(new ConfigLoader(dir, { SESSION_TIMEOUT_MINUTES: '0' }).load()).rejects.toThrow(
        'SESSION_TIMEOUT_MINUTES must be a positive number, got "0"'
      );
    });
  });
});
