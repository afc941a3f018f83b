/**
 * Config module exports.
 */

export type { BotConfig, ConfigFile, LogLevel } from './config-schema.js';
export { DEFAULT_CONFIG, CONFIG_FILE_VERSION, configFileSchema } from './config-schema.js';
export { ConfigLoader, createConfigLoader, loadConfig } from './config-loader.js';
