/**
 * Config module exports.
 */

export type { ConfigFile, MergedConfig, LLMProviderKind, LogLevel } from './config-schema.js';
export { DEFAULT_CONFIG, CONFIG_FILE_VERSION, configFileSchema } from './config-schema.js';
export { ConfigLoader, loadConfig, DEFAULT_CONFIG_FILE } from './config-loader.js';
export type { ConfigLoaderOptions } from './config-loader.js';
