import type { Logger } from '../types/index.js';
import type { LLMProvider } from '../llm/provider.js';
import { createVercelAIProvider } from '../llm/vercel-ai-provider.js';
import { type MergedConfig, loadConfig } from '../config/index.js';
import { createConversationLogger, createLogger, setConversationLogger } from './logger.js';

/**
 * Options for building the application container.
 */
export interface ContainerOptions {
  configFile?: string | undefined;
  secretsDir?: string | undefined;
  /** Force debug logging */
  debug?: boolean;
}

/**
 * Wired application services.
 */
export interface Container {
  config: MergedConfig;
  logger: Logger;
  llm: LLMProvider;
}

/**
 * Build the model provider from merged configuration.
 */
export function createProviderFromConfig(config: MergedConfig, logger?: Logger): LLMProvider {
  return createVercelAIProvider(
    {
      kind: config.llm.provider,
      model: config.llm.model,
      apiKey: config.llm.apiKey,
      baseUrl: config.llm.baseUrl,
      appName: config.llm.appName,
      timeoutMs: config.llm.timeoutMs,
      maxRetries: config.llm.maxRetries,
    },
    logger
  );
}

/**
 * Load configuration and create the logger and model provider.
 *
 * @throws ConfigFault on invalid configuration
 */
export async function createContainer(options: ContainerOptions = {}): Promise<Container> {
  const config = await loadConfig({ configFile: options.configFile, secretsDir: options.secretsDir });
  if (options.debug) {
    config.logging.level = 'debug';
  }

  const logger = createLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
    logDir: config.logging.logDir,
    maxFiles: config.logging.maxFiles,
  });

  if (config.logging.conversationLog) {
    setConversationLogger(createConversationLogger(config.logging.logDir, config.logging.maxFiles));
  }

  const llm = createProviderFromConfig(config, logger);
  logger.debug(
    { provider: llm.name, model: config.llm.model, available: llm.isAvailable() },
    'Container ready'
  );

  return { config, logger, llm };
}
