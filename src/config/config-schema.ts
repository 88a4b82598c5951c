import { z } from 'zod';

/** Current config file schema version. */
export const CONFIG_FILE_VERSION = 1;

export const LLM_PROVIDERS = ['openrouter', 'openai-compatible'] as const;
export type LLMProviderKind = (typeof LLM_PROVIDERS)[number];

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Config file schema (`ralph.json`). Every field is optional; defaults fill the rest.
 * API keys are not accepted here: they come from the secrets directory or the environment.
 */
export const configFileSchema = z
  .object({
    /** Schema version for migrations */
    version: z.number().int().positive().optional(),

    llm: z
      .object({
        provider: z.enum(LLM_PROVIDERS).optional(),
        model: z.string().min(1).optional(),
        /** Base URL for OpenAI-compatible servers (Ollama, LM Studio, vLLM) */
        baseUrl: z.string().url().optional(),
        temperature: z.number().min(0).max(2).optional(),
        maxTokens: z.number().int().positive().optional(),
        timeoutMs: z.number().int().positive().optional(),
        maxRetries: z.number().int().min(0).max(10).optional(),
        /** App name sent to OpenRouter for attribution */
        appName: z.string().min(1).optional(),
      })
      .strict()
      .optional(),

    loop: z
      .object({
        /** Default iteration budget when the CLI gives none */
        limit: z.number().int().positive().optional(),
        shellTimeoutMs: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),

    tools: z
      .object({
        /** Tool names offered to the model (empty = all) */
        allowed: z.array(z.string().min(1)).optional(),
      })
      .strict()
      .optional(),

    logging: z
      .object({
        level: z.enum(LOG_LEVELS).optional(),
        pretty: z.boolean().optional(),
        logDir: z.string().min(1).optional(),
        maxFiles: z.number().int().positive().optional(),
        /** Write model requests/responses to conversation-*.log */
        conversationLog: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Merged application configuration.
 *
 * Sources, lowest to highest priority:
 * 1. Hardcoded defaults
 * 2. Config file
 * 3. Secrets directory
 * 4. Environment variables
 */
export interface MergedConfig {
  llm: {
    provider: LLMProviderKind;
    model: string;
    baseUrl?: string | undefined;
    apiKey?: string | undefined;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    maxRetries: number;
    appName: string;
  };
  loop: {
    limit: number;
    shellTimeoutMs: number;
  };
  tools: {
    allowed: string[];
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
    logDir: string;
    maxFiles: number;
    conversationLog: boolean;
  };
}

export const DEFAULT_CONFIG: MergedConfig = {
  llm: {
    provider: 'openrouter',
    model: 'anthropic/claude-3.5-haiku',
    temperature: 0.7,
    maxTokens: 4096,
    timeoutMs: 60_000,
    maxRetries: 2,
    appName: 'ralph-loop',
  },
  loop: {
    limit: 1,
    shellTimeoutMs: 60_000,
  },
  tools: {
    allowed: [],
  },
  logging: {
    level: 'info',
    pretty: process.env['NODE_ENV'] !== 'production',
    logDir: './logs',
    maxFiles: 10,
    conversationLog: true,
  },
};
