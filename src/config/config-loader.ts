import { readFile, readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { ZodError } from 'zod';
import type { ConfigFile, MergedConfig } from './config-schema.js';
import { DEFAULT_CONFIG, CONFIG_FILE_VERSION, configFileSchema } from './config-schema.js';
import { ConfigFault, errorMessage, isMissingPathError } from '../runtime/loop/loop-errors.js';

/** Config file looked up in the current directory when none is given. */
export const DEFAULT_CONFIG_FILE = 'ralph.json';

/** API key file names inside the secrets directory, first match wins. */
const API_KEY_FILES = ['llm_api_key', 'openrouter_api_key'];

export interface ConfigLoaderOptions {
  /** Explicit config file; must exist when given */
  configFile?: string | undefined;
  /** Directory holding one file per secret */
  secretsDir?: string | undefined;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory searched for the default config file (default: cwd) */
  cwd?: string;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables (RALPH_*, OPENROUTER_API_KEY, LOG_LEVEL)
 * 2. Secrets directory
 * 3. Config file (ralph.json)
 * 4. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly options: ConfigLoaderOptions;

  constructor(options: ConfigLoaderOptions = {}) {
    this.options = options;
  }

  /**
   * Load and merge configuration from all sources.
   *
   * @throws ConfigFault on an unreadable or invalid source
   */
  async load(): Promise<MergedConfig> {
    const file = await this.loadConfigFile();

    const config = this.deepClone(DEFAULT_CONFIG);
    if (file) {
      this.mergeConfigFile(config, file);
    }

    const apiKey = await this.loadSecrets();
    if (apiKey) {
      config.llm.apiKey = apiKey;
    }

    this.mergeEnvironment(config);
    return config;
  }

  private async loadConfigFile(): Promise<ConfigFile | null> {
    const explicit = this.options.configFile;
    const filePath = explicit ?? join(this.options.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (!explicit && isMissingPathError(error)) {
        return null;
      }
      throw new ConfigFault(`Failed to load config file ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigFault(`Config file ${filePath} is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigFault(`Invalid config file ${filePath}: ${formatIssues(parsed.error)}`);
    }

    if (parsed.data.version !== undefined && parsed.data.version > CONFIG_FILE_VERSION) {
      throw new ConfigFault(
        `Config file version (${String(parsed.data.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return parsed.data;
  }

  /**
   * Read the API key from the secrets directory, if one is configured.
   */
  private async loadSecrets(): Promise<string | undefined> {
    const dir = this.options.secretsDir;
    if (!dir) return undefined;

    let entries: string[];
    try {
      entries = await readdir(resolve(dir));
    } catch (error) {
      throw new ConfigFault(`Secrets directory not readable: ${dir} (${errorMessage(error)})`);
    }

    for (const name of API_KEY_FILES) {
      if (!entries.includes(name)) continue;
      const value = (await readFile(join(dir, name), 'utf-8')).trim();
      if (value) return value;
    }
    return undefined;
  }

  private mergeConfigFile(config: MergedConfig, file: ConfigFile): void {
    if (file.llm) {
      config.llm = { ...config.llm, ...file.llm };
    }
    if (file.loop) {
      config.loop = { ...config.loop, ...file.loop };
    }
    if (file.tools?.allowed) {
      config.tools.allowed = [...file.tools.allowed];
    }
    if (file.logging) {
      config.logging = { ...config.logging, ...file.logging };
    }
  }

  /**
   * Override config with environment variables. Values go through the file
   * schema so a malformed number is reported the same way.
   */
  private mergeEnvironment(config: MergedConfig): void {
    const env = this.options.env ?? process.env;

    const apiKey = env['RALPH_LLM_API_KEY'] ?? env['OPENROUTER_API_KEY'];
    if (apiKey) {
      config.llm.apiKey = apiKey;
    }

    const llm: Record<string, unknown> = {};
    const loop: Record<string, unknown> = {};
    const logging: Record<string, unknown> = {};

    const setString = (target: Record<string, unknown>, key: string, name: string): void => {
      const value = env[name];
      if (value) target[key] = value;
    };
    const setNumber = (target: Record<string, unknown>, key: string, name: string): void => {
      const value = env[name];
      if (value) target[key] = Number(value);
    };

    setString(llm, 'provider', 'RALPH_LLM_PROVIDER');
    setString(llm, 'model', 'RALPH_LLM_MODEL');
    setString(llm, 'baseUrl', 'RALPH_LLM_BASE_URL');
    setNumber(llm, 'temperature', 'RALPH_LLM_TEMPERATURE');
    setNumber(llm, 'timeoutMs', 'RALPH_LLM_TIMEOUT_MS');
    setNumber(loop, 'limit', 'RALPH_LOOP_LIMIT');
    setNumber(loop, 'shellTimeoutMs', 'RALPH_SHELL_TIMEOUT_MS');
    setString(logging, 'logDir', 'RALPH_LOG_DIR');
    setString(logging, 'level', 'LOG_LEVEL');

    const parsed = configFileSchema.safeParse({ llm, loop, logging });
    if (!parsed.success) {
      throw new ConfigFault(`Invalid environment configuration: ${formatIssues(parsed.error)}`);
    }
    this.mergeConfigFile(config, parsed.data);
  }

  private deepClone<T>(obj: T): T {
    return structuredClone(obj);
  }
}

/**
 * Load configuration with the given sources.
 */
export async function loadConfig(options?: ConfigLoaderOptions): Promise<MergedConfig> {
  return new ConfigLoader(options).load();
}
