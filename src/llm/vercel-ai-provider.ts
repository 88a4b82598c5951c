/**
 * Vercel AI SDK Provider
 *
 * LLM provider built on the Vercel AI SDK (ai package v5). Talks to OpenRouter
 * or to any OpenAI-compatible server (Ollama, LM Studio, vLLM). The SDK's own
 * retry is disabled; transient errors are retried here with backoff.
 */

import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { createOpenAI } from '@ai-sdk/openai';
import { generateText, jsonSchema, tool } from 'ai';
import type { LanguageModel, ModelMessage, ToolSet } from 'ai';
import type { Logger } from '../types/index.js';
import type { LLMProviderKind } from '../config/index.js';
import type { CompletionRequest, CompletionResponse, Message, ToolCall, ToolChoice } from './provider.js';
import { BaseLLMProvider, LLMError } from './provider.js';

/**
 * Configuration for VercelAIProvider.
 */
export interface VercelAIProviderConfig {
  kind: LLMProviderKind;
  /** Default model id */
  model: string;
  /** Required for OpenRouter; optional for local servers */
  apiKey?: string | undefined;
  /** Required for openai-compatible servers, e.g. http://localhost:11434/v1 */
  baseUrl?: string | undefined;
  /** App name for OpenRouter attribution */
  appName?: string | undefined;
  /** Request timeout in ms (default: 60000) */
  timeoutMs?: number | undefined;
  /** Retries after the first attempt (default: 2) */
  maxRetries?: number | undefined;
  /** Base backoff in ms (default: 1000) */
  retryDelayMs?: number | undefined;
}

const DEFAULT_TIMEOUT = 60_000;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_DELAY = 1000;

/**
 * Vercel AI SDK LLM provider.
 */
export class VercelAIProvider extends BaseLLMProvider {
  readonly name: string;
  private readonly config: VercelAIProviderConfig;
  private readonly providerLogger?: Logger | undefined;

  constructor(config: VercelAIProviderConfig, logger?: Logger) {
    super(logger);
    this.config = config;
    this.name = config.kind === 'openrouter' ? 'openrouter' : 'openai-compatible';
    this.providerLogger = logger?.child({ component: 'vercel-ai-provider' });

    this.providerLogger?.debug(
      { provider: this.name, model: config.model, baseUrl: config.baseUrl },
      'VercelAIProvider initialized'
    );
  }

  isAvailable(): boolean {
    if (this.config.kind === 'openrouter') {
      return Boolean(this.config.apiKey);
    }
    return Boolean(this.config.baseUrl && this.config.model);
  }

  private getModel(modelId: string): LanguageModel {
    if (this.config.kind === 'openrouter') {
      return createOpenRouter({ apiKey: this.config.apiKey })(modelId);
    }
    return createOpenAI({
      baseURL: this.config.baseUrl,
      apiKey: this.config.apiKey ?? 'no-key-required',
    }).chat(modelId);
  }

  protected async doComplete(request: CompletionRequest): Promise<CompletionResponse> {
    if (!this.isAvailable()) {
      throw new LLMError(
        this.config.kind === 'openrouter'
          ? 'OpenRouter API key is not configured'
          : 'OpenAI-compatible provider needs a base URL and a model',
        this.name
      );
    }

    const modelId = request.model ?? this.config.model;
    return this.executeWithRetry(() => this.executeRequest(request, modelId));
  }

  /**
   * Exponential backoff for 429 rate limits, linear for everything else.
   */
  private calculateBackoff(attempt: number, isRateLimit: boolean): number {
    const base = this.config.retryDelayMs ?? DEFAULT_RETRY_DELAY;
    if (isRateLimit) {
      return base * 2 * Math.pow(2, attempt);
    }
    return base * (attempt + 1);
  }

  private async executeWithRetry<T>(operation: () => Promise<T>): Promise<T> {
    const maxRetries = this.config.maxRetries ?? DEFAULT_MAX_RETRIES;
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (error instanceof LLMError && !error.retryable) {
          throw error;
        }

        if (attempt < maxRetries) {
          const isRateLimit = error instanceof LLMError && error.statusCode === 429;
          const backoffMs = this.calculateBackoff(attempt, isRateLimit);
          this.providerLogger?.warn(
            { attempt: attempt + 1, maxRetries, backoffMs, error: lastError.message },
            'Retrying after transient error'
          );
          await this.sleep(backoffMs);
        } else {
          this.providerLogger?.error(
            { attempts: maxRetries + 1, error: lastError.message },
            'All retry attempts exhausted'
          );
        }
      }
    }

    throw lastError ?? new Error('Unknown error');
  }

  /**
   * Convert our Message format to AI SDK ModelMessage format.
   *
   * Tool calls carry parsed `input`; tool results carry a text `output` and
   * the tool name, recovered from the matching call when the message lacks it.
   */
  convertMessages(messages: Message[]): ModelMessage[] {
    const toolCallIdToName = new Map<string, string>();
    for (const msg of messages) {
      for (const tc of msg.tool_calls ?? []) {
        toolCallIdToName.set(tc.id, tc.function.name);
      }
    }

    return messages.map((msg): ModelMessage => {
      switch (msg.role) {
        case 'system':
          return { role: 'system', content: msg.content ?? '' };
        case 'user':
          return { role: 'user', content: msg.content ?? '' };
        case 'tool': {
          const toolCallId = msg.tool_call_id ?? '';
          return {
            role: 'tool',
            content: [
              {
                type: 'tool-result',
                toolCallId,
                toolName: msg.tool_name ?? toolCallIdToName.get(toolCallId) ?? 'unknown',
                output: { type: 'text', value: msg.content ?? '' },
              },
            ],
          };
        }
        case 'assistant': {
          if (!msg.tool_calls || msg.tool_calls.length === 0) {
            return { role: 'assistant', content: msg.content ?? '' };
          }
          return {
            role: 'assistant',
            content: [
              ...(msg.content ? [{ type: 'text' as const, text: msg.content }] : []),
              ...msg.tool_calls.map((tc) => ({
                type: 'tool-call' as const,
                toolCallId: tc.id,
                toolName: tc.function.name,
                input: parseArguments(tc.function.arguments),
              })),
            ],
          };
        }
      }
    });
  }

  /**
   * Convert tools from OpenAI format to AI SDK format.
   */
  convertTools(tools: CompletionRequest['tools']): ToolSet | undefined {
    if (!tools || tools.length === 0) return undefined;

    const aiTools: ToolSet = {};
    for (const t of tools) {
      aiTools[t.function.name] = tool({
        description: t.function.description,
        inputSchema: jsonSchema(t.function.parameters),
      });
    }
    return aiTools;
  }

  private mapToolChoice(
    toolChoice: ToolChoice | undefined
  ): 'auto' | 'none' | 'required' | { type: 'tool'; toolName: string } | undefined {
    if (toolChoice === undefined || typeof toolChoice === 'string') {
      return toolChoice;
    }
    return { type: 'tool', toolName: toolChoice.function.name };
  }

  private buildHeaders(): Record<string, string> | undefined {
    if (this.config.kind !== 'openrouter' || !this.config.appName) {
      return undefined;
    }
    return { 'X-Title': this.config.appName };
  }

  private async executeRequest(
    request: CompletionRequest,
    modelId: string
  ): Promise<CompletionResponse> {
    const messages = this.convertMessages(request.messages);
    const tools = this.convertTools(request.tools);
    const timeoutMs = request.timeoutMs ?? this.config.timeoutMs ?? DEFAULT_TIMEOUT;
    const startTime = Date.now();

    this.providerLogger?.debug(
      {
        model: modelId,
        messageCount: messages.length,
        toolCount: request.tools?.length ?? 0,
        temperature: request.temperature,
      },
      'AI SDK generateText request'
    );

    try {
      const result = await generateText({
        model: this.getModel(modelId),
        messages,
        tools,
        toolChoice: tools ? this.mapToolChoice(request.toolChoice) : undefined,
        temperature: request.temperature,
        maxOutputTokens: request.maxTokens,
        headers: this.buildHeaders(),
        abortSignal: AbortSignal.timeout(timeoutMs),
        // Retries are handled by executeWithRetry
        maxRetries: 0,
      });

      this.providerLogger?.debug(
        {
          durationMs: Date.now() - startTime,
          textLength: result.text.length,
          toolCallsCount: result.toolCalls.length,
          finishReason: result.finishReason,
        },
        'AI SDK generateText response'
      );

      const toolCalls = result.toolCalls.map(
        (tc): ToolCall => ({
          id: tc.toolCallId,
          type: 'function',
          function: { name: tc.toolName, arguments: JSON.stringify(tc.input ?? {}) },
        })
      );

      return {
        content: result.text || null,
        model: modelId,
        generationId: result.response.id || undefined,
        toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
        finishReason: this.mapFinishReason(result.finishReason),
        usage: {
          promptTokens: result.usage.inputTokens ?? 0,
          completionTokens: result.usage.outputTokens ?? 0,
          totalTokens: result.usage.totalTokens ?? 0,
        },
      };
    } catch (error) {
      this.providerLogger?.error(
        {
          durationMs: Date.now() - startTime,
          model: modelId,
          error: error instanceof Error ? error.message : String(error),
          errorName: error instanceof Error ? error.name : 'Unknown',
        },
        'AI SDK generateText failed'
      );
      throw this.mapAIErrorToLLMError(error);
    }
  }

  private mapFinishReason(reason: string | undefined): CompletionResponse['finishReason'] {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'tool-calls':
        return 'tool_calls';
      case 'length':
        return 'length';
      case 'content-filter':
        return 'content_filter';
      default:
        return 'error';
    }
  }

  /**
   * Map AI SDK error to LLMError, marking transient failures retryable.
   */
  mapAIErrorToLLMError(error: unknown): LLMError {
    if (error instanceof LLMError) return error;

    const message = error instanceof Error ? error.message : String(error);
    const statusCode =
      typeof error === 'object' &&
      error !== null &&
      'statusCode' in error &&
      typeof error.statusCode === 'number'
        ? error.statusCode
        : undefined;

    if (statusCode === 429 || (statusCode === undefined && /rate limit|\b429\b/i.test(message))) {
      return new LLMError(`Rate limit: ${message}`, this.name, {
        statusCode: 429,
        retryable: true,
        cause: error,
      });
    }

    if (statusCode !== undefined && (statusCode >= 500 || statusCode === 408)) {
      return new LLMError(`Server error: ${message}`, this.name, {
        statusCode,
        retryable: true,
        cause: error,
      });
    }

    if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
      return new LLMError('Request timed out', this.name, { retryable: true, cause: error });
    }

    return new LLMError(message, this.name, {
      ...(statusCode !== undefined && { statusCode }),
      retryable: false,
      cause: error,
    });
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Parse JSON-encoded tool arguments; unparsable text is passed through raw.
 */
function parseArguments(args: string): unknown {
  try {
    return JSON.parse(args);
  } catch {
    return { _raw: args };
  }
}

/**
 * Unified factory function.
 */
export function createVercelAIProvider(
  config: VercelAIProviderConfig,
  logger?: Logger
): VercelAIProvider {
  return new VercelAIProvider(config, logger);
}
