/**
 * LLM Provider interface.
 *
 * Abstracts the model backend (OpenRouter, local OpenAI-compatible servers)
 * so the loop can run against any of them, or against a scripted provider in tests.
 */

import type { OpenAIChatTool } from './tool-schema.js';
import type { Logger } from '../types/index.js';
import { logConversation } from '../core/logger.js';

/**
 * Tool call from the model (OpenAI Chat Completions format).
 */
export interface ToolCall {
  /** Unique ID for this tool call (links to tool result) */
  id: string;
  type: 'function';
  function: {
    name: string;
    /** JSON-encoded arguments string */
    arguments: string;
  };
}

/**
 * Message in a conversation.
 */
export interface Message {
  role: 'system' | 'user' | 'assistant' | 'tool';
  /** Can be null for assistant messages with only tool_calls */
  content: string | null;
  /** Tool calls made by assistant (only for role: 'assistant') */
  tool_calls?: ToolCall[];
  /** Tool call ID this message is responding to (only for role: 'tool') */
  tool_call_id?: string;
  /** Tool name for tool results */
  tool_name?: string;
}

/**
 * Tool choice for controlling tool calling behavior.
 */
export type ToolChoice =
  | 'auto'
  | 'none'
  | 'required'
  | { type: 'function'; function: { name: string } };

/**
 * Request to generate a completion.
 */
export interface CompletionRequest {
  messages: Message[];

  /** Explicit model to use (provider default otherwise) */
  model?: string;

  maxTokens?: number;

  /** Temperature (0-2, lower = more focused) */
  temperature?: number;

  /** Tools available for the model to call */
  tools?: OpenAIChatTool[];

  toolChoice?: ToolChoice;

  /** Per-request timeout override in ms */
  timeoutMs?: number;
}

/**
 * Response from a completion request.
 */
export interface CompletionResponse {
  /** Generated text - null when the model only returns tool calls */
  content: string | null;

  /** Model that was used */
  model: string;

  /** Provider generation ID */
  generationId?: string | undefined;

  toolCalls?: ToolCall[] | undefined;

  usage?:
    | {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
      }
    | undefined;

  finishReason?: 'stop' | 'tool_calls' | 'length' | 'content_filter' | 'error' | undefined;
}

/**
 * LLM Provider interface.
 */
export interface LLMProvider {
  /** Provider name (for logging) */
  readonly name: string;

  /** Check if provider is available/configured */
  isAvailable(): boolean;

  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

/**
 * Error from LLM provider.
 */
export class LLMError extends Error {
  readonly provider: string;
  readonly statusCode?: number | undefined;
  readonly retryable: boolean;

  constructor(
    message: string,
    provider: string,
    options?: { statusCode?: number; retryable?: boolean; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'LLMError';
    this.provider = provider;
    this.statusCode = options?.statusCode;
    this.retryable = options?.retryable ?? false;
  }
}

const INDENT = '  ';

/**
 * Pretty-print a JSON string, or return it unchanged.
 */
function formatJson(text: string, indent: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    return JSON.stringify(parsed, null, 2).split('\n').join('\n' + indent);
  } catch {
    return text;
  }
}

/**
 * Render one message for the conversation log.
 */
function formatMessage(msg: Message, index: number): string {
  const idx = String(index);
  const content = msg.content ?? '(no content)';

  if (msg.role === 'tool') {
    return `► [${idx}] TOOL RESULT ${msg.tool_name ?? ''}(${msg.tool_call_id ?? 'unknown'}):\n${INDENT}${formatJson(content, INDENT)}`;
  }

  if (msg.tool_calls && msg.tool_calls.length > 0) {
    const calls = msg.tool_calls
      .map(
        (tc) =>
          `${INDENT}📞 ${tc.function.name}(${tc.id}):\n${INDENT}${INDENT}${formatJson(tc.function.arguments, INDENT + INDENT)}`
      )
      .join('\n');
    const text = msg.content ? `\n${INDENT}${msg.content}` : '';
    return `► [${idx}] ${msg.role.toUpperCase()}:${text}\n${INDENT}Tool calls:\n${calls}`;
  }

  return `► [${idx}] ${msg.role.toUpperCase()}:\n${INDENT}${content.split('\n').join('\n' + INDENT)}`;
}

/**
 * Base LLM provider with request logging.
 *
 * Subclasses implement doComplete() for the actual API call.
 */
export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  protected readonly logger?: Logger | undefined;
  private requestCounter = 0;
  /** Messages already written to the conversation log (delta logging) */
  private lastLoggedMessageCount = 0;

  constructor(logger?: Logger) {
    this.logger = logger?.child({ component: 'llm' });
  }

  abstract isAvailable(): boolean;

  /**
   * Generate a completion with detailed logging.
   */
  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const requestId = `req_${String(++this.requestCounter)}`;
    const startTime = Date.now();

    this.logger?.debug(
      {
        requestId,
        provider: this.name,
        model: request.model,
        temperature: request.temperature,
        maxTokens: request.maxTokens,
        messageCount: request.messages.length,
        toolCount: request.tools?.length ?? 0,
      },
      'LLM request started'
    );

    // A shorter history means a fresh conversation: log it from the start
    if (request.messages.length < this.lastLoggedMessageCount) {
      this.lastLoggedMessageCount = 0;
    }
    const lines = [
      `\n${'═'.repeat(60)}`,
      `→ REQUEST [${requestId}] to ${this.name} (${request.model ?? 'default'})`,
      '─'.repeat(60),
    ];
    if (this.lastLoggedMessageCount > 0) {
      lines.push(`[...${String(this.lastLoggedMessageCount)} messages from history...]`);
    }
    for (let i = this.lastLoggedMessageCount; i < request.messages.length; i++) {
      const msg = request.messages[i];
      if (msg) lines.push(formatMessage(msg, i));
    }
    logConversation({ logType: 'REQUEST', requestId, provider: this.name }, lines.join('\n'));
    this.lastLoggedMessageCount = request.messages.length;

    try {
      const response = await this.doComplete(request);
      const duration = Date.now() - startTime;

      this.logger?.debug(
        {
          requestId,
          model: response.model,
          generationId: response.generationId,
          durationMs: duration,
          finishReason: response.finishReason,
          totalTokens: response.usage?.totalTokens,
          responseLength: response.content?.length ?? 0,
          toolCallCount: response.toolCalls?.length ?? 0,
        },
        'LLM response received'
      );

      const toolCallsDetail = response.toolCalls?.length
        ? `\n\n  Tool calls:\n${response.toolCalls
            .map((tc) => `  📞 ${tc.function.name}(${tc.id}):\n       ${formatJson(tc.function.arguments, '       ')}`)
            .join('\n')}`
        : '';
      logConversation(
        { logType: 'RESPONSE', requestId, durationMs: duration },
        `${'─'.repeat(60)}\n← RESPONSE [${String(duration)}ms, ${String(response.usage?.totalTokens ?? '?')} tokens, ${response.finishReason ?? 'unknown'}]\n${response.content ?? '(no content)'}${toolCallsDetail}\n${'═'.repeat(60)}`
      );

      return response;
    } catch (error) {
      const duration = Date.now() - startTime;
      const message = error instanceof Error ? error.message : String(error);

      this.logger?.error(
        {
          requestId,
          provider: this.name,
          durationMs: duration,
          error: message,
          retryable: error instanceof LLMError ? error.retryable : false,
        },
        'LLM request failed'
      );
      logConversation(
        { logType: 'ERROR', requestId, durationMs: duration },
        `${'─'.repeat(60)}\n✗ ERROR [${String(duration)}ms]: ${message}\n${'═'.repeat(60)}`
      );

      throw error;
    }
  }

  /**
   * Perform the actual completion request.
   */
  protected abstract doComplete(request: CompletionRequest): Promise<CompletionResponse>;
}
