/**
 * Step Engine
 *
 * One request/execute/append cycle: build the system prompt, ask the model for
 * a decision, record the assistant message, run each requested tool in order
 * and record one tool message per call. Returns only the new messages.
 */

import type { Logger } from '../../types/index.js';
import type { LLMProvider, Message } from '../../llm/provider.js';
import type { OpenAIChatTool } from '../../llm/tool-schema.js';
import type { Decide, Decision, RunContext } from './loop-protocol.js';
import { renderToolResult } from './loop-protocol.js';
import { executeTool } from './loop-tools.js';
import { buildSystemPrompt, loadBasePrompt } from './loop-prompt.js';

export interface StepParams {
  history: readonly Message[];
  instruction: string;
  decide: Decide;
  context: RunContext;
  /** Absolute working directory */
  workdir: string;
  /** Tool allow-list (empty = all) */
  allowedTools?: readonly string[];
  logger?: Logger;
}

/**
 * Options for the model-backed decider.
 */
export interface LlmDecideOptions {
  tools: OpenAIChatTool[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Adapt an LLM provider to the Decide contract.
 * Provider errors propagate to the caller.
 */
export function createLlmDecide(provider: LLMProvider, options: LlmDecideOptions): Decide {
  return async (history, systemPrompt): Promise<Decision> => {
    const response = await provider.complete({
      messages: [{ role: 'system', content: systemPrompt }, ...history],
      tools: options.tools,
      toolChoice: 'auto',
      ...(options.model !== undefined && { model: options.model }),
      ...(options.temperature !== undefined && { temperature: options.temperature }),
      ...(options.maxTokens !== undefined && { maxTokens: options.maxTokens }),
    });
    return { content: response.content, toolCalls: response.toolCalls ?? [] };
  };
}

/**
 * Run one step and return the messages it produced.
 *
 * Tool failures are recorded as tool messages; only a failing decide call throws.
 */
export async function runStep(params: StepParams): Promise<Message[]> {
  const { history, instruction, decide, context, workdir, logger } = params;

  const basePrompt = await loadBasePrompt(workdir, logger);
  const systemPrompt = buildSystemPrompt({ basePrompt, workdir, instruction });

  const decision = await decide(history, systemPrompt);

  const assistant: Message = { role: 'assistant', content: decision.content };
  if (decision.toolCalls.length > 0) {
    assistant.tool_calls = decision.toolCalls;
  }
  const delta: Message[] = [assistant];

  for (const call of decision.toolCalls) {
    const startTime = Date.now();
    const result = await executeTool(
      call.function.name,
      call.function.arguments,
      context,
      params.allowedTools
    );
    const content = renderToolResult(result);

    logger?.debug(
      {
        tool: call.function.name,
        toolCallId: call.id,
        durationMs: Date.now() - startTime,
        resultPreview: content.slice(0, 200),
      },
      'Tool executed'
    );

    delta.push({
      role: 'tool',
      content,
      tool_call_id: call.id,
      tool_name: call.function.name,
    });
  }

  return delta;
}
