/**
 * Loop Protocol
 *
 * Shared types for the agent loop: the run context threaded into every tool
 * call, tool results, the reasoning-step contract, and the run outcome.
 */

import type { Logger } from '../../types/index.js';
import type { Message, ToolCall } from '../../llm/provider.js';
import type { OperatorChannel } from './operator-channel.js';

/**
 * Exact tool result that signals the task is finished.
 */
export const COMPLETION_SENTINEL = 'RALPH_DONE';

/**
 * First message of every run's history.
 */
export const KICKOFF_MESSAGE = 'Please execute the instruction.';

/**
 * Names of the tools exposed to the model.
 */
export type LoopToolName =
  | 'list_files'
  | 'read_file'
  | 'write_file'
  | 'run_command'
  | 'update_ledger'
  | 'ask_user'
  | 'update_instruction'
  | 'done';

/**
 * Tool output: short text, or a list of strings (list_files).
 */
export type ToolResult = string | string[];

/**
 * Per-run context passed explicitly to every tool.
 */
export interface RunContext {
  /** Absolute working directory. Tools report a config error when absent. */
  workdir?: string | undefined;

  /** On-disk instruction copy updated by update_instruction */
  instructionPath?: string | undefined;

  /** Operator channel for ask_user */
  operator: OperatorChannel;

  /** run_command timeout override in ms */
  shellTimeoutMs?: number | undefined;

  logger?: Logger | undefined;
}

/**
 * Output of one reasoning step: optional text plus zero or more tool calls.
 */
export interface Decision {
  content: string | null;
  toolCalls: ToolCall[];
}

/**
 * The reasoning step. Receives the history (without the system prompt) and the
 * freshly built system prompt.
 */
export type Decide = (history: readonly Message[], systemPrompt: string) => Promise<Decision>;

/**
 * Progress report for one finished iteration.
 */
export interface IterationReport {
  /** 1-based iteration index */
  iteration: number;
  limit: number;
  /** Messages appended during this iteration */
  newMessages: Message[];
}

export type LoopStatus = 'completed' | 'exhausted' | 'failed';

/**
 * Result of a whole run.
 */
export interface LoopOutcome {
  status: LoopStatus;
  /** Iterations started (including a failed one) */
  iterations: number;
  history: Message[];
  /** Present when status is 'failed' */
  error?: Error | undefined;
}

/**
 * Render a tool result as tool-message content.
 */
export function renderToolResult(result: ToolResult): string {
  return typeof result === 'string' ? result : JSON.stringify(result);
}

/**
 * True when a message is a tool result carrying the completion sentinel.
 */
export function isCompletionMessage(message: Message | undefined): boolean {
  return message?.role === 'tool' && message.content === COMPLETION_SENTINEL;
}
