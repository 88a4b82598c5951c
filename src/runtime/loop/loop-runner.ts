/**
 * Loop Runner
 *
 * Wires a full run: prepares the working directory, binds the instruction
 * store and run context, adapts the model to a decider and drives the loop
 * under one trace id.
 */

import type { Logger } from '../../types/index.js';
import type { LLMProvider } from '../../llm/provider.js';
import { generateRunId, withTraceContext } from '../../core/trace-context.js';
import type { Decide, IterationReport, LoopOutcome, RunContext } from './loop-protocol.js';
import type { OperatorChannel } from './operator-channel.js';
import { InstructionStore } from './instruction-store.js';
import { ConfigFault } from './loop-errors.js';
import { runLoop } from './loop-controller.js';
import { createLlmDecide } from './step-engine.js';
import { getToolDefinitions } from './loop-tools.js';
import { prepareWorkspace } from './workspace-setup.js';

export interface AgentLoopOptions {
  workdir: string;
  /** Instruction file outside (or inside) the working directory */
  instructionFile: string;
  limit: number;
  operator: OperatorChannel;
  logger: Logger;
  /** Model-backed decider source; ignored when `decide` is given */
  llm?: LLMProvider;
  /** Explicit decider (tests, alternative engines) */
  decide?: Decide;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  shellTimeoutMs?: number;
  /** Tool allow-list (empty = all) */
  allowedTools?: readonly string[];
  /** Source for seeded prompts */
  bundledPromptsDir?: string;
  onIteration?: (report: IterationReport) => void;
}

/**
 * Prepare the working directory and run the loop.
 *
 * @throws ConfigFault when the run cannot start (bad paths, unconfigured provider)
 */
export async function runAgentLoop(options: AgentLoopOptions): Promise<LoopOutcome> {
  const runId = generateRunId();

  return withTraceContext({ traceId: runId }, async () => {
    const logger = options.logger.child({ runId });
    const allowedTools = options.allowedTools ?? [];

    const decide = options.decide ?? createDecide(options, allowedTools);

    const prepared = await prepareWorkspace(options.workdir, options.instructionFile, {
      logger,
      ...(options.bundledPromptsDir !== undefined && {
        bundledPromptsDir: options.bundledPromptsDir,
      }),
    });

    const context: RunContext = {
      workdir: prepared.workdir,
      instructionPath: prepared.instructionPath,
      operator: options.operator,
      shellTimeoutMs: options.shellTimeoutMs,
      logger: logger.child({ component: 'tools' }),
    };

    return runLoop({
      workdir: prepared.workdir,
      instructions: new InstructionStore(prepared.instructionPath, prepared.instruction, logger),
      decide,
      limit: options.limit,
      context,
      allowedTools,
      logger,
      ...(options.onIteration && { onIteration: options.onIteration }),
    });
  });
}

function createDecide(options: AgentLoopOptions, allowedTools: readonly string[]): Decide {
  if (!options.llm) {
    throw new TypeError('runAgentLoop needs either an llm provider or a decide function');
  }
  if (!options.llm.isAvailable()) {
    throw new ConfigFault(`LLM provider '${options.llm.name}' is not configured (missing API key or base URL)`);
  }
  return createLlmDecide(options.llm, {
    tools: getToolDefinitions(allowedTools),
    ...(options.model !== undefined && { model: options.model }),
    ...(options.temperature !== undefined && { temperature: options.temperature }),
    ...(options.maxTokens !== undefined && { maxTokens: options.maxTokens }),
  });
}
