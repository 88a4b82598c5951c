/**
 * Loop Controller
 *
 * Drives the step engine for up to `limit` iterations over one growing
 * history. Each iteration re-reads the instruction, runs one step, appends its
 * messages and checks the tail for the completion sentinel. A failing step
 * ends the run (fail-stop, no retries at this level).
 */

import type { Logger } from '../../types/index.js';
import type { Message } from '../../llm/provider.js';
import { iterationContext, withTraceContext } from '../../core/trace-context.js';
import type { Decide, IterationReport, LoopOutcome, RunContext } from './loop-protocol.js';
import { KICKOFF_MESSAGE, isCompletionMessage } from './loop-protocol.js';
import type { InstructionStore } from './instruction-store.js';
import { EngineFault, errorMessage } from './loop-errors.js';
import { runStep } from './step-engine.js';

export interface LoopParams {
  /** Absolute working directory */
  workdir: string;
  instructions: InstructionStore;
  decide: Decide;
  /** Maximum iterations (>= 1) */
  limit: number;
  context: RunContext;
  /** Tool allow-list (empty = all) */
  allowedTools?: readonly string[];
  logger: Logger;
  /** Called after every iteration that produced messages */
  onIteration?: (report: IterationReport) => void;
}

/**
 * True when either of the last two history messages carries the sentinel.
 */
export function hasCompleted(history: readonly Message[]): boolean {
  return history.slice(-2).some((m) => isCompletionMessage(m));
}

/**
 * Run the loop until the agent signals completion, the budget runs out, or a
 * step fails.
 */
export async function runLoop(params: LoopParams): Promise<LoopOutcome> {
  const { workdir, instructions, decide, limit, context } = params;
  const logger = params.logger.child({ component: 'loop' });
  const history: Message[] = [{ role: 'user', content: KICKOFF_MESSAGE }];

  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Iteration limit must be a positive integer, got ${String(limit)}`);
  }

  logger.info({ workdir, limit, instructionPath: instructions.path }, 'Starting loop');

  for (let i = 1; i <= limit; i++) {
    const step = await withTraceContext(iterationContext(i), async () => {
      logger.debug({ iteration: i, messageCount: history.length }, 'Loop iteration');
      const instruction = await instructions.current();
      try {
        const delta = await runStep({
          history,
          instruction,
          decide,
          context,
          workdir,
          logger,
          ...(params.allowedTools && { allowedTools: params.allowedTools }),
        });
        return { ok: true as const, delta };
      } catch (error) {
        const fault = new EngineFault(errorMessage(error), i, { cause: error });
        logger.error({ iteration: i, error: fault.message }, `Error in iteration ${String(i)}: ${fault.message}`);
        return { ok: false as const, fault };
      }
    });

    if (!step.ok) {
      return { status: 'failed', iterations: i, history, error: step.fault };
    }

    history.push(...step.delta);
    params.onIteration?.({ iteration: i, limit, newMessages: step.delta });

    if (hasCompleted(history)) {
      logger.info({ iteration: i }, 'Objective met (agent signaled done)');
      return { status: 'completed', iterations: i, history };
    }
  }

  logger.info({ iterations: limit }, 'Iteration limit reached');
  return { status: 'exhausted', iterations: limit, history };
}
