/**
 * Trace Context Module
 *
 * AsyncLocalStorage-based context that tags every log line of a run with the
 * run id (traceId) and the current iteration span.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface TraceContext {
  /** Run id */
  traceId: string;
  /** Current span, e.g. `iter_3_1a2b3c4d` */
  spanId?: string;
  /** 1-based loop iteration */
  iteration?: number;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Run a function with trace context.
 * All descendant async operations inherit it.
 *
 * @example
 * ```ts
 * await withTraceContext({ traceId: 'run_123' }, async () => {
 *   logger.info('Starting'); // carries traceId='run_123'
 * });
 * ```
 */
export function withTraceContext<T>(context: TraceContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Current trace context, or undefined outside withTraceContext.
 */
export function getTraceContext(): TraceContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * New run id, e.g. `run_1a2b3c4d`.
 */
export function generateRunId(): string {
  return `run_${randomUUID().slice(0, 8)}`;
}

/**
 * Context for one iteration, nested under the current run.
 */
export function iterationContext(iteration: number): TraceContext {
  const parent = getTraceContext();
  return {
    traceId: parent?.traceId ?? generateRunId(),
    spanId: `iter_${String(iteration)}_${randomUUID().slice(0, 8)}`,
    iteration,
  };
}
