import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { hasCompleted, runLoop } from '../../../src/runtime/loop/loop-controller.js';
import type { LoopParams } from '../../../src/runtime/loop/loop-controller.js';
import { InstructionStore } from '../../../src/runtime/loop/instruction-store.js';
import { createLlmDecide } from '../../../src/runtime/loop/step-engine.js';
import { getToolDefinitions } from '../../../src/runtime/loop/loop-tools.js';
import type { IterationReport } from '../../../src/runtime/loop/loop-protocol.js';
import { COMPLETION_SENTINEL } from '../../../src/runtime/loop/loop-protocol.js';
import { EngineFault } from '../../../src/runtime/loop/loop-errors.js';
import type { ScriptedLLMProvider, ScriptedResponse } from '../../helpers/scripted-llm.js';
import {
  createScriptedLLM,
  textResponse,
  toolCallResponse,
  toolCallsResponse,
} from '../../helpers/scripted-llm.js';
import { createMockLogger, createScriptedOperator } from '../../helpers/factories.js';

describe('loop controller', () => {
  let workdir: string;
  let instructionPath: string;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(async () => {
    workdir = await realpath(await mkdtemp(join(tmpdir(), 'controller-test-')));
    instructionPath = join(workdir, 'task.md');
    await writeFile(instructionPath, 'Create hello.txt');
    logger = createMockLogger();
  });

  afterEach(async () => {
    await rm(workdir, { recursive: true, force: true });
  });

  function params(
    llm: ScriptedLLMProvider,
    limit: number,
    extra: Partial<LoopParams> = {}
  ): LoopParams {
    return {
      workdir,
      instructions: new InstructionStore(instructionPath, 'Create hello.txt'),
      decide: createLlmDecide(llm, { tools: getToolDefinitions() }),
      limit,
      context: { workdir, instructionPath, operator: createScriptedOperator([]) },
      logger,
      ...extra,
    };
  }

  function run(script: ScriptedResponse[], limit: number) {
    const llm = createScriptedLLM(script);
    return { llm, outcome: runLoop(params(llm, limit)) };
  }

  it('stops as soon as the agent calls done', async () => {
    const { llm, outcome } = run(
      [
        toolCallResponse('write_file', { path: 'hello.txt', content: 'hi' }),
        toolCallResponse('done'),
        textResponse('never requested'),
      ],
      5
    );

    const result = await outcome;

    expect(result.status).toBe('completed');
    expect(result.iterations).toBe(2);
    expect(llm.callCount).toBe(2);
    expect(await readFile(join(workdir, 'hello.txt'), 'utf-8')).toBe('hi');
    expect(result.history.at(-1)).toMatchObject({ role: 'tool', content: COMPLETION_SENTINEL });
  });

  it('runs exactly the limit when done is never called', async () => {
    const { llm, outcome } = run([textResponse('a'), textResponse('b'), textResponse('c')], 3);

    const result = await outcome;

    expect(result.status).toBe('exhausted');
    expect(result.iterations).toBe(3);
    expect(llm.callCount).toBe(3);
    expect(result.history.map((m) => m.content)).toEqual([
      'Please execute the instruction.',
      'a',
      'b',
      'c',
    ]);
  });

  it('sends the growing history on every request', async () => {
    const { llm, outcome } = run([textResponse('first'), textResponse('second')], 2);
    await outcome;

    expect(llm.requests[0]?.messages).toHaveLength(2);
    expect(llm.requests[1]?.messages.map((m) => m.content)).toEqual([
      llm.systemPrompt(1),
      'Please execute the instruction.',
      'first',
    ]);
  });

  it('fails the run on an engine fault', async () => {
    const { llm, outcome } = run([textResponse('ok'), new Error('rate limited')], 5);

    const result = await outcome;

    expect(result.status).toBe('failed');
    expect(result.iterations).toBe(2);
    expect(result.error).toBeInstanceOf(EngineFault);
    expect(result.error).toMatchObject({ message: 'rate limited', iteration: 2 });
    expect(result.history).toHaveLength(2);
    expect(llm.callCount).toBe(2);
    expect(logger.calls.error[0]?.[1]).toBe('Error in iteration 2: rate limited');
  });

  it('picks up an updated instruction on the next iteration', async () => {
    const { llm, outcome } = run(
      [toolCallResponse('update_instruction', { new_instruction: 'Phase two' }), textResponse('ok')],
      2
    );
    await outcome;

    expect(llm.systemPrompt(0)).toContain('\nCreate hello.txt\n');
    expect(llm.systemPrompt(1)).toContain('\nPhase two\n');
    expect(await readFile(instructionPath, 'utf-8')).toBe('Phase two');
  });

  it('reports every iteration', async () => {
    const reports: IterationReport[] = [];
    const llm = createScriptedLLM([textResponse('one'), toolCallResponse('done')]);

    await runLoop(params(llm, 3, { onIteration: (r) => reports.push(r) }));

    expect(reports.map((r) => [r.iteration, r.limit, r.newMessages.length])).toEqual([
      [1, 3, 1],
      [2, 3, 2],
    ]);
  });

  it('rejects a non-positive limit', async () => {
    const llm = createScriptedLLM([]);
    await expect(runLoop(params(llm, 0))).rejects.toBeInstanceOf(RangeError);
    expect(llm.callCount).toBe(0);
  });

  it('completes when done is followed by one more call in the same step', async () => {
    const { outcome } = run(
      [
        toolCallsResponse([
          { name: 'done', args: {} },
          { name: 'list_files', args: {} },
        ]),
      ],
      3
    );

    expect((await outcome).status).toBe('completed');
  });

  describe('hasCompleted', () => {
    const sentinel = { role: 'tool' as const, content: COMPLETION_SENTINEL };
    const other = { role: 'tool' as const, content: 'ok' };

    it('checks only the last two messages', () => {
      expect(hasCompleted([sentinel])).toBe(true);
      expect(hasCompleted([sentinel, other])).toBe(true);
      expect(hasCompleted([sentinel, other, other])).toBe(false);
    });

    it('requires an exact tool result', () => {
      expect(hasCompleted([{ role: 'assistant', content: COMPLETION_SENTINEL }])).toBe(false);
      expect(hasCompleted([{ role: 'tool', content: `${COMPLETION_SENTINEL}!` }])).toBe(false);
    });
  });
});
