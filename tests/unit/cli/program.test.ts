import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ASK_SYSTEM_PROMPT,
  createProgram,
  describeOutcome,
  formatMessage,
  readPackageVersion,
} from '../../../src/cli/program.js';
import type { Container } from '../../../src/core/container.js';
import { DEFAULT_CONFIG } from '../../../src/config/index.js';
import { ConfigFault, EngineFault } from '../../../src/runtime/loop/loop-errors.js';
import type { ScriptedLLMProvider } from '../../helpers/scripted-llm.js';
import { createScriptedLLM, textResponse, toolCallResponse } from '../../helpers/scripted-llm.js';
import { createMockLogger, createScriptedOperator } from '../../helpers/factories.js';

function fakeContainer(llm: ScriptedLLMProvider): () => Promise<Container> {
  return () =>
    Promise.resolve({ config: structuredClone(DEFAULT_CONFIG), logger: createMockLogger(), llm });
}

describe('CLI', () => {
  let out: string[];
  let err: string[];
  const io = {
    out: (line: string) => out.push(line),
    err: (line: string) => err.push(line),
  };

  beforeEach(() => {
    out = [];
    err = [];
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  describe('formatMessage', () => {
    it('prints content with the upper-cased role', () => {
      expect(formatMessage({ role: 'tool', content: 'ok' })).toEqual(['[TOOL]: ok']);
    });

    it('prints one line per tool call and skips empty content', () => {
      expect(
        formatMessage({
          role: 'assistant',
          content: null,
          tool_calls: [
            { id: '1', type: 'function', function: { name: 'read_file', arguments: '{"path":"a"}' } },
            { id: '2', type: 'function', function: { name: 'done', arguments: '{}' } },
          ],
        })
      ).toEqual(['[ASSISTANT]: -> read_file({"path":"a"})', '[ASSISTANT]: -> done({})']);
    });

    it('keeps text that accompanies tool calls', () => {
      expect(
        formatMessage({
          role: 'assistant',
          content: 'Reading.',
          tool_calls: [{ id: '1', type: 'function', function: { name: 'list_files', arguments: '{}' } }],
        })
      ).toEqual(['[ASSISTANT]: Reading.', '[ASSISTANT]: -> list_files({})']);
    });
  });

  describe('describeOutcome', () => {
    it('describes each ending', () => {
      expect(describeOutcome({ status: 'completed', iterations: 2, history: [] })).toBe(
        'Objective met (agent signaled done).'
      );
      expect(describeOutcome({ status: 'exhausted', iterations: 5, history: [] })).toBe(
        'Iteration limit reached (5).'
      );
      expect(
        describeOutcome({
          status: 'failed',
          iterations: 3,
          history: [],
          error: new EngineFault('timeout', 3),
        })
      ).toBe('Error in iteration 3: timeout');
    });
  });

  describe('version', () => {
    it('prints the version', async () => {
      await createProgram({ io, readVersion: () => Promise.resolve('1.2.3') }).parseAsync([
        'node',
        'ralph',
        'version',
      ]);
      expect(out).toEqual(['1.2.3']);
    });

    it('reports a missing manifest', async () => {
      await createProgram({ io, readVersion: () => Promise.resolve(null) }).parseAsync([
        'node',
        'ralph',
        'version',
      ]);
      expect(out).toEqual(['Package not found']);
    });

    it('reads the package manifest', async () => {
      expect(await readPackageVersion()).toMatch(/^\d+\.\d+\.\d+/);
    });
  });

  describe('ask', () => {
    it('sends one question and prints the answer', async () => {
      const llm = createScriptedLLM([textResponse('Paris')]);

      await createProgram({ io, createContainer: fakeContainer(llm) }).parseAsync([
        'node',
        'ralph',
        'ask',
        'Capital of France?',
      ]);

      expect(out).toEqual(['Paris']);
      expect(llm.requests[0]?.messages).toEqual([
        { role: 'system', content: ASK_SYSTEM_PROMPT },
        { role: 'user', content: 'Capital of France?' },
      ]);
    });

    it('reports provider errors', async () => {
      const llm = createScriptedLLM([new Error('no credit')]);

      await createProgram({ io, createContainer: fakeContainer(llm) }).parseAsync([
        'node',
        'ralph',
        'ask',
        'hi',
      ]);

      expect(err).toEqual(['Error: no credit']);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('loop', () => {
    let base: string;
    let workdir: string;
    let instructionFile: string;

    beforeEach(async () => {
      base = await realpath(await mkdtemp(join(tmpdir(), 'cli-test-')));
      workdir = join(base, 'work');
      instructionFile = join(base, 'task.md');
      await writeFile(instructionFile, 'Write out.txt');
      await mkdir(workdir);
    });

    afterEach(async () => {
      await rm(base, { recursive: true, force: true });
    });

    it('prints the transcript and the outcome', async () => {
      const llm = createScriptedLLM([
        toolCallResponse('write_file', { path: 'out.txt', content: 'x' }),
        toolCallResponse('done'),
      ]);

      await createProgram({
        io,
        createContainer: fakeContainer(llm),
        operator: createScriptedOperator([]),
      }).parseAsync(['node', 'ralph', 'loop', workdir, instructionFile, '--limit', '3']);

      expect(out).toEqual([
        '\n--- Iteration 1/3 ---',
        '[ASSISTANT]: -> write_file({"path":"out.txt","content":"x"})',
        '[TOOL]: Successfully wrote to out.txt',
        '\n--- Iteration 2/3 ---',
        '[ASSISTANT]: -> done({})',
        '[TOOL]: RALPH_DONE',
        'Objective met (agent signaled done).',
      ]);
      expect(err).toEqual([]);
      expect(await readFile(join(workdir, 'out.txt'), 'utf-8')).toBe('x');
    });

    it('uses the configured limit by default', async () => {
      const llm = createScriptedLLM([textResponse('thinking')]);

      await createProgram({ io, createContainer: fakeContainer(llm) }).parseAsync([
        'node',
        'ralph',
        'loop',
        workdir,
        instructionFile,
      ]);

      expect(out).toEqual([
        '\n--- Iteration 1/1 ---',
        '[ASSISTANT]: thinking',
        'Iteration limit reached (1).',
      ]);
    });

    it('fails ask_user in unattended mode', async () => {
      const llm = createScriptedLLM([toolCallResponse('ask_user', { question: 'Proceed?' })]);

      await createProgram({ io, createContainer: fakeContainer(llm) }).parseAsync([
        'node',
        'ralph',
        'loop',
        workdir,
        instructionFile,
        '--unattended',
      ]);

      expect(out).toContain('[TOOL]: Error asking user: no operator is attached to this run');
    });

    it('exits non-zero when an iteration fails', async () => {
      const llm = createScriptedLLM([new Error('provider down')]);

      await createProgram({ io, createContainer: fakeContainer(llm) }).parseAsync([
        'node',
        'ralph',
        'loop',
        workdir,
        instructionFile,
        '-l',
        '2',
      ]);

      expect(out).toEqual([]);
      expect(err).toEqual(['Error in iteration 1: provider down']);
      expect(process.exitCode).toBe(1);
    });

    it('reports configuration faults', async () => {
      await createProgram({
        io,
        createContainer: () => Promise.reject(new ConfigFault('Invalid config file ralph.json: llm: bad')),
      }).parseAsync(['node', 'ralph', 'loop', workdir, instructionFile]);

      expect(err).toEqual(['Error: Invalid config file ralph.json: llm: bad']);
      expect(process.exitCode).toBe(1);
    });

    it('reports a missing working directory', async () => {
      const llm = createScriptedLLM([]);

      await createProgram({ io, createContainer: fakeContainer(llm) }).parseAsync([
        'node',
        'ralph',
        'loop',
        join(base, 'missing'),
        instructionFile,
      ]);

      expect(err).toEqual([`Error: Working directory not found: ${join(base, 'missing')}`]);
      expect(llm.callCount).toBe(0);
    });
  });
});
