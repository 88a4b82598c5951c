/**
 * Command-line interface: `ralph loop`, `ralph ask`, `ralph version`.
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Message } from '../llm/provider.js';
import type { Container, ContainerOptions } from '../core/container.js';
import { createContainer } from '../core/container.js';
import type { IterationReport, LoopOutcome, OperatorChannel } from '../runtime/loop/index.js';
import {
  ConsoleOperator,
  UnattendedOperator,
  errorMessage,
  runAgentLoop,
} from '../runtime/loop/index.js';

export const ASK_SYSTEM_PROMPT = 'You are a helpful assistant.';

/**
 * Output sinks for the transcript and for errors.
 */
export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

/**
 * Replaceable collaborators, for tests.
 */
export interface ProgramDeps {
  createContainer?: (options: ContainerOptions) => Promise<Container>;
  /** Operator for ask_user (default: the terminal, or unattended with --unattended) */
  operator?: OperatorChannel;
  io?: CliIO;
  readVersion?: () => Promise<string | null>;
}

interface GlobalOptions {
  config?: string;
  secrets?: string;
  debug?: boolean;
}

interface LoopCommandOptions {
  limit?: number;
  unattended?: boolean;
  shellTimeout?: number;
}

const packageJsonSchema = z.object({ version: z.string() });

/**
 * Version from the package manifest, or null when it cannot be read.
 */
export async function readPackageVersion(): Promise<string | null> {
  try {
    const path = fileURLToPath(new URL('../../package.json', import.meta.url));
    const parsed = packageJsonSchema.safeParse(JSON.parse(await readFile(path, 'utf-8')));
    return parsed.success ? parsed.data.version : null;
  } catch {
    return null;
  }
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Render a message as transcript lines: `[ROLE]: content`, plus one line per tool call.
 */
export function formatMessage(message: Message): string[] {
  const role = message.role.toUpperCase();
  const lines: string[] = [];
  if (message.content !== null || !message.tool_calls?.length) {
    lines.push(`[${role}]: ${message.content ?? ''}`);
  }
  for (const call of message.tool_calls ?? []) {
    lines.push(`[${role}]: -> ${call.function.name}(${call.function.arguments})`);
  }
  return lines;
}

/**
 * One-line summary of how a run ended.
 */
export function describeOutcome(outcome: LoopOutcome): string {
  switch (outcome.status) {
    case 'completed':
      return 'Objective met (agent signaled done).';
    case 'exhausted':
      return `Iteration limit reached (${String(outcome.iterations)}).`;
    case 'failed':
      return `Error in iteration ${String(outcome.iterations)}: ${outcome.error?.message ?? 'unknown error'}`;
  }
}

/**
 * Build the CLI program.
 */
export function createProgram(deps: ProgramDeps = {}): Command {
  const io: CliIO = deps.io ?? {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
  };
  const buildContainer = deps.createContainer ?? createContainer;
  const readVersion = deps.readVersion ?? readPackageVersion;

  const program = new Command();
  program
    .name('ralph')
    .description('Run a language model in a loop with file and shell tools inside a directory')
    .option('-c, --config <file>', 'JSON config file (default: ./ralph.json when present)')
    .option('--secrets <dir>', 'Directory with one file per secret (llm_api_key)')
    .option('--debug', 'Debug logging');

  const containerOptions = (): ContainerOptions => {
    const opts = program.opts<GlobalOptions>();
    return { configFile: opts.config, secretsDir: opts.secrets, debug: opts.debug ?? false };
  };

  program
    .command('version')
    .description('Print the version of the application')
    .action(async () => {
      io.out((await readVersion()) ?? 'Package not found');
    });

  program
    .command('ask')
    .description('Ask the model a single question')
    .argument('<question>', 'Question text')
    .action(async (question: string) => {
      try {
        const { config, llm } = await buildContainer(containerOptions());
        const response = await llm.complete({
          messages: [
            { role: 'system', content: ASK_SYSTEM_PROMPT },
            { role: 'user', content: question },
          ],
          temperature: config.llm.temperature,
          maxTokens: config.llm.maxTokens,
        });
        io.out(response.content ?? '');
      } catch (error) {
        io.err(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  program
    .command('loop')
    .description('Run the agent loop on a working directory')
    .argument('<workdir>', 'Existing working directory')
    .argument('<instruction-file>', 'File with the instruction to follow')
    .option('-l, --limit <n>', 'Maximum iterations', parsePositiveInt)
    .option('--shell-timeout <ms>', 'run_command timeout in milliseconds', parsePositiveInt)
    .option('--unattended', 'Fail ask_user instead of prompting on the terminal')
    .action(async (workdir: string, instructionFile: string, options: LoopCommandOptions) => {
      try {
        const { config, logger, llm } = await buildContainer(containerOptions());
        const operator =
          deps.operator ?? (options.unattended ? new UnattendedOperator() : new ConsoleOperator());

        const outcome = await runAgentLoop({
          workdir,
          instructionFile,
          limit: options.limit ?? config.loop.limit,
          operator,
          logger,
          llm,
          model: config.llm.model,
          temperature: config.llm.temperature,
          maxTokens: config.llm.maxTokens,
          shellTimeoutMs: options.shellTimeout ?? config.loop.shellTimeoutMs,
          allowedTools: config.tools.allowed,
          onIteration: (report: IterationReport) => {
            io.out(`\n--- Iteration ${String(report.iteration)}/${String(report.limit)} ---`);
            for (const message of report.newMessages) {
              for (const line of formatMessage(message)) io.out(line);
            }
          },
        });

        if (outcome.status === 'failed') {
          io.err(describeOutcome(outcome));
          process.exitCode = 1;
        } else {
          io.out(describeOutcome(outcome));
        }
      } catch (error) {
        io.err(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  return program;
}
