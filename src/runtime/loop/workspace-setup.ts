/**
 * Workspace Setup
 *
 * Prepares a working directory before the loop starts: seeds the bundled
 * prompts when they are missing and copies the instruction file to
 * `prompts/instructions/<name>` where the agent can rewrite it.
 */

import { access, copyFile, cp, mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Logger } from '../../types/index.js';
import { ConfigFault, errorMessage, isMissingPathError } from './loop-errors.js';
import { BASE_PROMPT_PATH } from './loop-prompt.js';

/** Prompts shipped with the package. */
export const BUNDLED_PROMPTS_DIR = fileURLToPath(new URL('../../../prompts/', import.meta.url));

export const INSTRUCTIONS_DIR = join('prompts', 'instructions');

export interface PrepareOptions {
  /** Source for seeded prompts (default: the bundled prompts) */
  bundledPromptsDir?: string;
  logger?: Logger;
}

export interface PreparedWorkspace {
  /** Absolute working directory */
  workdir: string;
  /** Instruction copy inside the working directory */
  instructionPath: string;
  /** Instruction text at start-up */
  instruction: string;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isMissingPathError(error)) return false;
    throw error;
  }
}

/**
 * Seed `<workdir>/prompts` from the bundled prompts.
 *
 * - whole tree copied when `prompts/` is missing
 * - only `agent/prompt.md` copied when that file alone is missing
 * - `prompts/instructions/` always exists afterwards
 */
export async function ensurePromptFiles(
  workdir: string,
  bundledPromptsDir: string = BUNDLED_PROMPTS_DIR,
  logger?: Logger
): Promise<void> {
  const promptsDir = join(workdir, 'prompts');
  const bundledAvailable = await exists(bundledPromptsDir);

  if (!(await exists(promptsDir))) {
    if (bundledAvailable) {
      await cp(bundledPromptsDir, promptsDir, { recursive: true });
      logger?.info({ from: bundledPromptsDir, to: promptsDir }, 'Seeded prompts directory');
    } else {
      logger?.warn({ bundledPromptsDir }, 'Bundled prompts not found, skipping seed');
    }
  }

  const promptFile = join(workdir, BASE_PROMPT_PATH);
  const bundledPrompt = join(bundledPromptsDir, 'agent', 'prompt.md');
  if (!(await exists(promptFile)) && (await exists(bundledPrompt))) {
    await mkdir(dirname(promptFile), { recursive: true });
    await copyFile(bundledPrompt, promptFile);
    logger?.info({ path: promptFile }, 'Restored base prompt');
  }

  await mkdir(join(workdir, INSTRUCTIONS_DIR), { recursive: true });
}

/**
 * Validate inputs and prepare the working directory for a run.
 *
 * @throws ConfigFault when the working directory or instruction file is missing
 */
export async function prepareWorkspace(
  workdir: string,
  instructionFile: string,
  options: PrepareOptions = {}
): Promise<PreparedWorkspace> {
  const root = resolve(workdir);

  let isDirectory = false;
  try {
    isDirectory = (await stat(root)).isDirectory();
  } catch (error) {
    if (!isMissingPathError(error)) throw error;
  }
  if (!isDirectory) {
    throw new ConfigFault(`Working directory not found: ${root}`);
  }

  let instruction: string;
  try {
    instruction = await readFile(instructionFile, 'utf-8');
  } catch (error) {
    throw new ConfigFault(`Instruction file not readable: ${instructionFile} (${errorMessage(error)})`, {
      cause: error,
    });
  }

  await ensurePromptFiles(root, options.bundledPromptsDir, options.logger);

  const instructionPath = join(root, INSTRUCTIONS_DIR, basename(instructionFile));
  if (resolve(instructionFile) !== instructionPath) {
    await writeFile(instructionPath, instruction, 'utf-8');
  }
  options.logger?.info({ workdir: root, instructionPath }, 'Workspace prepared');

  return { workdir: root, instructionPath, instruction };
}
