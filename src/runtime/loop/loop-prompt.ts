/**
 * System prompt for each loop iteration.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { Logger } from '../../types/index.js';
import { errorMessage, isMissingPathError } from './loop-errors.js';

/** Base prompt location relative to the working directory. */
export const BASE_PROMPT_PATH = join('prompts', 'agent', 'prompt.md');

/**
 * Load the base prompt from the working directory. Missing file → empty prompt.
 */
export async function loadBasePrompt(workdir: string, logger?: Logger): Promise<string> {
  const path = join(workdir, BASE_PROMPT_PATH);
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    const reason = isMissingPathError(error) ? 'Base prompt not found' : 'Base prompt unreadable';
    logger?.warn({ path, error: errorMessage(error) }, `${reason}, continuing without it`);
    return '';
  }
}

export interface SystemPromptParts {
  basePrompt: string;
  workdir: string;
  instruction: string;
}

/**
 * Compose the system prompt from the base prompt, the absolute working
 * directory and the current instruction.
 */
export function buildSystemPrompt({ basePrompt, workdir, instruction }: SystemPromptParts): string {
  return [
    basePrompt,
    '',
    `You are working in the directory: ${resolve(workdir)}`,
    'Your goal is to follow these instructions:',
    instruction,
    '',
    'You have tools to list, read, and write files, and run commands.',
    'If you need to explore the codebase, use list_files and read_file.',
    'Do not hallucinate file contents. Always read them first.',
    'When you are satisfied that you have completed the task, call the done tool.',
    'If you cannot complete the task in one step, make progress and stop. You will be restarted with fresh context but the files will persist.',
  ].join('\n');
}
