/**
 * Instruction Store
 *
 * The instruction lives on disk so the agent can rewrite it. It is re-read at
 * the top of every iteration; the last write wins.
 */

import { readFile, writeFile } from 'node:fs/promises';
import type { Logger } from '../../types/index.js';
import { errorMessage } from './loop-errors.js';

/**
 * Read the instruction, falling back to `fallback` on any read failure.
 */
export async function loadInstruction(
  path: string,
  fallback: string,
  logger?: Logger
): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    logger?.warn({ path, error: errorMessage(error) }, 'Instruction unreadable, using start-up text');
    return fallback;
  }
}

/**
 * Overwrite the instruction file.
 */
export async function saveInstruction(path: string, text: string): Promise<void> {
  await writeFile(path, text, 'utf-8');
}

/**
 * Instruction bound to its file and the text it started with.
 */
export class InstructionStore {
  constructor(
    readonly path: string,
    private readonly initialText: string,
    private readonly logger?: Logger
  ) {}

  /** Current instruction text, never throws. */
  current(): Promise<string> {
    return loadInstruction(this.path, this.initialText, this.logger);
  }

  update(text: string): Promise<void> {
    return saveInstruction(this.path, text);
  }
}
