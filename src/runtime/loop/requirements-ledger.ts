/**
 * Requirements Ledger
 *
 * `prd.json` in the working directory: a branch name plus a list of user
 * stories the agent records as it plans work. Appends are load-merge-save and
 * not atomic; one loop per working directory is assumed.
 */

import { randomUUID } from 'node:crypto';
import { readFile, writeFile } from 'node:fs/promises';
import { ToolFault, isMissingPathError } from './loop-errors.js';
import { resolveInWorkdir } from './path-sandbox.js';

export const LEDGER_FILE = 'prd.json';
export const DEFAULT_BRANCH = 'main';

/**
 * One recorded story. New stories always start with `passes: false`.
 */
export interface Story {
  storyId: string;
  storyTitle: string;
  passes: boolean;
  notes?: string;
}

/**
 * Ledger document. Unknown top-level keys and existing stories are kept as found.
 */
export interface LedgerDocument {
  branchName: string;
  userStories: unknown[];
  [key: string]: unknown;
}

export interface NewStory {
  title: string;
  id?: string | undefined;
  notes?: string | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function emptyLedger(): LedgerDocument {
  return { branchName: DEFAULT_BRANCH, userStories: [] };
}

/**
 * Ledger path inside the working directory.
 *
 * @throws PathEscapeError when prd.json is a link leading outside
 */
export function resolveLedgerPath(workdir: string): Promise<string> {
  return resolveInWorkdir(LEDGER_FILE, workdir);
}

/**
 * Read the ledger. A missing or malformed file yields a fresh document.
 */
export async function readLedger(workdir: string): Promise<LedgerDocument> {
  return readLedgerAt(await resolveLedgerPath(workdir));
}

async function readLedgerAt(path: string): Promise<LedgerDocument> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingPathError(error)) return emptyLedger();
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return emptyLedger();
  }
  if (!isRecord(parsed)) return emptyLedger();

  const stories = parsed['userStories'];
  if (stories === undefined) {
    return { ...parsed, branchName: readBranch(parsed), userStories: [] };
  }
  if (!Array.isArray(stories)) {
    throw new ToolFault(`${LEDGER_FILE} field 'userStories' is not a list`);
  }
  return { ...parsed, branchName: readBranch(parsed), userStories: stories };
}

function readBranch(doc: Record<string, unknown>): string {
  const branch = doc['branchName'];
  return typeof branch === 'string' ? branch : DEFAULT_BRANCH;
}

/**
 * Append a story and rewrite the file with 2-space indentation.
 * Ids are not checked for uniqueness; an empty id is replaced and empty notes are left out.
 */
export async function appendStory(workdir: string, input: NewStory): Promise<Story> {
  const path = await resolveLedgerPath(workdir);
  const ledger = await readLedgerAt(path);

  const story: Story = {
    storyId: input.id || randomUUID().slice(0, 8),
    storyTitle: input.title,
    passes: false,
  };
  if (input.notes) {
    story.notes = input.notes;
  }

  ledger.userStories.push(story);
  await writeFile(path, JSON.stringify(ledger, null, 2), 'utf-8');
  return story;
}
