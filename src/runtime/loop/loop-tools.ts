/**
 * Loop Tools
 *
 * The fixed tool set the agent can call. Each tool takes validated arguments
 * plus the run context and returns a short text result (or a list for
 * list_files). Faults inside a tool never propagate: they become error strings
 * the model can read and react to.
 */

import { mkdir, readFile, readdir, stat, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import type { OpenAIChatTool, ToolParameter } from '../../llm/tool-schema.js';
import { toOpenAITool } from '../../llm/tool-schema.js';
import { runShell } from '../shell/shell-runner.js';
import type { LoopToolName, RunContext, ToolResult } from './loop-protocol.js';
import { COMPLETION_SENTINEL } from './loop-protocol.js';
import { ConfigFault, errorMessage, isMissingPathError } from './loop-errors.js';
import { resolveInWorkdir } from './path-sandbox.js';
import { appendStory, LEDGER_FILE } from './requirements-ledger.js';
import { saveInstruction } from './instruction-store.js';

/**
 * A registered tool: its model-facing definition and a runner that validates
 * raw arguments before executing.
 */
interface RegisteredTool {
  definition: OpenAIChatTool;
  run(rawArgs: unknown, ctx: RunContext): Promise<ToolResult>;
}

/**
 * Register a tool whose arguments are checked against a zod schema.
 */
function defineTool<S extends z.ZodTypeAny>(
  name: LoopToolName,
  description: string,
  parameters: ToolParameter[],
  schema: S,
  execute: (args: z.infer<S>, ctx: RunContext) => Promise<ToolResult>
): RegisteredTool {
  return {
    definition: toOpenAITool(name, description, parameters),
    async run(rawArgs, ctx) {
      const parsed = schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((i) => `${i.path.join('.') || 'arguments'}: ${i.message}`)
          .join('; ');
        return `Error: Invalid arguments for ${name}: ${issues}`;
      }
      return execute(parsed.data, ctx);
    },
  };
}

/**
 * Working directory from the context, or a config fault.
 */
function requireWorkdir(ctx: RunContext): string {
  if (!ctx.workdir) {
    throw new ConfigFault('Workdir not found in context configuration');
  }
  return ctx.workdir;
}

/**
 * Recursively list files under dir as `/`-separated relative paths.
 * Skips `.git` and `node_modules`; symlinks are not followed.
 */
async function walkDir(dir: string, basePath = ''): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = basePath ? `${basePath}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      if (entry.name === 'node_modules' || entry.name === '.git') continue;
      files.push(...(await walkDir(join(dir, entry.name), entryPath)));
    } else if (entry.isFile()) {
      files.push(entryPath);
    }
  }
  return files;
}

const optionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

/**
 * Tool registry, in the order the tools are offered to the model.
 */
const TOOLS: Record<LoopToolName, RegisteredTool> = {
  list_files: defineTool(
    'list_files',
    'List all files under a directory of the working directory, recursively. Paths are relative to the listed directory.',
    [{ name: 'path', type: 'string', description: 'Directory to list (default ".")', required: false }],
    z.object({ path: optionalString }),
    async ({ path = '.' }, ctx) => {
      try {
        const dir = await resolveInWorkdir(path, requireWorkdir(ctx));
        try {
          if (!(await stat(dir)).isDirectory()) return [];
        } catch (error) {
          if (isMissingPathError(error)) return [];
          throw error;
        }
        return (await walkDir(dir)).sort();
      } catch (error) {
        return [`Error: ${errorMessage(error)}`];
      }
    }
  ),

  read_file: defineTool(
    'read_file',
    'Read the full UTF-8 content of a file in the working directory.',
    [{ name: 'path', type: 'string', description: 'File to read', required: true }],
    z.object({ path: z.string() }),
    async ({ path }, ctx) => {
      try {
        const fullPath = await resolveInWorkdir(path, requireWorkdir(ctx));
        return await readFile(fullPath, 'utf-8');
      } catch (error) {
        return `Error reading file ${path}: ${errorMessage(error)}`;
      }
    }
  ),

  write_file: defineTool(
    'write_file',
    'Write content to a file in the working directory, replacing it. Parent directories are created.',
    [
      { name: 'path', type: 'string', description: 'File to write', required: true },
      { name: 'content', type: 'string', description: 'Full new file content', required: true },
    ],
    z.object({ path: z.string(), content: z.string() }),
    async ({ path, content }, ctx) => {
      try {
        const fullPath = await resolveInWorkdir(path, requireWorkdir(ctx));
        await mkdir(dirname(fullPath), { recursive: true });
        await writeFile(fullPath, content, 'utf-8');
        return `Successfully wrote to ${path}`;
      } catch (error) {
        return `Error writing to file ${path}: ${errorMessage(error)}`;
      }
    }
  ),

  run_command: defineTool(
    'run_command',
    'Run a shell command in the working directory and return its stdout and stderr. Commands time out after 60 seconds.',
    [{ name: 'command', type: 'string', description: 'Shell command line', required: true }],
    z.object({ command: z.string().min(1) }),
    async ({ command }, ctx) => {
      try {
        const result = await runShell(command, {
          cwd: requireWorkdir(ctx),
          timeoutMs: ctx.shellTimeoutMs,
        });
        ctx.logger?.debug(
          { command, exitCode: result.exitCode, durationMs: result.durationMs },
          'Command finished'
        );
        return `stdout:\n${result.stdout}\nstderr:\n${result.stderr}`;
      } catch (error) {
        return `Error running command: ${errorMessage(error)}`;
      }
    }
  ),

  update_ledger: defineTool(
    'update_ledger',
    `Add a user story to ${LEDGER_FILE} in the working directory. New stories start as not passing.`,
    [
      { name: 'story_title', type: 'string', description: 'Short story title', required: true },
      { name: 'story_id', type: 'string', description: 'Story id (generated when omitted)', required: false },
      { name: 'notes', type: 'string', description: 'Details or acceptance notes', required: false },
    ],
    z.object({ story_title: z.string(), story_id: optionalString, notes: optionalString }),
    async ({ story_title, story_id, notes }, ctx) => {
      try {
        const story = await appendStory(requireWorkdir(ctx), {
          title: story_title,
          id: story_id,
          notes,
        });
        ctx.logger?.info({ storyId: story.storyId, storyTitle: story.storyTitle }, 'Story recorded');
        return `Successfully added story '${story_title}' to ${LEDGER_FILE}`;
      } catch (error) {
        return `Error updating PRD: ${errorMessage(error)}`;
      }
    }
  ),

  ask_user: defineTool(
    'ask_user',
    'Ask the human operator a question and wait for the answer. Use only when blocked.',
    [{ name: 'question', type: 'string', description: 'Question for the operator', required: true }],
    z.object({ question: z.string() }),
    async ({ question }, ctx) => {
      try {
        return await ctx.operator.ask(question);
      } catch (error) {
        return `Error asking user: ${errorMessage(error)}`;
      }
    }
  ),

  update_instruction: defineTool(
    'update_instruction',
    'Replace the instruction you are following. The next iteration starts from the new text.',
    [{ name: 'new_instruction', type: 'string', description: 'Full new instruction text', required: true }],
    z.object({ new_instruction: z.string() }),
    async ({ new_instruction }, ctx) => {
      if (!ctx.instructionPath) {
        return 'Error: No instruction file path found in configuration.';
      }
      try {
        await saveInstruction(ctx.instructionPath, new_instruction);
        ctx.logger?.info({ path: ctx.instructionPath }, 'Instruction updated');
        return 'Successfully updated instruction file.';
      } catch (error) {
        return `Error updating instruction: ${errorMessage(error)}`;
      }
    }
  ),

  done: defineTool(
    'done',
    'Signal that the task is complete. Call only when every part of the instruction is finished.',
    [],
    z.object({}).passthrough(),
    async (_args, ctx) => {
      try {
        requireWorkdir(ctx);
        return COMPLETION_SENTINEL;
      } catch (error) {
        return `Error: ${errorMessage(error)}`;
      }
    }
  ),
};

/**
 * All tool names, in registry order.
 */
export const TOOL_NAMES = Object.keys(TOOLS).filter(isToolName);

/**
 * Narrow a string to a known tool name.
 */
export function isToolName(name: string): name is LoopToolName {
  return Object.prototype.hasOwnProperty.call(TOOLS, name);
}

/**
 * Tool definitions for the model, optionally limited to an allow-list.
 * An empty allow-list means every tool.
 */
export function getToolDefinitions(allowed: readonly string[] = []): OpenAIChatTool[] {
  const names = allowed.length > 0 ? TOOL_NAMES.filter((n) => allowed.includes(n)) : TOOL_NAMES;
  return names.map((n) => TOOLS[n].definition);
}

/**
 * Execute a tool by name.
 *
 * `rawArgs` may be the JSON-encoded argument string from a tool call or an
 * already-parsed object. Never throws.
 */
export async function executeTool(
  name: string,
  rawArgs: string | Record<string, unknown>,
  ctx: RunContext,
  allowed: readonly string[] = []
): Promise<ToolResult> {
  if (!isToolName(name) || (allowed.length > 0 && !allowed.includes(name))) {
    return `Error: Unknown tool '${name}'`;
  }

  let args: unknown = rawArgs;
  if (typeof rawArgs === 'string') {
    try {
      args = rawArgs.trim() === '' ? {} : JSON.parse(rawArgs);
    } catch (error) {
      return `Error: Invalid arguments for ${name}: ${errorMessage(error)}`;
    }
  }

  try {
    return await TOOLS[name].run(args, ctx);
  } catch (error) {
    ctx.logger?.error({ tool: name, error: errorMessage(error) }, 'Tool raised unexpectedly');
    return `Error: ${errorMessage(error)}`;
  }
}
