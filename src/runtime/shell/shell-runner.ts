/**
 * Shell Runner - shell command execution for the run_command tool.
 *
 * Commands run through the system shell with the working directory as cwd.
 * The command string itself is not sandboxed. Each command gets its own process
 * group so a timeout kills the whole tree, not just the shell.
 */

import { spawn } from 'node:child_process';
import { ToolFault, errorMessage } from '../loop/loop-errors.js';

/**
 * Shell execution options.
 */
export interface ShellOptions {
  /** Working directory */
  cwd: string;

  /** Timeout in milliseconds (default: 60000) */
  timeoutMs?: number;

  /** Maximum size of each captured stream in bytes (default: 256KB) */
  maxOutputSize?: number;
}

/**
 * Captured result of a finished command.
 */
export interface ShellResult {
  stdout: string;
  stderr: string;
  /** Exit code, or null when the process ended on a signal */
  exitCode: number | null;
  durationMs: number;
}

export const DEFAULT_SHELL_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_OUTPUT_SIZE = 256 * 1024;

/**
 * Bounded capture of one output stream: keeps the first `maxSize` bytes and
 * counts the rest.
 */
class StreamCapture {
  private readonly chunks: Buffer[] = [];
  private kept = 0;
  private dropped = 0;

  constructor(private readonly maxSize: number) {}

  push(chunk: Buffer): void {
    const room = this.maxSize - this.kept;
    if (room >= chunk.length) {
      this.chunks.push(chunk);
      this.kept += chunk.length;
      return;
    }
    if (room > 0) {
      this.chunks.push(chunk.subarray(0, room));
      this.kept += room;
    }
    this.dropped += chunk.length - Math.max(room, 0);
  }

  /**
   * Captured text, with a notice when output was cut. A multi-byte character
   * split at the limit decodes as U+FFFD.
   */
  text(): string {
    const output = Buffer.concat(this.chunks, this.kept).toString('utf8');
    if (this.dropped === 0) {
      return output;
    }
    const total = this.kept + this.dropped;
    return `${output}\n\n[... output truncated (${(total / 1024).toFixed(1)}KB exceeds limit ${String(this.maxSize / 1024)}KB) ...]`;
  }
}

/**
 * Kill the command's whole process group.
 */
function killGroup(pid: number | undefined): void {
  if (pid === undefined) return;
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (error) {
    // ESRCH: the group already exited
    if (!(error instanceof Error && 'code' in error && error.code === 'ESRCH')) {
      throw error;
    }
  }
}

/**
 * Run a shell command, capturing stdout and stderr separately.
 *
 * A non-zero exit status still resolves with the captured output.
 *
 * @throws ToolFault on timeout or when the shell cannot be spawned
 */
export function runShell(command: string, options: ShellOptions): Promise<ShellResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_SHELL_TIMEOUT_MS;
  const maxOutputSize = options.maxOutputSize ?? DEFAULT_MAX_OUTPUT_SIZE;
  const startTime = Date.now();

  return new Promise<ShellResult>((resolve, reject) => {
    const child = spawn(command, {
      cwd: options.cwd,
      shell: true,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdout = new StreamCapture(maxOutputSize);
    const stderr = new StreamCapture(maxOutputSize);
    let settled = false;

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      try {
        killGroup(child.pid);
      } catch (error) {
        reject(new ToolFault(`Failed to stop timed out command: ${errorMessage(error)}`));
        return;
      }
      reject(new ToolFault(`Command timed out after ${String(timeoutMs)}ms`));
    }, timeoutMs);

    child.on('error', (error) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      reject(new ToolFault(error.message, { cause: error }));
    });

    child.on('close', (code) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      resolve({
        stdout: stdout.text(),
        stderr: stderr.text(),
        exitCode: code,
        durationMs: Date.now() - startTime,
      });
    });
  });
}
