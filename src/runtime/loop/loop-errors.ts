/**
 * Loop Error Types
 *
 * Typed error classes for the agent loop. Tool faults never escape a tool call:
 * they are rendered into the tool's string result. Engine faults stop the loop.
 * Config faults stop the loop before it starts.
 */

/**
 * Loop error codes for classification.
 */
export type LoopErrorCode = 'TOOL_FAULT' | 'PATH_ESCAPE' | 'ENGINE_FAULT' | 'CONFIG_FAULT';

/**
 * Base loop error class.
 */
export class LoopError extends Error {
  constructor(
    message: string,
    public readonly code: LoopErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LoopError';
  }
}

/**
 * Failure inside a tool. Converted to a string result by the dispatcher.
 */
export class ToolFault extends LoopError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: Extract<LoopErrorCode, 'TOOL_FAULT' | 'PATH_ESCAPE'> }
  ) {
    super(message, options?.code ?? 'TOOL_FAULT', options);
    this.name = 'ToolFault';
  }
}

/**
 * A path argument resolved outside the working directory.
 */
export class PathEscapeError extends ToolFault {
  constructor(
    public readonly rawPath: string,
    public readonly root: string
  ) {
    super(`Path '${rawPath}' resolves outside the working directory '${root}'`, {
      code: 'PATH_ESCAPE',
    });
    this.name = 'PathEscapeError';
  }
}

/**
 * The reasoning step failed (provider error, exhausted retries, malformed response).
 * Fail-stop: the loop records it and ends the run.
 */
export class EngineFault extends LoopError {
  constructor(
    message: string,
    public readonly iteration: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'ENGINE_FAULT', options);
    this.name = 'EngineFault';
  }
}

/**
 * Missing or invalid configuration.
 */
export class ConfigFault extends LoopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_FAULT', options);
    this.name = 'ConfigFault';
  }
}

/**
 * Extract a readable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True for filesystem errors that mean "nothing there".
 */
export function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}
