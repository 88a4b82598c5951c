import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import { getTraceContext } from './trace-context.js';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files */
  logDir: string;
  /** Maximum number of log files to keep per kind */
  maxFiles: number;
  level: pino.Level;
  /** Pretty console output (development) */
  pretty: boolean;
  /** Also write a log file per run */
  fileOutput: boolean;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  logDir: './logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
  fileOutput: true,
};

/**
 * Timestamp-based log filename, e.g. `ralph-2024-05-01T10-00-00-000Z.log`.
 */
function generateLogFilename(prefix: string): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  return `${prefix}-${timestamp}.log`;
}

/**
 * Remove empty log files and keep only the newest `maxFiles` of one kind.
 */
export function cleanupOldLogs(logDir: string, prefix: string, maxFiles: number): void {
  if (!fs.existsSync(logDir)) {
    return;
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(`${prefix}-`) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const nonEmpty = files.filter((f) => f.size > 0).sort((a, b) => b.mtime - a.mtime);
  const doomed = [...files.filter((f) => f.size === 0), ...nonEmpty.slice(maxFiles)];

  for (const file of doomed) {
    try {
      fs.unlinkSync(file.path);
    } catch (error) {
      // Already gone (another process cleaned up)
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
    }
  }
}

/**
 * Pino mixin that injects the current trace context into every entry.
 * Explicit fields in log args take precedence over the context values.
 */
function createTraceMixin(): () => Record<string, unknown> {
  return () => {
    const ctx = getTraceContext();
    if (!ctx) return {};

    const result: Record<string, unknown> = { traceId: ctx.traceId };
    if (ctx.spanId) result['spanId'] = ctx.spanId;
    if (ctx.iteration !== undefined) result['iteration'] = ctx.iteration;
    return result;
  };
}

/**
 * Create the application logger.
 *
 * Console output goes through pino-pretty in development and as JSON to stderr
 * otherwise, so stdout stays free for the loop transcript. With file output on,
 * each process writes `ralph-<timestamp>.log` under `logDir`.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty, fileOutput } = { ...DEFAULT_LOGGER_CONFIG, ...config };

  const targets: pino.TransportTargetOptions[] = [];

  if (pretty) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: { colorize: true, destination: 2 },
    });
  } else {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: 2 },
    });
  }

  if (fileOutput) {
    fs.mkdirSync(logDir, { recursive: true });
    cleanupOldLogs(logDir, 'ralph', maxFiles);
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        destination: path.join(logDir, generateLogFilename('ralph')),
        mkdir: true,
        colorize: false,
      },
    });
  }

  return pino({
    level,
    transport: { targets },
    mixin: createTraceMixin(),
  });
}

/**
 * Create a plain-text logger for model requests and responses.
 *
 * Writes `conversation-<timestamp>.log` lines as `[HH:mm:ss.mmm] [trace:span] message`.
 */
export function createConversationLogger(
  logDir = DEFAULT_LOGGER_CONFIG.logDir,
  maxFiles = DEFAULT_LOGGER_CONFIG.maxFiles
): pino.Logger {
  fs.mkdirSync(logDir, { recursive: true });
  cleanupOldLogs(logDir, 'conversation', maxFiles);

  const logStream = fs.createWriteStream(path.join(logDir, generateLogFilename('conversation')), {
    flags: 'a',
  });

  const destination = {
    write(chunk: string): void {
      let parsed: { msg?: string; time?: number; traceId?: string; spanId?: string };
      try {
        parsed = JSON.parse(chunk) as typeof parsed;
      } catch {
        logStream.write(chunk);
        return;
      }
      if (!parsed.msg) return;

      let prefix = parsed.time ? `[${new Date(parsed.time).toISOString().slice(11, 23)}] ` : '';
      if (parsed.traceId || parsed.spanId) {
        prefix += `[${parsed.traceId?.slice(0, 8) ?? '????????'}:${parsed.spanId ?? '?'}] `;
      }
      logStream.write(prefix + parsed.msg + '\n');
    },
  };

  return pino({ level: 'info', mixin: createTraceMixin() }, destination);
}

/**
 * Process-wide conversation logger, set once by the CLI.
 */
let globalConversationLogger: pino.Logger | null = null;

export function setConversationLogger(logger: pino.Logger | null): void {
  globalConversationLogger = logger;
}

/**
 * Log to the conversation log. No-op until a conversation logger is set.
 */
export function logConversation(obj: object, msg: string): void {
  globalConversationLogger?.info(obj, msg);
}
