/**
 * Logger interface for dependency injection.
 *
 * Matches the subset of Pino's API the loop uses, so components can be
 * handed a pino instance in production and a mock in tests.
 */
export interface Logger {
  trace(obj: object, msg?: string): void;
  trace(msg: string): void;
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;

  /** Create a child logger with additional context */
  child(bindings: Record<string, unknown>): Logger;
}
