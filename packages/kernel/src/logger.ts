/**
 * Structured logging.
 *
 * A single pino root logger; components get tagged children through
 * `Logger.for()`. Call style is pino's: fields first, message second.
 *
 * @example
 * ```typescript
 * const log = Logger.for("Orchestrator");
 * log.debug({ sessionId, step }, "dispatching tools");
 * ```
 *
 * @module @citeline/kernel/logger
 */

import { pino, type Logger as PinoLogger, type LevelWithSilent } from "pino";

export type LogLevel = LevelWithSilent;

export interface LoggerConfig {
  /** Minimum level written (default "info", or LOG_LEVEL when set) */
  level?: LogLevel;
  /** Root logger name (default "citeline") */
  name?: string;
}

export type ComponentLogger = PinoLogger;

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env["LOG_LEVEL"];
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env["VITEST"] ? "silent" : "info";
}

let root: PinoLogger = pino({ name: "citeline", level: initialLevel() });
const children = new Map<string, PinoLogger>();

export const Logger = {
  /**
   * Reconfigure the root logger. Existing component loggers follow the new
   * level; a new name only applies to loggers created afterwards.
   */
  configure(config: LoggerConfig): void {
    if (config.name) {
      root = pino({ name: config.name, level: config.level ?? root.level });
      children.clear();
      return;
    }
    if (config.level) {
      root.level = config.level;
      for (const child of children.values()) {
        child.level = config.level;
      }
    }
  },

  /**
   * Logger for a named component, cached per name.
   */
  for(component: string): ComponentLogger {
    let child = children.get(component);
    if (!child) {
      child = root.child({ component });
      children.set(component, child);
    }
    return child;
  },

  get level(): string {
    return root.level;
  },
};
