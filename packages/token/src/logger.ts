/**
 * @tallystake/token: Logger.
 */

import { pino } from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

export interface LoggerOptions {
  readonly level: string;
  /** Pretty-print through pino-pretty (development only). */
  readonly pretty?: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino({
    level: options.level,
    ...(options.pretty === true
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/** A logger that drops everything. Used when none is supplied. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
