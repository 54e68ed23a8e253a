import pino from "pino";

export type Logger = pino.Logger;

export interface LoggerOptions {
  level: pino.LevelWithSilent;
}

/** Root logger; components take a child via {@link moduleLogger}. */
export function createLogger(options: LoggerOptions): Logger {
  return pino({
    level: options.level,
    base: { app: "voicelens" },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function moduleLogger(parent: Logger, moduleName: string): Logger {
  return parent.child({ module: moduleName });
}

/** Logger that discards everything; used by tests. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
