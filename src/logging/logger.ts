import pino, { type Logger, type LoggerOptions } from "pino";

type CreateLoggerInput = {
  level?: string;
  name?: string;
};

/** Level from SLIMSTAGE_LOG_LEVEL; silent under the test runner unless set explicitly. */
export const resolveLogLevel = (env: NodeJS.ProcessEnv = process.env): string => {
  if (env.SLIMSTAGE_LOG_LEVEL) return env.SLIMSTAGE_LOG_LEVEL;
  return env.NODE_ENV === "test" ? "silent" : "info";
};

export const buildLoggerOptions = ({ level, name = "slimstage" }: CreateLoggerInput = {}): LoggerOptions => ({
  name,
  level: level ?? resolveLogLevel(),
  base: { service: name },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Logs go to stderr so stdout stays reserved for command output (human or jsonl).
 */
export const createLogger = (input: CreateLoggerInput = {}): Logger => {
  return pino(buildLoggerOptions(input), pino.destination(2));
};

export const logger = createLogger();

export const createComponentLogger = (component: string, parent: Logger = logger): Logger => {
  return parent.child({ component });
};

export type { Logger };
