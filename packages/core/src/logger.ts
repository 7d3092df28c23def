import { pino, type Logger } from "pino";
import { z } from "zod";

export type { Logger };

export const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export type LogLevel = z.infer<typeof logLevelSchema>;

/** Unknown or missing values resolve to "info" instead of making pino throw at import. */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = logLevelSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : "info";
}

export const logger: Logger = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  formatters: { level: (label) => ({ level: label }) },
  timestamp: pino.stdTimeFunctions.isoTime,
});

// Children snapshot the parent level when created, so level changes are pushed to each one.
const children = new Set<Logger>();

/** Child logger tagged with the emitting module, e.g. `createLogger("segmenter")`. */
export function createLogger(module: string): Logger {
  const child = logger.child({ module });
  children.add(child);
  return child;
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of children) child.level = level;
}
