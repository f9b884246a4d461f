import pino from "pino";

export type Logger = pino.Logger;

export interface LoggerConfig {
  level?: string;
  pretty?: boolean;
}

function createBaseLogger(config: LoggerConfig = {}) {
  const {
    level = process.env.LOG_LEVEL || "info",
    pretty = process.env.LOG_PRETTY === "true" || process.env.NODE_ENV === "development",
  } = config;

  const transport = pretty
    ? pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      })
    : pino.destination(2);

  return pino(
    {
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    transport,
  );
}

// stderr; stdout carries command output.
export const logger = createBaseLogger();

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export function createDiffLogger() {
  return createChildLogger({ component: "diff" });
}

export function createPatchLogger() {
  return createChildLogger({ component: "patch" });
}

export function createIoLogger() {
  return createChildLogger({ component: "io" });
}

export function createCliLogger() {
  return createChildLogger({ component: "cli" });
}
