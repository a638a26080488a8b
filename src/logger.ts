import pino from "pino";

export type LogFn = (obj: Record<string, unknown>, msg?: string) => void;

export type PipelineLogger = {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
};

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === "test") return "silent";
  return env.NODE_ENV === "production" ? "info" : "debug";
}

export function createLogger(env: NodeJS.ProcessEnv = process.env): pino.Logger {
  const isDev = env.NODE_ENV !== "production";
  return pino({
    level: resolveLogLevel(env),
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDev && env.PINO_PRETTY === "1"
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  });
}

export const silentLogger: PipelineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
