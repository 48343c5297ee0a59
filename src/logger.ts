import pino from "pino";

export type StoreLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
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
