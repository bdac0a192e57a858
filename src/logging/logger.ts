import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

export type CreateLoggerOptions = {
  level?: string;
  pretty?: boolean;
  env?: NodeJS.ProcessEnv;
};

/**
 * Resolve the log level. Tests run silent unless RESTAMP_LOG_LEVEL says otherwise.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env, fallback = "info"): string {
  const explicit = env.RESTAMP_LOG_LEVEL?.trim();
  if (explicit) {
    return explicit;
  }
  if (env.VITEST) {
    return "silent";
  }
  return fallback;
}

export function createLogger(opts: CreateLoggerOptions = {}): Logger {
  const env = opts.env ?? process.env;
  const pretty = opts.pretty ?? env.RESTAMP_LOG_PRETTY === "1";
  const options: LoggerOptions = {
    level: opts.level ?? resolveLogLevel(env),
    base: { app: "restamp" },
  };
  if (pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        singleLine: true,
        destination: 2,
      },
    };
    return pino(options);
  }
  // stderr keeps stdout free for --json output
  return pino(options, pino.destination(2));
}

export const logger = createLogger();
