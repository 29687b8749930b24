import { LogLevel } from "./env";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

interface CreateLoggerOptions {
  minLevel?: LogLevel;
  write?: (line: string) => void;
}

export interface LoggerContext {
  session_id?: string;
  stage?: string;
  next_stage?: string;
  field?: string;
  skill?: string;
  prompt_name?: string;
  model_name?: string;
  latency_ms?: number;
  accepted_by?: string;
  ok?: boolean;
  error_code?: string;
}

function log(
  level: LogLevel,
  message: string,
  meta: Record<string, unknown> | undefined,
  write: (line: string) => void,
): void {
  const payload: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };
  if (meta) {
    payload.meta = meta;
  }
  write(`${JSON.stringify(payload)}\n`);
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const minLevel = options?.minLevel ?? "info";
  const write = options?.write ?? ((line: string) => process.stdout.write(line));
  const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[minLevel]) {
      return;
    }
    log(level, message, meta, write);
  };
  return {
    debug(message, meta) {
      emit("debug", message, meta);
    },
    info(message, meta) {
      emit("info", message, meta);
    },
    warn(message, meta) {
      emit("warn", message, meta);
    },
    error(message, meta) {
      emit("error", message, meta);
    },
  };
}

export function logContext(
  logger: Logger,
  level: LogLevel,
  message: string,
  context: LoggerContext,
  fields?: Record<string, unknown>,
): void {
  const meta: Record<string, unknown> = {
    ...context,
    ...(fields ?? {}),
  };

  if (level === "debug") {
    logger.debug(message, meta);
    return;
  }
  if (level === "warn") {
    logger.warn(message, meta);
    return;
  }
  if (level === "error") {
    logger.error(message, meta);
    return;
  }
  logger.info(message, meta);
}
