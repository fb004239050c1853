import winston from "winston";

export type Logger = winston.Logger;

export type LoggerOptions = {
  level?: string;
  file?: string;
  silent?: boolean;
};

const LOG_FILE_MAX_BYTES = 10 * 1024 * 1024;
const LOG_FILE_MAX_FILES = 5;

// `[ts] level [scope] event {json}`
const lineFormat = winston.format.printf((info) => {
  const { timestamp, level, message, scope, ...meta } = info;
  const prefix = typeof scope === "string" && scope ? ` [${scope}]` : "";
  const tail = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
  return `[${String(timestamp)}] ${level}${prefix} ${String(message)}${tail}`;
});

export function createLogger(options: LoggerOptions = {}): Logger {
  const format = winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), lineFormat);
  const transports: winston.transport[] = [new winston.transports.Console()];
  if (options.file) {
    transports.push(
      new winston.transports.File({
        filename: options.file,
        maxsize: LOG_FILE_MAX_BYTES,
        maxFiles: LOG_FILE_MAX_FILES,
      })
    );
  }
  return winston.createLogger({
    level: options.level ?? "info",
    silent: options.silent ?? false,
    format,
    transports,
  });
}

let root: Logger | undefined;

export function setRootLogger(logger: Logger): void {
  root = logger;
}

export function getLogger(scope?: string): Logger {
  if (!root) root = createLogger();
  return scope ? root.child({ scope }) : root;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
