/**
 * Error taxonomy for the ingestion core. HTTP mapping lives in http/errors.ts.
 */

export abstract class ClientInputError extends Error {
  abstract readonly code: string;
}

export type SourceErrorCode =
  | "missing_part"
  | "empty_selection"
  | "fetch_error"
  | "decode_error"
  | "not_found"
  | "unreadable"
  | "too_large";

export class SourceError extends ClientInputError {
  readonly code: SourceErrorCode;

  constructor(code: SourceErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SourceError";
    this.code = code;
  }
}

export type ValidationErrorCode =
  | "too_large"
  | "unsupported_extension"
  | "unsupported_content_type"
  | "path_traversal"
  | "invalid_parameter";

export class ValidationError extends ClientInputError {
  readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
  }
}

/** Nonzero exit (or spawn failure) of an external tool. */
export class ToolError extends Error {
  readonly tool: string;
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stderr: string;

  constructor(args: {
    tool: string;
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stderr: string;
    cause?: unknown;
  }) {
    const msg = `${args.tool} failed code=${args.exitCode ?? "null"} signal=${args.signal ?? "null"}`;
    super(args.stderr.trim() ? `${msg}: ${args.stderr.trim()}` : msg, { cause: args.cause });
    this.name = "ToolError";
    this.tool = args.tool;
    this.exitCode = args.exitCode;
    this.signal = args.signal;
    this.stderr = args.stderr;
  }
}

export class ToolTimeoutError extends Error {
  readonly tool: string;
  readonly timeoutMs: number;

  constructor(tool: string, timeoutMs: number) {
    super(`${tool} timed out after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
    this.tool = tool;
    this.timeoutMs = timeoutMs;
  }
}

export type ProbeErrorCode = "probe_timeout" | "probe_failed";

/** Duration probe of the staged file failed. */
export class ProbeError extends Error {
  readonly code: ProbeErrorCode;

  constructor(code: ProbeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProbeError";
    this.code = code;
  }
}

export class InferenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InferenceError";
  }
}

export class QueueFullError extends Error {
  constructor(maxSize: number) {
    super(`Task queue is full (${maxSize} waiting)`);
    this.name = "QueueFullError";
  }
}
