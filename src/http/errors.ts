import multer from "multer";
import {
  ClientInputError,
  InferenceError,
  ProbeError,
  QueueFullError,
  ToolError,
  ToolTimeoutError,
} from "../errors";

export type ErrorBody = {
  status: "error";
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
};

export class HttpError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(statusCode: number, code: string, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export function toErrorBody(error: HttpError): ErrorBody {
  return {
    status: "error",
    error: {
      code: error.code,
      message: error.message,
      details: error.details,
    },
  };
}

// body-parser raises http-errors instances carrying a 4xx `status`.
function clientStatus(err: unknown): number | undefined {
  if (!(err instanceof Error) || !("status" in err) || typeof err.status !== "number") return undefined;
  return err.status >= 400 && err.status < 500 ? err.status : undefined;
}

/** Maps any thrown value onto the HTTP taxonomy. Unknown errors become 500 internal_error. */
export function toHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) return err;
  if (err instanceof ClientInputError) return new HttpError(400, err.code, err.message, undefined, { cause: err });
  if (err instanceof multer.MulterError) {
    if (err.code === "LIMIT_FILE_SIZE") {
      return new HttpError(400, "too_large", "File exceeds maximum upload size", undefined, { cause: err });
    }
    return new HttpError(400, "bad_request", err.message, undefined, { cause: err });
  }
  const status = clientStatus(err);
  if (status !== undefined && err instanceof Error) {
    return new HttpError(status, status === 413 ? "too_large" : "bad_request", err.message, undefined, { cause: err });
  }
  if (err instanceof ProbeError) return new HttpError(500, err.code, err.message, undefined, { cause: err });
  if (err instanceof ToolTimeoutError) {
    return new HttpError(500, "processing_timeout", "Audio processing timed out", undefined, { cause: err });
  }
  if (err instanceof ToolError) {
    return new HttpError(500, "processing_error", "Audio processing failed", undefined, { cause: err });
  }
  if (err instanceof InferenceError) return new HttpError(500, "inference_error", err.message, undefined, { cause: err });
  if (err instanceof QueueFullError) return new HttpError(503, "queue_full", err.message, undefined, { cause: err });
  return new HttpError(500, "internal_error", "Internal server error", undefined, { cause: err });
}
