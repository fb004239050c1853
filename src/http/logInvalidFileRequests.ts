import type { Request, Response, NextFunction, RequestHandler } from "express";
import { ClientInputError } from "../errors";
import { getLogger, type Logger } from "../logging";
import { clientIp } from "./requestLogger";
import { getRequestId } from "./requestId";

export type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function requestedFile(req: Request): string {
  if (req.file) return req.file.originalname;
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null) {
    for (const key of ["filename", "file_path", "url"]) {
      if (key in body) {
        const value: unknown = Reflect.get(body, key);
        if (typeof value === "string") return value;
      }
    }
  }
  return "unknown";
}

/**
 * Runs an async transcription handler, forwarding rejections to the error middleware.
 * Client-input failures additionally get a warn line naming the file and the caller.
 */
export function logInvalidFileRequests(handler: AsyncHandler, logger: Logger = getLogger("http")): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch((err: unknown) => {
      if (err instanceof ClientInputError) {
        logger.warn("invalid_file_request", {
          requestId: getRequestId(req),
          method: req.method,
          endpoint: req.path,
          filename: requestedFile(req),
          clientIp: clientIp(req),
          code: err.code,
          message: err.message,
        });
      }
      next(err);
    });
  };
}
