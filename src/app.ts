import cors from "cors";
import express from "express";
import { maxFileSizeBytes } from "./config";
import { errorMessage, getLogger, type Logger } from "./logging";
import { HttpError, toErrorBody, toHttpError } from "./http/errors";
import { getRequestId, requestIdMiddleware } from "./http/requestId";
import { requestLogger } from "./http/requestLogger";
import { createRoutes, type RouteDeps } from "./http/routes";

export type AppDeps = RouteDeps & { logger?: Logger };

function isAbortError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ("code" in err && err.code === "ECONNABORTED") return true;
  // Express uses this exact message in response.js's onaborted handler.
  if (err.message === "Request aborted") return true;
  return err.message.includes("aborted") || err.message.includes("socket hang up");
}

export function createApp(deps: AppDeps): express.Express {
  const logger = deps.logger ?? getLogger("http");
  const app = express();
  app.disable("x-powered-by");
  app.use(cors());
  // Base64 bodies carry the file at 4/3 size.
  app.use(express.json({ limit: Math.ceil((maxFileSizeBytes(deps.config) * 4) / 3) + 1024 * 1024 }));
  app.use(requestIdMiddleware);
  app.use(requestLogger({ debug: deps.config.logRequestDebug, logger: logger.child({ scope: "request" }) }));
  app.use(createRoutes({ ...deps, logger }));

  app.use((_req: express.Request, _res: express.Response, next: express.NextFunction) => {
    next(new HttpError(404, "not_found", "Not found"));
  });

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // If the peer disconnected, don't try to write a response and don't spam logs.
    if (req.aborted || res.headersSent || res.writableEnded || res.destroyed) {
      if (isAbortError(err) || req.aborted || res.destroyed) return;
    }

    const httpError = toHttpError(err);
    if (httpError.statusCode >= 500) {
      logger.error("request_failed", {
        requestId: getRequestId(req),
        code: httpError.code,
        message: errorMessage(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
    }
    return res.status(httpError.statusCode).json(toErrorBody(httpError));
  });

  return app;
}
