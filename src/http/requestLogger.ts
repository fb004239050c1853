import type { IncomingHttpHeaders } from "node:http";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { getLogger, type Logger } from "../logging";
import { getRequestId } from "./requestId";

const SENSITIVE_HEADERS = new Set(["authorization", "cookie", "set-cookie", "proxy-authorization", "x-api-key"]);
const EXCLUDED_PREFIXES = ["/health"];

export function clientIp(req: Request): string {
  const forwarded = req.header("x-forwarded-for");
  if (forwarded) return forwarded.split(",")[0]?.trim() || "unknown";
  return req.header("x-real-ip") ?? req.socket.remoteAddress ?? "unknown";
}

export function filterHeaders(headers: IncomingHttpHeaders): Record<string, string | string[]> {
  const out: Record<string, string | string[]> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || SENSITIVE_HEADERS.has(key.toLowerCase())) continue;
    out[key] = value;
  }
  return out;
}

function paramNames(req: Request): string[] {
  const query = Object.keys(req.query);
  if (query.length) return query;
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null && !Array.isArray(body)) return Object.keys(body);
  return [];
}

/** `METHOD /path from ip (agent) files: name (n bytes) params: a, b` */
export function formatRequestLine(req: Request): string {
  const agent = req.header("user-agent") ?? "Unknown";
  let line = `${req.method} ${req.path} from ${clientIp(req)} (${agent})`;
  if (req.file) line += ` files: ${req.file.originalname} (${req.file.size} bytes)`;
  const params = paramNames(req);
  if (params.length) line += ` params: ${params.join(", ")}`;
  return line;
}

/**
 * One line for the request and one for the response, written once the response is
 * finished so multipart bodies have been parsed. Parameter values are never logged.
 */
export function requestLogger(options: { debug?: boolean; logger?: Logger } = {}): RequestHandler {
  const logger = options.logger ?? getLogger("request");
  return (req: Request, res: Response, next: NextFunction) => {
    if (EXCLUDED_PREFIXES.some((prefix) => req.path.startsWith(prefix))) return next();
    const startedAt = Date.now();
    res.on("finish", () => {
      const requestId = getRequestId(req);
      const seconds = Math.round(Date.now() - startedAt) / 1000;
      const bytes = Number(res.getHeader("content-length") ?? 0) || 0;
      if (options.debug) {
        logger.info("request", {
          requestId,
          method: req.method,
          path: req.path,
          clientIp: clientIp(req),
          params: paramNames(req),
          headers: filterHeaders(req.headers),
        });
        logger.info("response", { requestId, status: res.statusCode, bytes, seconds });
        return;
      }
      logger.info(formatRequestLine(req), { requestId });
      logger.info(`${res.statusCode} in ${seconds} sec, ${bytes} bytes`, { requestId });
    });
    next();
  };
}
