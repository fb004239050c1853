import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { Config } from "../config";
import { HttpError } from "./errors";

export function bearerAuth(cfg: Pick<Config, "requireAuth" | "bearerToken">): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!cfg.requireAuth) return next();

    const header = req.header("authorization") ?? "";
    const match = header.match(/^Bearer\s+(.+)$/i);
    const token = match?.[1]?.trim();
    if (!token) return next(new HttpError(401, "unauthorized", "Missing Bearer token"));
    if (token !== cfg.bearerToken) return next(new HttpError(403, "forbidden", "Invalid token"));
    next();
  };
}
