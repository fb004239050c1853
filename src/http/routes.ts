import fs from "node:fs";
import path from "node:path";
import { Router, type Request, type Response } from "express";
import multer from "multer";
import { maxFileSizeBytes, publicConfig, type Config } from "../config";
import { memoize, type TtlCache } from "../cache/ttlCache";
import { getLogger, type Logger } from "../logging";
import type { ResourceManager } from "../resources/resourceManager";
import { createAudioSource, type AudioSource, type SourceInput } from "../sources";
import { toTaskBody, type TaskTracker } from "../tasks/taskTracker";
import type { TranscriptionService } from "../transcription/service";
import {
  parseTranscriptionParams,
  type TranscriptionParams,
  type TranscriptionResponse,
} from "../transcription/types";
import type { FileValidator } from "../validation/fileValidator";
import { validateLocalFilePath } from "../validation/pathGuard";
import type { FetchLike } from "./download";
import { bearerAuth } from "./auth";
import { HttpError } from "./errors";
import { logInvalidFileRequests } from "./logInvalidFileRequests";
import { getRequestId } from "./requestId";

export type ModelInfo = {
  id: string;
  object: "model";
  owned_by: string;
  permissions: string[];
};

export type ModelList = {
  data: ModelInfo[];
  object: "list";
};

export type RouteDeps = {
  config: Config;
  service: TranscriptionService;
  validator: FileValidator;
  resources: ResourceManager;
  tasks: TaskTracker<TranscriptionResponse>;
  modelCache: TtlCache<ModelList>;
  fetchImpl?: FetchLike;
  logger?: Logger;
};

function fields(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null || Array.isArray(body)) return {};
  return Object.fromEntries(Object.entries(body));
}

function requireString(body: Record<string, unknown>, key: string, message: string): string {
  const value = body[key];
  if (typeof value !== "string" || !value.trim()) throw new HttpError(400, "bad_request", message);
  return value.trim();
}

export function createUploadMiddleware(cfg: Config): multer.Multer {
  const uploadDir = path.join(cfg.tmpDir, "uploads");
  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      fs.promises.mkdir(uploadDir, { recursive: true }).then(
        () => cb(null, uploadDir),
        (err: Error) => cb(err, uploadDir)
      );
    },
    filename: (req, file, cb) => {
      const requestId = getRequestId(req).replaceAll(/[^\w.-]/g, "_");
      const safe = file.originalname.replaceAll(/[^\w.\-()[\] ]/g, "_");
      cb(null, `${requestId}__${Date.now()}__${safe}`);
    },
  });
  return multer({ storage, limits: { fileSize: maxFileSizeBytes(cfg), files: 1 } });
}

export function createRoutes(deps: RouteDeps): Router {
  const { config: cfg, service, validator, tasks } = deps;
  const logger = deps.logger ?? getLogger("http");
  const router = Router();
  const upload = createUploadMiddleware(cfg);
  const maxBytes = maxFileSizeBytes(cfg);
  const modelId = path.basename(cfg.modelPath);

  const listModels = memoize(deps.modelCache, "models:", (): ModelList => ({
    data: [{ id: modelId, object: "model", owned_by: "openai", permissions: [] }],
    object: "list",
  }));

  /** Builds the source and parses parameters; a bad parameter still releases what the source owns. */
  async function prepare(req: Request, input: SourceInput): Promise<{ source: AudioSource; params: TranscriptionParams }> {
    const source = createAudioSource(input, { maxBytes, resources: deps.resources, fetchImpl: deps.fetchImpl });
    try {
      const params = parseTranscriptionParams(fields(req), {
        language: cfg.language,
        returnTimestamps: cfg.returnTimestamps,
      });
      return { source, params };
    } catch (err) {
      await source.cleanup?.();
      throw err;
    }
  }

  async function respond(res: Response, source: AudioSource, params: TranscriptionParams, validate: boolean) {
    const response = await service.run(source, params, validate ? validator : undefined);
    res.json(response);
  }

  router.get("/health", (_req, res) => {
    res.json({ status: "ok", version: cfg.serviceVersion });
  });

  router.use(bearerAuth(cfg));

  router.get("/config", (_req, res) => {
    res.json(publicConfig(cfg));
  });

  router.get("/v1/models", (_req, res) => {
    res.json(listModels());
  });

  router.get("/v1/models/:id", (req, res, next) => {
    const model = listModels()?.data.find((m) => m.id === req.params.id);
    if (!model) return next(new HttpError(404, "not_found", "Model not found", `Model '${req.params.id}' does not exist`));
    res.json(model);
  });

  const multipart = logInvalidFileRequests(async (req, res) => {
    const { source, params } = await prepare(req, { kind: "uploaded", file: req.file });
    await respond(res, source, params, true);
  }, logger);
  router.post("/v1/audio/transcriptions", upload.single("file"), multipart);
  router.post("/v1/audio/transcriptions/multipart", upload.single("file"), multipart);

  router.post(
    "/v1/audio/transcriptions/url",
    logInvalidFileRequests(async (req, res) => {
      const url = requireString(fields(req), "url", "No URL provided");
      const { source, params } = await prepare(req, { kind: "remote", url });
      await respond(res, source, params, true);
    }, logger)
  );

  router.post(
    "/v1/audio/transcriptions/base64",
    logInvalidFileRequests(async (req, res) => {
      const body = fields(req);
      const payload = requireString(body, "file", "No base64 file provided");
      const filename = typeof body.filename === "string" && body.filename.trim() ? body.filename.trim() : undefined;
      const { source, params } = await prepare(req, { kind: "inline", payload, filename });
      await respond(res, source, params, true);
    }, logger)
  );

  router.post(
    "/local/transcriptions",
    logInvalidFileRequests(async (req, res) => {
      const requested = requireString(fields(req), "file_path", "No file_path provided");
      const filePath = validateLocalFilePath(requested, cfg.allowedDirectories);
      const { source, params } = await prepare(req, { kind: "local", path: filePath });
      await respond(res, source, params, false);
    }, logger)
  );

  router.post(
    "/v1/audio/transcriptions/async",
    upload.single("file"),
    logInvalidFileRequests(async (req, res) => {
      const { source, params } = await prepare(req, { kind: "uploaded", file: req.file });
      const file = await service.acquire(source, validator);
      let taskId: string;
      try {
        taskId = tasks.submit(() => service.transcribe(source, file, params));
      } catch (err) {
        await service.discard(source, file);
        throw err;
      }
      logger.info("task_accepted", { requestId: getRequestId(req), taskId, file: file.name });
      res.status(202).json({ task_id: taskId, status: "pending" });
    }, logger)
  );

  router.get("/v1/tasks/:id", (req, res, next) => {
    const task = tasks.status(req.params.id);
    if (!task) return next(new HttpError(404, "not_found", "Task not found"));
    res.json(toTaskBody(task));
  });

  return router;
}
