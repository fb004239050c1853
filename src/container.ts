import path from "node:path";
import { AudioPipeline, pipelineSettingsFromConfig } from "./audio/pipeline";
import { runTool, type ToolRunner } from "./audio/process";
import { TtlCache } from "./cache/ttlCache";
import type { Config } from "./config";
import { PythonTranscriber, spawnPythonWorker } from "./engine/pythonTranscriber";
import type { FetchLike } from "./http/download";
import type { ModelList } from "./http/routes";
import { getLogger, type Logger } from "./logging";
import { JobQueue } from "./queue/jobQueue";
import { ResourceManager } from "./resources/resourceManager";
import { TaskTracker } from "./tasks/taskTracker";
import { HistoryStore } from "./transcription/history";
import { TranscriptionService } from "./transcription/service";
import type { Transcriber, TranscriptionResponse } from "./transcription/types";
import { createPolicy, FileValidator, type Sniffer } from "./validation/fileValidator";

export type Services = {
  config: Config;
  resources: ResourceManager;
  pipeline: AudioPipeline;
  transcriber: Transcriber;
  history: HistoryStore;
  service: TranscriptionService;
  validator: FileValidator;
  tasks: TaskTracker<TranscriptionResponse>;
  modelCache: TtlCache<ModelList>;
  fetchImpl?: FetchLike;
  logger: Logger;
  /** Stops background work and releases every scratch file. */
  close(): Promise<void>;
};

export type ServiceOverrides = {
  run?: ToolRunner;
  transcriber?: Transcriber;
  fetchImpl?: FetchLike;
  sniff?: Sniffer;
  logger?: Logger;
};

function hasClose(value: Transcriber): value is Transcriber & { close(): Promise<void> } {
  return "close" in value && typeof value.close === "function";
}

export function buildServices(cfg: Config, overrides: ServiceOverrides = {}): Services {
  const logger = overrides.logger ?? getLogger();
  const run = overrides.run ?? runTool;
  const resources = new ResourceManager({ root: path.join(cfg.tmpDir, "work"), logger: logger.child({ scope: "resources" }) });
  const pipeline = new AudioPipeline({
    run,
    resources,
    settings: pipelineSettingsFromConfig(cfg),
    logger: logger.child({ scope: "pipeline" }),
  });
  const transcriber =
    overrides.transcriber ?? new PythonTranscriber(spawnPythonWorker(cfg), logger.child({ scope: "python-worker" }));
  const history = new HistoryStore({
    enabled: cfg.enableHistory,
    dir: cfg.historyDir,
    logger: logger.child({ scope: "history" }),
  });
  const service = new TranscriptionService({
    run,
    resources,
    pipeline,
    transcriber,
    history,
    settings: {
      ffprobeBin: cfg.ffprobeBin,
      probeTimeoutMs: cfg.probeTimeoutSeconds * 1000,
      sampleRate: cfg.audioRate,
      modelPath: cfg.modelPath,
    },
    logger: logger.child({ scope: "transcription" }),
  });
  const validator = new FileValidator(
    createPolicy({
      maxFileSizeMb: cfg.maxFileSizeMb,
      allowedExtensions: cfg.allowedExtensions,
      allowedContentTypes: cfg.allowedContentTypes,
    }),
    { logger: logger.child({ scope: "validator" }), sniff: overrides.sniff }
  );
  const tasks = new TaskTracker<TranscriptionResponse>({
    queue: new JobQueue({ concurrency: cfg.taskConcurrency, maxSize: cfg.taskQueueMax }),
    logger: logger.child({ scope: "tasks" }),
  });
  const modelCache = new TtlCache<ModelList>({ ttlMs: cfg.modelCacheTtlSeconds * 1000 });

  const stopSweeper = tasks.startSweeper(cfg.taskSweepIntervalSeconds * 1000, cfg.taskMaxAgeSeconds * 1000);

  return {
    config: cfg,
    resources,
    pipeline,
    transcriber,
    history,
    service,
    validator,
    tasks,
    modelCache,
    fetchImpl: overrides.fetchImpl,
    logger,
    async close() {
      stopSweeper();
      await tasks.onIdle();
      if (hasClose(transcriber)) await transcriber.close();
      await resources.releaseAll();
    },
  };
}
