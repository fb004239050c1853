import { spawn } from "node:child_process";
import type { Config } from "../config";
import { errorMessage, getLogger, type Logger } from "../logging";
import type { TranscribeOptions, Transcriber, TranscriptOutput } from "../transcription/types";
import { resolvePythonBin } from "./pythonBin";
import { PythonWorker, WorkerExitedError, type PythonWorkerEvent, type SpawnWorker } from "./pythonWorker";

export type WorkerSettings = Pick<
  Config,
  | "pythonBin"
  | "transcriberScript"
  | "workerIdleSeconds"
  | "modelPath"
  | "chunkLengthS"
  | "batchSize"
  | "maxNewTokens"
>;

export function workerArgs(settings: WorkerSettings): string[] {
  return [
    settings.transcriberScript,
    "--worker",
    "--idle-seconds",
    String(settings.workerIdleSeconds),
    "--model",
    settings.modelPath,
    "--chunk-length-s",
    String(settings.chunkLengthS),
    "--batch-size",
    String(settings.batchSize),
    "--max-new-tokens",
    String(settings.maxNewTokens),
  ];
}

export function spawnPythonWorker(settings: WorkerSettings): SpawnWorker {
  return () => spawn(resolvePythonBin(settings), workerArgs(settings), { stdio: ["pipe", "pipe", "pipe"] });
}

function logWorkerEvent(logger: Logger, ev: PythonWorkerEvent): void {
  switch (ev.type) {
    case "spawn":
      logger.info("worker_spawn", { pid: ev.pid });
      break;
    case "ready":
      logger.info("worker_ready", { pid: ev.pid, device: ev.device });
      break;
    case "stderr":
      logger.debug("worker_stderr", { pid: ev.pid, line: ev.line });
      break;
    case "failure":
      logger.error("worker_request_failed", { id: ev.id, error: ev.error, traceback: ev.traceback });
      break;
    case "exit":
      logger.info("worker_exit", { code: ev.code, signal: ev.signal });
      break;
  }
}

/** Transcriber backed by a PythonWorker; a request that dies with the worker is retried once on a fresh process. */
export class PythonTranscriber implements Transcriber {
  private readonly worker: PythonWorker;
  private readonly logger: Logger;

  constructor(spawnWorker: SpawnWorker, logger?: Logger) {
    this.logger = logger ?? getLogger("python-worker");
    this.worker = new PythonWorker(spawnWorker, (ev) => logWorkerEvent(this.logger, ev));
  }

  async transcribe(audioPath: string, options: TranscribeOptions): Promise<TranscriptOutput> {
    const request = { audioPath, ...options };
    try {
      return await this.worker.request(request);
    } catch (err) {
      if (!(err instanceof WorkerExitedError)) throw err;
      this.logger.warn("worker_respawn", { message: errorMessage(err) });
      return await this.worker.request(request);
    }
  }

  async close(): Promise<void> {
    await this.worker.stop();
  }
}
