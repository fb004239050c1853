import fs from "node:fs";
import path from "node:path";
import { probeDuration } from "../audio/ffmpeg";
import type { AudioPipeline } from "../audio/pipeline";
import type { ToolRunner } from "../audio/process";
import { InferenceError, ProbeError, ToolTimeoutError } from "../errors";
import { errorMessage, getLogger, type Logger } from "../logging";
import type { ResourceManager } from "../resources/resourceManager";
import type { AudioFile, AudioSource } from "../sources/types";
import type { FileValidator } from "../validation/fileValidator";
import type { HistoryStore } from "./history";
import {
  transcriptSizeBytes,
  type Transcriber,
  type TranscriptionParams,
  type TranscriptionResponse,
  type TranscriptOutput,
} from "./types";

export type TranscriptionSettings = {
  ffprobeBin: string;
  probeTimeoutMs: number;
  sampleRate: number;
  modelPath: string;
};

export type TranscriptionServiceDeps = {
  run: ToolRunner;
  resources: ResourceManager;
  pipeline: AudioPipeline;
  transcriber: Transcriber;
  settings: TranscriptionSettings;
  history?: HistoryStore;
  logger?: Logger;
};

/**
 * source -> validate -> stage -> probe -> pipeline -> model -> response.
 *
 * `acquire` is the part that can fail on client input; `transcribe` owns every file from
 * then on and releases them whatever happens.
 */
export class TranscriptionService {
  private readonly deps: TranscriptionServiceDeps;
  private readonly logger: Logger;

  constructor(deps: TranscriptionServiceDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? getLogger("transcription");
  }

  get modelName(): string {
    return path.basename(this.deps.settings.modelPath);
  }

  async run(source: AudioSource, params: TranscriptionParams, validator?: FileValidator): Promise<TranscriptionResponse> {
    const file = await this.acquire(source, validator);
    return this.transcribe(source, file, params);
  }

  async acquire(source: AudioSource, validator?: FileValidator): Promise<AudioFile> {
    let file: AudioFile;
    try {
      file = await source.fetch();
    } catch (err) {
      this.logger.warn("source_failed", { kind: source.kind, message: errorMessage(err) });
      await this.cleanupSource(source);
      throw err;
    }
    if (validator) {
      try {
        await validator.validate(file);
      } catch (err) {
        this.logger.warn("validation_failed", { file: file.name, message: errorMessage(err) });
        await this.discard(source, file);
        throw err;
      }
    }
    return file;
  }

  /** Gives back an acquired file that will never be transcribed. */
  async discard(source: AudioSource, file: AudioFile): Promise<void> {
    await this.closeFile(file);
    await this.cleanupSource(source);
  }

  async transcribe(source: AudioSource, file: AudioFile, params: TranscriptionParams): Promise<TranscriptionResponse> {
    const suffix = path.extname(file.name) || ".wav";
    try {
      return await this.deps.resources.withTempFile(suffix, async (stagedPath) => {
        await fs.promises.copyFile(file.path, stagedPath);
        await this.closeFile(file);
        const duration = await this.probe(stagedPath);
        await this.cleanupSource(source);

        const processed = await this.deps.pipeline.process(stagedPath);
        try {
          return await this.infer(processed.path, file.name, params, duration);
        } finally {
          await this.deps.pipeline.release(processed.artifacts);
        }
      });
    } finally {
      await this.closeFile(file);
      await this.cleanupSource(source);
    }
  }

  private async probe(stagedPath: string): Promise<number> {
    const { ffprobeBin, probeTimeoutMs } = this.deps.settings;
    try {
      return await probeDuration({ run: this.deps.run, ffprobeBin, inputPath: stagedPath, timeoutMs: probeTimeoutMs });
    } catch (err) {
      this.logger.error("duration_probe_failed", { path: stagedPath, message: errorMessage(err) });
      if (err instanceof ToolTimeoutError) {
        throw new ProbeError("probe_timeout", "Timeout determining audio file duration", { cause: err });
      }
      throw new ProbeError("probe_failed", `Could not determine audio file duration: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private async infer(
    audioPath: string,
    originalName: string,
    params: TranscriptionParams,
    duration: number
  ): Promise<TranscriptionResponse> {
    const startedAt = Date.now();
    let output: TranscriptOutput;
    try {
      output = await this.deps.transcriber.transcribe(audioPath, {
        language: params.language,
        temperature: params.temperature,
        prompt: params.prompt,
        returnTimestamps: params.returnTimestamps,
        sampleRate: this.deps.settings.sampleRate,
      });
    } catch (err) {
      this.logger.error("inference_failed", { file: originalName, message: errorMessage(err) });
      if (err instanceof InferenceError) throw err;
      throw new InferenceError(errorMessage(err), { cause: err });
    }
    const processingTime = (Date.now() - startedAt) / 1000;

    const response: TranscriptionResponse = {
      ...(params.returnTimestamps ? { segments: output.segments ?? [] } : {}),
      text: output.text,
      processing_time: processingTime,
      response_size_bytes: transcriptSizeBytes(output, params.returnTimestamps),
      duration_seconds: duration,
      model: this.modelName,
    };
    this.logger.info("transcribed", {
      file: originalName,
      duration_seconds: duration,
      processing_time: processingTime,
      segments: response.segments?.length,
    });
    await this.deps.history?.save(response, originalName);
    return response;
  }

  private async closeFile(file: AudioFile): Promise<void> {
    try {
      await file.handle.close();
    } catch (err) {
      this.logger.warn("file_close_failed", { file: file.name, message: errorMessage(err) });
    }
  }

  private async cleanupSource(source: AudioSource): Promise<void> {
    if (!source.cleanup) return;
    try {
      await source.cleanup();
    } catch (err) {
      this.logger.warn("source_cleanup_failed", { kind: source.kind, message: errorMessage(err) });
    }
  }
}
