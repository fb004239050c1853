import type { Config } from "../config";
import { ToolError, ToolTimeoutError } from "../errors";
import { errorMessage, getLogger, type Logger } from "../logging";
import type { ResourceManager } from "../resources/resourceManager";
import { changeTempo, convertToWavMono, probeAudioStream } from "./ffmpeg";
import type { ToolRunner } from "./process";
import { normalizeLoudness, padSilence } from "./sox";

export type PipelineSettings = {
  ffmpegBin: string;
  ffprobeBin: string;
  soxBin: string;
  sampleRate: number;
  normLevel: string;
  compandParams: string;
  speedFactor: number;
  padLeadSeconds: number;
  padTrailSeconds: number;
  probeTimeoutMs: number;
  toolTimeoutMs: number;
};

export type StageResult = {
  path: string;
  /** False when the stage passed its input through untouched. */
  produced: boolean;
};

export type PipelineResult = {
  path: string;
  artifacts: string[];
};

type Stage = {
  name: string;
  run: (inputPath: string) => Promise<StageResult>;
};

/**
 * rate normalize -> loudness normalize -> tempo -> silence pad.
 *
 * Every intermediate file comes from the resource manager. On failure all of them are
 * released before the error propagates; on success the caller owns `artifacts`.
 */
export class AudioPipeline {
  private readonly run: ToolRunner;
  private readonly resources: ResourceManager;
  private readonly settings: PipelineSettings;
  private readonly logger: Logger;
  private readonly stages: Stage[];

  constructor(options: { run: ToolRunner; resources: ResourceManager; settings: PipelineSettings; logger?: Logger }) {
    this.run = options.run;
    this.resources = options.resources;
    this.settings = options.settings;
    this.logger = options.logger ?? getLogger("pipeline");
    this.stages = [
      { name: "normalize_rate", run: (p) => this.normalizeRate(p) },
      { name: "normalize_loudness", run: (p) => this.normalizeLoudness(p) },
      { name: "adjust_tempo", run: (p) => this.adjustTempo(p) },
      { name: "pad_silence", run: (p) => this.padSilence(p) },
    ];
  }

  async process(inputPath: string): Promise<PipelineResult> {
    const artifacts: string[] = [];
    let current = inputPath;
    for (const stage of this.stages) {
      const startedAt = Date.now();
      let result: StageResult;
      try {
        result = await stage.run(current);
      } catch (err) {
        this.logFailure(stage.name, err);
        await this.release(artifacts);
        throw err;
      }
      if (result.produced) artifacts.push(result.path);
      this.logger.debug("stage_done", {
        stage: stage.name,
        produced: result.produced,
        path: result.path,
        ms: Date.now() - startedAt,
      });
      current = result.path;
    }
    return { path: current, artifacts };
  }

  async release(artifacts: readonly string[]): Promise<void> {
    if (artifacts.length) await this.resources.release(artifacts);
  }

  private async normalizeRate(inputPath: string): Promise<StageResult> {
    const s = this.settings;
    if (inputPath.toLowerCase().endsWith(".wav")) {
      try {
        const info = await probeAudioStream({
          run: this.run,
          ffprobeBin: s.ffprobeBin,
          inputPath,
          timeoutMs: s.probeTimeoutMs,
        });
        if (info.sampleRate === s.sampleRate && info.channels === 1) {
          return { path: inputPath, produced: false };
        }
      } catch (err) {
        this.logger.warn("rate_probe_failed", { path: inputPath, message: errorMessage(err) });
      }
    }
    return this.produce((outputPath) =>
      convertToWavMono({
        run: this.run,
        ffmpegBin: s.ffmpegBin,
        inputPath,
        outputWavPath: outputPath,
        sampleRate: s.sampleRate,
        timeoutMs: s.toolTimeoutMs,
      })
    );
  }

  private normalizeLoudness(inputPath: string): Promise<StageResult> {
    const s = this.settings;
    return this.produce((outputPath) =>
      normalizeLoudness({
        run: this.run,
        soxBin: s.soxBin,
        inputPath,
        outputPath,
        normLevel: s.normLevel,
        compandParams: s.compandParams,
        timeoutMs: s.toolTimeoutMs,
      })
    );
  }

  private async adjustTempo(inputPath: string): Promise<StageResult> {
    const s = this.settings;
    if (s.speedFactor === 1) return { path: inputPath, produced: false };
    return this.produce((outputPath) =>
      changeTempo({
        run: this.run,
        ffmpegBin: s.ffmpegBin,
        inputPath,
        outputPath,
        factor: s.speedFactor,
        timeoutMs: s.toolTimeoutMs,
      })
    );
  }

  private padSilence(inputPath: string): Promise<StageResult> {
    const s = this.settings;
    return this.produce((outputPath) =>
      padSilence({
        run: this.run,
        soxBin: s.soxBin,
        inputPath,
        outputPath,
        leadSeconds: s.padLeadSeconds,
        trailSeconds: s.padTrailSeconds,
        timeoutMs: s.toolTimeoutMs,
      })
    );
  }

  /** Allocates the stage output and releases it again if the tool fails. */
  private async produce(write: (outputPath: string) => Promise<void>): Promise<StageResult> {
    const temp = await this.resources.create(".wav");
    try {
      await write(temp.path);
    } catch (err) {
      await this.resources.release([temp.path]);
      throw err;
    }
    return { path: temp.path, produced: true };
  }

  private logFailure(stage: string, err: unknown): void {
    if (err instanceof ToolError) {
      this.logger.error("stage_failed", {
        stage,
        tool: err.tool,
        exitCode: err.exitCode,
        signal: err.signal,
        stderr: err.stderr,
      });
    } else if (err instanceof ToolTimeoutError) {
      this.logger.error("stage_timeout", { stage, tool: err.tool, timeoutMs: err.timeoutMs });
    } else {
      this.logger.error("stage_failed", { stage, message: errorMessage(err) });
    }
  }
}

export function pipelineSettingsFromConfig(
  cfg: Pick<
    Config,
    | "ffmpegBin"
    | "ffprobeBin"
    | "soxBin"
    | "audioRate"
    | "normLevel"
    | "compandParams"
    | "audioSpeedFactor"
    | "padLeadSeconds"
    | "padTrailSeconds"
    | "probeTimeoutSeconds"
    | "toolTimeoutSeconds"
  >
): PipelineSettings {
  return {
    ffmpegBin: cfg.ffmpegBin,
    ffprobeBin: cfg.ffprobeBin,
    soxBin: cfg.soxBin,
    sampleRate: cfg.audioRate,
    normLevel: cfg.normLevel,
    compandParams: cfg.compandParams,
    speedFactor: cfg.audioSpeedFactor,
    padLeadSeconds: cfg.padLeadSeconds,
    padTrailSeconds: cfg.padTrailSeconds,
    probeTimeoutMs: cfg.probeTimeoutSeconds * 1000,
    toolTimeoutMs: cfg.toolTimeoutSeconds * 1000,
  };
}
