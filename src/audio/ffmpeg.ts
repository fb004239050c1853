import { ToolError } from "../errors";
import type { ToolRunner } from "./process";

export type StreamInfo = {
  codec?: string;
  sampleRate: number;
  channels: number;
};

export async function convertToWavMono(args: {
  run: ToolRunner;
  ffmpegBin: string;
  inputPath: string;
  outputWavPath: string;
  sampleRate: number;
  timeoutMs?: number;
}): Promise<void> {
  const ffmpegArgs = [
    "-hide_banner",
    "-nostdin",
    "-loglevel",
    "warning",
    "-y",
    "-i",
    args.inputPath,
    "-vn",
    "-ac",
    "1",
    "-ar",
    String(args.sampleRate),
    "-c:a",
    "pcm_s16le",
    args.outputWavPath,
  ];
  await args.run({ bin: args.ffmpegBin, args: ffmpegArgs, timeoutMs: args.timeoutMs });
}

export async function changeTempo(args: {
  run: ToolRunner;
  ffmpegBin: string;
  inputPath: string;
  outputPath: string;
  factor: number;
  timeoutMs?: number;
}): Promise<void> {
  const ffmpegArgs = [
    "-hide_banner",
    "-nostdin",
    "-loglevel",
    "warning",
    "-y",
    "-i",
    args.inputPath,
    "-filter:a",
    `atempo=${args.factor}`,
    args.outputPath,
  ];
  await args.run({ bin: args.ffmpegBin, args: ffmpegArgs, timeoutMs: args.timeoutMs });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function toNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string") return Number.parseFloat(value);
  return Number.NaN;
}

export function parseStreamInfo(stdout: string): StreamInfo | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.streams)) return undefined;
  const stream: unknown = parsed.streams[0];
  if (!isRecord(stream)) return undefined;
  const sampleRate = toNumber(stream.sample_rate);
  const channels = toNumber(stream.channels);
  if (!Number.isFinite(sampleRate) || !Number.isFinite(channels)) return undefined;
  return {
    codec: typeof stream.codec_name === "string" ? stream.codec_name : undefined,
    sampleRate,
    channels,
  };
}

export async function probeAudioStream(args: {
  run: ToolRunner;
  ffprobeBin: string;
  inputPath: string;
  timeoutMs?: number;
}): Promise<StreamInfo> {
  const { stdout } = await args.run({
    bin: args.ffprobeBin,
    args: [
      "-v",
      "error",
      "-select_streams",
      "a:0",
      "-show_entries",
      "stream=codec_name,sample_rate,channels",
      "-of",
      "json",
      args.inputPath,
    ],
    timeoutMs: args.timeoutMs,
  });
  const info = parseStreamInfo(stdout);
  if (!info) {
    throw new ToolError({ tool: args.ffprobeBin, exitCode: 0, signal: null, stderr: "no audio stream in probe output" });
  }
  return info;
}

/** Duration in seconds, from the container header. */
export async function probeDuration(args: {
  run: ToolRunner;
  ffprobeBin: string;
  inputPath: string;
  timeoutMs: number;
}): Promise<number> {
  const { stdout } = await args.run({
    bin: args.ffprobeBin,
    args: ["-v", "error", "-show_entries", "format=duration", "-of", "default=noprint_wrappers=1:nokey=1", args.inputPath],
    timeoutMs: args.timeoutMs,
  });
  const duration = Number.parseFloat(stdout.trim());
  if (!Number.isFinite(duration)) {
    throw new ToolError({
      tool: args.ffprobeBin,
      exitCode: 0,
      signal: null,
      stderr: `could not parse duration from "${stdout.trim()}"`,
    });
  }
  return duration;
}
