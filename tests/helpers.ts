import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ToolCommand, ToolOutput, ToolRunner } from "../src/audio/process";
import { loadConfig, type Config } from "../src/config";
import { createLogger } from "../src/logging";

export const silentLogger = createLogger({ silent: true });

export async function makeTempRoot(): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), "stt-test-"));
}

export async function removeTempRoot(root: string): Promise<void> {
  await fs.promises.rm(root, { recursive: true, force: true });
}

/** Minimal 16-bit PCM WAV: 44-byte header followed by `dataBytes` of silence. */
export function wavBytes(options: { dataBytes?: number; sampleRate?: number; channels?: number } = {}): Buffer {
  const dataBytes = options.dataBytes ?? 64;
  const sampleRate = options.sampleRate ?? 16000;
  const channels = options.channels ?? 1;
  const header = Buffer.alloc(44);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + dataBytes, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * channels * 2, 28);
  header.writeUInt16LE(channels * 2, 32);
  header.writeUInt16LE(16, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(dataBytes, 40);
  return Buffer.concat([header, Buffer.alloc(dataBytes)]);
}

export function testConfig(root: string, overrides: Partial<Config> = {}): Config {
  return {
    ...loadConfig({}),
    tmpDir: path.join(root, "tmp"),
    historyDir: path.join(root, "history"),
    ffmpegBin: "ffmpeg",
    ffprobeBin: "ffprobe",
    soxBin: "sox",
    modelPath: "models/whisper-test",
    ...overrides,
  };
}

export type FakeRunnerOptions = {
  /** Reported by `ffprobe -show_entries format=duration`. */
  duration?: string;
  sampleRate?: number;
  channels?: number;
  /** Return an error to make that command fail. */
  fail?: (command: ToolCommand) => Error | undefined;
};

function outputPath(command: ToolCommand): string | undefined {
  if (command.bin === "sox") return command.args[1];
  if (command.bin === "ffmpeg") return command.args[command.args.length - 1];
  return undefined;
}

/**
 * Stands in for ffmpeg, ffprobe and sox. Writers copy their input to their output so
 * every stage leaves a real file behind; every command is recorded in `calls`.
 */
export function fakeRunner(options: FakeRunnerOptions = {}): { run: ToolRunner; calls: ToolCommand[] } {
  const calls: ToolCommand[] = [];
  const run: ToolRunner = async (command) => {
    calls.push(command);
    const failure = options.fail?.(command);
    if (failure) throw failure;

    if (command.bin === "ffprobe") {
      if (command.args.includes("format=duration")) {
        return { stdout: `${options.duration ?? "5.000000"}\n`, stderr: "" };
      }
      const stream = {
        codec_name: "pcm_s16le",
        sample_rate: String(options.sampleRate ?? 16000),
        channels: options.channels ?? 1,
      };
      return { stdout: JSON.stringify({ streams: [stream] }), stderr: "" };
    }

    const out = outputPath(command);
    if (out) {
      const input = command.bin === "sox" ? command.args[0] : command.args[command.args.indexOf("-i") + 1];
      const bytes = input ? await fs.promises.readFile(input) : Buffer.alloc(0);
      await fs.promises.writeFile(out, bytes);
    }
    const output: ToolOutput = { stdout: "", stderr: "" };
    return output;
  };
  return { run, calls };
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** Every file left anywhere under `dir`. */
export async function listFiles(dir: string): Promise<string[]> {
  if (!(await exists(dir))) return [];
  const entries = await fs.promises.readdir(dir, { recursive: true, withFileTypes: true });
  return entries.filter((e) => e.isFile()).map((e) => e.name);
}
