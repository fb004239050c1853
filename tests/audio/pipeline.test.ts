import path from "node:path";
import fs from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AudioPipeline, type PipelineSettings } from "../../src/audio/pipeline";
import type { ToolCommand } from "../../src/audio/process";
import { ToolError, ToolTimeoutError } from "../../src/errors";
import { ResourceManager } from "../../src/resources/resourceManager";
import { exists, fakeRunner, listFiles, makeTempRoot, removeTempRoot, silentLogger, wavBytes } from "../helpers";

const settings: PipelineSettings = {
  ffmpegBin: "ffmpeg",
  ffprobeBin: "ffprobe",
  soxBin: "sox",
  sampleRate: 16000,
  normLevel: "-0.5",
  compandParams: "0.3,1 -90,-90,-70,-70,-60,-20,0,0 -5 0 0.2",
  speedFactor: 1.25,
  padLeadSeconds: 2,
  padTrailSeconds: 1,
  probeTimeoutMs: 10_000,
  toolTimeoutMs: 600_000,
};

function toolFailure(command: ToolCommand): ToolError {
  return new ToolError({ tool: command.bin, exitCode: 1, signal: null, stderr: "simulated failure" });
}

describe("AudioPipeline", () => {
  let root: string;
  let workDir: string;
  let resources: ResourceManager;
  let input: string;

  beforeEach(async () => {
    root = await makeTempRoot();
    workDir = path.join(root, "work");
    resources = new ResourceManager({ root: workDir, logger: silentLogger });
    input = path.join(root, "input.wav");
    await fs.promises.writeFile(input, wavBytes());
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  function pipeline(run: ReturnType<typeof fakeRunner>["run"], overrides: Partial<PipelineSettings> = {}) {
    return new AudioPipeline({ run, resources, settings: { ...settings, ...overrides }, logger: silentLogger });
  }

  it("skips rate conversion for a mono WAV already at the target rate", async () => {
    const fake = fakeRunner({ sampleRate: 16000, channels: 1 });
    const result = await pipeline(fake.run).process(input);

    expect(fake.calls.map((c) => c.bin)).toEqual(["ffprobe", "sox", "ffmpeg", "sox"]);
    expect(result.artifacts).toHaveLength(3);
    expect(result.artifacts).not.toContain(input);
    expect(result.path).toBe(result.artifacts[2]);
    expect(await exists(input)).toBe(true);

    await pipeline(fake.run).release(result.artifacts);
    expect(await listFiles(workDir)).toEqual([]);
  });

  it("converts a WAV at another rate", async () => {
    const fake = fakeRunner({ sampleRate: 8000, channels: 1 });
    const result = await pipeline(fake.run).process(input);

    expect(fake.calls.map((c) => c.bin)).toEqual(["ffprobe", "ffmpeg", "sox", "ffmpeg", "sox"]);
    expect(fake.calls[1]?.args).toContain("16000");
    expect(result.artifacts).toHaveLength(4);
  });

  it("converts a stereo WAV even at the target rate", async () => {
    const fake = fakeRunner({ sampleRate: 16000, channels: 2 });
    const result = await pipeline(fake.run).process(input);
    expect(result.artifacts).toHaveLength(4);
  });

  it("converts without probing when the input is not a WAV", async () => {
    const mp3 = path.join(root, "input.mp3");
    await fs.promises.writeFile(mp3, "fake mp3");
    const fake = fakeRunner();
    await pipeline(fake.run).process(mp3);
    expect(fake.calls.map((c) => c.bin)).toEqual(["ffmpeg", "sox", "ffmpeg", "sox"]);
  });

  it("converts anyway when the stream probe fails", async () => {
    const fake = fakeRunner({ fail: (c) => (c.bin === "ffprobe" ? toolFailure(c) : undefined) });
    const result = await pipeline(fake.run).process(input);
    expect(fake.calls.map((c) => c.bin)).toEqual(["ffprobe", "ffmpeg", "sox", "ffmpeg", "sox"]);
    expect(result.artifacts).toHaveLength(4);
  });

  it("passes through the tempo stage at a factor of exactly 1", async () => {
    const fake = fakeRunner({ sampleRate: 16000 });
    const result = await pipeline(fake.run, { speedFactor: 1 }).process(input);
    expect(fake.calls.map((c) => c.bin)).toEqual(["ffprobe", "sox", "sox"]);
    expect(result.artifacts).toHaveLength(2);
  });

  it("passes stage timeouts to the runner", async () => {
    const fake = fakeRunner({ sampleRate: 16000 });
    await pipeline(fake.run).process(input);
    expect(fake.calls.map((c) => c.timeoutMs)).toEqual([10_000, 600_000, 600_000, 600_000]);
  });

  it.each([
    ["ffmpeg convert", (c: ToolCommand) => c.bin === "ffmpeg" && c.args.includes("-ar")],
    ["sox norm", (c: ToolCommand) => c.bin === "sox" && c.args.includes("norm")],
    ["ffmpeg atempo", (c: ToolCommand) => c.bin === "ffmpeg" && c.args.includes("-filter:a")],
    ["sox pad", (c: ToolCommand) => c.bin === "sox" && c.args.includes("pad")],
  ])("leaves no temp files behind when %s fails", async (_name, matches) => {
    const fake = fakeRunner({ sampleRate: 8000, fail: (c) => (matches(c) ? toolFailure(c) : undefined) });

    await expect(pipeline(fake.run).process(input)).rejects.toBeInstanceOf(ToolError);

    expect(await listFiles(workDir)).toEqual([]);
    expect(resources.trackedFiles).toEqual([]);
    expect(await exists(input)).toBe(true);
  });

  it("propagates a timeout and still cleans up", async () => {
    const fake = fakeRunner({
      sampleRate: 16000,
      fail: (c) => (c.args.includes("pad") ? new ToolTimeoutError("sox", 600_000) : undefined),
    });

    await expect(pipeline(fake.run).process(input)).rejects.toBeInstanceOf(ToolTimeoutError);
    expect(resources.trackedFiles).toEqual([]);
  });
});
