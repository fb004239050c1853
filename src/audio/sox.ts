import type { ToolRunner } from "./process";

/** Peak-normalize to `normLevel` dBFS, then apply the compand curve. */
export async function normalizeLoudness(args: {
  run: ToolRunner;
  soxBin: string;
  inputPath: string;
  outputPath: string;
  normLevel: string;
  compandParams: string;
  timeoutMs?: number;
}): Promise<void> {
  const soxArgs = [
    args.inputPath,
    args.outputPath,
    "norm",
    args.normLevel,
    "compand",
    ...args.compandParams.split(/\s+/).filter(Boolean),
  ];
  await args.run({ bin: args.soxBin, args: soxArgs, timeoutMs: args.timeoutMs });
}

export async function padSilence(args: {
  run: ToolRunner;
  soxBin: string;
  inputPath: string;
  outputPath: string;
  leadSeconds: number;
  trailSeconds: number;
  timeoutMs?: number;
}): Promise<void> {
  const soxArgs = [args.inputPath, args.outputPath, "pad", String(args.leadSeconds), String(args.trailSeconds)];
  await args.run({ bin: args.soxBin, args: soxArgs, timeoutMs: args.timeoutMs });
}
