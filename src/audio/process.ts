import { spawn } from "node:child_process";
import { ToolError, ToolTimeoutError } from "../errors";

const OUTPUT_CAP = 32_000;

export type ToolCommand = {
  bin: string;
  args: string[];
  timeoutMs?: number;
};

export type ToolOutput = {
  stdout: string;
  stderr: string;
};

/** Runs one external tool to completion. Swappable so tests never spawn real binaries. */
export type ToolRunner = (command: ToolCommand) => Promise<ToolOutput>;

function append(buf: string, chunk: unknown): string {
  const next = buf + String(chunk);
  return next.length > OUTPUT_CAP ? `${next.slice(0, OUTPUT_CAP)}…` : next;
}

export const runTool: ToolRunner = (command) =>
  new Promise<ToolOutput>((resolve, reject) => {
    const child = spawn(command.bin, command.args, { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      fn();
    };

    if (command.timeoutMs !== undefined) {
      const timeoutMs = command.timeoutMs;
      timer = setTimeout(() => {
        child.kill("SIGKILL");
        settle(() => reject(new ToolTimeoutError(command.bin, timeoutMs)));
      }, timeoutMs);
    }

    child.stdout.on("data", (d) => {
      stdout = append(stdout, d);
    });
    child.stderr.on("data", (d) => {
      stderr = append(stderr, d);
    });

    child.on("error", (err) =>
      settle(() => reject(new ToolError({ tool: command.bin, exitCode: null, signal: null, stderr: err.message, cause: err })))
    );
    child.on("close", (code, signal) => {
      if (code === 0) return settle(() => resolve({ stdout, stderr }));
      settle(() => reject(new ToolError({ tool: command.bin, exitCode: code, signal, stderr })));
    });
  });

export function describeCommand(command: ToolCommand): string {
  return [command.bin, ...command.args].join(" ");
}
