import type { Readable, Writable } from "node:stream";
import { InferenceError } from "../errors";
import type { Segment, TranscriptOutput } from "../transcription/types";

/** The slice of ChildProcess the worker needs; tests hand in a fake. */
export interface WorkerProcess {
  readonly pid?: number;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export type SpawnWorker = () => WorkerProcess;

export type TranscribeRequest = {
  audioPath: string;
  sampleRate: number;
  language: string;
  temperature: number;
  prompt: string;
  returnTimestamps: boolean;
};

export type PythonWorkerEvent =
  | { type: "spawn"; pid?: number }
  | { type: "ready"; pid: number; device?: string }
  | { type: "stderr"; pid?: number; line: string }
  | { type: "failure"; id: number; error: string; traceback?: string }
  | { type: "exit"; code: number | null; signal: NodeJS.Signals | null };

export class WorkerExitedError extends Error {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(exitCode: number | null, signal: NodeJS.Signals | null, detail?: string) {
    super(detail ?? `Python worker exited code=${exitCode ?? "null"} signal=${signal ?? "null"}`);
    this.name = "WorkerExitedError";
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

type Pending = {
  resolve: (value: TranscriptOutput) => void;
  reject: (err: Error) => void;
};

type Waiter = {
  resolve: () => void;
  reject: (err: Error) => void;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isSegment(value: unknown): value is Segment {
  return (
    isRecord(value) &&
    typeof value.start_time_ms === "number" &&
    typeof value.end_time_ms === "number" &&
    typeof value.text === "string"
  );
}

const STDERR_LINE_CAP = 2000;

/**
 * One long-lived Python process speaking JSON lines on stdio. Spawned lazily on the first
 * request and again after it exits (idle timeout or crash).
 */
export class PythonWorker {
  private child: WorkerProcess | undefined;
  private ready = false;
  private starting: Promise<void> | undefined;
  private readyWaiter: Waiter | undefined;
  private stdoutBuf = "";
  private stderrBuf = "";
  private nextId = 1;
  private readonly pending = new Map<number, Pending>();

  constructor(
    private readonly spawnWorker: SpawnWorker,
    private readonly onEvent?: (ev: PythonWorkerEvent) => void
  ) {}

  get running(): boolean {
    return this.child !== undefined;
  }

  get inFlight(): number {
    return this.pending.size;
  }

  async request(req: TranscribeRequest): Promise<TranscriptOutput> {
    await this.ensureStarted();
    const child = this.child;
    if (!child) throw new WorkerExitedError(null, null, "Python worker not running");

    const id = this.nextId++;
    const result = new Promise<TranscriptOutput>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
    });
    child.stdin.write(`${JSON.stringify({ type: "transcribe", id, ...req })}\n`);
    return result;
  }

  /** Terminates the process and waits for it to go away. */
  async stop(): Promise<void> {
    const child = this.child;
    if (!child) return;
    const exited = new Promise<void>((resolve) => {
      child.on("close", () => resolve());
    });
    child.kill("SIGTERM");
    await exited;
  }

  private async ensureStarted(): Promise<void> {
    if (this.child && this.ready) return;
    if (!this.starting) this.starting = this.start();
    try {
      await this.starting;
    } finally {
      this.starting = undefined;
    }
  }

  private async start(): Promise<void> {
    const child = this.spawnWorker();
    this.child = child;
    this.ready = false;
    this.stdoutBuf = "";
    this.stderrBuf = "";
    this.onEvent?.({ type: "spawn", pid: child.pid });

    child.stdout.on("data", (d) => this.onStdout(String(d)));
    child.stderr.on("data", (d) => this.onStderr(String(d)));
    child.stdin.on("error", (err) => this.onStderr(`stdin: ${err.message}\n`));
    child.on("error", (err) => this.handleExit(child, new WorkerExitedError(null, null, `Python worker failed: ${err.message}`)));
    child.on("close", (code, signal) => {
      this.onEvent?.({ type: "exit", code, signal });
      this.handleExit(child, new WorkerExitedError(code, signal));
    });

    await new Promise<void>((resolve, reject) => {
      this.readyWaiter = { resolve, reject };
    });
  }

  private handleExit(child: WorkerProcess, err: WorkerExitedError): void {
    if (this.child !== child) return;
    this.child = undefined;
    this.ready = false;
    this.readyWaiter?.reject(err);
    this.readyWaiter = undefined;
    for (const { reject } of this.pending.values()) reject(err);
    this.pending.clear();
  }

  private onStdout(chunk: string): void {
    this.stdoutBuf += chunk;
    while (true) {
      const idx = this.stdoutBuf.indexOf("\n");
      if (idx < 0) break;
      const line = this.stdoutBuf.slice(0, idx).trim();
      this.stdoutBuf = this.stdoutBuf.slice(idx + 1);
      if (!line) continue;

      let msg: unknown;
      try {
        msg = JSON.parse(line);
      } catch {
        continue;
      }
      if (isRecord(msg)) this.onMessage(msg);
    }
  }

  private onMessage(msg: Record<string, unknown>): void {
    if (msg.type === "ready" && typeof msg.pid === "number") {
      this.ready = true;
      this.onEvent?.({ type: "ready", pid: msg.pid, device: typeof msg.device === "string" ? msg.device : undefined });
      this.readyWaiter?.resolve();
      this.readyWaiter = undefined;
      return;
    }
    if (msg.type !== "result" || typeof msg.id !== "number") return;

    const pending = this.pending.get(msg.id);
    if (!pending) return;
    this.pending.delete(msg.id);

    if (msg.ok === true && typeof msg.text === "string") {
      const segments = Array.isArray(msg.segments) ? msg.segments.filter(isSegment) : undefined;
      pending.resolve(segments ? { text: msg.text, segments } : { text: msg.text });
      return;
    }
    const error = typeof msg.error === "string" && msg.error ? msg.error : "Python worker transcription failed";
    const traceback = typeof msg.traceback === "string" ? msg.traceback : undefined;
    this.onEvent?.({ type: "failure", id: msg.id, error, traceback });
    pending.reject(new InferenceError(error));
  }

  private onStderr(chunk: string): void {
    this.stderrBuf += chunk;
    while (true) {
      const idx = this.stderrBuf.indexOf("\n");
      if (idx < 0) break;
      const trimmed = this.stderrBuf.slice(0, idx).trim();
      this.stderrBuf = this.stderrBuf.slice(idx + 1);
      if (!trimmed) continue;
      const line = trimmed.length > STDERR_LINE_CAP ? `${trimmed.slice(0, STDERR_LINE_CAP)}…` : trimmed;
      this.onEvent?.({ type: "stderr", pid: this.child?.pid, line });
    }
  }
}
