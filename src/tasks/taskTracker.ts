import crypto from "node:crypto";
import { setImmediate } from "node:timers/promises";
import { errorMessage, getLogger, type Logger } from "../logging";
import type { JobQueue } from "../queue/jobQueue";

export type TaskStatus = "pending" | "running" | "completed" | "failed";

export type Task<R> = {
  id: string;
  status: TaskStatus;
  result?: R;
  error?: string;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
};

export type TaskBody<R> = {
  task_id: string;
  status: TaskStatus;
  result?: R;
  error?: string;
};

export function isTerminal(status: TaskStatus): boolean {
  return status === "completed" || status === "failed";
}

export function toTaskBody<R>(task: Task<R>): TaskBody<R> {
  const body: TaskBody<R> = { task_id: task.id, status: task.status };
  if (task.status === "completed") body.result = task.result;
  if (task.status === "failed") body.error = task.error;
  return body;
}

/**
 * In-memory task table over a JobQueue. State moves pending -> running -> completed|failed
 * and only on the event loop, so no extra locking is involved.
 */
export class TaskTracker<R> {
  private readonly tasks = new Map<string, Task<R>>();
  private readonly queue: JobQueue;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: { queue: JobQueue; logger?: Logger; now?: () => number }) {
    this.queue = options.queue;
    this.logger = options.logger ?? getLogger("tasks");
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.tasks.size;
  }

  /** Records a pending task and enqueues it. Throws QueueFullError without recording anything. */
  submit(operation: () => Promise<R>): string {
    const task: Task<R> = { id: crypto.randomUUID(), status: "pending", createdAt: this.now() };
    const done = this.queue.add(() => this.execute(task, operation));
    this.tasks.set(task.id, task);
    this.logger.info("task_submitted", { taskId: task.id });
    void done.catch((err: unknown) => {
      this.logger.error("task_wrapper_failed", { taskId: task.id, message: errorMessage(err) });
    });
    return task.id;
  }

  status(id: string): Task<R> | undefined {
    const task = this.tasks.get(id);
    return task ? { ...task } : undefined;
  }

  /** Drops terminal tasks completed more than `maxAgeMs` ago. */
  sweep(maxAgeMs: number): number {
    const now = this.now();
    let removed = 0;
    for (const [id, task] of this.tasks) {
      if (!isTerminal(task.status) || task.completedAt === undefined) continue;
      if (now - task.completedAt > maxAgeMs) {
        this.tasks.delete(id);
        removed++;
      }
    }
    if (removed) this.logger.info("tasks_swept", { removed, remaining: this.tasks.size });
    return removed;
  }

  startSweeper(intervalMs: number, maxAgeMs: number): () => void {
    const timer = setInterval(() => this.sweep(maxAgeMs), intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  private async execute(task: Task<R>, operation: () => Promise<R>): Promise<void> {
    // Let submit() hand back the id while the task is still pending.
    await setImmediate();
    task.status = "running";
    task.startedAt = this.now();
    try {
      task.result = await operation();
      task.status = "completed";
      this.logger.info("task_completed", { taskId: task.id, ms: this.now() - task.startedAt });
    } catch (err) {
      task.error = errorMessage(err);
      task.status = "failed";
      this.logger.warn("task_failed", { taskId: task.id, message: task.error });
    } finally {
      task.completedAt = this.now();
    }
  }
}
