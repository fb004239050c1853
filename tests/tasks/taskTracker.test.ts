import { describe, expect, it } from "vitest";
import { QueueFullError } from "../../src/errors";
import { JobQueue } from "../../src/queue/jobQueue";
import { TaskTracker, toTaskBody, type Task } from "../../src/tasks/taskTracker";
import { silentLogger } from "../helpers";

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (err: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

function tracker(options: { concurrency?: number; maxSize?: number; now?: () => number } = {}) {
  return new TaskTracker<string>({
    queue: new JobQueue({ concurrency: options.concurrency ?? 0, maxSize: options.maxSize ?? 10 }),
    logger: silentLogger,
    now: options.now,
  });
}

describe("TaskTracker", () => {
  it("returns the id while the task is still pending", async () => {
    const tasks = tracker();
    const id = tasks.submit(async () => "done");

    expect(tasks.status(id)?.status).toBe("pending");
    await tasks.onIdle();
    expect(tasks.status(id)).toMatchObject({ id, status: "completed", result: "done" });
  });

  it("records a failure as task state", async () => {
    const tasks = tracker();
    const id = tasks.submit(async () => {
      throw new Error("model crashed");
    });

    await tasks.onIdle();
    const task = tasks.status(id);
    expect(task?.status).toBe("failed");
    expect(task?.error).toBe("model crashed");
    expect(task?.completedAt).toBeTypeOf("number");
  });

  it("moves through running", async () => {
    const tasks = tracker();
    const gate = deferred<string>();
    const id = tasks.submit(() => gate.promise);

    await new Promise((resolve) => setImmediate(resolve));
    await new Promise((resolve) => setImmediate(resolve));
    expect(tasks.status(id)?.status).toBe("running");

    gate.resolve("ok");
    await tasks.onIdle();
    expect(tasks.status(id)?.status).toBe("completed");
  });

  it("hands out copies", async () => {
    const tasks = tracker();
    const id = tasks.submit(async () => "x");
    const snapshot = tasks.status(id);
    if (snapshot) snapshot.status = "failed";

    expect(tasks.status(id)?.status).toBe("pending");
    await tasks.onIdle();
  });

  it("returns undefined for an unknown id", () => {
    expect(tracker().status("nope")).toBeUndefined();
  });

  it("refuses work once the waiting queue is full", async () => {
    const tasks = tracker({ concurrency: 1, maxSize: 1 });
    const gate = deferred<string>();
    tasks.submit(() => gate.promise);
    tasks.submit(async () => "second");

    expect(() => tasks.submit(async () => "third")).toThrow(QueueFullError);
    expect(tasks.size).toBe(2);

    gate.resolve("first");
    await tasks.onIdle();
  });

  it("sweeps terminal tasks older than the max age", async () => {
    let clock = 1_000;
    const tasks = tracker({ now: () => clock });
    const gate = deferred<string>();
    const done = tasks.submit(async () => "a");
    const running = tasks.submit(() => gate.promise);
    await new Promise((resolve) => setImmediate(resolve));
    await new Promise((resolve) => setImmediate(resolve));

    clock = 1_000 + 60_000;
    expect(tasks.sweep(60_000)).toBe(0);
    clock += 1;
    expect(tasks.sweep(60_000)).toBe(1);

    expect(tasks.status(done)).toBeUndefined();
    expect(tasks.status(running)?.status).toBe("running");
    gate.resolve("b");
    await tasks.onIdle();
  });
});

describe("toTaskBody", () => {
  const base: Task<string> = { id: "t1", status: "pending", createdAt: 0 };

  it("omits result and error while in flight", () => {
    expect(toTaskBody(base)).toEqual({ task_id: "t1", status: "pending" });
  });

  it("carries the result when completed", () => {
    expect(toTaskBody({ ...base, status: "completed", result: "text" })).toEqual({
      task_id: "t1",
      status: "completed",
      result: "text",
    });
  });

  it("carries the error when failed", () => {
    expect(toTaskBody({ ...base, status: "failed", error: "boom" })).toEqual({
      task_id: "t1",
      status: "failed",
      error: "boom",
    });
  });
});
