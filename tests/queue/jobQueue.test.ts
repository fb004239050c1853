import { describe, expect, it } from "vitest";
import { QueueFullError } from "../../src/errors";
import { JobQueue } from "../../src/queue/jobQueue";

describe("JobQueue", () => {
  it("runs jobs without a limit when concurrency is 0", async () => {
    const queue = new JobQueue({ concurrency: 0, maxSize: 1 });
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const jobs = [queue.add(() => gate), queue.add(() => gate), queue.add(() => gate)];

    expect(queue.running).toBe(3);
    expect(queue.pending).toBe(0);
    release();
    await Promise.all(jobs);
  });

  it("throws synchronously once maxSize jobs are waiting", async () => {
    const queue = new JobQueue({ concurrency: 1, maxSize: 2 });
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const first = queue.add(() => gate);
    const second = queue.add(async () => "b");
    const third = queue.add(async () => "c");

    expect(queue.pending).toBe(2);
    expect(() => queue.add(async () => "d")).toThrow(QueueFullError);

    release();
    await expect(Promise.all([first, second, third])).resolves.toEqual([undefined, "b", "c"]);
    await queue.onIdle();
    expect(queue.running).toBe(0);
  });

  it("propagates a job's rejection to its caller", async () => {
    const queue = new JobQueue({ concurrency: 1, maxSize: 5 });
    await expect(
      queue.add(async () => {
        throw new Error("job failed");
      })
    ).rejects.toThrow("job failed");
  });
});
