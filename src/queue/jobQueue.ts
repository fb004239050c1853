import PQueue from "p-queue";
import { QueueFullError } from "../errors";

/** p-queue with a ceiling on waiting jobs. A concurrency of 0 or less means unbounded. */
export class JobQueue {
  private readonly queue: PQueue;
  private readonly maxSize: number;

  constructor(options: { concurrency: number; maxSize: number }) {
    this.queue = new PQueue({ concurrency: options.concurrency > 0 ? options.concurrency : Number.POSITIVE_INFINITY });
    this.maxSize = options.maxSize;
  }

  /** Jobs waiting for a slot. */
  get pending(): number {
    return this.queue.size;
  }

  get running(): number {
    return this.queue.pending;
  }

  /** Throws QueueFullError synchronously when `maxSize` jobs are already waiting. */
  add<T>(job: () => Promise<T>): Promise<T> {
    if (this.queue.size >= this.maxSize) throw new QueueFullError(this.maxSize);
    return this.queue.add(job, { throwOnTimeout: true });
  }

  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }
}
