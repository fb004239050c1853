import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { errorMessage, getLogger, type Logger } from "../logging";

export type TempFile = {
  path: string;
  dir: string;
};

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Scratch-space bookkeeping. Every path handed out by `create` lives in its own
 * fresh directory under `root` and stays tracked until released.
 *
 * Removal is best-effort: failures are logged, never thrown.
 */
export class ResourceManager {
  readonly root: string;
  private readonly logger: Logger;
  private readonly files = new Set<string>();
  private readonly dirs = new Set<string>();

  constructor(options: { root: string; logger?: Logger }) {
    this.root = options.root;
    this.logger = options.logger ?? getLogger("resources");
  }

  get trackedFiles(): string[] {
    return [...this.files];
  }

  get trackedDirs(): string[] {
    return [...this.dirs];
  }

  async create(suffix = ".wav"): Promise<TempFile> {
    await fs.promises.mkdir(this.root, { recursive: true });
    const dir = await fs.promises.mkdtemp(path.join(this.root, "stt-"));
    const file = path.join(dir, `${crypto.randomUUID()}${suffix}`);
    this.files.add(file);
    this.dirs.add(dir);
    this.logger.debug("temp_created", { path: file });
    return { path: file, dir };
  }

  async release(paths?: readonly string[]): Promise<void> {
    const targets = paths ? [...paths] : [...this.files];
    for (const file of targets) {
      try {
        await fs.promises.rm(file, { force: true });
        this.logger.debug("temp_removed", { path: file });
      } catch (err) {
        this.logger.warn("temp_remove_failed", { path: file, message: errorMessage(err) });
      }
      this.files.delete(file);
      await this.removeDirIfEmpty(path.dirname(file));
    }
  }

  async releaseAll(): Promise<void> {
    await this.release();
    for (const dir of [...this.dirs]) {
      await this.removeDirIfEmpty(dir);
    }
  }

  /** Allocates one temp path for the duration of `fn` and releases it on every exit path. */
  async withTempFile<T>(suffix: string, fn: (filePath: string) => Promise<T>): Promise<T> {
    const temp = await this.create(suffix);
    try {
      return await fn(temp.path);
    } finally {
      await this.release([temp.path]);
    }
  }

  private async removeDirIfEmpty(dir: string): Promise<void> {
    // Only directories created here.
    if (!this.dirs.has(dir)) return;
    try {
      const entries = await fs.promises.readdir(dir);
      if (entries.length > 0) return;
      await fs.promises.rmdir(dir);
      this.dirs.delete(dir);
      this.logger.debug("temp_dir_removed", { dir });
    } catch (err) {
      if (isNotFound(err)) {
        this.dirs.delete(dir);
        return;
      }
      this.logger.warn("temp_dir_remove_failed", { dir, message: errorMessage(err) });
    }
  }
}
