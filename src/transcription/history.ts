import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { errorMessage, getLogger, type Logger } from "../logging";
import type { TranscriptionResponse } from "./types";

const TAG_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

function randomTag(length = 4): string {
  let tag = "";
  for (let i = 0; i < length; i++) tag += TAG_ALPHABET[crypto.randomInt(TAG_ALPHABET.length)];
  return tag;
}

function dateDir(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

export async function writeJsonAtomic(filePath: string, obj: unknown): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp.${Date.now()}.${Math.random().toString(16).slice(2)}`;
  await fs.promises.writeFile(tmp, JSON.stringify(obj, null, 2), "utf-8");
  try {
    await fs.promises.rename(tmp, filePath);
  } catch (err) {
    // Windows can fail when destination exists; fallback to "replace".
    const code = errnoCode(err);
    if (code === "EEXIST" || code === "EPERM") {
      await fs.promises.rm(filePath, { force: true });
      await fs.promises.rename(tmp, filePath);
      return;
    }
    await fs.promises.rm(tmp, { force: true });
    throw err;
  }
}

/** Optional per-response JSON log under `<dir>/<YYYY-MM-DD>/`. */
export class HistoryStore {
  readonly enabled: boolean;
  readonly dir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: { enabled: boolean; dir: string; logger?: Logger; now?: () => Date }) {
    this.enabled = options.enabled;
    this.dir = options.dir;
    this.logger = options.logger ?? getLogger("history");
    this.now = options.now ?? (() => new Date());
  }

  async save(response: TranscriptionResponse, originalName: string): Promise<string | undefined> {
    if (!this.enabled) return undefined;
    const now = this.now();
    const fileName = `${now.getTime()}_${path.basename(originalName)}_${randomTag()}.json`;
    const target = path.join(this.dir, dateDir(now), fileName);
    try {
      await writeJsonAtomic(target, response);
      this.logger.info("history_saved", { path: target });
      return target;
    } catch (err) {
      this.logger.error("history_save_failed", { path: target, message: errorMessage(err) });
      return undefined;
    }
  }
}
