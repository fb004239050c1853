import fs from "node:fs";
import type { FileHandle } from "node:fs/promises";
import { SourceError } from "../errors";

export type SourceKind = "uploaded" | "remote" | "inline" | "local";

export type AudioFile = {
  handle: FileHandle;
  name: string;
  path: string;
};

export interface AudioSource {
  readonly kind: SourceKind;
  /** Materializes the audio as an open, size-checked file. */
  fetch(): Promise<AudioFile>;
  /** Removes whatever scratch files `fetch` created. Safe to call more than once. */
  cleanup?(): Promise<void>;
}

export type UploadedPart = {
  originalname: string;
  path: string;
  size: number;
};

export type SourceInput =
  | { kind: "uploaded"; file: UploadedPart | undefined }
  | { kind: "remote"; url: string }
  | { kind: "inline"; payload: string; filename?: string }
  | { kind: "local"; path: string };

export function tooLarge(maxBytes: number): SourceError {
  const mb = maxBytes / (1024 * 1024);
  return new SourceError("too_large", `File exceeds maximum size of ${Number(mb.toFixed(2))}MB`);
}

/** Rejects a handle whose length is over `maxBytes`. Reads are positional, so nothing is consumed. */
export async function checkSize(handle: FileHandle, maxBytes: number): Promise<number> {
  const { size } = await handle.stat();
  if (size > maxBytes) throw tooLarge(maxBytes);
  return size;
}

/** Opens `filePath` read-only and enforces the byte ceiling; the handle is closed again on failure. */
export async function openChecked(filePath: string, name: string, maxBytes: number): Promise<AudioFile> {
  const handle = await fs.promises.open(filePath, "r");
  try {
    await checkSize(handle, maxBytes);
  } catch (err) {
    await handle.close();
    throw err;
  }
  return { handle, name, path: filePath };
}
