import fs from "node:fs";
import path from "node:path";
import { SourceError } from "../errors";
import type { ResourceManager, TempFile } from "../resources/resourceManager";
import { openChecked, tooLarge, type AudioSource } from "./types";

const DATA_URL_PREFIX = /^data:[^,]*;base64,/i;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/** Strict decode: optional data-URL prefix, whitespace ignored, padding required. */
export function decodeBase64Payload(payload: string): Buffer {
  const body = payload.replace(DATA_URL_PREFIX, "").replace(/\s+/g, "");
  if (!body || body.length % 4 !== 0 || !BASE64.test(body)) {
    throw new SourceError("decode_error", "Invalid base64 payload");
  }
  return Buffer.from(body, "base64");
}

export function inlineSource(
  payload: string,
  options: { filename?: string; maxBytes: number; resources: ResourceManager }
): AudioSource {
  let temp: TempFile | undefined;

  const cleanup = async () => {
    if (!temp) return;
    const owned = temp;
    temp = undefined;
    await options.resources.release([owned.path]);
  };

  return {
    kind: "inline",
    async fetch() {
      const bytes = decodeBase64Payload(payload);
      if (bytes.length > options.maxBytes) throw tooLarge(options.maxBytes);
      const ext = options.filename ? path.extname(options.filename) : "";
      temp = await options.resources.create(ext || ".wav");
      try {
        await fs.promises.writeFile(temp.path, bytes);
        return await openChecked(temp.path, options.filename || path.basename(temp.path), options.maxBytes);
      } catch (err) {
        await cleanup();
        throw err;
      }
    },
    cleanup,
  };
}
