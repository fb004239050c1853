import fs from "node:fs";
import { SourceError } from "../errors";
import { errorMessage } from "../logging";
import { tooLarge } from "../sources/types";

export type FetchLike = typeof fetch;

function fetchError(detail: string, cause?: unknown): SourceError {
  return new SourceError("fetch_error", `Error retrieving file from URL: ${detail}`, { cause });
}

/**
 * Streams `url` into `destPath`. A declared Content-Length over `maxBytes` fails before
 * anything is written; an undeclared oversize body is cut off once it passes the limit.
 */
export async function downloadToFile(args: {
  url: string;
  destPath: string;
  maxBytes: number;
  fetchImpl?: FetchLike;
}): Promise<{ bytes: number }> {
  const fetchImpl = args.fetchImpl ?? fetch;
  let response: Response;
  try {
    response = await fetchImpl(args.url);
  } catch (err) {
    throw fetchError(errorMessage(err), err);
  }
  if (!response.ok) {
    await response.body?.cancel();
    throw fetchError(`${response.status} ${response.statusText}`.trim());
  }

  const declared = Number.parseInt(response.headers.get("content-length") ?? "", 10);
  if (Number.isFinite(declared) && declared > args.maxBytes) {
    await response.body?.cancel();
    throw tooLarge(args.maxBytes);
  }
  if (!response.body) throw fetchError("empty body");

  const reader = response.body.getReader();
  const file = await fs.promises.open(args.destPath, "w");
  let bytes = 0;
  try {
    while (true) {
      const chunk = await reader.read().catch((err: unknown) => {
        throw fetchError(errorMessage(err), err);
      });
      if (chunk.done) break;
      bytes += chunk.value.byteLength;
      if (bytes > args.maxBytes) {
        await reader.cancel();
        throw tooLarge(args.maxBytes);
      }
      await file.write(chunk.value);
    }
  } finally {
    await file.close();
  }

  return { bytes };
}
