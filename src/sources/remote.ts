import path from "node:path";
import { SourceError } from "../errors";
import { downloadToFile, type FetchLike } from "../http/download";
import type { ResourceManager, TempFile } from "../resources/resourceManager";
import { openChecked, type AudioSource } from "./types";

function parseUrl(raw: string): URL {
  try {
    return new URL(raw);
  } catch (err) {
    throw new SourceError("fetch_error", `Error retrieving file from URL: invalid URL "${raw}"`, { cause: err });
  }
}

function urlBasename(url: URL): string {
  let pathname = url.pathname;
  try {
    pathname = decodeURIComponent(pathname);
  } catch {
    // keep the raw pathname
  }
  return path.posix.basename(pathname);
}

export function remoteSource(
  rawUrl: string,
  options: { maxBytes: number; resources: ResourceManager; fetchImpl?: FetchLike }
): AudioSource {
  let temp: TempFile | undefined;

  const cleanup = async () => {
    if (!temp) return;
    const owned = temp;
    temp = undefined;
    await options.resources.release([owned.path]);
  };

  return {
    kind: "remote",
    async fetch() {
      const url = parseUrl(rawUrl);
      if (url.protocol !== "http:" && url.protocol !== "https:") {
        throw new SourceError("fetch_error", `Error retrieving file from URL: unsupported scheme ${url.protocol}`);
      }
      const base = urlBasename(url);
      const ext = path.extname(base);
      temp = await options.resources.create(ext || ".wav");
      // An extensionless URL name gives way to the `.wav` temp name.
      const name = ext ? base : path.basename(temp.path);
      try {
        await downloadToFile({
          url: url.toString(),
          destPath: temp.path,
          maxBytes: options.maxBytes,
          fetchImpl: options.fetchImpl,
        });
        return await openChecked(temp.path, name, options.maxBytes);
      } catch (err) {
        await cleanup();
        throw err;
      }
    },
    cleanup,
  };
}
