import path from "node:path";
import { SourceError } from "../errors";
import { errorMessage } from "../logging";
import { openChecked, type AudioSource } from "./types";

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

/** A file already on this host. The path must have passed `validateLocalFilePath`. */
export function localSource(filePath: string, maxBytes: number): AudioSource {
  return {
    kind: "local",
    async fetch() {
      try {
        return await openChecked(filePath, path.basename(filePath), maxBytes);
      } catch (err) {
        if (err instanceof SourceError) throw err;
        if (errnoCode(err) === "ENOENT") throw new SourceError("not_found", `File not found: ${filePath}`, { cause: err });
        throw new SourceError("unreadable", `Cannot read file: ${errorMessage(err)}`, { cause: err });
      }
    },
  };
}
