import fs from "node:fs";
import { SourceError } from "../errors";
import { openChecked, type AudioSource, type UploadedPart } from "./types";

/** A multipart upload that multer has already spooled to disk. */
export function uploadedSource(file: UploadedPart | undefined, maxBytes: number): AudioSource {
  return {
    kind: "uploaded",
    async fetch() {
      if (!file) throw new SourceError("missing_part", "No file part");
      if (!file.originalname) throw new SourceError("empty_selection", "No selected file");
      return openChecked(file.path, file.originalname, maxBytes);
    },
    async cleanup() {
      if (file) await fs.promises.rm(file.path, { force: true });
    },
  };
}
