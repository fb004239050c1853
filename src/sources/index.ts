import type { FetchLike } from "../http/download";
import type { ResourceManager } from "../resources/resourceManager";
import { inlineSource } from "./inline";
import { localSource } from "./local";
import { remoteSource } from "./remote";
import type { AudioSource, SourceInput } from "./types";
import { uploadedSource } from "./uploaded";

export type SourceDeps = {
  maxBytes: number;
  resources: ResourceManager;
  fetchImpl?: FetchLike;
};

export function createAudioSource(input: SourceInput, deps: SourceDeps): AudioSource {
  switch (input.kind) {
    case "uploaded":
      return uploadedSource(input.file, deps.maxBytes);
    case "remote":
      return remoteSource(input.url, deps);
    case "inline":
      return inlineSource(input.payload, { filename: input.filename, maxBytes: deps.maxBytes, resources: deps.resources });
    case "local":
      return localSource(input.path, deps.maxBytes);
  }
}

export type { AudioFile, AudioSource, SourceInput, SourceKind, UploadedPart } from "./types";
