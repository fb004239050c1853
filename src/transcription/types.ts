import { ValidationError } from "../errors";

export type Segment = {
  start_time_ms: number;
  end_time_ms: number;
  text: string;
};

export type TranscribeOptions = {
  language: string;
  temperature: number;
  prompt: string;
  returnTimestamps: boolean;
  sampleRate: number;
};

export type TranscriptOutput = {
  text: string;
  segments?: Segment[];
};

/** The inference collaborator. Implementations own model loading and audio decoding. */
export interface Transcriber {
  transcribe(audioPath: string, options: TranscribeOptions): Promise<TranscriptOutput>;
}

export type TranscriptionParams = {
  language: string;
  temperature: number;
  prompt: string;
  returnTimestamps: boolean;
};

export type TranscriptionResponse = {
  text: string;
  segments?: Segment[];
  processing_time: number;
  response_size_bytes: number;
  duration_seconds: number;
  model: string;
};

const TRUTHY = new Set(["true", "t", "yes", "y", "1"]);

export function parseBoolParam(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value === 1;
  if (typeof value === "string") return TRUTHY.has(value.trim().toLowerCase());
  return undefined;
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/** Request fields (form or JSON body) with defaults applied. */
export function parseTranscriptionParams(
  raw: Record<string, unknown>,
  defaults: { language: string; returnTimestamps: boolean }
): TranscriptionParams {
  let temperature = 0;
  if (raw.temperature !== undefined && raw.temperature !== "") {
    temperature = typeof raw.temperature === "number" ? raw.temperature : Number.parseFloat(String(raw.temperature));
    if (!Number.isFinite(temperature)) {
      throw new ValidationError("invalid_parameter", "temperature must be a number");
    }
  }
  return {
    language: readString(raw.language) ?? defaults.language,
    temperature,
    prompt: typeof raw.prompt === "string" ? raw.prompt : "",
    returnTimestamps: parseBoolParam(raw.return_timestamps) ?? defaults.returnTimestamps,
  };
}

/** Byte length of what the model returned: the bare text, or `{segments, text}` when timestamps were requested. */
export function transcriptSizeBytes(output: TranscriptOutput, withTimestamps: boolean): number {
  const payload = withTimestamps ? JSON.stringify({ segments: output.segments ?? [], text: output.text }) : output.text;
  return Buffer.byteLength(payload, "utf8");
}
