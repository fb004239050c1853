import { describe, expect, it } from "vitest";
import { ValidationError } from "../../src/errors";
import { parseBoolParam, parseTranscriptionParams, transcriptSizeBytes } from "../../src/transcription/types";

const defaults = { language: "en", returnTimestamps: false };

describe("parseBoolParam", () => {
  it.each(["true", "T", "yes", "Y", "1", " True "])("treats %j as true", (value) => {
    expect(parseBoolParam(value)).toBe(true);
  });

  it.each(["false", "no", "0", "", "on"])("treats %j as false", (value) => {
    expect(parseBoolParam(value)).toBe(false);
  });

  it("passes booleans through and ignores other types", () => {
    expect(parseBoolParam(true)).toBe(true);
    expect(parseBoolParam(false)).toBe(false);
    expect(parseBoolParam(undefined)).toBeUndefined();
    expect(parseBoolParam(null)).toBeUndefined();
  });
});

describe("parseTranscriptionParams", () => {
  it("applies defaults", () => {
    expect(parseTranscriptionParams({}, defaults)).toEqual({
      language: "en",
      temperature: 0,
      prompt: "",
      returnTimestamps: false,
    });
  });

  it("reads form-style string fields", () => {
    expect(
      parseTranscriptionParams(
        { language: "de", temperature: "0.4", prompt: "Glossary: sox", return_timestamps: "yes" },
        defaults
      )
    ).toEqual({ language: "de", temperature: 0.4, prompt: "Glossary: sox", returnTimestamps: true });
  });

  it("reads JSON-typed fields", () => {
    expect(parseTranscriptionParams({ temperature: 0.2, return_timestamps: true }, defaults)).toMatchObject({
      temperature: 0.2,
      returnTimestamps: true,
    });
  });

  it("falls back to the configured timestamp default", () => {
    expect(parseTranscriptionParams({}, { language: "en", returnTimestamps: true }).returnTimestamps).toBe(true);
  });

  it("rejects a temperature that is not a number", () => {
    expect(() => parseTranscriptionParams({ temperature: "warm" }, defaults)).toThrow(ValidationError);
  });
});

describe("transcriptSizeBytes", () => {
  it("counts UTF-8 bytes of the bare text", () => {
    expect(transcriptSizeBytes({ text: "héllo" }, false)).toBe(6);
  });

  it("counts the serialized segments payload when timestamps were requested", () => {
    const output = { text: "hi", segments: [{ start_time_ms: 0, end_time_ms: 1000, text: "hi" }] };
    expect(transcriptSizeBytes(output, true)).toBe(77);
  });
});
