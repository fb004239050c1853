import { fileTypeFromBuffer } from "file-type";
import { ValidationError } from "../errors";
import { errorMessage, getLogger, type Logger } from "../logging";
import type { AudioFile } from "../sources/types";

const SNIFF_BYTES = 1024;

export type ValidationPolicy = Readonly<{
  maxFileSizeMb: number;
  allowedExtensions: readonly string[];
  allowedContentTypes: ReadonlySet<string>;
}>;

/** Returns the detected MIME type, or undefined when the bytes are not recognized. */
export type Sniffer = (header: Uint8Array) => Promise<string | undefined>;

export const sniffMime: Sniffer = async (header) => (await fileTypeFromBuffer(header))?.mime;

export function createPolicy(input: {
  maxFileSizeMb: number;
  allowedExtensions: readonly string[];
  allowedContentTypes: Iterable<string>;
}): ValidationPolicy {
  return Object.freeze({
    maxFileSizeMb: input.maxFileSizeMb,
    allowedExtensions: Object.freeze(input.allowedExtensions.map((ext) => ext.toLowerCase())),
    allowedContentTypes: new Set([...input.allowedContentTypes].map((type) => type.toLowerCase())),
  });
}

export class FileValidator {
  readonly policy: ValidationPolicy;
  private readonly logger: Logger;
  private readonly sniff: Sniffer;

  constructor(policy: ValidationPolicy, options: { logger?: Logger; sniff?: Sniffer } = {}) {
    this.policy = policy;
    this.logger = options.logger ?? getLogger("validator");
    this.sniff = options.sniff ?? sniffMime;
  }

  async validate(file: AudioFile): Promise<void> {
    const maxBytes = this.policy.maxFileSizeMb * 1024 * 1024;
    const { size } = await file.handle.stat();
    if (size > maxBytes) {
      throw new ValidationError("too_large", `File exceeds maximum size of ${this.policy.maxFileSizeMb}MB`);
    }

    const lowerName = file.name.toLowerCase();
    if (!this.policy.allowedExtensions.some((ext) => lowerName.endsWith(ext))) {
      throw new ValidationError(
        "unsupported_extension",
        `Unsupported file extension. Allowed: ${this.policy.allowedExtensions.join(", ")}`
      );
    }

    const header = Buffer.alloc(Math.min(SNIFF_BYTES, size));
    const { bytesRead } = await file.handle.read(header, 0, header.length, 0);

    let mime: string | undefined;
    try {
      mime = await this.sniff(header.subarray(0, bytesRead));
    } catch (err) {
      this.logger.warn("content_type_sniff_failed", { file: file.name, message: errorMessage(err) });
      return;
    }
    if (mime === undefined) {
      this.logger.warn("content_type_unknown", { file: file.name });
      return;
    }
    if (!this.policy.allowedContentTypes.has(mime.toLowerCase())) {
      throw new ValidationError("unsupported_content_type", `Unsupported content type: ${mime}`);
    }
  }
}
