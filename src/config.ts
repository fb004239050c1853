import "dotenv/config";
import path from "node:path";

export type Config = {
  port: number;
  serviceVersion: string;
  bearerToken: string;
  requireAuth: boolean;
  tmpDir: string;

  ffmpegBin: string;
  ffprobeBin: string;
  soxBin: string;
  pythonBin: string;
  transcriberScript: string;
  workerIdleSeconds: number;

  modelPath: string;
  language: string;
  returnTimestamps: boolean;
  chunkLengthS: number;
  batchSize: number;
  maxNewTokens: number;

  audioRate: number;
  normLevel: string;
  compandParams: string;
  audioSpeedFactor: number;
  padLeadSeconds: number;
  padTrailSeconds: number;
  probeTimeoutSeconds: number;
  toolTimeoutSeconds: number;

  maxFileSizeMb: number;
  allowedExtensions: string[];
  allowedContentTypes: string[];
  allowedDirectories: string[];

  enableHistory: boolean;
  historyDir: string;

  taskConcurrency: number;
  taskQueueMax: number;
  taskMaxAgeSeconds: number;
  taskSweepIntervalSeconds: number;
  modelCacheTtlSeconds: number;

  logLevel: string;
  logFile: string;
  logRequestDebug: boolean;
};

type Env = Record<string, string | undefined>;

export const DEFAULT_EXTENSIONS = [".wav", ".mp3", ".ogg", ".flac", ".m4a"];

// file-type reports some formats under more than one name depending on version.
export const DEFAULT_CONTENT_TYPES = [
  "audio/wav",
  "audio/wave",
  "audio/x-wav",
  "audio/vnd.wave",
  "audio/mpeg",
  "audio/ogg",
  "audio/opus",
  "audio/flac",
  "audio/x-flac",
  "audio/mp4",
  "audio/x-m4a",
];

export const DEFAULT_COMPAND_PARAMS = "0.3,1 -90,-90,-70,-70,-60,-20,0,0 -5 0 0.2";

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value)) return fallback;
  return value;
}

function readFloat(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const value = Number.parseFloat(raw);
  if (!Number.isFinite(value)) return fallback;
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) return fallback;
  return raw === "1" || raw.toLowerCase() === "true" || raw.toLowerCase() === "yes";
}

function readList(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (raw === undefined) return fallback;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function loadConfig(env: Env = process.env): Config {
  const tmpDir = env.TMP_DIR ?? path.join(process.cwd(), "tmp");
  return {
    port: readInt(env, "PORT", 3000),
    serviceVersion: env.SERVICE_VERSION ?? "1.0.0",
    bearerToken: env.BEARER_TOKEN ?? "",
    requireAuth: readBool(env, "REQUIRE_AUTH", false),
    tmpDir,

    ffmpegBin: env.FFMPEG_BIN ?? "ffmpeg",
    ffprobeBin: env.FFPROBE_BIN ?? "ffprobe",
    soxBin: env.SOX_BIN ?? "sox",
    pythonBin: env.PYTHON_BIN ?? "",
    transcriberScript: env.TRANSCRIBER_SCRIPT ?? path.join(process.cwd(), "python", "transcriber_worker.py"),
    workerIdleSeconds: readInt(env, "WORKER_IDLE_SECONDS", 0),

    modelPath: env.MODEL_PATH ?? "openai/whisper-large-v3",
    language: env.LANGUAGE ?? "en",
    returnTimestamps: readBool(env, "RETURN_TIMESTAMPS", false),
    chunkLengthS: readInt(env, "CHUNK_LENGTH_S", 30),
    batchSize: readInt(env, "BATCH_SIZE", 16),
    maxNewTokens: readInt(env, "MAX_NEW_TOKENS", 128),

    audioRate: readInt(env, "AUDIO_RATE", 16000),
    normLevel: env.NORM_LEVEL ?? "-0.5",
    compandParams: env.COMPAND_PARAMS ?? DEFAULT_COMPAND_PARAMS,
    audioSpeedFactor: readFloat(env, "AUDIO_SPEED_FACTOR", 1.25),
    padLeadSeconds: readFloat(env, "PAD_LEAD_SECONDS", 2.0),
    padTrailSeconds: readFloat(env, "PAD_TRAIL_SECONDS", 1.0),
    probeTimeoutSeconds: readFloat(env, "PROBE_TIMEOUT_SECONDS", 10),
    toolTimeoutSeconds: readFloat(env, "TOOL_TIMEOUT_SECONDS", 600),

    maxFileSizeMb: readFloat(env, "MAX_FILE_SIZE_MB", 100),
    allowedExtensions: readList(env, "ALLOWED_EXTENSIONS", DEFAULT_EXTENSIONS),
    allowedContentTypes: readList(env, "ALLOWED_CONTENT_TYPES", DEFAULT_CONTENT_TYPES),
    allowedDirectories: readList(env, "ALLOWED_DIRECTORIES", []),

    enableHistory: readBool(env, "ENABLE_HISTORY", false),
    historyDir: env.HISTORY_DIR ?? path.join(process.cwd(), "history"),

    taskConcurrency: readInt(env, "TASK_CONCURRENCY", 0),
    taskQueueMax: readInt(env, "TASK_QUEUE_MAX", 100),
    taskMaxAgeSeconds: readInt(env, "TASK_MAX_AGE_SECONDS", 3600),
    taskSweepIntervalSeconds: readInt(env, "TASK_SWEEP_INTERVAL_SECONDS", 60),
    modelCacheTtlSeconds: readInt(env, "MODEL_CACHE_TTL_SECONDS", 3600),

    logLevel: env.LOG_LEVEL ?? "info",
    logFile: env.LOG_FILE ?? "",
    logRequestDebug: readBool(env, "LOG_REQUEST_DEBUG", false),
  };
}

export const config: Config = loadConfig();

export function maxFileSizeBytes(cfg: Pick<Config, "maxFileSizeMb">): number {
  return Math.floor(cfg.maxFileSizeMb * 1024 * 1024);
}

export function validateConfig(cfg: Config): void {
  if (cfg.requireAuth && !cfg.bearerToken) {
    throw new Error("Missing BEARER_TOKEN (set REQUIRE_AUTH=false to disable auth).");
  }
  if (!Number.isFinite(cfg.audioRate) || cfg.audioRate <= 0) {
    throw new Error("AUDIO_RATE must be a positive integer.");
  }
  // atempo accepts 0.5..100 per filter instance
  if (!(cfg.audioSpeedFactor >= 0.5 && cfg.audioSpeedFactor <= 100)) {
    throw new Error("AUDIO_SPEED_FACTOR must be between 0.5 and 100.");
  }
  if (cfg.padLeadSeconds < 0 || cfg.padTrailSeconds < 0) {
    throw new Error("PAD_LEAD_SECONDS and PAD_TRAIL_SECONDS must not be negative.");
  }
  if (cfg.maxFileSizeMb <= 0) {
    throw new Error("MAX_FILE_SIZE_MB must be positive.");
  }
  if (cfg.probeTimeoutSeconds <= 0 || cfg.toolTimeoutSeconds <= 0) {
    throw new Error("PROBE_TIMEOUT_SECONDS and TOOL_TIMEOUT_SECONDS must be positive.");
  }
  if (cfg.allowedExtensions.length === 0) {
    throw new Error("ALLOWED_EXTENSIONS must list at least one extension.");
  }
  if (cfg.taskQueueMax <= 0) {
    throw new Error("TASK_QUEUE_MAX must be a positive integer.");
  }
  if (cfg.taskSweepIntervalSeconds <= 0) {
    throw new Error("TASK_SWEEP_INTERVAL_SECONDS must be a positive integer.");
  }
  if (cfg.taskMaxAgeSeconds < 0) {
    throw new Error("TASK_MAX_AGE_SECONDS must not be negative.");
  }
}

/** Config as exposed by GET /config. */
export function publicConfig(cfg: Config): Omit<Config, "bearerToken"> {
  const { bearerToken: _secret, ...rest } = cfg;
  return rest;
}
