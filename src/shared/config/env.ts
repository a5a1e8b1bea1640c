import os from "os";
import path from "path";

export type JobArchiveKind = "memory" | "mongo";

export type Env = {
  PORT: number;
  DOWNLOAD_DIR: string;
  WORK_DIR: string;
  FFMPEG_PATH: string;
  JOB_ARCHIVE: JobArchiveKind;
  MONGO_URI: string;
};

const validateMongoUri = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid mongodb:// or mongodb+srv:// URI. Received: ${value}`);
  }

  if (parsed.protocol !== "mongodb:" && parsed.protocol !== "mongodb+srv:") {
    throw new Error(`${name} must use mongodb or mongodb+srv scheme. Received: ${parsed.protocol}`);
  }

  return value;
};

const parsePort = (raw: string | undefined): number => {
  if (raw == null || raw.trim() === "") return 8000;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new Error(`PORT=${raw} is out of allowed range [1..65535]`);
  }
  return value;
};

const parseArchiveKind = (raw: string | undefined): JobArchiveKind => {
  const value = raw?.trim().toLowerCase() || "memory";
  if (value !== "memory" && value !== "mongo") {
    throw new Error(`JOB_ARCHIVE must be "memory" or "mongo". Received: ${raw}`);
  }
  return value;
};

const nonEmpty = (raw: string | undefined): string | undefined => {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const PORT = parsePort(env.PORT);
  const DOWNLOAD_DIR = path.resolve(nonEmpty(env.DOWNLOAD_DIR) ?? "downloads");
  const WORK_DIR = path.resolve(nonEmpty(env.WORK_DIR) ?? path.join(os.tmpdir(), "media-pipeline"));
  const FFMPEG_PATH = nonEmpty(env.FFMPEG_PATH) ?? "ffmpeg";
  const JOB_ARCHIVE = parseArchiveKind(env.JOB_ARCHIVE);
  const MONGO_URI = validateMongoUri("MONGO_URI", nonEmpty(env.MONGO_URI) ?? "mongodb://localhost:27017/media_pipeline");

  if (DOWNLOAD_DIR === WORK_DIR) {
    throw new Error("WORK_DIR must differ from DOWNLOAD_DIR");
  }

  return { PORT, DOWNLOAD_DIR, WORK_DIR, FFMPEG_PATH, JOB_ARCHIVE, MONGO_URI };
};
