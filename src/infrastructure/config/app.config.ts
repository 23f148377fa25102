/**
 * Application configuration
 * Centralizes all environment variables with type safety and default values
 */

import dotenv from "dotenv";

// Load environment variables from .env file
dotenv.config();

export type StorageDriver = "local" | "s3";
export type JobStoreDriver = "memory" | "mongodb";

export interface AppConfig {
  // Server
  port: number;

  storage: {
    driver: StorageDriver;
    dir: string; // local artifacts live under <dir>/jobs/<jobId>/
    workDir: string; // downloaded media, removed after each job
  };

  // AWS S3
  aws: {
    accessKeyId?: string;
    secretAccessKey?: string;
    region: string;
    s3Bucket?: string;
    s3Endpoint?: string; // For S3-compatible services
    s3ForcePathStyle?: boolean;
  };

  jobStore: JobStoreDriver;

  // MongoDB
  mongodb: {
    uri: string;
    dbName: string;
  };

  // AI providers; request-level keys take precedence
  ai: {
    openaiApiKey?: string;
    openaiModel: string;
    anthropicApiKey?: string;
    claudeModel: string;
    geminiApiKey?: string;
    geminiModel: string;
    ollamaBaseUrl: string;
    ollamaModel: string;
  };

  tools: {
    ytDlpPath: string;
    ffmpegPath: string;
  };

  pipeline: {
    providerTimeoutMs: number;
    fetchTimeoutMs: number;
    frameCaptureTimeoutMs: number;
    translationMaxRetries: number;
    translationConcurrency: number;
    maxConcurrentJobs: number;
    jobRetentionHours: number;
    jobHistoryMaxEntries: number;
  };
}

function intFromEnv(name: string, fallback: number, min: number = 0): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function getConfig(): AppConfig {
  const storageDriver = process.env.STORAGE_DRIVER || "local";
  if (storageDriver !== "local" && storageDriver !== "s3") {
    throw new Error(`STORAGE_DRIVER must be "local" or "s3", got "${storageDriver}"`);
  }
  const jobStore = process.env.JOB_STORE || "memory";
  if (jobStore !== "memory" && jobStore !== "mongodb") {
    throw new Error(`JOB_STORE must be "memory" or "mongodb", got "${jobStore}"`);
  }
  if (storageDriver === "s3" && !process.env.S3_BUCKET) {
    throw new Error("S3_BUCKET environment variable is required when STORAGE_DRIVER=s3");
  }

  return {
    port: intFromEnv("PORT", 3000, 1),

    storage: {
      driver: storageDriver,
      dir: process.env.STORAGE_DIR || "./storage",
      workDir: process.env.WORK_DIR || "./storage/tmp",
    },

    aws: {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID,
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
      region: (process.env.AWS_REGION || process.env.AWS_DEFAULT_REGION || "us-east-1").trim(),
      s3Bucket: process.env.S3_BUCKET,
      s3Endpoint: process.env.S3_ENDPOINT,
      s3ForcePathStyle: process.env.S3_FORCE_PATH_STYLE === "true",
    },

    jobStore,

    mongodb: {
      uri: process.env.MONGODB_URI || "mongodb://localhost:27017",
      dbName: process.env.MONGODB_DB_NAME || "video-slides",
    },

    ai: {
      openaiApiKey: process.env.OPENAI_API_KEY || undefined,
      openaiModel: process.env.OPENAI_MODEL || "gpt-4o-mini",
      anthropicApiKey: process.env.ANTHROPIC_API_KEY || undefined,
      claudeModel: process.env.CLAUDE_MODEL || "claude-3-5-haiku-latest",
      geminiApiKey: process.env.GEMINI_API_KEY || undefined,
      geminiModel: process.env.GEMINI_MODEL || "gemini-2.0-flash",
      ollamaBaseUrl: (process.env.OLLAMA_BASE_URL || "http://localhost:11434").replace(/\/+$/, ""),
      ollamaModel: process.env.OLLAMA_MODEL || "llama3.1",
    },

    tools: {
      ytDlpPath: process.env.YTDLP_PATH || "yt-dlp",
      ffmpegPath: process.env.FFMPEG_PATH || "ffmpeg",
    },

    pipeline: {
      providerTimeoutMs: intFromEnv("PROVIDER_TIMEOUT_MS", 120000, 1),
      fetchTimeoutMs: intFromEnv("FETCH_TIMEOUT_MS", 600000, 1),
      frameCaptureTimeoutMs: intFromEnv("FRAME_CAPTURE_TIMEOUT_MS", 30000, 1),
      translationMaxRetries: intFromEnv("TRANSLATION_MAX_RETRIES", 2),
      translationConcurrency: intFromEnv("TRANSLATION_CONCURRENCY", 3, 1),
      maxConcurrentJobs: intFromEnv("MAX_CONCURRENT_JOBS", 2, 1),
      jobRetentionHours: intFromEnv("JOB_RETENTION_HOURS", 24, 1),
      jobHistoryMaxEntries: intFromEnv("JOB_HISTORY_MAX_ENTRIES", 200, 1),
    },
  };
}

export const config = getConfig();
