// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import os from "os";
import path from "path";
import { ConfigError } from "./errors.js";

// ---------- Reproducibility constants ----------

/**
 * Pinned ELA parameters. Changing either one changes every heat-map byte, so
 * they are part of the pipeline version string.
 */
export const ELA_DEFAULT_QUALITY = 95;
export const ELA_DEFAULT_SCALE = 30;

export const HASH_CHUNK_BYTES = 4 * 1024 * 1024;

export type FrameBackend = "ffmpeg" | "still";

export interface SamplingPolicy {
  intervalSeconds: number;
  maxFrames: number;
  startOffset: number;
}

/** Ceilings on per-run work that any policy, including request overrides, must respect. */
export interface SamplingLimits {
  maxFrames: number;
  minIntervalSeconds: number;
}

export interface RetryPolicy {
  /** Total attempts, including the first one. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface PipelineConfig {
  sampling: SamplingPolicy;
  samplingLimits: SamplingLimits;
  concurrency: number;
  stageTimeoutMs: number;
  retry: RetryPolicy;
  ela: { quality: number; scale: number };
  frameBackend: FrameBackend;
  ffprobePath?: string;
  ffmpegPath?: string;
}

export interface ServerConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;
  outputDir: string;
  uploadDir: string;
  maxFileBytes: number;
  maxInflight: number;
  allowedOrigins: string[];
  allowedFetchHosts: string[];
}

export interface AppConfig {
  server: ServerConfig;
  pipeline: PipelineConfig;
}

export const DEFAULT_SAMPLING: SamplingPolicy = Object.freeze({
  intervalSeconds: 1,
  maxFrames: 200,
  startOffset: 0
});

export const DEFAULT_SAMPLING_LIMITS: SamplingLimits = Object.freeze({
  maxFrames: 1_000,
  minIntervalSeconds: 0.04
});

export const DEFAULT_RETRY: RetryPolicy = Object.freeze({
  attempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000
});

type Env = Record<string, string | undefined>;

function list(raw: string | undefined): string[] {
  return (raw || "").split(",").map(s => s.trim()).filter(Boolean);
}

function num(env: Env, key: string, fallback: number, opts: { min?: number; integer?: boolean } = {}): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got '${raw}'`);
  }
  if (opts.integer && !Number.isInteger(value)) {
    throw new ConfigError(`${key} must be an integer, got '${raw}'`);
  }
  if (opts.min !== undefined && value < opts.min) {
    throw new ConfigError(`${key} must be >= ${opts.min}, got ${value}`);
  }
  return value;
}

function backend(raw: string | undefined): FrameBackend {
  const value = (raw || "ffmpeg").trim().toLowerCase();
  if (value === "ffmpeg" || value === "still") return value;
  throw new ConfigError(`FRAME_BACKEND must be 'ffmpeg' or 'still', got '${raw}'`);
}

/**
 * Checks a sampling policy supplied from outside (CLI flags, form fields),
 * and against the configured ceilings when `limits` is given.
 */
export function validateSamplingPolicy(policy: SamplingPolicy, limits?: SamplingLimits): SamplingPolicy {
  if (!(policy.intervalSeconds > 0) || !Number.isFinite(policy.intervalSeconds)) {
    throw new ConfigError(`intervalSeconds must be > 0, got ${policy.intervalSeconds}`);
  }
  if (!Number.isInteger(policy.maxFrames) || policy.maxFrames < 0) {
    throw new ConfigError(`maxFrames must be a non-negative integer, got ${policy.maxFrames}`);
  }
  if (!(policy.startOffset >= 0) || !Number.isFinite(policy.startOffset)) {
    throw new ConfigError(`startOffset must be >= 0, got ${policy.startOffset}`);
  }
  if (limits && policy.maxFrames > limits.maxFrames) {
    throw new ConfigError(`maxFrames must be <= ${limits.maxFrames}, got ${policy.maxFrames}`);
  }
  if (limits && policy.intervalSeconds < limits.minIntervalSeconds) {
    throw new ConfigError(`intervalSeconds must be >= ${limits.minIntervalSeconds}, got ${policy.intervalSeconds}`);
  }
  return Object.freeze({ ...policy });
}

export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const samplingLimits: SamplingLimits = Object.freeze({
    maxFrames: num(env, "SAMPLE_MAX_FRAMES_LIMIT", DEFAULT_SAMPLING_LIMITS.maxFrames, { min: 1, integer: true }),
    minIntervalSeconds: num(env, "SAMPLE_MIN_INTERVAL_SECONDS", DEFAULT_SAMPLING_LIMITS.minIntervalSeconds, { min: 0 })
  });
  const sampling = validateSamplingPolicy(
    {
      intervalSeconds: num(env, "SAMPLE_INTERVAL_SECONDS", DEFAULT_SAMPLING.intervalSeconds),
      maxFrames: num(env, "SAMPLE_MAX_FRAMES", DEFAULT_SAMPLING.maxFrames, { min: 0, integer: true }),
      startOffset: num(env, "SAMPLE_START_OFFSET", DEFAULT_SAMPLING.startOffset, { min: 0 })
    },
    samplingLimits
  );

  const quality = num(env, "ELA_QUALITY", ELA_DEFAULT_QUALITY, { min: 1, integer: true });
  if (quality > 100) {
    throw new ConfigError(`ELA_QUALITY must be <= 100, got ${quality}`);
  }

  return Object.freeze({
    sampling,
    samplingLimits,
    concurrency: num(env, "MAX_CONCURRENCY", Math.max(1, Math.min(4, os.cpus().length)), { min: 1, integer: true }),
    stageTimeoutMs: num(env, "STAGE_TIMEOUT_MS", 600_000, { min: 1 }),
    retry: Object.freeze({
      attempts: num(env, "RETRY_ATTEMPTS", DEFAULT_RETRY.attempts, { min: 1, integer: true }),
      baseDelayMs: num(env, "RETRY_BASE_DELAY_MS", DEFAULT_RETRY.baseDelayMs, { min: 0 }),
      maxDelayMs: num(env, "RETRY_MAX_DELAY_MS", DEFAULT_RETRY.maxDelayMs, { min: 0 })
    }),
    ela: Object.freeze({
      quality,
      scale: num(env, "ELA_SCALE", ELA_DEFAULT_SCALE, { min: 1 })
    }),
    frameBackend: backend(env.FRAME_BACKEND),
    ffprobePath: env.FFPROBE_PATH || undefined,
    ffmpegPath: env.FFMPEG_PATH || undefined
  });
}

export function loadConfig(env: Env = process.env): AppConfig {
  const maxFileMb = num(env, "MAX_FILE_MB", 250, { min: 1 });

  const server: ServerConfig = Object.freeze({
    nodeEnv: env.NODE_ENV || "development",
    port: num(env, "PORT", 8080, { min: 0, integer: true }),
    logLevel: env.LOG_LEVEL || "info",
    outputDir: path.resolve(env.OUTPUT_DIR || "results"),
    uploadDir: path.resolve(env.UPLOAD_DIR || path.join(os.tmpdir(), "evidence-uploads")),
    maxFileBytes: maxFileMb * 1024 * 1024,
    maxInflight: num(env, "MAX_INFLIGHT", 2, { min: 1, integer: true }),
    allowedOrigins: list(env.ALLOWED_ORIGINS),
    allowedFetchHosts: list(env.ALLOWED_FETCH_HOSTS)
  });

  return Object.freeze({ server, pipeline: loadPipelineConfig(env) });
}
