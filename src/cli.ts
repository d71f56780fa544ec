// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import path from "path";
import { destination } from "pino";
import { parseArgs } from "util";
import { loadPipelineConfig, type SamplingPolicy } from "./config.js";
import { errorMessage, isForensicError } from "./errors.js";
import { sourceFileFromPath } from "./hasher.js";
import { createLogger, type Logger } from "./logger.js";
import { createPipeline, type PipelineDeps } from "./pipeline.js";
import { FileSystemBundleStore, loadBundleDirectory } from "./store.js";

const USAGE = `Usage:
  evidence-pipeline analyze <file> [--out DIR] [--interval S] [--max-frames N] [--start S]
  evidence-pipeline verify <bundleDir>

Environment: OUTPUT_DIR, SAMPLE_*, MAX_CONCURRENCY, STAGE_TIMEOUT_MS, RETRY_*,
FFPROBE_PATH, FFMPEG_PATH, FRAME_BACKEND, ELA_QUALITY, ELA_SCALE, LOG_LEVEL`;

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  env?: Record<string, string | undefined>;
  logger?: Logger;
  /** Replaces the probe or decoder; used by tests */
  deps?: Partial<PipelineDeps>;
}

const defaultIO: CliIO = {
  out: line => process.stdout.write(line + "\n"),
  err: line => process.stderr.write(line + "\n")
};

function numberFlag(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new UsageError(`--${name} must be a number, got '${raw}'`);
  }
  return value;
}

class UsageError extends Error {}

function isParseArgsError(err: unknown): err is Error {
  return err instanceof TypeError && "code" in err && String(err.code).startsWith("ERR_PARSE_ARGS");
}

async function analyze(args: string[], io: CliIO): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      out: { type: "string", short: "o" },
      interval: { type: "string" },
      "max-frames": { type: "string" },
      start: { type: "string" }
    }
  });
  if (positionals.length !== 1) {
    throw new UsageError("analyze takes exactly one file");
  }

  const env = io.env ?? process.env;
  const config = loadPipelineConfig(env);
  const overrides: Partial<SamplingPolicy> = {};
  const interval = numberFlag("interval", values.interval);
  const maxFrames = numberFlag("max-frames", values["max-frames"]);
  const start = numberFlag("start", values.start);
  if (interval !== undefined) overrides.intervalSeconds = interval;
  if (maxFrames !== undefined) overrides.maxFrames = maxFrames;
  if (start !== undefined) overrides.startOffset = start;

  const outDir = path.resolve(values.out ?? env.OUTPUT_DIR ?? "results");
  const store = new FileSystemBundleStore(outDir);
  const logger = io.logger ?? createLogger(env.LOG_LEVEL || "warn", destination(2));
  const pipeline = createPipeline(config, { store, logger, ...io.deps }).withSampling(overrides);

  const source = await sourceFileFromPath(path.resolve(positionals[0]));
  io.out(`Analyzing ${source.path} (${source.byteLength} bytes)`);

  const outcome = await pipeline.run(source);
  if (outcome.status === "failed") {
    io.err(`✗ ${outcome.failure.stage} failed: ${outcome.failure.kind}: ${outcome.failure.message}`);
    io.err(JSON.stringify(outcome.failure));
    return 1;
  }

  const { bundle } = outcome;
  io.out(`digest    ${bundle.digest}`);
  io.out(`bundle    ${bundle.id}`);
  io.out(`location  ${outcome.location ?? outDir}`);
  io.out(`frames    ${bundle.pairs.length}`);
  io.out(`rootHash  ${bundle.proof.rootHash}`);
  const { duplicates, sceneChanges } = bundle.continuity;
  io.out(`continuity ${duplicates.length} duplicate group(s), ${sceneChanges.length} scene change(s)`);
  if (outcome.flagged) {
    io.out(`⚠ partial extraction: ${bundle.extraction.partial?.message ?? "stopped early"}`);
  } else {
    io.out("✓ complete");
  }
  return 0;
}

async function verify(args: string[], io: CliIO): Promise<number> {
  const { positionals } = parseArgs({ args, allowPositionals: true, options: {} });
  if (positionals.length !== 1) {
    throw new UsageError("verify takes exactly one bundle directory");
  }
  try {
    const bundle = await loadBundleDirectory(positionals[0]);
    io.out(`✓ ${bundle.id}: ${bundle.pairs.length} frame(s), rootHash ${bundle.proof.rootHash}`);
    return 0;
  } catch (err) {
    if (!isForensicError(err)) throw err;
    io.err(`✗ ${err.kind}: ${err.message}`);
    return 1;
  }
}

/**
 * Exit codes: 0 success, 1 pipeline or verification failure, 2 usage or
 * configuration error.
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const [command, ...rest] = argv;
  try {
    switch (command) {
      case "analyze":
        return await analyze(rest, io);
      case "verify":
        return await verify(rest, io);
      case undefined:
      case "help":
      case "--help":
      case "-h":
        io.out(USAGE);
        return command === undefined ? 2 : 0;
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (err) {
    if (err instanceof UsageError || isParseArgsError(err)) {
      io.err(err.message);
      io.err(USAGE);
      return 2;
    }
    if (isForensicError(err)) {
      io.err(`✗ ${err.kind}: ${err.message}`);
      return err.kind === "ConfigError" ? 2 : 1;
    }
    io.err(`✗ ${errorMessage(err)}`);
    return 1;
  }
}
