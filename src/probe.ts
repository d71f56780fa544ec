// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import { execFile } from "child_process";
import {
  CancelledError,
  ProbeUnavailableError,
  UnsupportedFormatError,
  describeSystemError,
  errorMessage,
  isForensicError
} from "./errors.js";

type Fields = Record<string, unknown>;

/** The two sections of `ffprobe -show_format -show_streams -of json` the parser reads. */
export interface FfprobeData {
  format: Fields;
  streams: Fields[];
}

function isFields(v: unknown): v is Fields {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Shape-check ffprobe's JSON output. Missing sections become empty; anything
 * that is not a JSON object is not probe output.
 */
export function parseFfprobeJson(text: string): FfprobeData {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new UnsupportedFormatError("ffprobe output is not valid JSON");
  }
  if (!isFields(parsed)) {
    throw new UnsupportedFormatError("ffprobe output is not a JSON object");
  }
  return {
    format: isFields(parsed.format) ? parsed.format : {},
    streams: Array.isArray(parsed.streams) ? parsed.streams.filter(isFields) : []
  };
}

/**
 * Narrow handle on the external probe. Injected into the pipeline so tests and
 * other deployments can swap the binary (or the whole tool) out.
 */
export interface ProbeService {
  readonly probeId: string;
  probe(filePath: string, signal?: AbortSignal): Promise<FfprobeData>;
}

const UNAVAILABLE = /cannot find ffprobe|enoent|eacces|spawn|killed with signal/i;

/**
 * Sort a probe failure into "the tool is missing/broken" (retryable) and
 * "the input is not media" (final).
 */
export function classifyProbeError(err: unknown): ProbeUnavailableError | UnsupportedFormatError {
  const message = errorMessage(err);
  const code = describeSystemError(err);
  if (UNAVAILABLE.test(code === message ? message : `${message} ${code}`)) {
    return new ProbeUnavailableError(`ffprobe unavailable: ${firstLine(message)}`, { cause: err });
  }
  return new UnsupportedFormatError(`Not decodable media: ${lastLine(message)}`, { cause: err });
}

function firstLine(s: string): string {
  return s.split("\n")[0].trim();
}

function lastLine(s: string): string {
  const lines = s.split("\n").map(l => l.trim()).filter(Boolean);
  return lines[lines.length - 1] ?? s;
}

export const FFPROBE_ARGS = ["-v", "error", "-show_format", "-show_streams", "-of", "json"] as const;

const MAX_PROBE_OUTPUT_BYTES = 16 * 1024 * 1024;

/**
 * ffprobe -v error -show_format -show_streams -of json INPUT
 *
 * The child is killed with SIGKILL when the signal aborts. A failed run
 * reports ffprobe's stderr, which execFile appends to the error message.
 */
export class FfprobeService implements ProbeService {
  readonly probeId = "ffprobe";

  constructor(private readonly ffprobePath = "ffprobe") {}

  probe(filePath: string, signal?: AbortSignal): Promise<FfprobeData> {
    return new Promise<FfprobeData>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      execFile(
        this.ffprobePath,
        [...FFPROBE_ARGS, filePath],
        { encoding: "utf8", maxBuffer: MAX_PROBE_OUTPUT_BYTES, signal, killSignal: "SIGKILL", windowsHide: true },
        (err, stdout) => {
          if (signal?.aborted) {
            reject(abortReason(signal));
            return;
          }
          if (err) {
            reject(classifyProbeError(err));
            return;
          }
          try {
            const data = parseFfprobeJson(stdout);
            if (data.streams.length === 0) {
              reject(new UnsupportedFormatError(`Probe found no streams in ${filePath}`));
              return;
            }
            resolve(data);
          } catch (parseError) {
            reject(parseError);
          }
        }
      );
    });
  }
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return isForensicError(reason) ? reason : new CancelledError("Probe cancelled");
}
