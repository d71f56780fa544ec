// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import sharp from "sharp";
import ffmpeg from "fluent-ffmpeg";
import type { FrameBackend } from "../config.js";
import {
  CancelledError,
  DecodeError,
  ProbeUnavailableError,
  errorMessage,
  isForensicError
} from "../errors.js";

export interface DecodedImage {
  /** Canonical PNG */
  png: Buffer;
  width: number;
  height: number;
}

/**
 * One decoder backend. `decodeAt` returns null once the timestamp lies past
 * the end of the stream.
 */
export interface FrameDecoder {
  readonly backendId: FrameBackend | string;
  decodeAt(filePath: string, timestampSeconds: number, signal?: AbortSignal): Promise<DecodedImage | null>;
}

/**
 * frame:v1: srgb|flatten-white|png(cl9,palette0,prog0), metadata stripped.
 *
 * Every backend funnels its output through here so the bytes of a frame only
 * depend on its pixels.
 */
export const FRAME_CANONICALIZATION = "frame:v1:srgb|flatten-white|png(cl9,palette0,prog0)";

export async function canonicalizeFrame(input: Buffer | string): Promise<DecodedImage> {
  try {
    const { data, info } = await sharp(input)
      .flatten({ background: { r: 255, g: 255, b: 255 } })
      .toColorspace("srgb")
      .png({
        compressionLevel: 9,
        palette: false,
        progressive: false
      })
      .toBuffer({ resolveWithObject: true });
    return { png: data, width: info.width, height: info.height };
  } catch (error) {
    throw new DecodeError(`Frame canonicalization failed: ${errorMessage(error)}`, { cause: error });
  }
}

function abortReason(signal: AbortSignal | undefined, fallback: string): Error {
  const reason: unknown = signal?.reason;
  return isForensicError(reason) ? reason : new CancelledError(fallback);
}

/**
 * Seeks to each timestamp and decodes exactly one frame.
 *
 * ffmpeg -hide_banner -nostdin -ss T -i INPUT \
 *   -map 0:v:0 -an -frames:v 1 -threads 1 \
 *   -flags +bitexact -fflags +bitexact -sws_flags bitexact+accurate_rnd \
 *   -f image2pipe -vcodec png -pix_fmt rgb24 -
 *
 * Single-threaded, bit-exact decoding keeps repeated runs byte-identical.
 */
export class FfmpegFrameDecoder implements FrameDecoder {
  readonly backendId = "ffmpeg";

  constructor(private readonly ffmpegPath?: string) {}

  async decodeAt(filePath: string, timestampSeconds: number, signal?: AbortSignal): Promise<DecodedImage | null> {
    const raw = await this.grab(filePath, timestampSeconds, signal);
    if (raw.length === 0) return null;
    return canonicalizeFrame(raw);
  }

  private grab(filePath: string, timestampSeconds: number, signal?: AbortSignal): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal, "Decode cancelled"));
        return;
      }

      let settled = false;
      const finish = (fn: () => void) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        fn();
      };

      const chunks: Buffer[] = [];
      const command = ffmpeg(filePath)
        .seekInput(timestampSeconds)
        .inputOptions(["-hide_banner", "-nostdin"])
        .outputOptions([
          "-map", "0:v:0",
          "-an",
          "-frames:v", "1",
          "-threads", "1",
          "-flags", "+bitexact",
          "-fflags", "+bitexact",
          "-sws_flags", "bitexact+accurate_rnd",
          "-vcodec", "png",
          "-pix_fmt", "rgb24"
        ])
        .format("image2pipe");

      if (this.ffmpegPath) {
        command.setFfmpegPath(this.ffmpegPath);
      }

      const onAbort = () => {
        command.kill("SIGKILL");
        finish(() => reject(abortReason(signal, "Decode cancelled")));
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      command.on("error", (err: Error) => {
        finish(() => reject(classifyDecoderError(err, timestampSeconds)));
      });

      const out = command.pipe();
      out.on("data", (chunk: Buffer) => chunks.push(chunk));
      out.on("end", () => finish(() => resolve(Buffer.concat(chunks))));
    });
  }
}

export function classifyDecoderError(err: unknown, timestampSeconds: number): Error {
  const message = errorMessage(err);
  if (/cannot find ffmpeg|enoent|eacces/i.test(message)) {
    return new ProbeUnavailableError(`ffmpeg unavailable: ${message.split("\n")[0]}`, { cause: err });
  }
  const lines = message.split("\n").map(l => l.trim()).filter(Boolean);
  return new DecodeError(`Decode failed at ${timestampSeconds}s: ${lines[lines.length - 1] ?? message}`, { cause: err });
}

/**
 * A still image seen as a one-frame source at t=0.
 */
export class StillImageDecoder implements FrameDecoder {
  readonly backendId = "still";

  async decodeAt(filePath: string, timestampSeconds: number, signal?: AbortSignal): Promise<DecodedImage | null> {
    if (signal?.aborted) throw abortReason(signal, "Decode cancelled");
    if (timestampSeconds !== 0) return null;
    return canonicalizeFrame(filePath);
  }
}

/**
 * Backend chosen once from configuration.
 */
export function createFrameDecoder(backend: FrameBackend, opts: { ffmpegPath?: string } = {}): FrameDecoder {
  switch (backend) {
    case "ffmpeg":
      return new FfmpegFrameDecoder(opts.ffmpegPath);
    case "still":
      return new StillImageDecoder();
  }
}
