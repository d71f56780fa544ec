// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import type { SamplingPolicy } from "../config.js";
import {
  CancelledError,
  DecodeError,
  ForensicError,
  PartialExtractionError,
  ProbeUnavailableError,
  TimeoutError,
  errorMessage,
  isForensicError
} from "../errors.js";
import { sha256 } from "../hasher.js";
import type { Frame, SourceFile } from "../types.js";
import type { DecodedImage, FrameDecoder } from "./decoders.js";
import { sampleTimestamp } from "./sampling.js";

export interface ExtractOptions {
  /** Media duration from the probe; when unknown the decoder decides where the stream ends */
  durationSeconds?: number;
  signal?: AbortSignal;
  /** Wraps each decoder call, e.g. to take a slot in a shared limiter */
  schedule?: <T>(task: () => Promise<T>) => Promise<T>;
}

/**
 * Errors that say nothing about the media itself and must surface as they are.
 */
function passesThrough(err: unknown): err is ForensicError {
  return err instanceof TimeoutError || err instanceof CancelledError || err instanceof ProbeUnavailableError;
}

/**
 * Lazy, finite, restartable frame sequence.
 *
 * Each `for await` starts again at index 0 and decodes from scratch, so two
 * iterations over the same source and policy yield the same frames.
 *
 * Failure on the very first frame throws DecodeError. Failure after N frames
 * throws PartialExtractionError(N) once those N frames have been yielded.
 */
export class FrameSequence implements AsyncIterable<Frame> {
  constructor(
    readonly source: SourceFile,
    readonly policy: SamplingPolicy,
    private readonly decoder: FrameDecoder,
    private readonly options: ExtractOptions = {}
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<Frame> {
    const { durationSeconds, signal } = this.options;
    const schedule = this.options.schedule ?? (<T>(task: () => Promise<T>) => task());

    for (let index = 0; index < this.policy.maxFrames; index++) {
      const timestampSeconds = sampleTimestamp(this.policy, index);
      if (durationSeconds !== undefined && timestampSeconds >= durationSeconds) return;

      if (signal?.aborted) {
        const reason: unknown = signal.reason;
        throw isForensicError(reason) ? reason : new CancelledError("Frame extraction cancelled");
      }

      let decoded: DecodedImage | null;
      try {
        decoded = await schedule(() => this.decoder.decodeAt(this.source.path, timestampSeconds, signal));
      } catch (err) {
        if (passesThrough(err)) throw err;
        if (index === 0) {
          throw err instanceof DecodeError
            ? err
            : new DecodeError(`Cannot decode ${this.source.path}: ${errorMessage(err)}`, { cause: err });
        }
        throw new PartialExtractionError(index, { cause: err });
      }

      if (decoded === null) return;

      yield Object.freeze({
        index,
        timestampSeconds,
        width: decoded.width,
        height: decoded.height,
        image: decoded.png,
        sha256: sha256(decoded.png)
      });
    }
  }
}

export function extractFrames(
  sourceFile: SourceFile,
  samplingPolicy: SamplingPolicy,
  decoder: FrameDecoder,
  options: ExtractOptions = {}
): FrameSequence {
  return new FrameSequence(sourceFile, samplingPolicy, decoder, options);
}

export interface CollectedFrames {
  frames: Frame[];
  partial?: PartialExtractionError;
}

/**
 * Drain a sequence. A PartialExtractionError keeps the frames decoded before
 * it; every other error propagates.
 */
export async function collectFrames(sequence: AsyncIterable<Frame>): Promise<CollectedFrames> {
  const frames: Frame[] = [];
  try {
    for await (const frame of sequence) {
      frames.push(frame);
    }
  } catch (err) {
    if (err instanceof PartialExtractionError) {
      return { frames, partial: err };
    }
    throw err;
  }
  return { frames };
}

/**
 * Frame extractor bound to one decoder backend.
 */
export class FrameExtractor {
  constructor(readonly decoder: FrameDecoder) {}

  extractFrames(sourceFile: SourceFile, samplingPolicy: SamplingPolicy, options: ExtractOptions = {}): FrameSequence {
    return extractFrames(sourceFile, samplingPolicy, this.decoder, options);
  }
}
