// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import { CancelledError, DecodeError, PartialExtractionError, TimeoutError } from "../src/errors.js";
import { FrameExtractor, FrameSequence, collectFrames, extractFrames } from "../src/frames/extractor.js";
import { sha256 } from "../src/hasher.js";
import type { Frame } from "../src/types.js";
import { FakeDecoder } from "./helpers.js";

const source = { path: "/virtual/clip.mp4", byteLength: 0, ingestedAt: "2024-05-01T12:30:00.000Z" };
const everySecond = { intervalSeconds: 1, maxFrames: 10, startOffset: 0 };

async function drain(sequence: AsyncIterable<Frame>): Promise<Frame[]> {
  const frames: Frame[] = [];
  for await (const frame of sequence) frames.push(frame);
  return frames;
}

describe("extractFrames", () => {
  it("yields contiguous frames at the sampled timestamps", async () => {
    const decoder = new FakeDecoder();
    const frames = await drain(extractFrames(source, everySecond, decoder, { durationSeconds: 3.5 }));

    expect(frames.map(f => f.index)).toEqual([0, 1, 2, 3]);
    expect(frames.map(f => f.timestampSeconds)).toEqual([0, 1, 2, 3]);
    expect(decoder.calls).toEqual([0, 1, 2, 3]);
    for (const frame of frames) {
      expect(frame.width).toBe(16);
      expect(frame.height).toBe(12);
      expect(frame.sha256).toBe(sha256(frame.image));
      expect(Object.isFrozen(frame)).toBe(true);
    }
  });

  it("restarts from the first frame on every iteration", async () => {
    const decoder = new FakeDecoder();
    const sequence = extractFrames(source, everySecond, decoder, { durationSeconds: 4 });

    const first = await drain(sequence);
    const second = await drain(sequence);

    expect(second.map(f => f.sha256)).toEqual(first.map(f => f.sha256));
    expect(decoder.calls).toEqual([0, 1, 2, 3, 0, 1, 2, 3]);
  });

  it("stops at end of stream when the duration is unknown", async () => {
    const decoder = new FakeDecoder({ endAt: 2 });
    const frames = await drain(extractFrames(source, everySecond, decoder));

    expect(frames).toHaveLength(2);
    expect(decoder.calls).toEqual([0, 1, 2]);
  });

  it("never yields more than maxFrames", async () => {
    const decoder = new FakeDecoder();
    const frames = await drain(extractFrames(source, { ...everySecond, maxFrames: 5 }, decoder));

    expect(frames).toHaveLength(5);
    expect(decoder.calls).toEqual([0, 1, 2, 3, 4]);
  });

  it("yields the frames decoded before a failure, then PartialExtractionError", async () => {
    const decoder = new FakeDecoder({ failAt: 3 });
    const seen: number[] = [];
    let failure: unknown;
    try {
      for await (const frame of extractFrames(source, everySecond, decoder, { durationSeconds: 10 })) {
        seen.push(frame.index);
      }
    } catch (err) {
      failure = err;
    }

    expect(seen).toEqual([0, 1, 2]);
    expect(failure).toBeInstanceOf(PartialExtractionError);
    expect(failure).toMatchObject({ framesExtracted: 3, message: "Decoding stopped after 3 frame(s)" });
  });

  it("turns a failure on the first frame into DecodeError", async () => {
    const decoder = new FakeDecoder({ failAt: 0 });
    const err = await drain(extractFrames(source, everySecond, decoder, { durationSeconds: 10 })).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(DecodeError);
    expect(err).toHaveProperty("message", "Cannot decode /virtual/clip.mp4: corrupt packet at 0s");
  });

  it("keeps a DecodeError raised by the decoder as it is", async () => {
    const original = new DecodeError("Decode failed at 0s: moov atom not found");
    const decoder = new FakeDecoder({ failAt: 0, failWith: () => original });

    await expect(drain(extractFrames(source, everySecond, decoder))).rejects.toBe(original);
  });

  it("passes timeouts through unchanged", async () => {
    const timeout = new TimeoutError("extracting_frames", 50);
    const decoder = new FakeDecoder({ failAt: 2, failWith: () => timeout });

    await expect(drain(extractFrames(source, everySecond, decoder, { durationSeconds: 10 }))).rejects.toBe(timeout);
  });

  it("checks the signal before each decode", async () => {
    const controller = new AbortController();
    controller.abort();
    const decoder = new FakeDecoder();

    await expect(
      drain(extractFrames(source, everySecond, decoder, { durationSeconds: 10, signal: controller.signal }))
    ).rejects.toBeInstanceOf(CancelledError);
    expect(decoder.calls).toEqual([]);
  });

  it("runs every decode through the scheduler", async () => {
    let scheduled = 0;
    const schedule = <T>(task: () => Promise<T>): Promise<T> => {
      scheduled++;
      return task();
    };
    await drain(extractFrames(source, everySecond, new FakeDecoder(), { durationSeconds: 3, schedule }));

    expect(scheduled).toBe(3);
  });
});

describe("collectFrames", () => {
  it("keeps the frames before a partial extraction", async () => {
    const collected = await collectFrames(
      extractFrames(source, everySecond, new FakeDecoder({ failAt: 3 }), { durationSeconds: 10 })
    );

    expect(collected.frames.map(f => f.index)).toEqual([0, 1, 2]);
    expect(collected.partial?.framesExtracted).toBe(3);
  });

  it("has no partial marker for a clean run", async () => {
    const collected = await collectFrames(
      extractFrames(source, everySecond, new FakeDecoder(), { durationSeconds: 2 })
    );

    expect(collected.frames).toHaveLength(2);
    expect(collected.partial).toBeUndefined();
  });
});

describe("FrameExtractor", () => {
  it("binds a decoder backend", async () => {
    const decoder = new FakeDecoder();
    const sequence = new FrameExtractor(decoder).extractFrames(source, everySecond, { durationSeconds: 1 });

    expect(sequence).toBeInstanceOf(FrameSequence);
    expect(await drain(sequence)).toHaveLength(1);
  });
});
