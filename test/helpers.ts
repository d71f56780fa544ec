// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import fs from "fs";
import os from "os";
import path from "path";
import sharp from "sharp";
import { fileURLToPath } from "url";
import type { PipelineConfig } from "../src/config.js";
import { canonicalizeFrame, type DecodedImage, type FrameDecoder } from "../src/frames/decoders.js";
import { parseFfprobeJson, type FfprobeData, type ProbeService } from "../src/probe.js";

const FIXTURES = fileURLToPath(new URL("./fixtures/", import.meta.url));

export function makeTempDir(prefix = "evidence-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(dir: string, name: string, content: string | Buffer): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

export function fixturePath(name: string): string {
  return path.join(FIXTURES, name);
}

export function loadProbeFixture(name: string): FfprobeData {
  return parseFfprobeJson(fs.readFileSync(fixturePath(name), "utf8"));
}

/** Executable shell script standing in for an external tool. */
export function writeScript(dir: string, name: string, body: string): string {
  const file = writeFile(dir, name, `#!/bin/sh\n${body}\n`);
  fs.chmodSync(file, 0o755);
  return file;
}

export function solidPng(width: number, height: number, color: { r: number; g: number; b: number }): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: color } }).png().toBuffer();
}

/** Horizontal ramp with some texture so JPEG re-encoding leaves a residue. */
export function gradientPng(width: number, height: number): Promise<Buffer> {
  const data = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 3;
      data[i] = Math.round((x / Math.max(1, width - 1)) * 255);
      data[i + 1] = (x * 7 + y * 13) % 256;
      data[i + 2] = (x + y) % 2 === 0 ? 32 : 224;
    }
  }
  return sharp(data, { raw: { width, height, channels: 3 } }).png().toBuffer();
}

type ProbeStep = FfprobeData | Error;

/**
 * Replays the given steps in order; the last one repeats.
 */
export class FakeProbe implements ProbeService {
  readonly probeId = "fake";
  calls = 0;

  constructor(private readonly steps: ProbeStep[]) {}

  async probe(_filePath: string, _signal?: AbortSignal): Promise<FfprobeData> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls++;
    if (step instanceof Error) throw step;
    return step;
  }
}

export interface FakeDecoderOptions {
  /** Timestamp at or past which the stream has ended */
  endAt?: number;
  /** Timestamp at which decoding throws */
  failAt?: number;
  failWith?: () => Error;
  /** Never settle unless the signal aborts */
  hang?: boolean;
  /** Hand back bytes that are not an image */
  garbage?: boolean;
}

/**
 * Decoder that paints one solid 16x12 frame per timestamp.
 */
export class FakeDecoder implements FrameDecoder {
  readonly backendId = "fake";
  readonly calls: number[] = [];
  private readonly cache = new Map<number, DecodedImage>();

  constructor(private readonly opts: FakeDecoderOptions = {}) {}

  async decodeAt(_filePath: string, t: number, signal?: AbortSignal): Promise<DecodedImage | null> {
    this.calls.push(t);
    if (this.opts.hang) {
      return new Promise<DecodedImage | null>((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(signal?.reason), { once: true });
      });
    }
    if (this.opts.endAt !== undefined && t >= this.opts.endAt) return null;
    if (this.opts.failAt !== undefined && t === this.opts.failAt) {
      throw this.opts.failWith ? this.opts.failWith() : new Error(`corrupt packet at ${t}s`);
    }
    if (this.opts.garbage) {
      return { png: Buffer.from("not an image"), width: 16, height: 12 };
    }
    const cached = this.cache.get(t);
    if (cached) return cached;
    const decoded = await canonicalizeFrame(await solidPng(16, 12, { r: (t * 40) % 256, g: 80, b: 160 }));
    this.cache.set(t, decoded);
    return decoded;
  }
}

export function testPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    sampling: { intervalSeconds: 1, maxFrames: 10, startOffset: 0 },
    samplingLimits: { maxFrames: 50, minIntervalSeconds: 0.1 },
    concurrency: 2,
    stageTimeoutMs: 5_000,
    retry: { attempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
    ela: { quality: 95, scale: 30 },
    frameBackend: "ffmpeg",
    ...overrides
  };
}
