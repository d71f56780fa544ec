// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import type { SamplingPolicy } from "../config.js";

/** Round to the microsecond so 0.1 + 0.2 style drift never reaches ffmpeg. */
export function quantize(seconds: number): number {
  return Math.round(seconds * 1e6) / 1e6;
}

/**
 * Timestamp of the k-th sample: startOffset + k * intervalSeconds.
 * Computed from k rather than accumulated, so it never drifts.
 */
export function sampleTimestamp(policy: SamplingPolicy, k: number): number {
  return quantize(policy.startOffset + k * policy.intervalSeconds);
}

/**
 * All sample timestamps for a known duration. A sample exists only while
 * its timestamp is strictly inside the media, and at most `maxFrames` of them.
 *
 *   duration=10, interval=2, start=0, max=10  ->  [0, 2, 4, 6, 8]
 *   duration <= startOffset                  ->  []
 */
export function sampleTimestamps(policy: SamplingPolicy, durationSeconds: number): number[] {
  const out: number[] = [];
  for (let k = 0; k < policy.maxFrames; k++) {
    const t = sampleTimestamp(policy, k);
    if (t >= durationSeconds) break;
    out.push(t);
  }
  return out;
}

/**
 * Upper bound on samples for a run; with an unknown duration it is the cap.
 */
export function plannedFrameCount(policy: SamplingPolicy, durationSeconds?: number): number {
  return durationSeconds === undefined
    ? policy.maxFrames
    : sampleTimestamps(policy, durationSeconds).length;
}
