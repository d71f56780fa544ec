// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

/**
 * Continuity checks over the sampled frames
 *
 * continuity:v1: ahash(16x16,grey,lanczos3,gt-mean)|hs-hist(50x60)|bhattacharyya|t0.5
 *
 * - Average hash: grey, resize to 16x16, one bit per pixel above the mean.
 *   Frames sharing a hash are reported as duplicates (possible copied or
 *   frozen footage).
 * - Scene score: Bhattacharyya distance between the hue/saturation
 *   histograms of consecutive frames. A score above the threshold marks a
 *   cut or a splice at the later frame.
 */

import sharp from "sharp";
import { UnsupportedImageError, errorMessage } from "./errors.js";
import type { ContinuityReport, DuplicateFrames, Frame } from "./types.js";

export const HASH_SIZE = 16;
export const HUE_BINS = 50;
export const SATURATION_BINS = 60;
export const SCENE_CHANGE_THRESHOLD = 0.5;

export const CONTINUITY_SETTINGS_ID = `continuity:v1:ahash(${HASH_SIZE}x${HASH_SIZE},grey,lanczos3,gt-mean)|hs-hist(${HUE_BINS}x${SATURATION_BINS})|bhattacharyya|t${SCENE_CHANGE_THRESHOLD}`;

export interface FrameSignature {
  frameIndex: number;
  averageHash: string;
  /** Normalised hue/saturation histogram, sums to 1 */
  histogram: Float64Array;
}

export async function averageHash(png: Buffer): Promise<string> {
  const { data, info } = await sharp(png)
    .removeAlpha()
    .greyscale()
    .resize(HASH_SIZE, HASH_SIZE, { fit: "fill", kernel: "lanczos3" })
    .raw()
    .toBuffer({ resolveWithObject: true });

  const values: number[] = [];
  for (let i = 0; i < data.length; i += info.channels) values.push(data[i]);
  const mean = values.reduce((a, b) => a + b, 0) / values.length;

  let hex = "";
  for (let i = 0; i < values.length; i += 4) {
    let nibble = 0;
    for (let j = 0; j < 4; j++) nibble = (nibble << 1) | (values[i + j] > mean ? 1 : 0);
    hex += nibble.toString(16);
  }
  return hex;
}

/** OpenCV-style ranges: hue 0..180, saturation 0..255. */
function hueSaturation(r: number, g: number, b: number): [number, number] {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const delta = max - min;
  const s = max === 0 ? 0 : (delta / max) * 255;
  if (delta === 0) return [0, s];
  let h: number;
  if (max === r) h = (60 * (g - b)) / delta;
  else if (max === g) h = 120 + (60 * (b - r)) / delta;
  else h = 240 + (60 * (r - g)) / delta;
  if (h < 0) h += 360;
  return [h / 2, s];
}

export async function hueSaturationHistogram(png: Buffer): Promise<Float64Array> {
  const { data, info } = await sharp(png).removeAlpha().raw().toBuffer({ resolveWithObject: true });
  const histogram = new Float64Array(HUE_BINS * SATURATION_BINS);
  const step = info.channels;
  const pixels = data.length / step;
  if (pixels === 0) return histogram;

  for (let i = 0; i < data.length; i += step) {
    const r = data[i];
    const g = step >= 3 ? data[i + 1] : r;
    const b = step >= 3 ? data[i + 2] : r;
    const [h, s] = hueSaturation(r, g, b);
    const hb = Math.min(HUE_BINS - 1, Math.floor((h * HUE_BINS) / 180));
    const sb = Math.min(SATURATION_BINS - 1, Math.floor((s * SATURATION_BINS) / 256));
    histogram[hb * SATURATION_BINS + sb] += 1;
  }
  for (let i = 0; i < histogram.length; i++) histogram[i] /= pixels;
  return histogram;
}

/**
 * 0 for identical distributions, 1 for disjoint ones. Rounded to 6 decimals
 * so the score serialises the same on every run.
 */
export function bhattacharyyaDistance(p: Float64Array, q: Float64Array): number {
  if (p.length !== q.length) throw new RangeError(`Histogram sizes differ: ${p.length} vs ${q.length}`);
  let overlap = 0;
  for (let i = 0; i < p.length; i++) overlap += Math.sqrt(p[i] * q[i]);
  return Math.round(Math.sqrt(Math.max(0, 1 - overlap)) * 1e6) / 1e6;
}

export async function frameSignature(frame: Frame): Promise<FrameSignature> {
  try {
    const [hash, histogram] = await Promise.all([averageHash(frame.image), hueSaturationHistogram(frame.image)]);
    return { frameIndex: frame.index, averageHash: hash, histogram };
  } catch (error) {
    throw new UnsupportedImageError(`Continuity check failed for frame ${frame.index}: ${errorMessage(error)}`, {
      cause: error
    });
  }
}

/** Groups of two or more frames with the same hash, in order of first appearance. */
export function findDuplicateFrames(hashes: readonly string[]): DuplicateFrames[] {
  const groups = new Map<string, number[]>();
  hashes.forEach((hash, index) => {
    const group = groups.get(hash);
    if (group) group.push(index);
    else groups.set(hash, [index]);
  });
  return [...groups].filter(([, frames]) => frames.length > 1).map(([hash, frames]) => ({ hash, frames }));
}

export function findSceneChanges(scores: readonly number[], threshold: number): number[] {
  const changes: number[] = [];
  scores.forEach((score, i) => {
    if (score > threshold) changes.push(i + 1);
  });
  return changes;
}

export function buildContinuityReport(
  signatures: readonly FrameSignature[],
  threshold = SCENE_CHANGE_THRESHOLD
): ContinuityReport {
  const frameHashes = signatures.map(s => s.averageHash);
  const sceneScores = signatures
    .slice(1)
    .map((s, i) => bhattacharyyaDistance(signatures[i].histogram, s.histogram));
  return {
    threshold,
    frameHashes,
    duplicates: findDuplicateFrames(frameHashes),
    sceneScores,
    sceneChanges: findSceneChanges(sceneScores, threshold)
  };
}
