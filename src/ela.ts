// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

/**
 * Error Level Analysis
 *
 * ela:v1: rgb8|jpeg(q,420,baseline,no-trellis)|absdiff|xscale|clamp255|png(cl9,palette0,prog0)
 *
 * 1. Decode the frame to 8-bit pixels (alpha dropped)
 * 2. Re-encode once as baseline JPEG at the pinned quality
 * 3. Decode the JPEG again
 * 4. Per-channel |original - recompressed|
 * 5. Multiply by the pinned scale, clamp to 255
 * 6. Encode the heat-map as PNG with fixed settings
 *
 * No step uses randomness or encoder auto-tuning; the same frame always
 * yields the same heat-map bytes.
 */

import sharp from "sharp";
import { ELA_DEFAULT_QUALITY, ELA_DEFAULT_SCALE } from "./config.js";
import { UnsupportedImageError, errorMessage } from "./errors.js";
import { sha256 } from "./hasher.js";
import type { ElaResult, Frame } from "./types.js";

export interface ElaParameters {
  quality: number;
  scale: number;
}

export function getElaSettingsId(params: ElaParameters): string {
  return `ela:v1:rgb8|jpeg(q${params.quality},420,baseline,no-trellis)|absdiff|x${params.scale}|clamp255|png(cl9,palette0,prog0)`;
}

interface RawImage {
  data: Buffer;
  width: number;
  height: number;
  channels: 1 | 3;
}

async function decodeRaw(input: Buffer): Promise<RawImage> {
  const { data, info } = await sharp(input).removeAlpha().raw().toBuffer({ resolveWithObject: true });
  if (info.channels !== 1 && info.channels !== 3) {
    throw new UnsupportedImageError(`Unsupported channel count ${info.channels}`);
  }
  return { data, width: info.width, height: info.height, channels: info.channels };
}

function raw(img: RawImage) {
  return { raw: { width: img.width, height: img.height, channels: img.channels } };
}

export class ElaAnalyzer {
  readonly params: Readonly<ElaParameters>;

  constructor(params: Partial<ElaParameters> = {}) {
    const quality = params.quality ?? ELA_DEFAULT_QUALITY;
    const scale = params.scale ?? ELA_DEFAULT_SCALE;
    if (!Number.isInteger(quality) || quality < 1 || quality > 100) {
      throw new RangeError(`ELA quality must be an integer in 1..100, got ${quality}`);
    }
    if (!(scale > 0)) {
      throw new RangeError(`ELA scale must be > 0, got ${scale}`);
    }
    this.params = Object.freeze({ quality, scale });
  }

  get settingsId(): string {
    return getElaSettingsId(this.params);
  }

  async analyze(frame: Frame): Promise<ElaResult> {
    try {
      return await this.run(frame);
    } catch (error) {
      if (error instanceof UnsupportedImageError) throw error;
      throw new UnsupportedImageError(
        `ELA failed for frame ${frame.index}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private async run(frame: Frame): Promise<ElaResult> {
    const original = await decodeRaw(frame.image);

    const jpeg = await sharp(original.data, raw(original))
      .jpeg({
        quality: this.params.quality,
        chromaSubsampling: "4:2:0",
        progressive: false,
        mozjpeg: false,
        trellisQuantisation: false,
        overshootDeringing: false,
        optimiseScans: false,
        optimiseCoding: true
      })
      .toBuffer();

    const recompressed = await decodeRaw(jpeg);
    if (recompressed.data.length !== original.data.length) {
      throw new UnsupportedImageError(
        `Re-encoded frame ${frame.index} has ${recompressed.data.length} samples, expected ${original.data.length}`
      );
    }

    const heat = Buffer.alloc(original.data.length);
    let max = 0;
    let sum = 0;
    for (let i = 0; i < original.data.length; i++) {
      const d = Math.abs(original.data[i] - recompressed.data[i]);
      if (d > max) max = d;
      sum += d;
      heat[i] = Math.min(255, Math.round(d * this.params.scale));
    }

    const image = await sharp(heat, raw(original))
      .png({
        compressionLevel: 9,
        palette: false,
        progressive: false
      })
      .toBuffer();

    return Object.freeze({
      frameIndex: frame.index,
      width: original.width,
      height: original.height,
      image,
      sha256: sha256(image),
      maxDifference: max,
      meanDifference: original.data.length === 0 ? 0 : Math.round((sum / original.data.length) * 1e4) / 1e4
    });
  }
}
