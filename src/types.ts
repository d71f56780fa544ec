// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import type { SamplingPolicy } from "./config.js";
import type { ErrorKind } from "./errors.js";

// ============================================
// Inputs
// ============================================

/** Caller-owned upload. The pipeline only reads it. */
export interface SourceFile {
  readonly path: string;
  readonly byteLength: number;
  readonly ingestedAt: string;
}

/** SHA-256 of the source bytes, 64 lowercase hex chars. */
export type Digest = string;

// ============================================
// Probe metadata
// ============================================

export interface StreamMetadata {
  index: number;
  codecType?: string;
  codecName?: string;
  codecLongName?: string;
  width?: number;
  height?: number;
  frameRate?: number;
  pixelFormat?: string;
  sampleRate?: number;
  channels?: number;
}

export interface VideoSummary {
  codec?: string;
  width?: number;
  height?: number;
  resolution?: string;
  frameRate?: number;
  rotationDegrees?: number;
}

/**
 * Container/codec/stream properties reported by the probe. A field the probe
 * could not determine is left undefined; it is never filled with 0 or "".
 */
export interface MediaMetadata {
  formatName?: string;
  formatLongName?: string;
  durationSeconds?: number;
  sizeBytes?: number;
  bitRate?: number;
  creationTime?: string;
  streamCount?: number;
  streams: StreamMetadata[];
  video?: VideoSummary;
  device?: { make?: string; model?: string };
  gpsRaw?: string;
}

// ============================================
// Frames & analysis
// ============================================

export interface Frame {
  readonly index: number;
  readonly timestampSeconds: number;
  readonly width: number;
  readonly height: number;
  /** Canonical PNG bytes */
  readonly image: Buffer;
  readonly sha256: string;
}

export interface ElaResult {
  readonly frameIndex: number;
  readonly width: number;
  readonly height: number;
  /** Amplified difference heat-map, PNG */
  readonly image: Buffer;
  readonly sha256: string;
  /** Largest per-channel difference before amplification (0-255) */
  readonly maxDifference: number;
  readonly meanDifference: number;
}

export interface EvidencePair {
  readonly frame: Frame;
  readonly ela: ElaResult;
}

// ============================================
// Bundle
// ============================================

export interface PartialExtraction {
  kind: Extract<ErrorKind, "PartialExtractionError">;
  framesExtracted: number;
  message: string;
}

export interface ExtractionRecord {
  policy: SamplingPolicy;
  partial?: PartialExtraction;
}

export interface DuplicateFrames {
  hash: string;
  frames: number[];
}

/** Duplicate-frame and scene-change findings over the sampled frames. */
export interface ContinuityReport {
  threshold: number;
  /** Average hash per frame, by frame index */
  frameHashes: string[];
  duplicates: DuplicateFrames[];
  /** Distance between frame i and i+1 */
  sceneScores: number[];
  /** Frame indices whose score against the previous frame exceeds the threshold */
  sceneChanges: number[];
}

export interface HashChainLink {
  sequence: number;
  frameSha256: string;
  elaSha256: string;
  /** sha256 of the canonical frame and ELA record (timestamp, sizes, statistics) */
  recordSha256: string;
  previousHash: string;
  chainHash: string;
}

export interface ImmutabilityProof {
  chain: HashChainLink[];
  rootHash: string;
}

export interface EvidenceBundle {
  readonly id: string;
  readonly source: SourceFile;
  readonly digest: Digest;
  readonly metadata: MediaMetadata;
  readonly pairs: readonly EvidencePair[];
  readonly extraction: ExtractionRecord;
  readonly analysis: { quality: number; scale: number };
  readonly continuity: ContinuityReport;
  readonly createdAt: string;
  readonly pipelineVersion: string;
  readonly proof: ImmutabilityProof;
}
