// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

export * from "./errors.js";
export * from "./types.js";
export * from "./config.js";
export { createLogger, silentLogger, type Logger } from "./logger.js";
export { Semaphore, withRetry, withTimeout, mapOrdered, RetryExhausted, type TimeoutOptions } from "./async.js";
export { rid } from "./ids.js";
export { sha256, sourceFileFromPath, computeDigest } from "./hasher.js";
export { FfprobeService, classifyProbeError, parseFfprobeJson, type ProbeService, type FfprobeData } from "./probe.js";
export { MetadataExtractor, parseProbeData, parseFrameRate, normalizeCreationTime } from "./metadata.js";
export { sampleTimestamps, plannedFrameCount } from "./frames/sampling.js";
export {
  FRAME_CANONICALIZATION,
  FfmpegFrameDecoder,
  StillImageDecoder,
  canonicalizeFrame,
  createFrameDecoder,
  type DecodedImage,
  type FrameDecoder
} from "./frames/decoders.js";
export { FrameExtractor, FrameSequence, extractFrames, collectFrames, type CollectedFrames } from "./frames/extractor.js";
export {
  CONTINUITY_SETTINGS_ID,
  SCENE_CHANGE_THRESHOLD,
  averageHash,
  bhattacharyyaDistance,
  buildContinuityReport,
  findDuplicateFrames,
  findSceneChanges,
  frameSignature,
  hueSaturationHistogram,
  type FrameSignature
} from "./continuity.js";
export { ElaAnalyzer, getElaSettingsId, type ElaParameters } from "./ela.js";
export {
  MANIFEST_SCHEMA,
  assembleBundle,
  canonicalJson,
  computeProof,
  pairRecord,
  fromManifest,
  parseManifest,
  toManifest,
  verifyBundle,
  type BundleManifest
} from "./bundle.js";
export { FileSystemBundleStore, loadBundleDirectory, type BundleStore } from "./store.js";
export {
  EvidencePipeline,
  RunStateMachine,
  IllegalTransitionError,
  createPipeline,
  type PipelineOutcome,
  type PipelineState,
  type FailureDescriptor,
  type Transition
} from "./pipeline.js";
export { createApp } from "./server.js";
