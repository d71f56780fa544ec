// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import { randomBytes } from "crypto";
import { Ajv } from "ajv";
import type { SamplingPolicy } from "./config.js";
import { findDuplicateFrames, findSceneChanges } from "./continuity.js";
import { IntegrityError } from "./errors.js";
import { sha256 } from "./hasher.js";
import schema from "./schema/evidence-bundle.json" with { type: "json" };
import type {
  ContinuityReport,
  Digest,
  ElaResult,
  EvidenceBundle,
  EvidencePair,
  Frame,
  HashChainLink,
  ImmutabilityProof,
  MediaMetadata,
  PartialExtraction,
  SourceFile
} from "./types.js";

export const MANIFEST_SCHEMA = "evidence-bundle/v1";

// ============================================
// Canonical JSON
// ============================================

type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

/**
 * JSON with object keys sorted at every level and undefined members dropped,
 * so logically equal values hash the same.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(normalize(value));
}

function normalize(value: unknown): Json {
  if (value === null || typeof value === "boolean" || typeof value === "string") return value;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new TypeError(`Cannot serialise ${value}`);
    return value;
  }
  if (Array.isArray(value)) return value.map(v => (v === undefined ? null : normalize(v)));
  if (typeof value === "object") {
    const out: { [key: string]: Json } = {};
    for (const key of Object.keys(value).sort()) {
      const v: unknown = Reflect.get(value, key);
      if (v !== undefined) out[key] = normalize(v);
    }
    return out;
  }
  throw new TypeError(`Cannot serialise value of type ${typeof value}`);
}

// ============================================
// Hash chain
// ============================================

export interface ProofHeader {
  digest: Digest;
  byteLength: number;
  metadata: MediaMetadata;
  policy: SamplingPolicy;
  partial?: PartialExtraction;
  analysis: { quality: number; scale: number };
  continuity: ContinuityReport;
  pipelineVersion: string;
  frameCount: number;
}

export interface ChainInput {
  frameSha256: string;
  elaSha256: string;
  recordSha256: string;
}

/**
 * Link i = sha256(previous | i | frameSha256 | elaSha256 | recordSha256),
 * previous of link 0 being the source digest. The record hash covers every
 * field of the frame and its ELA result besides the image bytes. The root folds
 * the last link together with the header, so editing an image, a timestamp, an
 * ELA statistic, the pair order or the metadata all change it. Creation times,
 * ids and paths are left out: two runs over the same bytes and configuration
 * share a root.
 */
export function computeProof(header: ProofHeader, pairs: readonly ChainInput[]): ImmutabilityProof {
  const chain: HashChainLink[] = [];
  let previous = header.digest;
  pairs.forEach((p, sequence) => {
    const chainHash = sha256(`${previous}|${sequence}|${p.frameSha256}|${p.elaSha256}|${p.recordSha256}`);
    chain.push({
      sequence,
      frameSha256: p.frameSha256,
      elaSha256: p.elaSha256,
      recordSha256: p.recordSha256,
      previousHash: previous,
      chainHash
    });
    previous = chainHash;
  });
  return { chain, rootHash: sha256(`${previous}|${canonicalJson(header)}`) };
}

function headerOf(bundle: Omit<EvidenceBundle, "proof" | "id" | "createdAt">): ProofHeader {
  return {
    digest: bundle.digest,
    byteLength: bundle.source.byteLength,
    metadata: bundle.metadata,
    policy: bundle.extraction.policy,
    partial: bundle.extraction.partial,
    analysis: bundle.analysis,
    continuity: bundle.continuity,
    pipelineVersion: bundle.pipelineVersion,
    frameCount: bundle.pairs.length
  };
}

/** Everything about a pair except the image bytes, which the chain hashes directly. */
export function pairRecord({ frame, ela }: EvidencePair): string {
  return canonicalJson({
    frame: {
      index: frame.index,
      timestampSeconds: frame.timestampSeconds,
      width: frame.width,
      height: frame.height,
      sha256: frame.sha256
    },
    ela: {
      frameIndex: ela.frameIndex,
      width: ela.width,
      height: ela.height,
      sha256: ela.sha256,
      maxDifference: ela.maxDifference,
      meanDifference: ela.meanDifference
    }
  });
}

function chainInputs(pairs: readonly EvidencePair[]): ChainInput[] {
  return pairs.map(p => ({ frameSha256: p.frame.sha256, elaSha256: p.ela.sha256, recordSha256: sha256(pairRecord(p)) }));
}

// ============================================
// Assembly
// ============================================

export interface BundleInput {
  source: SourceFile;
  digest: Digest;
  metadata: MediaMetadata;
  frames: readonly Frame[];
  elaResults: readonly ElaResult[];
  policy: SamplingPolicy;
  partial?: PartialExtraction;
  analysis: { quality: number; scale: number };
  continuity: ContinuityReport;
  pipelineVersion: string;
  createdAt?: Date;
  id?: string;
}

export function newBundleId(digest: Digest, at: Date = new Date()): string {
  return `ev_${digest.slice(0, 12)}_${at.getTime().toString(36)}_${randomBytes(3).toString("hex")}`;
}

export const BUNDLE_ID_PATTERN = /^ev_[0-9a-f]{12}_[0-9a-z]+_[0-9a-f]{6}$/;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Buffer.isBuffer(value) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

/**
 * Pair frames with their ELA results by index, compute the proof and freeze
 * the whole bundle.
 */
export function assembleBundle(input: BundleInput): EvidenceBundle {
  if (input.frames.length !== input.elaResults.length) {
    throw new IntegrityError(`${input.frames.length} frames but ${input.elaResults.length} ELA results`);
  }
  checkContinuity(input.continuity, input.frames.length);

  const pairs: EvidencePair[] = input.frames.map((frame, i) => {
    const ela = input.elaResults[i];
    if (frame.index !== i || ela.frameIndex !== i) {
      throw new IntegrityError(`Pair ${i} out of order (frame ${frame.index}, ela ${ela.frameIndex})`);
    }
    return { frame, ela };
  });

  const createdAt = input.createdAt ?? new Date();
  const body = {
    source: input.source,
    digest: input.digest,
    metadata: input.metadata,
    pairs,
    extraction: input.partial ? { policy: input.policy, partial: input.partial } : { policy: input.policy },
    analysis: input.analysis,
    continuity: input.continuity,
    pipelineVersion: input.pipelineVersion
  };

  return deepFreeze({
    id: input.id ?? newBundleId(input.digest, createdAt),
    createdAt: createdAt.toISOString(),
    ...body,
    proof: computeProof(headerOf(body), chainInputs(pairs))
  });
}

function sameNumbers(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

/** The continuity report must describe exactly these frames and agree with its own scores. */
function checkContinuity(report: ContinuityReport, frameCount: number): void {
  if (report.frameHashes.length !== frameCount) {
    throw new IntegrityError(`Continuity report has ${report.frameHashes.length} frame hashes for ${frameCount} frames`);
  }
  if (report.sceneScores.length !== Math.max(0, frameCount - 1)) {
    throw new IntegrityError(`Continuity report has ${report.sceneScores.length} scene scores for ${frameCount} frames`);
  }
  if (!sameNumbers(report.sceneChanges, findSceneChanges(report.sceneScores, report.threshold))) {
    throw new IntegrityError("Scene changes do not match the scene scores");
  }
  if (canonicalJson(report.duplicates) !== canonicalJson(findDuplicateFrames(report.frameHashes))) {
    throw new IntegrityError("Duplicate frames do not match the frame hashes");
  }
}

function sameLink(a: HashChainLink, b: HashChainLink): boolean {
  return (
    a.sequence === b.sequence &&
    a.frameSha256 === b.frameSha256 &&
    a.elaSha256 === b.elaSha256 &&
    a.recordSha256 === b.recordSha256 &&
    a.previousHash === b.previousHash &&
    a.chainHash === b.chainHash
  );
}

/**
 * Recompute every image hash, the chain and the root. Throws IntegrityError on
 * the first mismatch.
 */
export function verifyBundle(bundle: EvidenceBundle): void {
  bundle.pairs.forEach((pair, i) => {
    if (pair.frame.index !== i || pair.ela.frameIndex !== i) {
      throw new IntegrityError(`Pair ${i} out of order`);
    }
    if (sha256(pair.frame.image) !== pair.frame.sha256) {
      throw new IntegrityError(`Frame ${i} image does not match its hash`);
    }
    if (sha256(pair.ela.image) !== pair.ela.sha256) {
      throw new IntegrityError(`ELA ${i} image does not match its hash`);
    }
  });
  checkContinuity(bundle.continuity, bundle.pairs.length);

  const expected = computeProof(headerOf(bundle), chainInputs(bundle.pairs));
  if (bundle.proof.chain.length !== expected.chain.length) {
    throw new IntegrityError(`Hash chain has ${bundle.proof.chain.length} links for ${expected.chain.length} pairs`);
  }
  expected.chain.forEach((link, i) => {
    if (!sameLink(link, bundle.proof.chain[i])) {
      throw new IntegrityError(`Hash chain link ${i} does not match the evidence`);
    }
  });
  if (expected.rootHash !== bundle.proof.rootHash) {
    throw new IntegrityError(`Root hash mismatch: expected ${expected.rootHash}, found ${bundle.proof.rootHash}`);
  }
}

// ============================================
// Manifest (serialised form)
// ============================================

export interface ManifestElaEntry {
  image: string;
  sha256: string;
  width: number;
  height: number;
  maxDifference: number;
  meanDifference: number;
}

export interface ManifestFrameEntry {
  index: number;
  timestampSeconds: number;
  width: number;
  height: number;
  image: string;
  sha256: string;
  ela: ManifestElaEntry;
}

export interface BundleManifest {
  schema: typeof MANIFEST_SCHEMA;
  id: string;
  createdAt: string;
  pipelineVersion: string;
  source: SourceFile;
  digest: Digest;
  metadata: MediaMetadata;
  extraction: { policy: SamplingPolicy; partial?: PartialExtraction };
  analysis: { quality: number; scale: number };
  continuity: ContinuityReport;
  frames: ManifestFrameEntry[];
  proof: ImmutabilityProof;
}

const pad = (i: number) => String(i).padStart(6, "0");
export const frameImageRef = (i: number) => `frames/frame_${pad(i)}.png`;
export const elaImageRef = (i: number) => `ela/ela_${pad(i)}.png`;

export function toManifest(bundle: EvidenceBundle): BundleManifest {
  return {
    schema: MANIFEST_SCHEMA,
    id: bundle.id,
    createdAt: bundle.createdAt,
    pipelineVersion: bundle.pipelineVersion,
    source: { ...bundle.source },
    digest: bundle.digest,
    metadata: bundle.metadata,
    extraction: bundle.extraction,
    analysis: bundle.analysis,
    continuity: bundle.continuity,
    frames: bundle.pairs.map(({ frame, ela }) => ({
      index: frame.index,
      timestampSeconds: frame.timestampSeconds,
      width: frame.width,
      height: frame.height,
      image: frameImageRef(frame.index),
      sha256: frame.sha256,
      ela: {
        image: elaImageRef(ela.frameIndex),
        sha256: ela.sha256,
        width: ela.width,
        height: ela.height,
        maxDifference: ela.maxDifference,
        meanDifference: ela.meanDifference
      }
    })),
    proof: bundle.proof
  };
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateManifest = ajv.compile<BundleManifest>(schema);

export function parseManifest(raw: unknown): BundleManifest {
  if (typeof raw === "string") {
    try {
      raw = JSON.parse(raw);
    } catch {
      throw new IntegrityError("Manifest is not valid JSON");
    }
  }
  if (!validateManifest(raw)) {
    const msg = ajv.errorsText(validateManifest.errors, { separator: "; " });
    throw new IntegrityError(`Manifest validation failed: ${msg}`);
  }
  return raw;
}

/**
 * Rebuild a bundle from its manifest, loading every image through
 * `readImage` and checking it against the recorded hashes and proof.
 */
export async function fromManifest(
  raw: unknown,
  readImage: (ref: string) => Promise<Buffer>
): Promise<EvidenceBundle> {
  const m = parseManifest(raw);

  const pairs: EvidencePair[] = [];
  for (const [i, entry] of m.frames.entries()) {
    if (entry.index !== i) {
      throw new IntegrityError(`Frame entries out of order at position ${i} (index ${entry.index})`);
    }
    const frameImage = await readImage(entry.image);
    const elaImage = await readImage(entry.ela.image);
    pairs.push({
      frame: {
        index: entry.index,
        timestampSeconds: entry.timestampSeconds,
        width: entry.width,
        height: entry.height,
        image: frameImage,
        sha256: entry.sha256
      },
      ela: {
        frameIndex: entry.index,
        width: entry.ela.width,
        height: entry.ela.height,
        image: elaImage,
        sha256: entry.ela.sha256,
        maxDifference: entry.ela.maxDifference,
        meanDifference: entry.ela.meanDifference
      }
    });
  }

  const bundle: EvidenceBundle = deepFreeze({
    id: m.id,
    createdAt: m.createdAt,
    pipelineVersion: m.pipelineVersion,
    source: m.source,
    digest: m.digest,
    metadata: m.metadata,
    pairs,
    extraction: m.extraction,
    analysis: m.analysis,
    continuity: m.continuity,
    proof: m.proof
  });

  verifyBundle(bundle);
  return bundle;
}
