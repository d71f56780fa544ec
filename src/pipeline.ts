// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

/**
 * Evidence pipeline
 *
 * idle -> hashing -> extracting_metadata -> extracting_frames -> analyzing
 *      -> assembling -> complete
 *
 * `failed` is reachable from every non-terminal state. Each stage runs to
 * completion before the next one starts; in particular every frame is
 * decoded (or the partial-extraction signal observed) before any ELA work.
 */

import { assembleBundle } from "./bundle.js";
import { validateSamplingPolicy, type PipelineConfig, type SamplingPolicy } from "./config.js";
import { CONTINUITY_SETTINGS_ID, buildContinuityReport, frameSignature } from "./continuity.js";
import { ElaAnalyzer } from "./ela.js";
import { CancelledError, toForensicError, type ErrorKind } from "./errors.js";
import { RetryExhausted, Semaphore, mapOrdered, throwIfAborted, withRetry, withTimeout } from "./async.js";
import { FRAME_CANONICALIZATION, createFrameDecoder, type FrameDecoder } from "./frames/decoders.js";
import { FrameExtractor, collectFrames } from "./frames/extractor.js";
import { plannedFrameCount } from "./frames/sampling.js";
import { computeDigest } from "./hasher.js";
import { rid } from "./ids.js";
import { silentLogger, type Logger } from "./logger.js";
import { MetadataExtractor } from "./metadata.js";
import { FfprobeService, type ProbeService } from "./probe.js";
import type { BundleStore } from "./store.js";
import type { Digest, EvidenceBundle, SourceFile } from "./types.js";

// ============================================
// State machine
// ============================================

export type PipelineState =
  | "idle"
  | "hashing"
  | "extracting_metadata"
  | "extracting_frames"
  | "analyzing"
  | "assembling"
  | "complete"
  | "failed";

export type Stage = Exclude<PipelineState, "idle" | "complete" | "failed">;

export const STAGES: readonly Stage[] = [
  "hashing",
  "extracting_metadata",
  "extracting_frames",
  "analyzing",
  "assembling"
];

const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  idle: ["hashing", "failed"],
  hashing: ["extracting_metadata", "failed"],
  extracting_metadata: ["extracting_frames", "failed"],
  extracting_frames: ["analyzing", "failed"],
  analyzing: ["assembling", "failed"],
  assembling: ["complete", "failed"],
  complete: [],
  failed: []
};

export interface Transition {
  runId: string;
  from: PipelineState;
  to: PipelineState;
  at: string;
}

export class IllegalTransitionError extends Error {
  constructor(from: PipelineState, to: PipelineState) {
    super(`Illegal pipeline transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

/**
 * Strictly forward state machine for one run. No state is entered twice.
 */
export class RunStateMachine {
  private current: PipelineState = "idle";
  private readonly visited = new Set<PipelineState>(["idle"]);
  readonly history: Transition[] = [];

  constructor(
    readonly runId: string,
    private readonly listener?: (t: Transition) => void
  ) {}

  get state(): PipelineState {
    return this.current;
  }

  get terminal(): boolean {
    return this.current === "complete" || this.current === "failed";
  }

  transition(to: PipelineState): void {
    if (!TRANSITIONS[this.current].includes(to) || this.visited.has(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    const t: Transition = { runId: this.runId, from: this.current, to, at: new Date().toISOString() };
    this.current = to;
    this.visited.add(to);
    this.history.push(t);
    this.listener?.(t);
  }
}

// ============================================
// Outcomes
// ============================================

export interface FailureDescriptor {
  runId: string;
  stage: Stage;
  kind: ErrorKind;
  message: string;
  attempts: number;
}

export interface CompleteOutcome {
  status: "complete";
  runId: string;
  bundle: EvidenceBundle;
  /** True when frame extraction stopped early; see bundle.extraction.partial */
  flagged: boolean;
  location?: string;
}

export interface FailedOutcome {
  status: "failed";
  runId: string;
  failure: FailureDescriptor;
}

export type PipelineOutcome = CompleteOutcome | FailedOutcome;

export interface RunOptions {
  /** Checked between stages; a stage already running is allowed to finish. */
  signal?: AbortSignal;
  onTransition?: (t: Transition) => void;
}

// ============================================
// Pipeline
// ============================================

export interface PipelineDeps {
  probe: ProbeService;
  decoder: FrameDecoder;
  analyzer?: ElaAnalyzer;
  store?: BundleStore;
  logger?: Logger;
  /** Shared cap on probe, decode and ELA invocations across runs */
  limiter?: Semaphore;
  hasher?: (source: SourceFile, opts: { signal?: AbortSignal }) => Promise<Digest>;
}

export function getPipelineVersion(decoder: FrameDecoder, analyzer: ElaAnalyzer): string {
  return `evidence:v1:sha256|decoder=${decoder.backendId}|${FRAME_CANONICALIZATION}|${analyzer.settingsId}|${CONTINUITY_SETTINGS_ID}`;
}

class StageFailure extends Error {
  constructor(
    readonly stage: Stage,
    readonly error: unknown,
    readonly attempts: number
  ) {
    super(`${stage} failed`);
  }
}

export class EvidencePipeline {
  readonly config: PipelineConfig;
  readonly pipelineVersion: string;
  private readonly analyzer: ElaAnalyzer;
  private readonly metadata: MetadataExtractor;
  private readonly frames: FrameExtractor;
  private readonly limiter: Semaphore;
  private readonly logger: Logger;
  private readonly hasher: NonNullable<PipelineDeps["hasher"]>;

  constructor(config: PipelineConfig, private readonly deps: PipelineDeps) {
    this.config = Object.freeze({
      ...config,
      sampling: validateSamplingPolicy(config.sampling, config.samplingLimits)
    });
    this.analyzer = deps.analyzer ?? new ElaAnalyzer(config.ela);
    this.metadata = new MetadataExtractor(deps.probe);
    this.frames = new FrameExtractor(deps.decoder);
    this.limiter = deps.limiter ?? new Semaphore(config.concurrency);
    this.logger = deps.logger ?? silentLogger;
    this.hasher = deps.hasher ?? computeDigest;
    this.pipelineVersion = getPipelineVersion(deps.decoder, this.analyzer);
  }

  get store(): BundleStore | undefined {
    return this.deps.store;
  }

  get inflight(): number {
    return this.limiter.inflight;
  }

  /**
   * Same services and limiter, different sampling policy. The policy is fixed
   * for every run of the returned pipeline and stays within the configured
   * sampling limits.
   */
  withSampling(overrides: Partial<SamplingPolicy>): EvidencePipeline {
    const sampling = validateSamplingPolicy({ ...this.config.sampling, ...overrides }, this.config.samplingLimits);
    return new EvidencePipeline(
      { ...this.config, sampling },
      { ...this.deps, analyzer: this.analyzer, limiter: this.limiter, logger: this.logger, hasher: this.hasher }
    );
  }

  async run(source: SourceFile, options: RunOptions = {}): Promise<PipelineOutcome> {
    const runId = rid();
    const log = this.logger.child({ runId });
    const machine = new RunStateMachine(runId, t => {
      log.debug({ at: "transition", from: t.from, to: t.to });
      options.onTransition?.(t);
    });
    const startedAt = Date.now();
    const policy = this.config.sampling;

    log.info({ at: "run_start", path: source.path, bytes: source.byteLength, policy });

    try {
      const digest = await this.stage(machine, "hashing", options.signal, signal =>
        this.hasher(source, { signal })
      );

      const metadata = await this.stage(machine, "extracting_metadata", options.signal, signal =>
        this.limiter.run(() => this.metadata.extractMetadata(source, signal))
      );

      const planned = plannedFrameCount(policy, metadata.durationSeconds);
      log.debug({ at: "frames_planned", planned, durationSeconds: metadata.durationSeconds });

      const collected = await this.stage(machine, "extracting_frames", options.signal, signal =>
        collectFrames(
          this.frames.extractFrames(source, policy, {
            durationSeconds: metadata.durationSeconds,
            signal,
            schedule: task => this.limiter.run(task)
          })
        )
      );

      if (collected.partial) {
        log.warn({
          at: "partial_extraction",
          planned,
          framesExtracted: collected.frames.length,
          cause: collected.partial.cause instanceof Error ? collected.partial.cause.message : undefined
        });
      }

      const analyzed = await this.stage(machine, "analyzing", options.signal, signal =>
        mapOrdered(collected.frames, this.config.concurrency, frame =>
          this.limiter.run(async () => {
            throwIfAborted(signal, `ELA for frame ${frame.index}`);
            const ela = await this.analyzer.analyze(frame);
            const signature = await frameSignature(frame);
            return { ela, signature };
          })
        )
      );
      const elaResults = analyzed.map(a => a.ela);
      const continuity = buildContinuityReport(analyzed.map(a => a.signature));
      if (continuity.duplicates.length > 0 || continuity.sceneChanges.length > 0) {
        log.info({
          at: "continuity_findings",
          duplicates: continuity.duplicates.map(d => d.frames),
          sceneChanges: continuity.sceneChanges
        });
      }

      // Persistence winds down after the deadline; a timed-out run leaves no bundle.
      const { bundle, location } = await this.stage(machine, "assembling", options.signal, async signal => {
        const assembled = assembleBundle({
          source,
          digest,
          metadata,
          frames: collected.frames,
          elaResults,
          policy,
          partial: collected.partial && {
            kind: collected.partial.kind,
            framesExtracted: collected.partial.framesExtracted,
            message: collected.partial.message
          },
          analysis: { ...this.analyzer.params },
          continuity,
          pipelineVersion: this.pipelineVersion
        });
        const saved = this.deps.store ? await this.deps.store.save(assembled, signal) : undefined;
        return { bundle: assembled, location: saved };
      }, { retry: false, settle: true });

      machine.transition("complete");
      log.info({
        at: "run_complete",
        bundleId: bundle.id,
        digest,
        frames: bundle.pairs.length,
        flagged: Boolean(collected.partial),
        rootHash: bundle.proof.rootHash,
        durationMs: Date.now() - startedAt
      });

      return { status: "complete", runId, bundle, flagged: Boolean(collected.partial), location };
    } catch (err) {
      if (!(err instanceof StageFailure)) throw err;

      const error = toForensicError(err.error);
      if (!machine.terminal) machine.transition("failed");

      const failure: FailureDescriptor = {
        runId,
        stage: err.stage,
        kind: error.kind,
        message: error.message,
        attempts: err.attempts
      };
      log.error({ at: "run_failed", ...failure, durationMs: Date.now() - startedAt });
      return { status: "failed", runId, failure };
    }
  }

  /**
   * Enter `stage`, run `fn` under the stage timeout and retry policy. Any error
   * leaves as StageFailure carrying the stage name and attempt count.
   */
  private async stage<T>(
    machine: RunStateMachine,
    stage: Stage,
    cancel: AbortSignal | undefined,
    fn: (signal: AbortSignal) => Promise<T>,
    { retry = true, settle = false }: { retry?: boolean; settle?: boolean } = {}
  ): Promise<T> {
    if (cancel?.aborted) {
      throw new StageFailure(stage, new CancelledError(`Run cancelled before ${stage}`), 0);
    }
    machine.transition(stage);

    const started = Date.now();
    const log = this.logger.child({ runId: machine.runId, stage });
    const policy = retry ? this.config.retry : { ...this.config.retry, attempts: 1 };

    try {
      const { value, attempts } = await withRetry(
        policy,
        () => withTimeout(stage, this.config.stageTimeoutMs, fn, { settle }),
        ({ attempt, delayMs, error }) => {
          log.warn({
            at: "stage_retry",
            attempt,
            delayMs,
            kind: toForensicError(error).kind,
            error: toForensicError(error).message
          });
        }
      );
      log.info({ at: "stage_complete", attempts, durationMs: Date.now() - started });
      return value;
    } catch (err) {
      if (err instanceof RetryExhausted) {
        throw new StageFailure(stage, err.error, err.attempts);
      }
      throw new StageFailure(stage, err, 1);
    }
  }
}

/**
 * Wire the production services from configuration: ffprobe for metadata and
 * the configured decoder backend for frames.
 */
export function createPipeline(
  config: PipelineConfig,
  overrides: Partial<PipelineDeps> = {}
): EvidencePipeline {
  return new EvidencePipeline(config, {
    probe: overrides.probe ?? new FfprobeService(config.ffprobePath),
    decoder: overrides.decoder ?? createFrameDecoder(config.frameBackend, { ffmpegPath: config.ffmpegPath }),
    ...overrides
  });
}
