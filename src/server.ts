// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import express, { type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import cors from "cors";
import fs from "fs";
import path from "path";
import { Transform } from "stream";
import { pipeline as pipe } from "stream/promises";
import fetch, { type RequestInit, type Response as FetchResponse } from "node-fetch";
import { BUNDLE_ID_PATTERN, elaImageRef, frameImageRef, toManifest } from "./bundle.js";
import type { SamplingPolicy, ServerConfig } from "./config.js";
import { ConfigError, IntegrityError, IOError, errorMessage, isForensicError, type ErrorKind } from "./errors.js";
import { sourceFileFromPath } from "./hasher.js";
import { rid } from "./ids.js";
import { silentLogger, type Logger } from "./logger.js";
import type { EvidencePipeline, PipelineOutcome } from "./pipeline.js";
import type { BundleStore } from "./store.js";

export const SERVICE_NAME = "video-evidence-pipeline";
export const SERVICE_VERSION = "1.0.0";

const RATE_LIMIT_PER_MINUTE = 60;
const FETCH_TIMEOUT_MS = 30_000;

export type FetchFn = (url: string, init?: RequestInit) => Promise<FetchResponse>;

export interface AppDeps {
  pipeline: EvidencePipeline;
  store: BundleStore;
  config: ServerConfig;
  logger?: Logger;
  fetchImpl?: FetchFn;
}

/** An error whose HTTP status is decided where it is thrown. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

// ---------- Helpers ----------

function requestIdOf(res: Response): string {
  const id: unknown = res.locals.requestId;
  return typeof id === "string" ? id : "";
}

export function statusForKind(kind: ErrorKind): number {
  switch (kind) {
    case "UnsupportedFormatError":
    case "DecodeError":
    case "UnsupportedImageError":
      return 422;
    case "TimeoutError":
      return 504;
    case "ProbeUnavailableError":
      return 503;
    case "CancelledError":
      return 499;
    case "ConfigError":
      return 400;
    default:
      return 500;
  }
}

function statusForError(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (err instanceof multer.MulterError) return err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
  if (isForensicError(err)) return statusForKind(err.kind);
  return 500;
}

function field(body: unknown, key: string): unknown {
  return typeof body === "object" && body !== null ? Reflect.get(body, key) : undefined;
}

/**
 * Optional sampling overrides from form fields or JSON. Values arrive as
 * strings from multipart forms and as numbers from JSON.
 */
export function parseSamplingOverrides(body: unknown): Partial<SamplingPolicy> {
  const out: Partial<SamplingPolicy> = {};
  for (const key of ["intervalSeconds", "maxFrames", "startOffset"] as const) {
    const raw = field(body, key);
    if (raw === undefined || raw === "") continue;
    const value = typeof raw === "number" ? raw : typeof raw === "string" ? Number(raw) : NaN;
    if (!Number.isFinite(value)) {
      throw new ConfigError(`${key} must be a number`);
    }
    out[key] = value;
  }
  return out;
}

function percentile(sorted: number[], q: number): number {
  return sorted[Math.floor(sorted.length * q)] || 0;
}

// ---------- App ----------

export function createApp(deps: AppDeps): express.Express {
  const { pipeline, store, config } = deps;
  const logger = deps.logger ?? silentLogger;
  const fetchImpl: FetchFn = deps.fetchImpl ?? fetch;

  let inflight = 0;
  const metrics = {
    requests: { total: 0, success: 0, error: 0 },
    runs: { complete: 0, flagged: 0, failed: 0 },
    failures: new Map<ErrorKind, number>(),
    durations: [] as number[]
  };

  function trackOutcome(outcome: PipelineOutcome, durationMs: number): void {
    if (outcome.status === "complete") {
      metrics.runs.complete++;
      if (outcome.flagged) metrics.runs.flagged++;
    } else {
      metrics.runs.failed++;
      const kind = outcome.failure.kind;
      metrics.failures.set(kind, (metrics.failures.get(kind) ?? 0) + 1);
    }
    metrics.durations.push(durationMs);
    if (metrics.durations.length > 1000) {
      metrics.durations = metrics.durations.slice(-1000);
    }
  }

  fs.mkdirSync(config.uploadDir, { recursive: true });

  const app = express();
  app.set("x-powered-by", false);
  app.set("trust proxy", 1);

  app.use(helmet({ crossOriginResourcePolicy: { policy: "same-site" } }));

  // Request logging with request ID
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.locals.requestId = rid();
    metrics.requests.total++;
    logger.info({ at: "request", requestId: res.locals.requestId, method: req.method, path: req.path, ip: req.ip });
    next();
  });

  app.use(cors({
    origin: (origin, cb) => {
      if (!origin) return cb(null, true);
      if (config.allowedOrigins.length === 0) return cb(null, true);
      if (config.allowedOrigins.includes(origin)) return cb(null, true);
      return cb(new HttpError(403, "Origin not allowed by CORS"));
    },
    credentials: false
  }));

  app.use(express.json({ limit: "1mb" }));

  app.use(rateLimit({
    windowMs: 60_000,
    limit: RATE_LIMIT_PER_MINUTE,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      const requestId = requestIdOf(res);
      logger.warn({ at: "rate_limit_exceeded", requestId });
      res.status(429).json({ requestId, error: "Too many requests", retryAfter: 60 });
    }
  }));

  const upload = multer({
    dest: config.uploadDir,
    limits: {
      fileSize: config.maxFileBytes,
      files: 1,
      fields: 5,
      parts: 10
    }
  });

  async function removeTemp(tmpPath: string, requestId: string): Promise<void> {
    try {
      await fs.promises.rm(tmpPath, { force: true });
    } catch (err) {
      logger.warn({ at: "temp_cleanup_failed", requestId, path: tmpPath, error: errorMessage(err) });
    }
  }

  async function downloadToTmp(url: string, requestId: string): Promise<string> {
    let u: URL;
    try {
      u = new URL(url);
    } catch {
      throw new HttpError(400, "Invalid URL");
    }
    if (!["http:", "https:"].includes(u.protocol)) {
      throw new HttpError(400, "URL must be http or https");
    }
    if (config.allowedFetchHosts.length > 0 && !config.allowedFetchHosts.includes(u.host)) {
      throw new HttpError(400, `Fetch host not allowed: ${u.host}`);
    }

    logger.info({ at: "download_start", requestId, host: u.host });

    let res: FetchResponse;
    try {
      res = await fetchImpl(u.toString(), {
        signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
        headers: { "User-Agent": `${SERVICE_NAME}/${SERVICE_VERSION}` }
      });
    } catch (err) {
      throw new HttpError(502, `Fetch failed: ${errorMessage(err)}`);
    }
    if (!res.ok || !res.body) {
      throw new HttpError(502, `Fetch failed: ${res.status} ${res.statusText}`);
    }
    const contentLength = Number(res.headers.get("content-length"));
    if (contentLength > config.maxFileBytes) {
      throw new HttpError(413, `File too large: ${contentLength} bytes > ${config.maxFileBytes} bytes`);
    }

    const tmp = path.join(config.uploadDir, `dl_${Date.now()}_${rid()}.bin`);
    let downloaded = 0;
    const cap = new Transform({
      transform(chunk: Buffer, _enc, cb) {
        downloaded += chunk.length;
        if (downloaded > config.maxFileBytes) {
          cb(new HttpError(413, `File too large: exceeds ${config.maxFileBytes} bytes`));
          return;
        }
        cb(null, chunk);
      }
    });

    try {
      await pipe(res.body, cap, fs.createWriteStream(tmp));
    } catch (err) {
      await removeTemp(tmp, requestId);
      throw err instanceof HttpError ? err : new HttpError(502, `Download failed: ${errorMessage(err)}`);
    }

    logger.info({ at: "download_complete", requestId, bytes: downloaded });
    return tmp;
  }

  /**
   * Run the pipeline over a file on disk and write the HTTP response. The
   * caller owns `tmpPath` and removes it afterwards.
   */
  async function analyze(res: Response, runPipeline: EvidencePipeline, tmpPath: string): Promise<void> {
    const requestId = requestIdOf(res);
    const startTime = Date.now();
    const source = await sourceFileFromPath(tmpPath);

    // Client gone: no further stage starts
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const outcome = await runPipeline.run(source, {
      signal: controller.signal,
      onTransition: t => logger.debug({ at: "transition", requestId, runId: t.runId, from: t.from, to: t.to })
    });
    const durationMs = Date.now() - startTime;
    trackOutcome(outcome, durationMs);

    if (outcome.status === "failed") {
      metrics.requests.error++;
      logger.error({ at: "analysis_failed", requestId, ...outcome.failure, durationMs });
      res.status(statusForKind(outcome.failure.kind)).json({
        requestId,
        error: outcome.failure.message,
        failure: outcome.failure,
        processingTimeMs: durationMs
      });
      return;
    }

    metrics.requests.success++;
    logger.info({
      at: "analysis_complete",
      requestId,
      runId: outcome.runId,
      bundleId: outcome.bundle.id,
      frames: outcome.bundle.pairs.length,
      flagged: outcome.flagged,
      durationMs
    });
    res.json({
      requestId,
      runId: outcome.runId,
      bundleId: outcome.bundle.id,
      flagged: outcome.flagged,
      manifest: toManifest(outcome.bundle),
      processingTimeMs: durationMs
    });
  }

  function busy(res: Response): boolean {
    if (inflight < config.maxInflight) return false;
    metrics.requests.error++;
    res.status(503).json({ requestId: requestIdOf(res), error: "Server busy, try again later" });
    return true;
  }

  // ---------- Routes ----------

  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({ ok: true, service: SERVICE_NAME, version: SERVICE_VERSION, pipelineVersion: pipeline.pipelineVersion });
  });

  app.get("/livez", (_req: Request, res: Response) => {
    res.json({ alive: true });
  });

  app.get("/readyz", (_req: Request, res: Response) => {
    if (inflight >= config.maxInflight) {
      return res.status(503).json({ ready: false });
    }
    res.json({ ready: true });
  });

  /**
   * GET /metrics - Prometheus-style metrics
   */
  app.get("/metrics", (_req: Request, res: Response) => {
    const durations = [...metrics.durations].sort((a, b) => a - b);
    const lines = [
      `# HELP http_requests_total Total HTTP requests`,
      `# TYPE http_requests_total counter`,
      `http_requests_total ${metrics.requests.total}`,
      ``,
      `# HELP pipeline_runs_total Pipeline runs by outcome`,
      `# TYPE pipeline_runs_total counter`,
      `pipeline_runs_total{outcome="complete"} ${metrics.runs.complete}`,
      `pipeline_runs_total{outcome="flagged"} ${metrics.runs.flagged}`,
      `pipeline_runs_total{outcome="failed"} ${metrics.runs.failed}`,
      ``,
      `# HELP pipeline_failures_total Failed runs by error kind`,
      `# TYPE pipeline_failures_total counter`,
      ...[...metrics.failures.entries()].map(([kind, n]) => `pipeline_failures_total{kind="${kind}"} ${n}`),
      ``,
      `# HELP pipeline_duration_ms Run duration percentiles`,
      `# TYPE pipeline_duration_ms summary`,
      `pipeline_duration_ms{quantile="0.5"} ${percentile(durations, 0.5)}`,
      `pipeline_duration_ms{quantile="0.95"} ${percentile(durations, 0.95)}`,
      `pipeline_duration_ms{quantile="0.99"} ${percentile(durations, 0.99)}`,
      ``,
      `# HELP inflight_requests Currently processing requests`,
      `# TYPE inflight_requests gauge`,
      `inflight_requests ${inflight}`,
      ``,
      `# HELP pipeline_inflight_tasks Probe, decode and ELA tasks holding a slot`,
      `# TYPE pipeline_inflight_tasks gauge`,
      `pipeline_inflight_tasks ${pipeline.inflight}`
    ];
    res.type("text/plain").send(lines.join("\n") + "\n");
  });

  app.get("/", (_req: Request, res: Response) => {
    res.json({
      requestId: requestIdOf(res),
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      pipelineVersion: pipeline.pipelineVersion,
      endpoints: {
        "POST /analyze": "Analyze a video via multipart upload (field 'file')",
        "POST /analyze-by-url": "Analyze a video fetched from an allowed host",
        "GET /bundles": "List stored bundle ids",
        "GET /bundles/:id": "Bundle manifest",
        "GET /bundles/:id/verify": "Reload and verify a stored bundle",
        "GET /bundles/:id/frames/:index": "Frame PNG",
        "GET /bundles/:id/ela/:index": "ELA heat-map PNG",
        "GET /healthz": "Health check",
        "GET /livez": "Liveness probe",
        "GET /readyz": "Readiness probe",
        "GET /metrics": "Prometheus metrics"
      },
      limits: {
        maxFileSize: `${Math.round(config.maxFileBytes / (1024 * 1024))}MB`,
        rateLimitIP: `${RATE_LIMIT_PER_MINUTE}/min`,
        maxConcurrent: config.maxInflight
      },
      sampling: pipeline.config.sampling
    });
  });

  /**
   * POST /analyze
   */
  app.post("/analyze", upload.single("file"), async (req: Request, res: Response, next: NextFunction) => {
    const requestId = requestIdOf(res);
    const tmpPath = req.file?.path;
    try {
      if (!tmpPath) {
        metrics.requests.error++;
        res.status(400).json({ requestId, error: "Provide a file in 'file' field (multipart/form-data)" });
        return;
      }
      const runPipeline = pipeline.withSampling(parseSamplingOverrides(req.body));
      if (busy(res)) return;
      inflight++;
      try {
        await analyze(res, runPipeline, tmpPath);
      } finally {
        inflight--;
      }
    } catch (err) {
      next(err);
    } finally {
      if (tmpPath) await removeTemp(tmpPath, requestId);
    }
  });

  /**
   * POST /analyze-by-url
   */
  app.post("/analyze-by-url", async (req: Request, res: Response, next: NextFunction) => {
    const requestId = requestIdOf(res);
    let tmpPath: string | undefined;
    try {
      const url = field(req.body, "url");
      if (typeof url !== "string" || url === "") {
        metrics.requests.error++;
        res.status(400).json({ requestId, error: "Missing 'url' field" });
        return;
      }
      const runPipeline = pipeline.withSampling(parseSamplingOverrides(req.body));
      if (busy(res)) return;
      inflight++;
      try {
        tmpPath = await downloadToTmp(url, requestId);
        await analyze(res, runPipeline, tmpPath);
      } finally {
        inflight--;
      }
    } catch (err) {
      next(err);
    } finally {
      if (tmpPath) await removeTemp(tmpPath, requestId);
    }
  });

  // ---------- Bundles ----------

  function bundleId(req: Request): string {
    const id = req.params.id;
    if (!BUNDLE_ID_PATTERN.test(id)) {
      throw new HttpError(404, `Bundle not found: ${id}`);
    }
    return id;
  }

  function imageIndex(req: Request): number {
    const index = Number(req.params.index);
    if (!Number.isInteger(index) || index < 0) {
      throw new HttpError(400, `Invalid frame index: ${req.params.index}`);
    }
    return index;
  }

  /** Missing files inside a well-formed bundle id read as 404. */
  function notFound(err: unknown, what: string): unknown {
    return err instanceof IOError ? new HttpError(404, `${what} not found`) : err;
  }

  app.get("/bundles", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ requestId: requestIdOf(res), bundles: await store.list() });
    } catch (err) {
      next(err);
    }
  });

  app.get("/bundles/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = bundleId(req);
      const manifest = await store.readManifest(id).catch((err: unknown) => Promise.reject(notFound(err, "Bundle")));
      res.json(manifest);
    } catch (err) {
      next(err);
    }
  });

  app.get("/bundles/:id/verify", async (req: Request, res: Response, next: NextFunction) => {
    const requestId = requestIdOf(res);
    try {
      const id = bundleId(req);
      const bundle = await store.load(id);
      res.json({ requestId, id, ok: true, frames: bundle.pairs.length, rootHash: bundle.proof.rootHash });
    } catch (err) {
      if (err instanceof IntegrityError) {
        logger.warn({ at: "bundle_verification_failed", requestId, error: err.message });
        res.status(409).json({ requestId, ok: false, error: err.message });
        return;
      }
      next(notFound(err, "Bundle"));
    }
  });

  for (const [segment, ref] of [["frames", frameImageRef], ["ela", elaImageRef]] as const) {
    app.get(`/bundles/:id/${segment}/:index`, async (req: Request, res: Response, next: NextFunction) => {
      try {
        const id = bundleId(req);
        const index = imageIndex(req);
        const image = await store.readImage(id, ref(index)).catch((err: unknown) => Promise.reject(notFound(err, "Image")));
        res.type("image/png").send(image);
      } catch (err) {
        next(err);
      }
    });
  }

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      error: "Not found",
      endpoints: ["/", "/healthz", "/livez", "/readyz", "/metrics", "POST /analyze", "POST /analyze-by-url", "/bundles"]
    });
  });

  // Error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = requestIdOf(res);
    const status = statusForError(err);
    const message = errorMessage(err);
    if (status >= 500) {
      logger.error({ at: "unhandled_error", requestId, path: req.path, error: message });
    } else {
      logger.warn({ at: "request_rejected", requestId, path: req.path, status, error: message });
    }
    metrics.requests.error++;
    res.status(status).json({
      requestId,
      error: status === 413 && err instanceof multer.MulterError ? "File too large" : message,
      ...(isForensicError(err) ? { kind: err.kind } : {})
    });
  });

  return app;
}
