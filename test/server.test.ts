// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "fs";
import path from "path";
import request from "supertest";
import { Response } from "node-fetch";
import type { Express } from "express";
import { sleep } from "../src/async.js";
import type { ServerConfig } from "../src/config.js";
import { UnsupportedFormatError } from "../src/errors.js";
import { sha256 } from "../src/hasher.js";
import { EvidencePipeline, type PipelineDeps } from "../src/pipeline.js";
import { SERVICE_NAME, createApp, parseSamplingOverrides, statusForKind, type FetchFn } from "../src/server.js";
import { FileSystemBundleStore } from "../src/store.js";
import { FakeDecoder, FakeProbe, loadProbeFixture, makeTempDir, removeDir, testPipelineConfig } from "./helpers.js";

const shortClip = loadProbeFixture("ffprobe-short-clip.json");

async function settledEmpty(dir: string): Promise<string[]> {
  for (let i = 0; i < 50 && fs.readdirSync(dir).length > 0; i++) {
    await sleep(10);
  }
  return fs.readdirSync(dir);
}

describe("parseSamplingOverrides", () => {
  it("reads numbers from form strings and JSON numbers", () => {
    expect(parseSamplingOverrides({ intervalSeconds: "0.5", maxFrames: 4, startOffset: "" })).toEqual({
      intervalSeconds: 0.5,
      maxFrames: 4
    });
    expect(parseSamplingOverrides(undefined)).toEqual({});
  });

  it("rejects values that are not numbers", () => {
    expect(() => parseSamplingOverrides({ maxFrames: "many" })).toThrow("maxFrames must be a number");
    expect(() => parseSamplingOverrides({ startOffset: true })).toThrow("startOffset must be a number");
  });
});

describe("statusForKind", () => {
  it("maps failure kinds to HTTP statuses", () => {
    expect(statusForKind("UnsupportedFormatError")).toBe(422);
    expect(statusForKind("DecodeError")).toBe(422);
    expect(statusForKind("TimeoutError")).toBe(504);
    expect(statusForKind("ProbeUnavailableError")).toBe(503);
    expect(statusForKind("ConfigError")).toBe(400);
    expect(statusForKind("IOError")).toBe(500);
  });
});

describe("HTTP API", () => {
  let dir: string;
  let config: ServerConfig;
  let store: FileSystemBundleStore;
  let fetched: string[];

  const video = Buffer.from("fake video payload");

  const fetchImpl: FetchFn = async url => {
    fetched.push(url);
    if (url.endsWith("/missing.mp4")) return new Response("gone", { status: 404, statusText: "Not Found" });
    if (url.endsWith("/huge.mp4")) return new Response("x", { headers: { "content-length": "4096" } });
    return new Response(video);
  };

  function app(deps: Partial<PipelineDeps> = {}): Express {
    const pipeline = new EvidencePipeline(testPipelineConfig(), {
      probe: new FakeProbe([shortClip]),
      decoder: new FakeDecoder(),
      store,
      ...deps
    });
    return createApp({ pipeline, store, config, fetchImpl });
  }

  beforeEach(() => {
    dir = makeTempDir();
    store = new FileSystemBundleStore(path.join(dir, "results"));
    fetched = [];
    config = {
      nodeEnv: "test",
      port: 0,
      logLevel: "silent",
      outputDir: path.join(dir, "results"),
      uploadDir: path.join(dir, "uploads"),
      maxFileBytes: 1024,
      maxInflight: 2,
      allowedOrigins: [],
      allowedFetchHosts: ["media.example"]
    };
  });

  afterEach(() => {
    removeDir(dir);
  });

  describe("health", () => {
    it("reports the service and pipeline version", async () => {
      const res = await request(app()).get("/healthz");

      expect(res.status).toBe(200);
      expect(res.body.ok).toBe(true);
      expect(res.body.service).toBe(SERVICE_NAME);
      expect(res.body.pipelineVersion).toMatch(/^evidence:v1:sha256\|decoder=fake\|/);
    });

    it("is live and ready when idle", async () => {
      const server = app();

      expect((await request(server).get("/livez")).body).toEqual({ alive: true });
      expect((await request(server).get("/readyz")).body).toEqual({ ready: true });
    });
  });

  describe("POST /analyze", () => {
    it("requires a file", async () => {
      const res = await request(app()).post("/analyze");

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Provide a file in 'file' field (multipart/form-data)");
    });

    it("returns the manifest and serves the stored images", async () => {
      const server = app();
      const res = await request(server).post("/analyze").attach("file", video, "clip.mp4");

      expect(res.status).toBe(200);
      expect(res.body.flagged).toBe(false);
      expect(res.body.manifest.digest).toBe(sha256(video));
      expect(res.body.manifest.frames).toHaveLength(3);
      expect(res.body.manifest.frames[2].image).toBe("frames/frame_000002.png");

      const id: string = res.body.bundleId;
      expect(res.body.manifest.id).toBe(id);

      const manifest = await request(server).get(`/bundles/${id}`);
      expect(manifest.status).toBe(200);
      expect(manifest.body.proof.rootHash).toBe(res.body.manifest.proof.rootHash);

      const frame = await request(server).get(`/bundles/${id}/frames/1`);
      expect(frame.status).toBe(200);
      expect(frame.headers["content-type"]).toBe("image/png");
      expect(sha256(frame.body)).toBe(res.body.manifest.frames[1].sha256);

      const ela = await request(server).get(`/bundles/${id}/ela/1`);
      expect(sha256(ela.body)).toBe(res.body.manifest.frames[1].ela.sha256);

      const verified = await request(server).get(`/bundles/${id}/verify`);
      expect(verified.status).toBe(200);
      expect(verified.body).toMatchObject({ id, ok: true, frames: 3, rootHash: res.body.manifest.proof.rootHash });

      expect((await request(server).get("/bundles")).body.bundles).toEqual([id]);
    });

    it("removes the upload once the run is over", async () => {
      await request(app()).post("/analyze").attach("file", video, "clip.mp4");

      expect(await settledEmpty(config.uploadDir)).toEqual([]);
    });

    it("applies sampling overrides from form fields", async () => {
      const decoder = new FakeDecoder();
      const res = await request(app({ decoder }))
        .post("/analyze")
        .field("intervalSeconds", "2")
        .attach("file", video, "clip.mp4");

      expect(res.status).toBe(200);
      expect(decoder.calls).toEqual([0, 2]);
      expect(res.body.manifest.extraction.policy).toEqual({ intervalSeconds: 2, maxFrames: 10, startOffset: 0 });
    });

    it("rejects invalid sampling overrides", async () => {
      const res = await request(app())
        .post("/analyze")
        .field("maxFrames", "abc")
        .attach("file", video, "clip.mp4");

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: "maxFrames must be a number", kind: "ConfigError" });
    });

    it("refuses overrides beyond the sampling limits before any decoding", async () => {
      const decoder = new FakeDecoder();
      const server = app({ decoder });

      const frames = await request(server)
        .post("/analyze")
        .field("maxFrames", "100000000")
        .attach("file", video, "clip.mp4");
      expect(frames.status).toBe(400);
      expect(frames.body).toMatchObject({ error: "maxFrames must be <= 50, got 100000000", kind: "ConfigError" });

      const interval = await request(server)
        .post("/analyze")
        .field("intervalSeconds", "0.000001")
        .attach("file", video, "clip.mp4");
      expect(interval.status).toBe(400);
      expect(interval.body).toMatchObject({ error: "intervalSeconds must be >= 0.1, got 0.000001", kind: "ConfigError" });

      expect(decoder.calls).toEqual([]);
      expect(await settledEmpty(config.uploadDir)).toEqual([]);
    });

    it("reports a failed run with its stage and kind", async () => {
      const probe = new FakeProbe([new UnsupportedFormatError("Not decodable media: moov atom not found")]);
      const res = await request(app({ probe })).post("/analyze").attach("file", video, "clip.mp4");

      expect(res.status).toBe(422);
      expect(res.body.error).toBe("Not decodable media: moov atom not found");
      expect(res.body.failure).toMatchObject({
        stage: "extracting_metadata",
        kind: "UnsupportedFormatError",
        attempts: 1
      });
      expect(await store.list()).toEqual([]);
    });

    it("rejects uploads over the size limit", async () => {
      const res = await request(app()).post("/analyze").attach("file", Buffer.alloc(2048), "big.mp4");

      expect(res.status).toBe(413);
      expect(res.body.error).toBe("File too large");
    });
  });

  describe("POST /analyze-by-url", () => {
    it("requires a url", async () => {
      const res = await request(app()).post("/analyze-by-url").send({});

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Missing 'url' field");
    });

    it("downloads from an allowed host and analyzes the file", async () => {
      const res = await request(app()).post("/analyze-by-url").send({ url: "https://media.example/clip.mp4" });

      expect(res.status).toBe(200);
      expect(fetched).toEqual(["https://media.example/clip.mp4"]);
      expect(res.body.manifest.digest).toBe(sha256(video));
      expect(res.body.manifest.source.byteLength).toBe(video.length);
      expect(await settledEmpty(config.uploadDir)).toEqual([]);
    });

    it("refuses hosts that are not allowed and schemes other than http", async () => {
      const server = app();

      const host = await request(server).post("/analyze-by-url").send({ url: "https://elsewhere.example/clip.mp4" });
      expect(host.status).toBe(400);
      expect(host.body.error).toBe("Fetch host not allowed: elsewhere.example");

      const scheme = await request(server).post("/analyze-by-url").send({ url: "ftp://media.example/clip.mp4" });
      expect(scheme.status).toBe(400);
      expect(scheme.body.error).toBe("URL must be http or https");

      const invalid = await request(server).post("/analyze-by-url").send({ url: "not a url" });
      expect(invalid.body.error).toBe("Invalid URL");
      expect(fetched).toEqual([]);
    });

    it("checks sampling overrides before downloading", async () => {
      const res = await request(app())
        .post("/analyze-by-url")
        .send({ url: "https://media.example/clip.mp4", maxFrames: 100_000_000 });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("maxFrames must be <= 50, got 100000000");
      expect(fetched).toEqual([]);
    });

    it("reports an upstream failure as 502", async () => {
      const res = await request(app()).post("/analyze-by-url").send({ url: "https://media.example/missing.mp4" });

      expect(res.status).toBe(502);
      expect(res.body.error).toBe("Fetch failed: 404 Not Found");
    });

    it("refuses a download whose declared size is over the limit", async () => {
      const res = await request(app()).post("/analyze-by-url").send({ url: "https://media.example/huge.mp4" });

      expect(res.status).toBe(413);
      expect(res.body.error).toBe("File too large: 4096 bytes > 1024 bytes");
    });
  });

  describe("bundles", () => {
    it("answers 404 for malformed and unknown ids", async () => {
      const server = app();

      const malformed = await request(server).get("/bundles/not-a-bundle");
      expect(malformed.status).toBe(404);
      expect(malformed.body.error).toBe("Bundle not found: not-a-bundle");

      const unknown = await request(server).get("/bundles/ev_000000000000_abc_000000");
      expect(unknown.status).toBe(404);
      expect(unknown.body.error).toBe("Bundle not found");
    });

    it("validates the image index", async () => {
      const server = app();
      const { body } = await request(server).post("/analyze").attach("file", video, "clip.mp4");

      const bad = await request(server).get(`/bundles/${body.bundleId}/frames/first`);
      expect(bad.status).toBe(400);
      expect(bad.body.error).toBe("Invalid frame index: first");

      const missing = await request(server).get(`/bundles/${body.bundleId}/ela/9`);
      expect(missing.status).toBe(404);
      expect(missing.body.error).toBe("Image not found");
    });

    it("reports a tampered bundle as a conflict", async () => {
      const server = app();
      const { body } = await request(server).post("/analyze").attach("file", video, "clip.mp4");
      fs.writeFileSync(path.join(config.outputDir, body.bundleId, "frames", "frame_000000.png"), "edited");

      const res = await request(server).get(`/bundles/${body.bundleId}/verify`);

      expect(res.status).toBe(409);
      expect(res.body).toMatchObject({ ok: false, error: "Frame 0 image does not match its hash" });
    });
  });

  it("counts run outcomes in the metrics", async () => {
    const server = app();
    await request(server).post("/analyze").attach("file", video, "clip.mp4");

    const res = await request(server).get("/metrics");
    const lines = res.text.split("\n");

    expect(res.status).toBe(200);
    expect(lines).toContain('pipeline_runs_total{outcome="complete"} 1');
    expect(lines).toContain('pipeline_runs_total{outcome="failed"} 0');
    expect(lines).toContain("inflight_requests 0");
  });

  it("answers unknown routes with 404", async () => {
    const res = await request(app()).get("/nope");

    expect(res.status).toBe(404);
    expect(res.body.error).toBe("Not found");
  });
});
