// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "fs";
import path from "path";
import { assembleBundle } from "../src/bundle.js";
import { CancelledError, IOError, IntegrityError, TimeoutError } from "../src/errors.js";
import { sha256 } from "../src/hasher.js";
import { FileSystemBundleStore, MANIFEST_FILE, loadBundleDirectory } from "../src/store.js";
import type { EvidenceBundle } from "../src/types.js";
import { makeTempDir, removeDir } from "./helpers.js";

function sampleBundle(): EvidenceBundle {
  const frames = [0, 1, 2].map(index => {
    const image = Buffer.from(`frame-${index}`);
    return { index, timestampSeconds: index, width: 2, height: 2, image, sha256: sha256(image) };
  });
  const elaResults = frames.map(f => {
    const image = Buffer.from(`ela-${f.index}`);
    return { frameIndex: f.index, width: 2, height: 2, image, sha256: sha256(image), maxDifference: 1, meanDifference: 0.25 };
  });
  return assembleBundle({
    source: { path: "/virtual/clip.mp4", byteLength: 5, ingestedAt: "2024-05-01T12:30:00.000Z" },
    digest: sha256("video"),
    metadata: { durationSeconds: 3, streams: [] },
    frames,
    elaResults,
    policy: { intervalSeconds: 1, maxFrames: 10, startOffset: 0 },
    analysis: { quality: 95, scale: 30 },
    continuity: {
      threshold: 0.5,
      frameHashes: ["ab".repeat(32), "ab".repeat(32), "cd".repeat(32)],
      duplicates: [{ hash: "ab".repeat(32), frames: [0, 1] }],
      sceneScores: [0, 0.75],
      sceneChanges: [2]
    },
    pipelineVersion: "evidence:v1:test"
  });
}

describe("FileSystemBundleStore", () => {
  let root: string;
  let store: FileSystemBundleStore;

  beforeEach(() => {
    root = makeTempDir();
    store = new FileSystemBundleStore(root);
  });

  afterEach(() => {
    removeDir(root);
  });

  it("writes the manifest and every image under the bundle id", async () => {
    const bundle = sampleBundle();
    const location = await store.save(bundle);

    expect(location).toBe(path.join(root, bundle.id));
    expect(fs.readdirSync(location).sort()).toEqual([MANIFEST_FILE, "ela", "frames"]);
    expect(fs.readdirSync(path.join(location, "frames")).sort()).toEqual([
      "frame_000000.png",
      "frame_000001.png",
      "frame_000002.png"
    ]);
    expect(fs.readFileSync(path.join(location, "ela", "ela_000002.png"), "utf8")).toBe("ela-2");
  });

  it("leaves no staging directory behind", async () => {
    const bundle = sampleBundle();
    await store.save(bundle);

    expect(fs.readdirSync(root)).toEqual([bundle.id]);
  });

  it("loads and verifies a saved bundle", async () => {
    const bundle = sampleBundle();
    await store.save(bundle);

    const loaded = await store.load(bundle.id);
    expect(loaded.proof.rootHash).toBe(bundle.proof.rootHash);
    expect(loaded.pairs.map(p => p.ela.image.toString())).toEqual(["ela-0", "ela-1", "ela-2"]);

    const manifest = await store.readManifest(bundle.id);
    expect(manifest.frames).toHaveLength(3);
    await expect(loadBundleDirectory(path.join(root, bundle.id))).resolves.toHaveProperty("id", bundle.id);
  });

  it("refuses to overwrite an existing bundle", async () => {
    const bundle = sampleBundle();
    await store.save(bundle);

    await expect(store.save(bundle)).rejects.toBeInstanceOf(IOError);
    expect(fs.readdirSync(root)).toEqual([bundle.id]);
  });

  it("detects a tampered image on load", async () => {
    const bundle = sampleBundle();
    const location = await store.save(bundle);
    fs.writeFileSync(path.join(location, "frames", "frame_000001.png"), "edited");

    await expect(store.load(bundle.id)).rejects.toThrow("Frame 1 image does not match its hash");
  });

  describe("edits to the saved manifest", () => {
    type Manifest = {
      frames: Array<{ timestampSeconds: number; width: number; ela: { maxDifference: number } }>;
      proof: { chain: Array<{ chainHash: string }> };
      continuity: { duplicates: unknown[] };
    };

    async function editManifest(edit: (m: Manifest) => void): Promise<string> {
      const bundle = sampleBundle();
      const location = await store.save(bundle);
      const file = path.join(location, MANIFEST_FILE);
      const manifest: Manifest = JSON.parse(fs.readFileSync(file, "utf8"));
      edit(manifest);
      fs.writeFileSync(file, JSON.stringify(manifest));
      return bundle.id;
    }

    it("detects a rewritten frame timestamp", async () => {
      const id = await editManifest(m => {
        m.frames[1].timestampSeconds = 5.5;
      });

      await expect(store.load(id)).rejects.toThrow("Hash chain link 1 does not match the evidence");
    });

    it("detects a rewritten frame width", async () => {
      const id = await editManifest(m => {
        m.frames[2].width = 999;
      });

      await expect(store.load(id)).rejects.toThrow("Hash chain link 2 does not match the evidence");
    });

    it("detects a rewritten ELA statistic", async () => {
      const id = await editManifest(m => {
        m.frames[0].ela.maxDifference = 0;
      });

      await expect(store.load(id)).rejects.toThrow("Hash chain link 0 does not match the evidence");
    });

    it("detects a rewritten chain link", async () => {
      const id = await editManifest(m => {
        m.proof.chain[0].chainHash = "0".repeat(64);
      });

      await expect(store.load(id)).rejects.toThrow("Hash chain link 0 does not match the evidence");
    });

    it("detects hidden duplicate frames", async () => {
      const id = await editManifest(m => {
        m.continuity.duplicates = [];
      });

      await expect(store.load(id)).rejects.toThrow("Duplicate frames do not match the frame hashes");
    });
  });

  describe("save under an abort signal", () => {
    it("writes nothing once the signal has aborted", async () => {
      const bundle = sampleBundle();
      const controller = new AbortController();
      controller.abort();

      await expect(store.save(bundle, controller.signal)).rejects.toThrow(CancelledError);
      await expect(store.save(bundle, controller.signal)).rejects.toThrow(`Saving bundle ${bundle.id} cancelled`);
      expect(fs.readdirSync(root)).toEqual([]);
    });

    it("rethrows a timeout reason unchanged", async () => {
      const bundle = sampleBundle();
      const controller = new AbortController();
      const reason = new TimeoutError("assembling", 10);
      controller.abort(reason);

      await expect(store.save(bundle, controller.signal)).rejects.toBe(reason);
      expect(fs.readdirSync(root)).toEqual([]);
    });
  });

  it("lists stored bundle ids", async () => {
    const a = sampleBundle();
    const b = sampleBundle();
    await store.save(a);
    await store.save(b);
    fs.mkdirSync(path.join(root, "not-a-bundle"));

    expect(await store.list()).toEqual([a.id, b.id].sort());
  });

  it("lists nothing when the root does not exist yet", async () => {
    await expect(new FileSystemBundleStore(path.join(root, "missing")).list()).resolves.toEqual([]);
  });

  it("rejects malformed ids and references outside the bundle", async () => {
    const bundle = sampleBundle();
    await store.save(bundle);

    await expect(store.load("../etc")).rejects.toBeInstanceOf(IntegrityError);
    await expect(store.readImage(bundle.id, "../../outside.png")).rejects.toBeInstanceOf(IntegrityError);
  });

  it("reports a missing bundle as IOError", async () => {
    await expect(store.readManifest("ev_000000000000_abc_000000")).rejects.toBeInstanceOf(IOError);
  });
});
