// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import fs from "fs";
import path from "path";
import {
  BUNDLE_ID_PATTERN,
  elaImageRef,
  frameImageRef,
  fromManifest,
  parseManifest,
  toManifest,
  type BundleManifest
} from "./bundle.js";
import { throwIfAborted } from "./async.js";
import { IOError, IntegrityError, describeSystemError, isForensicError } from "./errors.js";
import { rid } from "./ids.js";
import type { EvidenceBundle } from "./types.js";

export const MANIFEST_FILE = "bundle.json";

export interface BundleStore {
  /**
   * Persist all or nothing; returns where the bundle now lives. Once `signal`
   * aborts nothing more is written and the bundle never appears.
   */
  save(bundle: EvidenceBundle, signal?: AbortSignal): Promise<string>;
  load(id: string): Promise<EvidenceBundle>;
  readManifest(id: string): Promise<BundleManifest>;
  readImage(id: string, ref: string): Promise<Buffer>;
  list(): Promise<string[]>;
}

/**
 * <root>/<bundleId>/bundle.json
 *                 /frames/frame_000000.png
 *                 /ela/ela_000000.png
 *
 * A bundle is written into a hidden staging directory and renamed into place
 * only once every file is on disk. The abort signal is checked between writes
 * and right before the rename.
 */
export class FileSystemBundleStore implements BundleStore {
  constructor(readonly rootDir: string) {}

  async save(bundle: EvidenceBundle, signal?: AbortSignal): Promise<string> {
    const finalDir = this.dirFor(bundle.id);
    const stagingDir = path.join(this.rootDir, `.staging-${bundle.id}-${rid()}`);
    const checkpoint = () => throwIfAborted(signal, `Saving bundle ${bundle.id}`);

    checkpoint();
    try {
      await fs.promises.mkdir(path.join(stagingDir, "frames"), { recursive: true });
      await fs.promises.mkdir(path.join(stagingDir, "ela"), { recursive: true });

      for (const { frame, ela } of bundle.pairs) {
        await fs.promises.writeFile(path.join(stagingDir, frameImageRef(frame.index)), frame.image);
        await fs.promises.writeFile(path.join(stagingDir, elaImageRef(ela.frameIndex)), ela.image);
        checkpoint();
      }

      const manifest = toManifest(bundle);
      await fs.promises.writeFile(
        path.join(stagingDir, MANIFEST_FILE),
        JSON.stringify(manifest, null, 2) + "\n",
        { flag: "wx" }
      );

      checkpoint();
      await fs.promises.rename(stagingDir, finalDir);
      return finalDir;
    } catch (err) {
      await fs.promises.rm(stagingDir, { recursive: true, force: true });
      if (isForensicError(err)) throw err;
      throw new IOError(`Failed to persist bundle ${bundle.id}: ${describeSystemError(err)}`, { cause: err });
    }
  }

  async readManifest(id: string): Promise<BundleManifest> {
    const raw = await this.read(id, MANIFEST_FILE);
    return parseManifest(raw.toString("utf8"));
  }

  async load(id: string): Promise<EvidenceBundle> {
    const raw = await this.read(id, MANIFEST_FILE);
    return fromManifest(raw.toString("utf8"), ref => this.readImage(id, ref));
  }

  readImage(id: string, ref: string): Promise<Buffer> {
    return this.read(id, ref);
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.rootDir);
    } catch (err) {
      if (describeSystemError(err) === "ENOENT") return [];
      throw new IOError(`Cannot list ${this.rootDir}: ${describeSystemError(err)}`, { cause: err });
    }
    return entries.filter(e => BUNDLE_ID_PATTERN.test(e)).sort();
  }

  private dirFor(id: string): string {
    if (!BUNDLE_ID_PATTERN.test(id)) {
      throw new IntegrityError(`Invalid bundle id: ${id}`);
    }
    return path.join(this.rootDir, id);
  }

  private async read(id: string, ref: string): Promise<Buffer> {
    const dir = this.dirFor(id);
    const file = path.resolve(dir, ref);
    if (!file.startsWith(dir + path.sep)) {
      throw new IntegrityError(`Reference escapes bundle directory: ${ref}`);
    }
    try {
      return await fs.promises.readFile(file);
    } catch (err) {
      throw new IOError(`Cannot read ${id}/${ref}: ${describeSystemError(err)}`, { cause: err });
    }
  }
}

/**
 * Load a bundle straight from its directory (the layout written above).
 */
export async function loadBundleDirectory(dir: string): Promise<EvidenceBundle> {
  const abs = path.resolve(dir);
  const store = new FileSystemBundleStore(path.dirname(abs));
  return store.load(path.basename(abs));
}
