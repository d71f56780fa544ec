// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import fs from "fs";
import { createHash } from "crypto";
import { HASH_CHUNK_BYTES } from "./config.js";
import { CancelledError, IOError, TruncatedReadError, describeSystemError, isForensicError } from "./errors.js";
import type { Digest, SourceFile } from "./types.js";

export const sha256 = (b: Buffer | string) => createHash("sha256").update(b).digest("hex");

/**
 * Build a SourceFile for a path on disk, taking the reported length from stat.
 */
export async function sourceFileFromPath(filePath: string, ingestedAt: Date = new Date()): Promise<SourceFile> {
  let size: number;
  try {
    const stats = await fs.promises.stat(filePath);
    if (!stats.isFile()) {
      throw new IOError(`Not a regular file: ${filePath}`);
    }
    size = stats.size;
  } catch (err) {
    if (isForensicError(err)) throw err;
    throw new IOError(`Cannot stat ${filePath}: ${describeSystemError(err)}`, { cause: err });
  }
  return Object.freeze({ path: filePath, byteLength: size, ingestedAt: ingestedAt.toISOString() });
}

/**
 * Streaming SHA-256 over the source file in fixed-size chunks.
 *
 * The byte count is checked against `sourceFile.byteLength`; a mismatch means
 * the file was modified while we were reading it.
 */
export function computeDigest(
  sourceFile: SourceFile,
  options: { signal?: AbortSignal; chunkSize?: number } = {}
): Promise<Digest> {
  const { signal, chunkSize = HASH_CHUNK_BYTES } = options;

  return new Promise<Digest>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError("Hashing cancelled"));
      return;
    }

    const hash = createHash("sha256");
    let observed = 0;
    const stream = fs.createReadStream(sourceFile.path, { highWaterMark: chunkSize });

    const onAbort = () => {
      stream.destroy();
      const reason: unknown = signal?.reason;
      reject(isForensicError(reason) ? reason : new CancelledError("Hashing cancelled"));
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    stream.on("data", (chunk: Buffer | string) => {
      const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      observed += bytes.length;
      hash.update(bytes);
    });

    stream.on("error", (err) => {
      signal?.removeEventListener("abort", onAbort);
      reject(new IOError(`Cannot read ${sourceFile.path}: ${describeSystemError(err)}`, { cause: err }));
    });

    stream.on("end", () => {
      signal?.removeEventListener("abort", onAbort);
      if (observed !== sourceFile.byteLength) {
        reject(new TruncatedReadError(sourceFile.byteLength, observed));
        return;
      }
      resolve(hash.digest("hex"));
    });
  });
}
