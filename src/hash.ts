// src/hash.ts
import { createReadStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import fs, { type FileHandle } from "node:fs/promises";
import { createHash, getHashes } from "node:crypto";
import type { SignatureMode } from "./snapshot.js";

export const HASH_STREAM_CUTOFF = 10_000_000; // ~10MB; small files do one-shot hashing
export const STREAM_HWM = 8 * 1024 * 1024; // 8MB read chunks

const ENCODING = "base64";

// Curated set we’re willing to expose
export const CURATED_HASH_ALGOS = [
  "md5",
  "sha1",
  "sha256",
  "sha512",
  "blake2b512",
  "blake2s256",
  "sha3-256",
  "sha3-512",
] as const;

export type HashAlg = (typeof CURATED_HASH_ALGOS)[number];

export function defaultHashAlg(): HashAlg {
  return "sha256";
}

let supportedHashes: HashAlg[] | null = null;
export function listSupportedHashes(): HashAlg[] {
  if (supportedHashes == null) {
    const avail = new Set(getHashes().map((s) => s.toLowerCase()));
    supportedHashes = CURATED_HASH_ALGOS.filter((a) => avail.has(a));
  }
  return supportedHashes;
}

/**
 * Normalize/validate requested algorithm against runtime support.
 * Accepts short shorthands "blake2b" -> blake2b512, "blake2s" -> blake2s256.
 */
export function normalizeHashAlg(requested?: string): HashAlg {
  const list = listSupportedHashes();
  if (!requested) return defaultHashAlg();
  const low = requested.toLowerCase();
  const alias =
    low === "blake2b" ? "blake2b512" : low === "blake2s" ? "blake2s256" : low;
  const found = list.find((h) => h === alias);
  if (found) return found;
  throw new Error(
    `Unknown/unsupported hash algorithm "${requested}". Try one of:\n  ${list.join(", ")}`,
  );
}

/**
 * Hash a file. Uses a fast path for small files and a backpressured streaming
 * pipeline for large files. If 'size' is not provided, we'll stat the file.
 */
export async function fileDigest(
  alg: string,
  path: string,
  size?: number,
): Promise<string> {
  const n = size ?? (await fs.stat(path)).size;

  if (n <= HASH_STREAM_CUTOFF) {
    const buf = await fs.readFile(path);
    return createHash(alg).update(buf).digest(ENCODING);
  }

  const h = createHash(alg);
  const rs = createReadStream(path, { highWaterMark: STREAM_HWM });
  await pipeline(rs, async function (src: AsyncIterable<Buffer>) {
    for await (const chunk of src) {
      h.update(chunk);
    }
  });
  return h.digest(ENCODING);
}

async function readAt(
  handle: FileHandle,
  position: number,
  length: number,
): Promise<Buffer> {
  const buf = Buffer.alloc(length);
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await handle.read(
      buf,
      filled,
      length - filled,
      position + filled,
    );
    if (bytesRead === 0) break;
    filled += bytesRead;
  }
  return filled === length ? buf : buf.subarray(0, filled);
}

/**
 * Head/tail signature. Files no larger than two windows are hashed whole, so
 * for them the result is exactly `fileDigest`. Larger files hash the first and
 * last `window` bytes plus the decimal size, which separates files that merely
 * share a header and trailer but differ in length.
 */
export async function partialDigest(
  alg: string,
  path: string,
  window: number,
  size?: number,
): Promise<string> {
  const n = size ?? (await fs.stat(path)).size;
  if (n <= window * 2) {
    return fileDigest(alg, path, n);
  }
  const handle = await fs.open(path, "r");
  try {
    const head = await readAt(handle, 0, window);
    const tail = await readAt(handle, n - window, window);
    return createHash(alg)
      .update(head)
      .update(tail)
      .update(String(n))
      .digest(ENCODING);
  } finally {
    await handle.close();
  }
}

export function computeSignature(
  path: string,
  mode: SignatureMode,
  alg: string = defaultHashAlg(),
  size?: number,
): Promise<string> {
  return mode.kind === "partial"
    ? partialDigest(alg, path, mode.window, size)
    : fileDigest(alg, path, size);
}

export function describeMode(mode: SignatureMode): string {
  return mode.kind === "partial" ? `partial:${mode.window}` : "full";
}

export function parseMode(raw: string): SignatureMode | null {
  if (raw === "full") return { kind: "full" };
  const m = /^partial:(\d+)$/.exec(raw);
  if (!m) return null;
  const window = Number(m[1]);
  return window > 0 ? { kind: "partial", window } : null;
}
