// src/snapshot.ts
import { SnapshotError } from "./errors.js";
import { describeMode } from "./hash.js";
import {
  ancestorsRel,
  comparePaths,
  isValidRelPath,
  isWithin,
  toAbs,
  toRel,
} from "./path-rel.js";

export type SignatureMode =
  | { kind: "full" }
  | { kind: "partial"; window: number };

export interface FileRecord {
  path: string;
  size: number;
  signature: string;
  signatureMode: SignatureMode;
  // only the catalog updater looks at this, to decide whether to rehash
  mtime?: number;
}

export interface Snapshot {
  readonly root: string;
  readonly records: readonly FileRecord[];
}

/**
 * (size, signature) flattened to a string. Two records with the same key are
 * treated as having the same content; that is only as good as the signature,
 * and noticeably weaker for partial signatures of large files.
 */
export type ContentKey = string;

export function contentKey(r: Pick<FileRecord, "size" | "signature">): ContentKey {
  return `${r.size}:${r.signature}`;
}

export function sameMode(a: SignatureMode, b: SignatureMode): boolean {
  if (a.kind === "full" || b.kind === "full") return a.kind === b.kind;
  return a.window === b.window;
}

/**
 * A partial signature of a file no larger than two windows is a digest of the
 * whole file, so it compares equal to a full signature of the same content.
 */
export function effectiveMode(
  r: Pick<FileRecord, "size" | "signatureMode">,
): SignatureMode {
  const m = r.signatureMode;
  return m.kind === "partial" && r.size <= 2 * m.window ? { kind: "full" } : m;
}

export type ModeConflict = {
  path: string;
  size: number;
  source: SignatureMode;
  dest: SignatureMode;
};

/**
 * First source record whose signature cannot be compared with a destination
 * record of the same size, because the two were computed in different modes.
 * Matching such snapshots would take equal files for different ones.
 */
export function findModeConflict(
  source: Snapshot,
  dest: Snapshot,
): ModeConflict | undefined {
  const destModes = new Map<number, Map<string, SignatureMode>>();
  for (const r of dest.records) {
    const mode = effectiveMode(r);
    const modes = destModes.get(r.size) ?? new Map<string, SignatureMode>();
    modes.set(describeMode(mode), mode);
    destModes.set(r.size, modes);
  }
  for (const r of source.records) {
    const modes = destModes.get(r.size);
    if (!modes) continue;
    const mode = effectiveMode(r);
    const label = describeMode(mode);
    for (const [other, destMode] of modes) {
      if (other !== label) {
        return { path: r.path, size: r.size, source: mode, dest: destMode };
      }
    }
  }
  return undefined;
}

export function makeSnapshot(
  root: string,
  records: Iterable<FileRecord>,
): Snapshot {
  const sorted = Array.from(records, (r) => ({ ...r }));
  sorted.sort((a, b) => comparePaths(a.path, b.path));
  for (let i = 0; i < sorted.length; i += 1) {
    const r = sorted[i];
    if (!isValidRelPath(r.path)) {
      throw new SnapshotError(`invalid relative path '${r.path}'`, root);
    }
    if (!Number.isSafeInteger(r.size) || r.size < 0) {
      throw new SnapshotError(`invalid size ${r.size} for '${r.path}'`, root);
    }
    if (i > 0 && sorted[i - 1].path === r.path) {
      throw new SnapshotError(`duplicate path '${r.path}'`, root);
    }
  }
  const paths = new Set(sorted.map((r) => r.path));
  for (const r of sorted) {
    const file = ancestorsRel(r.path).find((dir) => paths.has(dir));
    if (file !== undefined) {
      throw new SnapshotError(
        `'${file}' is a file but '${r.path}' lies below it`,
        root,
      );
    }
  }
  return Object.freeze({
    root,
    records: Object.freeze(sorted.map((r) => Object.freeze(r))),
  });
}

export function recordsByPath(
  snapshot: Snapshot,
): ReadonlyMap<string, FileRecord> {
  return new Map(snapshot.records.map((r) => [r.path, r]));
}

/** Deepest root that encloses `abs`, or undefined when none does. */
export function resolveOwningRoot(
  abs: string,
  roots: readonly string[],
): string | undefined {
  let best: string | undefined;
  for (const root of roots) {
    if (!isWithin(abs, root)) continue;
    if (best === undefined || root.length > best.length) best = root;
  }
  return best;
}

export type CatalogSnapshot = {
  root: string;
  snapshot: Snapshot;
};

/**
 * Merge the catalogs covering one hierarchy into a single snapshot rooted at
 * `root`. A record survives only if the catalog it came from is the nearest
 * one enclosing its path, so a parent catalog's stale rows for a subtree that
 * has since gained its own catalog are ignored.
 */
export function composeSnapshot(
  root: string,
  catalogs: readonly CatalogSnapshot[],
): Snapshot {
  const roots = catalogs.map((c) => c.root);
  const records: FileRecord[] = [];
  for (const catalog of catalogs) {
    for (const record of catalog.snapshot.records) {
      const abs = toAbs(record.path, catalog.root);
      if (resolveOwningRoot(abs, roots) !== catalog.root) continue;
      if (!isWithin(abs, root) || abs === root) continue;
      records.push({ ...record, path: toRel(abs, root) });
    }
  }
  return makeSnapshot(root, records);
}
