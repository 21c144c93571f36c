// src/matcher.ts
import { PlanInvariantError } from "./errors.js";
import { comparePaths } from "./path-rel.js";
import { buildSignatureIndex, type SignatureIndex } from "./signature-index.js";
import {
  contentKey,
  recordsByPath,
  type ContentKey,
  type FileRecord,
  type Snapshot,
} from "./snapshot.js";

export type MoveEdge = {
  // both are destination-relative paths
  from: string;
  to: string;
};

export type CopyIntent = {
  from: string;
  to: string;
  key: ContentKey;
};

export type TransferIntent = {
  sourcePath: string;
  size: number;
};

export type MatchResult = {
  alreadyCorrect: string[];
  moves: MoveEdge[];
  copies: CopyIntent[];
  transfers: TransferIntent[];
  // destination paths nothing claimed, sorted
  deletes: string[];
};

function byLengthThenName(a: string, b: string): number {
  return a.length - b.length || comparePaths(a, b);
}

function pickUnclaimed(
  candidates: readonly string[],
  claimed: ReadonlySet<string>,
): string | undefined {
  let best: string | undefined;
  for (const p of candidates) {
    if (claimed.has(p)) continue;
    if (best === undefined || byLengthThenName(p, best) < 0) best = p;
  }
  return best;
}

/**
 * Classify every source record against the destination.
 *
 * Records already in place are claimed before anything else, so a move can
 * never take a file away from a path where it already belongs. The remaining
 * records are visited in path order; each claims at most one destination path.
 * A copy reads from a final source path that holds the content once the move
 * phase is over: an untouched already-correct file if there is one, else the
 * target of the first move of that content.
 */
export function matchSnapshots(
  source: Snapshot,
  dest: Snapshot,
  destIndex: SignatureIndex = buildSignatureIndex(dest),
): MatchResult {
  const destByPath = recordsByPath(dest);
  const claimed = new Set<string>();
  const claim = (p: string) => {
    if (claimed.has(p)) {
      throw new PlanInvariantError(`destination path claimed twice: ${p}`, {
        path: p,
      });
    }
    claimed.add(p);
  };

  const result: MatchResult = {
    alreadyCorrect: [],
    moves: [],
    copies: [],
    transfers: [],
    deletes: [],
  };
  const inPlace = new Map<ContentKey, string>();
  const moved = new Map<ContentKey, string>();
  const pending: FileRecord[] = [];

  for (const record of source.records) {
    const key = contentKey(record);
    const existing = destByPath.get(record.path);
    if (existing && contentKey(existing) === key) {
      claim(record.path);
      result.alreadyCorrect.push(record.path);
      if (!inPlace.has(key)) inPlace.set(key, record.path);
    } else {
      pending.push(record);
    }
  }

  for (const record of pending) {
    const key = contentKey(record);
    const candidates = destIndex.get(key);
    if (!candidates?.length) {
      result.transfers.push({ sourcePath: record.path, size: record.size });
      continue;
    }
    const free = pickUnclaimed(candidates, claimed);
    if (free !== undefined) {
      claim(free);
      result.moves.push({ from: free, to: record.path });
      if (!moved.has(key)) moved.set(key, record.path);
      continue;
    }
    const from = inPlace.get(key) ?? moved.get(key);
    if (from === undefined) {
      throw new PlanInvariantError(
        `content of '${record.path}' is claimed in the destination but no claimed path holds it`,
        { path: record.path, key },
      );
    }
    result.copies.push({ from, to: record.path, key });
  }

  result.deletes = dest.records
    .map((r) => r.path)
    .filter((p) => !claimed.has(p));
  return result;
}
