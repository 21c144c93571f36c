// src/plan.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import { PlanInvariantError, SnapshotError } from "./errors.js";
import { describeMode } from "./hash.js";
import type { Logger } from "./logger.js";
import { matchSnapshots, type MatchResult } from "./matcher.js";
import { resolveMoves, ScratchAllocator } from "./move-graph.js";
import { ancestorsRel, comparePaths } from "./path-rel.js";
import { buildSignatureIndex } from "./signature-index.js";
import {
  contentKey,
  findModeConflict,
  type ContentKey,
  type Snapshot,
} from "./snapshot.js";
import { formatBytes } from "./util.js";

export type Operation =
  | { op: "move"; from: string; to: string }
  | { op: "copy"; from: string; to: string }
  | { op: "delete"; path: string }
  // advisory: the content is nowhere in the destination, an external
  // transfer (rsync etc.) has to bring it over
  | { op: "transfer"; sourcePath: string; size: number };

export type OperationKind = Operation["op"];

export type PlanStats = {
  moves: number;
  copies: number;
  deletes: number;
  transfers: number;
  alreadyCorrect: number;
  scratchPaths: number;
  transferBytes: number;
};

export interface Plan {
  readonly operations: readonly Operation[];
  readonly stats: PlanStats;
}

export type AssembleOptions = {
  // every path a scratch name must stay clear of
  reserved?: Iterable<string>;
};

/**
 * Lay out the operations in phase order: moves, copies, deletes, then the
 * transfer advisories.
 *
 * A delete candidate sitting where a move or copy is about to write (or where
 * one of the target's parent directories has to be, or below a target that
 * has to become a file) is deleted right before that write. Delete candidates
 * are never read, so deleting them early cannot lose anything a later step
 * needs.
 */
export function assemblePlan(
  match: MatchResult,
  { reserved = [] }: AssembleOptions = {},
): Plan {
  const allocator = new ScratchAllocator(reserved);
  for (const e of match.moves) {
    allocator.reserve(e.from);
    allocator.reserve(e.to);
  }
  const resolved = resolveMoves(match.moves, allocator);
  const scratch = new Set(resolved.scratchPaths);

  const pending = new Set(match.deletes);
  const byDir = new Map<string, string[]>();
  for (const p of match.deletes) {
    for (const dir of ancestorsRel(p)) {
      const list = byDir.get(dir);
      if (list) list.push(p);
      else byDir.set(dir, [p]);
    }
  }
  const copySources = new Set(match.copies.map((c) => c.from));
  const operations: Operation[] = [];

  const clearFor = (target: string) => {
    const blockers = [...ancestorsRel(target), target, ...(byDir.get(target) ?? [])];
    for (const p of blockers) {
      if (!pending.has(p)) continue;
      pending.delete(p);
      operations.push({ op: "delete", path: p });
    }
  };

  for (const move of resolved.moves) {
    if (!scratch.has(move.to)) clearFor(move.to);
    operations.push({ op: "move", from: move.from, to: move.to });
  }

  const copies = [...match.copies].sort((a, b) => comparePaths(a.to, b.to));
  for (const copy of copies) {
    clearFor(copy.to);
    operations.push({ op: "copy", from: copy.from, to: copy.to });
  }

  for (const p of match.deletes) {
    if (!pending.has(p) || copySources.has(p)) continue;
    pending.delete(p);
    operations.push({ op: "delete", path: p });
  }

  const transfers = [...match.transfers].sort((a, b) =>
    comparePaths(a.sourcePath, b.sourcePath),
  );
  for (const t of transfers) {
    operations.push({ op: "transfer", sourcePath: t.sourcePath, size: t.size });
  }

  const stats: PlanStats = {
    moves: 0,
    copies: 0,
    deletes: 0,
    transfers: 0,
    alreadyCorrect: match.alreadyCorrect.length,
    scratchPaths: resolved.scratchPaths.length,
    transferBytes: 0,
  };
  for (const op of operations) {
    switch (op.op) {
      case "move":
        stats.moves += 1;
        break;
      case "copy":
        stats.copies += 1;
        break;
      case "delete":
        stats.deletes += 1;
        break;
      case "transfer":
        stats.transfers += 1;
        stats.transferBytes += op.size;
        break;
      default:
        assertNever(op);
    }
  }

  return Object.freeze({
    operations: Object.freeze(operations.map((op) => Object.freeze(op))),
    stats: Object.freeze(stats),
  });
}

export function assertNever(x: never): never {
  throw new PlanInvariantError(`unexpected operation ${JSON.stringify(x)}`);
}

/**
 * Replay `plan` against an in-memory copy of the destination. Throws if an
 * operation reads a path that holds nothing, writes a path that is still
 * occupied, writes below a file or over a directory that still holds files,
 * or if a moved/copied file would not end up with the content the source
 * expects.
 */
export function checkPlan(plan: Plan, dest: Snapshot, source?: Snapshot): void {
  const present = new Map<string, ContentKey>();
  // files currently below each directory
  const below = new Map<string, number>();
  const add = (p: string, key: ContentKey) => {
    present.set(p, key);
    for (const dir of ancestorsRel(p)) below.set(dir, (below.get(dir) ?? 0) + 1);
  };
  const remove = (p: string) => {
    present.delete(p);
    for (const dir of ancestorsRel(p)) {
      const n = (below.get(dir) ?? 0) - 1;
      if (n > 0) below.set(dir, n);
      else below.delete(dir);
    }
  };
  for (const r of dest.records) add(r.path, contentKey(r));

  const blocker = (p: string): string | undefined => {
    if (present.has(p)) return "is still occupied";
    if (below.has(p)) return "is a directory that still holds files";
    const file = ancestorsRel(p).find((dir) => present.has(dir));
    return file === undefined ? undefined : `is below the file ${file}`;
  };
  const take = (p: string, step: number): ContentKey => {
    const key = present.get(p);
    if (key === undefined) {
      throw new PlanInvariantError(`step ${step} reads missing path ${p}`, {
        step,
        path: p,
      });
    }
    return key;
  };
  const put = (p: string, key: ContentKey, step: number) => {
    const reason = blocker(p);
    if (reason !== undefined) {
      throw new PlanInvariantError(`step ${step} writes ${p}, which ${reason}`, {
        step,
        path: p,
      });
    }
    add(p, key);
  };

  plan.operations.forEach((op, step) => {
    switch (op.op) {
      case "move": {
        const key = take(op.from, step);
        remove(op.from);
        put(op.to, key, step);
        break;
      }
      case "copy":
        put(op.to, take(op.from, step), step);
        break;
      case "delete":
        take(op.path, step);
        remove(op.path);
        break;
      case "transfer": {
        const reason = blocker(op.sourcePath);
        if (reason !== undefined) {
          throw new PlanInvariantError(
            `transfer target ${op.sourcePath} ${reason}`,
            { step, path: op.sourcePath },
          );
        }
        break;
      }
      default:
        assertNever(op);
    }
  });

  if (!source) return;
  const transferred = new Set(
    plan.operations.flatMap((op) => (op.op === "transfer" ? [op.sourcePath] : [])),
  );
  for (const record of source.records) {
    if (transferred.has(record.path)) continue;
    if (present.get(record.path) !== contentKey(record)) {
      throw new PlanInvariantError(
        `plan leaves ${record.path} without its source content`,
        { path: record.path },
      );
    }
  }
}

export type PlanOptions = {
  logger?: Logger;
};

/**
 * Full reconciliation: index the destination, match, resolve renames and
 * assemble. The result is checked by replay before it is returned.
 *
 * Refuses snapshots whose signatures were computed in modes that cannot be
 * compared, since every such file would look like new content.
 */
export function planReconciliation(
  source: Snapshot,
  dest: Snapshot,
  { logger }: PlanOptions = {},
): Plan {
  const conflict = findModeConflict(source, dest);
  if (conflict) {
    throw new SnapshotError(
      `${conflict.path} is hashed ${describeMode(conflict.source)} in the source but ${describeMode(conflict.dest)} in the destination`,
      dest.root,
    );
  }
  const index = buildSignatureIndex(dest);
  const match = matchSnapshots(source, dest, index);
  logger?.debug("matched snapshots", {
    alreadyCorrect: match.alreadyCorrect.length,
    moves: match.moves.length,
    copies: match.copies.length,
    transfers: match.transfers.length,
    deletes: match.deletes.length,
  });
  const reserved = [
    ...source.records.map((r) => r.path),
    ...dest.records.map((r) => r.path),
  ];
  const plan = assemblePlan(match, { reserved });
  checkPlan(plan, dest, source);
  logger?.debug("plan assembled", { ...plan.stats });
  return plan;
}

export function summarizePlan(plan: Plan): string {
  const { stats } = plan;
  const table = new AsciiTable3("Plan")
    .setHeading("Operation", "Count", "Bytes")
    .setStyle("unicode-round");
  table.setAlign(2, AlignmentEnum.RIGHT);
  table.setAlign(3, AlignmentEnum.RIGHT);
  table.addRow("already correct", String(stats.alreadyCorrect), "-");
  table.addRow("move", String(stats.moves), "-");
  table.addRow("copy", String(stats.copies), "-");
  table.addRow("delete", String(stats.deletes), "-");
  table.addRow(
    "needs transfer",
    String(stats.transfers),
    formatBytes(stats.transferBytes),
  );
  return table.toString();
}
