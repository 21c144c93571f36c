// src/move-graph.ts
import path from "node:path";
import { PlanInvariantError } from "./errors.js";
import type { MoveEdge } from "./matcher.js";
import { ancestorsRel, comparePaths, dirnameRel } from "./path-rel.js";
import { SCRATCH_TAG } from "./constants.js";

/**
 * Hands out parking names for moves that cannot run directly. A scratch path never equals a
 * reserved path, never equals a directory that a reserved path lives in, and
 * is never handed out twice.
 */
export class ScratchAllocator {
  private readonly taken = new Set<string>();
  readonly allocated: string[] = [];

  constructor(
    reserved: Iterable<string> = [],
    private readonly tag: string = SCRATCH_TAG,
  ) {
    for (const p of reserved) this.reserve(p);
  }

  reserve(p: string): void {
    this.taken.add(p);
    for (const dir of ancestorsRel(p)) this.taken.add(dir);
  }

  /** Scratch name beside `near`, e.g. "docs/.a.txt.dirplan-0". */
  next(near: string): string {
    const dir = dirnameRel(near);
    const base = path.posix.basename(near);
    for (let n = 0; ; n += 1) {
      const name = `.${base}.${this.tag}-${n}`;
      const candidate = dir ? `${dir}/${name}` : name;
      if (this.taken.has(candidate)) continue;
      this.taken.add(candidate);
      this.allocated.push(candidate);
      return candidate;
    }
  }
}

export type ResolvedMoves = {
  moves: MoveEdge[];
  // one per move routed through a scratch path, in allocation order
  scratchPaths: string[];
};

type MoveGraph = {
  nodes: string[];
  next: Map<string, string>;
};

/** Throws on a self-loop or on any path used twice as a source or twice as a target. */
export function buildMoveGraph(edges: readonly MoveEdge[]): MoveGraph {
  const next = new Map<string, string>();
  const prev = new Map<string, string>();
  for (const { from, to } of edges) {
    if (from === to) {
      throw new PlanInvariantError(`move onto itself: ${from}`, { from });
    }
    if (next.has(from)) {
      throw new PlanInvariantError(`path moved twice: ${from}`, {
        from,
        targets: [next.get(from), to],
      });
    }
    if (prev.has(to)) {
      throw new PlanInvariantError(`path targeted twice: ${to}`, {
        to,
        sources: [prev.get(to), from],
      });
    }
    next.set(from, to);
    prev.set(to, from);
  }
  const nodes = Array.from(new Set([...next.keys(), ...prev.keys()]));
  nodes.sort(comparePaths);
  return { nodes, next };
}

/**
 * Tarjan's algorithm, iterative so long rename chains cannot exhaust the
 * stack. Components come out in reverse topological order: a component is
 * emitted only after every component reachable from it.
 */
export function stronglyConnectedComponents<T extends string | number>(
  nodes: readonly T[],
  successors: (node: T) => readonly T[],
): T[][] {
  let counter = 0;
  const index = new Map<T, number>();
  const low = new Map<T, number>();
  const onStack = new Set<T>();
  const stack: T[] = [];
  const out: T[][] = [];

  for (const start of nodes) {
    if (index.has(start)) continue;
    const work: { node: T; succ: readonly T[]; i: number }[] = [];
    const enter = (node: T) => {
      index.set(node, counter);
      low.set(node, counter);
      counter += 1;
      stack.push(node);
      onStack.add(node);
      work.push({ node, succ: successors(node), i: 0 });
    };
    enter(start);
    while (work.length) {
      const frame = work[work.length - 1];
      if (frame.i < frame.succ.length) {
        const w = frame.succ[frame.i];
        frame.i += 1;
        if (!index.has(w)) {
          enter(w);
        } else if (onStack.has(w)) {
          low.set(frame.node, Math.min(lowOf(low, frame.node), indexOf(index, w)));
        }
        continue;
      }
      work.pop();
      const v = frame.node;
      if (work.length) {
        const parent = work[work.length - 1].node;
        low.set(parent, Math.min(lowOf(low, parent), lowOf(low, v)));
      }
      if (lowOf(low, v) === indexOf(index, v)) {
        const component: T[] = [];
        let w: T | undefined;
        do {
          w = stack.pop();
          if (w === undefined) {
            throw new PlanInvariantError("tarjan stack underflow");
          }
          onStack.delete(w);
          component.push(w);
        } while (w !== v);
        out.push(component);
      }
    }
  }
  return out;
}

function lowOf<T>(low: Map<T, number>, node: T): number {
  const v = low.get(node);
  if (v === undefined) throw new PlanInvariantError(`unvisited node ${String(node)}`);
  return v;
}

function indexOf<T>(index: Map<T, number>, node: T): number {
  const v = index.get(node);
  if (v === undefined) throw new PlanInvariantError(`unvisited node ${String(node)}`);
  return v;
}

function weakComponents(graph: MoveGraph): Map<string, string> {
  const parent = new Map<string, string>(graph.nodes.map((n) => [n, n]));
  const find = (n: string): string => {
    let r = n;
    for (let p = parent.get(r); p !== undefined && p !== r; p = parent.get(r)) {
      r = p;
    }
    // path compression
    let c = n;
    while (c !== r) {
      const p = parent.get(c) ?? r;
      parent.set(c, r);
      c = p;
    }
    return r;
  };
  for (const [from, to] of graph.next) {
    const a = find(from);
    const b = find(to);
    if (a === b) continue;
    // keep the lexicographically lowest path as representative
    if (comparePaths(a, b) < 0) parent.set(b, a);
    else parent.set(a, b);
  }
  const rep = new Map<string, string>();
  for (const n of graph.nodes) rep.set(n, find(n));
  return rep;
}

type Step = {
  from: string;
  to: string;
  // weak component of the rename graph the step came from
  group: string;
  // second half of a move routed through a scratch path
  parked: boolean;
};

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) list.push(value);
  else map.set(key, [value]);
}

/**
 * For each step, the steps that must run after it. The file at a step's
 * `from` has to be gone before anything is written at that path, at one of
 * its parent directories, or below it.
 */
function precedence(
  steps: readonly Step[],
  halves: ReadonlyMap<number, number>,
): number[][] {
  const byTo = new Map<string, number>();
  const byTargetDir = new Map<string, number[]>();
  steps.forEach((s, i) => {
    byTo.set(s.to, i);
    for (const dir of ancestorsRel(s.to)) pushTo(byTargetDir, dir, i);
  });
  return steps.map((s, i) => {
    const out: number[] = [];
    const second = halves.get(i);
    if (second !== undefined) out.push(second);
    if (s.parked) return out;
    for (const p of [s.from, ...ancestorsRel(s.from)]) {
      const j = byTo.get(p);
      if (j !== undefined) out.push(j);
    }
    out.push(...(byTargetDir.get(s.from) ?? []));
    return out;
  });
}

// a parked file must not sit below a path that some move turns into a file
function parkingSpot(from: string, targets: ReadonlySet<string>): string {
  const dirs = ancestorsRel(from);
  const blocked = dirs.findIndex((d) => targets.has(d));
  if (blocked === -1) return from;
  const base = path.posix.basename(from);
  return blocked === 0 ? base : `${dirs[blocked - 1]}/${base}`;
}

class MinHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly less: (a: T, b: T) => boolean) {}

  push(item: T): void {
    const items = this.items;
    items.push(item);
    let i = items.length - 1;
    while (i > 0) {
      const up = (i - 1) >> 1;
      if (!this.less(items[i], items[up])) break;
      [items[i], items[up]] = [items[up], items[i]];
      i = up;
    }
  }

  pop(): T | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (!items.length || last === undefined) return top;
    items[0] = last;
    let i = 0;
    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let m = i;
      if (l < items.length && this.less(items[l], items[m])) m = l;
      if (r < items.length && this.less(items[r], items[m])) m = r;
      if (m === i) break;
      [items[i], items[m]] = [items[m], items[i]];
      i = m;
    }
    return top;
  }
}

// Kahn's algorithm; among the steps that may run, the lowest group goes first
function runOrder(steps: readonly Step[], succ: readonly number[][]): MoveEdge[] {
  const indegree = new Array<number>(steps.length).fill(0);
  for (const list of succ) for (const j of list) indegree[j] += 1;
  const ready = new MinHeap<number>(
    (a, b) =>
      (comparePaths(steps[a].group, steps[b].group) ||
        comparePaths(steps[a].to, steps[b].to)) < 0,
  );
  indegree.forEach((n, i) => {
    if (n === 0) ready.push(i);
  });
  const out: MoveEdge[] = [];
  for (let i = ready.pop(); i !== undefined; i = ready.pop()) {
    out.push({ from: steps[i].from, to: steps[i].to });
    for (const j of succ[i]) {
      indegree[j] -= 1;
      if (indegree[j] === 0) ready.push(j);
    }
  }
  if (out.length !== steps.length) {
    throw new PlanInvariantError("move order still has a cycle", {
      ordered: out.length,
      steps: steps.length,
    });
  }
  return out;
}

/**
 * Order a set of destination renames so that no move overwrites a file that
 * still has to go somewhere else, writes below a file that has not left yet,
 * or writes where a directory still holds a file that has to leave.
 *
 * Where those constraints form a cycle (a rename cycle, or `a` moving to
 * `a/x`), the move with the lowest source is routed through a scratch path:
 * it parks its file first and the parked file reaches its target last.
 * Steps that are free to run go in order of their group's lowest path, so a
 * plain rename chain still runs from its free end backwards.
 */
export function resolveMoves(
  edges: readonly MoveEdge[],
  scratch: ScratchAllocator = new ScratchAllocator(
    edges.flatMap((e) => [e.from, e.to]),
  ),
): ResolvedMoves {
  const graph = buildMoveGraph(edges);
  const groups = weakComponents(graph);
  const steps: Step[] = Array.from(graph.next, ([from, to]) => ({
    from,
    to,
    group: groups.get(from) ?? from,
    parked: false,
  }));
  const targets = new Set(steps.map((s) => s.to));
  const halves = new Map<number, number>();
  const scratchPaths: string[] = [];

  for (;;) {
    const succ = precedence(steps, halves);
    const tangled = stronglyConnectedComponents(
      steps.map((_, i) => i),
      (i) => succ[i],
    ).filter((scc) => scc.length > 1 || succ[scc[0]].includes(scc[0]));
    if (!tangled.length) {
      return { moves: runOrder(steps, succ), scratchPaths };
    }
    const picks = tangled
      .map((scc) =>
        scc.reduce((a, b) => (comparePaths(steps[b].from, steps[a].from) < 0 ? b : a)),
      )
      .sort((a, b) => comparePaths(steps[a].from, steps[b].from));
    for (const i of picks) {
      const step = steps[i];
      if (halves.has(i)) {
        throw new PlanInvariantError(`cannot order the move of ${step.from}`, {
          from: step.from,
        });
      }
      const parkedAt = scratch.next(parkingSpot(step.from, targets));
      steps.push({ from: parkedAt, to: step.to, group: step.group, parked: true });
      steps[i] = { ...step, to: parkedAt };
      halves.set(i, steps.length - 1);
      scratchPaths.push(parkedAt);
    }
  }
}
