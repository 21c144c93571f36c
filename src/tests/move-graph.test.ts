import { PlanInvariantError } from "../errors.js";
import {
  ScratchAllocator,
  resolveMoves,
  stronglyConnectedComponents,
} from "../move-graph.js";

describe("resolveMoves", () => {
  test("a swap goes through one scratch path", () => {
    const { moves, scratchPaths } = resolveMoves([
      { from: "x.txt", to: "y.txt" },
      { from: "y.txt", to: "x.txt" },
    ]);
    expect(moves).toEqual([
      { from: "x.txt", to: ".x.txt.dirplan-0" },
      { from: "y.txt", to: "x.txt" },
      { from: ".x.txt.dirplan-0", to: "y.txt" },
    ]);
    expect(scratchPaths).toEqual([".x.txt.dirplan-0"]);
  });

  test("a chain runs from its free end backwards", () => {
    const expected = [
      { from: "b", to: "c" },
      { from: "a", to: "b" },
    ];
    expect(
      resolveMoves([
        { from: "a", to: "b" },
        { from: "b", to: "c" },
      ]).moves,
    ).toEqual(expected);
    expect(
      resolveMoves([
        { from: "b", to: "c" },
        { from: "a", to: "b" },
      ]).moves,
    ).toEqual(expected);
  });

  test("a three-way rotation parks the lowest path", () => {
    const { moves, scratchPaths } = resolveMoves([
      { from: "a", to: "b" },
      { from: "b", to: "c" },
      { from: "c", to: "a" },
    ]);
    expect(moves).toEqual([
      { from: "a", to: ".a.dirplan-0" },
      { from: "c", to: "a" },
      { from: "b", to: "c" },
      { from: ".a.dirplan-0", to: "b" },
    ]);
    expect(scratchPaths).toEqual([".a.dirplan-0"]);
  });

  test("independent groups come out ordered by their lowest path", () => {
    const { moves } = resolveMoves([
      { from: "m", to: "n" },
      { from: "q", to: "p" },
      { from: "p", to: "q" },
      { from: "a", to: "b" },
    ]);
    expect(moves).toEqual([
      { from: "a", to: "b" },
      { from: "m", to: "n" },
      { from: "p", to: ".p.dirplan-0" },
      { from: "q", to: "p" },
      { from: ".p.dirplan-0", to: "q" },
    ]);
  });

  test("scratch paths sit next to the parked file", () => {
    const { moves } = resolveMoves([
      { from: "docs/a.md", to: "docs/b.md" },
      { from: "docs/b.md", to: "docs/a.md" },
    ]);
    expect(moves[0]).toEqual({ from: "docs/a.md", to: "docs/.a.md.dirplan-0" });
  });

  test("each cycle gets its own scratch path", () => {
    const { scratchPaths } = resolveMoves([
      { from: "a", to: "b" },
      { from: "b", to: "a" },
      { from: "c", to: "d" },
      { from: "d", to: "c" },
    ]);
    expect(scratchPaths).toEqual([".a.dirplan-0", ".c.dirplan-0"]);
  });

  test("long chains do not exhaust the stack", () => {
    const n = 20000;
    const name = (i: number) => `f${String(i).padStart(6, "0")}`;
    const edges = Array.from({ length: n - 1 }, (_, i) => ({
      from: name(i),
      to: name(i + 1),
    }));
    const { moves } = resolveMoves(edges);
    expect(moves).toHaveLength(n - 1);
    expect(moves[0]).toEqual({ from: name(n - 2), to: name(n - 1) });
    expect(moves[n - 2]).toEqual({ from: name(0), to: name(1) });
  });

  test("a file that must become a directory leaves before anything goes below it", () => {
    expect(
      resolveMoves([
        { from: "b", to: "m/x" },
        { from: "m", to: "z" },
      ]).moves,
    ).toEqual([
      { from: "m", to: "z" },
      { from: "b", to: "m/x" },
    ]);
  });

  test("a directory that must become a file is emptied first", () => {
    expect(
      resolveMoves([
        { from: "c", to: "a" },
        { from: "a/deep/x", to: "b" },
      ]).moves,
    ).toEqual([
      { from: "a/deep/x", to: "b" },
      { from: "c", to: "a" },
    ]);
  });

  test("a move into its own subtree goes through a scratch path", () => {
    expect(resolveMoves([{ from: "a", to: "a/x" }])).toEqual({
      moves: [
        { from: "a", to: ".a.dirplan-0" },
        { from: ".a.dirplan-0", to: "a/x" },
      ],
      scratchPaths: [".a.dirplan-0"],
    });
  });

  test("a move out of a directory onto its name parks outside that directory", () => {
    expect(resolveMoves([{ from: "a/x", to: "a" }])).toEqual({
      moves: [
        { from: "a/x", to: ".x.dirplan-0" },
        { from: ".x.dirplan-0", to: "a" },
      ],
      scratchPaths: [".x.dirplan-0"],
    });
  });

  test("a chain that needs its own free end as a directory is broken", () => {
    const { moves } = resolveMoves([
      { from: "q", to: "y" },
      { from: "y", to: "q/r" },
    ]);
    expect(moves).toEqual([
      { from: "q", to: ".q.dirplan-0" },
      { from: "y", to: "q/r" },
      { from: ".q.dirplan-0", to: "y" },
    ]);
  });

  test("an empty edge list resolves to nothing", () => {
    expect(resolveMoves([])).toEqual({ moves: [], scratchPaths: [] });
  });

  test("malformed graphs are rejected", () => {
    expect(() => resolveMoves([{ from: "a", to: "a" }])).toThrow(
      PlanInvariantError,
    );
    expect(() =>
      resolveMoves([
        { from: "a", to: "b" },
        { from: "a", to: "c" },
      ]),
    ).toThrow("path moved twice: a");
    expect(() =>
      resolveMoves([
        { from: "a", to: "c" },
        { from: "b", to: "c" },
      ]),
    ).toThrow("path targeted twice: c");
  });
});

describe("ScratchAllocator", () => {
  test("skips names that are already in use", () => {
    const scratch = new ScratchAllocator(["x.txt", ".x.txt.dirplan-0"]);
    expect(scratch.next("x.txt")).toBe(".x.txt.dirplan-1");
    expect(scratch.next("x.txt")).toBe(".x.txt.dirplan-2");
    expect(scratch.allocated).toEqual([".x.txt.dirplan-1", ".x.txt.dirplan-2"]);
  });

  test("never hands out a directory a reserved path lives in", () => {
    const scratch = new ScratchAllocator([".x.txt.dirplan-0/inner.txt"]);
    expect(scratch.next("x.txt")).toBe(".x.txt.dirplan-1");
  });

  test("the tag is configurable", () => {
    expect(new ScratchAllocator([], "tmp").next("a/b")).toBe("a/.b.tmp-0");
  });

  test("a colliding scratch name shifts the cycle's parking spot", () => {
    const { moves } = resolveMoves(
      [
        { from: "x", to: "y" },
        { from: "y", to: "x" },
      ],
      new ScratchAllocator(["x", "y", ".x.dirplan-0"]),
    );
    expect(moves[0]).toEqual({ from: "x", to: ".x.dirplan-1" });
  });
});

describe("stronglyConnectedComponents", () => {
  test("finds cycles and emits successors first", () => {
    const graph: Record<string, string[]> = {
      a: ["b"],
      b: ["a", "c"],
      c: [],
      d: ["c"],
    };
    const sccs = stronglyConnectedComponents<string>(["a", "b", "c", "d"], (n) => graph[n] ?? []);
    expect(sccs.map((c) => [...c].sort())).toEqual([["c"], ["a", "b"], ["d"]]);
  });
});
