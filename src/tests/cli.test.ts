import fsp from "node:fs/promises";
import path from "node:path";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { buildProgram } from "../cli.js";
import { loadConfig } from "../config.js";
import { memoryLogger } from "../logger.js";
import { makeTmp, writeTree } from "./fixtures.js";

const execFileAsync = promisify(execFile);

async function run(args: string[]): Promise<string[]> {
  const out: string[] = [];
  const { logger } = memoryLogger("debug");
  const program = buildProgram(
    { out: (text) => out.push(text), logger },
    loadConfig({}),
  ).exitOverride();
  await program.parseAsync(["node", "dirplan", ...args]);
  return out;
}

describe("dirplan command line", () => {
  let tmp: string;
  let src: string;
  let dst: string;
  let script: string;

  beforeEach(async () => {
    tmp = await makeTmp("cli");
    src = path.join(tmp, "src");
    dst = path.join(tmp, "dst");
    script = path.join(tmp, "update.sh");
    await writeTree(src, {
      "a.txt": "alpha",
      "b.txt": "beta",
      "docs/c.txt": "alpha",
      "new.txt": "fresh",
    });
    await writeTree(dst, {
      "a.txt": "beta",
      "b.txt": "alpha",
      "junk.txt": "junk",
    });
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("update, diff and run the script", async () => {
    const updated = await run(["update", src, dst]);
    expect(updated).toHaveLength(1);
    expect(updated[0]).toContain(path.join(src, ".dir.db"));
    expect(updated[0]).toContain(path.join(dst, ".dir.db"));

    const out = await run(["diff", "--source", src, "--dest", dst, "--script", script]);
    expect(out[1]).toBe("still to transfer: 5 B");

    const text = await fsp.readFile(script, "utf8");
    const lines = text.split("\n");
    expect(lines.slice(lines.indexOf(`cd '${dst}'`) + 2)).toEqual([
      "dp_mv './a.txt' './.a.txt.dirplan-0' 4",
      "dp_mv './b.txt' './a.txt' 5",
      "dp_mv './.a.txt.dirplan-0' './b.txt' 4",
      "dp_cp './a.txt' './docs/c.txt' 5",
      "dp_rm './junk.txt' 4",
      "# missing on destination: 'new.txt' (5 B)",
      "",
    ]);

    await execFileAsync("sh", ["-e", script], {
      env: { ...process.env, CPFLAGS: "-p" },
    });
    expect(await fsp.readFile(path.join(dst, "a.txt"), "utf8")).toBe("alpha");
    expect(await fsp.readFile(path.join(dst, "b.txt"), "utf8")).toBe("beta");
    expect(await fsp.readFile(path.join(dst, "docs/c.txt"), "utf8")).toBe("alpha");
    expect((await fsp.readdir(dst)).sort()).toEqual([".dir.db", "a.txt", "b.txt", "docs"]);

    // after the script only the missing file is left
    const again = await run([
      "diff",
      "--source",
      src,
      "--dest",
      dst,
      "--script",
      script,
      "--update",
    ]);
    expect(again[1]).toBe("still to transfer: 5 B");
    const rerun = (await fsp.readFile(script, "utf8")).split("\n");
    expect(rerun.slice(rerun.indexOf(`cd '${dst}'`) + 2)).toEqual([
      "# missing on destination: 'new.txt' (5 B)",
      "",
    ]);
  });

  test("the script refuses to act on a file that changed", async () => {
    await run(["update", src, dst]);
    await run(["diff", "--source", src, "--dest", dst, "--script", script]);
    await fsp.writeFile(path.join(dst, "a.txt"), "beta, but edited");
    await expect(
      execFileAsync("sh", ["-e", script], { env: { ...process.env, CPFLAGS: "-p" } }),
    ).rejects.toThrow(/size of \.\/a\.txt changed/);
    // nothing was moved
    expect(await fsp.readFile(path.join(dst, "b.txt"), "utf8")).toBe("alpha");
  });

  test("dups lists identical files", async () => {
    await run(["update", src]);
    const out = await run(["dups", src]);
    expect(out).toHaveLength(1);
    expect(out[0]).toContain("a.txt");
    expect(out[0]).toContain("docs/c.txt");
    expect(out[0]).not.toContain("new.txt");
  });

  test("dups reports when there are none", async () => {
    await run(["update", dst]);
    expect(await run(["dups", dst])).toEqual([`no duplicates under ${dst}`]);
  });

  test("update --list-dups prints the groups after the stats", async () => {
    const out = await run(["update", "--list-dups", src]);
    expect(out).toHaveLength(2);
    expect(out[1]).toContain("docs/c.txt");
  });

  test("diff refuses nested roots", async () => {
    await expect(
      run(["diff", "--source", src, "--dest", path.join(src, "docs")]),
    ).rejects.toThrow(/overlap/);
  });

  test("diff needs catalogs on both sides", async () => {
    await run(["update", src]);
    await expect(
      run(["diff", "--source", src, "--dest", dst, "--script", script]),
    ).rejects.toThrow(/no \.dir\.db catalog found under/);
  });

  test("diff refuses sides hashed with different algorithms", async () => {
    await run(["--hash", "sha1", "update", src]);
    await run(["update", dst]);
    await expect(
      run(["diff", "--source", src, "--dest", dst, "--script", script]),
    ).rejects.toThrow("source catalogs use sha1 but destination catalogs use sha256");
  });

  test("diff checks an explicit --hash against the catalogs", async () => {
    await run(["update", src, dst]);
    await expect(
      run(["--hash", "sha1", "diff", "-s", src, "-d", dst, "--script", script]),
    ).rejects.toThrow(`catalogs under ${src} use sha256, not sha1; pass --update to rehash`);
  });

  test("diff refuses sides hashed in modes that cannot be compared", async () => {
    const s = path.join(tmp, "mode-src");
    const d = path.join(tmp, "mode-dst");
    const big = Buffer.alloc(20000, 7);
    await writeTree(s, { "big.bin": big });
    await writeTree(d, { "old.bin": big });
    await run(["--no-partial-hash", "update", s]);
    await run(["update", d]);

    await expect(run(["diff", "-s", s, "-d", d, "--script", script])).rejects.toThrow(
      "big.bin is hashed full in the source but partial:4096 in the destination",
    );
    await expect(
      run(["--no-partial-hash", "diff", "-s", s, "-d", d, "--script", script]),
    ).rejects.toThrow(`old.bin under ${d} is hashed partial:4096, not full`);

    const out = await run(["diff", "-s", s, "-d", d, "--script", script, "--update"]);
    expect(out[1]).toBe("still to transfer: 0 B");
    const lines = (await fsp.readFile(script, "utf8")).split("\n");
    expect(lines.slice(lines.indexOf(`cd '${d}'`) + 2)).toEqual([
      "dp_mv './old.bin' './big.bin' 20000",
      "",
    ]);
  });

  test("files and directories trading places run in a safe order", async () => {
    const s = path.join(tmp, "shape-src");
    const d = path.join(tmp, "shape-dst");
    await writeTree(s, { z: "one", "m/x": "two", k: "three", j: "four" });
    await writeTree(d, { m: "one", b: "two", "j/deep/x": "three", c: "four" });
    await run(["update", s, d]);
    await run(["diff", "-s", s, "-d", d, "--script", script]);

    const lines = (await fsp.readFile(script, "utf8")).split("\n");
    expect(lines.slice(lines.indexOf(`cd '${d}'`) + 2)).toEqual([
      "dp_mv './j/deep/x' './k' 5",
      "dp_mv './c' './j' 4",
      "dp_mv './m' './z' 3",
      "dp_mv './b' './m/x' 3",
      "",
    ]);

    await execFileAsync("sh", [script]);
    expect(await fsp.readFile(path.join(d, "z"), "utf8")).toBe("one");
    expect(await fsp.readFile(path.join(d, "m/x"), "utf8")).toBe("two");
    expect(await fsp.readFile(path.join(d, "k"), "utf8")).toBe("three");
    expect(await fsp.readFile(path.join(d, "j"), "utf8")).toBe("four");
    expect((await fsp.readdir(d)).sort()).toEqual([".dir.db", "j", "k", "m", "z"]);
  });

  test("several roots per side line up by their place under a common directory", async () => {
    const s = path.join(tmp, "multi-src");
    const d = path.join(tmp, "multi-dst");
    await writeTree(s, { "a/one.txt": "uno", "b/two.txt": "dos!" });
    await writeTree(d, { "a/two.txt": "dos!", "b/one.txt": "uno", "other/x.txt": "x" });
    const [sa, sb, da, db] = [
      path.join(s, "a"),
      path.join(s, "b"),
      path.join(d, "a"),
      path.join(d, "b"),
    ];
    await run(["update", sa, sb, da, db]);
    const out = await run([
      "diff",
      "-s",
      sa,
      "-s",
      sb,
      "-d",
      da,
      "-d",
      db,
      "--script",
      script,
    ]);
    expect(out[1]).toBe("still to transfer: 0 B");

    const lines = (await fsp.readFile(script, "utf8")).split("\n");
    expect(lines.slice(lines.indexOf(`cd '${d}'`) + 2)).toEqual([
      "dp_mv './b/one.txt' './a/one.txt' 3",
      "dp_mv './a/two.txt' './b/two.txt' 4",
      "",
    ]);

    await execFileAsync("sh", [script]);
    expect(await fsp.readFile(path.join(da, "one.txt"), "utf8")).toBe("uno");
    expect(await fsp.readFile(path.join(db, "two.txt"), "utf8")).toBe("dos!");
    expect(await fsp.readFile(path.join(d, "other/x.txt"), "utf8")).toBe("x");
    expect((await fsp.readdir(da)).sort()).toEqual([".dir.db", "one.txt"]);
  });

  test("roots that do not line up are refused", async () => {
    await expect(
      run([
        "diff",
        "-s",
        path.join(src, "a"),
        "-s",
        path.join(src, "b"),
        "-d",
        dst,
        "--script",
        script,
      ]),
    ).rejects.toThrow("source roots (a, b) do not line up with destination roots (.)");
  });

  test("a custom catalog name is honored", async () => {
    await run(["--catalog-name", ".idx.db", "update", src]);
    expect((await fsp.readdir(src)).sort()).toEqual([
      ".idx.db",
      "a.txt",
      "b.txt",
      "docs",
      "new.txt",
    ]);
  });

  test("rejects a bad partial hash size", async () => {
    await expect(run(["--partial-hash-size", "0", "update", src])).rejects.toThrow(
      "--partial-hash-size must be a positive integer, got '0'",
    );
  });
});
