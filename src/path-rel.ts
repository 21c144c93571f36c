// src/path-rel.ts
import path from "node:path";

// Catalog paths are always posix-style and relative to the catalog root.
export function toRel(abs: string, root: string): string {
  if (abs === root) return "";
  if (root === "/") return abs.replace(/^\/+/, "");
  if (abs.startsWith(root + "/")) return abs.slice(root.length + 1);
  const r = path.posix.resolve(root);
  const a = path.posix.resolve(abs);
  return a.startsWith(r + "/") ? a.slice(r.length + 1) : a;
}

export function toAbs(rel: string, root: string): string {
  if (!rel) return root;
  return root.endsWith("/") ? `${root}${rel}` : `${root}/${rel}`;
}

export function isWithin(abs: string, root: string): boolean {
  if (root === "/") return abs.startsWith("/");
  return abs === root || abs.startsWith(root + "/");
}

/** Deepest directory enclosing every one of `roots` (absolute paths). */
export function commonRoot(roots: readonly string[]): string {
  if (!roots.length) throw new Error("commonRoot needs at least one path");
  let base = roots[0];
  for (const r of roots.slice(1)) {
    while (!isWithin(r, base)) base = path.dirname(base);
  }
  return base;
}

export function dirnameRel(rel: string): string {
  if (!rel) return "";
  const dir = path.posix.dirname(rel);
  return dir === "." ? "" : dir;
}

/** "a/b/c.txt" -> ["a", "a/b"] */
export function ancestorsRel(rel: string): string[] {
  const out: string[] = [];
  let i = rel.indexOf("/");
  while (i !== -1) {
    out.push(rel.slice(0, i));
    i = rel.indexOf("/", i + 1);
  }
  return out;
}

export function isValidRelPath(rel: string): boolean {
  if (!rel || rel.startsWith("/")) return false;
  return rel
    .split("/")
    .every((seg) => seg !== "" && seg !== "." && seg !== "..");
}

export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function prepareRoot(p: string): string {
  let expanded = p;
  if (expanded === "~" || expanded.startsWith("~/")) {
    const home = process.env.HOME ?? "";
    expanded = home + expanded.slice(1);
  }
  return path.resolve(expanded);
}
