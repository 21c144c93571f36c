import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { makeSnapshot, type FileRecord, type Snapshot } from "../snapshot.js";

/** Record whose size defaults to the signature's length, like a tiny text file. */
export function rec(p: string, signature: string, size = signature.length): FileRecord {
  return { path: p, size, signature, signatureMode: { kind: "full" } };
}

export function snap(
  records: Record<string, string> | FileRecord[],
  root = "/tree",
): Snapshot {
  const list = Array.isArray(records)
    ? records
    : Object.entries(records).map(([p, sig]) => rec(p, sig));
  return makeSnapshot(root, list);
}

export async function makeTmp(prefix: string): Promise<string> {
  return await fsp.realpath(
    await fsp.mkdtemp(path.join(os.tmpdir(), `dirplan-${prefix}-`)),
  );
}

export async function writeTree(
  root: string,
  files: Record<string, string | Buffer>,
): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    await fsp.mkdir(path.dirname(abs), { recursive: true });
    await fsp.writeFile(abs, content);
  }
}
