// src/signature-index.ts
import { comparePaths } from "./path-rel.js";
import { contentKey, type ContentKey, type Snapshot } from "./snapshot.js";

export type SignatureIndex = ReadonlyMap<ContentKey, readonly string[]>;

export function buildSignatureIndex(snapshot: Snapshot): SignatureIndex {
  const index = new Map<ContentKey, string[]>();
  for (const record of snapshot.records) {
    const key = contentKey(record);
    const paths = index.get(key);
    if (paths) {
      paths.push(record.path);
    } else {
      index.set(key, [record.path]);
    }
  }
  for (const paths of index.values()) {
    paths.sort(comparePaths);
  }
  return index;
}
