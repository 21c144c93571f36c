// src/duplicates.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import { buildSignatureIndex } from "./signature-index.js";
import { comparePaths } from "./path-rel.js";
import { recordsByPath, type ContentKey, type Snapshot } from "./snapshot.js";
import { formatBytes } from "./util.js";

export type DuplicateGroup = {
  key: ContentKey;
  size: number;
  signature: string;
  paths: string[];
};

/**
 * Groups of two or more paths sharing content within one snapshot. Members
 * are sorted by path and groups by their first member, so the result does not
 * depend on the order records arrived in.
 */
export function findDuplicateGroups(snapshot: Snapshot): DuplicateGroup[] {
  const byPath = recordsByPath(snapshot);
  const groups: DuplicateGroup[] = [];
  for (const [key, paths] of buildSignatureIndex(snapshot)) {
    if (paths.length < 2) continue;
    const first = byPath.get(paths[0]);
    if (!first) continue;
    groups.push({
      key,
      size: first.size,
      signature: first.signature,
      paths: [...paths],
    });
  }
  groups.sort((a, b) => comparePaths(a.paths[0], b.paths[0]));
  return groups;
}

export function formatDuplicateGroups(groups: readonly DuplicateGroup[]): string {
  const table = new AsciiTable3("Duplicates")
    .setHeading("Group", "Size", "Path")
    .setStyle("unicode-round");
  // ascii-table3 columns are 1-based
  table.setAlign(2, AlignmentEnum.RIGHT);
  table.setAlign(3, AlignmentEnum.LEFT);
  groups.forEach((group, i) => {
    group.paths.forEach((p, j) => {
      table.addRow(
        j === 0 ? String(i + 1) : "",
        j === 0 ? formatBytes(group.size) : "",
        p,
      );
    });
  });
  return table.toString();
}
