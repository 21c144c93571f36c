// src/script.ts
import fs from "node:fs/promises";
import { CLI_NAME, VERSION } from "./constants.js";
import { assertNever, type Plan } from "./plan.js";
import { recordsByPath, type Snapshot } from "./snapshot.js";
import { formatBytes } from "./util.js";

export function shellQuote(s: string): string {
  return `'${s.replace(/'/g, `'\\''`)}'`;
}

// "./" keeps a name starting with "-" from being read as an option
function rel(p: string): string {
  return shellQuote(`./${p}`);
}

export type ScriptOptions = {
  destRoot: string;
  sourceRoot?: string;
  // sizes let the script notice files that changed after the snapshot
  dest?: Snapshot;
  generatedAt?: Date;
};

// Every helper refuses to act when the tree no longer looks like the
// snapshot the plan was made from.
const HELPERS = `
MVFLAGS="\${MVFLAGS:-}"
CPFLAGS="\${CPFLAGS:---reflink=auto}"
RMFLAGS="\${RMFLAGS:-}"

dp_fail() {
  echo "${CLI_NAME}: $*" >&2
  exit 1
}

dp_check_src() {
  [ -f "$1" ] || dp_fail "missing source: $1"
  if [ -n "$2" ]; then
    size=$(wc -c < "$1" | tr -d ' ')
    [ "$size" = "$2" ] || dp_fail "size of $1 changed ($size, expected $2)"
  fi
}

dp_prepare_target() {
  if [ -d "$1" ] && [ ! -L "$1" ]; then
    # only directories left empty by earlier moves go
    find "$1" -depth -type d -exec rmdir {} \\; 2>/dev/null || :
    [ ! -e "$1" ] || dp_fail "refusing to replace directory: $1"
  fi
  if [ -e "$1" ] || [ -L "$1" ]; then
    dp_fail "refusing to overwrite: $1"
  fi
  dir=$(dirname "$1")
  if [ "$dir" != "." ]; then
    mkdir -p "$dir" || dp_fail "cannot create directory: $dir"
  fi
}

dp_mv() {
  dp_check_src "$1" "$3"
  dp_prepare_target "$2"
  mv $MVFLAGS -- "$1" "$2"
}

dp_cp() {
  dp_check_src "$1" "$3"
  dp_prepare_target "$2"
  cp $CPFLAGS -- "$1" "$2"
}

dp_rm() {
  if [ ! -f "$1" ]; then
    echo "${CLI_NAME}: already gone: $1" >&2
    return 0
  fi
  if [ -n "$2" ]; then
    size=$(wc -c < "$1" | tr -d ' ')
    if [ "$size" != "$2" ]; then
      echo "${CLI_NAME}: keeping $1, size changed ($size, expected $2)" >&2
      return 0
    fi
  fi
  rm $RMFLAGS -- "$1"
}
`;

/**
 * Render `plan` as a POSIX shell script that runs inside the destination
 * root. Moves and copies refuse to clobber anything; transfers become
 * comments naming what still has to come from the source.
 */
export function renderScript(plan: Plan, opts: ScriptOptions): string {
  // expected size of whatever sits at a path at this point of the script
  const sizes = new Map<string, number>();
  if (opts.dest) {
    for (const [p, r] of recordsByPath(opts.dest)) sizes.set(p, r.size);
  }
  const sizeOf = (p: string) => {
    const n = sizes.get(p);
    return n === undefined ? "''" : String(n);
  };

  const carry = (from: string, to: string) => {
    const n = sizes.get(from);
    if (n === undefined) sizes.delete(to);
    else sizes.set(to, n);
  };

  const lines: string[] = [
    "#!/bin/sh -e",
    `# generated by ${CLI_NAME} ${VERSION}${
      opts.generatedAt ? ` at ${opts.generatedAt.toISOString()}` : ""
    }`,
  ];
  if (opts.sourceRoot) lines.push(`# source:      ${opts.sourceRoot}`);
  lines.push(`# destination: ${opts.destRoot}`);
  lines.push(
    `# ${plan.stats.moves} moves, ${plan.stats.copies} copies, ${plan.stats.deletes} deletes, ${plan.stats.transfers} to transfer (${formatBytes(plan.stats.transferBytes)})`,
  );
  // a shebang flag is lost when the script is run as "sh script"
  lines.push("set -e", HELPERS);
  lines.push(`cd ${shellQuote(opts.destRoot)}`, "");

  for (const op of plan.operations) {
    switch (op.op) {
      case "move":
        lines.push(
          `dp_mv ${rel(op.from)} ${rel(op.to)} ${sizeOf(op.from)}`,
        );
        carry(op.from, op.to);
        sizes.delete(op.from);
        break;
      case "copy":
        lines.push(
          `dp_cp ${rel(op.from)} ${rel(op.to)} ${sizeOf(op.from)}`,
        );
        carry(op.from, op.to);
        break;
      case "delete":
        lines.push(`dp_rm ${rel(op.path)} ${sizeOf(op.path)}`);
        sizes.delete(op.path);
        break;
      case "transfer":
        lines.push(
          `# missing on destination: ${shellQuote(op.sourcePath)} (${formatBytes(op.size)})`,
        );
        break;
      default:
        assertNever(op);
    }
  }
  lines.push("");
  return lines.join("\n");
}

export async function writeScript(file: string, text: string): Promise<void> {
  await fs.writeFile(file, text, { mode: 0o755 });
}
