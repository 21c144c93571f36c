#!/usr/bin/env node
// src/cli.ts
import path from "node:path";
import { Command, Option } from "commander";
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import {
  CatalogStore,
  loadHierarchy,
  loadRoots,
  type Hierarchy,
} from "./catalog.js";
import { loadConfig, type DirplanConfig } from "./config.js";
import { CLI_NAME, VERSION } from "./constants.js";
import { findDuplicateGroups, formatDuplicateGroups } from "./duplicates.js";
import { CatalogError } from "./errors.js";
import { describeMode, listSupportedHashes, defaultHashAlg } from "./hash.js";
import { collectIgnoreOption } from "./ignore.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  parseLogLevel,
  type Logger,
} from "./logger.js";
import {
  commonRoot,
  comparePaths,
  isWithin,
  prepareRoot,
  toRel,
} from "./path-rel.js";
import { planReconciliation, summarizePlan } from "./plan.js";
import { updateCatalogs, type CatalogUpdateStats } from "./scan.js";
import { renderScript, writeScript } from "./script.js";
import {
  effectiveMode,
  findModeConflict,
  type SignatureMode,
} from "./snapshot.js";
import { formatBytes, parsePositiveInt } from "./util.js";

type GlobalOpts = {
  logLevel?: string;
  catalogName: string;
  hash: string;
  partialHash?: boolean;
  partialHashSize: number;
};

export type CliIo = {
  out: (text: string) => void;
  logger?: Logger;
};

type Context = {
  logger: Logger;
  store: CatalogStore;
  mode: SignatureMode;
  hash: string;
};

function readGlobals(command: Command): GlobalOpts {
  const g = command.optsWithGlobals<GlobalOpts>();
  return {
    logLevel: g.logLevel,
    catalogName: g.catalogName,
    hash: g.hash,
    partialHash: g.partialHash,
    partialHashSize: g.partialHashSize,
  };
}

function contextFor(command: Command, io: CliIo): Context {
  const globals = readGlobals(command);
  const logger =
    io.logger ?? new ConsoleLogger(parseLogLevel(globals.logLevel, "info"));
  const mode: SignatureMode =
    globals.partialHash === false
      ? { kind: "full" }
      : { kind: "partial", window: globals.partialHashSize };
  return {
    logger,
    store: new CatalogStore({ catalogName: globals.catalogName, logger }),
    mode,
    hash: globals.hash,
  };
}

function noPatterns(): string[] {
  return [];
}

function collectRoot(value: string, previous?: string[]): string[] {
  return [...(previous ?? []), value];
}

function intOption(label: string) {
  return (value: string) => parsePositiveInt(value, label);
}

function formatUpdateStats(rows: readonly CatalogUpdateStats[]): string {
  const table = new AsciiTable3("Catalogs")
    .setHeading("Catalog", "Files", "Kept", "Hashed", "Removed", "Failed")
    .setStyle("unicode-round");
  table.setAlign(1, AlignmentEnum.LEFT);
  [2, 3, 4, 5, 6].forEach((idx) => table.setAlign(idx, AlignmentEnum.RIGHT));
  for (const r of rows) {
    table.addRow(
      r.error ? `${r.catalog} (${r.error})` : r.catalog,
      String(r.files),
      String(r.kept),
      String(r.hashed),
      String(r.removed),
      String(r.failed),
    );
  }
  return table.toString();
}

type Side = {
  base: string;
  roots: string[];
};

function resolveSide(label: string, raw: readonly string[]): Side {
  const roots = Array.from(new Set(raw.map(prepareRoot))).sort(comparePaths);
  for (const a of roots) {
    for (const b of roots) {
      if (a !== b && isWithin(b, a)) {
        throw new Error(`${label} roots ${a} and ${b} overlap`);
      }
    }
  }
  return { base: commonRoot(roots), roots };
}

// where each root sits below its side's common directory
function rootLayout(side: Side): string {
  return side.roots.map((r) => toRel(r, side.base) || ".").join(", ");
}

function pairSides(sourceRoots: readonly string[], destRoots: readonly string[]) {
  const source = resolveSide("source", sourceRoots);
  const dest = resolveSide("destination", destRoots);
  for (const s of source.roots) {
    for (const d of dest.roots) {
      if (isWithin(s, d) || isWithin(d, s)) {
        throw new Error(`source ${s} and destination ${d} overlap`);
      }
    }
  }
  if (rootLayout(source) !== rootLayout(dest)) {
    throw new Error(
      `source roots (${rootLayout(source)}) do not line up with destination roots (${rootLayout(dest)})`,
    );
  }
  return { source, dest };
}

// catalogs hashed some other way than the command line asks for
function checkRequested(
  sides: readonly Hierarchy[],
  ctx: Context,
  requested: { hash: boolean; mode: boolean },
): void {
  for (const side of sides) {
    if (requested.hash && side.hashAlg && side.hashAlg !== ctx.hash) {
      throw new CatalogError(
        `catalogs under ${side.root} use ${side.hashAlg}, not ${ctx.hash}; pass --update to rehash`,
        side.root,
      );
    }
    if (!requested.mode) continue;
    const stale = side.snapshot.records.find(
      (r) =>
        describeMode(effectiveMode(r)) !==
        describeMode(effectiveMode({ size: r.size, signatureMode: ctx.mode })),
    );
    if (stale) {
      throw new CatalogError(
        `${stale.path} under ${side.root} is hashed ${describeMode(stale.signatureMode)}, not ${describeMode(ctx.mode)}; pass --update to rehash`,
        side.root,
      );
    }
  }
}

async function listDuplicates(
  roots: readonly string[],
  ctx: Context,
  io: CliIo,
): Promise<void> {
  for (const root of roots) {
    const { snapshot } = await loadHierarchy(root, ctx.store, {
      logger: ctx.logger,
    });
    const groups = findDuplicateGroups(snapshot);
    if (!groups.length) {
      io.out(`no duplicates under ${root}`);
      continue;
    }
    io.out(formatDuplicateGroups(groups));
  }
}

export function buildProgram(
  io: CliIo = { out: (text) => console.log(text) },
  config: DirplanConfig = loadConfig(),
): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description(
      "Plan the moves, copies and deletes that make a destination tree match a source tree, using per-directory catalogs of content signatures",
    )
    .version(VERSION);

  program
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
      "info",
    )
    .option(
      "--catalog-name <name>",
      "file name of the per-directory catalog",
      config.catalogName,
    )
    .addOption(
      new Option(
        "--hash <algorithm>",
        "content hash algorithm for update; diff checks existing catalogs against it",
      )
        .choices(listSupportedHashes())
        .default(defaultHashAlg()),
    )
    .option(
      "-P, --partial-hash",
      "hash only the first and last bytes of large files (default)",
    )
    .option("--no-partial-hash", "hash whole files")
    .option(
      "--partial-hash-size <bytes>",
      "bytes hashed from each end of a file in partial mode",
      intOption("--partial-hash-size"),
      config.partialWindow,
    );

  program
    .command("update")
    .description("Create or refresh the catalogs under each root")
    .argument("[roots...]", "directories to catalog (default: current directory)")
    .option(
      "--concurrency <n>",
      "files hashed at the same time",
      intOption("--concurrency"),
      config.concurrency,
    )
    .option(
      "-i, --ignore <pattern>",
      "gitignore-style ignore rule (repeat or comma-separated)",
      collectIgnoreOption,
      noPatterns(),
    )
    .option("--list-dups", "list files with identical content afterwards", false)
    .action(
      async (
        roots: string[],
        opts: { concurrency: number; ignore: string[]; listDups: boolean },
        command: Command,
      ) => {
        const ctx = contextFor(command, io);
        const targets = (roots.length ? roots : [process.cwd()]).map(prepareRoot);
        const stats = await updateCatalogs(targets, {
          store: ctx.store,
          mode: ctx.mode,
          hash: ctx.hash,
          concurrency: opts.concurrency,
          ignore: opts.ignore,
          excludePaths: [path.resolve(config.scriptName)],
          logger: ctx.logger,
        });
        io.out(formatUpdateStats(stats));
        if (opts.listDups) {
          await listDuplicates(targets, ctx, io);
        }
        if (stats.some((s) => s.error)) {
          process.exitCode = 1;
        }
      },
    );

  program
    .command("diff")
    .description(
      "Write a shell script that turns the destination into the source without re-transferring content it already has",
    )
    .option(
      "-s, --source <dir>",
      "source root; repeat to combine several (default: current directory)",
      collectRoot,
    )
    .requiredOption(
      "-d, --dest <dir>",
      "destination root; repeat to combine several laid out like the sources",
      collectRoot,
    )
    .option("--script <file>", "script to write", config.scriptName)
    .option("-u, --update", "refresh both sides' catalogs first", false)
    .option(
      "-i, --ignore <pattern>",
      "gitignore-style ignore rule (repeat or comma-separated)",
      collectIgnoreOption,
      noPatterns(),
    )
    .action(
      async (
        opts: {
          source?: string[];
          dest: string[];
          script: string;
          update: boolean;
          ignore: string[];
        },
        command: Command,
      ) => {
        const ctx = contextFor(command, io);
        const sides = pairSides(opts.source ?? [process.cwd()], opts.dest);
        const scriptPath = path.resolve(opts.script);
        if (opts.update) {
          await updateCatalogs([...sides.source.roots, ...sides.dest.roots], {
            store: ctx.store,
            mode: ctx.mode,
            hash: ctx.hash,
            ignore: opts.ignore,
            excludePaths: [scriptPath],
            logger: ctx.logger,
          });
        }
        const load = { ignore: opts.ignore, logger: ctx.logger };
        const source = await loadRoots(sides.source.roots, ctx.store, load);
        const dest = await loadRoots(sides.dest.roots, ctx.store, load);
        if (!opts.update) {
          const given = (key: string) => program.getOptionValueSource(key) === "cli";
          checkRequested([source, dest], ctx, {
            hash: given("hash"),
            mode: given("partialHash") || given("partialHashSize"),
          });
        }
        if (source.hashAlg && dest.hashAlg && source.hashAlg !== dest.hashAlg) {
          throw new CatalogError(
            `source catalogs use ${source.hashAlg} but destination catalogs use ${dest.hashAlg}`,
            dest.root,
          );
        }
        const conflict = findModeConflict(source.snapshot, dest.snapshot);
        if (conflict) {
          throw new CatalogError(
            `${conflict.path} is hashed ${describeMode(conflict.source)} in the source but ${describeMode(conflict.dest)} in the destination; pass --update to rehash both sides alike`,
            dest.root,
          );
        }
        const plan = planReconciliation(source.snapshot, dest.snapshot, {
          logger: ctx.logger,
        });
        const text = renderScript(plan, {
          sourceRoot: source.root,
          destRoot: dest.root,
          dest: dest.snapshot,
          generatedAt: new Date(),
        });
        await writeScript(scriptPath, text);
        ctx.logger.info("wrote script", {
          script: scriptPath,
          operations: plan.operations.length,
        });
        io.out(summarizePlan(plan));
        io.out(`still to transfer: ${formatBytes(plan.stats.transferBytes)}`);
      },
    );

  program
    .command("dups")
    .description("List groups of files with identical content")
    .argument("[root]", "hierarchy to inspect (default: current directory)")
    .action(async (root: string | undefined, _opts: unknown, command: Command) => {
      const ctx = contextFor(command, io);
      await listDuplicates([prepareRoot(root ?? process.cwd())], ctx, io);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  let program: Command;
  try {
    program = buildProgram();
  } catch (err) {
    console.error(`${CLI_NAME}: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  if (argv.length <= 2) {
    program.outputHelp();
    return 0;
  }
  try {
    await program.parseAsync(argv);
    return typeof process.exitCode === "number" ? process.exitCode : 0;
  } catch (err) {
    const logger = new ConsoleLogger("error");
    logger.error(err instanceof Error ? err.message : String(err), {
      ...(err instanceof CatalogError ? { catalog: err.catalogPath } : {}),
    });
    if (process.env.DIRPLAN_DEBUG && err instanceof Error && err.stack) {
      console.error(err.stack);
    }
    return 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(`${CLI_NAME} fatal:`, err);
      process.exitCode = 1;
    },
  );
}
