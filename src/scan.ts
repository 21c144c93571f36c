// src/scan.ts
import os from "node:os";
import path from "node:path";
import type { Stats } from "node:fs";
import * as walk from "@nodelib/fs.walk";
import pLimit from "p-limit";
import { CatalogStore, findCatalogRoots } from "./catalog.js";
import { DEFAULT_CATALOG_NAME, DEFAULT_PARTIAL_WINDOW } from "./constants.js";
import { CatalogError, errorMessage } from "./errors.js";
import { computeSignature, describeMode, normalizeHashAlg } from "./hash.js";
import { catalogFileRules, createIgnorer } from "./ignore.js";
import { NullLogger, type Logger } from "./logger.js";
import { comparePaths, isWithin, toRel } from "./path-rel.js";
import {
  contentKey,
  makeSnapshot,
  resolveOwningRoot,
  sameMode,
  type FileRecord,
  type SignatureMode,
} from "./snapshot.js";

export const DEFAULT_HASH_CONCURRENCY = Math.max(
  1,
  Math.min(os.cpus().length, 8),
);

export type UpdateOptions = {
  store?: CatalogStore;
  catalogName?: string;
  mode?: SignatureMode;
  hash?: string;
  concurrency?: number;
  ignore?: string[];
  // absolute paths never recorded, e.g. the script being written
  excludePaths?: string[];
  logger?: Logger;
  signal?: AbortSignal;
};

export type CatalogUpdateStats = {
  catalog: string;
  files: number;
  kept: number;
  hashed: number;
  removed: number;
  failed: number;
  error?: string;
};

type FoundFile = {
  abs: string;
  size: number;
  mtime: number;
};

type HashJob = FoundFile & {
  catalogRoot: string;
  rel: string;
};

function walkFiles(
  root: string,
  ignoresDir: (rel: string) => boolean,
  ignoresFile: (rel: string) => boolean,
  exclude: ReadonlySet<string>,
): Promise<FoundFile[]> {
  return new Promise((resolve, reject) => {
    walk.walk(
      root,
      {
        stats: true,
        followSymbolicLinks: false,
        deepFilter: (e) => !ignoresDir(toRel(e.path, root)),
        entryFilter: (e) =>
          e.dirent.isFile() &&
          !exclude.has(e.path) &&
          !ignoresFile(toRel(e.path, root)),
        errorFilter: (err) => err.code === "EACCES" || err.code === "ENOENT",
      },
      (err, entries) => {
        if (err) {
          reject(err);
          return;
        }
        const files: FoundFile[] = [];
        for (const e of entries) {
          const st: Stats | undefined = e.stats;
          if (!st) continue;
          files.push({ abs: e.path, size: st.size, mtime: st.mtimeMs });
        }
        resolve(files);
      },
    );
  });
}

/** Drop roots that sit inside another root; the outer walk already covers them. */
function outermostRoots(roots: readonly string[]): string[] {
  const sorted = Array.from(new Set(roots)).sort(comparePaths);
  const out: string[] = [];
  for (const r of sorted) {
    if (out.some((o) => isWithin(r, o))) continue;
    out.push(r);
  }
  return out;
}

/**
 * Bring the catalogs under `roots` up to date with the files on disk.
 *
 * Each root gets a catalog of its own; catalogs already present deeper in the
 * tree keep owning their subtrees. Files whose size and mtime are unchanged
 * keep their recorded signature; everything else is hashed, at most
 * `concurrency` files at a time. Nothing is saved if `signal` aborts while
 * hashing.
 */
export async function updateCatalogs(
  roots: readonly string[],
  opts: UpdateOptions = {},
): Promise<CatalogUpdateStats[]> {
  const logger = opts.logger ?? new NullLogger();
  const catalogName = opts.store?.catalogName ?? opts.catalogName ?? DEFAULT_CATALOG_NAME;
  const store = opts.store ?? new CatalogStore({ catalogName, logger });
  const mode: SignatureMode = opts.mode ?? {
    kind: "partial",
    window: DEFAULT_PARTIAL_WINDOW,
  };
  const hashAlg = normalizeHashAlg(opts.hash);
  const concurrency = Math.max(1, opts.concurrency ?? DEFAULT_HASH_CONCURRENCY);
  const userIgnore = opts.ignore ?? [];
  const exclude = new Set((opts.excludePaths ?? []).map((p) => path.resolve(p)));
  const { signal } = opts;

  const requested = roots.map((r) => path.resolve(r));
  const walkRoots = outermostRoots(requested);
  logger.info("updating catalogs", {
    roots: walkRoots,
    mode: describeMode(mode),
    hash: hashAlg,
  });

  const catalogRoots = new Set<string>(requested);
  const found = new Map<string, FoundFile[]>();
  for (const root of walkRoots) {
    for (const c of await findCatalogRoots(root, catalogName, userIgnore)) {
      catalogRoots.add(c);
    }
    const ig = createIgnorer([...catalogFileRules(catalogName), ...userIgnore]);
    const files = await walkFiles(root, ig.ignoresDir, ig.ignores, exclude);
    logger.debug("walked", { root, files: files.length });
    found.set(root, files);
  }
  const ownerList = Array.from(catalogRoots).sort(comparePaths);

  // per catalog: what it recorded last time, and what is on disk now
  const previous = new Map<string, Map<string, FileRecord>>();
  const current = new Map<string, FileRecord[]>();
  const failedCatalogs = new Map<string, string>();
  const broken = new Set<string>();
  for (const catalogRoot of ownerList) {
    current.set(catalogRoot, []);
    if (!store.exists(catalogRoot)) {
      logger.info("creating catalog", { catalog: store.catalogPath(catalogRoot) });
      previous.set(catalogRoot, new Map());
      continue;
    }
    try {
      const loaded = store.load(catalogRoot);
      const usable = loaded.hashAlg === null || loaded.hashAlg === hashAlg;
      if (!usable) {
        logger.warn("catalog hashed with another algorithm; rehashing", {
          catalog: loaded.catalogPath,
          was: loaded.hashAlg,
          now: hashAlg,
        });
      }
      previous.set(
        catalogRoot,
        new Map(usable ? loaded.snapshot.records.map((r) => [r.path, r]) : []),
      );
    } catch (err) {
      if (!(err instanceof CatalogError)) throw err;
      logger.error("cannot read catalog; rebuilding it", {
        catalog: err.catalogPath,
        error: err.message,
      });
      previous.set(catalogRoot, new Map());
      broken.add(catalogRoot);
    }
  }

  const stats = new Map<string, CatalogUpdateStats>(
    ownerList.map((c) => [
      c,
      {
        catalog: store.catalogPath(c),
        files: 0,
        kept: 0,
        hashed: 0,
        removed: 0,
        failed: 0,
      },
    ]),
  );
  const statsFor = (c: string): CatalogUpdateStats => {
    const s = stats.get(c);
    if (!s) throw new Error(`no stats for catalog ${c}`);
    return s;
  };

  const jobs: HashJob[] = [];
  const seen = new Map<string, Set<string>>(ownerList.map((c) => [c, new Set()]));
  for (const files of found.values()) {
    for (const file of files) {
      const owner = resolveOwningRoot(file.abs, ownerList);
      if (owner === undefined) continue;
      const rel = toRel(file.abs, owner);
      seen.get(owner)?.add(rel);
      const prior = previous.get(owner)?.get(rel);
      if (
        prior &&
        prior.size === file.size &&
        prior.mtime === file.mtime &&
        sameMode(prior.signatureMode, mode)
      ) {
        current.get(owner)?.push(prior);
        statsFor(owner).kept += 1;
        continue;
      }
      jobs.push({ ...file, catalogRoot: owner, rel });
    }
  }

  logger.info("hashing", { files: jobs.length, concurrency });
  const limit = pLimit(concurrency);
  const hashed: { job: HashJob; record: FileRecord }[] = [];
  await Promise.all(
    jobs.map((job) =>
      limit(async () => {
        if (signal?.aborted) return;
        try {
          const signature = await computeSignature(job.abs, mode, hashAlg, job.size);
          hashed.push({
            job,
            record: {
              path: job.rel,
              size: job.size,
              signature,
              signatureMode: mode,
              mtime: job.mtime,
            },
          });
        } catch (err) {
          // vanished or unreadable since the walk
          statsFor(job.catalogRoot).failed += 1;
          logger.warn("cannot hash file", {
            path: job.abs,
            error: errorMessage(err),
          });
        }
      }),
    ),
  );
  signal?.throwIfAborted();

  for (const { job, record } of hashed) {
    current.get(job.catalogRoot)?.push(record);
    statsFor(job.catalogRoot).hashed += 1;
    logger.debug("hashed", { path: job.abs });
  }

  const arrivals = new Map<string, string>();
  for (const { job, record } of hashed) {
    if (!previous.get(job.catalogRoot)?.has(job.rel)) {
      arrivals.set(contentKey(record), job.abs);
    }
  }
  for (const [catalogRoot, prior] of previous) {
    const present = seen.get(catalogRoot) ?? new Set<string>();
    for (const [rel, record] of prior) {
      if (present.has(rel)) continue;
      statsFor(catalogRoot).removed += 1;
      const abs = path.join(catalogRoot, rel);
      const movedTo = arrivals.get(contentKey(record));
      if (movedTo) {
        logger.info("moved", { from: abs, to: movedTo });
      } else {
        logger.info("removed", { path: abs });
      }
    }
  }

  for (const catalogRoot of ownerList) {
    const s = statsFor(catalogRoot);
    const records = current.get(catalogRoot) ?? [];
    s.files = records.length;
    try {
      if (broken.has(catalogRoot)) await store.discard(catalogRoot);
      await store.save(catalogRoot, makeSnapshot(catalogRoot, records), {
        hashAlg,
      });
    } catch (err) {
      s.error = errorMessage(err);
      failedCatalogs.set(catalogRoot, s.error);
      logger.error("failed to save catalog", {
        catalog: s.catalog,
        error: s.error,
      });
    }
  }
  logger.info("catalogs updated", {
    catalogs: ownerList.length,
    failed: failedCatalogs.size,
  });
  return ownerList.map(statsFor);
}
