// src/catalog.ts
import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import * as walk from "@nodelib/fs.walk";
import { DEFAULT_CATALOG_NAME } from "./constants.js";
import { openCatalogDb, type CatalogDb } from "./db.js";
import { CatalogError, errorMessage } from "./errors.js";
import { describeMode, parseMode } from "./hash.js";
import { createIgnorer } from "./ignore.js";
import { NullLogger, type Logger } from "./logger.js";
import { commonRoot, comparePaths, toRel } from "./path-rel.js";
import {
  composeSnapshot,
  makeSnapshot,
  type CatalogSnapshot,
  type FileRecord,
  type Snapshot,
} from "./snapshot.js";

export type LoadedCatalog = CatalogSnapshot & {
  catalogPath: string;
  // null for a catalog that has never been written by an updater
  hashAlg: string | null;
};

type FileRow = {
  path: string;
  size: number;
  signature: string;
  mode: string;
  mtime: number | null;
};

export type CatalogStoreOptions = {
  catalogName?: string;
  logger?: Logger;
};

/**
 * Reads and writes the per-directory catalogs. Writes to one catalog file are
 * queued, so two saves of the same catalog never interleave.
 */
export class CatalogStore {
  readonly catalogName: string;
  private readonly logger: Logger;
  private readonly queues = new Map<string, Promise<void>>();

  constructor({ catalogName, logger }: CatalogStoreOptions = {}) {
    this.catalogName = catalogName ?? DEFAULT_CATALOG_NAME;
    this.logger = logger ?? new NullLogger();
  }

  catalogPath(root: string): string {
    return path.join(root, this.catalogName);
  }

  exists(root: string): boolean {
    return fs.existsSync(this.catalogPath(root));
  }

  /** Remove a catalog that cannot be read, so the next save starts fresh. */
  async discard(root: string): Promise<void> {
    const catalogPath = this.catalogPath(root);
    for (const p of [catalogPath, `${catalogPath}-journal`]) {
      await fsp.rm(p, { force: true });
    }
    this.logger.debug("discarded catalog", { catalog: catalogPath });
  }

  load(root: string): LoadedCatalog {
    const catalogPath = this.catalogPath(root);
    if (!fs.existsSync(catalogPath)) {
      throw new CatalogError(`no catalog at ${catalogPath}`, catalogPath);
    }
    let rows: FileRow[];
    let hashAlg: string | null;
    try {
      const db = openCatalogDb(catalogPath, { readonly: true });
      try {
        rows = db
          .prepare(
            `SELECT path, size, signature, mode, mtime FROM files ORDER BY path`,
          )
          .all() as FileRow[];
        const meta = db
          .prepare(`SELECT value FROM meta WHERE key = 'hash_alg'`)
          .get() as { value: string | null } | undefined;
        hashAlg = meta?.value ?? null;
      } finally {
        db.close();
      }
    } catch (err) {
      throw new CatalogError(
        `unreadable catalog ${catalogPath}: ${errorMessage(err)}`,
        catalogPath,
        { cause: err },
      );
    }

    const records: FileRecord[] = rows.map((row) => {
      const signatureMode = parseMode(row.mode);
      if (!signatureMode) {
        throw new CatalogError(
          `corrupt catalog ${catalogPath}: bad signature mode '${row.mode}' for ${row.path}`,
          catalogPath,
        );
      }
      return {
        path: row.path,
        size: Number(row.size),
        signature: row.signature,
        signatureMode,
        mtime: row.mtime ?? undefined,
      };
    });
    let snapshot: Snapshot;
    try {
      snapshot = makeSnapshot(root, records);
    } catch (err) {
      throw new CatalogError(
        `corrupt catalog ${catalogPath}: ${errorMessage(err)}`,
        catalogPath,
        { cause: err },
      );
    }
    this.logger.debug("loaded catalog", {
      catalog: catalogPath,
      files: snapshot.records.length,
    });
    return { root, snapshot, catalogPath, hashAlg };
  }

  /** Replace the catalog's contents with `snapshot` in one transaction. */
  save(
    root: string,
    snapshot: Snapshot,
    { hashAlg }: { hashAlg: string },
  ): Promise<void> {
    const catalogPath = this.catalogPath(root);
    const previous = this.queues.get(catalogPath) ?? Promise.resolve();
    const run = previous.then(() => this.write(catalogPath, snapshot, hashAlg));
    const settled = run.catch(() => {});
    this.queues.set(catalogPath, settled);
    void settled.then(() => {
      if (this.queues.get(catalogPath) === settled) {
        this.queues.delete(catalogPath);
      }
    });
    return run;
  }

  private write(catalogPath: string, snapshot: Snapshot, hashAlg: string) {
    let db: CatalogDb;
    try {
      db = openCatalogDb(catalogPath);
    } catch (err) {
      throw new CatalogError(
        `cannot open catalog ${catalogPath}: ${errorMessage(err)}`,
        catalogPath,
        { cause: err },
      );
    }
    try {
      const insert = db.prepare(
        `INSERT INTO files(path, size, signature, mode, mtime) VALUES (@path, @size, @signature, @mode, @mtime)`,
      );
      const setMeta = db.prepare(
        `INSERT INTO meta(key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
      );
      const replaceAll = db.transaction((records: readonly FileRecord[]) => {
        db.exec(`DELETE FROM files`);
        for (const r of records) {
          insert.run({
            path: r.path,
            size: r.size,
            signature: r.signature,
            mode: describeMode(r.signatureMode),
            mtime: r.mtime ?? null,
          });
        }
        setMeta.run("hash_alg", hashAlg);
        setMeta.run("updated_at", String(Date.now()));
      });
      replaceAll(snapshot.records);
    } finally {
      db.close();
    }
    this.logger.debug("saved catalog", {
      catalog: catalogPath,
      files: snapshot.records.length,
    });
  }
}

function walkDirs(
  root: string,
  deepFilter: (entry: walk.Entry) => boolean,
): Promise<walk.Entry[]> {
  return new Promise((resolve, reject) => {
    walk.walk(
      root,
      {
        followSymbolicLinks: false,
        deepFilter,
        entryFilter: (e) => e.dirent.isDirectory(),
        errorFilter: (err) => err.code === "EACCES" || err.code === "ENOENT",
      },
      (err, entries) => (err ? reject(err) : resolve(entries)),
    );
  });
}

/** Every directory at or below `root` that holds a catalog file, sorted. */
export async function findCatalogRoots(
  root: string,
  catalogName: string = DEFAULT_CATALOG_NAME,
  ignore: readonly string[] = [],
): Promise<string[]> {
  const absRoot = path.resolve(root);
  const ig = createIgnorer(ignore);
  const dirs = await walkDirs(
    absRoot,
    (e) => !ig.ignoresDir(toRel(e.path, absRoot)),
  );
  const candidates = [absRoot, ...dirs.map((e) => e.path)].filter(
    (dir) => dir === absRoot || !ig.ignoresDir(toRel(dir, absRoot)),
  );
  return candidates
    .filter((dir) => fs.existsSync(path.join(dir, catalogName)))
    .sort(comparePaths);
}

export type HierarchyOptions = {
  ignore?: readonly string[];
  logger?: Logger;
};

export type Hierarchy = {
  root: string;
  snapshot: Snapshot;
  catalogs: LoadedCatalog[];
  hashAlg: string | null;
};

/**
 * Load every catalog under `root` and merge them, nearest catalog winning.
 * An unreadable catalog is skipped with an error log as long as another one
 * loads; if none is left the run cannot continue.
 */
export async function loadHierarchy(
  root: string,
  store: CatalogStore,
  { ignore = [], logger = new NullLogger() }: HierarchyOptions = {},
): Promise<Hierarchy> {
  const absRoot = path.resolve(root);
  const roots = await findCatalogRoots(absRoot, store.catalogName, ignore);
  if (!roots.length) {
    throw new CatalogError(
      `no ${store.catalogName} catalog found under ${absRoot}; run update first`,
      store.catalogPath(absRoot),
    );
  }
  const catalogs: LoadedCatalog[] = [];
  let lastError: CatalogError | undefined;
  for (const catalogRoot of roots) {
    try {
      catalogs.push(store.load(catalogRoot));
    } catch (err) {
      if (!(err instanceof CatalogError)) throw err;
      lastError = err;
      logger.error("skipping catalog", {
        catalog: err.catalogPath,
        error: err.message,
      });
    }
  }
  if (!catalogs.length) {
    throw lastError ??
      new CatalogError(`no readable catalog under ${absRoot}`, absRoot);
  }

  const algs = new Set(
    catalogs.flatMap((c) => (c.hashAlg ? [c.hashAlg] : [])),
  );
  if (algs.size > 1) {
    throw new CatalogError(
      `catalogs under ${absRoot} were hashed with different algorithms (${[...algs].join(", ")})`,
      absRoot,
    );
  }
  const snapshot = composeSnapshot(absRoot, catalogs);
  logger.info("loaded hierarchy", {
    root: absRoot,
    catalogs: catalogs.length,
    files: snapshot.records.length,
  });
  return {
    root: absRoot,
    snapshot,
    catalogs,
    hashAlg: algs.size ? [...algs][0] : null,
  };
}

/**
 * Load several hierarchies as one snapshot rooted at their deepest common
 * directory, so "/x/a" and "/x/b" become the subtrees "a" and "b" of "/x".
 */
export async function loadRoots(
  roots: readonly string[],
  store: CatalogStore,
  opts: HierarchyOptions = {},
): Promise<Hierarchy> {
  const absRoots = Array.from(new Set(roots.map((r) => path.resolve(r))));
  absRoots.sort(comparePaths);
  if (absRoots.length === 1) return loadHierarchy(absRoots[0], store, opts);

  const base = commonRoot(absRoots);
  const parts: Hierarchy[] = [];
  for (const root of absRoots) parts.push(await loadHierarchy(root, store, opts));
  const algs = new Set(parts.flatMap((h) => (h.hashAlg ? [h.hashAlg] : [])));
  if (algs.size > 1) {
    throw new CatalogError(
      `catalogs under ${absRoots.join(", ")} were hashed with different algorithms (${[...algs].join(", ")})`,
      base,
    );
  }
  return {
    root: base,
    snapshot: composeSnapshot(
      base,
      parts.map((h) => ({ root: h.root, snapshot: h.snapshot })),
    ),
    catalogs: parts.flatMap((h) => h.catalogs),
    hashAlg: algs.size ? [...algs][0] : null,
  };
}
