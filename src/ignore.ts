import ignore from "ignore";

export type Ignorer = {
  ignores: (rel: string) => boolean;
  ignoresDir: (rel: string) => boolean;
};

export function normalizeR(r: string): string {
  return r.replace(/\\/g, "/").replace(/^\/+/, "");
}

function cleanPattern(pattern: string): string | null {
  const trimmed = pattern.trim();
  if (!trimmed) return null;
  return trimmed.replace(/\\/g, "/");
}

export function normalizeIgnorePatterns(patterns: readonly string[]): string[] {
  const out = new Set<string>();
  for (const raw of patterns) {
    const cleaned = cleanPattern(raw);
    if (cleaned) out.add(cleaned);
  }
  return Array.from(out);
}

export function collectIgnoreOption(
  value: string,
  previous?: string[],
): string[] {
  const acc = previous ? [...previous] : [];
  const parts = value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  acc.push(...parts);
  return acc;
}

export function createIgnorer(patterns: readonly string[] = []): Ignorer {
  const cleaned = normalizeIgnorePatterns(patterns);
  if (!cleaned.length) {
    return {
      ignores: () => false,
      ignoresDir: () => false,
    };
  }
  const ig = ignore().add(cleaned);
  const check = (r: string) => {
    const rel = normalizeR(r);
    return rel !== "" && ig.ignores(rel);
  };
  return {
    ignores: check,
    // gitignore rules like "build/" only match with the trailing slash
    ignoresDir: (r: string) => check(r) || check(`${normalizeR(r)}/`),
  };
}

/** Catalog files and their SQLite companions never belong in a catalog. */
export function catalogFileRules(catalogName: string): string[] {
  const escaped = catalogName.replace(/([\\*?[\]!#])/g, "\\$1");
  return [escaped, `${escaped}-journal`, `${escaped}-wal`, `${escaped}-shm`];
}
