// src/config.ts
import {
  DEFAULT_CATALOG_NAME,
  DEFAULT_PARTIAL_WINDOW,
  DEFAULT_SCRIPT_NAME,
} from "./constants.js";
import { DEFAULT_HASH_CONCURRENCY } from "./scan.js";
import { parsePositiveInt } from "./util.js";

export type DirplanConfig = {
  catalogName: string;
  scriptName: string;
  partialWindow: number;
  concurrency: number;
};

function envString(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: string,
): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

function envInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  return raw ? parsePositiveInt(raw, key) : fallback;
}

/** Defaults for the command line flags; each flag still wins over these. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DirplanConfig {
  const catalogName = envString(env, "DIRPLAN_CATALOG_NAME", DEFAULT_CATALOG_NAME);
  if (catalogName.includes("/")) {
    throw new Error(
      `DIRPLAN_CATALOG_NAME must be a file name, got '${catalogName}'`,
    );
  }
  return {
    catalogName,
    scriptName: envString(env, "DIRPLAN_SCRIPT_NAME", DEFAULT_SCRIPT_NAME),
    partialWindow: envInt(env, "DIRPLAN_PARTIAL_HASH_SIZE", DEFAULT_PARTIAL_WINDOW),
    concurrency: envInt(env, "DIRPLAN_HASH_CONCURRENCY", DEFAULT_HASH_CONCURRENCY),
  };
}
