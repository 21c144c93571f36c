// src/constants.ts
export const CLI_NAME = "dirplan";
export const VERSION = "0.3.0";

// per-directory catalog file; a directory holding one owns every file below it
// that is not owned by a deeper catalog.
export const DEFAULT_CATALOG_NAME = ".dir.db";
export const DEFAULT_SCRIPT_NAME = "update.sh";

// bytes hashed from each end of a file in partial mode
export const DEFAULT_PARTIAL_WINDOW = 4096;

export const SCRATCH_TAG = CLI_NAME;
