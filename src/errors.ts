// src/errors.ts

/**
 * Raised when the planner detects that its own bookkeeping went wrong:
 * a destination path claimed twice, a malformed move graph, or a plan that
 * fails replay. These are defects, so nothing in the engine catches them.
 */
export class PlanInvariantError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "PlanInvariantError";
  }
}

export class SnapshotError extends Error {
  constructor(
    message: string,
    public readonly root: string,
  ) {
    super(message);
    this.name = "SnapshotError";
  }
}

export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly catalogPath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CatalogError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
