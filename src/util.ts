const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB", "PB"];

/** 1000-based, whole units: 1999 -> "1 KB". */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 0) return "-";
  let unit = 0;
  while (unit < SIZE_UNITS.length - 1 && bytes >= Math.pow(1000, unit + 1)) {
    unit += 1;
  }
  return `${Math.floor(bytes / Math.pow(1000, unit))} ${SIZE_UNITS[unit]}`;
}

export function parsePositiveInt(raw: string, label: string): number {
  const trimmed = raw.trim();
  const n = Number(trimmed);
  if (!trimmed || !Number.isSafeInteger(n) || n <= 0) {
    throw new Error(`${label} must be a positive integer, got '${raw}'`);
  }
  return n;
}
