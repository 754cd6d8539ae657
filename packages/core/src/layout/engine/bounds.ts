export function isFiniteNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

export function clampNonNegative(n: number): number {
  return n > 0 ? n : 0;
}

/** Finite value or `fallback`. */
export function toFiniteOr(v: unknown, fallback: number): number {
  return isFiniteNumber(v) ? v : fallback;
}

/** Finite, non-negative value or `fallback`. */
export function toNonNegativeOr(v: unknown, fallback: number): number {
  return isFiniteNumber(v) ? clampNonNegative(v) : fallback;
}

/** Truncated integer >= `min`, or `fallback` when not a finite number. */
export function toIntAtLeast(v: unknown, min: number, fallback: number): number {
  if (!isFiniteNumber(v)) return fallback;
  const n = Math.trunc(v);
  return n < min ? min : n;
}
