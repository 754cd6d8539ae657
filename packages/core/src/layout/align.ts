import type { Align, Overflow } from "./types.js";

const ALIGN_VALUES: ReadonlySet<string> = new Set<Align>([
  "left",
  "top",
  "center",
  "middle",
  "right",
  "bottom",
  "baseline",
  "justify",
  "space-around",
  "flex-start",
  "flex-end",
  "text-top",
  "text-bottom",
  "sub",
  "super",
]);

const OVERFLOW_VALUES: ReadonlySet<string> = new Set<Overflow>(["auto", "scroll", "visible", "hidden"]);

export function isAlign(v: unknown): v is Align {
  return typeof v === "string" && ALIGN_VALUES.has(v);
}

export function isOverflow(v: unknown): v is Overflow {
  return typeof v === "string" && OVERFLOW_VALUES.has(v);
}

/** Generalized alignment to the start of the container. */
export function isAlignStart(a: Align): boolean {
  return a === "left" || a === "top" || a === "flex-start" || a === "text-top";
}

/** Generalized alignment to the middle of the container. */
export function isAlignMiddle(a: Align): boolean {
  return a === "center" || a === "middle";
}

/** Generalized alignment to the end of the container. */
export function isAlignEnd(a: Align): boolean {
  return a === "right" || a === "bottom" || a === "flex-end" || a === "text-bottom";
}

/**
 * Leading offset that places content of `extra` leftover dots according to `a`.
 * Justify and the text-oriented values produce no offset.
 */
export function alignOffset(a: Align, extra: number): number {
  if (extra <= 0) return 0;
  if (isAlignMiddle(a)) return 0.5 * extra;
  if (isAlignEnd(a)) return extra;
  return 0;
}
