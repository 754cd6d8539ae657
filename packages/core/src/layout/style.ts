/**
 * packages/core/src/layout/style.ts — Resolved layout style and typed presets.
 *
 * Why: The engine consumes style values that are already resolved to dots.
 * `resolveLayoutStyle` applies defaults and coerces malformed numbers so the
 * solver never sees NaN, and the presets replace per-widget property maps.
 *
 * Conventions:
 *   - width/height are preferred sizes, 0 = unspecified
 *   - maxWidth/maxHeight: 0 = no constraint, negative = stretch without bound
 *   - col/row are 0-based grid cells, null = auto-placed
 */

import { isAlign, isOverflow } from "./align.js";
import { isFiniteNumber, toFiniteOr, toIntAtLeast, toNonNegativeOr } from "./engine/bounds.js";
import { type SidesInput, ZERO_SIDES, addSides, resolveSides, uniformSides } from "./spacing-scale.js";
import type { Align, Dim, Overflow, Sides } from "./types.js";

export type LayoutStyle = Readonly<{
  alignH: Align;
  alignV: Align;
  posX: number;
  posY: number;
  width: number;
  height: number;
  minWidth: number;
  minHeight: number;
  maxWidth: number;
  maxHeight: number;
  margin: Sides;
  padding: Sides;
  borderWidth: number;
  overflow: Overflow;
  /** Explicit grid column count, 0 = derive from children. */
  columns: number;
  col: number | null;
  row: number | null;
  colSpan: number;
  rowSpan: number;
  scrollBarWidth: number;
  /** Height of one line of text; scroll step size. */
  lineHeight: number;
}>;

export type LayoutStyleInput = Readonly<{
  alignH?: Align;
  alignV?: Align;
  posX?: number;
  posY?: number;
  width?: number;
  height?: number;
  minWidth?: number;
  minHeight?: number;
  maxWidth?: number;
  maxHeight?: number;
  margin?: SidesInput;
  padding?: SidesInput;
  borderWidth?: number;
  overflow?: Overflow;
  columns?: number;
  col?: number | null;
  row?: number | null;
  colSpan?: number;
  rowSpan?: number;
  scrollBarWidth?: number;
  lineHeight?: number;
}>;

export const DEFAULT_SCROLLBAR_WIDTH = 16;
export const DEFAULT_LINE_HEIGHT = 16;

export const DEFAULT_LAYOUT_STYLE: LayoutStyle = Object.freeze({
  alignH: "left",
  alignV: "top",
  posX: 0,
  posY: 0,
  width: 0,
  height: 0,
  minWidth: 2,
  minHeight: 2,
  maxWidth: 0,
  maxHeight: 0,
  margin: ZERO_SIDES,
  padding: ZERO_SIDES,
  borderWidth: 0,
  overflow: "auto",
  columns: 0,
  col: null,
  row: null,
  colSpan: 1,
  rowSpan: 1,
  scrollBarWidth: DEFAULT_SCROLLBAR_WIDTH,
  lineHeight: DEFAULT_LINE_HEIGHT,
});

/** Bordered container that paints the standard box model. */
export const FRAME_STYLE: LayoutStyleInput = Object.freeze({
  borderWidth: 2,
  padding: 2,
  margin: 2,
});

/** Infinitely stretchy filler; its width/height weight the share it takes. */
export const STRETCH_STYLE: LayoutStyleInput = Object.freeze({
  maxWidth: -1,
  maxHeight: -1,
});

/** Fixed blank space, one line high and wide. */
export const SPACE_STYLE: LayoutStyleInput = Object.freeze({
  width: DEFAULT_LINE_HEIGHT,
  height: DEFAULT_LINE_HEIGHT,
});

/** Split views take whatever their parent gives them. */
export const SPLIT_VIEW_STYLE: LayoutStyleInput = Object.freeze({
  maxWidth: -1,
  maxHeight: -1,
});

function resolveCell(v: number | null | undefined, fallback: number | null): number | null {
  if (v === undefined) return fallback;
  if (v === null || !isFiniteNumber(v) || v < 0) return null;
  return Math.trunc(v);
}

/**
 * Resolve a partial style against `base` (defaults when omitted).
 * Never fails: values that cannot be used fall back to the base value.
 */
export function resolveLayoutStyle(
  input: LayoutStyleInput = {},
  base: LayoutStyle = DEFAULT_LAYOUT_STYLE,
): LayoutStyle {
  return {
    alignH: isAlign(input.alignH) ? input.alignH : base.alignH,
    alignV: isAlign(input.alignV) ? input.alignV : base.alignV,
    posX: toFiniteOr(input.posX, base.posX),
    posY: toFiniteOr(input.posY, base.posY),
    width: toNonNegativeOr(input.width, base.width),
    height: toNonNegativeOr(input.height, base.height),
    minWidth: toNonNegativeOr(input.minWidth, base.minWidth),
    minHeight: toNonNegativeOr(input.minHeight, base.minHeight),
    maxWidth: toFiniteOr(input.maxWidth, base.maxWidth),
    maxHeight: toFiniteOr(input.maxHeight, base.maxHeight),
    margin: input.margin === undefined ? base.margin : resolveSides(input.margin),
    padding: input.padding === undefined ? base.padding : resolveSides(input.padding),
    borderWidth: toNonNegativeOr(input.borderWidth, base.borderWidth),
    overflow: isOverflow(input.overflow) ? input.overflow : base.overflow,
    columns: toIntAtLeast(input.columns, 0, base.columns),
    col: resolveCell(input.col, base.col),
    row: resolveCell(input.row, base.row),
    colSpan: toIntAtLeast(input.colSpan, 1, base.colSpan),
    rowSpan: toIntAtLeast(input.rowSpan, 1, base.rowSpan),
    scrollBarWidth: toNonNegativeOr(input.scrollBarWidth, base.scrollBarWidth),
    lineHeight: toNonNegativeOr(input.lineHeight, base.lineHeight),
  };
}

/** Space between the outer allocation and the content box, per side. */
export function boxSpacing(style: LayoutStyle): Sides {
  return addSides(addSides(style.margin, style.padding), uniformSides(style.borderWidth));
}

export function alignDim(style: LayoutStyle, d: Dim): Align {
  return d === "x" ? style.alignH : style.alignV;
}
