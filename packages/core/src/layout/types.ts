/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the fundamental geometric types shared by every layout stage.
 * All coordinates and extents are in dots (one resolved absolute length unit).
 */

/** Layout dimension: horizontal (x) or vertical (y). */
export type Dim = "x" | "y";

/** Immutable 2D vector in dots. */
export type Vec2 = Readonly<{ x: number; y: number }>;

/** Rectangle with absolute position (x,y) and dimensions (w,h) in dots. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Per-side scalar values (margins, padding, box spacing). */
export type Sides = Readonly<{ left: number; right: number; top: number; bottom: number }>;

/** Grid coordinate or span, in cells. */
export type GridPoint = Readonly<{ col: number; row: number }>;

/**
 * Alignment vocabulary shared by widget styles.
 *
 * Only the start, middle, end and justify groups influence layout; the text-
 * oriented values (baseline, sub, super) are accepted and behave as "no offset".
 */
export type Align =
  | "left"
  | "top"
  | "center"
  | "middle"
  | "right"
  | "bottom"
  | "baseline"
  | "justify"
  | "space-around"
  | "flex-start"
  | "flex-end"
  | "text-top"
  | "text-bottom"
  | "sub"
  | "super";

/** What a container does with content larger than its allocation. */
export type Overflow = "auto" | "scroll" | "visible" | "hidden";

/** Strategy used by a layout container to arrange its children. */
export type LayoutKind = "row" | "column" | "grid" | "stacked";

/** Per-container pass state. */
export type LayoutPhase = "unsized" | "gathered" | "allocated" | "finalized";
