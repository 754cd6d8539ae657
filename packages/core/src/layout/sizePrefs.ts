/**
 * packages/core/src/layout/sizePrefs.ts — Size preferences and per-node layout data.
 *
 * Why: Every layout stage speaks in terms of how big a node needs to be, how
 * big it would like to be, and how big it may become. `updateSizes` keeps the
 * three ordered after every allocation-affecting mutation.
 *
 * Invariants (after updateSizes):
 *   - need >= allocSize
 *   - pref >= need
 *   - need <= max and pref <= max on every axis where max >= 0
 *   - max < 0 marks an axis that may stretch without bound
 */

import { VEC2_ZERO, dimOf, maxVec, minPosVec, vec2 } from "./engine/vec.js";
import { ZERO_SIDES } from "./spacing-scale.js";
import type { LayoutStyle } from "./style.js";
import type { Dim, GridPoint, Sides, Vec2 } from "./types.js";

export type SizePrefs = Readonly<{
  need: Vec2;
  pref: Vec2;
  max: Vec2;
}>;

/** Mutable per-node record; each field holds an immutable value. */
export type LayoutData = {
  size: SizePrefs;
  margins: Sides;
  gridPos: GridPoint;
  gridSpan: GridPoint;
  allocSize: Vec2;
  allocPos: Vec2;
  allocPosRel: Vec2;
  allocPosOrig: Vec2;
};

export const ZERO_SIZE_PREFS: SizePrefs = Object.freeze({
  need: VEC2_ZERO,
  pref: VEC2_ZERO,
  max: VEC2_ZERO,
});

const UNIT_SPAN: GridPoint = Object.freeze({ col: 1, row: 1 });

/** Max < 0 means the axis can stretch infinitely. */
export function hasMaxStretch(sp: SizePrefs, d: Dim): boolean {
  return dimOf(sp.max, d) < 0;
}

/** Pref > need means there is room to grow toward the preference. */
export function canStretchNeed(sp: SizePrefs, d: Dim): boolean {
  return dimOf(sp.pref, d) > dimOf(sp.need, d);
}

export function createLayoutData(): LayoutData {
  return {
    size: ZERO_SIZE_PREFS,
    margins: ZERO_SIDES,
    gridPos: Object.freeze({ col: 0, row: 0 }),
    gridSpan: UNIT_SPAN,
    allocSize: VEC2_ZERO,
    allocPos: VEC2_ZERO,
    allocPosRel: VEC2_ZERO,
    allocPosOrig: VEC2_ZERO,
  };
}

/** Zero every allocation field; called at the start of each size-gather pass. */
export function resetLayoutData(ld: LayoutData): void {
  ld.allocSize = VEC2_ZERO;
  ld.allocPos = VEC2_ZERO;
  ld.allocPosRel = VEC2_ZERO;
  ld.allocPosOrig = VEC2_ZERO;
}

function styleMax(v: number): number {
  if (v < 0) return -1;
  return v === 0 ? Number.POSITIVE_INFINITY : v;
}

/** Reset, then seed need/pref/max, margins and spans from resolved style values. */
export function setLayoutDataFromStyle(ld: LayoutData, style: LayoutStyle): void {
  resetLayoutData(ld);
  ld.size = {
    need: vec2(style.minWidth, style.minHeight),
    pref: vec2(style.width, style.height),
    max: vec2(styleMax(style.maxWidth), styleMax(style.maxHeight)),
  };
  ld.margins = style.margin;
  ld.gridSpan = { col: Math.max(1, style.colSpan), row: Math.max(1, style.rowSpan) };
}

/** Re-establish the size invariants from the current allocation and max constraints. */
export function updateSizes(ld: LayoutData): void {
  const { max } = ld.size;
  let need = maxVec(ld.size.need, ld.allocSize);
  let pref = maxVec(ld.size.pref, need);
  need = minPosVec(need, max);
  pref = minPosVec(pref, max);
  ld.size = { need, pref, max };
}
