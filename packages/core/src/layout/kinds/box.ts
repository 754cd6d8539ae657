/**
 * packages/core/src/layout/kinds/box.ts — Box-model helpers shared by the container kinds.
 *
 * Why: Every container measures the same way around its content: leading and
 * trailing box spacing (margin + padding + border) on each axis. Children are
 * positioned relative to the container origin, so their offsets already include
 * the leading spacing.
 */

import { addVec, dimOf, leadingSide, sidesSum, vec2, withDim } from "../engine/vec.js";
import type { LinearSlot } from "../engine/linear.js";
import type { LayoutNode } from "../node.js";
import { type LayoutData, updateSizes } from "../sizePrefs.js";
import { boxSpacing } from "../style.js";
import type { Dim, Sides, Vec2 } from "../types.js";

export type ContentBox = Readonly<{
  spacing: Sides;
  /** Offset of the content area from the node origin. */
  origin: Vec2;
  /** Allocation minus spacing on both sides, never negative. */
  avail: Vec2;
}>;

export function contentBox(node: LayoutNode): ContentBox {
  const spacing = boxSpacing(node.style);
  const { allocSize } = node.data;
  return {
    spacing,
    origin: vec2(leadingSide(spacing, "x"), leadingSide(spacing, "y")),
    avail: vec2(
      Math.max(0, allocSize.x - sidesSum(spacing, "x")),
      Math.max(0, allocSize.y - sidesSum(spacing, "y")),
    ),
  };
}

/**
 * Fold aggregated child sizes into a container's seeded prefs:
 * need/pref = max(seed, aggregate) + box spacing, then re-clamp.
 */
export function applyAggregate(ld: LayoutData, spacing: Sides, need: Vec2, pref: Vec2): void {
  const pad = vec2(sidesSum(spacing, "x"), sidesSum(spacing, "y"));
  ld.size = {
    need: addVec(vec2(Math.max(ld.size.need.x, need.x), Math.max(ld.size.need.y, need.y)), pad),
    pref: addVec(vec2(Math.max(ld.size.pref.x, pref.x), Math.max(ld.size.pref.y, pref.y)), pad),
    max: ld.size.max,
  };
  updateSizes(ld);
}

/** Write one axis of an allocation slot into a child's layout data. */
export function setSlot(ld: LayoutData, d: Dim, slot: LinearSlot): void {
  ld.allocSize = withDim(ld.allocSize, d, slot.size);
  ld.allocPosRel = withDim(ld.allocPosRel, d, slot.pos);
}

export function slotEnd(ld: LayoutData, d: Dim): number {
  return dimOf(ld.allocPosRel, d) + dimOf(ld.allocSize, d);
}
