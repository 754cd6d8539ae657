/**
 * packages/core/src/layout/overflow.ts — Overflow detection, scrollbar geometry, scroll offsets.
 *
 * Why: Scrolling never re-runs layout. Canonical positions (`allocPosRel`,
 * `allocPosOrig`) are computed once per pass; the visible position is always
 * `allocPosOrig + accumulated scroll delta`, so re-applying a delta is idempotent.
 *
 * Overflow rules:
 *   - avail = allocation minus trailing box spacing (child extents include the leading side)
 *   - childSize.x > avail.x adds a horizontal bar (reserving height), likewise vertical
 *   - both checks use the same childSize; `hidden` never scrolls
 */

import { VEC2_ZERO, addVec, subVec, trailingSide, vec2 } from "./engine/vec.js";
import { slotEnd } from "./kinds/box.js";
import { type ContainerNode, type LayoutNode, participants } from "./node.js";
import {
  type ScrollBar,
  type ScrollValueChanged,
  configureScrollBar,
  createScrollBar,
  deactivateScrollBar,
} from "./scrollBar.js";
import { boxSpacing } from "./style.js";
import type { Dim, Rect, Vec2 } from "./types.js";

/** Max extent of the children as laid out, relative to the container origin. */
export function finalizeChildSize(node: ContainerNode): Vec2 {
  let x = 0;
  let y = 0;
  for (const child of participants(node.children)) {
    x = Math.max(x, slotEnd(child.data, "x"));
    y = Math.max(y, slotEnd(child.data, "y"));
  }
  const size = vec2(x, y);
  node.state.childSize = size;
  return size;
}

function liveBar(current: ScrollBar | null, dim: Dim): ScrollBar {
  // a destroyed bar belongs to a released subtree; a re-attached node gets a new one
  if (current && !current.destroyed) return current;
  return createScrollBar(dim);
}

/**
 * Decide which scrollbars the container needs and configure them.
 * Returns value changes caused by range clamping.
 */
export function manageOverflow(node: ContainerNode): ScrollValueChanged[] {
  const { state, style } = node;
  const spacing = boxSpacing(style);
  const { allocSize } = node.data;
  const avail = vec2(allocSize.x - trailingSide(spacing, "x"), allocSize.y - trailingSide(spacing, "y"));
  const sbw = style.scrollBarWidth;

  let extra = VEC2_ZERO;
  state.hasHScroll = false;
  state.hasVScroll = false;
  if (style.overflow !== "hidden" && participants(node.children).length > 0) {
    if (state.childSize.x > avail.x) {
      state.hasHScroll = true;
      extra = addVec(extra, vec2(0, sbw));
    }
    if (state.childSize.y > avail.y) {
      state.hasVScroll = true;
      extra = addVec(extra, vec2(sbw, 0));
    }
  }
  state.extraSize = extra;

  const changes: ScrollValueChanged[] = [];
  if (state.hasHScroll) {
    const bar = liveBar(state.hScroll, "x");
    state.hScroll = bar;
    const change = configureScrollBar(bar, {
      max: state.childSize.x + extra.x,
      step: style.lineHeight,
      thumbSize: avail.x,
    });
    if (change) changes.push(change);
  }
  if (state.hasVScroll) {
    const bar = liveBar(state.vScroll, "y");
    state.vScroll = bar;
    const change = configureScrollBar(bar, {
      max: state.childSize.y + extra.y,
      step: style.lineHeight,
      thumbSize: avail.y,
    });
    if (change) changes.push(change);
  }
  layoutScrollBars(node);
  return changes;
}

function syncBarPosition(node: ContainerNode, bar: ScrollBar | null): void {
  if (!bar || !bar.active) return;
  bar.data.allocPos = addVec(node.data.allocPos, bar.data.allocPosRel);
  bar.data.allocPosOrig = addVec(node.data.allocPosOrig, bar.data.allocPosRel);
}

/**
 * Place active bars along the bottom (horizontal) and right (vertical) edges,
 * relative to the container origin; bars that are no longer needed are deactivated.
 */
export function layoutScrollBars(node: ContainerNode): void {
  const { state } = node;
  const { allocSize } = node.data;
  const sbw = node.style.scrollBarWidth;

  const h = state.hScroll;
  if (h && !h.destroyed) {
    if (state.hasHScroll) {
      h.data.allocPosRel = vec2(0, allocSize.y - sbw);
      h.data.allocSize = vec2(Math.max(0, allocSize.x - (state.hasVScroll ? sbw : 0)), sbw);
      syncBarPosition(node, h);
    } else {
      deactivateScrollBar(h);
    }
  }
  const v = state.vScroll;
  if (v && !v.destroyed) {
    if (state.hasVScroll) {
      v.data.allocPosRel = vec2(allocSize.x - sbw, 0);
      v.data.allocSize = vec2(sbw, Math.max(0, allocSize.y - (state.hasHScroll ? sbw : 0)));
      syncBarPosition(node, v);
    } else {
      deactivateScrollBar(v);
    }
  }
}

/** Offset the container applies to its descendants: minus the scroll values. */
export function scrollDelta(node: LayoutNode): Vec2 {
  if (node.kind !== "layout") return VEC2_ZERO;
  const { state } = node;
  const x = state.hasHScroll && state.hScroll ? -state.hScroll.value : 0;
  const y = state.hasVScroll && state.vScroll ? -state.vScroll.value : 0;
  return x === 0 && y === 0 ? VEC2_ZERO : vec2(x, y);
}

/**
 * Position `node` at `allocPosOrig + delta` and its descendants at their
 * canonical position plus the accumulated delta (including nested scroll offsets).
 */
export function moveTree(node: LayoutNode, delta: Vec2): void {
  const ld = node.data;
  ld.allocPos = addVec(ld.allocPosOrig, delta);
  if (node.kind === "layout") {
    syncBarPosition(node, node.state.hScroll);
    syncBarPosition(node, node.state.vScroll);
  }
  const inner = addVec(delta, scrollDelta(node));
  for (const child of participants(node.children)) moveTree(child, inner);
}

/** Re-apply a container's current scroll offset to everything below it. */
export function moveChildren(node: LayoutNode): void {
  const inner = addVec(subVec(node.data.allocPos, node.data.allocPosOrig), scrollDelta(node));
  for (const child of participants(node.children)) moveTree(child, inner);
}

/** Absolute rect of the area that shows content: the node rect minus scrollbar space. */
export function contentViewport(node: LayoutNode): Rect {
  const { allocPos, allocSize } = node.data;
  const extra = node.kind === "layout" ? node.state.extraSize : VEC2_ZERO;
  return {
    x: allocPos.x,
    y: allocPos.y,
    w: Math.max(0, allocSize.x - extra.x),
    h: Math.max(0, allocSize.y - extra.y),
  };
}
