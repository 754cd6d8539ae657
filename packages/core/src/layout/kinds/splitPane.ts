/**
 * packages/core/src/layout/kinds/splitPane.ts — Proportional split-view allocation.
 *
 * Why: A split view always uses exactly the space its parent gives it and
 * never consults the children's size preferences, so its children have to
 * scroll when they do not fit. Splits are fractions of the space left after
 * the handles; a 0 split collapses its child.
 */

import { toNonNegativeOr } from "../engine/bounds.js";
import { type LayoutResult, checkIndex, ok } from "../engine/result.js";
import { dimOf, otherDim, withDim } from "../engine/vec.js";
import { type SplitViewNode, participants } from "../node.js";
import type { Rect } from "../types.js";

/** Coerce splits to one entry per child slot and normalize them to sum to 1. */
export function updateSplits(node: SplitViewNode): void {
  const n = node.children.length;
  const { state } = node;
  if (n === 0) {
    state.splits = [];
    return;
  }
  const splits: number[] = [];
  for (let i = 0; i < n; i++) splits.push(toNonNegativeOr(state.splits[i], 0));

  let sum = 0;
  for (const v of splits) sum += v;
  if (sum === 0) {
    splits.fill(1 / n);
    sum = 1;
  }
  state.splits = splits.map((v) => v / sum);
}

/** Overwrite the leading splits with `values` (extra values are ignored), then normalize. */
export function setSplits(node: SplitViewNode, ...values: readonly number[]): void {
  updateSplits(node);
  const splits = node.state.splits;
  const count = Math.min(splits.length, values.length);
  for (let i = 0; i < count; i++) splits[i] = toNonNegativeOr(values[i], 0);
  updateSplits(node);
}

export function saveSplits(node: SplitViewNode): void {
  if (node.state.splits.length === 0) return;
  node.state.savedSplits = node.state.splits.slice();
}

/** Re-apply the saved splits; no-op when nothing was saved. */
export function restoreSplits(node: SplitViewNode): void {
  const saved = node.state.savedSplits;
  if (saved === null) return;
  setSplits(node, ...saved);
}

/**
 * Collapse the children at `indices` (split 0), optionally saving the current
 * splits first. Nothing changes when any index is out of range.
 */
export function collapseSplits(
  node: SplitViewNode,
  indices: readonly number[],
  save: boolean,
): LayoutResult<readonly number[]> {
  updateSplits(node);
  for (const index of indices) {
    const checked = checkIndex(`collapseSplits(${node.id})`, index, node.children.length);
    if (!checked.ok) return checked;
  }
  if (save) saveSplits(node);
  for (const index of indices) node.state.splits[index] = 0;
  updateSplits(node);
  return ok(node.state.splits.slice());
}

/** Size and place each child: its split of the space left after the handles, full cross extent. */
export function layoutSplitView(node: SplitViewNode): void {
  updateSplits(node);
  const { dim, state } = node;
  const cross = otherDim(dim);
  const n = node.children.length;
  const avail = Math.max(0, dimOf(node.data.allocSize, dim) - state.handleSize * Math.max(0, n - 1));
  const crossSize = dimOf(node.data.allocSize, cross);

  let pos = 0;
  for (let i = 0; i < n; i++) {
    const child = node.children[i];
    if (!child) continue;
    const size = (state.splits[i] ?? 0) * avail;
    const ld = child.data;
    ld.allocSize = withDim(withDim(ld.allocSize, dim, size), cross, crossSize);
    ld.allocPosRel = withDim(withDim(ld.allocPosRel, dim, pos), cross, 0);
    pos += size + state.handleSize;
  }
}

/** Absolute rects of the handles between consecutive placed children. */
export function splitHandleRects(node: SplitViewNode): readonly Rect[] {
  const { dim, state } = node;
  const placed = participants(node.children);
  const rects: Rect[] = [];
  const origin = node.data.allocPos;
  const crossSize = dimOf(node.data.allocSize, otherDim(dim));
  for (let i = 0; i + 1 < placed.length; i++) {
    const child = placed[i];
    if (!child) continue;
    const end = dimOf(child.data.allocPosRel, dim) + dimOf(child.data.allocSize, dim);
    rects.push(
      dim === "x"
        ? { x: origin.x + end, y: origin.y, w: state.handleSize, h: crossSize }
        : { x: origin.x, y: origin.y + end, w: crossSize, h: state.handleSize },
    );
  }
  return Object.freeze(rects);
}
