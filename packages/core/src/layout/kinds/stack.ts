/**
 * packages/core/src/layout/kinds/stack.ts — Row, column and stacked containers.
 *
 * Why: Row and column are the same algorithm on swapped axes: the flow axis
 * sums children and goes through the linear allocator, the cross axis takes the
 * max and places each child on its own. Stacked uses the cross case on both
 * axes; only the selected child is visible.
 */

import { allocateSingle, allocateLinear, type LinearPlan, linearItemOf } from "../engine/linear.js";
import { type LayoutResult, checkIndex, invalidArgument, ok } from "../engine/result.js";
import { VEC2_ZERO, addVec, maxVec, otherDim, vec2 } from "../engine/vec.js";
import type { ContainerNode, LayoutNode } from "../node.js";
import { alignDim } from "../style.js";
import type { Dim, LayoutKind } from "../types.js";
import { applyAggregate, contentBox, setSlot } from "./box.js";

/** Axis along which children are summed, or null when they overlap. */
export function flowDim(lay: LayoutKind): Dim | null {
  if (lay === "row") return "x";
  if (lay === "column") return "y";
  return null;
}

export function gatherStack(node: ContainerNode, children: readonly LayoutNode[]): void {
  let sumNeed = VEC2_ZERO;
  let sumPref = VEC2_ZERO;
  let maxNeed = VEC2_ZERO;
  let maxPref = VEC2_ZERO;
  for (const child of children) {
    const { need, pref } = child.data.size;
    sumNeed = addVec(sumNeed, need);
    sumPref = addVec(sumPref, pref);
    maxNeed = maxVec(maxNeed, need);
    maxPref = maxVec(maxPref, pref);
  }

  const flow = flowDim(node.lay);
  const need = vec2(flow === "x" ? sumNeed.x : maxNeed.x, flow === "y" ? sumNeed.y : maxNeed.y);
  const pref = vec2(flow === "x" ? sumPref.x : maxPref.x, flow === "y" ? sumPref.y : maxPref.y);
  applyAggregate(node.data, contentBox(node).spacing, need, pref);
}

/**
 * Allocate children of a row, column or stacked container.
 * Returns the flow-axis plan, or null for stacked.
 */
export function layoutStack(node: ContainerNode, children: readonly LayoutNode[]): LinearPlan | null {
  const box = contentBox(node);
  const flow = flowDim(node.lay);

  let plan: LinearPlan | null = null;
  if (flow !== null) {
    const items = children.map((c) => linearItemOf(c.data.size, flow));
    plan = allocateLinear(box.avail[flow], items, alignDim(node.style, flow), box.origin[flow]);
    for (let i = 0; i < children.length; i++) {
      const child = children[i];
      const slot = plan.slots[i];
      if (child && slot) setSlot(child.data, flow, slot);
    }
  }

  const cross: readonly Dim[] = flow === null ? ["x", "y"] : [otherDim(flow)];
  for (const d of cross) {
    for (const child of children) {
      const slot = allocateSingle(
        box.avail[d],
        linearItemOf(child.data.size, d),
        alignDim(child.style, d),
        box.origin[d],
      );
      setSlot(child.data, d, slot);
    }
  }
  return plan;
}

/** Select the visible child of a stacked container by index. */
export function showChildAt(node: ContainerNode, index: number): LayoutResult<LayoutNode> {
  const checked = checkIndex(`showChildAt(${node.id})`, index, node.children.length);
  if (!checked.ok) return checked;
  const child = node.children[checked.value];
  if (!child) {
    return invalidArgument(`showChildAt(${node.id}): slot ${String(index)} is empty`);
  }
  node.state.stackTop = child.id;
  return ok(child);
}

/** The selected child, or null when nothing is selected or it is no longer a child. */
export function stackTopChild(node: ContainerNode): LayoutNode | null {
  const top = node.state.stackTop;
  if (top === null) return null;
  for (const child of node.children) {
    if (child && child.id === top) return child;
  }
  return null;
}
