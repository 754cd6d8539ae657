/**
 * packages/core/src/layout/engine/layoutEngine.ts — Two-pass layout driver and scroll protocol.
 *
 * Why: Layout is split into a bottom-up size gather and a top-down allocation.
 * Gather runs children first so each container can aggregate their prefs;
 * allocate runs parents first so each container can hand out its own
 * allocation. Scrolling afterwards only moves positions.
 *
 * Container phases: unsized -> gathered -> allocated -> finalized.
 *
 * Update protocol:
 *   - beginUpdate/endUpdate nest; `layout` opens its own update and refuses to
 *     run inside another one
 *   - scrolls while an update is open are recorded and repositioned when the
 *     outermost update ends
 */

import { warnDev } from "../../dev.js";
import { LayoutError } from "../errors.js";
import { gatherGrid, layoutGrid } from "../kinds/grid.js";
import { layoutSplitView, updateSplits } from "../kinds/splitPane.js";
import { gatherStack, layoutStack, stackTopChild } from "../kinds/stack.js";
import {
  type ContainerNode,
  type LayoutNode,
  type WidgetNode,
  isContainer,
  isLayoutAware,
  participants,
} from "../node.js";
import { finalizeChildSize, manageOverflow, moveChildren, scrollDelta } from "../overflow.js";
import { type ScrollBar, destroyScrollBar, setScrollValue } from "../scrollBar.js";
import { setLayoutDataFromStyle, updateSizes } from "../sizePrefs.js";
import { boxSpacing } from "../style.js";
import type { Dim, Rect } from "../types.js";
import type { LinearPlan } from "./linear.js";
import { type LayoutResult, invalidArgument, ok } from "./result.js";
import type { LayoutTracer } from "./trace.js";
import { VEC2_ZERO, addVec, isZeroVec, sidesSum, subVec, vec2 } from "./vec.js";

export type ScrollUnit = "step" | "page";

/**
 * A scroll value change reported to the host. Layouts report values they had
 * to re-clamp; `rerender` asks the host to repaint the container.
 */
export type ScrollOutcome = Readonly<{
  node: ContainerNode;
  dim: Dim;
  value: number;
  changed: boolean;
  deferred: boolean;
  rerender: boolean;
}>;

export type LayoutEngineOptions = Readonly<{
  tracer?: LayoutTracer | null;
}>;

export interface LayoutEngine {
  /** Number of open updates; 0 means scrolls reposition immediately. */
  readonly updateDepth: number;
  /**
   * Size `root` to `viewport` and run gather then allocate. Returns the scroll
   * values the new layout clamped into their shrunken ranges.
   */
  layout(root: LayoutNode, viewport: Rect): readonly ScrollOutcome[];
  /** Bottom-up size gather for the subtree at `node`. */
  gather(node: LayoutNode): void;
  /** Top-down allocation for the subtree at `node`, using its current allocation. */
  allocate(node: LayoutNode): readonly ScrollOutcome[];
  beginUpdate(): void;
  /** Close an update; the outermost close flushes deferred scroll repositioning. */
  endUpdate(): readonly ScrollOutcome[];
  scroll(node: ContainerNode, dim: Dim, value: number): LayoutResult<ScrollOutcome>;
  scrollBy(
    node: ContainerNode,
    dim: Dim,
    amount: number,
    unit?: ScrollUnit,
  ): LayoutResult<ScrollOutcome>;
  /** Destroy the scrollbars of every container in the subtree. */
  release(node: LayoutNode): void;
}

/** Value of each axis at the first deferred scroll of the update. */
type PendingScroll = { node: ContainerNode; start: Map<Dim, number> };

class LayoutEngineImpl implements LayoutEngine {
  private depth = 0;
  private readonly pending = new Map<ContainerNode, PendingScroll>();
  private readonly tracer: LayoutTracer | null;
  private clamped: ScrollOutcome[] = [];

  constructor(opts: LayoutEngineOptions) {
    this.tracer = opts.tracer ?? null;
  }

  get updateDepth(): number {
    return this.depth;
  }

  layout(root: LayoutNode, viewport: Rect): readonly ScrollOutcome[] {
    if (this.depth > 0) {
      throw new LayoutError(
        "LAYOUT_REENTRANT_CALL",
        `layout(${root.id}) called while ${String(this.depth)} update(s) are open`,
      );
    }
    let outcomes: readonly ScrollOutcome[] = [];
    this.beginUpdate();
    try {
      this.gather(root);
      const ld = root.data;
      ld.allocSize = vec2(Math.max(0, viewport.w), Math.max(0, viewport.h));
      ld.allocPos = vec2(viewport.x, viewport.y);
      ld.allocPosOrig = ld.allocPos;
      ld.allocPosRel = VEC2_ZERO;
      outcomes = this.allocate(root);
    } finally {
      this.endUpdate();
    }
    return outcomes;
  }

  gather(node: LayoutNode): void {
    setLayoutDataFromStyle(node.data, node.style);
    const children = participants(node.children);
    for (const child of children) this.gather(child);

    switch (node.kind) {
      case "widget":
        gatherWidget(node);
        break;
      case "splitView":
        updateSplits(node);
        updateSizes(node.data);
        break;
      case "layout": {
        node.state.phase = "unsized";
        if (children.length > 0) {
          if (node.lay === "grid") gatherGrid(node, children);
          else gatherStack(node, children);
        } else {
          updateSizes(node.data);
        }
        node.state.phase = "gathered";
        break;
      }
    }

    if (this.tracer) {
      const { need, pref } = node.data.size;
      this.tracer({ phase: "gather", nodeId: node.id, need, pref });
    }
  }

  allocate(node: LayoutNode): readonly ScrollOutcome[] {
    this.clamped = [];
    this.allocateWith(node, []);
    const outcomes = Object.freeze(this.clamped);
    this.clamped = [];
    return outcomes;
  }

  private allocateWith(node: LayoutNode, ancestors: readonly LayoutNode[]): void {
    switch (node.kind) {
      case "widget":
        placeWidgetChildren(node);
        break;
      case "splitView":
        layoutSplitView(node);
        break;
      case "layout":
        inheritAllocation(node, ancestors);
        this.layoutContainer(node);
        break;
    }

    const origin = node.data.allocPosOrig;
    const offset = addVec(subVec(node.data.allocPos, origin), scrollDelta(node));
    const lineage = [...ancestors, node];
    for (const child of participants(node.children)) {
      const ld = child.data;
      ld.allocPosOrig = addVec(origin, ld.allocPosRel);
      ld.allocPos = addVec(ld.allocPosOrig, offset);
      this.allocateWith(child, lineage);
    }
  }

  private layoutContainer(node: ContainerNode): void {
    const { state } = node;
    const children = participants(node.children);
    if (children.length === 0) {
      state.childSize = VEC2_ZERO;
      this.overflow(node);
      state.phase = "finalized";
      return;
    }

    if (node.lay === "grid") {
      const plans = layoutGrid(node);
      this.traceAllocate(node, "y", plans.rows);
      this.traceAllocate(node, "x", plans.cols);
    } else {
      const plan = layoutStack(node, children);
      if (plan && (node.lay === "row" || node.lay === "column")) {
        this.traceAllocate(node, node.lay === "row" ? "x" : "y", plan);
      }
      if (node.lay === "stacked" && state.stackTop !== null && stackTopChild(node) === null) {
        warnDev(`[layout] stacked container "${node.id}" shows "${state.stackTop}", which is not a child`);
      }
    }
    state.phase = "allocated";

    const childSize = finalizeChildSize(node);
    this.overflow(node);
    state.phase = "finalized";
    if (this.tracer) {
      this.tracer({
        phase: "overflow",
        nodeId: node.id,
        childSize,
        hasHScroll: state.hasHScroll,
        hasVScroll: state.hasVScroll,
      });
    }
  }

  private overflow(node: ContainerNode): void {
    for (const change of manageOverflow(node)) {
      this.clamped.push({
        node,
        dim: change.dim,
        value: change.value,
        changed: true,
        deferred: false,
        rerender: true,
      });
      if (this.tracer) {
        this.tracer({ phase: "scroll", nodeId: node.id, dim: change.dim, value: change.value, deferred: false });
      }
    }
  }

  private traceAllocate(node: ContainerNode, dim: Dim, plan: LinearPlan): void {
    if (!this.tracer) return;
    const spacing = sidesSum(boxSpacing(node.style), dim);
    const size = dim === "x" ? node.data.allocSize.x : node.data.allocSize.y;
    this.tracer({
      phase: "allocate",
      nodeId: node.id,
      dim,
      avail: Math.max(0, size - spacing),
      extra: plan.extra,
      usePref: plan.usePref,
      mode: plan.mode,
    });
  }

  beginUpdate(): void {
    this.depth++;
  }

  endUpdate(): readonly ScrollOutcome[] {
    if (this.depth === 0) {
      throw new LayoutError("LAYOUT_INVALID_STATE", "endUpdate() without a matching beginUpdate()");
    }
    this.depth--;
    if (this.depth > 0 || this.pending.size === 0) return Object.freeze([]);

    const outcomes: ScrollOutcome[] = [];
    for (const { node, start } of this.pending.values()) {
      moveChildren(node);
      for (const [dim, before] of start) {
        const bar = activeBar(node, dim);
        // deactivated since, or scrolled back to where the update began
        if (!bar || bar.value === before) continue;
        outcomes.push({ node, dim, value: bar.value, changed: true, deferred: false, rerender: true });
      }
    }
    this.pending.clear();
    return Object.freeze(outcomes);
  }

  scroll(node: ContainerNode, dim: Dim, value: number): LayoutResult<ScrollOutcome> {
    const bar = activeBar(node, dim);
    if (!bar) {
      return invalidArgument(`scroll(${node.id}): no ${dim === "x" ? "horizontal" : "vertical"} scrollbar`);
    }
    const change = setScrollValue(bar, value);
    const changed = change !== null;
    const deferred = changed && this.depth > 0;
    if (change) {
      if (deferred) {
        const entry = this.pending.get(node) ?? { node, start: new Map<Dim, number>() };
        if (!entry.start.has(dim)) entry.start.set(dim, change.previous);
        this.pending.set(node, entry);
      } else {
        moveChildren(node);
      }
    }
    if (this.tracer && changed) {
      this.tracer({ phase: "scroll", nodeId: node.id, dim, value: bar.value, deferred });
    }
    return ok({ node, dim, value: bar.value, changed, deferred, rerender: changed && !deferred });
  }

  scrollBy(
    node: ContainerNode,
    dim: Dim,
    amount: number,
    unit: ScrollUnit = "step",
  ): LayoutResult<ScrollOutcome> {
    const bar = activeBar(node, dim);
    if (!bar) {
      return invalidArgument(`scrollBy(${node.id}): no ${dim === "x" ? "horizontal" : "vertical"} scrollbar`);
    }
    const unitSize = unit === "page" ? bar.pageStep : bar.step;
    return this.scroll(node, dim, bar.value + amount * unitSize);
  }

  release(node: LayoutNode): void {
    if (isContainer(node)) {
      const { hScroll, vScroll } = node.state;
      if (hScroll && !hScroll.destroyed) destroyScrollBar(hScroll);
      if (vScroll && !vScroll.destroyed) destroyScrollBar(vScroll);
      this.pending.delete(node);
    }
    for (const child of participants(node.children)) this.release(child);
  }
}

/** The bar currently in use on `dim`, if the container scrolls on that axis. */
function activeBar(node: ContainerNode, dim: Dim): ScrollBar | null {
  const { state } = node;
  if (dim === "x") return state.hasHScroll ? state.hScroll : null;
  return state.hasVScroll ? state.vScroll : null;
}

/** Widgets with intrinsic content need at least content plus their box spacing. */
function gatherWidget(node: WidgetNode): void {
  const { content } = node;
  if (content) {
    const spacing = boxSpacing(node.style);
    node.data.allocSize = vec2(
      Math.max(0, content.x) + sidesSum(spacing, "x"),
      Math.max(0, content.y) + sidesSum(spacing, "y"),
    );
  }
  updateSizes(node.data);
}

/**
 * Children of a plain widget sit at their style position. Containers are
 * left unsized so they inherit an allocation from their ancestors.
 */
function placeWidgetChildren(node: WidgetNode): void {
  for (const child of participants(node.children)) {
    const ld = child.data;
    ld.allocPosRel = vec2(child.style.posX, child.style.posY);
    ld.allocSize = child.kind === "layout" ? VEC2_ZERO : ld.size.pref;
  }
}

/** A container with no allocation and no layout-aware parent takes the nearest non-zero ancestor allocation. */
function inheritAllocation(node: ContainerNode, ancestors: readonly LayoutNode[]): void {
  if (!isZeroVec(node.data.allocSize)) return;
  const parent = ancestors[ancestors.length - 1];
  if (parent === undefined || isLayoutAware(parent)) return;
  for (let i = ancestors.length - 1; i >= 0; i--) {
    const ancestor = ancestors[i];
    if (ancestor && !isZeroVec(ancestor.data.allocSize)) {
      node.data.allocSize = ancestor.data.allocSize;
      return;
    }
  }
}

export function createLayoutEngine(opts: LayoutEngineOptions = {}): LayoutEngine {
  return new LayoutEngineImpl(opts);
}
