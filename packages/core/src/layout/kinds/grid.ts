/**
 * packages/core/src/layout/kinds/grid.ts — Grid shape, cell placement and track allocation.
 *
 * Why: A grid is two linear problems (row tracks on y, column tracks on x)
 * linked by cell membership. Tracks aggregate the sizes of the children placed
 * in them, the track sets are allocated like a column and a row, and each child
 * is then placed inside its cell with its own alignment.
 *
 * Placement:
 *   - children with an explicit col and/or row go first (a missing coordinate is 0,
 *     coordinates wrap into the grid)
 *   - the rest fill free cells in raster order; once the grid is full the cursor
 *     wraps to (0, 0) and cells are shared
 *
 * Track max is "stretch dominates": once a stretchy child lands in a track, the
 * track stays stretchy for as long as its track sequence is reused.
 */

import {
  type LinearItem,
  type LinearPlan,
  type LinearSlot,
  allocateLinear,
  allocateSingle,
  linearItemOf,
} from "../engine/linear.js";
import { VEC2_ZERO, dimOf, vec2, withDim } from "../engine/vec.js";
import type { ContainerNode, LayoutChild, LayoutNode } from "../node.js";
import { type LayoutData, createLayoutData } from "../sizePrefs.js";
import { type LayoutStyle, alignDim } from "../style.js";
import type { Dim, GridPoint } from "../types.js";
import { applyAggregate, contentBox, setSlot } from "./box.js";

export type GridPlans = Readonly<{ rows: LinearPlan; cols: LinearPlan }>;

function isExplicit(style: LayoutStyle): boolean {
  return style.col !== null || style.row !== null;
}

/** Columns and rows for `children`, honoring explicit coordinates and spans. */
export function gridShape(columns: number, children: readonly LayoutNode[]): GridPoint {
  const n = children.length;
  let cols = columns > 0 ? columns : 0;
  let rows = 0;
  for (const child of children) {
    const s = child.style;
    if (s.col !== null) cols = Math.max(cols, s.col + s.colSpan);
    if (s.row !== null) rows = Math.max(rows, s.row + s.rowSpan);
  }
  if (cols === 0) cols = Math.max(1, Math.round(Math.sqrt(n)));
  if (rows === 0) rows = Math.floor(n / cols);
  while (rows * cols < n) rows++;
  return { col: cols, row: rows };
}

/** Resolve a cell for every child slot; null slots stay null. */
export function placeGridChildren(
  shape: GridPoint,
  children: readonly LayoutChild[],
): (GridPoint | null)[] {
  const { col: cols, row: rows } = shape;
  const placement: (GridPoint | null)[] = children.map(() => null);
  if (cols <= 0 || rows <= 0) return placement;

  const occupied = new Uint8Array(cols * rows);
  const mark = (cell: GridPoint, span: GridPoint) => {
    const colEnd = Math.min(cols, cell.col + span.col);
    const rowEnd = Math.min(rows, cell.row + span.row);
    for (let r = cell.row; r < rowEnd; r++) {
      for (let c = cell.col; c < colEnd; c++) occupied[r * cols + c] = 1;
    }
  };

  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (!child || !isExplicit(child.style)) continue;
    const cell = { col: (child.style.col ?? 0) % cols, row: (child.style.row ?? 0) % rows };
    placement[i] = cell;
    mark(cell, child.data.gridSpan);
  }

  let cursor = 0;
  const total = cols * rows;
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (!child || isExplicit(child.style)) continue;
    let probe = 0;
    while (probe < total && occupied[(cursor + probe) % total] === 1) probe++;
    // grid full: share the cell under the cursor
    const index = probe < total ? (cursor + probe) % total : cursor % total;
    const cell = { col: index % cols, row: Math.floor(index / cols) };
    placement[i] = cell;
    mark(cell, child.data.gridSpan);
    cursor = index + 1;
  }
  return placement;
}

function syncTracks(current: LayoutData[], count: number): LayoutData[] {
  if (current.length !== count) {
    const fresh: LayoutData[] = [];
    for (let i = 0; i < count; i++) {
      const ld = createLayoutData();
      ld.size = { need: VEC2_ZERO, pref: VEC2_ZERO, max: vec2(Infinity, Infinity) };
      fresh.push(ld);
    }
    return fresh;
  }
  for (const ld of current) {
    ld.size = { need: VEC2_ZERO, pref: VEC2_ZERO, max: ld.size.max };
    ld.allocSize = VEC2_ZERO;
    ld.allocPosRel = VEC2_ZERO;
  }
  return current;
}

function absorb(track: LayoutData | undefined, child: LayoutNode, d: Dim, span: number): void {
  if (!track) return;
  const { need, pref, max } = child.data.size;
  const share = Math.max(1, span);
  const t = track.size;
  track.size = {
    need: withDim(t.need, d, Math.max(dimOf(t.need, d), dimOf(need, d) / share)),
    pref: withDim(t.pref, d, Math.max(dimOf(t.pref, d), dimOf(pref, d) / share)),
    max: dimOf(max, d) < 0 ? withDim(t.max, d, -1) : t.max,
  };
}

function trackSum(tracks: readonly LayoutData[], d: Dim, pick: "need" | "pref"): number {
  let sum = 0;
  for (const t of tracks) sum += dimOf(t.size[pick], d);
  return sum;
}

/** Size-gather for a grid container: shape, placement, track aggregation. */
export function gatherGrid(node: ContainerNode, children: readonly LayoutNode[]): void {
  const { state } = node;
  const shape = gridShape(node.style.columns, children);
  state.gridSize = shape;
  state.tracks = {
    cols: syncTracks(state.tracks.cols, shape.col),
    rows: syncTracks(state.tracks.rows, shape.row),
  };
  state.placement = placeGridChildren(shape, node.children);

  for (let i = 0; i < node.children.length; i++) {
    const child = node.children[i];
    const cell = state.placement[i];
    if (!child || !cell) continue;
    child.data.gridPos = cell;
    const span = child.data.gridSpan;
    const colEnd = Math.min(shape.col, cell.col + span.col);
    const rowEnd = Math.min(shape.row, cell.row + span.row);
    for (let c = cell.col; c < colEnd; c++) {
      absorb(state.tracks.cols[c], child, "x", colEnd - cell.col);
    }
    for (let r = cell.row; r < rowEnd; r++) {
      absorb(state.tracks.rows[r], child, "y", rowEnd - cell.row);
    }
  }

  const { cols, rows } = state.tracks;
  applyAggregate(
    node.data,
    contentBox(node).spacing,
    vec2(trackSum(cols, "x", "need"), trackSum(rows, "y", "need")),
    vec2(trackSum(cols, "x", "pref"), trackSum(rows, "y", "pref")),
  );
}

function allocateTracks(
  tracks: readonly LayoutData[],
  d: Dim,
  avail: number,
  node: ContainerNode,
  offset: number,
): LinearPlan {
  const items: LinearItem[] = tracks.map((t) => linearItemOf(t.size, d));
  const plan = allocateLinear(avail, items, alignDim(node.style, d), offset);
  for (let i = 0; i < tracks.length; i++) {
    const track = tracks[i];
    const slot = plan.slots[i];
    if (track && slot) setSlot(track, d, slot);
  }
  return plan;
}

/** Extent covered by tracks [start, end), including any gaps between them. */
function spanSlot(tracks: readonly LayoutData[], d: Dim, start: number, end: number): LinearSlot {
  const first = tracks[start];
  const last = tracks[Math.max(start, end - 1)];
  if (!first || !last) return { pos: 0, size: 0 };
  const pos = dimOf(first.allocPosRel, d);
  return { pos, size: dimOf(last.allocPosRel, d) + dimOf(last.allocSize, d) - pos };
}

export function layoutGrid(node: ContainerNode): GridPlans {
  const box = contentBox(node);
  const { state } = node;
  const rows = allocateTracks(state.tracks.rows, "y", box.avail.y, node, box.origin.y);
  const cols = allocateTracks(state.tracks.cols, "x", box.avail.x, node, box.origin.x);

  for (let i = 0; i < node.children.length; i++) {
    const child = node.children[i];
    const cell = state.placement[i];
    if (!child || !cell) continue;
    const span = child.data.gridSpan;
    const xCell = spanSlot(state.tracks.cols, "x", cell.col, Math.min(state.gridSize.col, cell.col + span.col));
    const yCell = spanSlot(state.tracks.rows, "y", cell.row, Math.min(state.gridSize.row, cell.row + span.row));
    setSlot(
      child.data,
      "x",
      allocateSingle(xCell.size, linearItemOf(child.data.size, "x"), alignDim(child.style, "x"), xCell.pos),
    );
    setSlot(
      child.data,
      "y",
      allocateSingle(yCell.size, linearItemOf(child.data.size, "y"), alignDim(child.style, "y"), yCell.pos),
    );
  }
  return { rows, cols };
}
