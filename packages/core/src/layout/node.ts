/**
 * packages/core/src/layout/node.ts — Layout node model and builders.
 *
 * Why: The engine works on a tree it does not own. Each node carries its
 * resolved style, its exclusively-owned LayoutData and, for containers, the
 * per-container state the two passes read and write. `null` children are
 * placeholders for nodes that do not take part in layout.
 *
 * Kinds:
 *   - widget: leaf-ish node; sizes from style (and intrinsic content), places its
 *     own children at their style position
 *   - layout: row / column / grid / stacked container
 *   - splitView: proportional partition along one axis
 */

import { VEC2_ZERO } from "./engine/vec.js";
import type { ScrollBar } from "./scrollBar.js";
import { type LayoutData, createLayoutData } from "./sizePrefs.js";
import {
  FRAME_STYLE,
  type LayoutStyle,
  type LayoutStyleInput,
  SPACE_STYLE,
  SPLIT_VIEW_STYLE,
  STRETCH_STYLE,
  resolveLayoutStyle,
} from "./style.js";
import type { Dim, GridPoint, LayoutKind, LayoutPhase, Vec2 } from "./types.js";

export type LayoutChild = LayoutNode | null;

type NodeBase = {
  readonly id: string;
  style: LayoutStyle;
  readonly data: LayoutData;
  children: readonly LayoutChild[];
};

export type GridTracks = {
  rows: LayoutData[];
  cols: LayoutData[];
};

export type ContainerState = {
  phase: LayoutPhase;
  childSize: Vec2;
  extraSize: Vec2;
  hasHScroll: boolean;
  hasVScroll: boolean;
  hScroll: ScrollBar | null;
  vScroll: ScrollBar | null;
  gridSize: GridPoint;
  tracks: GridTracks;
  /** Resolved grid cell per child slot (null for skipped children). */
  placement: readonly (GridPoint | null)[];
  /** Id of the stacked child that is shown. */
  stackTop: string | null;
};

export type SplitState = {
  splits: number[];
  savedSplits: number[] | null;
  handleSize: number;
};

export type WidgetNode = NodeBase & {
  readonly kind: "widget";
  /** Intrinsic content extent, e.g. measured text; raises need. */
  content: Vec2 | null;
};

export type ContainerNode = NodeBase & {
  readonly kind: "layout";
  readonly lay: LayoutKind;
  readonly state: ContainerState;
};

export type SplitViewNode = NodeBase & {
  readonly kind: "splitView";
  readonly dim: Dim;
  readonly state: SplitState;
};

export type LayoutNode = WidgetNode | ContainerNode | SplitViewNode;

/** Default extent of the handle between split-view children. */
export const DEFAULT_SPLIT_HANDLE_SIZE = 10;

export function createContainerState(): ContainerState {
  return {
    phase: "unsized",
    childSize: VEC2_ZERO,
    extraSize: VEC2_ZERO,
    hasHScroll: false,
    hasVScroll: false,
    hScroll: null,
    vScroll: null,
    gridSize: Object.freeze({ col: 0, row: 0 }),
    tracks: { rows: [], cols: [] },
    placement: Object.freeze([]),
    stackTop: null,
  };
}

export function isContainer(node: LayoutNode): node is ContainerNode {
  return node.kind === "layout";
}

/** Containers that position their children themselves. */
export function isLayoutAware(node: LayoutNode): boolean {
  return node.kind === "layout" || node.kind === "splitView";
}

/** Children that take part in layout, in order. */
export function participants(children: readonly LayoutChild[]): LayoutNode[] {
  const out: LayoutNode[] = [];
  for (const child of children) {
    if (child) out.push(child);
  }
  return out;
}

/* ---------- Builders ---------- */

export type NodeProps = LayoutStyleInput & Readonly<{ id: string }>;

export type WidgetProps = NodeProps & Readonly<{ content?: Vec2 }>;

export type SplitViewProps = NodeProps &
  Readonly<{ dim?: Dim; splits?: readonly number[]; handleSize?: number }>;

function widget(props: WidgetProps, children: readonly LayoutChild[] = []): WidgetNode {
  return {
    kind: "widget",
    id: props.id,
    style: resolveLayoutStyle(props),
    data: createLayoutData(),
    children,
    content: props.content ?? null,
  };
}

function container(
  lay: LayoutKind,
  props: NodeProps,
  children: readonly LayoutChild[],
  base?: LayoutStyle,
): ContainerNode {
  return {
    kind: "layout",
    lay,
    id: props.id,
    style: resolveLayoutStyle(props, base),
    data: createLayoutData(),
    children,
    state: createContainerState(),
  };
}

function row(props: NodeProps, children: readonly LayoutChild[] = []): ContainerNode {
  return container("row", props, children);
}

function column(props: NodeProps, children: readonly LayoutChild[] = []): ContainerNode {
  return container("column", props, children);
}

function grid(props: NodeProps, children: readonly LayoutChild[] = []): ContainerNode {
  return container("grid", props, children);
}

function stacked(props: NodeProps, children: readonly LayoutChild[] = []): ContainerNode {
  return container("stacked", props, children);
}

/** Container with the bordered box-model defaults. */
function frame(
  lay: LayoutKind,
  props: NodeProps,
  children: readonly LayoutChild[] = [],
): ContainerNode {
  return container(lay, props, children, resolveLayoutStyle(FRAME_STYLE));
}

function stretch(props: NodeProps): WidgetNode {
  return widget({ ...STRETCH_STYLE, ...props });
}

function space(props: NodeProps): WidgetNode {
  return widget({ ...SPACE_STYLE, ...props });
}

function splitView(props: SplitViewProps, children: readonly LayoutChild[] = []): SplitViewNode {
  return {
    kind: "splitView",
    dim: props.dim ?? "x",
    id: props.id,
    style: resolveLayoutStyle({ ...SPLIT_VIEW_STYLE, ...props }),
    data: createLayoutData(),
    children,
    state: {
      splits: props.splits ? [...props.splits] : [],
      savedSplits: null,
      handleSize:
        props.handleSize !== undefined && Number.isFinite(props.handleSize) && props.handleSize >= 0
          ? props.handleSize
          : DEFAULT_SPLIT_HANDLE_SIZE,
    },
  };
}

/**
 * Node builders.
 *
 * @example
 * ```ts
 * const root = nodes.column({ id: "root", padding: 4 }, [
 *   nodes.widget({ id: "title", width: 120, height: 20 }),
 *   nodes.stretch({ id: "fill" }),
 * ]);
 * ```
 */
export const nodes = {
  widget,
  row,
  column,
  grid,
  stacked,
  frame,
  stretch,
  space,
  splitView,
};
