/**
 * @boxflow/core
 *
 * Constraint-based layout engine for widget trees.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Geometry & style
// =============================================================================

export type {
  Align,
  Dim,
  GridPoint,
  LayoutKind,
  LayoutPhase,
  Overflow,
  Rect,
  Sides,
  Vec2,
} from "./layout/types.js";
export { alignOffset, isAlignEnd, isAlignMiddle, isAlignStart } from "./layout/align.js";
export {
  SPACING_SCALE,
  type SidesInput,
  type SpacingKey,
  type SpacingValue,
  ZERO_SIDES,
  resolveSides,
  resolveSpacingValue,
} from "./layout/spacing-scale.js";
export {
  DEFAULT_LAYOUT_STYLE,
  DEFAULT_LINE_HEIGHT,
  DEFAULT_SCROLLBAR_WIDTH,
  FRAME_STYLE,
  type LayoutStyle,
  type LayoutStyleInput,
  SPACE_STYLE,
  SPLIT_VIEW_STYLE,
  STRETCH_STYLE,
  boxSpacing,
  resolveLayoutStyle,
} from "./layout/style.js";

// =============================================================================
// Size model & allocation
// =============================================================================

export {
  type LayoutData,
  type SizePrefs,
  canStretchNeed,
  createLayoutData,
  hasMaxStretch,
  resetLayoutData,
  setLayoutDataFromStyle,
  updateSizes,
} from "./layout/sizePrefs.js";
export {
  FIT_TOLERANCE,
  type LinearItem,
  type LinearMode,
  type LinearPlan,
  type LinearSlot,
  allocateLinear,
  allocateSingle,
} from "./layout/engine/linear.js";

// =============================================================================
// Nodes
// =============================================================================

export {
  type ContainerNode,
  type ContainerState,
  DEFAULT_SPLIT_HANDLE_SIZE,
  type LayoutChild,
  type LayoutNode,
  type NodeProps,
  type SplitState,
  type SplitViewNode,
  type SplitViewProps,
  type WidgetNode,
  type WidgetProps,
  nodes,
} from "./layout/node.js";
export { gridShape, placeGridChildren } from "./layout/kinds/grid.js";
export { showChildAt, stackTopChild } from "./layout/kinds/stack.js";
export {
  collapseSplits,
  restoreSplits,
  saveSplits,
  setSplits,
  splitHandleRects,
  updateSplits,
} from "./layout/kinds/splitPane.js";

// =============================================================================
// Engine, scrolling & queries
// =============================================================================

export {
  type LayoutEngine,
  type LayoutEngineOptions,
  type ScrollOutcome,
  type ScrollUnit,
  createLayoutEngine,
} from "./layout/engine/layoutEngine.js";
export { SCROLL_PAGE_LINES, type ScrollBar, type ScrollValueChanged } from "./layout/scrollBar.js";
export { contentViewport, moveTree } from "./layout/overflow.js";
export { type HitTarget, contains, hitTest, nodeRect } from "./layout/hitTest.js";

// =============================================================================
// Errors & tracing
// =============================================================================

export { LayoutError, type LayoutErrorCode } from "./layout/errors.js";
export { type InvalidArgumentFatal, type LayoutResult } from "./layout/engine/result.js";
export {
  DEFAULT_TRACE_MAX_RECORDS,
  type LayoutTraceRecord,
  type LayoutTracer,
  type TraceCollector,
  type TraceCollectorOptions,
  createEnvTracer,
  createTraceCollector,
  formatTraceRecord,
} from "./layout/engine/trace.js";
