/**
 * packages/core/src/layout/scrollBar.ts — Scrollbar range/value state.
 *
 * Why: Scrollbars are owned by the container whose content overflows. Their
 * value changes come back as event values (not callbacks) so the owning
 * container decides synchronously whether to reposition now or later.
 */

import { LayoutError } from "./errors.js";
import { type LayoutData, createLayoutData, resetLayoutData } from "./sizePrefs.js";
import type { Dim } from "./types.js";

/** Page step as a multiple of the line step. */
export const SCROLL_PAGE_LINES = 10;

export type ScrollBar = {
  readonly dim: Dim;
  min: number;
  max: number;
  step: number;
  pageStep: number;
  /** Visible viewport extent on this axis. */
  thumbSize: number;
  value: number;
  active: boolean;
  destroyed: boolean;
  /** Geometry of the bar itself, relative to the container origin. */
  readonly data: LayoutData;
};

export type ScrollValueChanged = Readonly<{
  kind: "valueChanged";
  dim: Dim;
  value: number;
  previous: number;
}>;

export type ScrollRange = Readonly<{
  max: number;
  step: number;
  thumbSize: number;
}>;

export function createScrollBar(dim: Dim): ScrollBar {
  return {
    dim,
    min: 0,
    max: 0,
    step: 0,
    pageStep: 0,
    thumbSize: 0,
    value: 0,
    active: false,
    destroyed: false,
    data: createLayoutData(),
  };
}

/** Largest value that still keeps a full viewport of content visible. */
export function scrollBarMaxValue(bar: ScrollBar): number {
  return Math.max(bar.min, bar.max - bar.thumbSize);
}

export function clampScrollValue(bar: ScrollBar, value: number): number {
  if (!Number.isFinite(value)) return bar.min;
  const hi = scrollBarMaxValue(bar);
  if (value <= bar.min) return bar.min;
  if (value >= hi) return hi;
  return value;
}

function assertAlive(bar: ScrollBar): void {
  if (bar.destroyed) {
    throw new LayoutError("LAYOUT_DESTROYED_SCROLLBAR", `scrollbar (${bar.dim}) was destroyed`);
  }
}

function applyValue(bar: ScrollBar, value: number): ScrollValueChanged | null {
  const next = clampScrollValue(bar, value);
  if (next === bar.value) return null;
  const previous = bar.value;
  bar.value = next;
  return { kind: "valueChanged", dim: bar.dim, value: next, previous };
}

/**
 * Update range and steps; the current value is re-clamped into the new range.
 * Returns the value change caused by the clamp, if any.
 */
export function configureScrollBar(bar: ScrollBar, range: ScrollRange): ScrollValueChanged | null {
  assertAlive(bar);
  bar.min = 0;
  bar.max = Math.max(0, range.max);
  bar.step = Math.max(0, range.step);
  bar.pageStep = SCROLL_PAGE_LINES * bar.step;
  bar.thumbSize = Math.max(0, range.thumbSize);
  bar.active = true;
  return applyValue(bar, bar.value);
}

export function setScrollValue(bar: ScrollBar, value: number): ScrollValueChanged | null {
  assertAlive(bar);
  return applyValue(bar, value);
}

/** Zero the bar's geometry while keeping it (and its value) for reuse. */
export function deactivateScrollBar(bar: ScrollBar): void {
  bar.active = false;
  resetLayoutData(bar.data);
}

export function destroyScrollBar(bar: ScrollBar): void {
  deactivateScrollBar(bar);
  bar.destroyed = true;
}
