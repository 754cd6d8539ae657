/**
 * packages/core/src/layout/engine/linear.ts — Single-axis space distribution.
 *
 * Why: Rows, columns and both grid track sets all reduce to the same problem:
 * share `avail` dots along one axis among a sequence of sized items. The cross
 * case places one item against its own `avail` (the orthogonal axis of a row or
 * column, or a child inside its grid cell).
 *
 * Rules:
 *   - start from pref; if the prefs overshoot by more than FIT_TOLERANCE, start from need
 *   - leftover space goes to stretch candidates in proportion to their pref
 *   - without candidates: justify turns it into equal inter-item gaps, otherwise
 *     it becomes one leading offset chosen by alignment
 */

import { alignOffset } from "../align.js";
import type { SizePrefs } from "../sizePrefs.js";
import type { Align, Dim } from "../types.js";
import { dimOf } from "./vec.js";

/** Overshoot tolerated before falling back from pref to need. */
export const FIT_TOLERANCE = 0.1;

export type LinearItem = Readonly<{ need: number; pref: number; max: number }>;

export type LinearSlot = Readonly<{ pos: number; size: number }>;

export type LinearMode = "stretchMax" | "stretchNeed" | "justify" | "align";

export type LinearPlan = Readonly<{
  usePref: boolean;
  extra: number;
  mode: LinearMode;
  slots: readonly LinearSlot[];
}>;

export function linearItemOf(sp: SizePrefs, d: Dim): LinearItem {
  return { need: dimOf(sp.need, d), pref: dimOf(sp.pref, d), max: dimOf(sp.max, d) };
}

function isStretchCandidate(item: LinearItem, usePref: boolean): boolean {
  if (item.max < 0) return true;
  return !usePref && item.pref > item.need;
}

export function allocateLinear(
  avail: number,
  items: readonly LinearItem[],
  align: Align,
  offset: number,
): LinearPlan {
  let sumPref = 0;
  let sumNeed = 0;
  for (const item of items) {
    sumPref += item.pref;
    sumNeed += item.need;
  }

  let usePref = true;
  let extra = avail - sumPref;
  if (extra < -FIT_TOLERANCE) {
    usePref = false;
    extra = avail - sumNeed;
  }
  extra = Math.max(extra, 0);

  let stretchCount = 0;
  let stretchTotal = 0;
  if (extra > 0) {
    for (const item of items) {
      if (!isStretchCandidate(item, usePref)) continue;
      stretchCount++;
      stretchTotal += item.pref;
    }
  }

  const stretching = stretchCount > 0;
  const justify = !stretching && extra > 0 && align === "justify" && items.length > 1;
  const gap = justify ? extra / (items.length - 1) : 0;
  const mode: LinearMode = stretching
    ? usePref
      ? "stretchMax"
      : "stretchNeed"
    : justify
      ? "justify"
      : "align";

  let pos = offset + (mode === "align" ? alignOffset(align, extra) : 0);
  const slots: LinearSlot[] = [];
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (!item) continue;
    let size = usePref ? item.pref : item.need;
    if (stretching) {
      if (isStretchCandidate(item, usePref)) {
        // all-zero prefs would divide by zero; share equally instead
        size +=
          stretchTotal > 0 ? extra * (item.pref / stretchTotal) : extra / stretchCount;
      }
    } else if (justify && i > 0) {
      pos += gap;
    }
    slots.push({ pos, size });
    pos += size;
  }

  return { usePref, extra, mode, slots };
}

/** Place one item against its own available extent. */
export function allocateSingle(
  avail: number,
  item: LinearItem,
  align: Align,
  offset: number,
): LinearSlot {
  let usePref = true;
  let extra = avail - item.pref;
  if (extra < -FIT_TOLERANCE) {
    usePref = false;
    extra = avail - item.need;
  }
  extra = Math.max(extra, 0);

  let size = usePref ? item.pref : item.need;
  let pos = offset;
  const stretch = extra > 0 && (usePref ? item.max < 0 : true);
  if (stretch || align === "justify") {
    size += extra;
  } else {
    pos += alignOffset(align, extra);
  }
  return { pos, size };
}

