/**
 * packages/core/src/layout/spacing-scale.ts — Named spacing scale.
 *
 * Why: Provides semantic spacing tokens for margins and padding.
 * Values are in dots.
 *
 * Scale:
 *   - none: 0
 *   - xs: 2
 *   - sm: 4
 *   - md: 8 (frame default for padding + margin combined)
 *   - lg: 12
 *   - xl: 16
 *   - 2xl: 24
 */
import { isFiniteNumber } from "./engine/bounds.js";
import type { Sides } from "./types.js";

/**
 * Named spacing scale keys.
 */
export type SpacingKey = "none" | "xs" | "sm" | "md" | "lg" | "xl" | "2xl";

export const SPACING_SCALE: Readonly<Record<SpacingKey, number>> = Object.freeze({
  none: 0,
  xs: 2,
  sm: 4,
  md: 8,
  lg: 12,
  xl: 16,
  "2xl": 24,
});

/** Either a number of dots or a scale key. */
export type SpacingValue = number | SpacingKey;

/**
 * Spacing for all four sides. A single value applies to every side; the object
 * form takes per-axis (`x`, `y`) and per-side values, per-side winning.
 */
export type SidesInput =
  | SpacingValue
  | Readonly<{
      x?: SpacingValue;
      y?: SpacingValue;
      left?: SpacingValue;
      right?: SpacingValue;
      top?: SpacingValue;
      bottom?: SpacingValue;
    }>;

export const ZERO_SIDES: Sides = Object.freeze({ left: 0, right: 0, top: 0, bottom: 0 });

/**
 * Check if a value is a valid spacing key.
 */
export function isSpacingKey(value: unknown): value is SpacingKey {
  return (
    value === "none" ||
    value === "xs" ||
    value === "sm" ||
    value === "md" ||
    value === "lg" ||
    value === "xl" ||
    value === "2xl"
  );
}

/**
 * Resolve a spacing value to dots. Negative and non-finite numbers resolve to
 * `fallback`.
 *
 * @example
 * ```typescript
 * resolveSpacingValue("md")  // 8
 * resolveSpacingValue(5)     // 5
 * resolveSpacingValue(-3)    // 0
 * ```
 */
export function resolveSpacingValue(value: SpacingValue | undefined, fallback = 0): number {
  if (value === undefined) return fallback;
  if (isSpacingKey(value)) return SPACING_SCALE[value];
  if (isFiniteNumber(value) && value >= 0) return value;
  return fallback;
}

export function uniformSides(n: number): Sides {
  return { left: n, right: n, top: n, bottom: n };
}

export function resolveSides(input: SidesInput | undefined): Sides {
  if (input === undefined) return ZERO_SIDES;
  if (typeof input === "number" || typeof input === "string") {
    return uniformSides(resolveSpacingValue(input));
  }
  const x = resolveSpacingValue(input.x);
  const y = resolveSpacingValue(input.y);
  return {
    left: resolveSpacingValue(input.left, x),
    right: resolveSpacingValue(input.right, x),
    top: resolveSpacingValue(input.top, y),
    bottom: resolveSpacingValue(input.bottom, y),
  };
}

export function addSides(a: Sides, b: Sides): Sides {
  return {
    left: a.left + b.left,
    right: a.right + b.right,
    top: a.top + b.top,
    bottom: a.bottom + b.bottom,
  };
}
