/**
 * Approximate assertions for layout geometry.
 *
 * Allocation arithmetic is floating point (proportional shares, halves for
 * centering), so exact equality is only safe for values built from integers.
 */

import { strict as assert } from "node:assert";

/** Default absolute tolerance, in dots. */
export const GEOMETRY_EPSILON = 1e-9;

export type VecLike = Readonly<{ x: number; y: number }>;

export type RectLike = Readonly<{ x: number; y: number; w: number; h: number }>;

export function assertCloseTo(
  actual: number,
  expected: number,
  message?: string,
  epsilon = GEOMETRY_EPSILON,
): void {
  if (Math.abs(actual - expected) <= epsilon) return;
  assert.fail(message ?? `expected ${String(actual)} to be within ${String(epsilon)} of ${String(expected)}`);
}

export function assertVecClose(
  actual: VecLike,
  expected: VecLike,
  message?: string,
  epsilon = GEOMETRY_EPSILON,
): void {
  const label = message ? `${message}: ` : "";
  assertCloseTo(actual.x, expected.x, `${label}x ${String(actual.x)} != ${String(expected.x)}`, epsilon);
  assertCloseTo(actual.y, expected.y, `${label}y ${String(actual.y)} != ${String(expected.y)}`, epsilon);
}

export function assertRectClose(
  actual: RectLike,
  expected: RectLike,
  message?: string,
  epsilon = GEOMETRY_EPSILON,
): void {
  const label = message ? `${message}: ` : "";
  assertVecClose(actual, expected, `${label}position`, epsilon);
  assertCloseTo(actual.w, expected.w, `${label}w ${String(actual.w)} != ${String(expected.w)}`, epsilon);
  assertCloseTo(actual.h, expected.h, `${label}h ${String(actual.h)} != ${String(expected.h)}`, epsilon);
}
