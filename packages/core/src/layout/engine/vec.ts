import type { Dim, Sides, Vec2 } from "../types.js";

export const VEC2_ZERO: Vec2 = Object.freeze({ x: 0, y: 0 });

export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

export function otherDim(d: Dim): Dim {
  return d === "x" ? "y" : "x";
}

export function dimOf(v: Vec2, d: Dim): number {
  return d === "x" ? v.x : v.y;
}

export function withDim(v: Vec2, d: Dim, value: number): Vec2 {
  return d === "x" ? { x: value, y: v.y } : { x: v.x, y: value };
}

export function addVec(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subVec(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function maxVec(a: Vec2, b: Vec2): Vec2 {
  return { x: Math.max(a.x, b.x), y: Math.max(a.y, b.y) };
}

/** Componentwise min against `limit`, skipping axes where `limit` is negative (stretch). */
export function minPosVec(v: Vec2, limit: Vec2): Vec2 {
  return {
    x: limit.x >= 0 ? Math.min(v.x, limit.x) : v.x,
    y: limit.y >= 0 ? Math.min(v.y, limit.y) : v.y,
  };
}

export function isZeroVec(v: Vec2): boolean {
  return v.x === 0 && v.y === 0;
}

/** Spacing before the content along `d` (left or top). */
export function leadingSide(s: Sides, d: Dim): number {
  return d === "x" ? s.left : s.top;
}

/** Spacing after the content along `d` (right or bottom). */
export function trailingSide(s: Sides, d: Dim): number {
  return d === "x" ? s.right : s.bottom;
}

/** Total spacing consumed along `d`. */
export function sidesSum(s: Sides, d: Dim): number {
  return leadingSide(s, d) + trailingSide(s, d);
}
