export { assert, describe, test } from "./nodeTest.js";
export {
  GEOMETRY_EPSILON,
  type RectLike,
  type VecLike,
  assertCloseTo,
  assertRectClose,
  assertVecClose,
} from "./geometry.js";
