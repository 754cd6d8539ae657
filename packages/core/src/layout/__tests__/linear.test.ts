import { assert, assertCloseTo, describe, test } from "@boxflow/testkit";
import { type LinearItem, allocateLinear, allocateSingle } from "../engine/linear.js";

const INF = Number.POSITIVE_INFINITY;

function item(need: number, pref: number, max = INF): LinearItem {
  return { need, pref, max };
}

describe("allocateLinear", () => {
  test("prefs that fit are kept and leftover space becomes an alignment offset", () => {
    const plan = allocateLinear(100, [item(5, 10), item(5, 20), item(5, 30)], "left", 0);
    assert.equal(plan.usePref, true);
    assert.equal(plan.extra, 40);
    assert.equal(plan.mode, "align");
    assert.deepEqual(plan.slots, [
      { pos: 0, size: 10 },
      { pos: 10, size: 20 },
      { pos: 30, size: 30 },
    ]);
  });

  test("allocated sizes plus the unused extra add up to the available space", () => {
    const plan = allocateLinear(100, [item(5, 10), item(5, 20), item(5, 30)], "left", 0);
    const used = plan.slots.reduce((sum, s) => sum + s.size, 0);
    assert.equal(used + plan.extra, 100);
  });

  test("stretchy items share the extra in proportion to pref", () => {
    const plan = allocateLinear(80, [item(2, 10, -1), item(2, 30, -1)], "left", 0);
    assert.equal(plan.mode, "stretchMax");
    assert.deepEqual(plan.slots, [
      { pos: 0, size: 20 },
      { pos: 20, size: 60 },
    ]);
  });

  test("only items marked stretchy grow while prefs fit", () => {
    const plan = allocateLinear(100, [item(2, 20), item(2, 20, -1)], "left", 0);
    assert.deepEqual(plan.slots, [
      { pos: 0, size: 20 },
      { pos: 20, size: 80 },
    ]);
  });

  test("overshooting prefs fall back to need and grow toward pref, never below need", () => {
    const plan = allocateLinear(40, [item(10, 50), item(20, 50)], "left", 0);
    assert.equal(plan.usePref, false);
    assert.equal(plan.extra, 10);
    assert.equal(plan.mode, "stretchNeed");
    assert.deepEqual(plan.slots, [
      { pos: 0, size: 15 },
      { pos: 15, size: 25 },
    ]);
  });

  test("needs that do not fit are kept as-is", () => {
    const plan = allocateLinear(30, [item(20, 20), item(20, 40)], "center", 0);
    assert.equal(plan.extra, 0);
    assert.deepEqual(plan.slots, [
      { pos: 0, size: 20 },
      { pos: 20, size: 20 },
    ]);
  });

  test("an overshoot within tolerance keeps pref", () => {
    const plan = allocateLinear(100, [item(10, 50), item(10, 50.05)], "left", 0);
    assert.equal(plan.usePref, true);
    assert.equal(plan.extra, 0);
  });

  test("justify spreads the extra as equal gaps between items", () => {
    const plan = allocateLinear(80, [item(2, 20), item(2, 20), item(2, 20)], "justify", 0);
    assert.equal(plan.mode, "justify");
    assert.deepEqual(
      plan.slots.map((s) => s.pos),
      [0, 30, 60],
    );
  });

  test("justify with one item falls back to alignment", () => {
    const plan = allocateLinear(80, [item(2, 20)], "justify", 0);
    assert.equal(plan.mode, "align");
    assert.deepEqual(plan.slots, [{ pos: 0, size: 20 }]);
  });

  test("middle and end alignment offset the whole run", () => {
    const items = [item(2, 10), item(2, 10)];
    assert.deepEqual(
      allocateLinear(50, items, "center", 0).slots.map((s) => s.pos),
      [15, 25],
    );
    assert.deepEqual(
      allocateLinear(50, items, "right", 0).slots.map((s) => s.pos),
      [30, 40],
    );
    assert.deepEqual(
      allocateLinear(50, items, "baseline", 0).slots.map((s) => s.pos),
      [0, 10],
    );
  });

  test("positions start at the given offset", () => {
    const plan = allocateLinear(50, [item(2, 10), item(2, 10)], "left", 6);
    assert.deepEqual(
      plan.slots.map((s) => s.pos),
      [6, 16],
    );
  });

  test("stretchy items with zero pref share the extra equally", () => {
    const plan = allocateLinear(10, [item(0, 0, -1), item(0, 0, -1)], "left", 0);
    assert.deepEqual(plan.slots, [
      { pos: 0, size: 5 },
      { pos: 5, size: 5 },
    ]);
  });

  test("proportional shares stay within float tolerance", () => {
    const plan = allocateLinear(100, [item(0, 1, -1), item(0, 1, -1), item(0, 1, -1)], "left", 0);
    const [a, b, c] = plan.slots;
    assertCloseTo(a?.size ?? 0, 1 + 97 / 3);
    assertCloseTo(b?.pos ?? 0, 1 + 97 / 3);
    assertCloseTo((c?.pos ?? 0) + (c?.size ?? 0), 100);
  });
});

describe("allocateSingle", () => {
  test("a stretchy item fills the space", () => {
    assert.deepEqual(allocateSingle(100, item(2, 20, -1), "left", 0), { pos: 0, size: 100 });
  });

  test("a fixed item is aligned within the space", () => {
    assert.deepEqual(allocateSingle(100, item(2, 20), "center", 0), { pos: 40, size: 20 });
    assert.deepEqual(allocateSingle(100, item(2, 20), "bottom", 5), { pos: 85, size: 20 });
    assert.deepEqual(allocateSingle(100, item(2, 20), "top", 5), { pos: 5, size: 20 });
  });

  test("justify makes the item fill", () => {
    assert.deepEqual(allocateSingle(100, item(2, 20), "justify", 0), { pos: 0, size: 100 });
  });

  test("an item whose pref overshoots grows from need to the space", () => {
    assert.deepEqual(allocateSingle(50, item(10, 200), "center", 0), { pos: 0, size: 50 });
  });

  test("an item whose need overshoots keeps its need", () => {
    assert.deepEqual(allocateSingle(50, item(80, 200), "center", 0), { pos: 0, size: 80 });
  });
});
