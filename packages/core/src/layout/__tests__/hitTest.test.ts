import { assert, describe, test } from "@boxflow/testkit";
import { createLayoutEngine } from "../engine/layoutEngine.js";
import { type HitTarget, hitTest } from "../hitTest.js";
import { showChildAt } from "../kinds/stack.js";
import { type LayoutNode, nodes } from "../node.js";

function hitId(target: HitTarget | null): string | null {
  if (target === null) return null;
  return target.kind === "node" ? target.node.id : `${target.node.id}:${target.bar.dim}-bar`;
}

function laidOut(root: LayoutNode, w: number, h: number): LayoutNode {
  createLayoutEngine().layout(root, { x: 0, y: 0, w, h });
  return root;
}

describe("hitTest", () => {
  test("returns the deepest node under the point", () => {
    const root = laidOut(
      nodes.row({ id: "root" }, [
        nodes.widget({ id: "a", width: 40, height: 10 }),
        nodes.widget({ id: "b", width: 60, height: 20 }),
      ]),
      200,
      50,
    );
    assert.equal(hitId(hitTest(root, 45, 5)), "b");
    assert.equal(hitId(hitTest(root, 10, 30)), "root");
    assert.equal(hitId(hitTest(root, 250, 5)), null);
  });

  test("right and bottom edges are exclusive", () => {
    const root = laidOut(
      nodes.row({ id: "root" }, [
        nodes.widget({ id: "a", width: 40, height: 10 }),
        nodes.widget({ id: "b", width: 60, height: 10 }),
      ]),
      100,
      10,
    );
    assert.equal(hitId(hitTest(root, 39, 0)), "a");
    assert.equal(hitId(hitTest(root, 40, 0)), "b");
    assert.equal(hitId(hitTest(root, 40, 10)), null);
  });

  test("later siblings win where they overlap", () => {
    const root = laidOut(
      nodes.widget({ id: "canvas", width: 100, height: 100 }, [
        nodes.widget({ id: "under", posX: 10, posY: 10, width: 40, height: 40 }),
        nodes.widget({ id: "over", posX: 30, posY: 30, width: 40, height: 40 }),
      ]),
      100,
      100,
    );
    assert.equal(hitId(hitTest(root, 35, 35)), "over");
    assert.equal(hitId(hitTest(root, 15, 15)), "under");
  });

  test("stacked containers only report their selected child", () => {
    const stack = nodes.stacked({ id: "stack" }, [
      nodes.stretch({ id: "first" }),
      nodes.stretch({ id: "second" }),
    ]);
    laidOut(stack, 50, 50);
    assert.equal(hitId(hitTest(stack, 10, 10)), "stack");
    const res = showChildAt(stack, 0);
    assert.equal(res.ok, true);
    assert.equal(hitId(hitTest(stack, 10, 10)), "first");
  });

  test("scrollbars take the point before content, and content follows the scroll", () => {
    const items: LayoutNode[] = [];
    for (let i = 0; i < 5; i++) {
      items.push(nodes.widget({ id: `item-${String(i)}`, width: 50, minHeight: 40 }));
    }
    const list = nodes.column({ id: "list" }, items);
    const engine = createLayoutEngine();
    engine.layout(list, { x: 0, y: 0, w: 100, h: 100 });

    assert.equal(hitId(hitTest(list, 90, 10)), "list:y-bar");
    assert.equal(hitId(hitTest(list, 10, 10)), "item-0");
    engine.scroll(list, "y", 50);
    assert.equal(hitId(hitTest(list, 10, 10)), "item-1");
  });

  test("points in the scrollbar corner hit the container itself", () => {
    const wide = nodes.widget({ id: "wide", minWidth: 300, minHeight: 300 });
    const list = nodes.column({ id: "list" }, [wide]);
    laidOut(list, 100, 100);
    // bars: vertical x in [84, 100) y in [0, 84); horizontal y in [84, 100) x in [0, 84)
    assert.equal(hitId(hitTest(list, 95, 50)), "list:y-bar");
    assert.equal(hitId(hitTest(list, 50, 95)), "list:x-bar");
    assert.equal(hitId(hitTest(list, 50, 50)), "wide");
    assert.equal(hitId(hitTest(list, 90, 90)), "list");
  });
});
