import { assert, describe, test } from "@boxflow/testkit";
import { createLayoutEngine } from "../engine/layoutEngine.js";
import { LayoutError } from "../errors.js";
import { nodeRect } from "../hitTest.js";
import { showChildAt, stackTopChild } from "../kinds/stack.js";
import { type LayoutNode, nodes } from "../node.js";

function mustLayout(root: LayoutNode, w: number, h: number, x = 0, y = 0): void {
  createLayoutEngine().layout(root, { x, y, w, h });
}

describe("row and column layout", () => {
  test("row sums prefs along x and takes the max along y", () => {
    const a = nodes.widget({ id: "a", width: 40, height: 10 });
    const b = nodes.widget({ id: "b", width: 60, height: 20 });
    const row = nodes.row({ id: "row" }, [a, b]);
    createLayoutEngine().gather(row);
    assert.deepEqual(row.data.size.need, { x: 4, y: 2 });
    assert.deepEqual(row.data.size.pref, { x: 100, y: 20 });
    assert.equal(row.state.phase, "gathered");
  });

  test("row places children left to right at their prefs", () => {
    const a = nodes.widget({ id: "a", width: 40, height: 10 });
    const b = nodes.widget({ id: "b", width: 60, height: 20 });
    const row = nodes.row({ id: "row" }, [a, b]);
    mustLayout(row, 200, 50, 10, 5);
    assert.deepEqual(nodeRect(a), { x: 10, y: 5, w: 40, h: 10 });
    assert.deepEqual(nodeRect(b), { x: 50, y: 5, w: 60, h: 20 });
    assert.deepEqual(b.data.allocPosRel, { x: 40, y: 0 });
    assert.deepEqual(row.state.childSize, { x: 100, y: 20 });
    assert.equal(row.state.phase, "finalized");
  });

  test("stretch fillers split the extra 1:3 by their widths", () => {
    const narrow = nodes.stretch({ id: "narrow", width: 10 });
    const wide = nodes.stretch({ id: "wide", width: 30 });
    const row = nodes.row({ id: "row" }, [narrow, wide]);
    mustLayout(row, 80, 20);
    assert.equal(narrow.data.allocSize.x, 20);
    assert.equal(wide.data.allocSize.x, 60);
    assert.equal(wide.data.allocPosRel.x, 20);
    // cross axis: stretchy on y as well
    assert.equal(wide.data.allocSize.y, 20);
  });

  test("column justify leaves equal gaps", () => {
    const kids = ["a", "b", "c"].map((id) => nodes.widget({ id, width: 10, height: 20 }));
    const col = nodes.column({ id: "col", alignV: "justify" }, kids);
    mustLayout(col, 50, 80);
    assert.deepEqual(
      kids.map((k) => k.data.allocPos.y),
      [0, 30, 60],
    );
  });

  test("cross-axis placement follows the child's own alignment", () => {
    const centered = nodes.widget({ id: "c", width: 20, height: 10, alignH: "center" });
    const right = nodes.widget({ id: "r", width: 20, height: 10, alignH: "right" });
    const col = nodes.column({ id: "col" }, [centered, right]);
    mustLayout(col, 100, 40);
    assert.equal(centered.data.allocPos.x, 40);
    assert.equal(right.data.allocPos.x, 80);
  });

  test("frames offset their content by margin, border and padding", () => {
    const child = nodes.widget({ id: "child", width: 40, height: 10 });
    const frame = nodes.frame("column", { id: "frame" }, [child]);
    createLayoutEngine().gather(frame);
    assert.deepEqual(frame.data.size.need, { x: 14, y: 14 });
    assert.deepEqual(frame.data.size.pref, { x: 52, y: 22 });

    mustLayout(frame, 100, 100);
    assert.deepEqual(nodeRect(child), { x: 6, y: 6, w: 40, h: 10 });
    assert.deepEqual(frame.state.childSize, { x: 46, y: 16 });
    assert.equal(frame.state.hasVScroll, false);
  });

  test("null children are skipped", () => {
    const a = nodes.widget({ id: "a", width: 30, height: 10 });
    const b = nodes.widget({ id: "b", width: 30, height: 10 });
    const row = nodes.row({ id: "row" }, [a, null, b]);
    mustLayout(row, 100, 10);
    assert.equal(b.data.allocPosRel.x, 30);
  });

  test("an empty container keeps zero child size and no scrollbars", () => {
    const row = nodes.row({ id: "row", width: 30 }, [null]);
    mustLayout(row, 10, 10);
    assert.deepEqual(row.state.childSize, { x: 0, y: 0 });
    assert.deepEqual(row.data.size.pref, { x: 30, y: 2 });
    assert.equal(row.state.hScroll, null);
  });

  test("widgets place their children at the style position", () => {
    const badge = nodes.widget({ id: "badge", posX: 12, posY: 4, width: 8, height: 8 });
    const icon = nodes.widget({ id: "icon", width: 40, height: 30 }, [badge]);
    const row = nodes.row({ id: "row" }, [nodes.widget({ id: "pad", width: 10, height: 5 }), icon]);
    mustLayout(row, 100, 40);
    assert.deepEqual(nodeRect(badge), { x: 22, y: 4, w: 8, h: 8 });
  });

  test("a container inside a plain widget inherits the widget's allocation", () => {
    const leaf = nodes.widget({ id: "leaf", width: 10, height: 10 });
    const inner = nodes.row({ id: "inner" }, [leaf]);
    const host = nodes.widget({ id: "host", width: 120, height: 80 }, [inner]);
    const root = nodes.column({ id: "root" }, [host]);
    mustLayout(root, 200, 200);
    assert.deepEqual(host.data.allocSize, { x: 120, y: 80 });
    assert.deepEqual(inner.data.allocSize, { x: 120, y: 80 });
  });

  test("widget content raises need", () => {
    const label = nodes.widget({ id: "label", content: { x: 70, y: 12 }, padding: 1 });
    const row = nodes.row({ id: "row" }, [label]);
    createLayoutEngine().gather(row);
    assert.deepEqual(label.data.size.need, { x: 72, y: 14 });
    assert.deepEqual(label.data.size.pref, { x: 72, y: 14 });
  });
});

describe("stacked layout", () => {
  test("every child gets the cross placement on both axes", () => {
    const a = nodes.widget({ id: "a", width: 20, height: 10, alignH: "center", alignV: "middle" });
    const b = nodes.stretch({ id: "b" });
    const stack = nodes.stacked({ id: "stack" }, [a, b]);
    mustLayout(stack, 100, 50);
    assert.deepEqual(nodeRect(a), { x: 40, y: 20, w: 20, h: 10 });
    assert.deepEqual(nodeRect(b), { x: 0, y: 0, w: 100, h: 50 });
  });

  test("showChildAt selects a child by index and stores its id", () => {
    const a = nodes.widget({ id: "a" });
    const b = nodes.widget({ id: "b" });
    const stack = nodes.stacked({ id: "stack" }, [a, b]);
    assert.equal(stackTopChild(stack), null);

    const res = showChildAt(stack, 1);
    assert.equal(res.ok, true);
    assert.equal(stack.state.stackTop, "b");
    assert.equal(stackTopChild(stack), b);

    stack.children = [a];
    assert.equal(stackTopChild(stack), null);
  });

  test("showChildAt rejects an out-of-range index", () => {
    const stack = nodes.stacked({ id: "stack" }, [nodes.widget({ id: "a" })]);
    const res = showChildAt(stack, 3);
    assert.deepEqual(res, {
      ok: false,
      fatal: { code: "LAYOUT_INVALID_ARGUMENT", detail: "showChildAt(stack): index 3 out of range [0, 1)" },
    });
    assert.equal(stack.state.stackTop, null);
  });
});

describe("update protocol", () => {
  test("layout refuses to run inside an open update", () => {
    const engine = createLayoutEngine();
    engine.beginUpdate();
    assert.throws(
      () => engine.layout(nodes.row({ id: "row" }), { x: 0, y: 0, w: 10, h: 10 }),
      (err: unknown) => err instanceof LayoutError && err.code === "LAYOUT_REENTRANT_CALL",
    );
    assert.deepEqual(engine.endUpdate(), []);
    assert.equal(engine.updateDepth, 0);
  });

  test("endUpdate without beginUpdate is a programming error", () => {
    const engine = createLayoutEngine();
    assert.throws(
      () => engine.endUpdate(),
      (err: unknown) => err instanceof LayoutError && err.code === "LAYOUT_INVALID_STATE",
    );
  });

  test("layout closes its own update even when it completes normally", () => {
    const engine = createLayoutEngine();
    engine.layout(nodes.column({ id: "col" }, [nodes.widget({ id: "w" })]), { x: 0, y: 0, w: 10, h: 10 });
    assert.equal(engine.updateDepth, 0);
  });
});
