import { assert, describe, test } from "@strata-layout/testkit";
import { appendChildren, collectChildren } from "../children.js";
import { dsl } from "../dsl.js";
import type { LayoutItem } from "../types.js";

describe("collectChildren", () => {
  test("zero children yields an empty list", () => {
    assert.deepEqual(collectChildren<LayoutItem>([]), []);
  });

  test("one child yields a singleton list", () => {
    const item = dsl.item();
    const out = collectChildren<LayoutItem>([item]);
    assert.equal(out.length, 1);
    assert.equal(out[0], item);
  });

  test("conditional children keep exactly the included ones in declared order", () => {
    const a = dsl.item();
    const b = dsl.item();
    const c = dsl.item();
    const includeB = false;
    const includeC = true;

    const without = collectChildren<LayoutItem>([a, includeB && b, c]);
    assert.equal(without.length, 2);
    assert.equal(without[0], a);
    assert.equal(without[1], c);

    const withC = collectChildren<LayoutItem>([a, b, includeC && c]);
    assert.equal(withC.length, 3);
    assert.equal(withC[0], a);
    assert.equal(withC[1], b);
    assert.equal(withC[2], c);
  });

  test("null and undefined entries are skipped", () => {
    const a = dsl.item();
    const out = collectChildren<LayoutItem>([null, a, undefined]);
    assert.equal(out.length, 1);
    assert.equal(out[0], a);
  });

  test("nested lists are flattened in place", () => {
    const a = dsl.item();
    const b = dsl.vGroup([dsl.item()]);
    const c = dsl.item();
    const out = collectChildren<LayoutItem>([a, [b, [false, c]]]);
    assert.equal(out.length, 3);
    assert.equal(out[0], a);
    assert.equal(out[1], b);
    assert.equal(out[2], c);
  });

  test("mixed concrete types are unified through the capability", () => {
    const item = dsl.item();
    const group = dsl.hGroup([dsl.item()]);
    const badge = dsl.supplementaryItem("badge");
    const out = collectChildren<LayoutItem>([item, group, badge]);
    assert.deepEqual(
      out.map((node) => node.layoutItem),
      [item, group, badge],
    );
  });

  test("result is frozen", () => {
    assert.equal(Object.isFrozen(collectChildren<LayoutItem>([dsl.item()])), true);
  });
});

describe("appendChildren", () => {
  test("appends after existing children without touching the existing list", () => {
    const a = dsl.item();
    const b = dsl.item();
    const existing = collectChildren<LayoutItem>([a]);
    const out = appendChildren<LayoutItem>(existing, [b]);
    assert.equal(out.length, 2);
    assert.equal(out[0], a);
    assert.equal(out[1], b);
    assert.equal(existing.length, 1);
  });

  test("returns the existing list when nothing is added", () => {
    const existing = collectChildren<LayoutItem>([dsl.item()]);
    assert.equal(appendChildren<LayoutItem>(existing, [false]), existing);
  });
});
