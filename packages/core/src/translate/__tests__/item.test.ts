import { assert, describe, test } from "@strata-layout/testkit";
import { absolute, anchor, estimated, fixed, flexible, fractionalWidth } from "../../layout/types.js";
import type { CustomGroupItemProvider } from "../../native/types.js";
import { dsl } from "../../nodes/dsl.js";
import { Group } from "../../nodes/group.js";
import type { LayoutGroup, LayoutItem } from "../../nodes/types.js";
import {
  makeBoundarySupplementaryItem,
  makeDecorationItem,
  makeGroup,
  makeItem,
  makeSupplementaryItem,
} from "../item.js";

const quiet = { devMode: false } as const;

const ZERO = { top: 0, leading: 0, bottom: 0, trailing: 0 };
const NO_EDGE_SPACING = { top: null, leading: null, bottom: null, trailing: null };
const FILL = {
  widthDimension: { kind: "fractionalWidth", value: 1 },
  heightDimension: { kind: "fractionalHeight", value: 1 },
};

describe("makeItem", () => {
  test("plain item fills its container by default", () => {
    assert.deepEqual(makeItem(dsl.item()), {
      kind: "item",
      layoutSize: FILL,
      contentInsets: ZERO,
      edgeSpacing: NO_EDGE_SPACING,
      supplementaryItems: [],
    });
  });

  test("item size, insets and edge spacing are carried over", () => {
    const native = makeItem(
      dsl
        .item({ width: fractionalWidth(0.25), height: absolute(120) })
        .contentInsets({ horizontal: 4 })
        .edgeSpacing({ leading: flexible(0) }),
    );
    assert.deepEqual(native.layoutSize, {
      widthDimension: { kind: "fractionalWidth", value: 0.25 },
      heightDimension: { kind: "absolute", value: 120 },
    });
    assert.deepEqual(native.contentInsets, { top: 0, leading: 4, bottom: 0, trailing: 4 });
    assert.deepEqual(native.edgeSpacing, {
      top: null,
      leading: { kind: "flexible", value: 0 },
      bottom: null,
      trailing: null,
    });
  });

  test("item supplementary items translate in order and keep their variant", () => {
    const native = makeItem(
      dsl
        .item()
        .supplementaryItems([dsl.supplementaryItem("badge")])
        .supplementaryItems([dsl.boundarySupplementaryItem("label")]),
    );
    assert.equal(native.kind, "item");
    if (native.kind !== "item") return;
    assert.deepEqual(
      native.supplementaryItems.map((item) => [item.kind, item.elementKind]),
      [
        ["supplementaryItem", "badge"],
        ["boundarySupplementaryItem", "label"],
      ],
    );
  });

  test("group passed as an item translates as a group", () => {
    const native = makeItem(dsl.vGroup([dsl.item()]), quiet);
    assert.equal(native.kind, "group");
  });

  test("custom item translates through its resolved item", () => {
    class Tile implements LayoutItem {
      get layoutItem(): LayoutItem {
        return dsl.item({ height: estimated(44) });
      }
    }
    const native = makeItem(new Tile());
    assert.deepEqual(native.layoutSize.heightDimension, { kind: "estimated", value: 44 });
  });
});

describe("makeGroup", () => {
  test("stack group defaults", () => {
    const subitem = dsl.item();
    const native = makeGroup(dsl.hGroup([subitem, subitem]), quiet);
    assert.equal(native.kind, "group");
    assert.equal(native.layout, "horizontal");
    assert.deepEqual(native.layoutSize, FILL);
    assert.equal(native.subitems.length, 2);
    assert.equal(native.count, null);
    assert.equal(native.interItemSpacing, null);
    assert.equal(native.itemProvider, null);
    assert.deepEqual(native.contentInsets, ZERO);
    assert.deepEqual(native.edgeSpacing, NO_EDGE_SPACING);
    assert.deepEqual(native.supplementaryItems, []);
  });

  test("count and interItemSpacing are carried over", () => {
    const native = makeGroup(
      dsl.vGroup({ height: absolute(200), count: 3 }, [dsl.item()]).interItemSpacing(fixed(8)),
      quiet,
    );
    assert.equal(native.layout, "vertical");
    assert.equal(native.count, 3);
    assert.deepEqual(native.interItemSpacing, { kind: "fixed", value: 8 });
    assert.deepEqual(native.layoutSize.heightDimension, { kind: "absolute", value: 200 });
  });

  test("nested groups translate children first and keep declared order", () => {
    const inner = dsl.hGroup([dsl.item(), dsl.item({ width: absolute(10) })]);
    const native = makeGroup(dsl.vGroup([inner, dsl.item({ height: absolute(30) })]), quiet);
    const first = native.subitems[0];
    const second = native.subitems[1];
    assert.equal(first?.kind, "group");
    if (first?.kind === "group") {
      assert.equal(first.layout, "horizontal");
      assert.deepEqual(first.subitems[1]?.layoutSize.widthDimension, { kind: "absolute", value: 10 });
    }
    assert.deepEqual(second?.layoutSize.heightDimension, { kind: "absolute", value: 30 });
  });

  test("custom group keeps its item provider and has no subitems", () => {
    const provider: CustomGroupItemProvider = (environment) => [
      { frame: { x: 0, y: 0, width: environment.container.contentSize.width, height: 40 } },
    ];
    const native = makeGroup(dsl.customGroup(provider, { height: absolute(40) }), quiet);
    assert.equal(native.layout, "custom");
    assert.equal(native.itemProvider, provider);
    assert.deepEqual(native.subitems, []);
  });

  test("subitems added to the caller's array after construction are not translated", () => {
    const subitems: LayoutItem[] = [dsl.item()];
    const group = new Group({ layout: "horizontal", subitems });
    subitems.push(dsl.item());
    assert.equal(makeGroup(group, quiet).subitems.length, 1);
  });

  test("custom group type translates through layoutGroup", () => {
    class Row implements LayoutGroup {
      get layoutItem(): LayoutItem {
        return this;
      }

      get layoutGroup(): LayoutGroup {
        return dsl.hGroup([dsl.item(), dsl.item(), dsl.item()]);
      }
    }
    assert.equal(makeGroup(new Row(), quiet).subitems.length, 3);
  });
});

describe("makeSupplementaryItem", () => {
  test("anchored item defaults", () => {
    assert.deepEqual(makeSupplementaryItem(dsl.supplementaryItem("badge")), {
      kind: "supplementaryItem",
      elementKind: "badge",
      layoutSize: FILL,
      containerAnchor: { edges: ["top"], offset: { x: 0, y: 0 }, offsetKind: "absolute" },
      itemAnchor: null,
      zIndex: 1,
      contentInsets: ZERO,
      edgeSpacing: NO_EDGE_SPACING,
    });
  });

  test("anchors and zIndex are carried over", () => {
    const native = makeSupplementaryItem(
      dsl
        .supplementaryItem("badge", { width: absolute(16), height: absolute(16) })
        .containerAnchor(anchor(["top", "trailing"], { x: 2, y: -2 }))
        .itemAnchor(anchor(["bottom", "leading"]))
        .zIndex(5),
    );
    assert.equal(native.kind, "supplementaryItem");
    if (native.kind !== "supplementaryItem") return;
    assert.deepEqual(native.containerAnchor, {
      edges: ["top", "trailing"],
      offset: { x: 2, y: -2 },
      offsetKind: "absolute",
    });
    assert.deepEqual(native.itemAnchor, {
      edges: ["bottom", "leading"],
      offset: { x: 0, y: 0 },
      offsetKind: "absolute",
    });
    assert.equal(native.zIndex, 5);
  });

  test("boundary item passed as a supplementary item keeps its variant", () => {
    assert.equal(makeSupplementaryItem(dsl.boundarySupplementaryItem("header")).kind, "boundarySupplementaryItem");
  });
});

describe("makeBoundarySupplementaryItem", () => {
  test("boundary item defaults", () => {
    assert.deepEqual(makeBoundarySupplementaryItem(dsl.boundarySupplementaryItem("header")), {
      kind: "boundarySupplementaryItem",
      elementKind: "header",
      layoutSize: {
        widthDimension: { kind: "fractionalWidth", value: 1 },
        heightDimension: { kind: "estimated", value: 50 },
      },
      alignment: "top",
      absoluteOffset: { x: 0, y: 0 },
      extendsBoundary: true,
      pinToVisibleBounds: false,
      zIndex: 1,
      contentInsets: ZERO,
      edgeSpacing: NO_EDGE_SPACING,
    });
  });

  test("boundary modifiers are carried over", () => {
    const native = makeBoundarySupplementaryItem(
      dsl
        .boundarySupplementaryItem("footer", { height: absolute(32) })
        .alignment("bottom")
        .absoluteOffset({ x: 0, y: 6 })
        .extendsBoundary(false)
        .pinToVisibleBounds(true)
        .zIndex(3),
    );
    assert.equal(native.alignment, "bottom");
    assert.deepEqual(native.absoluteOffset, { x: 0, y: 6 });
    assert.equal(native.extendsBoundary, false);
    assert.equal(native.pinToVisibleBounds, true);
    assert.equal(native.zIndex, 3);
    assert.deepEqual(native.layoutSize.heightDimension, { kind: "absolute", value: 32 });
  });
});

describe("makeDecorationItem", () => {
  test("decoration defaults and modifiers", () => {
    assert.deepEqual(makeDecorationItem(dsl.decorationItem("background")), {
      kind: "decorationItem",
      elementKind: "background",
      zIndex: 0,
      contentInsets: ZERO,
    });
    const inset = makeDecorationItem(dsl.decorationItem("background").contentInsets(6).zIndex(-1));
    assert.equal(inset.zIndex, -1);
    assert.deepEqual(inset.contentInsets, { top: 6, leading: 6, bottom: 6, trailing: 6 });
  });
});
