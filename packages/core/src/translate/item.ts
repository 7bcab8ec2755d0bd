/**
 * packages/core/src/translate/item.ts — Item, group and supplementary translators.
 *
 * Each translator resolves its node through the capability, translates the
 * node's children first, then builds the host record with host defaults for
 * every attribute the caller left unset.
 */

import { type Anchor, type Point, estimated } from "../layout/types.js";
import type {
  NativeBoundarySupplementaryItem,
  NativeDecorationItem,
  NativeGroup,
  NativeItem,
  NativeItemLike,
  NativeSupplementaryItem,
  NativeSupplementaryItemLike,
} from "../native/types.js";
import type { DecorationItem } from "../nodes/decorationItem.js";
import type { Group } from "../nodes/group.js";
import type { Item } from "../nodes/item.js";
import {
  resolveBoundarySupplementaryItem,
  resolveDecorationItem,
  resolveGroup,
  resolveItem,
  resolveSupplementaryItem,
} from "../nodes/resolve.js";
import type { BoundarySupplementaryItem, SupplementaryItem } from "../nodes/supplementaryItem.js";
import type {
  LayoutBoundarySupplementaryItem,
  LayoutDecorationItem,
  LayoutGroup,
  LayoutItem,
  LayoutSupplementaryItem,
} from "../nodes/types.js";
import {
  type TranslateContext,
  type TranslateOptions,
  createTranslateContext,
  warnGroupCount,
} from "./devWarnings.js";
import { DEFAULT_HEIGHT, DEFAULT_WIDTH, makeAnchor, makeEdgeSpacing, makeInsets, makeSize, makeSpacing } from "./values.js";

const DEFAULT_SUPPLEMENTARY_Z_INDEX = 1;
const DEFAULT_DECORATION_Z_INDEX = 0;
const DEFAULT_BOUNDARY_HEIGHT = estimated(50);
const DEFAULT_CONTAINER_ANCHOR: Anchor = Object.freeze({
  edges: Object.freeze(["top"] as const),
  offset: Object.freeze({ x: 0, y: 0 }),
  offsetKind: "absolute",
});
const ZERO_OFFSET: Point = Object.freeze({ x: 0, y: 0 });
const NO_SUPPLEMENTARY_ITEMS: readonly NativeSupplementaryItemLike[] = Object.freeze([]);

function translateSupplementaryList(
  nodes: readonly LayoutSupplementaryItem[] | undefined,
): readonly NativeSupplementaryItemLike[] {
  if (nodes === undefined || nodes.length === 0) return NO_SUPPLEMENTARY_ITEMS;
  return Object.freeze(nodes.map(translateSupplementaryItem));
}

function translatePlainItem(node: Item): NativeItem {
  const props = node.properties;
  const supplementaryItems = translateSupplementaryList(props.supplementaryItems);
  return Object.freeze({
    kind: "item",
    layoutSize: makeSize(props.width ?? DEFAULT_WIDTH, props.height ?? DEFAULT_HEIGHT),
    contentInsets: makeInsets(props.contentInsets),
    edgeSpacing: makeEdgeSpacing(props.edgeSpacing),
    supplementaryItems,
  });
}

function translateResolvedGroup(node: Group, ctx: TranslateContext): NativeGroup {
  const props = node.properties;
  const subitems = Object.freeze(props.subitems.map((subitem) => translateItem(subitem, ctx)));
  const supplementaryItems = translateSupplementaryList(props.supplementaryItems);
  if (props.count !== undefined) {
    warnGroupCount(ctx, node, props.count, subitems.length);
  }
  return Object.freeze({
    kind: "group",
    layout: props.layout,
    layoutSize: makeSize(props.width ?? DEFAULT_WIDTH, props.height ?? DEFAULT_HEIGHT),
    subitems,
    count: props.count ?? null,
    interItemSpacing: props.interItemSpacing === undefined ? null : makeSpacing(props.interItemSpacing),
    itemProvider: props.itemProvider ?? null,
    contentInsets: makeInsets(props.contentInsets),
    edgeSpacing: makeEdgeSpacing(props.edgeSpacing),
    supplementaryItems,
  });
}

function translateAnchoredItem(node: SupplementaryItem): NativeSupplementaryItem {
  const props = node.properties;
  return Object.freeze({
    kind: "supplementaryItem",
    elementKind: props.elementKind,
    layoutSize: makeSize(props.width ?? DEFAULT_WIDTH, props.height ?? DEFAULT_HEIGHT),
    containerAnchor: makeAnchor(props.containerAnchor ?? DEFAULT_CONTAINER_ANCHOR),
    itemAnchor: props.itemAnchor === undefined ? null : makeAnchor(props.itemAnchor),
    zIndex: props.zIndex ?? DEFAULT_SUPPLEMENTARY_Z_INDEX,
    contentInsets: makeInsets(props.contentInsets),
    edgeSpacing: makeEdgeSpacing(props.edgeSpacing),
  });
}

function translateResolvedBoundaryItem(node: BoundarySupplementaryItem): NativeBoundarySupplementaryItem {
  const props = node.properties;
  const offset = props.absoluteOffset ?? ZERO_OFFSET;
  return Object.freeze({
    kind: "boundarySupplementaryItem",
    elementKind: props.elementKind,
    layoutSize: makeSize(props.width ?? DEFAULT_WIDTH, props.height ?? DEFAULT_BOUNDARY_HEIGHT),
    alignment: props.alignment ?? "top",
    absoluteOffset: Object.freeze({ x: offset.x, y: offset.y }),
    extendsBoundary: props.extendsBoundary ?? true,
    pinToVisibleBounds: props.pinToVisibleBounds ?? false,
    zIndex: props.zIndex ?? DEFAULT_SUPPLEMENTARY_Z_INDEX,
    contentInsets: makeInsets(props.contentInsets),
    edgeSpacing: makeEdgeSpacing(props.edgeSpacing),
  });
}

function translateResolvedDecorationItem(node: DecorationItem): NativeDecorationItem {
  const props = node.properties;
  return Object.freeze({
    kind: "decorationItem",
    elementKind: props.elementKind,
    zIndex: props.zIndex ?? DEFAULT_DECORATION_Z_INDEX,
    contentInsets: makeInsets(props.contentInsets),
  });
}

// =============================================================================
// Context-threading translators (used by section and layout translators)
// =============================================================================

export function translateItem(node: LayoutItem, ctx: TranslateContext): NativeItemLike {
  const resolved = resolveItem(node);
  switch (resolved.kind) {
    case "item":
      return translatePlainItem(resolved);
    case "group":
      return translateResolvedGroup(resolved, ctx);
    case "supplementaryItem":
      return translateAnchoredItem(resolved);
    case "boundarySupplementaryItem":
      return translateResolvedBoundaryItem(resolved);
  }
}

export function translateGroup(node: LayoutGroup, ctx: TranslateContext): NativeGroup {
  return translateResolvedGroup(resolveGroup(node), ctx);
}

export function translateSupplementaryItem(node: LayoutSupplementaryItem): NativeSupplementaryItemLike {
  const resolved = resolveSupplementaryItem(node);
  if (resolved.kind === "boundarySupplementaryItem") return translateResolvedBoundaryItem(resolved);
  return translateAnchoredItem(resolved);
}

export function translateBoundarySupplementaryItem(
  node: LayoutBoundarySupplementaryItem,
): NativeBoundarySupplementaryItem {
  return translateResolvedBoundaryItem(resolveBoundarySupplementaryItem(node));
}

export function translateDecorationItem(node: LayoutDecorationItem): NativeDecorationItem {
  return translateResolvedDecorationItem(resolveDecorationItem(node));
}

// =============================================================================
// Public entry points
// =============================================================================

/** Translate any item-like node (item, group or supplementary item) to its host record. */
export function makeItem(node: LayoutItem, options?: TranslateOptions): NativeItemLike {
  return translateItem(node, createTranslateContext(options));
}

export function makeGroup(node: LayoutGroup, options?: TranslateOptions): NativeGroup {
  return translateGroup(node, createTranslateContext(options));
}

export function makeSupplementaryItem(node: LayoutSupplementaryItem): NativeSupplementaryItemLike {
  return translateSupplementaryItem(node);
}

export function makeBoundarySupplementaryItem(
  node: LayoutBoundarySupplementaryItem,
): NativeBoundarySupplementaryItem {
  return translateBoundarySupplementaryItem(node);
}

export function makeDecorationItem(node: LayoutDecorationItem): NativeDecorationItem {
  return translateDecorationItem(node);
}
