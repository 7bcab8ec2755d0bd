/**
 * packages/core/src/translate/section.ts — Section translator.
 */

import type { NativeBoundarySupplementaryItem, NativeDecorationItem, NativeSection } from "../native/types.js";
import { resolveSection } from "../nodes/resolve.js";
import type { LayoutBoundarySupplementaryItem, LayoutSection } from "../nodes/types.js";
import {
  type TranslateContext,
  type TranslateOptions,
  createTranslateContext,
  warnDuplicateElementKinds,
} from "./devWarnings.js";
import { translateBoundarySupplementaryItem, translateDecorationItem, translateGroup } from "./item.js";
import { makeInsets } from "./values.js";

const NO_BOUNDARY_ITEMS: readonly NativeBoundarySupplementaryItem[] = Object.freeze([]);
const NO_DECORATION_ITEMS: readonly NativeDecorationItem[] = Object.freeze([]);

export function translateBoundaryList(
  nodes: readonly LayoutBoundarySupplementaryItem[] | undefined,
  ctx: TranslateContext,
  area: "section" | "configuration",
): readonly NativeBoundarySupplementaryItem[] {
  if (nodes === undefined || nodes.length === 0) return NO_BOUNDARY_ITEMS;
  const items = Object.freeze(nodes.map(translateBoundarySupplementaryItem));
  warnDuplicateElementKinds(
    ctx,
    area,
    items.map((item) => item.elementKind),
  );
  return items;
}

export function translateSection(node: LayoutSection, ctx: TranslateContext): NativeSection {
  const section = resolveSection(node);
  const props = section.properties;

  const group = translateGroup(section.group, ctx);
  const boundarySupplementaryItems = translateBoundaryList(props.boundarySupplementaryItems, ctx, "section");
  const decorationItems =
    props.decorationItems === undefined || props.decorationItems.length === 0
      ? NO_DECORATION_ITEMS
      : Object.freeze(props.decorationItems.map(translateDecorationItem));

  return Object.freeze({
    kind: "section",
    group,
    contentInsets: makeInsets(props.contentInsets),
    interGroupSpacing: props.interGroupSpacing ?? 0,
    contentInsetsReference: props.contentInsetsReference ?? "automatic",
    supplementariesFollowContentInsets: props.supplementariesFollowContentInsets ?? true,
    orthogonalScrollingBehavior: props.orthogonalScrollingBehavior ?? "none",
    boundarySupplementaryItems,
    decorationItems,
    visibleItemsInvalidationHandler: props.visibleItemsInvalidationHandler ?? null,
  });
}

/**
 * Translate a section-like node into the host section record.
 *
 * @example
 * ```ts
 * const native = makeSection(
 *   dsl
 *     .section(dsl.hGroup({ count: 2 }, [dsl.item()]))
 *     .interGroupSpacing(8),
 * );
 * native.interGroupSpacing // 8
 * ```
 */
export function makeSection(node: LayoutSection, options?: TranslateOptions): NativeSection {
  return translateSection(node, createTranslateContext(options));
}
