/**
 * packages/core/src/nodes/types.ts — Capabilities and property bags.
 *
 * Capabilities are open: any value exposing the accessor can stand in for a
 * built-in node. The accessor returns the node's canonical form, which may
 * itself be another custom value; resolution follows it until a built-in
 * node is reached (see resolve.ts).
 *
 * @example
 * ```ts
 * class ProductShelf implements LayoutSection {
 *   get layoutSection(): LayoutSection {
 *     return dsl
 *       .section(dsl.hGroup({ count: 2 }, [dsl.item()]))
 *       .boundarySupplementaryItems([dsl.boundarySupplementaryItem("header")])
 *       .contentInsets({ horizontal: 20, vertical: 8 });
 *   }
 * }
 * ```
 */

import type {
  Anchor,
  ContentInsetsReference,
  Dimension,
  EdgeInsets,
  EdgeSpacing,
  OrthogonalScrollingBehavior,
  Point,
  RectAlignment,
  ScrollDirection,
  Spacing,
} from "../layout/types.js";
import type { CustomGroupItemProvider, VisibleItemsInvalidationHandler } from "../native/types.js";

// =============================================================================
// Capabilities
// =============================================================================

export interface LayoutItem {
  readonly layoutItem: LayoutItem;
}

export interface LayoutGroup extends LayoutItem {
  readonly layoutGroup: LayoutGroup;
}

export interface LayoutSupplementaryItem extends LayoutItem {
  readonly layoutSupplementaryItem: LayoutSupplementaryItem;
}

export interface LayoutBoundarySupplementaryItem extends LayoutSupplementaryItem {
  readonly layoutBoundarySupplementaryItem: LayoutBoundarySupplementaryItem;
}

export interface LayoutDecorationItem {
  readonly layoutDecorationItem: LayoutDecorationItem;
}

export interface LayoutSection {
  readonly layoutSection: LayoutSection;
}

// =============================================================================
// Property bags (unset = host default)
// =============================================================================

export type ItemProperties = Readonly<{
  width?: Dimension;
  height?: Dimension;
  contentInsets?: EdgeInsets;
  edgeSpacing?: EdgeSpacing;
}>;

export type ItemNodeProperties = ItemProperties &
  Readonly<{
    supplementaryItems?: readonly LayoutSupplementaryItem[];
  }>;

export type GroupLayout = "horizontal" | "vertical" | "custom";

export type GroupProperties = ItemProperties &
  Readonly<{
    layout: GroupLayout;
    subitems: readonly LayoutItem[];
    /** Repeat the single subitem this many times. */
    count?: number;
    interItemSpacing?: Spacing;
    itemProvider?: CustomGroupItemProvider;
    supplementaryItems?: readonly LayoutSupplementaryItem[];
  }>;

export type SupplementaryProperties = ItemProperties &
  Readonly<{
    elementKind: string;
    zIndex?: number;
  }>;

export type SupplementaryItemProperties = SupplementaryProperties &
  Readonly<{
    containerAnchor?: Anchor;
    itemAnchor?: Anchor;
  }>;

export type BoundarySupplementaryItemProperties = SupplementaryProperties &
  Readonly<{
    alignment?: RectAlignment;
    absoluteOffset?: Point;
    extendsBoundary?: boolean;
    pinToVisibleBounds?: boolean;
  }>;

export type DecorationItemProperties = Readonly<{
  elementKind: string;
  zIndex?: number;
  contentInsets?: EdgeInsets;
}>;

export type SectionProperties = Readonly<{
  contentInsets?: EdgeInsets;
  interGroupSpacing?: number;
  contentInsetsReference?: ContentInsetsReference;
  supplementariesFollowContentInsets?: boolean;
  orthogonalScrollingBehavior?: OrthogonalScrollingBehavior;
  /** `null` clears a handler installed earlier in the chain. */
  visibleItemsInvalidationHandler?: VisibleItemsInvalidationHandler | null;
  boundarySupplementaryItems?: readonly LayoutBoundarySupplementaryItem[];
  decorationItems?: readonly LayoutDecorationItem[];
}>;

export type ConfigurationProperties = Readonly<{
  scrollDirection?: ScrollDirection;
  interSectionSpacing?: number;
  contentInsetsReference?: ContentInsetsReference;
  boundarySupplementaryItems?: readonly LayoutBoundarySupplementaryItem[];
}>;
