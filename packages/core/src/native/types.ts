/**
 * packages/core/src/native/types.ts — Host layout configuration object model.
 *
 * These records are what the host collection-view layout engine accepts.
 * Every attribute is present: translators substitute host defaults for
 * anything the caller left unset. The engine owns measurement, rendering and
 * scrolling; nothing in this package reads these records back.
 */

import type {
  ContentInsetsReference,
  DimensionKind,
  DirectionalEdge,
  OrthogonalScrollingBehavior,
  Point,
  Rect,
  RectAlignment,
  ScrollDirection,
  Size,
  SpacingKind,
} from "../layout/types.js";

export type NativeDimension = Readonly<{ kind: DimensionKind; value: number }>;

export type NativeSize = Readonly<{
  widthDimension: NativeDimension;
  heightDimension: NativeDimension;
}>;

export type NativeEdgeInsets = Readonly<{
  top: number;
  leading: number;
  bottom: number;
  trailing: number;
}>;

export type NativeSpacing = Readonly<{ kind: SpacingKind; value: number }>;

/** `null` edges let the host apply no extra spacing. */
export type NativeEdgeSpacing = Readonly<{
  top: NativeSpacing | null;
  leading: NativeSpacing | null;
  bottom: NativeSpacing | null;
  trailing: NativeSpacing | null;
}>;

export type NativeAnchor = Readonly<{
  edges: readonly DirectionalEdge[];
  offset: Point;
  offsetKind: "absolute" | "fractional";
}>;

// =============================================================================
// Host callbacks
// =============================================================================

/** Container geometry the host reports while resolving a layout. */
export type LayoutContainer = Readonly<{
  contentSize: Size;
  effectiveContentSize: Size;
  contentInsets: NativeEdgeInsets;
  effectiveContentInsets: NativeEdgeInsets;
}>;

/** Environment passed by the host to section providers and custom groups. */
export type LayoutEnvironment = Readonly<{
  container: LayoutContainer;
  traits?: Readonly<Record<string, unknown>>;
}>;

/** Frame of one item placed by a custom group. */
export type CustomGroupItem = Readonly<{ frame: Rect; zIndex?: number }>;

export type CustomGroupItemProvider = (environment: LayoutEnvironment) => readonly CustomGroupItem[];

/**
 * Attributes of a visible item that an invalidation handler may adjust
 * before the host displays it.
 */
export type VisibleItem = {
  readonly indexPath: Readonly<{ section: number; item: number }>;
  readonly representedElementKind: string | null;
  frame: Rect;
  alpha: number;
  zIndex: number;
  isHidden: boolean;
};

export type VisibleItemsInvalidationHandler = (
  visibleItems: readonly VisibleItem[],
  contentOffset: Point,
  environment: LayoutEnvironment,
) => void;

// =============================================================================
// Layout objects
// =============================================================================

export type NativeItem = Readonly<{
  kind: "item";
  layoutSize: NativeSize;
  contentInsets: NativeEdgeInsets;
  edgeSpacing: NativeEdgeSpacing;
  supplementaryItems: readonly NativeSupplementaryItemLike[];
}>;

export type NativeGroupLayout = "horizontal" | "vertical" | "custom";

export type NativeGroup = Readonly<{
  kind: "group";
  layout: NativeGroupLayout;
  layoutSize: NativeSize;
  subitems: readonly NativeItemLike[];
  /** Repetition count of the single subitem, or `null` when subitems are laid out as given. */
  count: number | null;
  interItemSpacing: NativeSpacing | null;
  itemProvider: CustomGroupItemProvider | null;
  contentInsets: NativeEdgeInsets;
  edgeSpacing: NativeEdgeSpacing;
  supplementaryItems: readonly NativeSupplementaryItemLike[];
}>;

export type NativeSupplementaryItem = Readonly<{
  kind: "supplementaryItem";
  elementKind: string;
  layoutSize: NativeSize;
  containerAnchor: NativeAnchor;
  itemAnchor: NativeAnchor | null;
  zIndex: number;
  contentInsets: NativeEdgeInsets;
  edgeSpacing: NativeEdgeSpacing;
}>;

export type NativeBoundarySupplementaryItem = Readonly<{
  kind: "boundarySupplementaryItem";
  elementKind: string;
  layoutSize: NativeSize;
  alignment: RectAlignment;
  absoluteOffset: Point;
  extendsBoundary: boolean;
  pinToVisibleBounds: boolean;
  zIndex: number;
  contentInsets: NativeEdgeInsets;
  edgeSpacing: NativeEdgeSpacing;
}>;

export type NativeSupplementaryItemLike = NativeSupplementaryItem | NativeBoundarySupplementaryItem;

/** Anything the host accepts as a subitem of a group. */
export type NativeItemLike = NativeItem | NativeGroup | NativeSupplementaryItemLike;

/** Background decoration anchored to a section. */
export type NativeDecorationItem = Readonly<{
  kind: "decorationItem";
  elementKind: string;
  zIndex: number;
  contentInsets: NativeEdgeInsets;
}>;

export type NativeSection = Readonly<{
  kind: "section";
  group: NativeGroup;
  contentInsets: NativeEdgeInsets;
  interGroupSpacing: number;
  contentInsetsReference: ContentInsetsReference;
  supplementariesFollowContentInsets: boolean;
  orthogonalScrollingBehavior: OrthogonalScrollingBehavior;
  boundarySupplementaryItems: readonly NativeBoundarySupplementaryItem[];
  decorationItems: readonly NativeDecorationItem[];
  visibleItemsInvalidationHandler: VisibleItemsInvalidationHandler | null;
}>;

export type NativeConfiguration = Readonly<{
  kind: "configuration";
  scrollDirection: ScrollDirection;
  interSectionSpacing: number;
  boundarySupplementaryItems: readonly NativeBoundarySupplementaryItem[];
  contentInsetsReference: ContentInsetsReference;
}>;

export type NativeSectionProvider = (
  sectionIndex: number,
  environment: LayoutEnvironment,
) => NativeSection | null;

export type NativeCompositionalLayout = Readonly<{
  kind: "compositionalLayout";
  configuration: NativeConfiguration;
  sectionProvider: NativeSectionProvider;
}>;
