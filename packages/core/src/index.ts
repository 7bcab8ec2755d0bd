/**
 * @strata-layout/core
 *
 * Declarative builder for compositional collection-view layouts.
 * Build a tree with `dsl`, configure it with chained modifiers, and hand the
 * records produced by the `make*` translators to the host layout engine.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export { StrataError, type StrataErrorCode } from "./errors.js";

// =============================================================================
// Layout values
// =============================================================================

export {
  absolute,
  anchor,
  estimated,
  fixed,
  flexible,
  fractionalAnchor,
  fractionalHeight,
  fractionalWidth,
  type Anchor,
  type ContentInsetsReference,
  type Dimension,
  type DimensionKind,
  type DirectionalEdge,
  type EdgeInsets,
  type EdgeSpacing,
  type OrthogonalScrollingBehavior,
  type Point,
  type Rect,
  type RectAlignment,
  type ScrollDirection,
  type Size,
  type Spacing,
  type SpacingKind,
} from "./layout/types.js";

export {
  ZERO_INSETS,
  edgeInsets,
  resolveEdgeInsets,
  resolveEdgeSpacing,
  type AxisEdgeSpacing,
  type AxisInsets,
  type DirectionalEdgeSpacing,
  type DirectionalInsets,
  type EdgeInsetsInput,
  type EdgeSpacingInput,
} from "./layout/insets.js";

// =============================================================================
// Nodes
// =============================================================================

export type {
  BoundarySupplementaryItemProperties,
  ConfigurationProperties,
  DecorationItemProperties,
  GroupLayout,
  GroupProperties,
  ItemNodeProperties,
  ItemProperties,
  LayoutBoundarySupplementaryItem,
  LayoutDecorationItem,
  LayoutGroup,
  LayoutItem,
  LayoutSection,
  LayoutSupplementaryItem,
  SectionProperties,
  SupplementaryItemProperties,
  SupplementaryProperties,
} from "./nodes/types.js";

export {
  appendChildren,
  collectChildren,
  type LayoutChild,
  type LayoutChildren,
} from "./nodes/children.js";

export { Item, ItemNode } from "./nodes/item.js";
export { Group } from "./nodes/group.js";
export { BoundarySupplementaryItem, SupplementaryItem, SupplementaryNode } from "./nodes/supplementaryItem.js";
export { DecorationItem } from "./nodes/decorationItem.js";
export { Section } from "./nodes/section.js";
export {
  CompositionalLayout,
  LayoutConfiguration,
  repeatingSections,
  type SectionProvider,
} from "./nodes/configuration.js";
export {
  MAX_RESOLVE_DEPTH,
  resolveBoundarySupplementaryItem,
  resolveDecorationItem,
  resolveGroup,
  resolveItem,
  resolveSection,
  resolveSupplementaryItem,
  type ResolvedItem,
  type ResolvedSupplementaryItem,
} from "./nodes/resolve.js";
export { dsl, type GroupOptions, type SizeOptions } from "./nodes/dsl.js";

// =============================================================================
// Host object model
// =============================================================================

export type {
  CustomGroupItem,
  CustomGroupItemProvider,
  LayoutContainer,
  LayoutEnvironment,
  NativeAnchor,
  NativeBoundarySupplementaryItem,
  NativeCompositionalLayout,
  NativeConfiguration,
  NativeDecorationItem,
  NativeDimension,
  NativeEdgeInsets,
  NativeEdgeSpacing,
  NativeGroup,
  NativeGroupLayout,
  NativeItem,
  NativeItemLike,
  NativeSection,
  NativeSectionProvider,
  NativeSize,
  NativeSpacing,
  NativeSupplementaryItem,
  NativeSupplementaryItemLike,
  VisibleItem,
  VisibleItemsInvalidationHandler,
} from "./native/types.js";

// =============================================================================
// Translators
// =============================================================================

export { DEV_MODE, type TranslateOptions } from "./translate/devWarnings.js";
export {
  makeBoundarySupplementaryItem,
  makeDecorationItem,
  makeGroup,
  makeItem,
  makeSupplementaryItem,
} from "./translate/item.js";
export { makeSection } from "./translate/section.js";
export { makeCompositionalLayout, makeConfiguration } from "./translate/configuration.js";
