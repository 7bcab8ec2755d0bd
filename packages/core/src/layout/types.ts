/**
 * packages/core/src/layout/types.ts — Layout value type definitions.
 *
 * Defines the value types callers pass to node factories and modifiers.
 * All lengths are in host points. None of these values is measured here;
 * the host engine interprets them.
 */

/** Point in host coordinates. */
export type Point = Readonly<{ x: number; y: number }>;

/** Size in host points. */
export type Size = Readonly<{ width: number; height: number }>;

/** Rectangle with origin (x,y) and size (width,height). */
export type Rect = Readonly<{ x: number; y: number; width: number; height: number }>;

export type DimensionKind = "fractionalWidth" | "fractionalHeight" | "absolute" | "estimated";

/**
 * One axis of a layout size.
 *
 * Notes:
 * - fractional kinds are relative to the containing group or section.
 * - `estimated` lets the host self-size the element starting from `value`.
 */
export type Dimension = Readonly<{ kind: DimensionKind; value: number }>;

export type SpacingKind = "fixed" | "flexible";

/** Spacing between items: a fixed distance or a flexible minimum. */
export type Spacing = Readonly<{ kind: SpacingKind; value: number }>;

/** Directional insets: leading/trailing follow the layout direction. */
export type EdgeInsets = Readonly<{
  top: number;
  leading: number;
  bottom: number;
  trailing: number;
}>;

/** Per-edge spacing around an item. Unset edges use the host default. */
export type EdgeSpacing = Readonly<{
  top?: Spacing;
  leading?: Spacing;
  bottom?: Spacing;
  trailing?: Spacing;
}>;

export type DirectionalEdge = "top" | "leading" | "bottom" | "trailing";

/** Anchor attaching a supplementary item to its container or item. */
export type Anchor = Readonly<{
  edges: readonly DirectionalEdge[];
  offset: Point;
  offsetKind: "absolute" | "fractional";
}>;

export type RectAlignment =
  | "none"
  | "top"
  | "topLeading"
  | "leading"
  | "bottomLeading"
  | "bottom"
  | "bottomTrailing"
  | "trailing"
  | "topTrailing";

export type OrthogonalScrollingBehavior =
  | "none"
  | "continuous"
  | "continuousGroupLeadingBoundary"
  | "paging"
  | "groupPaging"
  | "groupPagingCentered";

export type ContentInsetsReference =
  | "automatic"
  | "none"
  | "safeArea"
  | "layoutMargins"
  | "readableContent";

export type ScrollDirection = "vertical" | "horizontal";

function dimension(kind: DimensionKind, value: number): Dimension {
  return Object.freeze({ kind, value });
}

/** Dimension as a fraction of the container's width. */
export function fractionalWidth(value: number): Dimension {
  return dimension("fractionalWidth", value);
}

/** Dimension as a fraction of the container's height. */
export function fractionalHeight(value: number): Dimension {
  return dimension("fractionalHeight", value);
}

/** Dimension with a fixed length in points. */
export function absolute(value: number): Dimension {
  return dimension("absolute", value);
}

/** Dimension the host may grow or shrink from an initial estimate. */
export function estimated(value: number): Dimension {
  return dimension("estimated", value);
}

export function fixed(value: number): Spacing {
  return Object.freeze({ kind: "fixed", value });
}

export function flexible(value: number): Spacing {
  return Object.freeze({ kind: "flexible", value });
}

/**
 * Anchor with an absolute offset in points.
 *
 * @example
 * ```ts
 * anchor(["top", "trailing"], { x: 8, y: -8 })
 * ```
 */
export function anchor(edges: readonly DirectionalEdge[], offset: Point = { x: 0, y: 0 }): Anchor {
  return Object.freeze({
    edges: Object.freeze([...edges]),
    offset: Object.freeze({ x: offset.x, y: offset.y }),
    offsetKind: "absolute",
  });
}

/** Anchor with an offset expressed as a fraction of the anchored item's size. */
export function fractionalAnchor(edges: readonly DirectionalEdge[], offset: Point): Anchor {
  return Object.freeze({
    edges: Object.freeze([...edges]),
    offset: Object.freeze({ x: offset.x, y: offset.y }),
    offsetKind: "fractional",
  });
}
