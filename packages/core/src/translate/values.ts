/**
 * packages/core/src/translate/values.ts — Layout values to host values.
 */

import { ZERO_INSETS } from "../layout/insets.js";
import {
  type Anchor,
  type Dimension,
  type EdgeInsets,
  type EdgeSpacing,
  type Spacing,
  fractionalHeight,
  fractionalWidth,
} from "../layout/types.js";
import type {
  NativeAnchor,
  NativeDimension,
  NativeEdgeInsets,
  NativeEdgeSpacing,
  NativeSize,
  NativeSpacing,
} from "../native/types.js";

export const DEFAULT_WIDTH: Dimension = fractionalWidth(1);
export const DEFAULT_HEIGHT: Dimension = fractionalHeight(1);

const NO_EDGE_SPACING: NativeEdgeSpacing = Object.freeze({
  top: null,
  leading: null,
  bottom: null,
  trailing: null,
});

export function makeDimension(dimension: Dimension): NativeDimension {
  return Object.freeze({ kind: dimension.kind, value: dimension.value });
}

export function makeSize(width: Dimension, height: Dimension): NativeSize {
  return Object.freeze({
    widthDimension: makeDimension(width),
    heightDimension: makeDimension(height),
  });
}

export function makeInsets(insets: EdgeInsets | undefined): NativeEdgeInsets {
  if (insets === undefined) return ZERO_INSETS;
  return Object.freeze({
    top: insets.top,
    leading: insets.leading,
    bottom: insets.bottom,
    trailing: insets.trailing,
  });
}

export function makeSpacing(spacing: Spacing): NativeSpacing {
  return Object.freeze({ kind: spacing.kind, value: spacing.value });
}

function makeOptionalSpacing(spacing: Spacing | undefined): NativeSpacing | null {
  return spacing === undefined ? null : makeSpacing(spacing);
}

export function makeEdgeSpacing(spacing: EdgeSpacing | undefined): NativeEdgeSpacing {
  if (spacing === undefined) return NO_EDGE_SPACING;
  return Object.freeze({
    top: makeOptionalSpacing(spacing.top),
    leading: makeOptionalSpacing(spacing.leading),
    bottom: makeOptionalSpacing(spacing.bottom),
    trailing: makeOptionalSpacing(spacing.trailing),
  });
}

export function makeAnchor(value: Anchor): NativeAnchor {
  return Object.freeze({
    edges: Object.freeze([...value.edges]),
    offset: Object.freeze({ x: value.offset.x, y: value.offset.y }),
    offsetKind: value.offsetKind,
  });
}
