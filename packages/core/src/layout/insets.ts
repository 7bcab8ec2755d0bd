/**
 * packages/core/src/layout/insets.ts — Shorthand expansion for insets and edge spacing.
 *
 * Accepted shapes, most general last:
 *   - a single value applied to every edge
 *   - `{ horizontal, vertical }`: horizontal → leading/trailing, vertical → top/bottom
 *   - `{ top, leading, bottom, trailing }`: canonical form
 *
 * Omitted insets resolve to 0. Omitted edge spacings stay unset.
 */
import type { EdgeInsets, EdgeSpacing, Spacing } from "./types.js";

export type AxisInsets = Readonly<{
  horizontal?: number;
  vertical?: number;
  top?: never;
  leading?: never;
  bottom?: never;
  trailing?: never;
}>;

export type DirectionalInsets = Readonly<{
  top?: number;
  leading?: number;
  bottom?: number;
  trailing?: number;
  horizontal?: never;
  vertical?: never;
}>;

export type EdgeInsetsInput = number | AxisInsets | DirectionalInsets;

export type AxisEdgeSpacing = Readonly<{
  horizontal?: Spacing;
  vertical?: Spacing;
  kind?: never;
  top?: never;
  leading?: never;
  bottom?: never;
  trailing?: never;
}>;

export type DirectionalEdgeSpacing = Readonly<{
  top?: Spacing;
  leading?: Spacing;
  bottom?: Spacing;
  trailing?: Spacing;
  kind?: never;
  horizontal?: never;
  vertical?: never;
}>;

export type EdgeSpacingInput = Spacing | AxisEdgeSpacing | DirectionalEdgeSpacing;

/** Shared constant for the common zero-inset case. */
export const ZERO_INSETS: EdgeInsets = Object.freeze({ top: 0, leading: 0, bottom: 0, trailing: 0 });

export function edgeInsets(top: number, leading: number, bottom: number, trailing: number): EdgeInsets {
  if (top === 0 && leading === 0 && bottom === 0 && trailing === 0) return ZERO_INSETS;
  return Object.freeze({ top, leading, bottom, trailing });
}

function isAxisInsets(input: AxisInsets | DirectionalInsets): input is AxisInsets {
  return input.horizontal !== undefined || input.vertical !== undefined;
}

/**
 * Expand an insets shorthand to the canonical four-edge form.
 *
 * @example
 * ```ts
 * resolveEdgeInsets(4)                                // { top: 4, leading: 4, bottom: 4, trailing: 4 }
 * resolveEdgeInsets({ horizontal: 20, vertical: 8 })  // { top: 8, leading: 20, bottom: 8, trailing: 20 }
 * resolveEdgeInsets({ top: 2 })                       // { top: 2, leading: 0, bottom: 0, trailing: 0 }
 * ```
 */
export function resolveEdgeInsets(input: EdgeInsetsInput): EdgeInsets {
  if (typeof input === "number") return edgeInsets(input, input, input, input);
  if (isAxisInsets(input)) {
    const h = input.horizontal ?? 0;
    const v = input.vertical ?? 0;
    return edgeInsets(v, h, v, h);
  }
  return edgeInsets(input.top ?? 0, input.leading ?? 0, input.bottom ?? 0, input.trailing ?? 0);
}

function isSpacing(input: EdgeSpacingInput): input is Spacing {
  return input.kind === "fixed" || input.kind === "flexible";
}

function isAxisEdgeSpacing(input: AxisEdgeSpacing | DirectionalEdgeSpacing): input is AxisEdgeSpacing {
  return input.horizontal !== undefined || input.vertical !== undefined;
}

function edgeSpacing(
  top: Spacing | undefined,
  leading: Spacing | undefined,
  bottom: Spacing | undefined,
  trailing: Spacing | undefined,
): EdgeSpacing {
  const out: { top?: Spacing; leading?: Spacing; bottom?: Spacing; trailing?: Spacing } = {};
  if (top !== undefined) out.top = top;
  if (leading !== undefined) out.leading = leading;
  if (bottom !== undefined) out.bottom = bottom;
  if (trailing !== undefined) out.trailing = trailing;
  return Object.freeze(out);
}

/** Expand an edge spacing shorthand to per-edge form. */
export function resolveEdgeSpacing(input: EdgeSpacingInput): EdgeSpacing {
  if (isSpacing(input)) return edgeSpacing(input, input, input, input);
  if (isAxisEdgeSpacing(input)) {
    return edgeSpacing(input.vertical, input.horizontal, input.vertical, input.horizontal);
  }
  return edgeSpacing(input.top, input.leading, input.bottom, input.trailing);
}
