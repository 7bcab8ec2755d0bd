/**
 * packages/core/src/nodes/resolve.ts — Capability resolution.
 *
 * Follows a node's capability accessor until a built-in node is reached.
 * A custom node that returns itself, or a chain longer than
 * MAX_RESOLVE_DEPTH, cannot be resolved and throws StrataError.
 */

import { StrataError } from "../errors.js";
import { DecorationItem } from "./decorationItem.js";
import { Group } from "./group.js";
import { Item } from "./item.js";
import { Section } from "./section.js";
import { BoundarySupplementaryItem, SupplementaryItem } from "./supplementaryItem.js";
import type {
  LayoutBoundarySupplementaryItem,
  LayoutDecorationItem,
  LayoutGroup,
  LayoutItem,
  LayoutSection,
  LayoutSupplementaryItem,
} from "./types.js";

export const MAX_RESOLVE_DEPTH = 64;

/** Built-in nodes a `LayoutItem` may resolve to. */
export type ResolvedItem = Item | Group | SupplementaryItem | BoundarySupplementaryItem;
export type ResolvedSupplementaryItem = SupplementaryItem | BoundarySupplementaryItem;

export function describeNode(node: object): string {
  const name = node.constructor.name;
  return name.length > 0 ? name : "anonymous node";
}

function resolveChain<T extends object, R extends T>(
  node: T,
  capability: string,
  isBuiltIn: (value: T) => value is R,
  next: (value: T) => T,
): R {
  let current = node;
  for (let depth = 0; depth < MAX_RESOLVE_DEPTH; depth++) {
    if (isBuiltIn(current)) return current;
    const resolved = next(current);
    if (resolved === current) {
      throw new StrataError(
        "STRATA_UNRESOLVED_NODE",
        `${capability}: ${describeNode(current)} resolves to itself without reaching a built-in node`,
      );
    }
    current = resolved;
  }
  if (isBuiltIn(current)) return current;
  throw new StrataError(
    "STRATA_RESOLVE_DEPTH_EXCEEDED",
    `${capability}: ${describeNode(node)} did not resolve within ${String(MAX_RESOLVE_DEPTH)} steps`,
  );
}

export function isLayoutGroup(node: LayoutItem): node is LayoutGroup {
  return "layoutGroup" in node;
}

export function isLayoutSupplementaryItem(node: LayoutItem): node is LayoutSupplementaryItem {
  return "layoutSupplementaryItem" in node;
}

export function isLayoutBoundarySupplementaryItem(
  node: LayoutSupplementaryItem,
): node is LayoutBoundarySupplementaryItem {
  return "layoutBoundarySupplementaryItem" in node;
}

function isResolvedItem(node: LayoutItem): node is ResolvedItem {
  return (
    node instanceof Item ||
    node instanceof Group ||
    node instanceof SupplementaryItem ||
    node instanceof BoundarySupplementaryItem
  );
}

function isResolvedSupplementaryItem(node: LayoutSupplementaryItem): node is ResolvedSupplementaryItem {
  return node instanceof SupplementaryItem || node instanceof BoundarySupplementaryItem;
}

// The most specific capability a custom node exposes wins, so a custom
// group whose `layoutItem` returns itself still resolves through `layoutGroup`.
function nextItem(node: LayoutItem): LayoutItem {
  if (isLayoutSupplementaryItem(node)) return nextSupplementaryItem(node);
  if (isLayoutGroup(node)) return node.layoutGroup;
  return node.layoutItem;
}

function nextSupplementaryItem(node: LayoutSupplementaryItem): LayoutSupplementaryItem {
  if (isLayoutBoundarySupplementaryItem(node)) return node.layoutBoundarySupplementaryItem;
  return node.layoutSupplementaryItem;
}

export function resolveItem(node: LayoutItem): ResolvedItem {
  return resolveChain(node, "LayoutItem", isResolvedItem, nextItem);
}

export function resolveGroup(node: LayoutGroup): Group {
  return resolveChain(
    node,
    "LayoutGroup",
    (value): value is Group => value instanceof Group,
    (value) => value.layoutGroup,
  );
}

export function resolveSupplementaryItem(node: LayoutSupplementaryItem): ResolvedSupplementaryItem {
  return resolveChain(node, "LayoutSupplementaryItem", isResolvedSupplementaryItem, nextSupplementaryItem);
}

export function resolveBoundarySupplementaryItem(
  node: LayoutBoundarySupplementaryItem,
): BoundarySupplementaryItem {
  return resolveChain(
    node,
    "LayoutBoundarySupplementaryItem",
    (value): value is BoundarySupplementaryItem => value instanceof BoundarySupplementaryItem,
    (value) => value.layoutBoundarySupplementaryItem,
  );
}

export function resolveDecorationItem(node: LayoutDecorationItem): DecorationItem {
  return resolveChain(
    node,
    "LayoutDecorationItem",
    (value): value is DecorationItem => value instanceof DecorationItem,
    (value) => value.layoutDecorationItem,
  );
}

/**
 * Resolve any section-like value to the built-in Section it stands for.
 * Use it to apply section modifiers to a custom section type.
 */
export function resolveSection(node: LayoutSection): Section {
  return resolveChain(
    node,
    "LayoutSection",
    (value): value is Section => value instanceof Section,
    (value) => value.layoutSection,
  );
}
