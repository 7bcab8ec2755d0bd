/**
 * packages/core/src/nodes/item.ts — Item node and the shared item modifiers.
 *
 * Nodes are immutable. Every modifier returns a new node of the same class
 * with one attribute changed; the receiver and its property bag stay as they
 * were, so several modifier chains may start from the same base node.
 * Constructors keep a frozen copy of the property bag and of its child
 * lists; the caller's objects are neither frozen nor retained.
 */

import { type EdgeInsetsInput, type EdgeSpacingInput, resolveEdgeInsets, resolveEdgeSpacing } from "../layout/insets.js";
import type { Dimension } from "../layout/types.js";
import { type LayoutChildren, appendChildren, collectChildren } from "./children.js";
import type { ItemNodeProperties, ItemProperties, LayoutItem, LayoutSupplementaryItem } from "./types.js";

/**
 * Base class of every built-in item-like node.
 *
 * `Self` is the concrete subclass so modifiers keep the caller's type through
 * a chain: `dsl.item().width(absolute(40)).contentInsets(4)` is an `Item`.
 */
export abstract class ItemNode<P extends ItemProperties, Self> implements LayoutItem {
  readonly properties: P;

  protected constructor(properties: P) {
    const own: P = { ...properties };
    Object.freeze(own);
    this.properties = own;
  }

  get layoutItem(): LayoutItem {
    return this;
  }

  protected abstract withProperties(properties: P): Self;

  /** Configure the width dimension. */
  width(width: Dimension): Self {
    return this.withProperties({ ...this.properties, width });
  }

  /** Configure the height dimension. */
  height(height: Dimension): Self {
    return this.withProperties({ ...this.properties, height });
  }

  /**
   * Configure the amount of space between the content and its boundaries.
   *
   * @example
   * ```ts
   * node.contentInsets(8)
   * node.contentInsets({ horizontal: 20, vertical: 8 })
   * node.contentInsets({ top: 4, trailing: 12 })
   * ```
   */
  contentInsets(insets: EdgeInsetsInput): Self {
    return this.withProperties({ ...this.properties, contentInsets: resolveEdgeInsets(insets) });
  }

  /**
   * Configure the space around the item relative to its neighbours.
   * Edges omitted from the input keep no extra spacing.
   */
  edgeSpacing(spacing: EdgeSpacingInput): Self {
    return this.withProperties({ ...this.properties, edgeSpacing: resolveEdgeSpacing(spacing) });
  }
}

function ownItemLists(properties: ItemNodeProperties): ItemNodeProperties {
  const { supplementaryItems } = properties;
  if (supplementaryItems === undefined) return properties;
  return { ...properties, supplementaryItems: collectChildren(supplementaryItems) };
}

/** Leaf item of a group. */
export class Item extends ItemNode<ItemNodeProperties, Item> {
  readonly kind = "item";

  constructor(properties: ItemNodeProperties = {}) {
    super(ownItemLists(properties));
  }

  protected withProperties(properties: ItemNodeProperties): Item {
    return new Item(properties);
  }

  /** Add supplementary items (badges, overlays) attached to this item. */
  supplementaryItems(children: LayoutChildren<LayoutSupplementaryItem>): Item {
    return new Item({
      ...this.properties,
      supplementaryItems: appendChildren(this.properties.supplementaryItems, children),
    });
  }
}
