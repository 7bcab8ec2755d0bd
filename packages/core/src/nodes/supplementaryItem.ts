/**
 * packages/core/src/nodes/supplementaryItem.ts — Supplementary item nodes.
 *
 *   - SupplementaryItem: attached to an item or group through anchors (badges)
 *   - BoundarySupplementaryItem: aligned to a section or layout boundary
 *     (headers, footers)
 */

import type { Anchor, Point, RectAlignment } from "../layout/types.js";
import { ItemNode } from "./item.js";
import type {
  BoundarySupplementaryItemProperties,
  LayoutBoundarySupplementaryItem,
  LayoutSupplementaryItem,
  SupplementaryItemProperties,
  SupplementaryProperties,
} from "./types.js";

export abstract class SupplementaryNode<P extends SupplementaryProperties, Self>
  extends ItemNode<P, Self>
  implements LayoutSupplementaryItem
{
  get layoutSupplementaryItem(): LayoutSupplementaryItem {
    return this;
  }

  get elementKind(): string {
    return this.properties.elementKind;
  }

  /** Configure the vertical stacking order relative to other items. */
  zIndex(zIndex: number): Self {
    return this.withProperties({ ...this.properties, zIndex });
  }
}

export class SupplementaryItem extends SupplementaryNode<SupplementaryItemProperties, SupplementaryItem> {
  readonly kind = "supplementaryItem";

  constructor(properties: SupplementaryItemProperties) {
    super(properties);
  }

  protected withProperties(properties: SupplementaryItemProperties): SupplementaryItem {
    return new SupplementaryItem(properties);
  }

  /** Configure where the item attaches to its container. */
  containerAnchor(containerAnchor: Anchor): SupplementaryItem {
    return new SupplementaryItem({ ...this.properties, containerAnchor });
  }

  /** Configure which point of the supplementary item meets the container anchor. */
  itemAnchor(itemAnchor: Anchor): SupplementaryItem {
    return new SupplementaryItem({ ...this.properties, itemAnchor });
  }
}

export class BoundarySupplementaryItem
  extends SupplementaryNode<BoundarySupplementaryItemProperties, BoundarySupplementaryItem>
  implements LayoutBoundarySupplementaryItem
{
  readonly kind = "boundarySupplementaryItem";

  constructor(properties: BoundarySupplementaryItemProperties) {
    super(properties);
  }

  get layoutBoundarySupplementaryItem(): LayoutBoundarySupplementaryItem {
    return this;
  }

  protected withProperties(properties: BoundarySupplementaryItemProperties): BoundarySupplementaryItem {
    return new BoundarySupplementaryItem(properties);
  }

  /** Configure which boundary edge or corner the item aligns to. */
  alignment(alignment: RectAlignment): BoundarySupplementaryItem {
    return new BoundarySupplementaryItem({ ...this.properties, alignment });
  }

  /** Configure an offset from the aligned position, in points. */
  absoluteOffset(offset: Point): BoundarySupplementaryItem {
    return new BoundarySupplementaryItem({
      ...this.properties,
      absoluteOffset: Object.freeze({ x: offset.x, y: offset.y }),
    });
  }

  /** Configure whether the item grows the section's boundary to make room for itself. */
  extendsBoundary(extendsBoundary: boolean): BoundarySupplementaryItem {
    return new BoundarySupplementaryItem({ ...this.properties, extendsBoundary });
  }

  /** Configure whether the item stays pinned to the visible bounds while scrolling. */
  pinToVisibleBounds(pinToVisibleBounds: boolean): BoundarySupplementaryItem {
    return new BoundarySupplementaryItem({ ...this.properties, pinToVisibleBounds });
  }
}
