/**
 * packages/core/src/nodes/decorationItem.ts — Section background decoration.
 */

import { type EdgeInsetsInput, resolveEdgeInsets } from "../layout/insets.js";
import type { DecorationItemProperties, LayoutDecorationItem } from "./types.js";

export class DecorationItem implements LayoutDecorationItem {
  readonly kind = "decorationItem";
  readonly properties: DecorationItemProperties;

  constructor(properties: DecorationItemProperties) {
    this.properties = Object.freeze({ ...properties });
  }

  get layoutDecorationItem(): LayoutDecorationItem {
    return this;
  }

  get elementKind(): string {
    return this.properties.elementKind;
  }

  zIndex(zIndex: number): DecorationItem {
    return new DecorationItem({ ...this.properties, zIndex });
  }

  /** Configure the space between the decoration and the section's boundaries. */
  contentInsets(insets: EdgeInsetsInput): DecorationItem {
    return new DecorationItem({ ...this.properties, contentInsets: resolveEdgeInsets(insets) });
  }
}
