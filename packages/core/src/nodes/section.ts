/**
 * packages/core/src/nodes/section.ts — Section node and section modifiers.
 *
 * A section owns exactly one group, which the host repeats to fill the
 * section's items, plus boundary supplementary items and decorations.
 */

import { type EdgeInsetsInput, resolveEdgeInsets } from "../layout/insets.js";
import type { ContentInsetsReference, OrthogonalScrollingBehavior } from "../layout/types.js";
import type { VisibleItemsInvalidationHandler } from "../native/types.js";
import { type LayoutChildren, appendChildren, collectChildren } from "./children.js";
import type {
  LayoutBoundarySupplementaryItem,
  LayoutDecorationItem,
  LayoutGroup,
  LayoutSection,
  SectionProperties,
} from "./types.js";

export class Section implements LayoutSection {
  readonly kind = "section";
  readonly group: LayoutGroup;
  readonly properties: SectionProperties;

  constructor(group: LayoutGroup, properties: SectionProperties = {}) {
    const own: { -readonly [K in keyof SectionProperties]: SectionProperties[K] } = { ...properties };
    if (properties.boundarySupplementaryItems !== undefined) {
      own.boundarySupplementaryItems = collectChildren(properties.boundarySupplementaryItems);
    }
    if (properties.decorationItems !== undefined) {
      own.decorationItems = collectChildren(properties.decorationItems);
    }
    this.group = group;
    this.properties = Object.freeze(own);
  }

  get layoutSection(): LayoutSection {
    return this;
  }

  private with(properties: SectionProperties): Section {
    return new Section(this.group, properties);
  }

  /** Configure the amount of space between the groups in the section. */
  interGroupSpacing(spacing: number): Section {
    return this.with({ ...this.properties, interGroupSpacing: spacing });
  }

  /**
   * Configure the boundary to reference when defining content insets.
   *
   * Defaults to "automatic": the section follows the layout configuration's
   * reference.
   */
  contentInsetsReference(reference: ContentInsetsReference): Section {
    return this.with({ ...this.properties, contentInsetsReference: reference });
  }

  /**
   * Configure the section's scrolling behavior relative to the main layout axis.
   *
   * Defaults to "none": content lays out along the configuration's scroll
   * direction. Any other value scrolls the section orthogonally.
   */
  orthogonalScrollingBehavior(behavior: OrthogonalScrollingBehavior): Section {
    return this.with({ ...this.properties, orthogonalScrollingBehavior: behavior });
  }

  /**
   * Add supplementary items associated with the section's boundary edges,
   * such as headers and footers. Items added by earlier calls are kept.
   */
  boundarySupplementaryItems(children: LayoutChildren<LayoutBoundarySupplementaryItem>): Section {
    return this.with({
      ...this.properties,
      boundarySupplementaryItems: appendChildren(this.properties.boundarySupplementaryItems, children),
    });
  }

  /** Configure whether supplementary items follow the section's content insets. Defaults to true. */
  supplementariesFollowContentInsets(follow: boolean): Section {
    return this.with({ ...this.properties, supplementariesFollowContentInsets: follow });
  }

  /**
   * Install a callback the host calls before each layout pass to adjust the
   * visible items. `null` removes a previously installed callback.
   */
  visibleItemsInvalidationHandler(handler: VisibleItemsInvalidationHandler | null): Section {
    return this.with({ ...this.properties, visibleItemsInvalidationHandler: handler });
  }

  /**
   * Add decoration items anchored to the section, such as backgrounds.
   * Items added by earlier calls are kept.
   */
  decorationItems(children: LayoutChildren<LayoutDecorationItem>): Section {
    return this.with({
      ...this.properties,
      decorationItems: appendChildren(this.properties.decorationItems, children),
    });
  }

  /**
   * Configure the amount of space between the section's content and its boundaries.
   *
   * @example
   * ```ts
   * section.contentInsets(16)
   * section.contentInsets({ horizontal: 20, vertical: 8 })
   * section.contentInsets({ top: 12, bottom: 24 })
   * ```
   */
  contentInsets(insets: EdgeInsetsInput): Section {
    return this.with({ ...this.properties, contentInsets: resolveEdgeInsets(insets) });
  }
}
