/**
 * packages/core/src/nodes/group.ts — Group node.
 *
 * A group lays out its subitems horizontally, vertically, or at frames
 * computed by a caller-supplied provider (custom groups).
 */

import type { Spacing } from "../layout/types.js";
import { type LayoutChildren, appendChildren, collectChildren } from "./children.js";
import { ItemNode } from "./item.js";
import type { GroupProperties, LayoutGroup, LayoutSupplementaryItem } from "./types.js";

function ownGroupLists(properties: GroupProperties): GroupProperties {
  const subitems = collectChildren(properties.subitems);
  const { supplementaryItems } = properties;
  if (supplementaryItems === undefined) return { ...properties, subitems };
  return { ...properties, subitems, supplementaryItems: collectChildren(supplementaryItems) };
}

export class Group extends ItemNode<GroupProperties, Group> implements LayoutGroup {
  readonly kind = "group";

  constructor(properties: GroupProperties) {
    super(ownGroupLists(properties));
  }

  get layoutGroup(): LayoutGroup {
    return this;
  }

  protected withProperties(properties: GroupProperties): Group {
    return new Group(properties);
  }

  /** Configure the spacing between subitems along the group's axis. */
  interItemSpacing(spacing: Spacing): Group {
    return new Group({ ...this.properties, interItemSpacing: spacing });
  }

  /** Add supplementary items attached to the group. */
  supplementaryItems(children: LayoutChildren<LayoutSupplementaryItem>): Group {
    return new Group({
      ...this.properties,
      supplementaryItems: appendChildren(this.properties.supplementaryItems, children),
    });
  }
}
