/**
 * packages/core/src/nodes/dsl.ts — Node factory functions.
 *
 * Provides a compact API for building layout trees without constructing node
 * classes directly. Child lists are arrays; see children.ts for conditional
 * entries.
 */

import type { Dimension } from "../layout/types.js";
import type { CustomGroupItemProvider } from "../native/types.js";
import { type LayoutChildren, collectChildren } from "./children.js";
import {
  CompositionalLayout,
  LayoutConfiguration,
  type SectionProvider,
  repeatingSections,
} from "./configuration.js";
import { DecorationItem } from "./decorationItem.js";
import { Group } from "./group.js";
import { Item } from "./item.js";
import { resolveSection } from "./resolve.js";
import { Section } from "./section.js";
import { BoundarySupplementaryItem, SupplementaryItem } from "./supplementaryItem.js";
import type { ConfigurationProperties, GroupLayout, LayoutGroup, LayoutItem, LayoutSection } from "./types.js";

export type SizeOptions = Readonly<{
  width?: Dimension;
  height?: Dimension;
}>;

export type GroupOptions = SizeOptions &
  Readonly<{
    /** Repeat the single subitem this many times along the group's axis. */
    count?: number;
  }>;

function isChildren(value: GroupOptions | LayoutChildren<LayoutItem>): value is LayoutChildren<LayoutItem> {
  return Array.isArray(value);
}

function sizeProperties(options: SizeOptions): SizeOptions {
  const out: { width?: Dimension; height?: Dimension } = {};
  if (options.width !== undefined) out.width = options.width;
  if (options.height !== undefined) out.height = options.height;
  return out;
}

function stackGroup(
  layout: GroupLayout,
  optionsOrChildren: GroupOptions | LayoutChildren<LayoutItem>,
  children: LayoutChildren<LayoutItem>,
): Group {
  if (isChildren(optionsOrChildren)) {
    return new Group({ layout, subitems: collectChildren(optionsOrChildren) });
  }
  const options = optionsOrChildren;
  const subitems = collectChildren(children);
  if (options.count === undefined) {
    return new Group({ ...sizeProperties(options), layout, subitems });
  }
  return new Group({ ...sizeProperties(options), layout, subitems, count: options.count });
}

function hGroup(options: GroupOptions, children: LayoutChildren<LayoutItem>): Group;
function hGroup(children: LayoutChildren<LayoutItem>): Group;
function hGroup(
  optionsOrChildren: GroupOptions | LayoutChildren<LayoutItem>,
  children: LayoutChildren<LayoutItem> = [],
): Group {
  return stackGroup("horizontal", optionsOrChildren, children);
}

function vGroup(options: GroupOptions, children: LayoutChildren<LayoutItem>): Group;
function vGroup(children: LayoutChildren<LayoutItem>): Group;
function vGroup(
  optionsOrChildren: GroupOptions | LayoutChildren<LayoutItem>,
  children: LayoutChildren<LayoutItem> = [],
): Group {
  return stackGroup("vertical", optionsOrChildren, children);
}

function compositionalLayout(
  sections: SectionProvider | LayoutChildren<LayoutSection>,
  configuration?: LayoutConfiguration,
): CompositionalLayout {
  const provider = typeof sections === "function" ? sections : repeatingSections(sections);
  return new CompositionalLayout(provider, configuration);
}

export const dsl = {
  /**
   * Create an item. Unset dimensions fill the container.
   *
   * @example
   * ```ts
   * dsl.item()
   * dsl.item({ width: fractionalWidth(0.5), height: absolute(120) })
   * ```
   */
  item(options: SizeOptions = {}): Item {
    return new Item(sizeProperties(options));
  },

  /**
   * Create a group laying out its subitems horizontally.
   *
   * @example
   * ```ts
   * dsl.hGroup([dsl.item(), dsl.item()])
   * dsl.hGroup({ height: absolute(44), count: 3 }, [dsl.item()])
   * ```
   */
  hGroup,

  /** Create a group laying out its subitems vertically. */
  vGroup,

  /**
   * Create a group whose item frames are computed by `itemProvider` each
   * time the host lays the group out.
   */
  customGroup(itemProvider: CustomGroupItemProvider, options: SizeOptions = {}): Group {
    return new Group({ ...sizeProperties(options), layout: "custom", subitems: [], itemProvider });
  },

  /**
   * Create a section repeating `group` for its items.
   *
   * @example
   * ```ts
   * dsl
   *   .section(dsl.hGroup({ count: 2 }, [dsl.item()]))
   *   .boundarySupplementaryItems([dsl.boundarySupplementaryItem("header").zIndex(2)])
   *   .contentInsets({ horizontal: 20, vertical: 8 })
   * ```
   */
  section(group: LayoutGroup): Section {
    return new Section(group);
  },

  /** Resolve a custom section type to the built-in section it stands for. */
  configureSection(section: LayoutSection): Section {
    return resolveSection(section);
  },

  /** Create a supplementary item anchored to the item or group it is attached to. */
  supplementaryItem(elementKind: string, options: SizeOptions = {}): SupplementaryItem {
    return new SupplementaryItem({ ...sizeProperties(options), elementKind });
  },

  /** Create a header, footer or other item aligned to a section or layout boundary. */
  boundarySupplementaryItem(elementKind: string, options: SizeOptions = {}): BoundarySupplementaryItem {
    return new BoundarySupplementaryItem({ ...sizeProperties(options), elementKind });
  },

  /** Create a background decoration for a section. */
  decorationItem(elementKind: string): DecorationItem {
    return new DecorationItem({ elementKind });
  },

  configuration(properties: ConfigurationProperties = {}): LayoutConfiguration {
    return new LayoutConfiguration(properties);
  },

  /**
   * Create a layout root from a section provider, or from a list of sections
   * that repeats for section indices past its end.
   */
  compositionalLayout,
} as const;
