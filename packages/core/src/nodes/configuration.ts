/**
 * packages/core/src/nodes/configuration.ts — Layout-wide configuration and the layout root.
 */

import type { ContentInsetsReference, ScrollDirection } from "../layout/types.js";
import type { LayoutEnvironment } from "../native/types.js";
import { type LayoutChildren, appendChildren, collectChildren } from "./children.js";
import type { ConfigurationProperties, LayoutBoundarySupplementaryItem, LayoutSection } from "./types.js";

export class LayoutConfiguration {
  readonly kind = "configuration";
  readonly properties: ConfigurationProperties;

  constructor(properties: ConfigurationProperties = {}) {
    const { boundarySupplementaryItems } = properties;
    this.properties = Object.freeze(
      boundarySupplementaryItems === undefined
        ? { ...properties }
        : { ...properties, boundarySupplementaryItems: collectChildren(boundarySupplementaryItems) },
    );
  }

  /** Configure the main scroll axis. Defaults to "vertical". */
  scrollDirection(direction: ScrollDirection): LayoutConfiguration {
    return new LayoutConfiguration({ ...this.properties, scrollDirection: direction });
  }

  /** Configure the amount of space between sections. */
  interSectionSpacing(spacing: number): LayoutConfiguration {
    return new LayoutConfiguration({ ...this.properties, interSectionSpacing: spacing });
  }

  /** Configure the boundary sections reference when their own reference is "automatic". */
  contentInsetsReference(reference: ContentInsetsReference): LayoutConfiguration {
    return new LayoutConfiguration({ ...this.properties, contentInsetsReference: reference });
  }

  /** Add headers and footers around the whole layout. Items added by earlier calls are kept. */
  boundarySupplementaryItems(children: LayoutChildren<LayoutBoundarySupplementaryItem>): LayoutConfiguration {
    return new LayoutConfiguration({
      ...this.properties,
      boundarySupplementaryItems: appendChildren(this.properties.boundarySupplementaryItems, children),
    });
  }
}

export type SectionProvider = (sectionIndex: number, environment: LayoutEnvironment) => LayoutSection | null;

/**
 * Root of a layout: sections produced on demand for each section index,
 * plus the layout-wide configuration.
 */
export class CompositionalLayout {
  readonly kind = "compositionalLayout";
  readonly sectionProvider: SectionProvider;
  readonly configuration: LayoutConfiguration;

  constructor(sectionProvider: SectionProvider, configuration: LayoutConfiguration = new LayoutConfiguration()) {
    this.sectionProvider = sectionProvider;
    this.configuration = configuration;
  }

  /** Replace the layout-wide configuration. */
  withConfiguration(configuration: LayoutConfiguration): CompositionalLayout {
    return new CompositionalLayout(this.sectionProvider, configuration);
  }
}

/**
 * Provider cycling through a fixed list of sections: section `i` uses
 * `sections[i % sections.length]`. An empty list provides no sections.
 */
export function repeatingSections(children: LayoutChildren<LayoutSection>): SectionProvider {
  const sections = collectChildren(children);
  return (sectionIndex) => {
    if (sections.length === 0) return null;
    const index = ((sectionIndex % sections.length) + sections.length) % sections.length;
    return sections[index] ?? null;
  };
}
