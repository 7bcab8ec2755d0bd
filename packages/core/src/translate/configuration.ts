/**
 * packages/core/src/translate/configuration.ts — Configuration and layout root translators.
 *
 * Sections of a compositional layout are translated lazily: the host calls
 * the native section provider for each section index, and the provider
 * translates whatever the caller's provider returns. All calls share one
 * translation context, so each dev warning is reported once per layout.
 */

import type {
  LayoutEnvironment,
  NativeCompositionalLayout,
  NativeConfiguration,
} from "../native/types.js";
import type { CompositionalLayout, LayoutConfiguration } from "../nodes/configuration.js";
import {
  type TranslateContext,
  type TranslateOptions,
  createTranslateContext,
} from "./devWarnings.js";
import { translateBoundaryList, translateSection } from "./section.js";

export function translateConfiguration(node: LayoutConfiguration, ctx: TranslateContext): NativeConfiguration {
  const props = node.properties;
  return Object.freeze({
    kind: "configuration",
    scrollDirection: props.scrollDirection ?? "vertical",
    interSectionSpacing: props.interSectionSpacing ?? 0,
    boundarySupplementaryItems: translateBoundaryList(props.boundarySupplementaryItems, ctx, "configuration"),
    contentInsetsReference: props.contentInsetsReference ?? "automatic",
  });
}

export function makeConfiguration(node: LayoutConfiguration, options?: TranslateOptions): NativeConfiguration {
  return translateConfiguration(node, createTranslateContext(options));
}

export function makeCompositionalLayout(
  node: CompositionalLayout,
  options?: TranslateOptions,
): NativeCompositionalLayout {
  const ctx = createTranslateContext(options);
  const provider = node.sectionProvider;
  return Object.freeze({
    kind: "compositionalLayout",
    configuration: translateConfiguration(node.configuration, ctx),
    sectionProvider: (sectionIndex: number, environment: LayoutEnvironment) => {
      const section = provider(sectionIndex, environment);
      return section === null ? null : translateSection(section, ctx);
    },
  });
}
