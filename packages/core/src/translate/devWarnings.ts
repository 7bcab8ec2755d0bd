/**
 * packages/core/src/translate/devWarnings.ts — Development diagnostics for translation.
 *
 * Translation never rejects a tree. In dev mode it reports configurations the
 * host engine is likely to reject or silently reinterpret, once per distinct
 * issue per translation.
 */

import { describeNode } from "../nodes/resolve.js";

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

export const DEV_MODE = NODE_ENV !== "production";

export type TranslateOptions = Readonly<{
  /** Report dev warnings. Defaults to NODE_ENV !== "production". */
  devMode?: boolean;
  /** Receives each warning message. Defaults to console.warn. */
  warn?: (message: string) => void;
}>;

export type TranslateContext = Readonly<{
  devMode: boolean;
  warnedIssues: Set<string>;
  /** Per-translation identities of the nodes named in dedupe keys. */
  nodeIds: Map<object, number>;
  warn: (message: string) => void;
}>;

export type WarningArea = "group" | "section" | "configuration";

function defaultWarn(message: string): void {
  console.warn(message);
}

export function createTranslateContext(options: TranslateOptions = {}): TranslateContext {
  return {
    devMode: options.devMode ?? DEV_MODE,
    warnedIssues: new Set<string>(),
    nodeIds: new Map<object, number>(),
    warn: options.warn ?? defaultWarn,
  };
}

function nodeId(ctx: TranslateContext, node: object): number {
  const known = ctx.nodeIds.get(node);
  if (known !== undefined) return known;
  const id = ctx.nodeIds.size;
  ctx.nodeIds.set(node, id);
  return id;
}

export function warnTranslateIssue(
  ctx: TranslateContext,
  area: WarningArea,
  key: string,
  detail: string,
): void {
  if (!ctx.devMode) return;
  const issueKey = `${area}:${key}`;
  if (ctx.warnedIssues.has(issueKey)) return;
  ctx.warnedIssues.add(issueKey);
  ctx.warn(`[strata][${area}] ${detail}`);
}

export function warnGroupCount(
  ctx: TranslateContext,
  group: object,
  count: number,
  subitemCount: number,
): void {
  if (!ctx.devMode) return;
  const id = nodeId(ctx, group);
  if (!Number.isInteger(count) || count < 1) {
    warnTranslateIssue(
      ctx,
      "group",
      `count:${String(id)}`,
      `${describeNode(group)} count must be a positive integer (got ${String(count)})`,
    );
    return;
  }
  if (subitemCount > 1) {
    warnTranslateIssue(
      ctx,
      "group",
      `count-subitems:${String(id)}`,
      `${describeNode(group)} count=${String(count)} repeats only the first of ${String(subitemCount)} subitems`,
    );
  }
}

export function warnDuplicateElementKinds(
  ctx: TranslateContext,
  area: "section" | "configuration",
  elementKinds: readonly string[],
): void {
  if (!ctx.devMode || elementKinds.length < 2) return;
  const seen = new Set<string>();
  for (const elementKind of elementKinds) {
    if (seen.has(elementKind)) {
      warnTranslateIssue(
        ctx,
        area,
        `duplicate-boundary:${elementKind}`,
        `boundary supplementary elementKind "${elementKind}" is used more than once in one ${area}`,
      );
      continue;
    }
    seen.add(elementKind);
  }
}
