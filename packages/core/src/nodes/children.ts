/**
 * packages/core/src/nodes/children.ts — Child list aggregation.
 *
 * Child lists are written as arrays. `false`, `null` and `undefined` entries
 * are skipped so `cond && node` includes a child conditionally; nested arrays
 * are flattened in place. Order is preserved.
 */

export type LayoutChild<T> = T | false | null | undefined | readonly LayoutChild<T>[];
export type LayoutChildren<T> = readonly LayoutChild<T>[];

function isChildList<T>(value: LayoutChild<T>): value is readonly LayoutChild<T>[] {
  return Array.isArray(value);
}

function collectInto<T>(children: LayoutChildren<T>, out: T[]): void {
  for (const child of children) {
    if (child === false || child === null || child === undefined) continue;
    if (isChildList(child)) {
      collectInto(child, out);
      continue;
    }
    out.push(child);
  }
}

/**
 * Resolve a child list to the ordered nodes it includes.
 *
 * @example
 * ```ts
 * collectChildren([header, showFooter && footer]) // [header] or [header, footer]
 * ```
 */
export function collectChildren<T>(children: LayoutChildren<T>): readonly T[] {
  const out: T[] = [];
  collectInto(children, out);
  return Object.freeze(out);
}

/** Append a child list to an existing one, keeping both in order. */
export function appendChildren<T>(
  existing: readonly T[] | undefined,
  children: LayoutChildren<T>,
): readonly T[] {
  const added = collectChildren(children);
  if (existing === undefined || existing.length === 0) return added;
  if (added.length === 0) return existing;
  return Object.freeze([...existing, ...added]);
}
