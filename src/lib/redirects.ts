/**
 * Redirect rules from a snapshot diff.
 *
 * Each moved document yields one rule, old location -> new location.
 * Removed documents have nowhere to go and are reported instead.
 */

import { ConsistencyError } from "./errors.js";
import { compareCodePoints } from "./location.js";
import type { Diagnostic, Location, RedirectRule } from "./models.js";
import type { SnapshotDiff } from "./diff.js";

export interface RedirectPlan {
  /** Sorted by old location */
  rules: RedirectRule[];
  /** One removed-document warning per removed identifier */
  warnings: Diagnostic[];
}

/**
 * `redirect_maps` object as consumed by the site generator's redirect
 * plugin: old location -> new location.
 */
export type RedirectMap = Record<Location, Location>;

/**
 * Derive redirect rules from a diff.
 */
export function synthesizeRedirects(diff: SnapshotDiff): RedirectPlan {
  const sources = new Map<Location, string>();
  const rules: RedirectRule[] = [];

  for (const entry of diff.moved) {
    if (entry.from === entry.to) {
      throw new ConsistencyError(
        `'${entry.identifier}' is marked as moved but stays at ${entry.from}`,
      );
    }
    const previous = sources.get(entry.from);
    if (previous !== undefined) {
      throw new ConsistencyError(
        `Both '${previous}' and '${entry.identifier}' were at ${entry.from}`,
      );
    }
    sources.set(entry.from, entry.identifier);
    rules.push({ from: entry.from, to: entry.to });
  }

  rules.sort((a, b) => compareCodePoints(a.from, b.from));

  const warnings = diff.removed.map((entry): Diagnostic => ({
    kind: "removed-document",
    location: entry.location,
    identifier: entry.identifier,
    message: `'${entry.identifier}' was at ${entry.location} and no longer exists; no redirect is possible`,
  }));

  return { rules, warnings };
}

/**
 * Rules as a redirect map.
 */
export function toRedirectMap(rules: RedirectRule[]): RedirectMap {
  return Object.fromEntries(rules.map((rule) => [rule.from, rule.to]));
}

/**
 * Merge generated rules into an existing redirect map. Generated rules
 * replace existing entries with the same source; keys come out sorted.
 */
export function mergeRedirectMaps(existing: RedirectMap, rules: RedirectRule[]): RedirectMap {
  const combined = new Map([
    ...Object.entries(existing),
    ...rules.map((rule): [Location, Location] => [rule.from, rule.to]),
  ]);
  return Object.fromEntries([...combined].sort(([a], [b]) => compareCodePoints(a, b)));
}
