/**
 * Snapshot comparison.
 *
 * Every identifier in either snapshot lands in exactly one bucket:
 * unchanged, moved, removed or added. A document is only "moved" when its
 * identifier already existed in the before-snapshot; a new file always
 * shows up as "added".
 */

import { ConsistencyError } from "./errors.js";
import { compareCodePoints } from "./location.js";
import type { Identifier, Location } from "./models.js";

export interface TrackedEntry {
  identifier: Identifier;
  location: Location;
}

export interface MovedEntry {
  identifier: Identifier;
  from: Location;
  to: Location;
}

export interface SnapshotDiff {
  unchanged: TrackedEntry[];
  moved: MovedEntry[];
  removed: TrackedEntry[];
  added: TrackedEntry[];
}

/**
 * Throw unless no two identifiers share a location.
 */
export function assertBijection(
  documents: ReadonlyMap<Identifier, Location>,
  label: string,
): void {
  const holders = new Map<Location, Identifier>();
  for (const [identifier, location] of documents) {
    const holder = holders.get(location);
    if (holder !== undefined) {
      throw new ConsistencyError(
        `${label} snapshot maps both '${holder}' and '${identifier}' to ${location}`,
      );
    }
    holders.set(location, identifier);
  }
}

function byIdentifier(a: { identifier: Identifier }, b: { identifier: Identifier }): number {
  return compareCodePoints(a.identifier, b.identifier);
}

/**
 * Classify the union of identifiers of `before` and `after`.
 */
export function diffSnapshots(
  before: ReadonlyMap<Identifier, Location>,
  after: ReadonlyMap<Identifier, Location>,
): SnapshotDiff {
  assertBijection(before, "Before");
  assertBijection(after, "After");

  const diff: SnapshotDiff = { unchanged: [], moved: [], removed: [], added: [] };

  for (const [identifier, from] of before) {
    const to = after.get(identifier);
    if (to === undefined) {
      diff.removed.push({ identifier, location: from });
    } else if (to === from) {
      diff.unchanged.push({ identifier, location: from });
    } else {
      diff.moved.push({ identifier, from, to });
    }
  }

  for (const [identifier, location] of after) {
    if (!before.has(identifier)) {
      diff.added.push({ identifier, location });
    }
  }

  diff.unchanged.sort(byIdentifier);
  diff.moved.sort(byIdentifier);
  diff.removed.sort(byIdentifier);
  diff.added.sort(byIdentifier);

  return diff;
}
